/**
 * Human-readable durations for node uptimes, e.g. "2days 3h 4m 5s".
 */

// Years are 365.25 days and months a twelfth of that.
const UNITS: ReadonlyArray<{ seconds: number; format: (n: number) => string }> = [
  { seconds: 31_557_600, format: (n) => `${n}${n === 1 ? "year" : "years"}` },
  { seconds: 2_630_016, format: (n) => `${n}${n === 1 ? "month" : "months"}` },
  { seconds: 86_400, format: (n) => `${n}${n === 1 ? "day" : "days"}` },
  { seconds: 3_600, format: (n) => `${n}h` },
  { seconds: 60, format: (n) => `${n}m` },
  { seconds: 1, format: (n) => `${n}s` },
];

/** Format whole seconds. Fractions are dropped; zero and negatives render as "0s". */
export function formatDuration(totalSeconds: number): string {
  let remaining = Math.floor(totalSeconds);
  if (!Number.isFinite(remaining) || remaining <= 0) return "0s";

  const parts: string[] = [];
  for (const unit of UNITS) {
    const count = Math.floor(remaining / unit.seconds);
    if (count > 0) {
      parts.push(unit.format(count));
      remaining -= count * unit.seconds;
    }
  }
  return parts.join(" ");
}
