export const EXIT_CODES = {
  success: 0,
  /** Server answered with a non-2xx status, or a 2xx body reporting failure. */
  applicationError: 1,
  /** No response; the remote outcome is unknown. */
  transportError: 2,
  /** Bad flags, unknown command, invalid local input. */
  usage: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
