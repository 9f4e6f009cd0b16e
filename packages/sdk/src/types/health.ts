/**
 * Subset of one entry of the `/health` response.
 * The server returns more fields; only these are read.
 */
export interface HealthEntry {
  address: string;
  status: string;
  /** Seconds since the node started. */
  uptime?: number;
  instance?: string;
  version?: string;
}
