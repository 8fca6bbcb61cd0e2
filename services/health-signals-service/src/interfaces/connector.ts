export type FailureReason =
  | 'network_error'
  | 'timeout'
  | 'rate_limited'
  | 'http_error'
  | 'malformed_response'
  | 'circuit_open';

/**
 * One upstream request that could not be turned into records.
 * Reported alongside the records of the same run, never thrown.
 */
export interface SourceFailure {
  source: string;
  url: string;
  reason: FailureReason;
  message: string;
  status?: number;
}

export interface ConnectorResult<T> {
  source: string;
  records: T[];
  failures: SourceFailure[];
  skipped: number;
  fetchedAt: string;
}
