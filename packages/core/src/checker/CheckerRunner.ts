export interface CheckerRequest {
  projectRoot: string;
  /** Materialized paths the checker should read */
  paths: readonly string[];
  signal?: AbortSignal;
}

/**
 * Runs the external checker once over a batch of files and returns its raw
 * output lines. Rejects with ScanCancelledError when the signal aborts.
 */
export interface CheckerRunner {
  run(request: CheckerRequest): Promise<string[]>;
}
