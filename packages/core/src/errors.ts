/**
 * Base class for failures surfaced by a scan
 */
export class ScanError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ScanError';
  }
}

/**
 * Thrown when a file cannot be snapshotted for the checker
 */
export class ScanValidationError extends ScanError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'ScanValidationError';
  }
}

/**
 * Thrown when the checker process cannot run or exits abnormally
 */
export class ToolInvocationError extends ScanError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'ToolInvocationError';
  }
}

/**
 * Raised when the caller aborts a scan. Not a failure: the orchestrator
 * reports it as an empty successful result.
 */
export class ScanCancelledError extends Error {
  constructor(message = 'Scan cancelled') {
    super(message);
    this.name = 'ScanCancelledError';
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ScanCancelledError();
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
