/**
 * ResourceTimeoutError
 *
 * Thrown when a per-job lock cannot be acquired within its bound.
 * Callers may retry the whole operation later.
 */
export class ResourceTimeoutError extends Error {
  readonly retryable = true;
  readonly jobId: string;
  readonly timeoutMs: number;

  constructor(jobId: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      `Timed out after ${timeoutMs}ms waiting for the lock of job "${jobId}"`,
      options,
    );
    this.name = 'ResourceTimeoutError';
    this.jobId = jobId;
    this.timeoutMs = timeoutMs;
  }
}
