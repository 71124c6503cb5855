export class SlurmBatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A directive name or value that cannot be turned into a valid script line. */
export class ConfigurationError extends SlurmBatchError {}

/** sbatch exited non-zero, could not be started, or printed no job id. */
export class SubmissionError extends SlurmBatchError {
  readonly exitCode: number | undefined;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    message: string,
    details: { exitCode?: number; stdout?: string; stderr?: string; cause?: unknown } = {},
  ) {
    super(message, details.cause != null ? { cause: details.cause } : undefined);
    this.exitCode = details.exitCode;
    this.stdout = details.stdout ?? "";
    this.stderr = details.stderr ?? "";
  }
}

/**
 * The post-submission `scontrol show job` call failed. The job was accepted by
 * the scheduler, so `jobId` is kept for callers that want to cancel it.
 */
export class QueryError extends SlurmBatchError {
  readonly jobId: string;
  readonly exitCode: number | undefined;
  readonly stderr: string;

  constructor(
    message: string,
    details: { jobId: string; exitCode?: number; stderr?: string; cause?: unknown },
  ) {
    super(message, details.cause != null ? { cause: details.cause } : undefined);
    this.jobId = details.jobId;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr ?? "";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
