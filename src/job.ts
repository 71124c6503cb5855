import { setTimeout as delay } from "node:timers/promises";
import { ConfigurationError, QueryError, describeError } from "./errors.js";
import { failureDetail } from "./exec.js";
import { silentLogger } from "./logger.js";
import {
  COMPLETED_OR_NOT_FOUND,
  isQueuedState,
  parseJobAttributes,
  parseQueueState,
} from "./slurm.js";
import type { CommandResult, Logger, SchedulerClient, Sleep, WaitOutcome } from "./types.js";

export const DEFAULT_POLL_INTERVAL_SECONDS = 3;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

export type JobHandleParams = {
  jobId: string;
  arrayIndex?: number;
  client: SchedulerClient;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
};

export type HoldOptions = {
  intervalSeconds?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
};

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * One submitted job, or one task of an array job. Array tasks are addressed as
 * `<jobId>_<index>` in every scheduler call.
 */
export class JobHandle {
  readonly jobId: string;
  readonly arrayIndex: number | undefined;
  readonly submissionDetails: Readonly<Record<string, string>>;
  private readonly client: SchedulerClient;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  private constructor(params: JobHandleParams, submissionDetails: Record<string, string>) {
    this.jobId = params.jobId;
    this.arrayIndex = params.arrayIndex;
    this.client = params.client;
    this.logger = params.logger ?? silentLogger;
    this.sleep = params.sleep ?? defaultSleep;
    this.now = params.now ?? Date.now;
    this.submissionDetails = Object.freeze({ ...submissionDetails });
  }

  static taskIdFor(jobId: string, arrayIndex?: number): string {
    return arrayIndex == null ? jobId : `${jobId}_${arrayIndex}`;
  }

  /** Builds a handle after capturing `scontrol show job` for it. */
  static async create(params: JobHandleParams): Promise<JobHandle> {
    const taskId = JobHandle.taskIdFor(params.jobId, params.arrayIndex);

    let result: CommandResult;
    try {
      result = await params.client.inspect(taskId);
    } catch (err) {
      throw new QueryError(`scontrol show job ${taskId} failed: ${describeError(err)}`, {
        jobId: params.jobId,
        cause: err,
      });
    }

    if (result.code !== 0) {
      throw new QueryError(`scontrol show job ${taskId} failed: ${failureDetail(result)}`, {
        jobId: params.jobId,
        exitCode: result.code,
        stderr: result.stderr,
      });
    }

    return new JobHandle(params, parseJobAttributes(result.stdout));
  }

  get taskId(): string {
    return JobHandle.taskIdFor(this.jobId, this.arrayIndex);
  }

  get isArrayTask(): boolean {
    return this.arrayIndex != null;
  }

  /**
   * Scheduler state such as `PENDING` or `RUNNING`. Jobs that left the queue,
   * and failed queries, both report `COMPLETED_OR_NOT_FOUND`.
   */
  async getStatus(): Promise<string> {
    let result: CommandResult;
    try {
      result = await this.client.queryStatus(this.taskId);
    } catch (err) {
      this.logger.debug?.(`squeue for ${this.taskId} could not run: ${describeError(err)}`);
      return COMPLETED_OR_NOT_FOUND;
    }

    if (result.code !== 0) {
      this.logger.debug?.(`squeue for ${this.taskId} failed: ${failureDetail(result)}`);
      return COMPLETED_OR_NOT_FOUND;
    }

    return parseQueueState(result.stdout) ?? COMPLETED_OR_NOT_FOUND;
  }

  async isQueued(): Promise<boolean> {
    return isQueuedState(await this.getStatus());
  }

  async holdForCompletion(options: HoldOptions = {}): Promise<WaitOutcome> {
    const intervalSeconds = options.intervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS;
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new ConfigurationError(
        `intervalSeconds must be a positive number (got ${intervalSeconds})`,
      );
    }
    if (options.timeoutMs != null && (!Number.isFinite(options.timeoutMs) || options.timeoutMs < 0)) {
      throw new ConfigurationError(
        `timeoutMs must be a non-negative number (got ${options.timeoutMs})`,
      );
    }
    const intervalMs = intervalSeconds * 1000;
    const deadline = options.timeoutMs != null ? this.now() + options.timeoutMs : undefined;
    const { signal } = options;

    for (;;) {
      if (signal?.aborted) {
        return "cancelled";
      }
      if (!(await this.isQueued())) {
        return "completed";
      }
      if (signal?.aborted) {
        return "cancelled";
      }

      let waitMs = intervalMs;
      if (deadline != null) {
        const remaining = deadline - this.now();
        if (remaining <= 0) {
          return "timed_out";
        }
        waitMs = Math.min(waitMs, remaining);
      }

      try {
        await this.sleep(waitMs, signal);
      } catch (err) {
        if (isAbortError(err) || signal?.aborted) {
          return "cancelled";
        }
        throw err;
      }
    }
  }

  /** Attempts `scancel`; reports failure as `false` rather than throwing. */
  async cancel(): Promise<boolean> {
    try {
      const code = await this.client.cancel(this.taskId);
      if (code !== 0) {
        this.logger.warn(`scancel ${this.taskId} exited with code ${code}`);
        return false;
      }
      this.logger.info(`cancelled ${this.taskId}`);
      return true;
    } catch (err) {
      this.logger.warn(`scancel ${this.taskId} could not run: ${describeError(err)}`);
      return false;
    }
  }

  toString(): string {
    return this.taskId;
  }
}
