import { defaultCommandRunner } from "./exec.js";
import type { CommandResult, CommandRunner, SchedulerClient, SlurmCommands } from "./types.js";

export const DEFAULT_SLURM_COMMANDS: SlurmCommands = {
  sbatch: "sbatch",
  scontrol: "scontrol",
  squeue: "squeue",
  scancel: "scancel",
};

export const COMPLETED_OR_NOT_FOUND = "COMPLETED_OR_NOT_FOUND";

const QUEUED_STATES = new Set(["PENDING", "RUNNING"]);

export function isQueuedState(state: string): boolean {
  return QUEUED_STATES.has(state);
}

/** Job id from sbatch's `Submitted batch job <id>` acknowledgement. */
export function parseSubmittedJobId(stdout: string): string | undefined {
  const match = /Submitted\s+batch\s+job\s+(\d+)/.exec(stdout);
  return match?.[1];
}

/**
 * Parses `scontrol show job` output: whitespace separated `Key=Value` tokens.
 * Tokens without `=` are skipped; a value may itself contain `=`.
 */
export function parseJobAttributes(stdout: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const token of stdout.split(/\s+/)) {
    const trimmed = token.trim();
    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      continue;
    }
    attributes[trimmed.slice(0, eq)] = trimmed.slice(eq + 1);
  }
  return attributes;
}

/** First reported state from `squeue -h -o %T`, or undefined when nothing is listed. */
export function parseQueueState(stdout: string): string | undefined {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);
}

export type SlurmClientParams = {
  runner?: CommandRunner;
  commands?: Partial<SlurmCommands>;
  cwd?: string;
  timeoutMs?: number;
};

export class SlurmClient implements SchedulerClient {
  private readonly runner: CommandRunner;
  private readonly commands: SlurmCommands;
  private readonly options: { cwd?: string; timeoutMs?: number };

  constructor(params: SlurmClientParams = {}) {
    this.runner = params.runner ?? defaultCommandRunner;
    this.commands = { ...DEFAULT_SLURM_COMMANDS, ...params.commands };
    this.options = {
      ...(params.cwd != null ? { cwd: params.cwd } : {}),
      ...(params.timeoutMs != null ? { timeoutMs: params.timeoutMs } : {}),
    };
  }

  async submit(scriptPath: string): Promise<CommandResult> {
    return await this.runner(this.commands.sbatch, [scriptPath], this.options);
  }

  async inspect(jobId: string): Promise<CommandResult> {
    return await this.runner(this.commands.scontrol, ["show", "job", jobId], this.options);
  }

  async queryStatus(jobId: string): Promise<CommandResult> {
    return await this.runner(this.commands.squeue, ["-j", jobId, "-h", "-o", "%T"], this.options);
  }

  async cancel(jobId: string): Promise<number> {
    const result = await this.runner(this.commands.scancel, [jobId], this.options);
    return result.code;
  }
}
