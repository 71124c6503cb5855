export type DirectiveValue = string | number;

export type Duration = {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
};

export type ArraySpec = string | number | Iterable<number>;

export type DirectiveInput = DirectiveValue | Duration | ArraySpec;

export type DirectiveRecord = Record<string, DirectiveInput>;

export type DefaultDirectivesProvider =
  | DirectiveRecord
  | (() => DirectiveRecord | Promise<DirectiveRecord>);

export type ConfigurationSnapshot = {
  shell: string;
  directives: Record<string, string>;
  commands: string[];
};

export type ManagerState = "unconfigured" | "configured" | "submitted";

export type WaitOutcome = "completed" | "timed_out" | "cancelled";

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number },
) => Promise<CommandResult>;

export type SlurmCommands = {
  sbatch: string;
  scontrol: string;
  squeue: string;
  scancel: string;
};

export interface SchedulerClient {
  submit(scriptPath: string): Promise<CommandResult>;
  inspect(jobId: string): Promise<CommandResult>;
  queryStatus(jobId: string): Promise<CommandResult>;
  cancel(jobId: string): Promise<number>;
}

export type Logger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
