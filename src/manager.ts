import fs from "node:fs/promises";
import path from "node:path";
import { resolveDefaultDirectives } from "./config.js";
import { DirectiveStore, toDirectiveKey } from "./directives.js";
import { SubmissionError, describeError } from "./errors.js";
import { failureDetail } from "./exec.js";
import { JobHandle } from "./job.js";
import { silentLogger } from "./logger.js";
import { ArrayRange, normalizeArray, normalizeDirective } from "./normalize.js";
import { ensureDir, resolveOutputDir, sanitizeFileStem, withSuffix } from "./paths.js";
import { SlurmClient, parseSubmittedJobId } from "./slurm.js";
import { writeConfigSnapshot } from "./snapshot.js";
import type {
  CommandResult,
  CommandRunner,
  DefaultDirectivesProvider,
  DirectiveRecord,
  Logger,
  ManagerState,
  SchedulerClient,
  Sleep,
} from "./types.js";

export const DEFAULT_SCRIPT_SUFFIX = ".sh";
export const DEFAULT_SNAPSHOT_SUFFIX = ".config.json";

export type JobManagerParams = {
  config?: DirectiveStore;
  client?: SchedulerClient;
  runner?: CommandRunner;
  logger?: Logger;
  workspaceDir?: string;
  outputDir?: string;
  scriptSuffix?: string;
  snapshotSuffix?: string;
  sleep?: Sleep;
  now?: () => Date;
};

export type SubmitOptions = {
  shell?: string;
  persistConfig?: boolean;
  outputDir?: string;
};

export class JobManager {
  readonly config: DirectiveStore;
  private readonly client: SchedulerClient;
  private readonly logger: Logger;
  private readonly workspaceDir: string;
  private readonly outputDir: string | undefined;
  private readonly scriptSuffix: string;
  private readonly snapshotSuffix: string;
  private readonly sleep: Sleep | undefined;
  private readonly now: () => Date;
  private submitted = false;

  jobs: JobHandle[] = [];
  jobId: string | undefined;
  stdout = "";
  stderr = "";
  scriptPath: string | undefined;
  configPath: string | undefined;

  constructor(params: JobManagerParams = {}) {
    this.config = params.config ?? new DirectiveStore();
    this.client = params.client ?? new SlurmClient({ runner: params.runner });
    this.logger = params.logger ?? silentLogger;
    this.workspaceDir = path.resolve(params.workspaceDir ?? process.cwd());
    this.outputDir = params.outputDir;
    this.scriptSuffix = params.scriptSuffix ?? DEFAULT_SCRIPT_SUFFIX;
    this.snapshotSuffix = params.snapshotSuffix ?? DEFAULT_SNAPSHOT_SUFFIX;
    this.sleep = params.sleep;
    this.now = params.now ?? (() => new Date());
  }

  /** Creates a manager whose directives start from the provider's defaults. */
  static async fromDefaults(
    provider: DefaultDirectivesProvider,
    params: Omit<JobManagerParams, "config"> & { shell?: string } = {},
  ): Promise<JobManager> {
    const { shell, ...rest } = params;
    const manager = new JobManager({ ...rest, config: new DirectiveStore({ shell }) });
    manager.addArguments(await resolveDefaultDirectives(provider));
    return manager;
  }

  get state(): ManagerState {
    if (this.submitted) {
      return "submitted";
    }
    return this.config.isEmpty ? "unconfigured" : "configured";
  }

  addArguments(directives: DirectiveRecord): void {
    const normalized = Object.entries(directives).map(([name, value]) => {
      const key = toDirectiveKey(name);
      return [key, normalizeDirective(key, value).value] as const;
    });
    for (const [name, value] of normalized) {
      this.config.set(name, value);
    }
  }

  addCommands(...commands: string[]): void {
    for (const command of commands) {
      this.config.addCommand(command);
    }
  }

  getArguments(): Record<string, string> {
    return Object.fromEntries(this.config.entries());
  }

  getCommands(): string[] {
    return this.config.commands();
  }

  renderScript(shell?: string): string {
    return this.config.render(shell);
  }

  isArrayJob(): boolean {
    return this.config.isArrayJob();
  }

  arrayRange(): ArrayRange | undefined {
    const spec = this.config.get("array");
    return spec == null ? undefined : normalizeArray(spec);
  }

  async writeSubmissionScript(dir: string, shell?: string): Promise<string> {
    const scriptPath = withSuffix(dir, this.fileStem(), this.scriptSuffix);
    await fs.writeFile(scriptPath, this.renderScript(shell), "utf8");
    return scriptPath;
  }

  async serializeConfig(dir: string): Promise<string> {
    const configPath = withSuffix(dir, this.fileStem(), this.snapshotSuffix);
    await writeConfigSnapshot(configPath, this.config.toSnapshot(), this.now());
    return configPath;
  }

  async submit(options: SubmitOptions = {}): Promise<JobHandle[]> {
    const range = this.isArrayJob() ? this.arrayRange() : undefined;
    const outputDir = resolveOutputDir(this.workspaceDir, options.outputDir ?? this.outputDir);
    await ensureDir(outputDir);

    const previousJobId = this.jobId;
    this.jobs = [];
    this.jobId = undefined;
    this.stdout = "";
    this.stderr = "";

    if (this.submitted) {
      this.logger.warn(
        `resubmitting ${this.fileStem()}; previous job ${previousJobId ?? "<unknown>"} is left untouched`,
      );
    }

    const scriptPath = await this.writeSubmissionScript(outputDir, options.shell);
    const configPath =
      options.persistConfig === false ? undefined : await this.serializeConfig(outputDir);
    this.scriptPath = scriptPath;
    this.configPath = configPath;

    let result: CommandResult;
    try {
      result = await this.client.submit(scriptPath);
    } catch (err) {
      throw new SubmissionError(`sbatch could not run: ${describeError(err)}`, { cause: err });
    }

    this.stdout = result.stdout;
    this.stderr = result.stderr;

    if (result.code !== 0) {
      throw new SubmissionError(`sbatch failed: ${failureDetail(result)}`, {
        exitCode: result.code,
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }

    const jobId = parseSubmittedJobId(result.stdout);
    if (!jobId) {
      throw new SubmissionError(
        `Unable to parse job id from sbatch output: ${result.stdout.trim() || "<empty>"}`,
        { exitCode: result.code, stdout: result.stdout, stderr: result.stderr },
      );
    }

    this.jobId = jobId;
    this.submitted = true;
    this.logger.info(
      `submitted ${path.basename(scriptPath)} as job ${jobId}${range ? ` (array ${range.toString()})` : ""}`,
    );

    const indices: Array<number | undefined> = range ? range.toArray() : [undefined];
    const jobs: JobHandle[] = [];
    for (const arrayIndex of indices) {
      jobs.push(
        await JobHandle.create({
          jobId,
          arrayIndex,
          client: this.client,
          logger: this.logger,
          sleep: this.sleep,
        }),
      );
    }

    this.jobs = jobs;
    return jobs;
  }

  private fileStem(): string {
    return sanitizeFileStem(this.config.get("job_name"));
  }
}
