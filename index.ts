export { DirectiveStore, DEFAULT_SHELL, toDirectiveKey } from "./src/directives.js";
export {
  ArrayRange,
  durationToSeconds,
  isDuration,
  normalizeArray,
  normalizeDirective,
  normalizeDuration,
} from "./src/normalize.js";
export {
  JobManager,
  DEFAULT_SCRIPT_SUFFIX,
  DEFAULT_SNAPSHOT_SUFFIX,
  type JobManagerParams,
  type SubmitOptions,
} from "./src/manager.js";
export { JobHandle, DEFAULT_POLL_INTERVAL_SECONDS, type HoldOptions } from "./src/job.js";
export {
  COMPLETED_OR_NOT_FOUND,
  DEFAULT_SLURM_COMMANDS,
  SlurmClient,
  isQueuedState,
  parseJobAttributes,
  parseQueueState,
  parseSubmittedJobId,
  type SlurmClientParams,
} from "./src/slurm.js";
export { TIMEOUT_EXIT_CODE, defaultCommandRunner } from "./src/exec.js";
export { loadDefaultDirectives, parseDefaultDirectives } from "./src/config.js";
export {
  ConfigurationSnapshotSchema,
  readConfigSnapshot,
  restoreConfiguration,
  writeConfigSnapshot,
  type ConfigurationSnapshotFile,
} from "./src/snapshot.js";
export { createConsoleLogger, silentLogger } from "./src/logger.js";
export {
  ConfigurationError,
  QueryError,
  SlurmBatchError,
  SubmissionError,
} from "./src/errors.js";
export type * from "./src/types.js";
