import type { Logger } from "./types.js";

const PREFIX = "[slurm-batch]";

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  return {
    debug: options.debug ? (message) => console.debug(`${PREFIX} ${message}`) : undefined,
    info: (message) => console.info(`${PREFIX} ${message}`),
    warn: (message) => console.warn(`${PREFIX} ${message}`),
    error: (message) => console.error(`${PREFIX} ${message}`),
  };
}
