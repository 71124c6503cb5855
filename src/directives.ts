import { ConfigurationError } from "./errors.js";
import type { ConfigurationSnapshot } from "./types.js";

export const DEFAULT_SHELL = "/bin/bash";

const DIRECTIVE_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;

function toFlag(name: string): string {
  return name.replace(/_/g, "-");
}

/** Accessor form of a directive name; `job-name` and `job_name` are the same key. */
export function toDirectiveKey(name: string): string {
  if (!DIRECTIVE_NAME.test(name)) {
    throw new ConfigurationError(`Invalid directive name: "${name}"`);
  }
  return name.replace(/-/g, "_");
}

/**
 * Ordered SBATCH directives plus the job's command lines.
 *
 * Names are kept in their accessor form (`job_name`) and only hyphenated when
 * rendered (`--job-name`). Overwriting a directive keeps its original position.
 */
export class DirectiveStore {
  shell: string;
  private readonly directives = new Map<string, string>();
  private readonly commandList: string[] = [];

  constructor(params: { shell?: string; directives?: Record<string, string>; commands?: string[] } = {}) {
    this.shell = params.shell?.trim() || DEFAULT_SHELL;
    for (const [name, value] of Object.entries(params.directives ?? {})) {
      this.set(name, value);
    }
    for (const command of params.commands ?? []) {
      this.addCommand(command);
    }
  }

  get isEmpty(): boolean {
    return this.directives.size === 0 && this.commandList.length === 0;
  }

  set(name: string, value: string): void {
    this.directives.set(toDirectiveKey(name), value);
  }

  get(name: string): string | undefined {
    return DIRECTIVE_NAME.test(name) ? this.directives.get(toDirectiveKey(name)) : undefined;
  }

  has(name: string): boolean {
    return DIRECTIVE_NAME.test(name) && this.directives.has(toDirectiveKey(name));
  }

  delete(name: string): boolean {
    return DIRECTIVE_NAME.test(name) && this.directives.delete(toDirectiveKey(name));
  }

  entries(): Array<[string, string]> {
    return Array.from(this.directives.entries());
  }

  addCommand(command: string): void {
    this.commandList.push(command);
  }

  commands(): string[] {
    return [...this.commandList];
  }

  isArrayJob(): boolean {
    return this.directives.has("array");
  }

  render(shell?: string): string {
    const lines: string[] = [`#!${shell?.trim() || this.shell}`];
    for (const [name, value] of this.directives) {
      lines.push(`#SBATCH --${toFlag(name)}=${value}`);
    }
    lines.push(...this.commandList);
    return lines.join("\n");
  }

  toSnapshot(): ConfigurationSnapshot {
    return {
      shell: this.shell,
      directives: Object.fromEntries(this.directives),
      commands: this.commands(),
    };
  }

  static fromSnapshot(snapshot: ConfigurationSnapshot): DirectiveStore {
    return new DirectiveStore(snapshot);
  }
}
