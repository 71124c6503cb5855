import { spawn } from "node:child_process";
import type { CommandResult, CommandRunner } from "./types.js";

/** Exit code reported when a scheduler call is killed for exceeding `timeoutMs`. */
export const TIMEOUT_EXIT_CODE = 124;

/**
 * Runs a scheduler binary and collects its output. A non-zero exit resolves
 * normally; only a process that cannot be started rejects.
 */
export const defaultCommandRunner: CommandRunner = async (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? 0;
  return await new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
          }, timeoutMs)
        : undefined;

    child.once("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.once("close", (code) => {
      clearTimeout(timer);
      const errText = Buffer.concat(stderr).toString("utf8");
      resolve({
        code: timedOut ? TIMEOUT_EXIT_CODE : (code ?? 1),
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: timedOut ? `${errText}${command} timed out after ${timeoutMs}ms\n` : errText,
      });
    });
  });
};

export function failureDetail(result: CommandResult): string {
  return result.stderr.trim() || result.stdout.trim() || `exit code ${result.code}`;
}
