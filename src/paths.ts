import fs from "node:fs/promises";
import path from "node:path";

export const DEFAULT_OUTPUT_DIR = ".slurm-jobs";
export const DEFAULT_SCRIPT_NAME = "job";

/** File stem for a job's script and snapshot, derived from its job name. */
export function sanitizeFileStem(input: string | undefined): string {
  const safe = (input ?? "")
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^[-.]+|-+$/g, "")
    .slice(0, 80);
  return safe || DEFAULT_SCRIPT_NAME;
}

export function resolveOutputDir(baseDir: string, outputDir?: string): string {
  return path.resolve(baseDir, outputDir?.trim() || DEFAULT_OUTPUT_DIR);
}

export function withSuffix(dir: string, stem: string, suffix: string): string {
  const normalized = suffix.startsWith(".") || suffix === "" ? suffix : `.${suffix}`;
  return path.join(dir, `${stem}${normalized}`);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}
