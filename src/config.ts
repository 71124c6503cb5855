import fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { ConfigurationError, describeError } from "./errors.js";
import { isDuration } from "./normalize.js";
import type { DefaultDirectivesProvider, DirectiveInput, DirectiveRecord } from "./types.js";

function asObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigurationError(`${label} must be a mapping`);
  }
  return Object.fromEntries(Object.entries(value));
}

function readDirective(name: string, value: unknown, label: string): DirectiveInput {
  const field = `${label}.${name}`;
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${field} must be a finite number`);
    }
    return value;
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  if (name === "time" && isDuration(value)) {
    return value;
  }
  if (name === "array" && Array.isArray(value)) {
    return value.map((entry, idx) => {
      if (typeof entry !== "number") {
        throw new ConfigurationError(`${field}[${idx}] must be a number`);
      }
      return entry;
    });
  }
  throw new ConfigurationError(`${field} must be a string or a number`);
}

/**
 * Validates a default-directives document. Keys keep their accessor form
 * (`job_name`, `cpus_per_task`); null values are dropped.
 */
export function parseDefaultDirectives(value: unknown, label = "defaults"): DirectiveRecord {
  if (value == null) {
    return {};
  }
  const obj = asObject(value, label);
  const directives: DirectiveRecord = {};
  for (const [rawName, entry] of Object.entries(obj)) {
    const name = rawName.trim();
    if (!name || entry == null) {
      continue;
    }
    directives[name] = readDirective(name, entry, label);
  }
  return directives;
}

export async function loadDefaultDirectives(filePath: string): Promise<DirectiveRecord> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Unable to read defaults from ${filePath}: ${describeError(err)}`, {
      cause: err,
    });
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${describeError(err)}`, {
      cause: err,
    });
  }
  return parseDefaultDirectives(doc, filePath);
}

export async function resolveDefaultDirectives(
  provider: DefaultDirectivesProvider,
): Promise<DirectiveRecord> {
  const loaded = typeof provider === "function" ? await provider() : provider;
  return { ...loaded };
}
