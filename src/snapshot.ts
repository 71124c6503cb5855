import fs from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DirectiveStore } from "./directives.js";
import { ConfigurationError, describeError } from "./errors.js";
import type { ConfigurationSnapshot } from "./types.js";

export const ConfigurationSnapshotSchema = Type.Object(
  {
    shell: Type.String({ minLength: 1 }),
    directives: Type.Record(Type.String(), Type.String()),
    commands: Type.Array(Type.String()),
    savedAt: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

export type ConfigurationSnapshotFile = Static<typeof ConfigurationSnapshotSchema>;

export async function writeConfigSnapshot(
  filePath: string,
  snapshot: ConfigurationSnapshot,
  savedAt?: Date,
): Promise<void> {
  const payload: ConfigurationSnapshotFile = {
    ...snapshot,
    ...(savedAt ? { savedAt: savedAt.toISOString() } : {}),
  };
  await fs.writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

/** Reads a snapshot written by `writeConfigSnapshot`, for offline inspection. */
export async function readConfigSnapshot(filePath: string): Promise<ConfigurationSnapshotFile> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Unable to read snapshot ${filePath}: ${describeError(err)}`, {
      cause: err,
    });
  }
  if (!Value.Check(ConfigurationSnapshotSchema, parsed)) {
    const first = Value.Errors(ConfigurationSnapshotSchema, parsed).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "unknown shape";
    throw new ConfigurationError(`Invalid snapshot ${filePath} (${where})`);
  }
  return parsed;
}

/** Rebuilds a configuration from a saved snapshot so it can be edited or resubmitted. */
export async function restoreConfiguration(filePath: string): Promise<DirectiveStore> {
  return DirectiveStore.fromSnapshot(await readConfigSnapshot(filePath));
}
