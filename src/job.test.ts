import { describe, expect, it, vi } from "vitest";
import { ConfigurationError, QueryError } from "./errors.js";
import { JobHandle } from "./job.js";
import { COMPLETED_OR_NOT_FOUND, SlurmClient } from "./slurm.js";
import type { CommandResult, CommandRunner, Logger, Sleep } from "./types.js";

const SCONTROL_OUTPUT = "JobId=4821 JobName=test\n   JobState=PENDING Partition=gpu\n";

function ok(stdout = ""): CommandResult {
  return { code: 0, stdout, stderr: "" };
}

function createRunner(options: {
  squeue?: Array<CommandResult | Error>;
  scontrol?: CommandResult | Error;
  scancel?: CommandResult | Error;
}) {
  const statuses = [...(options.squeue ?? [])];
  const calls: Array<{ command: string; args: string[] }> = [];

  const runner: CommandRunner = vi.fn(async (command, args) => {
    calls.push({ command, args });
    const pick = (entry: CommandResult | Error | undefined): CommandResult => {
      if (entry instanceof Error) {
        throw entry;
      }
      return entry ?? ok();
    };
    if (command === "scontrol") {
      return pick(options.scontrol ?? ok(SCONTROL_OUTPUT));
    }
    if (command === "squeue") {
      return pick(statuses.length > 1 ? statuses.shift() : statuses[0]);
    }
    if (command === "scancel") {
      return pick(options.scancel);
    }
    return { code: 1, stdout: "", stderr: `unexpected command: ${command}` };
  });

  return { runner, calls };
}

function createLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: () => {},
    info: () => {},
    warn: (message) => {
      warnings.push(message);
    },
    error: () => {},
  };
}

const noSleep: Sleep = async () => {};

describe("job handle", () => {
  it("captures scontrol attributes at construction", async () => {
    const { runner, calls } = createRunner({});
    const job = await JobHandle.create({ jobId: "4821", client: new SlurmClient({ runner }) });

    expect(job.submissionDetails).toEqual({
      JobId: "4821",
      JobName: "test",
      JobState: "PENDING",
      Partition: "gpu",
    });
    expect(Object.isFrozen(job.submissionDetails)).toBe(true);
    expect(calls).toEqual([{ command: "scontrol", args: ["show", "job", "4821"] }]);
  });

  it("addresses array tasks by their task id", async () => {
    const { runner, calls } = createRunner({ squeue: [ok("RUNNING\n")] });
    const job = await JobHandle.create({
      jobId: "4821",
      arrayIndex: 2,
      client: new SlurmClient({ runner }),
    });

    expect(job.taskId).toBe("4821_2");
    expect(job.isArrayTask).toBe(true);
    expect(String(job)).toBe("4821_2");
    expect(await job.getStatus()).toBe("RUNNING");
    expect(calls.map((call) => call.args)).toEqual([
      ["show", "job", "4821_2"],
      ["-j", "4821_2", "-h", "-o", "%T"],
    ]);
  });

  it("fails with QueryError when scontrol exits non-zero", async () => {
    const { runner } = createRunner({
      scontrol: { code: 1, stdout: "", stderr: "slurm_load_jobs error: Invalid job id specified" },
    });
    const pending = JobHandle.create({ jobId: "999", client: new SlurmClient({ runner }) });

    await expect(pending).rejects.toBeInstanceOf(QueryError);
    await expect(pending).rejects.toMatchObject({
      jobId: "999",
      exitCode: 1,
      message: "scontrol show job 999 failed: slurm_load_jobs error: Invalid job id specified",
    });
  });

  it("wraps a runner that cannot start scontrol", async () => {
    const { runner } = createRunner({ scontrol: new Error("spawn scontrol ENOENT") });
    await expect(
      JobHandle.create({ jobId: "5", client: new SlurmClient({ runner }) }),
    ).rejects.toThrow("scontrol show job 5 failed: spawn scontrol ENOENT");
  });

  it("reports the sentinel when squeue lists nothing", async () => {
    const { runner } = createRunner({ squeue: [ok("")] });
    const job = await JobHandle.create({ jobId: "4821", client: new SlurmClient({ runner }) });

    expect(await job.getStatus()).toBe(COMPLETED_OR_NOT_FOUND);
    expect(await job.isQueued()).toBe(false);
  });

  it("treats squeue failures as not found", async () => {
    const failing = createRunner({
      squeue: [{ code: 1, stdout: "", stderr: "slurm_load_jobs error: Invalid job id specified" }],
    });
    const job = await JobHandle.create({ jobId: "1", client: new SlurmClient({ runner: failing.runner }) });
    expect(await job.getStatus()).toBe(COMPLETED_OR_NOT_FOUND);

    const throwing = createRunner({ squeue: [new Error("spawn squeue ENOENT")] });
    const other = await JobHandle.create({ jobId: "2", client: new SlurmClient({ runner: throwing.runner }) });
    expect(await other.getStatus()).toBe(COMPLETED_OR_NOT_FOUND);
  });

  it("is queued only while pending or running", async () => {
    const { runner } = createRunner({
      squeue: [ok("PENDING\n"), ok("RUNNING\n"), ok("COMPLETING\n")],
    });
    const job = await JobHandle.create({ jobId: "3", client: new SlurmClient({ runner }) });

    expect(await job.isQueued()).toBe(true);
    expect(await job.isQueued()).toBe(true);
    expect(await job.isQueued()).toBe(false);
  });

  it("polls until the job leaves the queue", async () => {
    const { runner, calls } = createRunner({
      squeue: [ok("PENDING\n"), ok("RUNNING\n"), ok("")],
    });
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const job = await JobHandle.create({ jobId: "7", client: new SlurmClient({ runner }), sleep });

    await expect(job.holdForCompletion({ intervalSeconds: 2 })).resolves.toBe("completed");
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000]);
    expect(calls.filter((call) => call.command === "squeue")).toHaveLength(3);
  });

  it("times out when the deadline passes", async () => {
    const { runner } = createRunner({ squeue: [ok("RUNNING\n")] });
    let clock = 0;
    const sleep: Sleep = async (ms) => {
      clock += ms;
    };
    const job = await JobHandle.create({
      jobId: "8",
      client: new SlurmClient({ runner }),
      sleep,
      now: () => clock,
    });

    await expect(job.holdForCompletion({ intervalSeconds: 3, timeoutMs: 7000 })).resolves.toBe(
      "timed_out",
    );
    expect(clock).toBe(7000);
  });

  it("stops waiting when the signal aborts", async () => {
    const { runner } = createRunner({ squeue: [ok("RUNNING\n")] });
    const controller = new AbortController();
    let polls = 0;
    const sleep: Sleep = async () => {
      polls += 1;
      if (polls === 2) {
        controller.abort();
      }
    };
    const job = await JobHandle.create({ jobId: "9", client: new SlurmClient({ runner }), sleep });

    await expect(job.holdForCompletion({ signal: controller.signal })).resolves.toBe("cancelled");
    expect(polls).toBe(2);
  });

  it("returns cancelled for an already aborted signal without polling", async () => {
    const { runner, calls } = createRunner({ squeue: [ok("RUNNING\n")] });
    const job = await JobHandle.create({ jobId: "10", client: new SlurmClient({ runner }), sleep: noSleep });

    await expect(job.holdForCompletion({ signal: AbortSignal.abort() })).resolves.toBe("cancelled");
    expect(calls.filter((call) => call.command === "squeue")).toHaveLength(0);
  });

  it("aborts the default sleep", async () => {
    const { runner } = createRunner({ squeue: [ok("RUNNING\n")] });
    const controller = new AbortController();
    const job = await JobHandle.create({ jobId: "11", client: new SlurmClient({ runner }) });

    const waiting = job.holdForCompletion({ intervalSeconds: 60, signal: controller.signal });
    setTimeout(() => controller.abort(), 10);
    await expect(waiting).resolves.toBe("cancelled");
  });

  it.each([[0], [-1], [Number.NaN], [Number.POSITIVE_INFINITY]])(
    "rejects a poll interval of %s seconds before polling",
    async (intervalSeconds) => {
      const { runner, calls } = createRunner({ squeue: [ok("RUNNING\n")] });
      const job = await JobHandle.create({ jobId: "15", client: new SlurmClient({ runner }), sleep: noSleep });

      await expect(job.holdForCompletion({ intervalSeconds })).rejects.toBeInstanceOf(
        ConfigurationError,
      );
      expect(calls.filter((call) => call.command === "squeue")).toHaveLength(0);
    },
  );

  it("rejects a negative timeout", async () => {
    const { runner } = createRunner({ squeue: [ok("RUNNING\n")] });
    const job = await JobHandle.create({ jobId: "16", client: new SlurmClient({ runner }), sleep: noSleep });

    await expect(job.holdForCompletion({ timeoutMs: -5 })).rejects.toThrow(
      "timeoutMs must be a non-negative number (got -5)",
    );
  });

  it("reports cancellation success and failure as booleans", async () => {
    const accepted = createRunner({});
    const job = await JobHandle.create({
      jobId: "12",
      arrayIndex: 0,
      client: new SlurmClient({ runner: accepted.runner }),
    });
    expect(await job.cancel()).toBe(true);
    expect(accepted.calls.at(-1)).toEqual({ command: "scancel", args: ["12_0"] });

    const logger = createLogger();
    const rejected = createRunner({
      scancel: { code: 1, stdout: "", stderr: "scancel: error: Job has already finished" },
    });
    const finished = await JobHandle.create({
      jobId: "13",
      client: new SlurmClient({ runner: rejected.runner }),
      logger,
    });
    expect(await finished.cancel()).toBe(false);
    expect(logger.warnings).toEqual(["scancel 13 exited with code 1"]);

    const missing = createRunner({ scancel: new Error("spawn scancel ENOENT") });
    const orphan = await JobHandle.create({
      jobId: "14",
      client: new SlurmClient({ runner: missing.runner }),
    });
    expect(await orphan.cancel()).toBe(false);
  });
});
