import { ConfigurationError } from "./errors.js";
import type { ArraySpec, DirectiveInput, Duration } from "./types.js";

const SECONDS_PER_DAY = 86400;
const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_MINUTE = 60;

const DURATION_FIELDS = new Set(["days", "hours", "minutes", "seconds", "milliseconds"]);

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function isDuration(value: unknown): value is Duration {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  if (Symbol.iterator in value) {
    return false;
  }
  const entries = Object.entries(value);
  if (entries.length === 0) {
    return false;
  }
  return entries.every(
    ([key, field]) =>
      DURATION_FIELDS.has(key) && typeof field === "number" && Number.isFinite(field),
  );
}

export function durationToSeconds(duration: Duration): number {
  const total =
    (duration.days ?? 0) * SECONDS_PER_DAY +
    (duration.hours ?? 0) * SECONDS_PER_HOUR +
    (duration.minutes ?? 0) * SECONDS_PER_MINUTE +
    (duration.seconds ?? 0) +
    (duration.milliseconds ?? 0) / 1000;
  return Math.trunc(total);
}

/** Formats a duration as Slurm's `D-HH:MM:SS` time limit. */
export function normalizeDuration(duration: Duration): string {
  const total = durationToSeconds(duration);
  if (!Number.isFinite(total) || total < 0) {
    throw new ConfigurationError(`time must be a non-negative duration (got ${total}s)`);
  }

  const days = Math.floor(total / SECONDS_PER_DAY);
  let rem = total % SECONDS_PER_DAY;
  const hours = Math.floor(rem / SECONDS_PER_HOUR);
  rem %= SECONDS_PER_HOUR;
  const minutes = Math.floor(rem / SECONDS_PER_MINUTE);
  const seconds = rem % SECONDS_PER_MINUTE;

  return `${days}-${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

/** Inclusive range of array task indices. */
export class ArrayRange implements Iterable<number> {
  readonly low: number;
  readonly high: number;

  constructor(low: number, high: number) {
    if (!Number.isSafeInteger(low) || !Number.isSafeInteger(high) || low < 0 || high < 0) {
      throw new ConfigurationError(
        `array bounds must be non-negative integers (got ${low}-${high})`,
      );
    }
    if (high < low) {
      throw new ConfigurationError(`array bounds are reversed (${low}-${high})`);
    }
    this.low = low;
    this.high = high;
  }

  get size(): number {
    return this.high - this.low + 1;
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let index = this.low; index <= this.high; index += 1) {
      yield index;
    }
  }

  toArray(): number[] {
    return Array.from(this);
  }

  toString(): string {
    return `${this.low}-${this.high}`;
  }
}

function parseRangeString(spec: string): ArrayRange {
  const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(spec);
  if (!match?.[1] || !match[2]) {
    throw new ConfigurationError(
      `array must be a "low-high" range (got "${spec}"); step, throttle and list syntax are not supported`,
    );
  }
  return new ArrayRange(Number(match[1]), Number(match[2]));
}

function rangeFromIterable(spec: Iterable<unknown>): ArrayRange {
  let first: unknown;
  let last: unknown;
  let seen = false;
  for (const item of spec) {
    if (!seen) {
      first = item;
      seen = true;
    }
    last = item;
  }
  if (!seen) {
    throw new ConfigurationError("array must not be empty");
  }
  if (typeof first !== "number" || typeof last !== "number") {
    throw new ConfigurationError("array elements must be integers");
  }
  return new ArrayRange(first, last);
}

/**
 * A bare integer `n` spans `[0, n]` inclusive, so `3` yields four tasks.
 */
export function normalizeArray(spec: ArraySpec): ArrayRange {
  if (spec instanceof ArrayRange) {
    return spec;
  }
  if (typeof spec === "string") {
    return parseRangeString(spec);
  }
  if (typeof spec === "number") {
    if (!Number.isSafeInteger(spec) || spec < 0) {
      throw new ConfigurationError(`array count must be a non-negative integer (got ${spec})`);
    }
    return new ArrayRange(0, spec);
  }
  return rangeFromIterable(spec);
}

export type NormalizedDirective = {
  value: string;
  range?: ArrayRange;
};

export function normalizeDirective(name: string, input: DirectiveInput): NormalizedDirective {
  if (name === "array") {
    if (isDuration(input)) {
      throw new ConfigurationError("array must be a range string, an integer or an iterable");
    }
    const range = normalizeArray(input);
    return { value: range.toString(), range };
  }

  if (isDuration(input)) {
    if (name !== "time") {
      throw new ConfigurationError(`${name} does not accept a duration value`);
    }
    return { value: normalizeDuration(input) };
  }

  if (typeof input === "string" || typeof input === "number") {
    return { value: String(input) };
  }

  throw new ConfigurationError(`${name} must be a string or a number`);
}
