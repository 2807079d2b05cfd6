/**
 * @file Config normalization + validation (environment/options -> StreamDefaults)
 */
import { DEFAULT_BUFFER_SIZE } from "../stream/buffer";
import { ENV_BUFSIZE, ENV_VERBOSE, type StreamDefaults, type StreamOptions } from "./types";

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["", "0", "false", "no", "off"]);

/** Parse a boolean flag value. Throws with a descriptive message on invalid. */
export function parseFlag(name: string, raw: string): boolean {
  const v = raw.trim().toLowerCase();
  if (TRUTHY.has(v)) {
    return true;
  }
  if (FALSY.has(v)) {
    return false;
  }
  throw new Error(`${name} must be one of 1/true/yes/on or 0/false/no/off, got '${raw}'`);
}

/** Parse a buffer size. Throws with a descriptive message on invalid. */
export function parseBufferSize(name: string, raw: string | number): number {
  const v = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isSafeInteger(v) || v <= 0) {
    throw new Error(`${name} must be a positive integer, got '${raw}'`);
  }
  return v;
}

/** Read stream defaults from the environment. */
export function resolveStreamDefaults(env: NodeJS.ProcessEnv = process.env): StreamDefaults {
  const verboseRaw = env[ENV_VERBOSE];
  const sizeRaw = env[ENV_BUFSIZE];
  return {
    verbose: verboseRaw === undefined ? false : parseFlag(ENV_VERBOSE, verboseRaw),
    bufferSize: sizeRaw === undefined ? DEFAULT_BUFFER_SIZE : parseBufferSize(ENV_BUFSIZE, sizeRaw),
  };
}

/** Merge explicit handle options over environment defaults. */
export function normalizeStreamOptions(options: StreamOptions = {}, env?: NodeJS.ProcessEnv): StreamDefaults {
  const base = resolveStreamDefaults(env);
  return {
    verbose: options.verbose ?? base.verbose,
    bufferSize: options.bufferSize === undefined ? base.bufferSize : parseBufferSize("bufferSize", options.bufferSize),
  } satisfies StreamDefaults;
}
