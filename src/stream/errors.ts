/**
 * @file Stream specific error types
 * Rationale: Error classes give instanceof checks and readable stack traces.
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */
import type { BackendKind } from "./types";

/** Thrown when a backend cannot open `path` with `mode`. The handle stays closed. */
export class StreamOpenError extends Error {
  readonly path: string;
  readonly mode: string;
  readonly kind: BackendKind;

  constructor(path: string, mode: string, kind: BackendKind, cause: Error) {
    super(`Could not open file at ${path} with mode ${mode} (${cause.message})`, { cause });
    this.name = "StreamOpenError";
    this.path = path;
    this.mode = mode;
    this.kind = kind;
  }
}

/** Thrown when an attached buffer would be resized or attached twice. */
export class BufferAttachedError extends Error {
  constructor(action: "resize" | "attach") {
    super(`cannot ${action} an i/o buffer while it is attached to an open stream`);
    this.name = "BufferAttachedError";
  }
}

/** Thrown when a mode string cannot be used with a backend. */
export class InvalidModeError extends Error {
  readonly mode: string;
  readonly code = "EINVAL";

  constructor(mode: string, detail: string) {
    super(`invalid mode '${mode}': ${detail}`);
    this.name = "InvalidModeError";
    this.mode = mode;
  }
}
