/**
 * @file Stream backend contract shared by the plain and gzip implementations
 * Why: one handle type forwards each call to exactly one primitive family.
 */
import type { IoBuffer } from "./buffer";

export type BackendKind = "plain" | "compressed";

/** Origin for `seek`, mirroring SEEK_SET / SEEK_CUR / SEEK_END. */
export type Whence = "set" | "cur" | "end";

export type SeekResult = { ok: true; position: number } | { ok: false; reason: string };

export type OpenOutcome<R> = { ok: true; resource: R } | { ok: false; cause: Error };

export type CloseResult = { ok: true } | { ok: false; cause: Error };

/** Returned by count-style operations on a backend error or a closed handle. */
export const IO_ERROR = -1;

/**
 * Primitive operations of one backend over its resource type `R`.
 * Every method is synchronous and blocks until the descriptor call returns.
 */
export type StreamBackend<K extends BackendKind, R> = {
  readonly kind: K;
  open(path: string, mode: string, buffer: IoBuffer): OpenOutcome<R>;
  close(resource: R): CloseResult;
  read(resource: R, dst: Uint8Array, n: number): number;
  bulkRead(resource: R, dst: Uint8Array, n: number): number;
  write(resource: R, src: Uint8Array, n: number): number;
  getc(resource: R): number;
  seek(resource: R, offset: number, whence: Whence): SeekResult;
  tell(resource: R): number;
  eof(resource: R): boolean;
  seekable(resource: R): boolean;
  /** Rebind the resource to a new buffer; the previous one is released. */
  rebuffer(resource: R, next: IoBuffer): boolean;
};
