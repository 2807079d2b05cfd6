/**
 * @file Compressed backend: gzip streams over pako's incremental Deflate/Inflate
 *
 * Reading decodes descriptor chunks into an output queue; concatenated gzip
 * members are read as one stream and a file without the gzip magic is passed
 * through unchanged. Writing feeds a single Deflate per member and writes its
 * output as it is produced.
 */
import { closeSync, fstatSync, openSync, readSync, writeSync } from "node:fs";
import { Deflate, Inflate } from "pako";
import type { IoBuffer } from "./buffer";
import { parseGzipMode, type GzipMode } from "./mode";
import { IO_ERROR, type CloseResult, type OpenOutcome, type SeekResult, type StreamBackend, type Whence } from "./types";
import { toBytes } from "../util/bin";
import { toError } from "../util/is-error";
import { hasOwn } from "../util/is-object";

const GZIP_MAGIC_0 = 0x1f;
const GZIP_MAGIC_1 = 0x8b;
const DEFLATE_CHUNK = 16384;

type Pull = "data" | "end" | "error";

type GzipReader = {
  /** Next compressed offset to read from the descriptor. */
  inPos: number;
  inflate: Inflate | undefined;
  ended: boolean;
  /** undefined until the first chunk shows whether the file is gzip at all. */
  transparent: boolean | undefined;
  out: Uint8Array[];
  outOffset: number;
  drained: boolean;
  failed: boolean;
};

type GzipWriter = {
  deflate: Deflate | undefined;
  failed: boolean;
};

export type GzipResource = {
  fd: number;
  mode: GzipMode;
  /** Compressed bytes requested per descriptor read. */
  chunkSize: number;
  /** Uncompressed logical position. */
  pos: number;
  eof: boolean;
  pipe: boolean;
  reader: GzipReader;
  writer: GzipWriter;
};

function createReader(): GzipReader {
  return {
    inPos: 0,
    inflate: undefined,
    ended: false,
    transparent: undefined,
    out: [],
    outOffset: 0,
    drained: false,
    failed: false,
  };
}

function writeAll(fd: number, bytes: Uint8Array): boolean {
  // eslint-disable-next-line no-restricted-syntax -- write loop cursor
  let done = 0;
  while (done < bytes.length) {
    const n = writeSync(fd, bytes, done, bytes.length - done, null);
    if (n <= 0) {
      return false;
    }
    done += n;
  }
  return true;
}

function createDeflater(r: GzipResource): Deflate {
  const deflate = new Deflate({ level: r.mode.level, gzip: true, chunkSize: DEFLATE_CHUNK });
  deflate.onData = (chunk) => {
    if (r.writer.failed) {
      return;
    }
    try {
      if (!writeAll(r.fd, toBytes(chunk))) {
        r.writer.failed = true;
      }
    } catch {
      r.writer.failed = true;
    }
  };
  deflate.onEnd = (status) => {
    if (status !== 0) {
      r.writer.failed = true;
    }
  };
  return deflate;
}

/**
 * Output Inflate has decoded but not yet handed to onData. It only emits full
 * chunks or a finished member, so a stream that stops early leaves the tail
 * in `strm.output[0, next_out)`.
 */
function heldOutput(inflate: Inflate): Uint8Array {
  if (!hasOwn(inflate, "strm")) {
    return new Uint8Array(0);
  }
  const strm = inflate.strm;
  if (!hasOwn(strm, "output") || !hasOwn(strm, "next_out")) {
    return new Uint8Array(0);
  }
  const { output, next_out: nextOut } = strm;
  if (!(output instanceof Uint8Array) || typeof nextOut !== "number") {
    return new Uint8Array(0);
  }
  return output.slice(0, nextOut);
}

/** Queue what the decoder still holds, then mark the reader failed. */
function failWithHeld(reader: GzipReader): void {
  if (reader.inflate && !reader.ended) {
    const held = heldOutput(reader.inflate);
    if (held.length > 0) {
      reader.out.push(held);
    }
  }
  reader.failed = true;
}

function createInflater(r: GzipResource): Inflate {
  const inflate = new Inflate({ chunkSize: r.chunkSize });
  inflate.onData = (chunk) => {
    r.reader.out.push(toBytes(chunk));
  };
  inflate.onEnd = (status) => {
    if (status !== 0) {
      failWithHeld(r.reader);
    }
    r.reader.ended = true;
  };
  return inflate;
}

function queued(reader: GzipReader): number {
  // eslint-disable-next-line no-restricted-syntax -- running total
  let n = -reader.outOffset;
  for (const chunk of reader.out) {
    n += chunk.length;
  }
  return n;
}

function readInput(r: GzipResource): Uint8Array | undefined {
  const chunk = new Uint8Array(r.chunkSize);
  try {
    const got = readSync(r.fd, chunk, 0, chunk.length, r.pipe ? null : r.reader.inPos);
    r.reader.inPos += got;
    return chunk.subarray(0, got);
  } catch {
    return undefined;
  }
}

function startsMember(chunk: Uint8Array): boolean {
  return chunk[0] === GZIP_MAGIC_0 && (chunk.length < 2 || chunk[1] === GZIP_MAGIC_1);
}

/** Decode until output is queued, the stream ends, or decoding fails. */
function pull(r: GzipResource): Pull {
  const reader = r.reader;
  while (queued(reader) === 0) {
    if (reader.failed) {
      return "error";
    }
    if (reader.drained) {
      return "end";
    }
    const chunk = readInput(r);
    if (!chunk) {
      failWithHeld(reader);
      continue;
    }
    if (chunk.length === 0) {
      const midMember = reader.transparent === false && !reader.ended;
      if (midMember) {
        // truncated member
        failWithHeld(reader);
      }
      reader.drained = true;
      continue;
    }
    if (reader.transparent === undefined) {
      reader.transparent = !startsMember(chunk);
    }
    if (reader.transparent) {
      reader.out.push(chunk);
      continue;
    }
    if (!reader.inflate || reader.ended) {
      if (reader.inflate && !startsMember(chunk)) {
        // trailing bytes after the last member are ignored
        reader.drained = true;
        continue;
      }
      reader.ended = false;
      reader.inflate = createInflater(r);
    }
    reader.inflate.push(chunk, false);
  }
  return "data";
}

function take(reader: GzipReader, dst: Uint8Array, at: number, max: number): number {
  // eslint-disable-next-line no-restricted-syntax -- bytes copied so far
  let copied = 0;
  while (copied < max && reader.out.length > 0) {
    const head = reader.out[0];
    const c = Math.min(head.length - reader.outOffset, max - copied);
    dst.set(head.subarray(reader.outOffset, reader.outOffset + c), at + copied);
    copied += c;
    reader.outOffset += c;
    if (reader.outOffset === head.length) {
      reader.out.shift();
      reader.outOffset = 0;
    }
  }
  return copied;
}

function clampCount(n: number, length: number): number {
  if (!Number.isFinite(n) || n <= 0) {
    return 0;
  }
  return Math.min(Math.floor(n), length);
}

function open(path: string, mode: string, buffer: IoBuffer): OpenOutcome<GzipResource> {
  // eslint-disable-next-line no-restricted-syntax -- released on failure below
  let fd: number | undefined;
  try {
    const parsed = parseGzipMode(mode);
    fd = openSync(path, parsed.flags);
    const resource: GzipResource = {
      fd,
      mode: parsed,
      chunkSize: buffer.size,
      pos: 0,
      eof: false,
      pipe: fstatSync(fd).isFIFO(),
      reader: createReader(),
      writer: { deflate: undefined, failed: false },
    };
    if (parsed.direction === "write" && !parsed.transparent) {
      resource.writer.deflate = createDeflater(resource);
    }
    return { ok: true, resource };
  } catch (e) {
    if (fd !== undefined) {
      closeSync(fd);
    }
    return { ok: false, cause: toError(e) };
  }
}

function close(r: GzipResource): CloseResult {
  const deflate = r.writer.deflate;
  if (deflate) {
    deflate.push(new Uint8Array(0), true);
    r.writer.deflate = undefined;
  }
  r.reader = createReader();
  try {
    closeSync(r.fd);
  } catch (e) {
    return { ok: false, cause: toError(e) };
  }
  if (r.writer.failed) {
    return { ok: false, cause: new Error("compressed output could not be written") };
  }
  return { ok: true };
}

function read(r: GzipResource, dst: Uint8Array, n: number): number {
  if (r.mode.direction !== "read") {
    return IO_ERROR;
  }
  const want = clampCount(n, dst.length);
  // eslint-disable-next-line no-restricted-syntax -- bytes delivered so far
  let total = 0;
  while (total < want) {
    const state = pull(r);
    if (state === "end") {
      r.eof = true;
      break;
    }
    if (state === "error") {
      return total > 0 ? total : IO_ERROR;
    }
    const c = take(r.reader, dst, total, want - total);
    total += c;
    r.pos += c;
  }
  return total;
}

function write(r: GzipResource, src: Uint8Array, n: number): number {
  if (r.mode.direction !== "write" || r.writer.failed) {
    return IO_ERROR;
  }
  const count = clampCount(n, src.length);
  if (count === 0) {
    return 0;
  }
  const bytes = src.slice(0, count);
  const deflate = r.writer.deflate;
  if (deflate) {
    deflate.push(bytes, false);
  } else {
    try {
      r.writer.failed = !writeAll(r.fd, bytes);
    } catch {
      r.writer.failed = true;
    }
  }
  if (r.writer.failed) {
    return IO_ERROR;
  }
  r.pos += count;
  return count;
}

const scratch = new Uint8Array(1);

function getc(r: GzipResource): number {
  return read(r, scratch, 1) === 1 ? scratch[0] : IO_ERROR;
}

function skip(r: GzipResource, n: number): boolean {
  const sink = new Uint8Array(Math.min(n, 1 << 15));
  // eslint-disable-next-line no-restricted-syntax -- bytes still to discard
  let left = n;
  while (left > 0) {
    const got = read(r, sink, Math.min(left, sink.length));
    if (got <= 0) {
      return got === 0;
    }
    left -= got;
  }
  return true;
}

function seek(r: GzipResource, offset: number, whence: Whence): SeekResult {
  if (whence === "end") {
    return { ok: false, reason: "seeking from the end is not supported on gzip streams" };
  }
  const target = whence === "set" ? offset : r.pos + offset;
  if (!Number.isSafeInteger(target) || target < 0) {
    return { ok: false, reason: `invalid offset ${offset} from ${whence}` };
  }
  if (r.mode.direction === "write") {
    if (target < r.pos) {
      return { ok: false, reason: "cannot seek backwards while writing a gzip stream" };
    }
    const gap = target - r.pos;
    if (gap > 0 && write(r, new Uint8Array(gap), gap) !== gap) {
      return { ok: false, reason: "could not pad the gzip stream" };
    }
    return { ok: true, position: r.pos };
  }
  if (target < r.pos) {
    if (r.pipe) {
      return { ok: false, reason: "cannot rewind a gzip stream read from a pipe" };
    }
    r.reader = createReader();
    r.pos = 0;
  }
  r.eof = false;
  if (!skip(r, target - r.pos)) {
    return { ok: false, reason: "gzip stream could not be decoded up to the target" };
  }
  return { ok: true, position: r.pos };
}

function rebuffer(r: GzipResource, next: IoBuffer): boolean {
  r.chunkSize = next.size;
  return true;
}

export const compressedBackend: StreamBackend<"compressed", GzipResource> = {
  kind: "compressed",
  open,
  close,
  read,
  bulkRead: read,
  write,
  getc,
  seek,
  tell: (r) => r.pos,
  eof: (r) => r.eof,
  seekable: () => false,
  rebuffer,
};
