/**
 * @file Plain backend: buffered file I/O over Node's synchronous descriptor API
 *
 * The resource keeps a logical position and reads/writes through the attached
 * IoBuffer, in the manner of a C stdio FILE. Regular files use positional
 * reads and writes; pipes use the descriptor's own cursor.
 */
import { closeSync, fstatSync, openSync, readSync, writeSync } from "node:fs";
import type { Stats } from "node:fs";
import type { IoBuffer } from "./buffer";
import { parsePlainMode, type PlainMode } from "./mode";
import { IO_ERROR, type CloseResult, type OpenOutcome, type SeekResult, type StreamBackend, type Whence } from "./types";
import { toError } from "../util/is-error";

export type PlainResource = {
  fd: number;
  mode: PlainMode;
  buffer: IoBuffer;
  /** Logical offset, including buffered but unflushed writes. */
  pos: number;
  /** Unread read-ahead lives at buffer[rstart, rend). */
  rstart: number;
  rend: number;
  /** Pending writes live at buffer[0, wlen). */
  wlen: number;
  eof: boolean;
  error: boolean;
  pipe: boolean;
};

/** FIFOs have no file offset, so they are never seekable. */
export function isPipeStat(stats: Pick<Stats, "isFIFO">): boolean {
  return stats.isFIFO();
}

function positional(r: PlainResource): boolean {
  return !r.pipe && !r.mode.append;
}

function readPosition(r: PlainResource): number | null {
  return r.pipe ? null : r.pos;
}

function clampCount(n: number, length: number): number {
  if (!Number.isFinite(n) || n <= 0) {
    return 0;
  }
  return Math.min(Math.floor(n), length);
}

function syncAppendPosition(r: PlainResource): void {
  if (r.mode.append && !r.pipe) {
    r.pos = fstatSync(r.fd).size;
  }
}

function flushWrites(r: PlainResource): boolean {
  if (r.wlen === 0) {
    return true;
  }
  const bytes = r.buffer.bytes();
  const start = r.pos - r.wlen;
  const total = r.wlen;
  r.wlen = 0;
  // eslint-disable-next-line no-restricted-syntax -- write loop cursor
  let done = 0;
  try {
    while (done < total) {
      const n = writeSync(r.fd, bytes, done, total - done, positional(r) ? start + done : null);
      if (n <= 0) {
        break;
      }
      done += n;
    }
    syncAppendPosition(r);
  } catch {
    r.error = true;
  }
  if (done < total) {
    r.error = true;
    r.pos = start + done;
    return false;
  }
  return true;
}

function dropReadAhead(r: PlainResource): void {
  r.rstart = 0;
  r.rend = 0;
}

function open(path: string, mode: string, buffer: IoBuffer): OpenOutcome<PlainResource> {
  // eslint-disable-next-line no-restricted-syntax -- released on failure below
  let fd: number | undefined;
  buffer.attach();
  try {
    const parsed = parsePlainMode(mode);
    fd = openSync(path, parsed.flags);
    const stats = fstatSync(fd);
    return {
      ok: true,
      resource: {
        fd,
        mode: parsed,
        buffer,
        pos: parsed.append ? stats.size : 0,
        rstart: 0,
        rend: 0,
        wlen: 0,
        eof: false,
        error: false,
        pipe: isPipeStat(stats),
      },
    };
  } catch (e) {
    buffer.detach();
    if (fd !== undefined) {
      closeSync(fd);
    }
    return { ok: false, cause: toError(e) };
  }
}

function close(r: PlainResource): CloseResult {
  const flushed = flushWrites(r);
  r.buffer.detach();
  dropReadAhead(r);
  try {
    closeSync(r.fd);
  } catch (e) {
    return { ok: false, cause: toError(e) };
  }
  if (!flushed) {
    return { ok: false, cause: new Error("pending writes could not be flushed") };
  }
  return { ok: true };
}

function read(r: PlainResource, dst: Uint8Array, n: number): number {
  if (!r.mode.readable) {
    r.error = true;
    return IO_ERROR;
  }
  const want = clampCount(n, dst.length);
  if (!flushWrites(r)) {
    return IO_ERROR;
  }
  const bytes = r.buffer.bytes();
  // eslint-disable-next-line no-restricted-syntax -- bytes delivered so far
  let total = 0;
  while (total < want) {
    if (r.rstart < r.rend) {
      const c = Math.min(r.rend - r.rstart, want - total);
      dst.set(bytes.subarray(r.rstart, r.rstart + c), total);
      r.rstart += c;
      r.pos += c;
      total += c;
      continue;
    }
    if (r.eof) {
      break;
    }
    const remaining = want - total;
    try {
      if (remaining >= bytes.length) {
        const got = readSync(r.fd, dst, total, remaining, readPosition(r));
        if (got === 0) {
          r.eof = true;
          break;
        }
        r.pos += got;
        total += got;
        continue;
      }
      const got = readSync(r.fd, bytes, 0, bytes.length, readPosition(r));
      if (got === 0) {
        r.eof = true;
        break;
      }
      r.rstart = 0;
      r.rend = got;
    } catch {
      r.error = true;
      return total > 0 ? total : IO_ERROR;
    }
  }
  return total;
}

function bulkRead(r: PlainResource, dst: Uint8Array, n: number): number {
  if (!r.mode.readable || !flushWrites(r)) {
    return IO_ERROR;
  }
  const want = clampCount(n, dst.length);
  if (!r.pipe) {
    dropReadAhead(r);
  }
  try {
    const got = readSync(r.fd, dst, 0, want, readPosition(r));
    if (!r.pipe) {
      r.pos += got;
    }
    return got;
  } catch {
    return IO_ERROR;
  }
}

function write(r: PlainResource, src: Uint8Array, n: number): number {
  if (!r.mode.writable) {
    r.error = true;
    return IO_ERROR;
  }
  const count = clampCount(n, src.length);
  dropReadAhead(r);
  const bytes = r.buffer.bytes();
  const capacity = bytes.length;
  if (count < capacity && r.wlen + count <= capacity) {
    bytes.set(src.subarray(0, count), r.wlen);
    r.wlen += count;
    r.pos += count;
    return count;
  }
  if (!flushWrites(r)) {
    return 0;
  }
  if (count < capacity) {
    bytes.set(src.subarray(0, count), 0);
    r.wlen = count;
    r.pos += count;
    return count;
  }
  // eslint-disable-next-line no-restricted-syntax -- write loop cursor
  let done = 0;
  try {
    while (done < count) {
      const w = writeSync(r.fd, src, done, count - done, positional(r) ? r.pos : null);
      if (w <= 0) {
        break;
      }
      done += w;
      r.pos += w;
    }
    syncAppendPosition(r);
  } catch {
    r.error = true;
  }
  return done;
}

const scratch = new Uint8Array(1);

function getc(r: PlainResource): number {
  const got = read(r, scratch, 1);
  return got === 1 ? scratch[0] : IO_ERROR;
}

function seek(r: PlainResource, offset: number, whence: Whence): SeekResult {
  if (!flushWrites(r)) {
    return { ok: false, reason: "pending writes could not be flushed" };
  }
  if (r.pipe) {
    return { ok: false, reason: "illegal seek on a pipe" };
  }
  const base = (() => {
    if (whence === "set") {
      return 0;
    }
    if (whence === "cur") {
      return r.pos;
    }
    return fstatSync(r.fd).size;
  })();
  const target = base + offset;
  if (!Number.isSafeInteger(target) || target < 0) {
    return { ok: false, reason: `invalid offset ${offset} from ${whence}` };
  }
  dropReadAhead(r);
  r.pos = target;
  r.eof = false;
  return { ok: true, position: target };
}

function tell(r: PlainResource): number {
  return r.pipe ? IO_ERROR : r.pos;
}

function rebuffer(r: PlainResource, next: IoBuffer): boolean {
  if (!flushWrites(r)) {
    return false;
  }
  const unread = r.buffer.bytes().subarray(r.rstart, r.rend);
  if (r.pipe && unread.length > next.size) {
    return false;
  }
  next.attach();
  if (r.pipe) {
    next.bytes().set(unread, 0);
    r.rstart = 0;
    r.rend = unread.length;
  } else {
    dropReadAhead(r);
  }
  r.buffer.detach();
  r.buffer = next;
  return true;
}

export const plainBackend: StreamBackend<"plain", PlainResource> = {
  kind: "plain",
  open,
  close,
  read,
  bulkRead,
  write,
  getc,
  seek,
  tell,
  eof: (r) => r.eof,
  seekable: (r) => !r.pipe,
  rebuffer,
};
