/**
 * @file Node.js FileIO adapter backed by stream handles
 * Why: whole-file read/write/append/atomic operations on either backend,
 * so gzip files can be stored and loaded through the same contract.
 */
import { mkdir, rename, rm } from "node:fs/promises";
import { dirname, join as joinPath } from "node:path";
import type { FileIO } from "./types";
import { openStream, withStream, type StreamHandle } from "../stream/handle";
import type { BackendKind } from "../stream/types";
import type { StreamOptions } from "../config/types";
import { concatBytes, toUint8 } from "../util/bin";
import { hasErrorCode } from "../util/is-error";

export type StreamFileIOOptions = {
  baseDir: string;
  kind: BackendKind;
  /** Mode used by write/atomicWrite, e.g. "wb9" for maximum gzip compression. */
  writeMode?: string;
  stream?: StreamOptions;
};

const READ_CHUNK = 1 << 16;

function isRetryableError(error: unknown): boolean {
  if (!hasErrorCode(error)) {
    return false;
  }
  return error.code === "EBUSY" || error.code === "EMFILE" || error.code === "ENFILE";
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function retryOperation<T>(operation: () => Promise<T>, maxRetries: number = 3, baseDelay: number = 100): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryableError(error)) {
        throw error;
      }
      // Exponential backoff with jitter
      await sleep(baseDelay * Math.pow(2, attempt) + Math.random() * 50);
    }
  }
}

function readAll(handle: StreamHandle<BackendKind>): Uint8Array {
  const parts: Uint8Array[] = [];
  for (;;) {
    const chunk = new Uint8Array(READ_CHUNK);
    const got = handle.read(chunk);
    if (got < 0) {
      throw new Error(`read failed: ${handle.path}`);
    }
    if (got === 0) {
      break;
    }
    parts.push(chunk.subarray(0, got));
  }
  return concatBytes(parts);
}

function writeAll(handle: StreamHandle<BackendKind>, data: Uint8Array): void {
  // eslint-disable-next-line no-restricted-syntax -- write loop cursor
  let done = 0;
  while (done < data.length) {
    const n = handle.write(data.subarray(done));
    if (n <= 0) {
      throw new Error(`short write to ${handle.path}: ${done} of ${data.length} bytes`);
    }
    done += n;
  }
}

/** Prefixed stream FileIO. Why: keep all artifacts under a base directory. */
export function createStreamFileIO(options: StreamFileIOOptions): FileIO {
  const { baseDir, kind, writeMode = "wb", stream } = options;
  const appendMode = writeMode.replace(/^w/, "a");

  async function ensureDir(p: string) {
    await mkdir(dirname(p), { recursive: true });
  }

  function put(full: string, mode: string, data: Uint8Array): void {
    const handle = openStream(kind, full, mode, stream);
    try {
      writeAll(handle, data);
    } catch (e) {
      handle.close();
      throw e;
    }
    if (!handle.close()) {
      throw new Error(`failed to flush ${full}`);
    }
  }

  return {
    async read(path: string) {
      const full = joinPath(baseDir, path);
      return withStream(openStream(kind, full, "rb", stream), readAll);
    },
    async write(path: string, data) {
      const full = joinPath(baseDir, path);
      await ensureDir(full);
      put(full, writeMode, toUint8(data));
    },
    async append(path: string, data) {
      const full = joinPath(baseDir, path);
      await ensureDir(full);
      put(full, appendMode, toUint8(data));
    },
    async atomicWrite(path: string, data) {
      const full = joinPath(baseDir, path);
      await ensureDir(full);
      const tmp = `${full}.tmp`;
      try {
        put(tmp, writeMode, toUint8(data));
        await retryOperation(() => rename(tmp, full));
      } catch (error) {
        await rm(tmp, { force: true });
        throw error;
      }
    },
    async del(path: string) {
      await rm(joinPath(baseDir, path), { force: true });
    },
  };
}
