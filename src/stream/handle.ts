/**
 * @file Stream handle: one uniform interface over the plain and gzip backends
 *
 * The backend is chosen once, when the handle is created, and every operation
 * forwards to that backend only. `createPlainStream` and `createGzipStream`
 * fix the kind in the handle's type; `openStream` picks it from a runtime tag.
 */
import { format } from "node:util";
import { createIoBuffer, type IoBuffer } from "./buffer";
import { compressedBackend } from "./compressed";
import { StreamOpenError } from "./errors";
import { plainBackend } from "./plain";
import { decodeScalar, encodeScalar, SCALAR_WIDTH, type BigScalarType, type NumberScalarType, type ScalarType } from "./scalar";
import { IO_ERROR, type BackendKind, type SeekResult, type StreamBackend, type Whence } from "./types";
import { normalizeStreamOptions } from "../config/normalize";
import type { StreamOptions } from "../config/types";

export type StreamHandle<K extends BackendKind> = {
  readonly kind: K;
  readonly isCompressed: boolean;
  /** Last opened path, "" when closed. */
  readonly path: string;
  readonly bufferSize: number;
  open(path: string, mode?: string): void;
  isOpen(): boolean;
  read(dst: Uint8Array, n?: number): number;
  readValue(type: NumberScalarType): number | undefined;
  readBigValue(type: BigScalarType): bigint | undefined;
  bulkRead(dst: Uint8Array, n?: number): number;
  write(src: Uint8Array, n?: number): number;
  writeText(text: string): number;
  writeRawBytes(type: ScalarType, value: number | bigint): number;
  printf(template: string, ...args: unknown[]): number;
  getc(): number;
  seek(offset: number, whence?: Whence): SeekResult;
  tell(): number;
  eof(): boolean;
  seekable(): boolean;
  resizeBuffer(size: number): boolean;
  /** Release the resource. Never throws; false when the backend reported a failure. */
  close(): boolean;
  /** `close()` for `using` declarations. */
  [Symbol.dispose](): void;
};

const encoder = new TextEncoder();

/** Build a closed handle bound to `backend`. */
export function createStreamHandle<K extends BackendKind, R>(
  backend: StreamBackend<K, R>,
  options: StreamOptions = {},
): StreamHandle<K> {
  const cfg = normalizeStreamOptions(options);
  // eslint-disable-next-line no-restricted-syntax -- owned resource, undefined while closed
  let resource: R | undefined;
  // eslint-disable-next-line no-restricted-syntax -- replaced by resizeBuffer while open
  let buffer: IoBuffer = createIoBuffer(cfg.bufferSize);
  // eslint-disable-next-line no-restricted-syntax -- diagnostics only
  let currentPath = "";

  function close(): boolean {
    if (resource === undefined) {
      return true;
    }
    const res = backend.close(resource);
    resource = undefined;
    if (cfg.verbose) {
      console.error(`Closed file at ${currentPath}`);
    }
    if (!res.ok) {
      console.warn(`Warning: error closing ${currentPath}: ${res.cause.message}`);
    }
    currentPath = "";
    return res.ok;
  }

  function open(path: string, mode: string = "rb"): void {
    if (resource !== undefined) {
      close();
    }
    const res = backend.open(path, mode, buffer);
    if (!res.ok) {
      throw new StreamOpenError(path, mode, backend.kind, res.cause);
    }
    resource = res.resource;
    currentPath = path;
    if (cfg.verbose) {
      console.error(`Opened file at path ${path} with mode '${mode}'`);
    }
  }

  function read(dst: Uint8Array, n: number = dst.length): number {
    return resource === undefined ? IO_ERROR : backend.read(resource, dst, n);
  }

  function readExact(type: ScalarType): Uint8Array | undefined {
    const bytes = new Uint8Array(SCALAR_WIDTH[type]);
    return read(bytes) === bytes.length ? bytes : undefined;
  }

  function write(src: Uint8Array, n: number = src.length): number {
    return resource === undefined ? IO_ERROR : backend.write(resource, src, n);
  }

  function writeText(text: string): number {
    return write(encoder.encode(text));
  }

  function resizeBuffer(size: number): boolean {
    if (!Number.isSafeInteger(size) || size <= 0) {
      return false;
    }
    if (resource === undefined) {
      buffer.resize(size);
      return true;
    }
    const next = createIoBuffer(size);
    if (!backend.rebuffer(resource, next)) {
      return false;
    }
    buffer = next;
    return true;
  }

  return {
    kind: backend.kind,
    isCompressed: backend.kind === "compressed",
    get path() {
      return currentPath;
    },
    get bufferSize() {
      return buffer.size;
    },
    open,
    isOpen: () => resource !== undefined,
    read,
    readValue(type) {
      const bytes = readExact(type);
      return bytes ? decodeScalar(type, bytes) : undefined;
    },
    readBigValue(type) {
      const bytes = readExact(type);
      return bytes ? decodeScalar(type, bytes) : undefined;
    },
    bulkRead: (dst, n = dst.length) => (resource === undefined ? IO_ERROR : backend.bulkRead(resource, dst, n)),
    write,
    writeText,
    writeRawBytes: (type, value) => write(encodeScalar(type, value)),
    printf: (template, ...args) => writeText(format(template, ...args)),
    getc: () => (resource === undefined ? IO_ERROR : backend.getc(resource)),
    seek(offset, whence = "set") {
      if (resource === undefined) {
        return { ok: false, reason: "stream is closed" };
      }
      return backend.seek(resource, offset, whence);
    },
    tell: () => (resource === undefined ? IO_ERROR : backend.tell(resource)),
    eof: () => (resource === undefined ? false : backend.eof(resource)),
    seekable: () => (resource === undefined ? false : backend.seekable(resource)),
    resizeBuffer,
    close,
    [Symbol.dispose]() {
      close();
    },
  };
}

/** Plain buffered file handle; opened right away when `path` is given. */
export function createPlainStream(path?: string, mode: string = "rb", options?: StreamOptions): StreamHandle<"plain"> {
  const handle = createStreamHandle(plainBackend, options);
  if (path !== undefined) {
    handle.open(path, mode);
  }
  return handle;
}

/** gzip stream handle; opened right away when `path` is given. */
export function createGzipStream(path?: string, mode: string = "rb", options?: StreamOptions): StreamHandle<"compressed"> {
  const handle = createStreamHandle(compressedBackend, options);
  if (path !== undefined) {
    handle.open(path, mode);
  }
  return handle;
}

/** Open `path` with the backend named by `kind`. */
export function openStream(kind: "plain", path: string, mode?: string, options?: StreamOptions): StreamHandle<"plain">;
export function openStream(
  kind: "compressed",
  path: string,
  mode?: string,
  options?: StreamOptions,
): StreamHandle<"compressed">;
export function openStream(kind: BackendKind, path: string, mode?: string, options?: StreamOptions): StreamHandle<BackendKind>;
export function openStream(
  kind: BackendKind,
  path: string,
  mode: string = "rb",
  options?: StreamOptions,
): StreamHandle<BackendKind> {
  return kind === "plain" ? createPlainStream(path, mode, options) : createGzipStream(path, mode, options);
}

/**
 * Run `fn` with `handle` and close it afterwards, whether `fn` returns or throws.
 * `fn` must finish its I/O synchronously. Callers on TypeScript 5.2+ can also
 * write `using h = openStream(...)`.
 */
export function withStream<K extends BackendKind, T>(handle: StreamHandle<K>, fn: (h: StreamHandle<K>) => T): T {
  try {
    return fn(handle);
  } finally {
    handle.close();
  }
}
