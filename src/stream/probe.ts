/**
 * @file Size probe: byte length of a file as seen through a backend
 *
 * Plain files report their stat length. A gzip stream carries no reachable
 * uncompressed length, so it is decoded end to end and counted.
 */
import { closeSync, fstatSync, openSync } from "node:fs";
import { createGzipStream } from "./handle";
import { StreamOpenError } from "./errors";
import type { BackendKind } from "./types";

/** Returned by probeSize when the path cannot be opened. */
export const SIZE_UNKNOWN = Number.MAX_SAFE_INTEGER;

/** Chunk size used to decode compressed input while probing. */
export const PROBE_CHUNK_SIZE = 1 << 15;

function probePlain(path: string): number {
  // eslint-disable-next-line no-restricted-syntax -- assigned inside try
  let fd: number;
  try {
    fd = openSync(path, "r");
  } catch {
    return SIZE_UNKNOWN;
  }
  try {
    return fstatSync(fd).size;
  } finally {
    closeSync(fd);
  }
}

function probeCompressed(path: string): number {
  const handle = createGzipStream();
  try {
    handle.open(path, "rb");
  } catch (e) {
    if (e instanceof StreamOpenError) {
      return SIZE_UNKNOWN;
    }
    throw e;
  }
  try {
    const chunk = new Uint8Array(PROBE_CHUNK_SIZE);
    // eslint-disable-next-line no-restricted-syntax -- running total
    let total = 0;
    // eslint-disable-next-line no-restricted-syntax -- last read result
    let got = handle.read(chunk);
    // a short read may precede an error, so only a non-positive result ends the loop
    while (got > 0) {
      total += got;
      got = handle.read(chunk);
    }
    if (got < 0) {
      console.warn(`Warning: Error code ${got} when reading from compressed stream ${path}`);
    }
    return total;
  } finally {
    handle.close();
  }
}

/**
 * Total logical byte length of `path` read through `kind`.
 * Returns SIZE_UNKNOWN if the path cannot be opened.
 */
export function probeSize(path: string, kind: BackendKind): number {
  return kind === "plain" ? probePlain(path) : probeCompressed(path);
}
