/**
 * @file Owned I/O buffer with an attach lease
 *
 * A plain resource keeps using the buffer's storage for as long as it is open.
 * The lease makes that explicit: while attached, the storage cannot be
 * resized, so a new buffer has to be handed to the resource instead.
 */
import { BufferAttachedError } from "./errors";

/** Default buffer size (8 KiB). */
export const DEFAULT_BUFFER_SIZE = 8192;

export type IoBuffer = {
  readonly size: number;
  /** Backing storage; stable for as long as the buffer is attached. */
  bytes(): Uint8Array;
  attached(): boolean;
  attach(): void;
  detach(): void;
  resize(size: number): void;
};

function checkSize(size: number): number {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`buffer size must be a positive integer, got ${size}`);
  }
  return size;
}

/** Allocate a detached buffer of `size` bytes. */
export function createIoBuffer(size: number = DEFAULT_BUFFER_SIZE): IoBuffer {
  // eslint-disable-next-line no-restricted-syntax -- storage is replaced on resize
  let storage = new Uint8Array(checkSize(size));
  // eslint-disable-next-line no-restricted-syntax -- lease flag
  let lease = false;
  return {
    get size() {
      return storage.length;
    },
    bytes() {
      return storage;
    },
    attached() {
      return lease;
    },
    attach() {
      if (lease) {
        throw new BufferAttachedError("attach");
      }
      lease = true;
    },
    detach() {
      lease = false;
    },
    resize(next: number) {
      if (lease) {
        throw new BufferAttachedError("resize");
      }
      storage = new Uint8Array(checkSize(next));
    },
  };
}
