/**
 * @file Byte conversion helpers
 */

/** Convert ArrayBuffer to Uint8Array (no-copy when possible). */
export function toUint8(data: Uint8Array | ArrayBuffer): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

/** Normalize codec output (bytes, byte arrays or binary strings) to Uint8Array. */
export function toBytes(chunk: Uint8Array | ArrayLike<number> | string): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === "string") {
    return new TextEncoder().encode(chunk);
  }
  return Uint8Array.from(chunk);
}

/** Concatenate chunks into one array. */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  // eslint-disable-next-line no-restricted-syntax -- Performance: accumulating total size requires mutable counter
  let total = 0;
  for (const p of parts) {
    total += p.length;
  }
  const out = new Uint8Array(total);
  // eslint-disable-next-line no-restricted-syntax -- Performance: tracking offset position requires mutable variable
  let off = 0;
  for (const p of parts) {
    out.set(p, off);
    off += p.length;
  }
  return out;
}
