/**
 * @file Fixed-width little-endian scalar codec for raw value reads and writes
 */

export type BigScalarType = "i64" | "u64";
export type NumberScalarType = "i8" | "u8" | "i16" | "u16" | "i32" | "u32" | "f32" | "f64";
export type ScalarType = NumberScalarType | BigScalarType;

export const SCALAR_WIDTH: Readonly<Record<ScalarType, number>> = {
  i8: 1,
  u8: 1,
  i16: 2,
  u16: 2,
  i32: 4,
  u32: 4,
  f32: 4,
  f64: 8,
  i64: 8,
  u64: 8,
};

export function isBigScalarType(type: ScalarType): type is BigScalarType {
  return type === "i64" || type === "u64";
}

/** Encode a number with the layout of `type`. */
export function encodeScalar(type: NumberScalarType, value: number): Uint8Array;
/** Encode a bigint as a 64-bit integer. */
export function encodeScalar(type: BigScalarType, value: bigint): Uint8Array;
export function encodeScalar(type: ScalarType, value: number | bigint): Uint8Array;
export function encodeScalar(type: ScalarType, value: number | bigint): Uint8Array {
  const out = new Uint8Array(SCALAR_WIDTH[type]);
  const dv = new DataView(out.buffer);
  if (isBigScalarType(type)) {
    const v = BigInt(value);
    if (type === "i64") {
      dv.setBigInt64(0, v, true);
    } else {
      dv.setBigUint64(0, v, true);
    }
    return out;
  }
  const v = Number(value);
  switch (type) {
    case "i8":
      dv.setInt8(0, v);
      break;
    case "u8":
      dv.setUint8(0, v);
      break;
    case "i16":
      dv.setInt16(0, v, true);
      break;
    case "u16":
      dv.setUint16(0, v, true);
      break;
    case "i32":
      dv.setInt32(0, v, true);
      break;
    case "u32":
      dv.setUint32(0, v, true);
      break;
    case "f32":
      dv.setFloat32(0, v, true);
      break;
    case "f64":
      dv.setFloat64(0, v, true);
      break;
  }
  return out;
}

/** Decode `bytes` (exactly SCALAR_WIDTH[type] long) as `type`. */
export function decodeScalar(type: NumberScalarType, bytes: Uint8Array): number;
export function decodeScalar(type: BigScalarType, bytes: Uint8Array): bigint;
export function decodeScalar(type: ScalarType, bytes: Uint8Array): number | bigint;
export function decodeScalar(type: ScalarType, bytes: Uint8Array): number | bigint {
  const dv = new DataView(bytes.buffer, bytes.byteOffset, SCALAR_WIDTH[type]);
  switch (type) {
    case "i8":
      return dv.getInt8(0);
    case "u8":
      return dv.getUint8(0);
    case "i16":
      return dv.getInt16(0, true);
    case "u16":
      return dv.getUint16(0, true);
    case "i32":
      return dv.getInt32(0, true);
    case "u32":
      return dv.getUint32(0, true);
    case "f32":
      return dv.getFloat32(0, true);
    case "f64":
      return dv.getFloat64(0, true);
    case "i64":
      return dv.getBigInt64(0, true);
    case "u64":
      return dv.getBigUint64(0, true);
  }
}
