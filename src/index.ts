/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Stream handles over the plain and gzip backends, the size probe, and the
 * FileIO adapter built on them. Internals stay under src/stream/*.
 */

/**
 * Stream handles
 * - createPlainStream / createGzipStream: backend fixed in the handle type
 * - openStream: backend chosen from a runtime tag
 * - withStream: close on every exit path
 * @public
 */
export { createPlainStream, createGzipStream, openStream, withStream } from "./stream/handle";
export type { StreamHandle } from "./stream/handle";
export type { BackendKind, Whence, SeekResult } from "./stream/types";
export { IO_ERROR } from "./stream/types";
export type { ScalarType, NumberScalarType, BigScalarType } from "./stream/scalar";

/**
 * Size probe
 * @public
 */
export { probeSize, SIZE_UNKNOWN } from "./stream/probe";

/**
 * Errors
 * @public
 */
export { StreamOpenError, BufferAttachedError, InvalidModeError } from "./stream/errors";

/**
 * Whole-file FileIO over stream handles
 * @public
 */
export { createStreamFileIO } from "./storage/node";
export type { StreamFileIOOptions } from "./storage/node";
export type { FileIO } from "./storage/types";

/**
 * Configuration
 * @public
 */
export { resolveStreamDefaults } from "./config";
export type { StreamDefaults, StreamOptions } from "./config";
