/**
 * @file Shared config API surface for the library and CLI.
 */
export { resolveStreamDefaults, normalizeStreamOptions, parseFlag, parseBufferSize } from "./normalize";
export { ENV_BUFSIZE, ENV_VERBOSE, type StreamDefaults, type StreamOptions } from "./types";
