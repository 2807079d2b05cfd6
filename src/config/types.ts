/**
 * @file Config types: stream defaults and per-handle options
 */

export type StreamDefaults = {
  /** Print open/close debug lines to stderr. */
  verbose: boolean;
  /** Initial I/O buffer size in bytes. */
  bufferSize: number;
};

export type StreamOptions = Partial<StreamDefaults>;

/** Environment variables read by resolveStreamDefaults. */
export const ENV_VERBOSE = "STREAMWRAP_VERBOSE" as const;
export const ENV_BUFSIZE = "STREAMWRAP_BUFSIZE" as const;
