/**
 * @file Mode string parsing for both backends
 *
 * Plain streams follow the `fopen` convention ("r", "rb", "w+", "ab", "wx"),
 * gzip streams the `gzopen` one ("rb", "wb9", "ab", "wT"). Both translate to
 * Node's string open flags.
 */
import { InvalidModeError } from "./errors";

export type CompressionLevel = -1 | 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const LEVELS: readonly CompressionLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

export type PlainMode = {
  flags: string;
  readable: boolean;
  writable: boolean;
  append: boolean;
};

export type GzipMode = {
  flags: string;
  direction: "read" | "write";
  append: boolean;
  level: CompressionLevel;
  /** Write stored bytes without gzip framing. */
  transparent: boolean;
};

type Access = "r" | "w" | "a";

function isAccess(c: string | undefined): c is Access {
  return c === "r" || c === "w" || c === "a";
}

/** Parse an `fopen` style mode. Throws InvalidModeError for anything else. */
export function parsePlainMode(mode: string): PlainMode {
  const access = mode[0];
  if (!isAccess(access)) {
    throw new InvalidModeError(mode, "must start with r, w or a");
  }
  const rest = mode.slice(1);
  for (const c of rest) {
    if (c !== "b" && c !== "t" && c !== "+" && c !== "x") {
      throw new InvalidModeError(mode, `unexpected '${c}'`);
    }
  }
  const update = rest.includes("+");
  const exclusive = rest.includes("x");
  if (exclusive && access === "r") {
    throw new InvalidModeError(mode, "'x' requires w or a");
  }
  const flags = `${access}${exclusive ? "x" : ""}${update ? "+" : ""}`;
  return {
    flags,
    readable: access === "r" || update,
    writable: access !== "r" || update,
    append: access === "a",
  };
}

/** Parse a `gzopen` style mode. Strategy letters are accepted and ignored. */
export function parseGzipMode(mode: string): GzipMode {
  // eslint-disable-next-line no-restricted-syntax -- accumulated while scanning
  let access: Access | undefined;
  // eslint-disable-next-line no-restricted-syntax -- accumulated while scanning
  let level: CompressionLevel = -1;
  // eslint-disable-next-line no-restricted-syntax -- accumulated while scanning
  let exclusive = false;
  // eslint-disable-next-line no-restricted-syntax -- accumulated while scanning
  let transparent = false;
  for (const c of mode) {
    if (c >= "0" && c <= "9") {
      level = LEVELS[Number(c)];
      continue;
    }
    if (isAccess(c)) {
      access = c;
      continue;
    }
    if (c === "+") {
      throw new InvalidModeError(mode, "gzip streams cannot be opened for update");
    }
    if (c === "x") {
      exclusive = true;
      continue;
    }
    if (c === "T") {
      transparent = true;
    }
    // "b", "f", "h", "R", "F" and anything else pass through
  }
  if (!access) {
    throw new InvalidModeError(mode, "missing r, w or a");
  }
  const direction = access === "r" ? "read" : "write";
  return {
    flags: direction === "read" ? "r" : `${access}${exclusive ? "x" : ""}`,
    direction,
    append: access === "a",
    level,
    transparent: direction === "write" && transparent,
  };
}
