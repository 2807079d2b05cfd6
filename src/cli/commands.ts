/**
 * @file CLI command implementations over stream handles
 */
import { openStream, withStream, type StreamHandle } from "../stream/handle";
import type { BackendKind } from "../stream/types";
import { probeSize, SIZE_UNKNOWN } from "../stream/probe";
import type { CatCommand, Command, CopyCommand, SizeCommand } from "./args";
import { USAGE } from "./args";

export type Output = {
  write(chunk: Uint8Array | string): void;
  error(message: string): void;
};

const CHUNK = 1 << 16;

function runSize(cmd: SizeCommand, out: Output): number {
  // eslint-disable-next-line no-restricted-syntax -- exit status accumulates over paths
  let status = 0;
  for (const p of cmd.paths) {
    const size = probeSize(p, cmd.gz ? "compressed" : "plain");
    if (size === SIZE_UNKNOWN) {
      out.error(`Could not open ${p}`);
      status = 1;
      continue;
    }
    out.write(`${size}\t${p}\n`);
  }
  return status;
}

function runCat(cmd: CatCommand, out: Output): number {
  return withStream(openStream(cmd.gz ? "compressed" : "plain", cmd.path, "rb"), (h) => {
    const chunk = new Uint8Array(CHUNK);
    for (;;) {
      const got = h.read(chunk);
      if (got < 0) {
        out.error(`Read error in ${cmd.path}`);
        return 1;
      }
      if (got === 0) {
        return 0;
      }
      out.write(chunk.slice(0, got));
    }
  });
}

function pump(cmd: CopyCommand, src: StreamHandle<BackendKind>, dst: StreamHandle<BackendKind>, out: Output): number {
  const chunk = new Uint8Array(CHUNK);
  for (;;) {
    const got = src.read(chunk);
    if (got < 0) {
      out.error(`Read error in ${cmd.src}`);
      return 1;
    }
    if (got === 0) {
      return 0;
    }
    if (dst.write(chunk, got) !== got) {
      out.error(`Short write to ${cmd.dst}`);
      return 1;
    }
  }
}

function runCopy(cmd: CopyCommand, out: Output): number {
  const level = cmd.level < 0 ? "" : String(cmd.level);
  return withStream(openStream(cmd.gzIn ? "compressed" : "plain", cmd.src, "rb"), (src) => {
    const dst = openStream(cmd.gzOut ? "compressed" : "plain", cmd.dst, `wb${cmd.gzOut ? level : ""}`);
    // eslint-disable-next-line no-restricted-syntax -- assigned inside try
    let status: number;
    try {
      status = pump(cmd, src, dst, out);
    } catch (e) {
      dst.close();
      throw e;
    }
    // the final flush and the gzip trailer are written by close
    if (!dst.close()) {
      out.error(`Could not finish writing ${cmd.dst}`);
      return 1;
    }
    return status;
  });
}

/** Run a parsed command and return the process exit status. */
export function runCommand(cmd: Command, out: Output): number {
  switch (cmd.command) {
    case "help":
      out.write(USAGE);
      return 0;
    case "size":
      return runSize(cmd, out);
    case "cat":
      return runCat(cmd, out);
    case "copy":
      return runCopy(cmd, out);
  }
}
