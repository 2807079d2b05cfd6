/**
 * @file CLI argument parsing (pure; no process access)
 */
import type { CompressionLevel } from "../stream/mode";

export type SizeCommand = { command: "size"; gz: boolean; paths: string[] };
export type CatCommand = { command: "cat"; gz: boolean; path: string };
export type CopyCommand = {
  command: "copy";
  gzIn: boolean;
  gzOut: boolean;
  level: CompressionLevel;
  src: string;
  dst: string;
};
export type HelpCommand = { command: "help" };
export type Command = SizeCommand | CatCommand | CopyCommand | HelpCommand;

export const USAGE = `
Usage: streamwrap <command> [options]

Commands:
  size [--gz] <path...>                         Print logical byte length of each file
  cat [--gz] <path>                             Write file contents to stdout
  copy [--gz-in] [--gz-out] [--level N] <src> <dst>
                                                Copy a file, (de)compressing on the way

Options:
  --gz, -z        Read the input as a gzip stream
  --level, -l N   gzip compression level for copy (0-9)
  --help, -h      Show this help
`;

type Acc = { flags: Set<string>; level: CompressionLevel; positional: string[] };

function parseLevel(v: string | undefined): CompressionLevel {
  const levels: readonly CompressionLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];
  const found = levels.find((l) => String(l) === v);
  if (found === undefined) {
    throw new Error("--level must be an integer from 0 to 9");
  }
  return found;
}

function walk(args: readonly string[], i: number, acc: Acc): Acc {
  if (i >= args.length) {
    return acc;
  }
  const a = args[i];
  if (a === "--level" || a === "-l") {
    return walk(args, i + 2, { ...acc, level: parseLevel(args[i + 1]) });
  }
  if (a === "-z") {
    return walk(args, i + 1, { ...acc, flags: new Set([...acc.flags, "--gz"]) });
  }
  if (a === "-h") {
    return walk(args, i + 1, { ...acc, flags: new Set([...acc.flags, "--help"]) });
  }
  if (a.startsWith("-")) {
    return walk(args, i + 1, { ...acc, flags: new Set([...acc.flags, a]) });
  }
  return walk(args, i + 1, { ...acc, positional: [...acc.positional, a] });
}

const KNOWN_FLAGS: Readonly<Record<Exclude<Command["command"], "help">, readonly string[]>> = {
  size: ["--gz"],
  cat: ["--gz"],
  copy: ["--gz-in", "--gz-out"],
};

/** Parse argv (without the node/script prefix) into a command. */
export function parseArgs(argv: readonly string[]): Command {
  const acc = walk(argv, 0, { flags: new Set(), level: -1, positional: [] });
  const [name, ...rest] = acc.positional;
  if (acc.flags.has("--help") || name === undefined || name === "help") {
    return { command: "help" };
  }
  if (name !== "size" && name !== "cat" && name !== "copy") {
    throw new Error(`Unknown command: ${name}`);
  }
  for (const f of acc.flags) {
    if (!KNOWN_FLAGS[name].includes(f)) {
      throw new Error(`Unknown option for ${name}: ${f}`);
    }
  }
  if (name === "size") {
    if (rest.length === 0) {
      throw new Error("size needs at least one path");
    }
    return { command: "size", gz: acc.flags.has("--gz"), paths: rest };
  }
  if (name === "cat") {
    if (rest.length !== 1) {
      throw new Error("cat needs exactly one path");
    }
    return { command: "cat", gz: acc.flags.has("--gz"), path: rest[0] };
  }
  if (rest.length !== 2) {
    throw new Error("copy needs a source and a destination");
  }
  return {
    command: "copy",
    gzIn: acc.flags.has("--gz-in"),
    gzOut: acc.flags.has("--gz-out"),
    level: acc.level,
    src: rest[0],
    dst: rest[1],
  };
}
