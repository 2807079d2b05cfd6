#!/usr/bin/env node
/**
 * @file streamwrap CLI entry
 *
 * Usage:
 *   streamwrap size --gz data.gz
 *   streamwrap cat --gz data.gz > data
 *   streamwrap copy --gz-out --level 9 data data.gz
 */
import { parseArgs } from "./args";
import { runCommand } from "./commands";
import { hasErrorMessage } from "../util/is-error";

function main(): number {
  const cmd = parseArgs(process.argv.slice(2));
  return runCommand(cmd, {
    write: (chunk) => {
      process.stdout.write(chunk);
    },
    error: (message) => {
      console.error(message);
    },
  });
}

try {
  process.exitCode = main();
} catch (e) {
  console.error(String(hasErrorMessage(e) ? e.message : e));
  process.exitCode = 1;
}
