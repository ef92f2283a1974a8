import { spawnSync } from "node:child_process";
import { CommandExecutionError } from "./errors.ts";
import type { RunOptions } from "./types.ts";

/**
 * Runs a command to completion and returns its stdout bytes.
 * stdin and stderr stay attached to the parent; there is no timeout and no
 * cap on captured output.
 */
export function runCommand(argv: readonly string[], options: RunOptions = {}): Buffer {
  const [cmd, ...args] = argv;
  if (cmd === undefined) {
    throw new CommandExecutionError(argv, "Empty command");
  }
  const shown = argv.join(" ");
  const r = spawnSync(cmd, args, {
    cwd: options.cwd,
    stdio: ["inherit", "pipe", "inherit"],
    encoding: "buffer",
    maxBuffer: Infinity,
  });
  if (r.error) {
    throw new CommandExecutionError(argv, `Command failed to start: ${shown} (${r.error.message})`, { cause: r.error });
  }
  if (r.signal) {
    throw new CommandExecutionError(argv, `Command killed by ${r.signal}: ${shown}`, { signal: r.signal });
  }
  if (r.status !== 0) {
    throw new CommandExecutionError(argv, `Command exited with ${r.status}: ${shown}`, { exitCode: r.status });
  }
  return r.stdout;
}
