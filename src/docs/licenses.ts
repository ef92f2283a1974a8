import fs from "node:fs";
import path from "node:path";
import { CommandExecutionError, FileAccessError } from "./errors.ts";
import { runCommand } from "./exec.ts";
import type { CommandRunner, LicensesConfig, LicensesResult } from "./types.ts";

export function writeLicenses(
  config: LicensesConfig,
  options: { profile?: string; run?: CommandRunner } = {},
): LicensesResult {
  const { profile, run = runCommand } = options;
  if (profile !== undefined && config.skipProfiles.includes(profile)) {
    return { skipped: true, profile };
  }

  let report: Buffer;
  try {
    report = run(config.command, { cwd: config.cwd });
  } catch (e) {
    if (e instanceof CommandExecutionError) {
      throw new CommandExecutionError(e.argv, `${e.message}. Failed to run cargo-license. Is it installed?`, {
        exitCode: e.exitCode,
        signal: e.signal,
        cause: e,
      });
    }
    throw e;
  }

  const outPath = path.resolve(config.cwd ?? ".", config.outputPath);
  try {
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, report);
  } catch (e) {
    throw new FileAccessError(outPath, "write", e);
  }
  return { skipped: false, path: outPath, bytes: report.length };
}
