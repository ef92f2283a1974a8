export type ReadmeConfig = {
  targetPath: string;
  // Line after which everything is regenerated; includes its trailing newline.
  marker: string;
  // How a user types the tool, shown on the echoed `$` line.
  displayName: string;
  // Bootstrap prefix prepended to every command, e.g. ["cargo", "run", "--"].
  invocation: readonly string[];
  commands: ReadonlyArray<readonly string[]>;
};

export type RunOptions = {
  cwd?: string;
};

export type CommandRunner = (argv: readonly string[], options?: RunOptions) => Buffer;

export type ReadmeUpdateSummary = {
  path: string;
  blocks: number;
  bytesWritten: number;
};

export type LicensesConfig = {
  outputPath: string;
  command: readonly string[];
  cwd?: string;
  skipProfiles: readonly string[];
};

export type LicensesResult =
  | { skipped: true; profile: string }
  | { skipped: false; path: string; bytes: number };
