import type { LicensesConfig, ReadmeConfig } from "./types.ts";

export const README_MARKER = "## Help overview\n";

export const readmeConfig: ReadmeConfig = {
  targetPath: "README.md",
  marker: README_MARKER,
  displayName: "wavrw",
  invocation: ["cargo", "run", "--"],
  commands: [["help"], ["topic", "chunks"]],
};

export function licensesConfig(env: NodeJS.ProcessEnv = process.env): LicensesConfig {
  return {
    outputPath: "generated/licenses.txt",
    // --avoid-build-deps drops some libraries that do ship in the binary
    command: [env.CARGO ?? "cargo", "license", "--avoid-dev-deps", "-d"],
    skipProfiles: ["release", "dist"],
  };
}
