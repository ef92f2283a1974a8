import { describe, expect, it } from "vitest";
import { CommandExecutionError, DocsError, DocsErrorCode, FileAccessError } from "../src/docs/errors.ts";

describe("FileAccessError", () => {
  it("names the path and the underlying reason", () => {
    const cause = new Error("ENOENT: no such file or directory");
    const err = new FileAccessError("/repo/README.md", "read", cause);

    expect(err.message).toBe("Cannot read /repo/README.md: ENOENT: no such file or directory");
    expect(err.code).toBe(DocsErrorCode.FILE_ACCESS);
    expect(err.path).toBe("/repo/README.md");
    expect(err.cause).toBe(cause);
    expect(err.context).toEqual({ path: "/repo/README.md", action: "read" });
    expect(err.name).toBe("FileAccessError");
    expect(err).toBeInstanceOf(DocsError);
  });
});

describe("CommandExecutionError", () => {
  it("defaults exit code and signal to null", () => {
    const err = new CommandExecutionError(["cargo"], "boom");

    expect(err.exitCode).toBeNull();
    expect(err.signal).toBeNull();
    expect(err.code).toBe(DocsErrorCode.COMMAND_FAILED);
    expect(err instanceof Error).toBe(true);
  });
});
