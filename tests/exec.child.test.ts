import { describe, expect, it } from "vitest";
import { CommandExecutionError } from "../src/docs/errors.ts";
import { runCommand } from "../src/docs/exec.ts";

const node = process.execPath;

describe("runCommand with a real child process", () => {
  it("captures stdout bytes exactly", () => {
    const out = runCommand([node, "-e", "process.stdout.write(Buffer.from([0x75, 0x73, 0xff, 0x0a]))"]);
    expect(out.equals(Buffer.from([0x75, 0x73, 0xff, 0x0a]))).toBe(true);
  });

  it("passes trailing arguments to the child", () => {
    const out = runCommand([node, "-e", "process.stdout.write(process.argv.slice(1).join(','))", "topic", "chunks"]);
    expect(out.toString()).toBe("topic,chunks");
  });

  it("captures output larger than the default spawn buffer", () => {
    const out = runCommand([node, "-e", "process.stdout.write('x'.repeat(2 * 1024 * 1024))"]);
    expect(out.length).toBe(2 * 1024 * 1024);
  });

  it("fails on a non-zero exit", () => {
    let caught: unknown;
    try {
      runCommand([node, "-e", "process.exit(3)"]);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(CommandExecutionError);
    expect(caught instanceof CommandExecutionError && caught.exitCode).toBe(3);
  });
});
