import fs from "node:fs";
import path from "node:path";
import { FileAccessError } from "./errors.ts";
import { runCommand } from "./exec.ts";
import type { CommandRunner, ReadmeConfig, ReadmeUpdateSummary } from "./types.ts";

const FENCE = "```";

export function splitAtMarker(content: Buffer, marker: Buffer): Buffer {
  const idx = content.indexOf(marker);
  return idx === -1 ? content : content.subarray(0, idx);
}

export function commandArgv(config: ReadmeConfig, args: readonly string[]): string[] {
  return [...config.invocation, ...args];
}

export function formatCommandBlock(displayName: string, args: readonly string[], output: Buffer): Buffer {
  const head = Buffer.from(`\n${FENCE}\n$ ${[displayName, ...args].join(" ")}\n`, "utf8");
  const tail = Buffer.from(`${FENCE}\n`, "utf8");
  return Buffer.concat([head, output, tail]);
}

function readDocument(p: string): Buffer {
  try {
    return fs.readFileSync(p);
  } catch (e) {
    throw new FileAccessError(p, "read", e);
  }
}

function openForWrite(p: string): number {
  try {
    return fs.openSync(p, "w");
  } catch (e) {
    throw new FileAccessError(p, "write", e);
  }
}

function writeChunk(fd: number, p: string, chunk: Buffer): number {
  try {
    fs.writeFileSync(fd, chunk);
    return chunk.length;
  } catch (e) {
    throw new FileAccessError(p, "write", e);
  }
}

// A close failure behind an earlier error is reported, not thrown, so the
// earlier error is the one that propagates.
function closeDocument(fd: number, p: string, pending: boolean) {
  try {
    fs.closeSync(fd);
  } catch (e) {
    const err = new FileAccessError(p, "write", e);
    if (!pending) throw err;
    console.error(err);
  }
}

/**
 * Regenerates everything after the marker line from live command output.
 *
 * The file is rewritten in place, block by block: a failing command leaves
 * whatever was already written (prefix, marker, earlier blocks) on disk.
 * When the marker is missing the whole file is kept and the section appended.
 */
export function updateReadme(config: ReadmeConfig, run: CommandRunner = runCommand): ReadmeUpdateSummary {
  const readmePath = path.resolve(config.targetPath);
  const marker = Buffer.from(config.marker, "utf8");
  const before = splitAtMarker(readDocument(readmePath), marker);

  const fd = openForWrite(readmePath);
  let bytesWritten = 0;
  let blocks = 0;
  let pending = true;
  try {
    bytesWritten += writeChunk(fd, readmePath, before);
    bytesWritten += writeChunk(fd, readmePath, marker);
    for (const args of config.commands) {
      const output = run(commandArgv(config, args));
      bytesWritten += writeChunk(fd, readmePath, formatCommandBlock(config.displayName, args, output));
      blocks++;
    }
    pending = false;
  } finally {
    closeDocument(fd, readmePath, pending);
  }
  return { path: readmePath, blocks, bytesWritten };
}
