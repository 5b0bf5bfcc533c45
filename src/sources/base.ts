import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { DiskSnapshot } from "../models.js";

const execFileAsync = promisify(execFile);

/**
 * Anything that can produce a fresh snapshot of every disk the diagnostic
 * utility sees. Implementations reject with `SnapshotError` when the utility
 * cannot be run or its output cannot be read.
 */
export interface SnapshotSource {
  snapshot(): Promise<DiskSnapshot>;
}

/**
 * Runs an executable and resolves with its standard output.
 */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

export const execCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, [...args], {
    encoding: "utf-8",
    maxBuffer: 16 * 1024 * 1024,
  });
  return stdout;
};
