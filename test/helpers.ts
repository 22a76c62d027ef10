import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseCliOptions, resolveRunConfig } from "../src/config.js";
import type { CommandResult, CommandRunner, RunCommandOptions } from "../src/util/shell.js";
import type { CliOptions, RunConfig } from "../src/types.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunCommandOptions;
}

export type FakeResponse = Partial<CommandResult> | Error;

export function ok(stdout = ""): Partial<CommandResult> {
  return { exitCode: 0, stdout };
}

export function fail(stderr = "boom", exitCode = 1): Partial<CommandResult> {
  return { exitCode, stderr };
}

/**
 * A command runner that never spawns anything: every call is recorded and
 * answered by `respond`.
 */
export function fakeRunner(respond: (command: string, args: string[]) => FakeResponse): {
  run: CommandRunner;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const response = respond(command, args);
    if (response instanceof Error) {
      throw response;
    }
    return { exitCode: 0, signal: null, stdout: "", stderr: "", ...response };
  };
  return { run, calls };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "chapterslice-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function makeConfig(workDir: string, overrides: Partial<CliOptions> = {}): RunConfig {
  const options = parseCliOptions({
    input: "https://video.test/watch?v=1",
    output: "out.mp3",
    audioFormat: "mp3",
    keep: false,
    yes: false,
    prefixName: false,
    numbers: false,
    ...overrides,
  });
  return resolveRunConfig(options, workDir, {});
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
