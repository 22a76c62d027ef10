import { spawn } from "node:child_process";
import process from "node:process";

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  /** Called with every complete stdout/stderr line as it arrives. */
  onLine?: (line: string, stream: "stdout" | "stderr") => void;
}

export type CommandRunner = (command: string, args: string[], options?: RunCommandOptions) => Promise<CommandResult>;

export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && result.signal === null;
}

export function describeFailure(command: string, result: CommandResult): string {
  const status = result.signal ? `signal ${result.signal}` : `exit code ${result.exitCode}`;
  const tail = result.stderr.trim().split(/\r?\n/).slice(-5).join("\n");
  return tail ? `${command} failed with ${status}\n${tail}` : `${command} failed with ${status}`;
}

function lineSplitter(emit: (line: string) => void): { push: (chunk: string) => void; flush: () => void } {
  let pending = "";
  return {
    push(chunk) {
      pending += chunk;
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? "";
      for (const line of lines) {
        emit(line);
      }
    },
    flush() {
      if (pending) {
        emit(pending);
        pending = "";
      }
    },
  };
}

/**
 * Runs a binary to completion. Resolves with its exit status whatever it is;
 * rejects only when the process cannot be started or is aborted.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      signal: options.signal,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    const onLine = options.onLine;
    const outLines = lineSplitter((line) => onLine?.(line, "stdout"));
    const errLines = lineSplitter((line) => onLine?.(line, "stderr"));

    child.stdout.on("data", (chunk: Buffer) => {
      const text = chunk.toString("utf8");
      stdout += text;
      outLines.push(text);
    });

    child.stderr.on("data", (chunk: Buffer) => {
      const text = chunk.toString("utf8");
      stderr += text;
      errLines.push(text);
    });

    child.on("error", (error) => {
      if (options.signal?.aborted) {
        reject(new Error(`Command aborted: ${command}`, { cause: error }));
        return;
      }
      reject(error);
    });

    child.on("close", (code, signal) => {
      outLines.flush();
      errLines.flush();

      if (options.signal?.aborted) {
        reject(new Error(`Command aborted: ${command}`));
        return;
      }

      resolve({ exitCode: code, signal, stdout, stderr });
    });
  });
};

export async function commandExists(name: string, run: CommandRunner = runCommand): Promise<boolean> {
  const locator = process.platform === "win32" ? "where" : "which";
  try {
    const result = await run(locator, [name]);
    return succeeded(result);
  } catch {
    return false;
  }
}
