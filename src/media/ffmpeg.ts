import { z } from "zod";
import { SplitError } from "../errors.js";
import { describeFailure, runCommand, succeeded, type CommandRunner } from "../util/shell.js";
import type { RunConfig } from "../types.js";

export type FfmpegConfig = Pick<RunConfig, "ffmpegBin" | "ffprobeBin" | "workDir">;

export interface SegmentRequest {
  chapterIndex: number;
  inputPath: string;
  outputPath: string;
  startSec: number;
  durationSec: number;
}

const ffprobeSchema = z.object({
  format: z
    .object({
      duration: z.string().optional(),
    })
    .optional(),
});

export function formatSeconds(seconds: number): string {
  return Math.max(0, seconds).toFixed(3);
}

export async function probeDurationSec(
  inputPath: string,
  config: FfmpegConfig,
  options: { run?: CommandRunner; signal?: AbortSignal } = {},
): Promise<number | undefined> {
  const run = options.run ?? runCommand;
  const result = await run(
    config.ffprobeBin,
    ["-v", "error", "-print_format", "json", "-show_format", inputPath],
    { cwd: config.workDir, signal: options.signal },
  );

  if (!succeeded(result)) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(result.stdout);
  } catch {
    return undefined;
  }

  const parsed = ffprobeSchema.safeParse(raw);
  const duration = Number(parsed.success ? parsed.data.format?.duration : undefined);
  return Number.isFinite(duration) && duration > 0 ? duration : undefined;
}

export function buildSegmentArgs(request: SegmentRequest): string[] {
  return [
    "-hide_banner",
    "-loglevel",
    "error",
    "-y",
    "-ss",
    formatSeconds(request.startSec),
    "-t",
    formatSeconds(request.durationSec),
    "-i",
    request.inputPath,
    "-c",
    "copy",
    request.outputPath,
  ];
}

export async function cutSegment(
  request: SegmentRequest,
  config: FfmpegConfig,
  options: { run?: CommandRunner; signal?: AbortSignal } = {},
): Promise<void> {
  const run = options.run ?? runCommand;
  const result = await run(config.ffmpegBin, buildSegmentArgs(request), {
    cwd: config.workDir,
    signal: options.signal,
  });

  if (!succeeded(result)) {
    throw new SplitError(request.chapterIndex, describeFailure(config.ffmpegBin, result));
  }
}
