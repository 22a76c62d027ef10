import path from "node:path";
import { z } from "zod";
import type { CliOptions, RunConfig } from "./types.js";

const audioFormatPattern = /^[a-z0-9]+$/i;

const cliOptionsSchema = z.object({
  input: z.string().trim().min(1),
  output: z.string().min(1),
  audioFormat: z
    .string()
    .min(1)
    .regex(audioFormatPattern, "Audio format must be a bare extension such as mp3 or m4a"),
  dest: z.string().min(1).optional(),
  keep: z.boolean(),
  yes: z.boolean(),
  prefix: z.string().optional(),
  prefixName: z.boolean(),
  numbers: z.boolean(),
});

const envSchema = z.object({
  CHAPTERSLICE_YTDLP_BIN: z.string().min(1).default("yt-dlp"),
  CHAPTERSLICE_FFMPEG_BIN: z.string().min(1).default("ffmpeg"),
  CHAPTERSLICE_FFPROBE_BIN: z.string().min(1).default("ffprobe"),
  CHAPTERSLICE_MIN_CHAPTER_SEC: z.coerce.number().nonnegative().default(1),
});

export function parseCliOptions(raw: unknown): CliOptions {
  return cliOptionsSchema.parse(raw);
}

/**
 * yt-dlp's audio extraction renames its output to the target format's
 * extension, so the combined path has to carry that extension up front.
 */
export function withAudioExtension(filePath: string, audioFormat: string): string {
  const parsed = path.parse(filePath);
  if (parsed.ext.toLowerCase() === `.${audioFormat}`) {
    return filePath;
  }
  return path.join(parsed.dir, `${parsed.name}.${audioFormat}`);
}

export function resolveRunConfig(
  options: CliOptions,
  workDir: string,
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const parsedEnv = envSchema.parse(env);
  const audioFormat = options.audioFormat.toLowerCase();

  const config: RunConfig = {
    ...options,
    audioFormat,
    workDir,
    outputAbsolutePath: withAudioExtension(path.resolve(workDir, options.output), audioFormat),
    destAbsolutePath: path.resolve(workDir, options.dest ?? "."),
    ytdlpBin: parsedEnv.CHAPTERSLICE_YTDLP_BIN,
    ffmpegBin: parsedEnv.CHAPTERSLICE_FFMPEG_BIN,
    ffprobeBin: parsedEnv.CHAPTERSLICE_FFPROBE_BIN,
    minChapterSec: parsedEnv.CHAPTERSLICE_MIN_CHAPTER_SEC,
  };

  return Object.freeze(config);
}
