import { z } from "zod";
import { DownloadError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { describeFailure, runCommand, succeeded, type CommandRunner } from "../util/shell.js";
import type { Chapter, RunConfig, VideoInfo } from "../types.js";

export type YtdlpConfig = Pick<RunConfig, "ytdlpBin" | "audioFormat" | "outputAbsolutePath" | "workDir">;

export interface DownloadProgress {
  percent: number;
  total?: string;
  speed?: string;
  eta?: string;
}

const metadataSchema = z.object({
  title: z.string().nullish(),
  duration: z.number().nonnegative().nullish(),
  chapters: z
    .array(
      z.object({
        title: z.string().nullish(),
        start_time: z.number(),
        end_time: z.number(),
      }),
    )
    .nullish(),
});

export type VideoMetadata = z.infer<typeof metadataSchema>;

const progressPattern =
  /^\[download\]\s+(\d+(?:\.\d+)?)%(?:\s+of\s+~?\s*(\S+))?(?:\s+at\s+(Unknown B\/s|\S+))?(?:\s+ETA\s+(\S+))?/;

function known(value: string | undefined): string | undefined {
  return value && !value.startsWith("Unknown") ? value : undefined;
}

/**
 * Parses a `--newline` progress line such as
 * `[download]  81.6% of   59.10MiB at    3.47MiB/s ETA 00:01`.
 */
export function parseDownloadProgress(line: string): DownloadProgress | undefined {
  const match = progressPattern.exec(line.trim());
  if (!match) {
    return undefined;
  }

  return {
    percent: Math.min(100, Number(match[1])),
    total: known(match[2]),
    speed: known(match[3]),
    eta: known(match[4]),
  };
}

export function assertDownloadableUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new DownloadError(url, `Not a valid URL: ${url}`, { cause: error });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new DownloadError(url, `Unsupported URL scheme '${parsed.protocol}' in ${url}`);
  }
}

export async function downloadAudio(
  url: string,
  config: YtdlpConfig,
  options: { run?: CommandRunner; signal?: AbortSignal } = {},
): Promise<void> {
  const run = options.run ?? runCommand;
  let lastLoggedStep = -1;

  const result = await run(
    config.ytdlpBin,
    [
      "--extract-audio",
      "--audio-format",
      config.audioFormat,
      "--no-playlist",
      "--newline",
      "--force-overwrites",
      "--output",
      config.outputAbsolutePath,
      url,
    ],
    {
      cwd: config.workDir,
      signal: options.signal,
      onLine: (line) => {
        const progress = parseDownloadProgress(line);
        if (!progress) {
          return;
        }
        const step = Math.floor(progress.percent / 10);
        if (step > lastLoggedStep) {
          lastLoggedStep = step;
          logger.info({ url, ...progress }, "Downloading audio");
        }
      },
    },
  );

  if (!succeeded(result)) {
    throw new DownloadError(url, describeFailure(config.ytdlpBin, result));
  }
}

export async function fetchVideoMetadata(
  url: string,
  config: YtdlpConfig,
  options: { run?: CommandRunner; signal?: AbortSignal } = {},
): Promise<VideoMetadata> {
  const run = options.run ?? runCommand;
  const result = await run(config.ytdlpBin, ["-J", "--no-playlist", url], {
    cwd: config.workDir,
    signal: options.signal,
  });

  if (!succeeded(result)) {
    throw new DownloadError(url, describeFailure(`${config.ytdlpBin} -J`, result));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(result.stdout);
  } catch (error) {
    throw new DownloadError(url, `Invalid JSON metadata from ${config.ytdlpBin}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DownloadError(url, `Unexpected metadata shape: ${parsed.error.message}`);
  }

  return parsed.data;
}

/**
 * Maps downloader metadata to chapters. A video without chapters becomes
 * one chapter spanning the whole duration, named after the video.
 */
export function toVideoInfo(metadata: VideoMetadata, fallbackDurationSec?: number): VideoInfo {
  const title = metadata.title?.trim() ?? "";
  const durationSec = knownDuration(metadata) ?? fallbackDurationSec;
  const rawChapters = metadata.chapters ?? [];

  if (rawChapters.length === 0) {
    const whole: Chapter = {
      index: 0,
      title: title || undefined,
      startSec: 0,
      endSec: durationSec ?? 0,
    };
    return { title, durationSec, chapters: [whole] };
  }

  const chapters: Chapter[] = rawChapters.map((chapter, index) => ({
    index,
    title: chapter.title?.trim() || undefined,
    startSec: Math.max(0, chapter.start_time),
    endSec: chapter.end_time,
  }));

  return { title, durationSec, chapters };
}

function knownDuration(metadata: VideoMetadata): number | undefined {
  return metadata.duration != null && metadata.duration > 0 ? metadata.duration : undefined;
}

export function needsDurationProbe(metadata: VideoMetadata): boolean {
  return (metadata.chapters ?? []).length === 0 && knownDuration(metadata) === undefined;
}
