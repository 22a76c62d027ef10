import fs from "node:fs/promises";
import path from "node:path";
import { FilesystemError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { MediaToolkit } from "./media/toolkit.js";
import { deriveFilename } from "./naming/filename.js";
import type { ChapterFailure, Chapter, OutputTrack, RunConfig, SplitResult, VideoInfo } from "./types.js";

export type SplitConfig = Pick<
  RunConfig,
  "audioFormat" | "numbers" | "prefix" | "prefixName" | "destAbsolutePath" | "outputAbsolutePath" | "minChapterSec"
>;

export async function ensureDestination(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new FilesystemError(dir, `Cannot create destination directory ${dir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export async function splitChapters(params: {
  video: VideoInfo;
  config: SplitConfig;
  toolkit: MediaToolkit;
  signal?: AbortSignal;
  /** Called for every track as soon as it is on disk. */
  onTrack?: (track: OutputTrack) => void;
}): Promise<SplitResult> {
  const { video, config, toolkit, signal, onTrack } = params;

  await ensureDestination(config.destAbsolutePath);

  const tracks: OutputTrack[] = [];
  const failures: ChapterFailure[] = [];
  const skipped: Chapter[] = [];
  const total = video.chapters.length;

  for (const chapter of video.chapters) {
    const durationSec = chapter.endSec - chapter.startSec;
    if (!Number.isFinite(durationSec) || durationSec < config.minChapterSec) {
      logger.info(
        { chapter: chapter.index + 1, title: chapter.title, durationSec },
        "Skipping chapter shorter than the minimum duration",
      );
      skipped.push(chapter);
      continue;
    }

    const filename = deriveFilename(chapter, video.title, config, total);
    const outputPath = path.join(config.destAbsolutePath, filename);

    try {
      await toolkit.cutSegment(
        {
          chapterIndex: chapter.index,
          inputPath: config.outputAbsolutePath,
          outputPath,
          startSec: chapter.startSec,
          durationSec,
        },
        signal,
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const message = errorMessage(error);
      logger.warn({ chapter: chapter.index + 1, title: chapter.title, err: message }, "Chapter split failed");
      failures.push({ chapter, message });
      continue;
    }

    logger.info({ chapter: chapter.index + 1, of: total, path: outputPath }, "Track written");
    const track: OutputTrack = { path: outputPath, chapter };
    tracks.push(track);
    onTrack?.(track);
  }

  return { tracks, failures, skipped };
}
