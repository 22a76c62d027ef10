import { DownloadError } from "../errors.js";
import { runCommand, type CommandRunner } from "../util/shell.js";
import type { RunConfig, VideoInfo } from "../types.js";
import { cutSegment as cutWithFfmpeg, probeDurationSec, type SegmentRequest } from "./ffmpeg.js";
import {
  assertDownloadableUrl,
  downloadAudio,
  fetchVideoMetadata,
  needsDurationProbe,
  toVideoInfo,
} from "./ytdlp.js";

/**
 * The two external programs as the batch sees them. Tests swap in a fake.
 */
export interface MediaToolkit {
  /** Downloads the combined audio for `url` and returns its chapters. */
  extractChapters(url: string, signal?: AbortSignal): Promise<VideoInfo>;
  /** Writes `[start, start + duration)` of the combined audio to a new file. */
  cutSegment(request: SegmentRequest, signal?: AbortSignal): Promise<void>;
}

export function createMediaToolkit(config: RunConfig, run: CommandRunner = runCommand): MediaToolkit {
  return {
    async extractChapters(url, signal) {
      assertDownloadableUrl(url);

      await downloadAudio(url, config, { run, signal });
      const metadata = await fetchVideoMetadata(url, config, { run, signal });

      let fallbackDurationSec: number | undefined;
      if (needsDurationProbe(metadata)) {
        fallbackDurationSec = await probeDurationSec(config.outputAbsolutePath, config, { run, signal });
        if (fallbackDurationSec === undefined) {
          throw new DownloadError(url, "Video has no chapters and its duration could not be determined");
        }
      }

      return toVideoInfo(metadata, fallbackDurationSec);
    },

    async cutSegment(request, signal) {
      await cutWithFfmpeg(request, config, { run, signal });
    },
  };
}
