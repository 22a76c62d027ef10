import path from "node:path";
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { parseCliOptions, resolveRunConfig, withAudioExtension } from "../src/config.js";

const baseOptions = {
  input: "https://video.test/watch?v=1",
  output: "out.mp3",
  audioFormat: "mp3",
  keep: false,
  yes: false,
  prefixName: false,
  numbers: false,
};

describe("parseCliOptions", () => {
  it("rejects an audio format that is not a bare extension", () => {
    expect(() => parseCliOptions({ ...baseOptions, audioFormat: "mp3/../x" })).toThrow(ZodError);
  });

  it("rejects a blank input", () => {
    expect(() => parseCliOptions({ ...baseOptions, input: "   " })).toThrow(ZodError);
  });
});

describe("withAudioExtension", () => {
  it("replaces a different extension", () => {
    expect(withAudioExtension(path.join("dir", "out.mp3"), "flac")).toBe(path.join("dir", "out.flac"));
  });
});

describe("resolveRunConfig", () => {
  const workDir = path.resolve("/work");

  it("resolves paths against the working directory and applies env defaults", () => {
    const config = resolveRunConfig(parseCliOptions(baseOptions), workDir, {});

    expect(config.outputAbsolutePath).toBe(path.join(workDir, "out.mp3"));
    expect(config.destAbsolutePath).toBe(workDir);
    expect(config.ytdlpBin).toBe("yt-dlp");
    expect(config.ffmpegBin).toBe("ffmpeg");
    expect(config.ffprobeBin).toBe("ffprobe");
    expect(config.minChapterSec).toBe(1);
  });

  it("reads binary overrides from the environment", () => {
    const config = resolveRunConfig(parseCliOptions({ ...baseOptions, dest: "tracks", audioFormat: "M4A" }), workDir, {
      CHAPTERSLICE_YTDLP_BIN: "/opt/bin/yt-dlp",
      CHAPTERSLICE_MIN_CHAPTER_SEC: "0.5",
    });

    expect(config.destAbsolutePath).toBe(path.join(workDir, "tracks"));
    expect(config.audioFormat).toBe("m4a");
    expect(config.ytdlpBin).toBe("/opt/bin/yt-dlp");
    expect(config.minChapterSec).toBe(0.5);
  });

  it("gives the combined file the extension of the audio format", () => {
    const m4a = resolveRunConfig(parseCliOptions({ ...baseOptions, audioFormat: "m4a" }), workDir, {});
    expect(m4a.outputAbsolutePath).toBe(path.join(workDir, "out.m4a"));

    const bare = resolveRunConfig(parseCliOptions({ ...baseOptions, output: "tmp/combined" }), workDir, {});
    expect(bare.outputAbsolutePath).toBe(path.join(workDir, "tmp", "combined.mp3"));

    const matching = resolveRunConfig(parseCliOptions({ ...baseOptions, output: "a.OPUS", audioFormat: "opus" }), workDir, {});
    expect(matching.outputAbsolutePath).toBe(path.join(workDir, "a.OPUS"));
  });

  it("returns a frozen object", () => {
    const config = resolveRunConfig(parseCliOptions(baseOptions), workDir, {});
    expect(Object.isFrozen(config)).toBe(true);
  });
});
