export interface CliOptions {
  input: string;
  output: string;
  audioFormat: string;
  dest?: string;
  keep: boolean;
  yes: boolean;
  prefix?: string;
  prefixName: boolean;
  numbers: boolean;
}

export interface RunConfig extends Readonly<CliOptions> {
  readonly workDir: string;
  readonly outputAbsolutePath: string;
  readonly destAbsolutePath: string;
  readonly ytdlpBin: string;
  readonly ffmpegBin: string;
  readonly ffprobeBin: string;
  readonly minChapterSec: number;
}

export interface SourceItem {
  /** 1-based position in the input. */
  position: number;
  url: string;
}

export interface Chapter {
  index: number;
  title?: string;
  startSec: number;
  endSec: number;
}

export interface VideoInfo {
  title: string;
  durationSec?: number;
  chapters: Chapter[];
}

export interface OutputTrack {
  path: string;
  chapter: Chapter;
}

export interface ChapterFailure {
  chapter: Chapter;
  message: string;
}

export interface SplitResult {
  tracks: OutputTrack[];
  failures: ChapterFailure[];
  skipped: Chapter[];
}

export type ItemState = "pending" | "downloading" | "splitting" | "done" | "failed";

export interface ItemOutcome {
  item: SourceItem;
  state: Extract<ItemState, "done" | "failed">;
  tracks: OutputTrack[];
  failedChapters: ChapterFailure[];
  skippedChapters: Chapter[];
  error?: string;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  tracksWritten: number;
  outcomes: ItemOutcome[];
}
