import fs from "node:fs/promises";
import { RunAbortedError, errorMessage, isFatal } from "./errors.js";
import { logger } from "./logger.js";
import type { MediaToolkit } from "./media/toolkit.js";
import { splitChapters } from "./split.js";
import type { ItemOutcome, ItemState, OutputTrack, RunConfig, RunSummary, SourceItem, SplitResult } from "./types.js";

export type TransitionListener = (item: SourceItem, state: ItemState) => void;

export type InterruptResult = "item-aborted" | "run-aborted";

export interface BatchOrchestratorOptions {
  config: RunConfig;
  toolkit: MediaToolkit;
  onTransition?: TransitionListener;
}

export function formatSummary(summary: Pick<RunSummary, "total" | "succeeded" | "failed" | "tracksWritten">): string {
  return (
    `Processed ${summary.total} item(s): ${summary.succeeded} succeeded, ` +
    `${summary.failed} failed, ${summary.tracksWritten} track(s) written`
  );
}

function noTracksReason(split: SplitResult): string | undefined {
  if (split.tracks.length > 0) {
    return undefined;
  }
  return split.failures.length > 0
    ? "Every chapter failed to split"
    : "No tracks written: every chapter is shorter than the minimum duration";
}

/**
 * Runs each source item through download, split and cleanup, one at a time.
 * A failed item is recorded and the batch moves on; only fatal errors stop it.
 */
export class BatchOrchestrator {
  private readonly config: RunConfig;
  private readonly toolkit: MediaToolkit;
  private readonly onTransition?: TransitionListener;
  private current?: AbortController;
  private runAborted = false;

  constructor(options: BatchOrchestratorOptions) {
    this.config = options.config;
    this.toolkit = options.toolkit;
    this.onTransition = options.onTransition;
  }

  /**
   * The first call aborts the item in progress. A second call before that
   * item finishes, or a call between items, aborts the whole run.
   */
  interruptCurrent(): InterruptResult {
    const controller = this.current;
    if (!controller || controller.signal.aborted) {
      this.runAborted = true;
      controller?.abort();
      return "run-aborted";
    }

    controller.abort();
    return "item-aborted";
  }

  async run(items: SourceItem[]): Promise<RunSummary> {
    for (const item of items) {
      this.transition(item, "pending");
    }

    const outcomes: ItemOutcome[] = [];
    for (const item of items) {
      if (this.runAborted) {
        throw new RunAbortedError();
      }
      outcomes.push(await this.processItem(item));
    }

    if (this.runAborted) {
      throw new RunAbortedError();
    }

    const succeeded = outcomes.filter((outcome) => outcome.state === "done").length;
    const summary: RunSummary = {
      total: items.length,
      succeeded,
      failed: outcomes.length - succeeded,
      tracksWritten: outcomes.reduce((sum, outcome) => sum + outcome.tracks.length, 0),
      outcomes,
    };

    logger.info(
      {
        total: summary.total,
        succeeded: summary.succeeded,
        failed: summary.failed,
        tracksWritten: summary.tracksWritten,
      },
      formatSummary(summary),
    );

    return summary;
  }

  async processItem(item: SourceItem): Promise<ItemOutcome> {
    const controller = new AbortController();
    this.current = controller;
    const written: OutputTrack[] = [];

    logger.info({ item: item.position, url: item.url }, "Processing item");

    try {
      this.transition(item, "downloading");
      const video = await this.toolkit.extractChapters(item.url, controller.signal);
      logger.info(
        { url: item.url, title: video.title, chapters: video.chapters.length },
        "Audio downloaded",
      );

      this.transition(item, "splitting");
      const split = await splitChapters({
        video,
        config: this.config,
        toolkit: this.toolkit,
        signal: controller.signal,
        onTrack: (track) => written.push(track),
      });

      const error = noTracksReason(split);
      if (error) {
        logger.warn({ item: item.position, url: item.url, err: error }, "Item failed");
      }
      const state = error ? "failed" : "done";
      this.transition(item, state);

      return {
        item,
        state,
        tracks: split.tracks,
        failedChapters: split.failures,
        skippedChapters: split.skipped,
        error,
      };
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }

      const message = controller.signal.aborted ? "Interrupted" : errorMessage(error);
      logger.warn({ item: item.position, url: item.url, err: message }, "Item failed");
      this.transition(item, "failed");

      return { item, state: "failed", tracks: written, failedChapters: [], skippedChapters: [], error: message };
    } finally {
      this.current = undefined;
      await this.removeCombinedAudio();
    }
  }

  private async removeCombinedAudio(): Promise<void> {
    if (this.config.keep) {
      return;
    }

    try {
      await fs.rm(this.config.outputAbsolutePath, { force: true });
    } catch (error) {
      logger.warn(
        { path: this.config.outputAbsolutePath, err: errorMessage(error) },
        "Could not remove combined audio file",
      );
    }
  }

  private transition(item: SourceItem, state: ItemState): void {
    logger.debug({ item: item.position, state }, "Item state");
    this.onTransition?.(item, state);
  }
}
