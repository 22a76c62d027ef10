export { BatchOrchestrator, formatSummary } from "./batch.js";
export { parseCliOptions, resolveRunConfig } from "./config.js";
export { ensureDependencies, requiredTools } from "./deps/resolve.js";
export { classifyInput, parseBatchFile } from "./input/classify.js";
export { createMediaToolkit } from "./media/toolkit.js";
export { deriveFilename, deriveTitlePrefix, sanitizeComponent } from "./naming/filename.js";
export { splitChapters } from "./split.js";
export * from "./errors.js";
export type { MediaToolkit } from "./media/toolkit.js";
export type {
  Chapter,
  CliOptions,
  ItemOutcome,
  ItemState,
  OutputTrack,
  RunConfig,
  RunSummary,
  SourceItem,
  VideoInfo,
} from "./types.js";
