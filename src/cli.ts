#!/usr/bin/env node

import "dotenv/config";
import process from "node:process";
import { Command } from "commander";
import { BatchOrchestrator } from "./batch.js";
import { parseCliOptions, resolveRunConfig } from "./config.js";
import { ensureDependencies, requiredTools } from "./deps/resolve.js";
import { RunAbortedError, SlicerError, errorMessage } from "./errors.js";
import { classifyInput } from "./input/classify.js";
import { logger } from "./logger.js";
import { createMediaToolkit } from "./media/toolkit.js";

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("chapterslice")
    .description("Download a video's audio and split it into one file per chapter")
    .version("0.1.0")
    .argument("<input>", "Video URL, or a file with one URL per line")
    .option("-o, --output <file>", "Combined audio file path", "out.mp3")
    .option("-f, --audio-format <fmt>", "Audio format for extraction and output tracks", "mp3")
    .option("-d, --dest <dir>", "Destination directory for split tracks")
    .option("-k, --keep", "Keep the combined audio file after splitting", false)
    .option("-y, --yes", "Install missing yt-dlp/ffmpeg without asking", false)
    .option("--prefix <str>", "Literal prefix for track filenames")
    .option("--prefix-name", "Use the video title (up to ' - ', '(' or '[') as a prefix", false)
    .option("--numbers", "Prepend zero-padded track numbers to filenames", false)
    .addHelpText(
      "after",
      [
        "",
        "Examples:",
        "  chapterslice https://www.youtube.com/watch?v=XXXXXXXXXXX --numbers -d ./album",
        "  chapterslice urls.txt --prefix-name -f m4a",
      ].join("\n"),
    );

  program.parse(process.argv);

  const raw = program.opts();
  const options = parseCliOptions({
    input: program.args[0],
    output: raw.output,
    audioFormat: raw.audioFormat,
    dest: raw.dest,
    keep: Boolean(raw.keep),
    yes: Boolean(raw.yes),
    prefix: raw.prefix,
    prefixName: Boolean(raw.prefixName),
    numbers: Boolean(raw.numbers),
  });

  const config = resolveRunConfig(options, process.cwd());

  logger.debug(
    {
      output: config.outputAbsolutePath,
      dest: config.destAbsolutePath,
      audioFormat: config.audioFormat,
    },
    "Resolved run configuration",
  );

  await ensureDependencies({ tools: requiredTools(config), yes: config.yes });

  const { mode, items } = await classifyInput(config.input, config.workDir);
  logger.info({ mode, items: items.length }, "Input classified");

  const orchestrator = new BatchOrchestrator({
    config,
    toolkit: createMediaToolkit(config),
  });

  const onInterrupt = (): void => {
    if (orchestrator.interruptCurrent() === "item-aborted") {
      logger.warn("Interrupted: abandoning current item, press Ctrl+C again to stop the run");
    }
  };
  process.on("SIGINT", onInterrupt);

  try {
    const summary = await orchestrator.run(items);
    if (summary.succeeded === 0) {
      process.exitCode = 1;
    }
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

main().catch((error: unknown) => {
  if (error instanceof RunAbortedError) {
    logger.error("Run aborted");
    process.exitCode = 130;
    return;
  }

  const kind = error instanceof SlicerError ? error.kind : undefined;
  logger.error({ err: errorMessage(error), kind }, "chapterslice failed");
  process.exitCode = 1;
});
