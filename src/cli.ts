#!/usr/bin/env node
import path from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { exitCodeFor, formatError } from "./cli/failure.js";
import { Logger } from "./cli/logger.js";
import { DownloadProgress, RecordingSpinner } from "./cli/progress.js";
import {
  DEFAULT_CONFIG,
  loadConfigFile,
  type PipelineConfig,
} from "./core/config.js";
import { runPipeline, type RetrievalHooks } from "./core/downloader.js";

interface CliOptions {
  output?: string;
  keepParts: boolean;
  config?: string;
  dwell?: number;
  ffmpeg?: string;
  verbose: boolean;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return seconds;
}

function buildProgram(): Command {
  return new Command()
    .name("rozhlas-dl")
    .description(
      "Sniff mujrozhlas.cz audio streams in headless Chromium, download or record them, and merge into one MP3.",
    )
    .argument("<url>", "mujrozhlas.cz page URL, or a croaod.cz .mpd/.mp3/segment URL")
    .option("-o, --output <path>", "merged MP3 path (default: <last URL segment>.mp3)")
    .option("--keep-parts", "keep the per-stream part files", false)
    .option("-c, --config <path>", "YAML file overriding selectors, headers and timings")
    .option("--dwell <seconds>", "how long to let the player fetch manifests", parseSeconds)
    .option("--ffmpeg <path>", "ffmpeg binary to use")
    .option("-v, --verbose", "log every stream URL seen in the browser", false)
    .exitOverride();
}

async function resolveConfig(options: CliOptions): Promise<PipelineConfig> {
  const fromFile = options.config
    ? await loadConfigFile(path.resolve(options.config))
    : DEFAULT_CONFIG;
  return {
    ...fromFile,
    ffmpegPath: options.ffmpeg ?? fromFile.ffmpegPath,
    timing:
      options.dwell === undefined
        ? fromFile.timing
        : { ...fromFile.timing, dwellMs: Math.round(options.dwell * 1000) },
  };
}

function createProgressHooks(logger: Logger): RetrievalHooks {
  let download: DownloadProgress | null = null;
  let recording: RecordingSpinner | null = null;
  return {
    onStream: (candidate) => logger.debug(`Observed ${candidate.kind}: ${candidate.url}`),
    onTaskStart: (task) => {
      if (task.kind === "direct-audio") {
        download = new DownloadProgress(`[${task.index}]`);
      } else {
        recording = new RecordingSpinner(`[${task.index}]`);
      }
    },
    onDownloadProgress: (_task, progress) => download?.update(progress),
    onRecordingTick: (_task, elapsedMs) => recording?.tick(elapsedMs),
    onTaskEnd: () => {
      download?.stop();
      recording?.stop();
      download = null;
      recording = null;
    },
  };
}

async function run(url: string, options: CliOptions): Promise<void> {
  const logger = new Logger(options.verbose);
  const config = await resolveConfig(options);
  logger.info(`Input: ${url}`);

  const result = await runPipeline({
    inputUrl: url,
    outputPath: options.output,
    keepParts: options.keepParts,
    config,
    reporter: logger,
    hooks: createProgressHooks(logger),
  });

  if (result.skipped.length > 0) {
    logger.warn(`${result.skipped.length} stream(s) skipped.`);
  }
  if (options.keepParts) {
    logger.info(`Parts kept in: ${result.partsDir}`);
  }
  logger.success(`Done. Output: ${result.outputPath}`);
}

async function main(argv: string[]): Promise<void> {
  const program = buildProgram();
  program.action(async (url: string, options: CliOptions) => {
    await run(url, options);
  });
  await program.parseAsync(argv);
}

main(process.argv).catch((err: unknown) => {
  process.exitCode = exitCodeFor(err);
  // commander has already printed usage errors and help.
  if (err instanceof CommanderError) {
    return;
  }
  new Logger().error(formatError(err));
});
