import { mkdtemp, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { concatenateParts } from "./audio.js";
import type { PipelineConfig } from "./config.js";
import { FfmpegExitError, HttpStatusError, PipelineError } from "./errors.js";
import { hasFfmpeg } from "./ffmpeg.js";
import { outputFileNameFromUrl, partFileName } from "./filename.js";
import { classifyStreamUrl, type CandidateUrl } from "./link.js";
import { resolveStreamUrls, type ResolveOptions, type Resolution } from "./page-resolver.js";
import { downloadDirect, recordAdaptive, type RetrievalTask } from "./retriever.js";
import type { TransferProgress } from "./time.js";

export interface PipelineReporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}

export interface RetrievalHooks {
  onStream?: (candidate: CandidateUrl) => void;
  onTaskStart?: (task: RetrievalTask) => void;
  onDownloadProgress?: (task: RetrievalTask, progress: TransferProgress) => void;
  onRecordingTick?: (task: RetrievalTask, elapsedMs: number) => void;
  onTaskEnd?: (task: RetrievalTask) => void;
}

export interface PipelineDeps {
  hasFfmpeg: (binary: string) => Promise<boolean>;
  resolve: (inputUrl: string, options: ResolveOptions) => Promise<Resolution>;
  downloadDirect: typeof downloadDirect;
  recordAdaptive: typeof recordAdaptive;
  concatenate: typeof concatenateParts;
  makePartsDir: () => Promise<string>;
}

export interface RunOptions {
  inputUrl: string;
  outputPath?: string;
  keepParts: boolean;
  config: PipelineConfig;
  reporter: PipelineReporter;
  hooks?: RetrievalHooks;
  deps?: Partial<PipelineDeps>;
  /** Base for relative output paths. Defaults to process.cwd(). */
  cwd?: string;
}

export interface SkippedStream {
  index: number;
  url: string;
  reason: string;
}

export interface RunResult {
  outputPath: string;
  parts: string[];
  skipped: SkippedStream[];
  partsDir: string;
}

const DEFAULT_DEPS: PipelineDeps = {
  hasFfmpeg,
  resolve: resolveStreamUrls,
  downloadDirect,
  recordAdaptive,
  concatenate: concatenateParts,
  makePartsDir: () => mkdtemp(path.join(os.tmpdir(), "rozhlas_parts_")),
};

/**
 * Resolve, retrieve one URL at a time in discovery order, merge, clean up.
 * A URL that fails or yields an undersized file is skipped; the run only
 * fails when ffmpeg is missing, nothing resolves, no part survives, or the
 * final merge fails.
 */
export async function runPipeline(options: RunOptions): Promise<RunResult> {
  const { config, reporter, inputUrl } = options;
  const hooks = options.hooks ?? {};
  const deps: PipelineDeps = { ...DEFAULT_DEPS, ...options.deps };

  if (!(await deps.hasFfmpeg(config.ffmpegPath))) {
    throw new PipelineError(
      `ffmpeg not found (tried "${config.ffmpegPath}"). Install ffmpeg and make sure it is on PATH, or pass --ffmpeg <path>.`,
    );
  }

  const { urls, discovery } = await deps.resolve(inputUrl, {
    config,
    onStream: hooks.onStream,
  });
  if (discovery) {
    reporter.info(
      `Browser session saw ${discovery.observed.length} media URL(s) ` +
        `(${discovery.clicks.clicked} click(s), ${discovery.scrollRounds} scroll round(s)).`,
    );
  }
  if (urls.length === 0) {
    throw new PipelineError(
      "No croaod.cz .mpd/.mp3 streams detected. Try a longer --dwell, or pass a stream URL copied from the browser's network panel.",
    );
  }

  reporter.info(`Detected ${urls.length} stream URL(s).`);
  urls.slice(0, config.displayLimit).forEach((url, i) => {
    reporter.info(`  [${i + 1}] ${url}`);
  });
  if (urls.length > config.displayLimit) {
    reporter.info(`  ... and ${urls.length - config.displayLimit} more`);
  }

  const partsDir = await deps.makePartsDir();
  const parts: string[] = [];
  const skipped: SkippedStream[] = [];

  for (const [offset, url] of urls.entries()) {
    const index = offset + 1;
    const task: RetrievalTask = {
      index,
      url,
      kind: classifyStreamUrl(url, config.patterns),
      destination: path.join(partsDir, partFileName(index)),
      referer: inputUrl,
    };
    reporter.info(`[${index}/${urls.length}] ${describeKind(task)}`);

    const reason = await retrieve(task, deps, config, hooks);
    if (reason === null) {
      parts.push(task.destination);
      reporter.success(`Saved: ${path.basename(task.destination)}`);
    } else {
      skipped.push({ index, url, reason });
      reporter.warn(`[${index}] ${reason}; skipping this URL.`);
    }
  }

  if (parts.length === 0) {
    if (!options.keepParts) {
      await removeQuietly(partsDir);
    }
    throw new PipelineError("No parts downloaded/recorded successfully.");
  }

  const outputPath = path.resolve(
    options.cwd ?? process.cwd(),
    options.outputPath ?? outputFileNameFromUrl(inputUrl),
  );
  reporter.info(`Merging ${parts.length} part(s) into: ${path.basename(outputPath)}`);
  try {
    await deps.concatenate(parts, outputPath, { ffmpegPath: config.ffmpegPath });
  } catch (error) {
    reporter.warn(`Retrieved parts left in ${partsDir}`);
    throw error;
  }
  reporter.success("Merge complete.");

  if (!options.keepParts) {
    for (const part of parts) {
      await removeQuietly(part);
    }
    await removeQuietly(partsDir);
  }

  return { outputPath, parts, skipped, partsDir };
}

/** Null when the task produced an acceptable part, else the skip reason. */
async function retrieve(
  task: RetrievalTask,
  deps: PipelineDeps,
  config: PipelineConfig,
  hooks: RetrievalHooks,
): Promise<string | null> {
  if (task.kind !== "direct-audio" && task.kind !== "manifest") {
    return `not a retrievable stream (${task.kind})`;
  }

  hooks.onTaskStart?.(task);
  try {
    if (task.kind === "direct-audio") {
      await deps.downloadDirect(task, {
        config,
        onProgress: (progress) => hooks.onDownloadProgress?.(task, progress),
      });
    } else {
      await deps.recordAdaptive(task, {
        config,
        onTick: (elapsedMs) => hooks.onRecordingTick?.(task, elapsedMs),
      });
    }
  } catch (error) {
    return describeFailure(error);
  } finally {
    hooks.onTaskEnd?.(task);
  }

  const size = await fileSize(task.destination);
  if (size === null) {
    return "output missing";
  }
  if (size <= config.minPartBytes) {
    return `output too small (${size} bytes)`;
  }
  return null;
}

function describeKind(task: RetrievalTask): string {
  switch (task.kind) {
    case "direct-audio":
      return "Downloading MP3...";
    case "manifest":
      return "Recording DASH via ffmpeg...";
    default:
      return `Unsupported ${task.kind} URL`;
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof HttpStatusError) {
    return `HTTP error: ${error.message}`;
  }
  if (error instanceof FfmpegExitError) {
    return `ffmpeg failed: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const info = await stat(filePath);
    return info.isFile() ? info.size : null;
  } catch {
    return null;
  }
}

async function removeQuietly(target: string): Promise<void> {
  try {
    await rm(target, { recursive: true, force: true });
  } catch {
    // Leftovers in the temp dir are not worth failing a finished run.
  }
}
