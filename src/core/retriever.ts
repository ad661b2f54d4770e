import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { buildRequestHeaders, type PipelineConfig } from "./config.js";
import { FfmpegExitError, HttpStatusError } from "./errors.js";
import { buildRecordArgs, runFfmpeg, type FfmpegResult } from "./ffmpeg.js";
import type { StreamKind } from "./link.js";
import {
  computeTransferProgress,
  sleep,
  type TransferProgress,
} from "./time.js";

export interface RetrievalTask {
  /** 1-based position in discovery order. */
  index: number;
  url: string;
  kind: StreamKind;
  destination: string;
  referer: string;
}

export interface DirectDownloadOptions {
  config: PipelineConfig;
  onProgress?: (progress: TransferProgress) => void;
  now?: () => number;
}

export interface RecordOptions {
  config: PipelineConfig;
  onTick?: (elapsedMs: number) => void;
  now?: () => number;
}

/**
 * Streams an MP3 to `task.destination` chunk by chunk. Progress is
 * throttled to one update per `config.progressIntervalMs`, plus a final one.
 * Nothing is retried; a partial file is left behind on failure.
 */
export async function downloadDirect(
  task: RetrievalTask,
  options: DirectDownloadOptions,
): Promise<TransferProgress> {
  const { config, onProgress } = options;
  const now = options.now ?? Date.now;
  const startedAt = now();

  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(
      new Error(`No response within ${config.requestTimeoutMs} ms: ${task.url}`),
    );
  }, config.requestTimeoutMs);
  let response: Response;
  try {
    response = await fetch(task.url, {
      headers: buildRequestHeaders(config, task.referer),
      signal: controller.signal,
    });
  } finally {
    clearTimeout(timer);
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new HttpStatusError(response.status, response.statusText, task.url);
  }

  const totalBytes = parseContentLength(response.headers.get("content-length"));
  let bytesDone = 0;
  let lastEmitAt = Number.NEGATIVE_INFINITY;
  const source = response.body
    ? Readable.fromWeb(response.body, { objectMode: true })
    : Readable.from([]);
  // pipeline cancels the response body when the file side fails.
  await pipeline(
    source,
    async function* (chunks: AsyncIterable<Uint8Array>) {
      for await (const chunk of chunks) {
        if (chunk.byteLength === 0) {
          continue;
        }
        bytesDone += chunk.byteLength;
        const at = now();
        if (at - lastEmitAt >= config.progressIntervalMs) {
          lastEmitAt = at;
          onProgress?.(
            computeTransferProgress(bytesDone, totalBytes, at - startedAt),
          );
        }
        yield chunk;
      }
    },
    createWriteStream(task.destination),
  );

  const summary = computeTransferProgress(
    bytesDone,
    totalBytes,
    now() - startedAt,
  );
  onProgress?.(summary);
  return summary;
}

/**
 * Records a DASH manifest to MP3 through ffmpeg. ffmpeg's own progress
 * output is discarded; `onTick` gets the elapsed time every poll instead.
 */
export async function recordAdaptive(
  task: RetrievalTask,
  options: RecordOptions,
): Promise<void> {
  const { config, onTick } = options;
  const now = options.now ?? Date.now;
  const startedAt = now();

  const args = buildRecordArgs({
    manifestUrl: task.url,
    destination: task.destination,
    userAgent: config.userAgent,
    headers: buildRequestHeaders(config, task.referer),
    audioCodec: config.audioCodec,
    audioBitrate: config.audioBitrate,
  });
  const completion = runFfmpeg(config.ffmpegPath, args);

  let result: FfmpegResult | undefined;
  while (result === undefined) {
    onTick?.(now() - startedAt);
    result = await Promise.race([
      completion,
      sleep(config.recordPollIntervalMs).then(() => undefined),
    ]);
  }
  onTick?.(now() - startedAt);

  if (result.exitCode !== 0) {
    throw new FfmpegExitError(result.exitCode, "DASH recording");
  }
}

function parseContentLength(value: string | null): number | null {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}
