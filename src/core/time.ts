export interface TransferProgress {
  bytesDone: number;
  /** Null when the server sent no usable Content-Length. */
  totalBytes: number | null;
  elapsedMs: number;
  bytesPerSecond: number;
  percent: number | null;
  etaSeconds: number | null;
}

/**
 * Average-throughput snapshot of a running transfer.
 */
export function computeTransferProgress(
  bytesDone: number,
  totalBytes: number | null,
  elapsedMs: number,
): TransferProgress {
  const seconds = Math.max(elapsedMs, 1) / 1000;
  const bytesPerSecond = bytesDone / seconds;
  if (totalBytes === null || totalBytes <= 0) {
    return {
      bytesDone,
      totalBytes: null,
      elapsedMs,
      bytesPerSecond,
      percent: null,
      etaSeconds: null,
    };
  }
  const remaining = Math.max(totalBytes - bytesDone, 0);
  return {
    bytesDone,
    totalBytes,
    elapsedMs,
    bytesPerSecond,
    percent: Math.min((bytesDone / totalBytes) * 100, 100),
    etaSeconds:
      bytesPerSecond > 0 ? Math.round(remaining / bytesPerSecond) : null,
  };
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(2)} MB`;
}

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const mm = m.toString().padStart(2, "0");
  const ss = s.toString().padStart(2, "0");
  return h > 0 ? `${h}:${mm}:${ss}` : `${mm}:${ss}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
