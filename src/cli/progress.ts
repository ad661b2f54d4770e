import chalk from "chalk";
import cliProgress from "cli-progress";
import ora, { type Ora } from "ora";
import {
  formatDuration,
  formatMegabytes,
  type TransferProgress,
} from "../core/time.js";

/**
 * Byte progress for one MP3 download. A bar when the server told us the
 * size, a spinner with the running total when it did not.
 */
export class DownloadProgress {
  private bar: cliProgress.SingleBar | null = null;
  private spinner: Ora | null = null;

  constructor(private readonly label: string) {}

  update(progress: TransferProgress): void {
    const speed = `${formatMegabytes(progress.bytesPerSecond)}/s`;
    if (progress.totalBytes === null) {
      const text = `${this.label} ${formatMegabytes(progress.bytesDone)} downloaded  ${speed}`;
      if (!this.spinner) {
        this.spinner = ora({ text, discardStdin: false }).start();
      } else {
        this.spinner.text = text;
      }
      return;
    }

    const payload = {
      label: this.label,
      done: formatMegabytes(progress.bytesDone),
      size: formatMegabytes(progress.totalBytes),
      speed,
      etaText:
        progress.etaSeconds === null ? "--:--" : formatDuration(progress.etaSeconds),
    };
    if (!this.bar) {
      this.bar = new cliProgress.SingleBar(
        {
          format:
            `${chalk.blueBright("{label}")} ` +
            `${chalk.cyan("{bar}")} ` +
            `${chalk.white("{percentage}%")} | ` +
            `${chalk.green("{done}/{size}")} | ` +
            `${chalk.magenta("{speed}")} | ETA {etaText}`,
          barCompleteChar: "█",
          barIncompleteChar: "░",
          hideCursor: true,
        },
        cliProgress.Presets.shades_classic,
      );
      this.bar.start(progress.totalBytes, progress.bytesDone, payload);
      return;
    }
    this.bar.setTotal(progress.totalBytes);
    this.bar.update(progress.bytesDone, payload);
  }

  stop(): void {
    this.bar?.stop();
    this.spinner?.stop();
    this.bar = null;
    this.spinner = null;
  }
}

/**
 * Elapsed-time spinner for an ffmpeg recording, whose own output is muted.
 */
export class RecordingSpinner {
  private readonly spinner: Ora;

  constructor(private readonly label: string) {
    this.spinner = ora({ text: this.text(0), discardStdin: false });
  }

  tick(elapsedMs: number): void {
    if (!this.spinner.isSpinning) {
      this.spinner.start();
    }
    this.spinner.text = this.text(elapsedMs);
  }

  stop(): void {
    if (this.spinner.isSpinning) {
      this.spinner.stop();
    }
  }

  private text(elapsedMs: number): string {
    return `${this.label} Recording... Elapsed: ${formatDuration(elapsedMs / 1000)}`;
  }
}
