import chalk from "chalk";
import type { PipelineReporter } from "../core/downloader.js";

/**
 * Timestamped, labelled console lines. Warnings and failures go to stderr so
 * they stay visible when stdout is redirected.
 */
export class Logger implements PipelineReporter {
  constructor(private readonly verbose = false) {}

  info(message: string): void {
    this.print(chalk.bgBlue.black(" INFO "), chalk.cyan(message));
  }

  success(message: string): void {
    this.print(chalk.bgGreen.black(" OK "), chalk.greenBright(message));
  }

  warn(message: string): void {
    this.print(chalk.bgYellow.black(" WARN "), chalk.yellowBright(message), true);
  }

  error(message: string): void {
    this.print(chalk.bgRed.white(" ERROR "), chalk.redBright(message), true);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.print(chalk.bgGray.white(" DEBUG "), chalk.gray(message));
    }
  }

  private print(label: string, content: string, toError = false): void {
    const ts = chalk.gray(`[${new Date().toISOString()}]`);
    const line = `${ts} ${label} ${content}`;
    if (toError) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}
