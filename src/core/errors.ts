/**
 * Fatal, user-visible failure of the whole run. The CLI exits with
 * `exitCode` after printing the message.
 */
export class PipelineError extends Error {
  readonly exitCode: number;

  constructor(message: string, options: { exitCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PipelineError";
    this.exitCode = options.exitCode ?? 2;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { exitCode: 2, cause: options.cause });
    this.name = "ConfigError";
  }
}

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""} for ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

export class FfmpegExitError extends Error {
  readonly exitCode: number;

  constructor(exitCode: number, action: string) {
    super(`ffmpeg ${action} failed with exit code ${exitCode}`);
    this.name = "FfmpegExitError";
    this.exitCode = exitCode;
  }
}

export class AssemblyError extends Error {
  readonly stderr: string | undefined;

  constructor(message: string, options: { stderr?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AssemblyError";
    this.stderr = options.stderr;
  }
}
