import { CommanderError } from "commander";
import { PipelineError } from "../core/errors.js";

/**
 * 0 for `--help`/`--version`, 2 for usage errors and pipeline preconditions
 * (missing ffmpeg, no streams, no parts, bad config), 1 for anything else.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : 2;
  }
  return error instanceof PipelineError ? error.exitCode : 1;
}

/** Message plus up to four levels of `cause`, joined with ` | `. */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts: string[] = [error.message];
  let current: unknown = error;
  let guard = 0;
  while (current instanceof Error && guard < 4) {
    guard += 1;
    const cause: unknown = current.cause;
    if (cause === undefined || cause === null) {
      break;
    }
    if (cause instanceof Error) {
      parts.push(`cause=${cause.message}`);
      const code = "code" in cause ? cause.code : undefined;
      if (typeof code === "string") {
        parts.push(`code=${code}`);
      }
      current = cause;
    } else {
      parts.push(`cause=${String(cause)}`);
      break;
    }
  }
  return parts.join(" | ");
}
