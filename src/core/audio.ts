import { copyFile, mkdtemp, rename, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { AssemblyError } from "./errors.js";
import { buildConcatArgs, runFfmpeg } from "./ffmpeg.js";

export interface ConcatOptions {
  ffmpegPath: string;
}

/**
 * Concat-demuxer list for `parts`, in order. Single quotes inside a path
 * are closed, escaped and reopened the way the demuxer expects.
 */
export function buildConcatList(parts: string[]): string {
  return parts
    .map((part) => {
      const posix = path.resolve(part).split(path.sep).join("/");
      return `file '${posix.replace(/'/g, "'\\''")}'\n`;
    })
    .join("");
}

/**
 * Joins same-codec MP3 parts without re-encoding. The result is written
 * next to `output` and renamed into place, so `output` never holds a
 * half-written file.
 */
export async function concatenateParts(
  parts: string[],
  output: string,
  options: ConcatOptions,
): Promise<void> {
  if (parts.length === 0) {
    throw new AssemblyError("Nothing to merge: no parts were given.");
  }
  const staging = `${output}.part`;

  if (parts.length === 1) {
    // A single part is already the whole recording.
    try {
      await copyFile(parts[0], staging);
      await rename(staging, output);
    } catch (error) {
      await rm(staging, { force: true });
      throw new AssemblyError(`Cannot write ${output}`, { cause: error });
    }
    return;
  }

  const listDir = await mkdtemp(path.join(os.tmpdir(), "rozhlas_concat_"));
  try {
    const listFile = path.join(listDir, "list.txt");
    await writeFile(listFile, buildConcatList(parts), "utf-8");
    const result = await runFfmpeg(
      options.ffmpegPath,
      buildConcatArgs(listFile, staging),
      { captureStderr: true },
    );
    if (result.exitCode !== 0) {
      await rm(staging, { force: true });
      throw new AssemblyError(
        `ffmpeg concat failed with exit code ${result.exitCode}${
          result.stderr.trim() ? `: ${result.stderr.trim()}` : ""
        }`,
        { stderr: result.stderr },
      );
    }
    await rename(staging, output);
  } finally {
    await rm(listDir, { recursive: true, force: true });
  }
}
