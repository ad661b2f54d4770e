import { execa } from "execa";

export interface FfmpegResult {
  /** -1 when ffmpeg could not be started or was killed by a signal. */
  exitCode: number;
  stderr: string;
}

export interface RecordArgsInput {
  manifestUrl: string;
  destination: string;
  userAgent: string;
  headers: Record<string, string>;
  audioCodec: string;
  audioBitrate: string;
}

export async function hasFfmpeg(binary: string): Promise<boolean> {
  const result = await execa(binary, ["-version"], {
    reject: false,
    stdio: "ignore",
  });
  return !result.failed;
}

export async function runFfmpeg(
  binary: string,
  args: string[],
  options: { captureStderr?: boolean } = {},
): Promise<FfmpegResult> {
  const result = await execa(binary, args, {
    reject: false,
    stdin: "ignore",
    stdout: "ignore",
    stderr: options.captureStderr ? "pipe" : "ignore",
  });
  return {
    exitCode: result.exitCode ?? -1,
    stderr: typeof result.stderr === "string" ? result.stderr : "",
  };
}

/**
 * ffmpeg's `-headers` takes one CRLF-terminated `Name: value` line per
 * header. The user agent travels separately through `-user_agent`.
 */
export function serializeFfmpegHeaders(
  headers: Record<string, string>,
): string {
  return Object.entries(headers)
    .filter(([name]) => name.toLowerCase() !== "user-agent")
    .map(([name, value]) => `${name}: ${value}\r\n`)
    .join("");
}

export function buildRecordArgs(input: RecordArgsInput): string[] {
  return [
    "-nostdin",
    "-user_agent",
    input.userAgent,
    "-headers",
    serializeFfmpegHeaders(input.headers),
    "-i",
    input.manifestUrl,
    "-vn",
    "-c:a",
    input.audioCodec,
    "-b:a",
    input.audioBitrate,
    "-y",
    input.destination,
  ];
}

export function buildConcatArgs(listFile: string, output: string): string[] {
  return [
    "-loglevel",
    "error",
    "-nostdin",
    "-f",
    "concat",
    "-safe",
    "0",
    "-i",
    listFile,
    "-c",
    "copy",
    "-f",
    "mp3",
    "-y",
    output,
  ];
}
