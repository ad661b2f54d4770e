const FALLBACK_NAME = "mujrozhlas";

/**
 * Final file name from the last non-empty path segment of the input URL,
 * e.g. `https://www.mujrozhlas.cz/vinohradska-12/duch` -> `duch.mp3`.
 */
export function outputFileNameFromUrl(url: string): string {
  let pathname = "";
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = "";
  }
  const segment = pathname
    .split("/")
    .filter((part) => part !== "")
    .pop();
  const decoded = safeDecode(segment ?? "").replace(/\.(mp3|mpd)$/i, "");
  return `${sanitizeFileNamePart(decoded)}.mp3`;
}

export function partFileName(index: number): string {
  return `${index.toString().padStart(2, "0")} part.mp3`;
}

export function sanitizeFileNamePart(value: string): string {
  const sanitized = value
    .replace(/[\\/:*?"<>|]/g, "_")
    .replace(/_+/g, "_")
    .replace(/\s+/g, " ")
    .trim();
  return sanitized === "" ? FALLBACK_NAME : sanitized;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
