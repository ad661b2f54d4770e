/**
 * URL routing for the media origin: which observed URLs are DASH manifests,
 * DASH segments or plain MP3 files, and how a manifest URL is derived from a
 * segment URL. Everything here is pure.
 */
export type StreamKind = "manifest" | "segment" | "direct-audio" | "unrelated";

export interface StreamPatterns {
  /** Tested against the lower-cased hostname. */
  mediaHost: RegExp;
  manifest: RegExp;
  /** Tested against the last path component only. */
  segmentFile: RegExp;
  directAudio: RegExp;
  manifestFileName: string;
}

export interface CandidateUrl {
  readonly url: string;
  readonly host: string;
  readonly path: string;
  readonly query: string;
  readonly kind: StreamKind;
}

// Wowza-style DASH naming used by croaod.cz: chunk_ctaudio_..._cn42_mpd.m4s
export const DEFAULT_PATTERNS: StreamPatterns = {
  mediaHost: /(^|\.)croaod\.cz$/i,
  manifest: /\.mpd$/i,
  segmentFile: /_mpd\.m4s$/i,
  directAudio: /\.mp3$/i,
  manifestFileName: "manifest.mpd",
};

export function isMediaHost(
  host: string,
  patterns: StreamPatterns = DEFAULT_PATTERNS,
): boolean {
  return host !== "" && patterns.mediaHost.test(host.toLowerCase());
}

export function classifyStreamUrl(
  url: string,
  patterns: StreamPatterns = DEFAULT_PATTERNS,
): StreamKind {
  const parsed = parseUrl(url);
  if (!parsed || !isMediaHost(parsed.hostname, patterns)) {
    return "unrelated";
  }
  const pathname = parsed.pathname;
  if (patterns.manifest.test(pathname)) {
    return "manifest";
  }
  if (patterns.segmentFile.test(lastPathComponent(pathname))) {
    return "segment";
  }
  if (patterns.directAudio.test(pathname)) {
    return "direct-audio";
  }
  return "unrelated";
}

export function toCandidate(
  url: string,
  patterns: StreamPatterns = DEFAULT_PATTERNS,
): CandidateUrl {
  const parsed = parseUrl(url);
  return {
    url,
    host: parsed?.hostname ?? "",
    path: parsed?.pathname ?? "",
    query: parsed?.search ?? "",
    kind: classifyStreamUrl(url, patterns),
  };
}

/**
 * Swaps the segment file for the manifest sitting next to it, e.g.
 * `.../stream.m4a/chunk_ctaudio_cn7_mpd.m4s?token=x` becomes
 * `.../stream.m4a/manifest.mpd?token=x`. Returns null when the URL does not
 * follow the segment naming.
 */
export function inferManifestFromSegment(
  url: string,
  patterns: StreamPatterns = DEFAULT_PATTERNS,
): string | null {
  const parsed = parseUrl(url);
  if (!parsed) {
    return null;
  }
  const last = lastPathComponent(parsed.pathname);
  if (last === "" || !patterns.segmentFile.test(last)) {
    return null;
  }
  const dir = parsed.pathname.slice(0, parsed.pathname.length - last.length);
  parsed.pathname = `${dir}${patterns.manifestFileName}`;
  return parsed.toString();
}

function lastPathComponent(pathname: string): string {
  const index = pathname.lastIndexOf("/");
  return index < 0 ? pathname : pathname.slice(index + 1);
}

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}
