import type { PipelineConfig } from "./config.js";
import {
  collectStreamUrls,
  type DiscoveryOptions,
  type DiscoveryResult,
} from "./discovery.js";
import { PipelineError } from "./errors.js";
import { classifyStreamUrl, inferManifestFromSegment, isMediaHost } from "./link.js";

export type StreamDiscoverer = (
  pageUrl: string,
  options: DiscoveryOptions,
) => Promise<DiscoveryResult>;

export interface ResolveOptions {
  config: PipelineConfig;
  discover?: StreamDiscoverer;
  onStream?: DiscoveryOptions["onStream"];
}

export interface Resolution {
  urls: string[];
  /** Set when the browser had to be driven to find the streams. */
  discovery: DiscoveryResult | null;
}

/**
 * A URL on the media origin is used as given (a captured segment is turned
 * into its manifest); anything else is treated as a page to sniff.
 */
export async function resolveStreamUrls(
  inputUrl: string,
  options: ResolveOptions,
): Promise<Resolution> {
  const { config } = options;
  const host = parseHttpHost(inputUrl);
  if (host === null) {
    throw new PipelineError(
      `Not an http(s) URL: ${inputUrl}. Pass a mujrozhlas.cz page or a croaod.cz stream URL.`,
    );
  }

  if (isMediaHost(host, config.patterns)) {
    if (classifyStreamUrl(inputUrl, config.patterns) === "segment") {
      const manifest = inferManifestFromSegment(inputUrl, config.patterns);
      return { urls: manifest ? [manifest] : [], discovery: null };
    }
    return { urls: [inputUrl], discovery: null };
  }

  const discover = options.discover ?? collectStreamUrls;
  const discovery = await discover(inputUrl, {
    config,
    onStream: options.onStream,
  });
  return { urls: discovery.urls, discovery };
}

function parseHttpHost(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return null;
    }
    return parsed.hostname;
  } catch {
    return null;
  }
}
