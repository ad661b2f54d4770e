import {
  openPlaywrightSession,
  type BrowserSession,
  type ClickOutcome,
  type ClickTiming,
  type SessionFactory,
} from "./browser.js";
import type { PipelineConfig } from "./config.js";
import {
  DEFAULT_PATTERNS,
  inferManifestFromSegment,
  toCandidate,
  type CandidateUrl,
  type StreamPatterns,
} from "./link.js";

export type ClickTally = Record<ClickOutcome, number>;

export interface DiscoveryResult {
  /** Manifests and MP3s to retrieve, in the order they were first seen. */
  urls: string[];
  observed: CandidateUrl[];
  clicks: ClickTally;
  scrollRounds: number;
}

export interface DiscoveryOptions {
  config: PipelineConfig;
  openSession?: SessionFactory;
  onStream?: (candidate: CandidateUrl) => void;
}

/**
 * Media-origin URLs seen during one browser session. Insertion ordered,
 * deduplicated on the exact URL string, never shrinks.
 */
export class DiscoverySet {
  private readonly entries = new Map<string, CandidateUrl>();
  private readonly ignored = new Set<string>();

  constructor(private readonly patterns: StreamPatterns = DEFAULT_PATTERNS) {}

  /** Returns the candidate when the URL is new and stream related. */
  observe(url: string): CandidateUrl | null {
    if (this.entries.has(url) || this.ignored.has(url)) {
      return null;
    }
    const candidate = toCandidate(url, this.patterns);
    if (candidate.kind === "unrelated") {
      this.ignored.add(url);
      return null;
    }
    this.entries.set(url, candidate);
    return candidate;
  }

  get size(): number {
    return this.entries.size;
  }

  list(): CandidateUrl[] {
    return [...this.entries.values()];
  }
}

/**
 * Manifests and MP3s win. Only when neither showed up are the segments
 * mapped back to the manifests they belong to.
 */
export function selectStreamUrls(
  observed: readonly CandidateUrl[],
  patterns: StreamPatterns = DEFAULT_PATTERNS,
): string[] {
  const direct = observed
    .filter((c) => c.kind === "manifest" || c.kind === "direct-audio")
    .map((c) => c.url);
  if (direct.length > 0) {
    return direct;
  }

  const inferred = new Set<string>();
  for (const candidate of observed) {
    if (candidate.kind !== "segment") {
      continue;
    }
    const manifest = inferManifestFromSegment(candidate.url, patterns);
    if (manifest) {
      inferred.add(manifest);
    }
  }
  return [...inferred];
}

/**
 * Loads `pageUrl` in a scripted browser session and records every stream
 * URL the page's players request: warm up on the site root, dismiss consent
 * banners, press play, dwell, sweep down the page for lazily mounted
 * players, dwell once more. The browser is always closed.
 */
export async function collectStreamUrls(
  pageUrl: string,
  options: DiscoveryOptions,
): Promise<DiscoveryResult> {
  const { config, onStream } = options;
  const timing = config.timing;
  const openSession = options.openSession ?? openPlaywrightSession;
  const found = new DiscoverySet(config.patterns);
  const clicks: ClickTally = { clicked: 0, "not-found": 0, "timed-out": 0 };
  let scrollRounds = 0;

  const session = await openSession(config);
  let completed = false;
  try {
    session.onUrl((url) => {
      const candidate = found.observe(url);
      if (candidate) {
        onStream?.(candidate);
      }
    });

    await session.goto(`${config.siteOrigin}/`);
    await session.wait(timing.warmupMs);
    await session.goto(pageUrl);

    await clickEach(session, config.consentSelectors, clicks, {
      scrollIntoViewTimeoutMs: timing.scrollIntoViewTimeoutMs,
      clickTimeoutMs: timing.clickTimeoutMs,
      pauseAfterClickMs: 0,
    });
    await pressPlay(session, config, clicks, timing.postClickMs);

    await session.wait(timing.dwellMs);
    scrollRounds = await sweepLazyPlayers(session, config, clicks);
    await session.wait(timing.finalDwellMs);
    completed = true;
  } finally {
    await closeSession(session, completed);
  }

  const observed = found.list();
  return {
    urls: selectStreamUrls(observed, config.patterns),
    observed,
    clicks,
    scrollRounds,
  };
}

// A close failure only surfaces when nothing else went wrong first.
async function closeSession(
  session: BrowserSession,
  completed: boolean,
): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    if (completed) {
      throw error;
    }
  }
}

async function clickEach(
  session: BrowserSession,
  selectors: readonly string[],
  clicks: ClickTally,
  timing: ClickTiming,
): Promise<void> {
  for (const selector of selectors) {
    const outcome = await session.attemptClick(selector, timing);
    clicks[outcome] += 1;
  }
}

async function pressPlay(
  session: BrowserSession,
  config: PipelineConfig,
  clicks: ClickTally,
  pauseAfterClickMs: number,
): Promise<void> {
  await clickEach(session, config.playSelectors, clicks, {
    scrollIntoViewTimeoutMs: config.timing.scrollIntoViewTimeoutMs,
    clickTimeoutMs: config.timing.clickTimeoutMs,
    pauseAfterClickMs,
  });
}

// Stops once the page height stops growing, or after maxScrollRounds.
async function sweepLazyPlayers(
  session: BrowserSession,
  config: PipelineConfig,
  clicks: ClickTally,
): Promise<number> {
  const timing = config.timing;
  let lastHeight = await session.scrollHeight();
  let rounds = 0;
  while (rounds < timing.maxScrollRounds) {
    rounds += 1;
    await session.scrollToBottom();
    await session.wait(timing.scrollSettleMs);
    await pressPlay(session, config, clicks, timing.sweepPostClickMs);
    await session.wait(timing.sweepSettleMs);
    const height = await session.scrollHeight();
    if (height <= lastHeight) {
      break;
    }
    lastHeight = height;
  }
  return rounds;
}
