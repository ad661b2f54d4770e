import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { ConfigError } from "./errors.js";
import { DEFAULT_PATTERNS, type StreamPatterns } from "./link.js";

export interface DiscoveryTiming {
  warmupMs: number;
  dwellMs: number;
  postClickMs: number;
  scrollSettleMs: number;
  sweepPostClickMs: number;
  sweepSettleMs: number;
  finalDwellMs: number;
  scrollIntoViewTimeoutMs: number;
  clickTimeoutMs: number;
  navigationTimeoutMs: number;
  maxScrollRounds: number;
}

export interface PipelineConfig {
  siteOrigin: string;
  userAgent: string;
  acceptLanguage: string;
  browserLocale: string;
  browserLanguage: string;
  headless: boolean;
  patterns: StreamPatterns;
  consentSelectors: string[];
  playSelectors: string[];
  timing: DiscoveryTiming;
  ffmpegPath: string;
  audioCodec: string;
  audioBitrate: string;
  minPartBytes: number;
  requestTimeoutMs: number;
  progressIntervalMs: number;
  recordPollIntervalMs: number;
  displayLimit: number;
}

const CHROME_UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.6613.84 Safari/537.36";

export const DEFAULT_TIMING: DiscoveryTiming = {
  warmupMs: 800,
  dwellMs: 10_000,
  postClickMs: 800,
  scrollSettleMs: 1000,
  sweepPostClickMs: 600,
  sweepSettleMs: 800,
  finalDwellMs: 1200,
  scrollIntoViewTimeoutMs: 1000,
  clickTimeoutMs: 800,
  navigationTimeoutMs: 60_000,
  maxScrollRounds: 25,
};

export const DEFAULT_CONFIG: PipelineConfig = {
  siteOrigin: "https://www.mujrozhlas.cz",
  userAgent: CHROME_UA,
  acceptLanguage: "cs,en-US;q=0.7,en;q=0.3",
  browserLocale: "cs-CZ",
  browserLanguage: "cs",
  headless: true,
  patterns: DEFAULT_PATTERNS,
  consentSelectors: [
    "#didomi-notice-agree-button",
    "#onetrust-accept-btn-handler",
    "button[data-testid='uc-accept-all-button']",
    "button:has-text('Souhlasím')",
    "button:has-text('Přijmout vše')",
    "button:has-text('Rozumím')",
  ],
  playSelectors: [
    "button[aria-label*='Přehrát']",
    "button[aria-label*='Přehrat']",
    "button[title*='Přehrát']",
    ".b-player__control--play",
    ".player__play",
    ".js-player-play",
    "button.play",
    "button[aria-label='Přehrát']",
  ],
  timing: DEFAULT_TIMING,
  ffmpegPath: "ffmpeg",
  audioCodec: "libmp3lame",
  audioBitrate: "192k",
  minPartBytes: 1024,
  requestTimeoutMs: 60_000,
  progressIntervalMs: 100,
  recordPollIntervalMs: 150,
  displayLimit: 6,
};

/**
 * Header set sent with every download and handed to ffmpeg for DASH
 * recording. `referer` is the page the user pointed us at.
 */
export function buildRequestHeaders(
  config: PipelineConfig,
  referer: string,
): Record<string, string> {
  return {
    "User-Agent": config.userAgent,
    Accept: "*/*",
    "Accept-Language": config.acceptLanguage,
    Origin: config.siteOrigin,
    Referer: referer,
    Pragma: "no-cache",
    "Cache-Control": "no-cache",
  };
}

const TIMING_KEYS = [
  "warmupMs",
  "dwellMs",
  "postClickMs",
  "scrollSettleMs",
  "sweepPostClickMs",
  "sweepSettleMs",
  "finalDwellMs",
  "scrollIntoViewTimeoutMs",
  "clickTimeoutMs",
  "navigationTimeoutMs",
  "maxScrollRounds",
] as const satisfies ReadonlyArray<keyof DiscoveryTiming>;

const TIMING_KEY_SET: ReadonlySet<string> = new Set(TIMING_KEYS);

const TOP_LEVEL_KEYS: ReadonlySet<string> = new Set([
  "userAgent",
  "acceptLanguage",
  "browserLocale",
  "browserLanguage",
  "headless",
  "consentSelectors",
  "playSelectors",
  "timing",
  "ffmpegPath",
  "audioCodec",
  "audioBitrate",
  "minPartBytes",
  "requestTimeoutMs",
  "progressIntervalMs",
  "recordPollIntervalMs",
  "displayLimit",
]);

export async function loadConfigFile(
  filePath: string,
  base: PipelineConfig = DEFAULT_CONFIG,
): Promise<PipelineConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${filePath}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid YAML: ${filePath}`, {
      cause: error,
    });
  }
  return applyConfigOverrides(base, parsed);
}

/**
 * Layers a parsed YAML document over `base`. An empty document keeps the
 * base untouched; unknown keys and wrong types are rejected.
 */
export function applyConfigOverrides(
  base: PipelineConfig,
  raw: unknown,
): PipelineConfig {
  if (raw === null || raw === undefined) {
    return base;
  }
  if (!isRecord(raw)) {
    throw new ConfigError("Config must be a mapping of setting names to values.");
  }
  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      throw new ConfigError(`Unknown config key: ${key}`);
    }
  }

  return {
    ...base,
    userAgent: readString(raw, "userAgent") ?? base.userAgent,
    acceptLanguage: readString(raw, "acceptLanguage") ?? base.acceptLanguage,
    browserLocale: readString(raw, "browserLocale") ?? base.browserLocale,
    browserLanguage: readString(raw, "browserLanguage") ?? base.browserLanguage,
    headless: readBoolean(raw, "headless") ?? base.headless,
    consentSelectors:
      readStringList(raw, "consentSelectors") ?? base.consentSelectors,
    playSelectors: readStringList(raw, "playSelectors") ?? base.playSelectors,
    timing:
      raw.timing === undefined
        ? base.timing
        : applyTimingOverrides(base.timing, raw.timing),
    ffmpegPath: readString(raw, "ffmpegPath") ?? base.ffmpegPath,
    audioCodec: readString(raw, "audioCodec") ?? base.audioCodec,
    audioBitrate: readString(raw, "audioBitrate") ?? base.audioBitrate,
    minPartBytes: readCount(raw, "minPartBytes") ?? base.minPartBytes,
    requestTimeoutMs:
      readCount(raw, "requestTimeoutMs") ?? base.requestTimeoutMs,
    progressIntervalMs:
      readCount(raw, "progressIntervalMs") ?? base.progressIntervalMs,
    recordPollIntervalMs:
      readCount(raw, "recordPollIntervalMs") ?? base.recordPollIntervalMs,
    displayLimit: readCount(raw, "displayLimit") ?? base.displayLimit,
  };
}

function applyTimingOverrides(
  base: DiscoveryTiming,
  raw: unknown,
): DiscoveryTiming {
  if (!isRecord(raw)) {
    throw new ConfigError("`timing` must be a mapping of millisecond values.");
  }
  for (const key of Object.keys(raw)) {
    if (!TIMING_KEY_SET.has(key)) {
      throw new ConfigError(`Unknown timing key: ${key}`);
    }
  }
  const next: DiscoveryTiming = { ...base };
  for (const key of TIMING_KEYS) {
    const value = readCount(raw, key, "timing.");
    if (value !== undefined) {
      next[key] = value;
    }
  }
  return next;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(
  raw: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`\`${key}\` must be a non-empty string.`);
  }
  return value;
}

function readBoolean(
  raw: Record<string, unknown>,
  key: string,
): boolean | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`\`${key}\` must be true or false.`);
  }
  return value;
}

function readCount(
  raw: Record<string, unknown>,
  key: string,
  prefix = "",
): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(
      `\`${prefix}${key}\` must be a non-negative integer.`,
    );
  }
  return value;
}

function readStringList(
  raw: Record<string, unknown>,
  key: string,
): string[] | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (
    !Array.isArray(value) ||
    !value.every((item): item is string => typeof item === "string")
  ) {
    throw new ConfigError(`\`${key}\` must be a list of CSS selectors.`);
  }
  return [...value];
}
