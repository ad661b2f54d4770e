import {
  chromium,
  errors,
  type Browser,
  type BrowserContext,
  type Locator,
  type Page,
} from "playwright";
import type { PipelineConfig } from "./config.js";

export type ClickOutcome = "clicked" | "not-found" | "timed-out";

export interface ClickTiming {
  scrollIntoViewTimeoutMs: number;
  clickTimeoutMs: number;
  pauseAfterClickMs: number;
}

/**
 * The slice of a browser the stream sniffer needs. Interactions that may
 * legitimately miss (consent banners, play buttons) report an outcome
 * instead of throwing.
 */
export interface BrowserSession {
  onUrl(listener: (url: string) => void): void;
  goto(url: string): Promise<void>;
  wait(ms: number): Promise<void>;
  attemptClick(selector: string, timing: ClickTiming): Promise<ClickOutcome>;
  scrollHeight(): Promise<number>;
  scrollToBottom(): Promise<void>;
  close(): Promise<void>;
}

export type SessionFactory = (config: PipelineConfig) => Promise<BrowserSession>;

class PlaywrightSession implements BrowserSession {
  private readonly listeners: Array<(url: string) => void> = [];

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number,
  ) {
    // Context scope also sees popups and service-worker fetches.
    context.on("request", (request) => this.emit(request.url()));
    context.on("response", (response) => this.emit(response.url()));
  }

  onUrl(listener: (url: string) => void): void {
    this.listeners.push(listener);
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: this.navigationTimeoutMs,
    });
  }

  async wait(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async attemptClick(
    selector: string,
    timing: ClickTiming,
  ): Promise<ClickOutcome> {
    let matches: Locator[];
    try {
      matches = await this.page.locator(selector).all();
    } catch {
      return "not-found";
    }

    let outcome: ClickOutcome = "not-found";
    for (const element of matches) {
      try {
        await element.scrollIntoViewIfNeeded({
          timeout: timing.scrollIntoViewTimeoutMs,
        });
        await element.click({ timeout: timing.clickTimeoutMs });
        outcome = "clicked";
        if (timing.pauseAfterClickMs > 0) {
          await this.page.waitForTimeout(timing.pauseAfterClickMs);
        }
      } catch (error) {
        if (outcome !== "clicked" && error instanceof errors.TimeoutError) {
          outcome = "timed-out";
        }
      }
    }
    return outcome;
  }

  async scrollHeight(): Promise<number> {
    const height: unknown = await this.page.evaluate(
      "document.body ? document.body.scrollHeight : 0",
    );
    return typeof height === "number" ? height : 0;
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(
      "window.scrollTo(0, document.body ? document.body.scrollHeight : 0)",
    );
  }

  async close(): Promise<void> {
    const contextClosed = await this.context.close().then(
      () => null,
      (error: unknown) => ({ error }),
    );
    await this.browser.close();
    if (contextClosed !== null) {
      throw contextClosed.error;
    }
  }

  private emit(url: string): void {
    for (const listener of this.listeners) {
      listener(url);
    }
  }
}

/**
 * Headless Chromium dressed up as a Czech desktop browser.
 */
export async function openPlaywrightSession(
  config: PipelineConfig,
): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: config.headless,
    args: [`--lang=${config.browserLanguage}`],
  });
  try {
    const context = await browser.newContext({
      userAgent: config.userAgent,
      locale: config.browserLocale,
      extraHTTPHeaders: { "Accept-Language": config.acceptLanguage },
    });
    const page = await context.newPage();
    return new PlaywrightSession(
      browser,
      context,
      page,
      config.timing.navigationTimeoutMs,
    );
  } catch (error) {
    await browser.close();
    throw error;
  }
}
