import { chromium, errors, Browser, BrowserContext, Page } from "playwright";
import { PageSource, PageSession } from "./pageSource";
import { componentLogger } from "../logging/logger";

export const DEFAULT_VIEWPORT = { width: 1280, height: 720 };
export const DEFAULT_SETTLE_MS = 750;
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
export const DEFAULT_ACCEPT_LANGUAGE = "es-CL,es;q=0.9,en;q=0.8";

const log = componentLogger("browser");

export interface BrowserOptions {
  headless: boolean;
  userAgent?: string;
  settleMs?: number;
}

export async function launchChromium(options: BrowserOptions): Promise<Browser> {
  return chromium.launch({
    headless: options.headless,
    args: ["--no-sandbox", "--disable-dev-shm-usage", "--disable-blink-features=AutomationControlled"]
  });
}

export async function newContext(
  browser: Browser,
  userAgent = DEFAULT_USER_AGENT,
  viewport = DEFAULT_VIEWPORT
): Promise<BrowserContext> {
  return browser.newContext({
    viewport,
    userAgent,
    locale: "es-CL",
    extraHTTPHeaders: {
      "Accept-Language": DEFAULT_ACCEPT_LANGUAGE
    }
  });
}

export class PlaywrightPageSource implements PageSource {
  constructor(
    private readonly page: Page,
    private readonly settleMs: number = DEFAULT_SETTLE_MS
  ) {}

  currentUrl(): string {
    return this.page.url();
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: "load", timeout: timeoutMs });
    } catch (error) {
      if (!(error instanceof errors.TimeoutError)) throw error;
      log.warn({ url }, "load timed out, retrying until DOMContentLoaded");
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
    }
    await this.settle();
  }

  async click(locator: string): Promise<void> {
    await this.page.click(locator);
    await this.page.waitForLoadState("load");
    await this.settle();
  }

  async selectOption(locator: string, value: string): Promise<void> {
    await this.page.selectOption(locator, value);
    await this.settle();
  }

  async waitForClickable(locator: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.locator(locator).first().waitFor({ state: "visible", timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) return false;
      throw error;
    }
  }

  private async settle(): Promise<void> {
    if (this.settleMs > 0) {
      await this.page.waitForTimeout(this.settleMs);
    }
  }
}

/**
 * One browser, context and page per run, closed on every exit path.
 */
export function playwrightSession(options: BrowserOptions): PageSession {
  return async (use) => {
    const browser = await launchChromium(options);
    try {
      const context = await newContext(browser, options.userAgent);
      const page = await context.newPage();
      try {
        return await use(new PlaywrightPageSource(page, options.settleMs));
      } finally {
        await page.close().catch((error: unknown) => log.warn({ err: error }, "page close failed"));
        await context.close().catch((error: unknown) => log.warn({ err: error }, "context close failed"));
      }
    } finally {
      await browser.close();
      log.info("browser closed");
    }
  };
}
