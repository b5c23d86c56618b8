import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { extractHrefs } from './analyze';
import type { Config } from './types';

/** What the orchestrator gets back from rendering one URL. */
export interface RenderResult {
  status: number;
  finalUrl: string;
  html: string;
  title: string;
  /** Raw href values visible after scripts ran; the caller normalizes and filters them. */
  links: string[];
}

export interface RenderOptions {
  timeoutMs: number;
  /** Wait for lazy content and scroll to the bottom before capturing. */
  settle: boolean;
}

/**
 * A browsing context dedicated to one site. `open` resolves null when the navigation
 * produced no response and rejects on timeouts and navigation errors.
 */
export interface PageRenderer {
  open(url: string, options: RenderOptions): Promise<RenderResult | null>;
  close(): Promise<void>;
}

export type RendererFactory = () => Promise<PageRenderer>;

// Rotated per site
const USER_AGENTS = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:121.0) Gecko/20100101 Firefox/121.0',
];

const HIDE_AUTOMATION = `
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
  Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
`;

const SCROLL_TO_BOTTOM = 'window.scrollTo(0, document.body.scrollHeight)';

/** Headless Chromium renderer: one browser, one context and one tab per site. */
export class PlaywrightRenderer implements PageRenderer {
  private closed = false;

  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly config: Config
  ) {}

  /**
   * Launches a fresh browser for one site.
   * The browser is closed again if the context cannot be set up.
   */
  static async launch(config: Config): Promise<PlaywrightRenderer> {
    const browser = await chromium.launch({
      headless: config.headless,
      args: ['--disable-blink-features=AutomationControlled', '--no-sandbox', '--disable-dev-shm-usage'],
    });
    try {
      const context = await browser.newContext({
        userAgent: USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)],
        viewport: { width: 1920, height: 1080 },
        ignoreHTTPSErrors: true,
        locale: 'en-US',
        timezoneId: 'America/New_York',
      });
      await context.addInitScript(HIDE_AUTOMATION);
      const page = await context.newPage();
      return new PlaywrightRenderer(browser, context, page, config);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async open(url: string, { timeoutMs, settle }: RenderOptions): Promise<RenderResult | null> {
    const response = await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
    if (!response) return null;

    const status = response.status();
    if (status >= 400) return { status, finalUrl: this.page.url(), html: '', title: '', links: [] };

    if (settle) {
      await this.page.waitForTimeout(this.config.settleDelayMs);
      try {
        await this.page.evaluate(SCROLL_TO_BOTTOM);
        await this.page.waitForTimeout(this.config.scrollSettleMs);
      } catch (err) {
        // Capture proceeds without the scroll
        console.warn(`  scroll failed on ${url}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    const html = await this.page.content();
    return {
      status,
      finalUrl: this.page.url(),
      html,
      title: await this.page.title(),
      links: extractHrefs(html),
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.context.close();
    await this.browser.close();
  }
}

/** Factory used by the run coordinator: a new browser per admitted site. */
export function playwrightRendererFactory(config: Config): RendererFactory {
  return () => PlaywrightRenderer.launch(config);
}
