import { mkdir } from 'fs/promises';
import { join } from 'path';
import puppeteer, { type Browser, type Page } from 'puppeteer-core';
import type { Config, FetchOptions, FetchedPage } from '../types/index.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { findSelectedColorway, htmlToText } from './page-content.js';

/**
 * A rendered-page source shared by every item of a batch
 */
export interface BrowserSession {
  fetch(url: string, options?: FetchOptions): Promise<FetchedPage>;
  close(): Promise<void>;
}

export interface PageFetcher {
  open(): Promise<BrowserSession>;
}

function screenshotName(url: string): string {
  const slug = url
    .replace(/^https?:\/\//, '')
    .replace(/[^a-zA-Z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 80);
  return `${slug}-${Date.now()}`;
}

/**
 * One browser connection, one page per fetch.
 * Pages are independent so concurrent fetches on the same session don't interfere.
 */
class PuppeteerSession implements BrowserSession {
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly config: Config['browser']
  ) {}

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
    if (this.closed) {
      throw new FetchError(`Browser session already closed, cannot fetch ${url}`);
    }

    let page: Page | null = null;

    try {
      page = await this.browser.newPage();
      await page.setViewport({ width: 1920, height: 1080 });

      logger.debug('Loading page', { url, timeoutMs: this.config.pageTimeoutMs });

      const response = await page.goto(url, {
        waitUntil: 'networkidle2',
        timeout: this.config.pageTimeoutMs,
      });

      if (response && !response.ok()) {
        throw new FetchError(`Failed to crawl URL: ${url} (HTTP ${response.status()})`);
      }

      // Give client-rendered prices time to appear
      await new Promise(resolve => setTimeout(resolve, this.config.settleDelayMs));

      const html = await page.content();
      const content = htmlToText(html);
      const selectedColorway = findSelectedColorway(html, options.colorwaySelectors ?? []);
      const screenshotPath = await this.captureScreenshot(page, url);

      logger.debug('Page rendered', { url, htmlLength: html.length, textLength: content.length });

      return { url, content, selectedColorway, screenshotPath };
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(`Failed to crawl URL: ${url}: ${errorMessage(error)}`, { cause: error });
    } finally {
      if (page) {
        await page.close().catch((closeError: unknown) => {
          logger.debug('Failed to close page', { url, error: errorMessage(closeError) });
        });
      }
    }
  }

  /**
   * Screenshots are optional: a failure is logged and the page is still returned.
   */
  private async captureScreenshot(page: Page, url: string): Promise<string | null> {
    const dir = this.config.screenshotDir;
    if (!dir) return null;

    const path: `${string}.png` = `${join(dir, screenshotName(url))}.png`;
    try {
      await mkdir(dir, { recursive: true });
      await page.screenshot({ path, fullPage: true });
      return path;
    } catch (error) {
      logger.warn('Failed to capture screenshot', { url, path, error: errorMessage(error) });
      return null;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.browser.close();
    logger.info('Browser session closed');
  }
}

/**
 * Puppeteer page source.
 *
 * Connects to a remote browser when BROWSER_WS_ENDPOINT is set, otherwise
 * launches the local Chrome at CHROME_EXECUTABLE_PATH.
 */
export class PuppeteerClient implements PageFetcher {
  constructor(private readonly config: Config['browser']) {}

  async open(): Promise<BrowserSession> {
    try {
      const browser = this.config.wsEndpoint
        ? await puppeteer.connect({ browserWSEndpoint: this.config.wsEndpoint })
        : await puppeteer.launch({
            executablePath: this.config.executablePath,
            headless: true,
            args: ['--no-sandbox', '--disable-dev-shm-usage'],
          });

      logger.info('Browser session opened', {
        mode: this.config.wsEndpoint ? 'remote' : 'local',
      });

      return new PuppeteerSession(browser, this.config);
    } catch (error) {
      throw new FetchError(`Failed to open browser session: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
