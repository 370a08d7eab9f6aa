import type { Browser, BrowserContext, Page } from 'puppeteer-core';
import puppeteer, { TimeoutError } from 'puppeteer-core';
import { RenderTimeoutError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger, errorMessage } from '../utils/Logger.js';
import type { BrowserDriver, BrowserSession, Viewport } from './BrowserDriver.js';

export interface PuppeteerBrowserDriverOptions {
  /** Chrome or Chromium binary. puppeteer-core never downloads one. */
  executablePath: string;
  /** Extra launch arguments. */
  args?: string[];
  logger?: ILogger;
}

const DEFAULT_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--font-render-hinting=none'];

/**
 * Turns puppeteer's TimeoutError into a RenderTimeoutError; other errors pass through.
 */
export async function mapTimeout<T>(stage: string, timeoutMs: number, task: Promise<T>): Promise<T> {
  try {
    return await task;
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new RenderTimeoutError(stage, timeoutMs, error);
    }
    throw error;
  }
}

class PuppeteerSession implements BrowserSession {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async setViewport(viewport: Viewport): Promise<void> {
    await this.page.setViewport(viewport);
  }

  async setContent(html: string, options: { timeoutMs: number }): Promise<void> {
    await mapTimeout(
      'page load',
      options.timeoutMs,
      this.page.setContent(html, { waitUntil: 'networkidle0', timeout: options.timeoutMs })
    );
  }

  async screenshot(options: { timeoutMs: number }): Promise<Buffer> {
    this.page.setDefaultTimeout(options.timeoutMs);
    const data = await mapTimeout(
      'screenshot',
      options.timeoutMs,
      this.page.screenshot({ type: 'png', fullPage: false, omitBackground: false })
    );
    return Buffer.from(data);
  }

  async pdf(options: { width: number; height: number; timeoutMs: number }): Promise<Buffer> {
    const data = await mapTimeout(
      'pdf',
      options.timeoutMs,
      this.page.pdf({
        width: `${options.width}px`,
        height: `${options.height}px`,
        printBackground: true,
        pageRanges: '1',
        timeout: options.timeoutMs,
      })
    );
    return Buffer.from(data);
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/**
 * Launches Chromium on first use and gives each session its own browser
 * context, so cookies, storage and cache never leak between renders.
 */
export class PuppeteerBrowserDriver implements BrowserDriver {
  private readonly options: PuppeteerBrowserDriverOptions;
  private readonly logger: ILogger;
  private browserPromise: Promise<Browser> | null = null;

  constructor(options: PuppeteerBrowserDriverOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger('warn', 'PuppeteerBrowserDriver');
  }

  async openSession(): Promise<BrowserSession> {
    const browser = await this.browser();
    const context = await browser.createBrowserContext();
    try {
      const page = await context.newPage();
      return new PuppeteerSession(context, page);
    } catch (error) {
      await context.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    const pending = this.browserPromise;
    this.browserPromise = null;
    if (!pending) {
      return;
    }
    try {
      const browser = await pending;
      await browser.close();
      this.logger.debug('Browser closed');
    } catch (error) {
      this.logger.warn('Browser did not close cleanly', { error: errorMessage(error) });
    }
  }

  private browser(): Promise<Browser> {
    if (!this.browserPromise) {
      this.logger.debug('Launching browser', { executablePath: this.options.executablePath });
      const launching = puppeteer.launch({
        executablePath: this.options.executablePath,
        headless: true,
        args: [...DEFAULT_ARGS, ...(this.options.args ?? [])],
      });
      // A failed launch is retried on the next session.
      void launching.catch(() => {
        if (this.browserPromise === launching) {
          this.browserPromise = null;
        }
      });
      this.browserPromise = launching;
    }
    return this.browserPromise;
  }
}
