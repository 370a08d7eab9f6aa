/**
 * Minimal headless browser surface the rasterizer needs. Implemented over
 * puppeteer-core in production and by an in-process fake in tests.
 */

export interface Viewport {
  width: number;
  height: number;
  deviceScaleFactor: number;
}

/**
 * An isolated browsing context with a single page.
 */
export interface BrowserSession {
  setViewport(viewport: Viewport): Promise<void>;
  /** Loads markup and waits until the network is idle. */
  setContent(html: string, options: { timeoutMs: number }): Promise<void>;
  /** PNG of the viewport. */
  screenshot(options: { timeoutMs: number }): Promise<Buffer>;
  /** Single-page PDF of the given CSS pixel size, with backgrounds. */
  pdf(options: { width: number; height: number; timeoutMs: number }): Promise<Buffer>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  /** Opens a fresh isolated context. */
  openSession(): Promise<BrowserSession>;
  /** Shuts the browser down. */
  close(): Promise<void>;
}
