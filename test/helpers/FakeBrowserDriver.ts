import { createHash } from 'node:crypto';
import sharp from 'sharp';
import { RenderTimeoutError } from '../../src/core/errors.js';
import type { BrowserDriver, BrowserSession, Viewport } from '../../src/rasterize/BrowserDriver.js';

export interface FakeBrowserOptions {
  /** Delay before setContent resolves. */
  loadDelayMs?: number;
  /** setContent never settles until the session is closed. */
  hang?: boolean;
  /** setContent rejects with a RenderTimeoutError. */
  timeout?: boolean;
}

/**
 * In-process browser stand-in. Screenshots are deterministic noise seeded by
 * the markup, sized to viewport times device scale, so byte length follows
 * pixel count the way a real capture does.
 */
export class FakeBrowserDriver implements BrowserDriver {
  opened = 0;
  closedSessions = 0;
  peakSessions = 0;
  closed = false;
  readonly loaded: string[] = [];
  private open = 0;

  constructor(private readonly options: FakeBrowserOptions = {}) {}

  get openSessions(): number {
    return this.open;
  }

  async openSession(): Promise<BrowserSession> {
    this.opened++;
    this.open++;
    this.peakSessions = Math.max(this.peakSessions, this.open);
    return new FakeSession(this, this.options);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  sessionClosed(): void {
    this.open--;
    this.closedSessions++;
  }
}

class FakeSession implements BrowserSession {
  private viewport: Viewport = { width: 800, height: 600, deviceScaleFactor: 1 };
  private html = '';
  private isClosed = false;
  private readonly closeListeners: Array<() => void> = [];

  constructor(
    private readonly driver: FakeBrowserDriver,
    private readonly options: FakeBrowserOptions
  ) {}

  async setViewport(viewport: Viewport): Promise<void> {
    this.viewport = viewport;
  }

  async setContent(html: string, options: { timeoutMs: number }): Promise<void> {
    if (this.options.timeout) {
      throw new RenderTimeoutError('page load', options.timeoutMs);
    }
    if (this.options.hang) {
      await new Promise<void>((_resolve, reject) => {
        this.closeListeners.push(() => reject(new Error('Target closed')));
      });
    }
    if (this.options.loadDelayMs) {
      await new Promise(resolve => setTimeout(resolve, this.options.loadDelayMs));
    }
    this.html = html;
    this.driver.loaded.push(html);
  }

  async screenshot(): Promise<Buffer> {
    const width = Math.round(this.viewport.width * this.viewport.deviceScaleFactor);
    const height = Math.round(this.viewport.height * this.viewport.deviceScaleFactor);
    const pixels = Buffer.alloc(width * height * 3);
    let state = createHash('sha256').update(this.html).digest().readUInt32BE(0);
    for (let i = 0; i < pixels.length; i++) {
      state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
      pixels[i] = state >>> 24;
    }
    return sharp(pixels, { raw: { width, height, channels: 3 } }).png({ compressionLevel: 1 }).toBuffer();
  }

  async pdf(options: { width: number; height: number }): Promise<Buffer> {
    const points = (px: number): number => Math.round(px * 0.75);
    return Buffer.from(
      [
        '%PDF-1.4',
        '1 0 obj << /Type /Catalog /Pages 2 0 R >> endobj',
        '2 0 obj << /Type /Pages /Kids [3 0 R] /Count 1 >> endobj',
        `3 0 obj << /Type /Page /Parent 2 0 R /MediaBox [0 0 ${points(options.width)} ${points(options.height)}] >> endobj`,
        'trailer << /Root 1 0 R >>',
        '%%EOF',
        '',
      ].join('\n'),
      'latin1'
    );
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    for (const listener of this.closeListeners.splice(0)) {
      listener();
    }
    this.driver.sessionClosed();
  }
}
