import { RenderAbortedError, throwIfAborted } from '../core/errors.js';
import { Semaphore } from '../utils/concurrency.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger, errorMessage } from '../utils/Logger.js';
import type { BrowserDriver, BrowserSession } from './BrowserDriver.js';

export interface BrowserPoolOptions {
  /**
   * Browser contexts open at once. Each costs roughly 50-150 MB.
   * @default 4
   */
  maxContexts?: number;
  logger?: ILogger;
}

export const DEFAULT_MAX_CONTEXTS = 4;

/**
 * Hands out isolated browser sessions under a fixed concurrency cap.
 * A session never outlives the callback it was lent to.
 */
export class BrowserPool {
  private readonly driver: BrowserDriver;
  private readonly semaphore: Semaphore;
  private readonly logger: ILogger;

  constructor(driver: BrowserDriver, options: BrowserPoolOptions = {}) {
    this.driver = driver;
    this.semaphore = new Semaphore(options.maxContexts ?? DEFAULT_MAX_CONTEXTS);
    this.logger = options.logger ?? createLogger('warn', 'BrowserPool');
  }

  get activeSessions(): number {
    return this.semaphore.active;
  }

  /**
   * Runs `task` with a fresh session. The session is closed on every exit
   * path, and right away if `signal` aborts while the task is running.
   */
  async withSession<T>(task: (session: BrowserSession) => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      await this.semaphore.acquire(signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new RenderAbortedError('waiting for a browser context');
      }
      throw error;
    }

    let session: BrowserSession | undefined;
    let closing: Promise<void> | undefined;
    const closeSession = (): Promise<void> => {
      if (!closing && session) {
        const current = session;
        closing = current.close().catch((error: unknown) => {
          this.logger.warn('Browser context did not close cleanly', { error: errorMessage(error) });
        });
      }
      return closing ?? Promise.resolve();
    };
    const onAbort = (): void => {
      void closeSession();
    };

    try {
      throwIfAborted(signal, 'rasterization');
      session = await this.driver.openSession();
      signal?.addEventListener('abort', onAbort, { once: true });
      throwIfAborted(signal, 'rasterization');
      return await task(session);
    } catch (error) {
      if (signal?.aborted) {
        throw new RenderAbortedError('rasterization');
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await closeSession();
      this.semaphore.release();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
