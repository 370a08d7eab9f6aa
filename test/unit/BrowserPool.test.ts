import { describe, it, expect } from 'vitest';
import { BrowserPool } from '../../src/rasterize/BrowserPool.js';
import { RenderAbortedError } from '../../src/core/errors.js';
import { FakeBrowserDriver } from '../helpers/FakeBrowserDriver.js';
import { silentLogger } from '../helpers/fixtures.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('BrowserPool', () => {
  it('should close the session after the task succeeds', async () => {
    const driver = new FakeBrowserDriver();
    const pool = new BrowserPool(driver, { logger: silentLogger });

    const value = await pool.withSession(async () => 'done');

    expect(value).toBe('done');
    expect(driver.opened).toBe(1);
    expect(driver.closedSessions).toBe(1);
    expect(pool.activeSessions).toBe(0);
  });

  it('should close the session when the task throws', async () => {
    const driver = new FakeBrowserDriver();
    const pool = new BrowserPool(driver, { logger: silentLogger });

    await expect(
      pool.withSession(async () => {
        throw new Error('capture failed');
      })
    ).rejects.toThrow('capture failed');

    expect(driver.openSessions).toBe(0);
    expect(pool.activeSessions).toBe(0);
  });

  it('should cap concurrent contexts', async () => {
    const driver = new FakeBrowserDriver();
    const pool = new BrowserPool(driver, { maxContexts: 2, logger: silentLogger });

    await Promise.all(Array.from({ length: 5 }, () => pool.withSession(() => delay(10))));

    expect(driver.opened).toBe(5);
    expect(driver.peakSessions).toBe(2);
    expect(driver.openSessions).toBe(0);
  });

  it('should keep concurrent sessions isolated', async () => {
    const driver = new FakeBrowserDriver();
    const pool = new BrowserPool(driver, { maxContexts: 4, logger: silentLogger });

    const pages = await Promise.all(
      ['<p>a</p>', '<p>b</p>', '<p>c</p>', '<p>d</p>'].map(html =>
        pool.withSession(async session => {
          await session.setViewport({ width: 10, height: 10, deviceScaleFactor: 1 });
          await session.setContent(html, { timeoutMs: 1000 });
          return session.screenshot({ timeoutMs: 1000 });
        })
      )
    );

    expect(new Set(pages.map(page => page.toString('base64'))).size).toBe(4);
    expect(driver.peakSessions).toBeLessThanOrEqual(4);
  });

  it('should close the context immediately when aborted mid-task', async () => {
    const driver = new FakeBrowserDriver({ hang: true });
    const pool = new BrowserPool(driver, { logger: silentLogger });
    const controller = new AbortController();

    const pending = pool.withSession(session => session.setContent('<p>x</p>', { timeoutMs: 60_000 }), controller.signal);
    await delay(5);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RenderAbortedError);
    expect(driver.closedSessions).toBe(1);
    expect(pool.activeSessions).toBe(0);
  });

  it('should stop waiting for a context when aborted', async () => {
    const driver = new FakeBrowserDriver();
    const pool = new BrowserPool(driver, { maxContexts: 1, logger: silentLogger });
    const controller = new AbortController();

    const holder = pool.withSession(() => delay(30));
    const waiting = pool.withSession(async () => 'never', controller.signal);
    controller.abort();

    await expect(waiting).rejects.toThrow('Render aborted during waiting for a browser context');
    await holder;
    expect(driver.opened).toBe(1);
  });

  it('should refuse to start with an already aborted signal', async () => {
    const driver = new FakeBrowserDriver();
    const pool = new BrowserPool(driver, { logger: silentLogger });

    await expect(pool.withSession(async () => 1, AbortSignal.abort())).rejects.toBeInstanceOf(RenderAbortedError);
    expect(driver.opened).toBe(0);
  });

  it('should close the driver', async () => {
    const driver = new FakeBrowserDriver();
    await new BrowserPool(driver, { logger: silentLogger }).close();

    expect(driver.closed).toBe(true);
  });
});
