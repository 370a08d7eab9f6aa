export type { BrowserDriver, BrowserSession, Viewport } from './BrowserDriver.js';
export { BrowserPool, DEFAULT_MAX_CONTEXTS } from './BrowserPool.js';
export type { BrowserPoolOptions } from './BrowserPool.js';
export { PuppeteerBrowserDriver } from './PuppeteerBrowserDriver.js';
export type { PuppeteerBrowserDriverOptions } from './PuppeteerBrowserDriver.js';
export { VisualRasterizer, MAX_DIMENSION, MAX_SCALE, MIN_SCALE } from './VisualRasterizer.js';
export type { RasterizeOptions } from './VisualRasterizer.js';
