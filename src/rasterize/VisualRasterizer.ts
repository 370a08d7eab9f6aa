/**
 * Converts final markup into a PNG or PDF with a headless browser.
 */

import type { PngOptimizationOptions, PngOptimizationPreset, RasterFormat } from '../types/index.js';
import { InvalidInputError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { PngOptimizer } from '../utils/PngOptimizer.js';
import type { BrowserPool } from './BrowserPool.js';

export interface RasterizeOptions {
  format: RasterFormat;
  /** CSS pixels. */
  width: number;
  /** CSS pixels. */
  height: number;
  /** Device scale factor for PNG, 1-3. */
  scale: number;
  timeoutMs: number;
  pngOptimization?: PngOptimizationPreset | PngOptimizationOptions;
  signal?: AbortSignal;
}

export const MIN_SCALE = 1;
export const MAX_SCALE = 3;
export const MAX_DIMENSION = 10_000;

export class VisualRasterizer {
  private readonly pool: BrowserPool;
  private readonly optimizer: PngOptimizer;
  private readonly logger: ILogger;

  constructor(pool: BrowserPool, logger?: ILogger) {
    this.pool = pool;
    this.logger = logger ?? createLogger('warn', 'VisualRasterizer');
    this.optimizer = new PngOptimizer(this.logger.child('PngOptimizer'));
  }

  async rasterize(html: string, options: RasterizeOptions): Promise<Buffer> {
    validateRasterOptions(options);
    const { format, width, height, timeoutMs, signal } = options;
    // PDF output is vector; device scale only matters for bitmaps.
    const scale = format === 'pdf' ? 1 : options.scale;
    const started = Date.now();

    const data = await this.pool.withSession(async session => {
      await session.setViewport({ width, height, deviceScaleFactor: scale });
      await session.setContent(html, { timeoutMs });
      return format === 'pdf' ? session.pdf({ width, height, timeoutMs }) : session.screenshot({ timeoutMs });
    }, signal);

    const output =
      format === 'png' && options.pngOptimization !== undefined && options.pngOptimization !== 'none'
        ? await this.optimizer.optimize(data, options.pngOptimization)
        : data;

    this.logger.debug('Rasterized markup', {
      format,
      width,
      height,
      scale,
      bytes: output.length,
      ms: Date.now() - started,
    });
    return output;
  }
}

function validateRasterOptions(options: RasterizeOptions): void {
  const { width, height, scale } = options;
  for (const [name, value] of [
    ['width', width],
    ['height', height],
  ] as const) {
    if (!Number.isInteger(value) || value < 1 || value > MAX_DIMENSION) {
      throw new InvalidInputError(`${name} must be an integer between 1 and ${MAX_DIMENSION}, got ${value}`);
    }
  }
  if (!Number.isFinite(scale) || scale < MIN_SCALE || scale > MAX_SCALE) {
    throw new InvalidInputError(`scale must be between ${MIN_SCALE} and ${MAX_SCALE}, got ${scale}`);
  }
  if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
    throw new InvalidInputError(`timeoutMs must be positive, got ${options.timeoutMs}`);
  }
}
