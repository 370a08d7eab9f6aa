/**
 * Post-capture PNG recompression with sharp.
 */

import type { PngOptimizationPreset, PngOptimizationOptions } from '../types/options.js';
import type { ILogger } from './Logger.js';
import { createLogger, errorMessage } from './Logger.js';

/**
 * Preset configurations for PNG optimization.
 *
 * Chromium already writes reasonably compressed PNGs, so the lossless presets
 * gain a few percent. Palette quantization ('web') is where most of the
 * reduction comes from, at the cost of banding on photos and gradients.
 */
export const PNG_PRESETS: Record<PngOptimizationPreset, PngOptimizationOptions> = {
  none: {},

  fast: {
    compressionLevel: 6,
    adaptiveFiltering: true,
  },

  balanced: {
    compressionLevel: 9,
    adaptiveFiltering: true,
  },

  /** Same as balanced; kept so callers can ask for "maximum". */
  maximum: {
    compressionLevel: 9,
    adaptiveFiltering: true,
  },

  web: {
    compressionLevel: 9,
    adaptiveFiltering: true,
    palette: true,
    colors: 256,
    quality: 85,
    dither: 1.0,
  },
};

type SharpModule = typeof import('sharp');


/**
 * PNG optimizer. Sharp is loaded lazily; if it fails to load, buffers pass
 * through unchanged.
 */
export class PngOptimizer {
  private sharp: SharpModule | null = null;
  private initialized = false;
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'PngOptimizer');
  }

  /**
   * Loads sharp. Returns whether it is available.
   */
  async initialize(): Promise<boolean> {
    if (this.initialized) {
      return this.sharp !== null;
    }

    try {
      const sharpModule = await import('sharp');
      this.sharp = sharpModule.default;
      this.logger.debug('Sharp loaded');
    } catch (error) {
      this.logger.warn('Sharp not available, PNG optimization disabled', { error: errorMessage(error) });
    }
    this.initialized = true;
    return this.sharp !== null;
  }

  isAvailable(): boolean {
    return this.sharp !== null;
  }

  /**
   * Recompresses a captured PNG. Failures return the input untouched.
   */
  async optimize(
    pngBuffer: Buffer,
    options: PngOptimizationPreset | PngOptimizationOptions = 'balanced'
  ): Promise<Buffer> {
    if (options === 'none') {
      return pngBuffer;
    }
    await this.initialize();
    const opts = typeof options === 'string' ? PNG_PRESETS[options] : options;

    try {
      return await this.applyOptimization(pngBuffer, opts);
    } catch (error) {
      this.logger.warn('PNG optimization failed, returning original', { error: errorMessage(error) });
      return pngBuffer;
    }
  }

  private async applyOptimization(pngBuffer: Buffer, options: PngOptimizationOptions): Promise<Buffer> {
    if (!this.sharp) {
      return pngBuffer;
    }

    if (options.palette) {
      try {
        return await this.sharp(pngBuffer)
          .png({
            palette: true,
            colors: options.colors ?? 256,
            quality: options.quality ?? 90,
            dither: options.dither ?? 1.0,
            compressionLevel: options.compressionLevel ?? 9,
          })
          .toBuffer();
      } catch (paletteError) {
        this.logger.debug('Palette mode failed, falling back to standard compression', {
          error: errorMessage(paletteError),
        });
      }
    }

    // Sharp instances are single-use, so each attempt starts fresh.
    return await this.sharp(pngBuffer)
      .png({
        compressionLevel: options.compressionLevel ?? 6,
        adaptiveFiltering: options.adaptiveFiltering ?? true,
      })
      .toBuffer();
  }
}
