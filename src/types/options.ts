import { z } from 'zod';

/**
 * Output artifact format.
 */
export type OutputFormat = 'html' | 'png' | 'pdf';

/**
 * Raster formats produced by the headless browser.
 */
export type RasterFormat = Exclude<OutputFormat, 'html'>;

/**
 * Logging level for the pipeline.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Rendering engines the pipeline can dispatch to.
 * - 'remote': hosted generation service returning a live preview
 * - 'component-ssr': a bundled UI component rendered server-side
 * - 'static-markup': built-in HTML templates
 */
export type EngineId = 'remote' | 'component-ssr' | 'static-markup';

/**
 * PNG optimization preset names.
 * - 'none': keep the browser's PNG as captured
 * - 'fast': quick lossless recompression
 * - 'balanced': lossless with adaptive filtering
 * - 'maximum': same as balanced, kept for API completeness
 * - 'web': palette quantization, much smaller but lossy on photos
 */
export type PngOptimizationPreset = 'none' | 'fast' | 'balanced' | 'maximum' | 'web';

/**
 * Custom PNG optimization options passed through to sharp.
 */
export interface PngOptimizationOptions {
  /**
   * PNG compression level (0-9).
   * @default 6
   */
  compressionLevel?: number;

  /**
   * Use adaptive row filtering.
   * @default true
   */
  adaptiveFiltering?: boolean;

  /**
   * Convert to indexed/palette PNG.
   * @default false
   */
  palette?: boolean;

  /**
   * Maximum colors for palette mode (2-256).
   * @default 256
   */
  colors?: number;

  /**
   * Quality threshold for palette quantization (1-100).
   * @default 90
   */
  quality?: number;

  /**
   * Floyd-Steinberg dithering strength (0.0-1.0).
   * @default 1.0
   */
  dither?: number;
}

/**
 * Options controlling the output of a single render.
 */
export interface RenderOptions {
  /**
   * Output format.
   * @default 'html'
   */
  format?: OutputFormat;

  /**
   * Canvas width in CSS pixels. Defaults to the template's own size.
   */
  width?: number;

  /**
   * Canvas height in CSS pixels. Defaults to the template's own size.
   */
  height?: number;

  /**
   * Device scale factor for PNG output (1-3). Multiplies pixel density,
   * not CSS size. Ignored for HTML and PDF.
   * @default 2
   */
  scale?: number;

  /**
   * Forces a specific engine. 'static-markup' always wins; the other
   * engines are honored only when they can serve the template.
   */
  engine?: EngineId;

  /**
   * Navigation and capture timeout for rasterization, in milliseconds.
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * PNG optimization applied after capture.
   * @default 'none'
   */
  pngOptimization?: PngOptimizationPreset | PngOptimizationOptions;

  /**
   * Also write a zip bundle with the artifact, manifest and source HTML.
   * Only applies when an output path is given.
   * @default false
   */
  bundle?: boolean;
}

/**
 * Default rendering options.
 */
export const DEFAULT_RENDER_OPTIONS = {
  format: 'html',
  scale: 2,
  timeoutMs: 30_000,
  pngOptimization: 'none',
  bundle: false,
} as const satisfies RenderOptions;

/**
 * Fallback canvas when neither the caller nor the template gives one.
 */
export const DEFAULT_CANVAS = { width: 1200, height: 1600 } as const;

/**
 * Render options after merging with defaults and template sizes.
 */
export interface ResolvedRenderOptions {
  format: OutputFormat;
  width: number;
  height: number;
  /** Always 1 for HTML and PDF output. */
  scale: number;
  engine: EngineId | undefined;
  timeoutMs: number;
  pngOptimization: PngOptimizationPreset | PngOptimizationOptions;
  bundle: boolean;
}

const pngOptimizationOptionsSchema = z
  .object({
    compressionLevel: z.number().int().min(0).max(9).optional(),
    adaptiveFiltering: z.boolean().optional(),
    palette: z.boolean().optional(),
    colors: z.number().int().min(2).max(256).optional(),
    quality: z.number().int().min(1).max(100).optional(),
    dither: z.number().min(0).max(1).optional(),
  })
  .strict();

/**
 * Runtime check for options arriving from untyped callers.
 */
export const renderOptionsSchema = z
  .object({
    format: z.enum(['html', 'png', 'pdf']).optional(),
    width: z.number().int().min(1).max(10_000).optional(),
    height: z.number().int().min(1).max(10_000).optional(),
    scale: z.number().min(1).max(3).optional(),
    engine: z.enum(['remote', 'component-ssr', 'static-markup']).optional(),
    timeoutMs: z.number().int().positive().optional(),
    pngOptimization: z
      .union([z.enum(['none', 'fast', 'balanced', 'maximum', 'web']), pngOptimizationOptionsSchema])
      .optional(),
    bundle: z.boolean().optional(),
  })
  .strict();
