/**
 * brand-asset-renderer - brand assets from structured brand data
 *
 * Turns a brand record and campaign parameters into HTML, PNG or PDF
 * marketing assets through component, remote or static template engines.
 */

// Main entry point
export * from './core/index.js';

// Types
export type {
  OutputFormat,
  RasterFormat,
  LogLevel,
  EngineId,
  PngOptimizationPreset,
  PngOptimizationOptions,
  RenderOptions,
  ResolvedRenderOptions,
  ImageRole,
  Testimonial,
  RoleImages,
  BrandRecord,
  BrandRecordInput,
  CampaignParameters,
  SectionKind,
  HeroContent,
  Feature,
  ProcessStep,
  Section,
  SectionOf,
  ImageSlots,
  ContentDocument,
  ResolvedImageSet,
  PipelineState,
  StateTransition,
  RenderArtifact,
  RenderManifest,
  DesignTokens,
  ComponentProps,
  RenderRequest,
} from './types/index.js';
export {
  DEFAULT_RENDER_OPTIONS,
  DEFAULT_CANVAS,
  IMAGE_ROLES,
  SECTION_KINDS,
  brandRecordSchema,
  campaignParametersSchema,
  contentDocumentSchema,
  renderOptionsSchema,
} from './types/index.js';

// Configuration
export { loadConfig } from './config/index.js';
export type { RendererConfig } from './config/index.js';

// Pipeline stages (for advanced usage)
export { ContentAssembler, createDesignTokens, createRandomSource, parseContentDocument } from './content/index.js';
export type { ContentAssemblerOptions, RandomSource } from './content/index.js';
export * from './engines/index.js';
export * from './images/index.js';
export { ComponentLoader, renderComponent, selectDefaultExport } from './ssr/index.js';
export type { LoadedComponent, Renderable } from './ssr/index.js';
export { FontNormalizer, normalizeFonts, selectBrandFonts, buildWebFontLink } from './fonts/index.js';
export type { BrandFontSelection, FontNormalizationResult } from './fonts/index.js';
export * from './rasterize/index.js';

// Logger
export { createLogger, Logger, errorMessage } from './utils/Logger.js';
export type { ILogger, LogEntry, LogFormat, LogSink } from './utils/Logger.js';
export { PngOptimizer, PNG_PRESETS } from './utils/PngOptimizer.js';
