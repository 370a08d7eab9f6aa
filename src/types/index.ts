// Options
export type {
  OutputFormat,
  RasterFormat,
  LogLevel,
  EngineId,
  PngOptimizationPreset,
  PngOptimizationOptions,
  RenderOptions,
  ResolvedRenderOptions,
} from './options.js';
export { DEFAULT_RENDER_OPTIONS, DEFAULT_CANVAS, renderOptionsSchema } from './options.js';

// Brand and campaign input
export type {
  ImageRole,
  Testimonial,
  RoleImages,
  BrandRecord,
  BrandRecordInput,
  CampaignParameters,
} from './brand.js';
export {
  IMAGE_ROLES,
  brandRecordSchema,
  campaignParametersSchema,
  testimonialSchema,
  roleImagesSchema,
} from './brand.js';

// Content
export type {
  SectionKind,
  HeroContent,
  Feature,
  ProcessStep,
  Section,
  SectionOf,
  ImageSlots,
  ContentDocument,
  ResolvedImageSet,
} from './content.js';
export { SECTION_KINDS, contentDocumentSchema, sectionSchema } from './content.js';

// Results
export type {
  PipelineState,
  StateTransition,
  RenderArtifact,
  RenderManifest,
} from './results.js';

// Rendering inputs
export type { DesignTokens } from './tokens.js';
export type { ComponentProps } from './component.js';
export type { RenderRequest } from './request.js';
