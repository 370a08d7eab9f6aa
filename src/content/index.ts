export { ContentAssembler, MAX_FEATURES, MAX_IMAGES_PER_ROLE, parseContentDocument } from './ContentAssembler.js';
export type { ContentAssemblerOptions } from './ContentAssembler.js';
export {
  DEFAULT_COLORS,
  MIN_TEXT_CONTRAST,
  contrastRatio,
  createDesignTokens,
  ensureTextContrast,
  parseHexColor,
} from './DesignTokens.js';
export type { DesignTokens } from '../types/index.js';
export { createRandomSource, pick } from './RandomSource.js';
export type { RandomSource } from './RandomSource.js';
export { DEFAULT_AUDIENCE, NAVIGATION_DENYLIST } from './copy.js';
