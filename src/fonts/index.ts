export { FontNormalizer, normalizeFonts, selectBrandFonts } from './FontNormalizer.js';
export type { BrandFontSelection, FontNormalizationResult, FontRole } from './FontNormalizer.js';
export { applyWebFontLink, buildWebFontHref, buildWebFontLink } from './WebFontLink.js';
export {
  DEFAULT_BRAND_FONT,
  canonicalFontName,
  cleanFamilyName,
  cssSafeFontName,
  fontKey,
  isGenericFamily,
  isMonospaceFont,
  isReplaceableFont,
  isSystemFont,
} from './FontCatalog.js';
