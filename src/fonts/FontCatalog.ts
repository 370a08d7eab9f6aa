/**
 * Font name classification shared by the normalizer and the web-font link builder.
 */

/**
 * CSS generic families and keywords that never name a real typeface.
 */
const GENERIC_FAMILIES = new Set([
  'serif',
  'sans-serif',
  'monospace',
  'cursive',
  'fantasy',
  'math',
  'emoji',
  'fangsong',
  'system-ui',
  'ui-serif',
  'ui-sans-serif',
  'ui-monospace',
  'ui-rounded',
  '-apple-system',
  'blinkmacsystemfont',
]);

/**
 * Operating-system fonts that generated markup falls back to. They are
 * installed locally, so they never get a web-font stylesheet.
 */
const SYSTEM_FONTS = new Set([
  'segoe ui',
  'roboto',
  'helvetica',
  'helvetica neue',
  'arial',
  'ubuntu',
  'cantarell',
  'noto sans',
  'oxygen',
  'apple color emoji',
  'segoe ui emoji',
]);

/**
 * Fonts that page generators default to when they know nothing about the brand.
 */
const TEMPLATE_DEFAULT_FONTS = new Set(['inter']);

const MONOSPACE_FONTS = new Set([
  'monospace',
  'ui-monospace',
  'courier',
  'courier new',
  'consolas',
  'menlo',
  'monaco',
  'sf mono',
  'fira code',
  'jetbrains mono',
  'source code pro',
]);

const WEIGHT_SUFFIX = /[-\s](thin|hairline|extralight|ultralight|light|regular|book|normal|medium|semibold|demibold|bold|extrabold|ultrabold|black|heavy)$/i;
const PLACEHOLDER_SUFFIX = /\s+placeholder$/i;

export const DEFAULT_BRAND_FONT = 'Inter';

/**
 * Strips quotes, HTML-escaped quotes and surrounding whitespace from one
 * entry of a font-family list.
 */
export function cleanFamilyName(raw: string): string {
  return raw
    .replace(/&quot;|&#x27;|&#39;|&apos;/gi, '')
    .replace(/["']/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Comparison key for a family: lowercase, without placeholder or weight
 * suffixes, so "Inter-Medium" and "Inter Placeholder" both match "Inter".
 */
export function fontKey(name: string): string {
  let key = cleanFamilyName(name).toLowerCase();
  key = key.replace(PLACEHOLDER_SUFFIX, '');
  if (!GENERIC_FAMILIES.has(key)) {
    key = key.replace(WEIGHT_SUFFIX, '');
  }
  return key.trim();
}

/**
 * Family name safe to place unquoted in CSS: word characters, spaces and
 * hyphens only. May be empty.
 */
export function cssSafeFontName(name: string): string {
  return name.replace(/[^\w\s-]/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * Canonical display form of a detected font name.
 */
export function canonicalFontName(name: string): string {
  return cssSafeFontName(cleanFamilyName(name)).replace(PLACEHOLDER_SUFFIX, '').replace(WEIGHT_SUFFIX, '').trim();
}

export function isGenericFamily(name: string): boolean {
  return GENERIC_FAMILIES.has(fontKey(name));
}

export function isSystemFont(name: string): boolean {
  const key = fontKey(name);
  return GENERIC_FAMILIES.has(key) || SYSTEM_FONTS.has(key);
}

/**
 * True for families the normalizer may replace with a brand font.
 */
export function isReplaceableFont(name: string): boolean {
  const key = fontKey(name);
  return GENERIC_FAMILIES.has(key) || SYSTEM_FONTS.has(key) || TEMPLATE_DEFAULT_FONTS.has(key);
}

export function isMonospaceFont(name: string): boolean {
  return MONOSPACE_FONTS.has(fontKey(name));
}
