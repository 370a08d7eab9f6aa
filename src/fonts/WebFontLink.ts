import { isSystemFont } from './FontCatalog.js';

const GOOGLE_FONTS_CSS_LINK =
  /<link\b[^>]*\bhref\s*=\s*["']https?:\/\/fonts\.googleapis\.com\/css[^"']*["'][^>]*>/gi;

const WEIGHTS = '400;500;600;700;800';

/**
 * Builds the Google Fonts stylesheet URL for the given families.
 * System fonts are skipped since they never come from the font service.
 */
export function buildWebFontHref(families: string[]): string | undefined {
  const hosted = [...new Set(families)].filter(name => !isSystemFont(name));
  if (hosted.length === 0) {
    return undefined;
  }
  const params = hosted.map(name => `family=${encodeURIComponent(name.trim()).replace(/%20/g, '+')}:wght@${WEIGHTS}`);
  return `https://fonts.googleapis.com/css2?${params.join('&amp;')}&amp;display=swap`;
}

export function buildWebFontLink(families: string[]): string | undefined {
  const href = buildWebFontHref(families);
  return href ? `<link href="${href}" rel="stylesheet">` : undefined;
}

/**
 * Points the page at exactly one web-font stylesheet for the fonts in use.
 *
 * The first existing Google Fonts stylesheet link is replaced in place and
 * any others are dropped; without one, the link goes right before </head>.
 * Preconnect hints are left alone.
 */
export function applyWebFontLink(html: string, families: string[]): string {
  const link = buildWebFontLink(families);
  if (!link) {
    return html;
  }

  let replaced = false;
  const output = html.replace(GOOGLE_FONTS_CSS_LINK, () => {
    if (replaced) {
      return '';
    }
    replaced = true;
    return link;
  });

  if (replaced) {
    return output;
  }

  const headClose = output.search(/<\/head\s*>/i);
  if (headClose === -1) {
    return output;
  }
  return `${output.slice(0, headClose)}${link}${output.slice(headClose)}`;
}
