import type { DesignTokens } from '../../types/index.js';
import { DEFAULT_BRAND_FONT, buildWebFontLink, cssSafeFontName } from '../../fonts/index.js';
import { escapeHtml } from '../../utils/html.js';

/**
 * Font family name safe to place unquoted inside a style block.
 */
export function cssFontName(name: string): string {
  return cssSafeFontName(name) || DEFAULT_BRAND_FONT;
}

/**
 * Custom properties and base rules shared by the built-in templates.
 */
export function baseStyles(tokens: DesignTokens, canvas: { width: number; height: number }): string {
  const { colors, spacing, radius } = tokens;
  return `
:root {
  --color-primary: ${colors.primary};
  --color-secondary: ${colors.secondary};
  --color-accent: ${colors.accent};
  --color-muted: ${colors.muted};
  --color-bg: ${colors.background};
  --color-text: ${colors.text};
  --color-on-primary: ${colors.onPrimary};
  --space-sm: ${spacing.sm}px;
  --space-md: ${spacing.md}px;
  --space-lg: ${spacing.lg}px;
  --space-xl: ${spacing.xl}px;
  --radius-sm: ${radius.sm}px;
  --radius-md: ${radius.md}px;
  --radius-lg: ${radius.lg}px;
}
* { box-sizing: border-box; }
html, body { margin: 0; padding: 0; }
body {
  width: ${canvas.width}px;
  min-height: ${canvas.height}px;
  background: var(--color-bg);
  color: var(--color-text);
  font-family: ${cssFontName(tokens.fonts.body)}, sans-serif;
  line-height: 1.5;
}
h1, h2, h3, .headline {
  font-family: ${cssFontName(tokens.fonts.heading)}, sans-serif;
  line-height: 1.15;
  margin: 0 0 var(--space-sm);
}
p { margin: 0 0 var(--space-sm); }
img { display: block; max-width: 100%; object-fit: cover; }
.cta {
  display: inline-block;
  padding: var(--space-sm) var(--space-lg);
  border-radius: var(--radius-sm);
  background: var(--color-primary);
  color: var(--color-on-primary);
  font-weight: 600;
  text-decoration: none;
}`;
}

/**
 * Wraps a body in a complete document.
 */
export function htmlDocument(options: {
  title: string;
  tokens: DesignTokens;
  canvas: { width: number; height: number };
  styles: string;
  body: string;
}): string {
  const { title, tokens, canvas, styles, body } = options;
  const fontLink = buildWebFontLink([cssFontName(tokens.fonts.heading), cssFontName(tokens.fonts.body)]);
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=${canvas.width}">
<title>${escapeHtml(title)}</title>
${fontLink ?? ''}
<style>${baseStyles(tokens, canvas)}
${styles}
</style>
</head>
<body>
${body}
</body>
</html>
`;
}
