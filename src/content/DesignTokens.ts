import type { BrandRecord, DesignTokens } from '../types/index.js';
import { selectBrandFonts } from '../fonts/index.js';

export const DEFAULT_COLORS = {
  primary: '#2D5BFF',
  secondary: '#00C2A8',
  muted: '#EBEEF3',
  background: '#FFFFFF',
  text: '#0B0B0B',
} as const;

/** WCAG AA threshold for body text. */
export const MIN_TEXT_CONTRAST = 4.5;

const HEX_COLOR = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i;

/**
 * Parses #rgb or #rrggbb into 0-255 channels.
 */
export function parseHexColor(value: string): { r: number; g: number; b: number } | undefined {
  const match = HEX_COLOR.exec(value.trim());
  if (!match) {
    return undefined;
  }
  let hex = match[1];
  if (hex.length === 3) {
    hex = hex
      .split('')
      .map(c => c + c)
      .join('');
  }
  return {
    r: parseInt(hex.substring(0, 2), 16),
    g: parseInt(hex.substring(2, 4), 16),
    b: parseInt(hex.substring(4, 6), 16),
  };
}

function relativeLuminance(color: { r: number; g: number; b: number }): number {
  const channel = (c: number): number => {
    const s = c / 255;
    return s <= 0.03928 ? s / 12.92 : Math.pow((s + 0.055) / 1.055, 2.4);
  };
  return 0.2126 * channel(color.r) + 0.7152 * channel(color.g) + 0.0722 * channel(color.b);
}

/**
 * WCAG contrast ratio between two hex colors, 1 to 21.
 * Unparseable colors yield 1.
 */
export function contrastRatio(a: string, b: string): number {
  const ca = parseHexColor(a);
  const cb = parseHexColor(b);
  if (!ca || !cb) {
    return 1;
  }
  const la = relativeLuminance(ca);
  const lb = relativeLuminance(cb);
  return (Math.max(la, lb) + 0.05) / (Math.min(la, lb) + 0.05);
}

/**
 * Keeps the preferred text color when it is readable on the background,
 * otherwise switches to black or white, whichever contrasts better.
 */
export function ensureTextContrast(background: string, text: string = '#000000'): string {
  if (contrastRatio(background, text) >= MIN_TEXT_CONTRAST) {
    return text;
  }
  return contrastRatio(background, '#000000') >= contrastRatio(background, '#FFFFFF') ? '#000000' : '#FFFFFF';
}

function validColor(value: string | undefined): string | undefined {
  return value !== undefined && parseHexColor(value) ? normalizeHex(value) : undefined;
}

function normalizeHex(value: string): string {
  const trimmed = value.trim().toUpperCase();
  return trimmed.startsWith('#') ? trimmed : `#${trimmed}`;
}

/**
 * Builds design tokens for a brand. Missing or malformed colors fall back to
 * defaults and text colors are corrected for contrast.
 */
export function createDesignTokens(brand: Pick<BrandRecord, 'colors' | 'typography'>): DesignTokens {
  const colors = brand.colors;
  const primary = validColor(colors.primary) ?? DEFAULT_COLORS.primary;
  const secondary = validColor(colors.secondary) ?? DEFAULT_COLORS.secondary;
  const background = validColor(colors.background) ?? DEFAULT_COLORS.background;

  return {
    fonts: selectBrandFonts(brand),
    colors: {
      primary,
      secondary,
      accent: validColor(colors.accent) ?? secondary,
      muted: validColor(colors.muted) ?? DEFAULT_COLORS.muted,
      background,
      text: ensureTextContrast(background, validColor(colors.text) ?? DEFAULT_COLORS.text),
      onPrimary: ensureTextContrast(primary, '#FFFFFF'),
    },
    spacing: { sm: 8, md: 16, lg: 24, xl: 32 },
    radius: { sm: 8, md: 16, lg: 24 },
    maxWidth: 880,
  };
}
