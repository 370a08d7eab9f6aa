import { describe, it, expect } from 'vitest';
import {
  DEFAULT_COLORS,
  contrastRatio,
  createDesignTokens,
  ensureTextContrast,
  parseHexColor,
} from '../../src/content/DesignTokens.js';
import { brandRecordSchema } from '../../src/types/index.js';

describe('DesignTokens', () => {
  it('should parse short and long hex colors', () => {
    expect(parseHexColor('#0F8')).toEqual({ r: 0, g: 255, b: 136 });
    expect(parseHexColor('1a73e8')).toEqual({ r: 26, g: 115, b: 232 });
    expect(parseHexColor('blue')).toBeUndefined();
  });

  it('should compute WCAG contrast', () => {
    expect(contrastRatio('#000000', '#FFFFFF')).toBeCloseTo(21, 5);
    expect(contrastRatio('#777', '#777')).toBeCloseTo(1, 5);
    expect(contrastRatio('nope', '#FFFFFF')).toBe(1);
  });

  it('should keep readable text and replace unreadable text', () => {
    expect(ensureTextContrast('#FFFFFF', '#222222')).toBe('#222222');
    expect(ensureTextContrast('#FFFFFF', '#FFFF00')).toBe('#000000');
    expect(ensureTextContrast('#101010', '#202020')).toBe('#FFFFFF');
  });

  it('should normalize brand colors and fall back on invalid ones', () => {
    const tokens = createDesignTokens(
      brandRecordSchema.parse({ name: 'B', colors: { primary: 'ffff00', secondary: 'teal', text: '#fafafa' } })
    );

    expect(tokens.colors.primary).toBe('#FFFF00');
    expect(tokens.colors.secondary).toBe(DEFAULT_COLORS.secondary);
    expect(tokens.colors.accent).toBe(DEFAULT_COLORS.secondary);
    expect(tokens.colors.background).toBe('#FFFFFF');
    expect(tokens.colors.text).toBe('#000000');
    expect(tokens.colors.onPrimary).toBe('#000000');
  });

  it('should carry the brand font selection', () => {
    const tokens = createDesignTokens(brandRecordSchema.parse({ name: 'B', typography: { heading: 'Poppins' } }));

    expect(tokens.fonts).toEqual({ heading: 'Poppins', body: 'Poppins' });
  });
});
