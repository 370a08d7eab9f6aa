import { describe, it, expect } from 'vitest';
import { FontNormalizer, normalizeFonts, selectBrandFonts } from '../../src/fonts/FontNormalizer.js';
import { brandRecordSchema } from '../../src/types/index.js';

const FONTS = { heading: 'Poppins', body: 'Lato' };
const LATO_LINK =
  '<link href="https://fonts.googleapis.com/css2?family=Lato:wght@400;500;600;700;800&amp;display=swap" rel="stylesheet">';

describe('FontNormalizer', () => {
  describe('Style blocks', () => {
    it('should replace system stacks with the body and heading fonts by selector', () => {
      const html =
        '<style>body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; } h1 { font-family: system-ui, sans-serif; }</style>';

      const result = normalizeFonts(html, FONTS);

      expect(result.html).toBe(
        '<style>body { font-family: Lato, sans-serif; } h1 { font-family: Poppins, sans-serif; }</style>'
      );
      expect(result.rewrittenDeclarations).toBe(2);
      expect(result.fontsInUse).toEqual(['Poppins', 'Lato']);
      expect(result.noop).toBe(false);
    });

    it('should collapse doubled placeholder chains of a brand font', () => {
      const normalizer = new FontNormalizer({ heading: 'Plus Jakarta Sans', body: 'Lato' });
      const html =
        '<style>.hero-title { font-family: "Plus Jakarta Sans", "Plus Jakarta Sans Placeholder", sans-serif, sans-serif }</style>';

      expect(normalizer.normalize(html)).toBe(
        '<style>.hero-title { font-family: Plus Jakarta Sans, sans-serif }</style>'
      );
    });

    it('should keep !important', () => {
      const html = '<style>p { font-family: Arial !important; }</style>';

      expect(normalizeFonts(html, FONTS).html).toBe('<style>p { font-family: Lato, sans-serif !important; }</style>');
    });

    it('should leave monospace, custom properties, font faces and foreign fonts alone', () => {
      const html = [
        '<style>',
        'code { font-family: Menlo, monospace; }',
        'p { font-family: var(--font-body); }',
        '@font-face { font-family: "Segoe UI"; src: url(a.woff2); }',
        'blockquote { font-family: Georgia, serif; }',
        '</style>',
      ].join('\n');

      const result = normalizeFonts(html, FONTS);

      expect(result.html).toBe(html);
      expect(result.noop).toBe(true);
      expect(result.fontsInUse).toEqual([]);
    });

    it('should ignore font declarations inside scripts and comments', () => {
      const html = '<script>const css = "p { font-family: Arial }";</script><!-- body { font-family: Arial } -->';

      expect(normalizeFonts(html, FONTS).html).toBe(html);
    });
  });

  describe('Inline styles', () => {
    it('should rewrite inline declarations and keep other properties', () => {
      const html = '<p style="font-family: Arial, sans-serif; color: red">Hi</p>';

      expect(normalizeFonts(html, FONTS).html).toBe('<p style="font-family: Lato, sans-serif; color: red">Hi</p>');
    });

    it('should use the heading font for heading tags and heading-like classes', () => {
      const html =
        '<h2 style="font-family: &quot;Segoe UI&quot;, sans-serif">A</h2><div class="hero-title" style="font-family: Roboto">B</div>';

      expect(normalizeFonts(html, FONTS).html).toBe(
        '<h2 style="font-family: Poppins, sans-serif">A</h2><div class="hero-title" style="font-family: Poppins, sans-serif">B</div>'
      );
    });
  });

  describe('Web font link', () => {
    it('should insert a stylesheet link for the fonts in use before </head>', () => {
      const html = '<html><head><title>x</title></head><body style="font-family: Inter, sans-serif">x</body></html>';

      expect(normalizeFonts(html, FONTS).html).toBe(
        `<html><head><title>x</title>${LATO_LINK}</head><body style="font-family: Lato, sans-serif">x</body></html>`
      );
    });

    it('should replace an existing font service link', () => {
      const html =
        '<head><link href="https://fonts.googleapis.com/css2?family=Inter:wght@400&display=swap" rel="stylesheet"></head><body style="font-family: Inter">x</body>';

      expect(normalizeFonts(html, FONTS).html).toBe(
        `<head>${LATO_LINK}</head><body style="font-family: Lato, sans-serif">x</body>`
      );
    });

    it('should not add a link when nothing was rewritten', () => {
      const html = '<head></head><body>plain</body>';

      expect(normalizeFonts(html, FONTS).html).toBe(html);
    });
  });

  describe('Idempotence', () => {
    const documents = [
      '<html><head><title>t</title></head><body><style>body{font-family:Arial}h1,.headline{font-family:"Inter Placeholder", Inter, sans-serif, sans-serif}</style><h1 style="font-family: system-ui">A</h1></body></html>',
      '<head><link href="https://fonts.googleapis.com/css2?family=Roboto&display=swap" rel="stylesheet"><link href="https://fonts.googleapis.com/css?family=Open+Sans" rel="stylesheet"></head><p style=\'font-family: "Helvetica Neue", Arial\'>x</p>',
      '<style>code{font-family:monospace} p{font-family: inherit}</style>',
      '',
    ];

    it.each(documents)('should give the same output when applied twice (%#)', html => {
      const normalizer = new FontNormalizer(FONTS);
      const once = normalizer.normalize(html);

      expect(normalizer.normalize(once)).toBe(once);
    });

    it('should be idempotent when heading and body are the same family', () => {
      const normalizer = new FontNormalizer({ heading: 'Inter', body: 'inter' });
      const once = normalizer.normalize('<style>h1{font-family:Arial} p{font-family:Roboto}</style>');

      expect(normalizer.selection).toEqual({ heading: 'Inter', body: 'Inter' });
      expect(normalizer.normalize(once)).toBe(once);
    });
  });

  describe('selectBrandFonts', () => {
    it('should prefer explicit heading and body fonts', () => {
      const brand = brandRecordSchema.parse({ name: 'B', typography: { heading: 'Poppins', body: 'Lato' } });

      expect(selectBrandFonts(brand)).toEqual({ heading: 'Poppins', body: 'Lato' });
    });

    it('should fall back to detected fonts, skipping generics and cleaning names', () => {
      const brand = brandRecordSchema.parse({
        name: 'B',
        typography: { detected: ['Inter Placeholder', 'sans-serif', 'Merriweather-Bold'] },
      });

      expect(selectBrandFonts(brand)).toEqual({ heading: 'Inter', body: 'Merriweather' });
    });

    it('should strip markup and punctuation from brand font names', () => {
      const brand = brandRecordSchema.parse({
        name: 'B',
        typography: { heading: 'Evil</style><script>alert(1)</script>', body: 'Lato' },
      });
      const fonts = selectBrandFonts(brand);

      expect(fonts).toEqual({ heading: 'Evilstylescriptalert1script', body: 'Lato' });
      expect(new FontNormalizer(fonts).normalize('<style>h1 { font-family: Arial; }</style>')).toBe(
        '<style>h1 { font-family: Evilstylescriptalert1script, sans-serif; }</style>'
      );
    });

    it('should clean names passed straight to the normalizer', () => {
      const normalizer = new FontNormalizer({ heading: 'Brand"><img src=x>', body: '<>' });

      expect(normalizer.selection).toEqual({ heading: 'Brandimg srcx', body: 'Brandimg srcx' });
    });

    it('should default to Inter for both roles', () => {
      const brand = brandRecordSchema.parse({ name: 'B' });

      expect(selectBrandFonts(brand)).toEqual({ heading: 'Inter', body: 'Inter' });
    });
  });
});
