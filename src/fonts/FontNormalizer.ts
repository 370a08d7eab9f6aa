/**
 * Rewrites font-family declarations in generated markup to the brand's fonts.
 *
 * Generated pages (from components, templates or remote generators) tend to
 * fall back to system stacks or carry doubled placeholder chains such as
 * "Plus Jakarta Sans, Plus Jakarta Sans Placeholder, sans-serif, sans-serif".
 * Every such declaration is collapsed to "<Font>, sans-serif" with the brand's
 * heading or body font. The transform is pure and idempotent.
 */

import type { BrandRecord } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import {
  DEFAULT_BRAND_FONT,
  canonicalFontName,
  cleanFamilyName,
  cssSafeFontName,
  fontKey,
  isGenericFamily,
  isMonospaceFont,
  isReplaceableFont,
} from './FontCatalog.js';
import { applyWebFontLink } from './WebFontLink.js';

/**
 * Heading and body fonts chosen for a brand.
 */
export interface BrandFontSelection {
  heading: string;
  body: string;
}

export type FontRole = 'heading' | 'body';

/**
 * Result of one normalization pass.
 */
export interface FontNormalizationResult {
  html: string;
  /** Declarations that qualified for rewriting (including already-canonical ones). */
  rewrittenDeclarations: number;
  /** Brand fonts referenced by at least one rewritten declaration, heading first. */
  fontsInUse: string[];
  /** True when no declaration qualified; the markup may still have had its link tag untouched. */
  noop: boolean;
}

/**
 * Chooses heading and body fonts from the brand's typography and detected fonts.
 */
export function selectBrandFonts(brand: Pick<BrandRecord, 'typography'>): BrandFontSelection {
  const { heading, body, detected } = brand.typography;
  const usable = (name: string | undefined): string | undefined => {
    if (!name) return undefined;
    const clean = canonicalFontName(name);
    return clean && !isGenericFamily(clean) ? clean : undefined;
  };

  const candidates = detected
    .map(name => usable(name))
    .filter((name): name is string => name !== undefined);

  const headingFont = usable(heading) ?? candidates[0] ?? DEFAULT_BRAND_FONT;
  const bodyFont =
    usable(body) ?? candidates.find(name => fontKey(name) !== fontKey(headingFont)) ?? headingFont;

  return { heading: headingFont, body: bodyFont };
}

/**
 * One markup token: a style element, a script or comment to skip, or a start tag.
 */
const MARKUP_PATTERN =
  /(<style\b[^>]*>)([\s\S]*?)(<\/style\s*>)|<script\b[^>]*>[\s\S]*?<\/script\s*>|<!--[\s\S]*?-->|<([a-zA-Z][\w:-]*)(\s[^>]*)?>/gi;

const CSS_RULE_PATTERN = /([^{}]*)\{([^{}]*)\}/g;

const DECLARATION_PATTERN = /(^|[;{\s])font-family\s*:\s*([^;]*?)(\s*)(?=;|$)/gi;

const STYLE_ATTR_PATTERN = /(\sstyle\s*=\s*)(["'])([\s\S]*?)\2/i;

const CLASS_ATTR_PATTERN = /\sclass(?:Name)?\s*=\s*(["'])([\s\S]*?)\1/i;

const HEADING_SELECTOR = /(^|[^a-z0-9-])h[1-6]([^a-z0-9-]|$)|title|heading|headline|display/i;

const HEADING_TAG = /^h[1-6]$/i;

const CSS_WIDE_KEYWORD = /^(inherit|initial|unset|revert|revert-layer)$/i;

const IMPORTANT_SUFFIX = /\s*!important\s*$/i;

/**
 * Rewrites font declarations for one brand.
 */
export class FontNormalizer {
  private readonly fonts: BrandFontSelection;
  private readonly headingKey: string;
  private readonly bodyKey: string;
  private readonly logger: ILogger;

  constructor(fonts: BrandFontSelection, logger?: ILogger) {
    const heading = cssSafeFontName(fonts.heading) || DEFAULT_BRAND_FONT;
    const body = cssSafeFontName(fonts.body) || heading;
    this.headingKey = fontKey(heading);
    this.bodyKey = fontKey(body);
    // One family under two spellings must produce one spelling.
    this.fonts = { heading, body: this.bodyKey === this.headingKey ? heading : body };
    this.logger = logger ?? createLogger('warn', 'FontNormalizer');
  }

  get selection(): BrandFontSelection {
    return this.fonts;
  }

  /**
   * Returns the normalized markup.
   */
  normalize(html: string): string {
    return this.run(html).html;
  }

  /**
   * Normalizes markup and reports what was rewritten.
   */
  run(html: string): FontNormalizationResult {
    const used = new Set<FontRole>();
    let count = 0;

    const rewriteDeclarations = (text: string, context: FontRole): string =>
      text.replace(DECLARATION_PATTERN, (match: string, lead: string, value: string, trailing: string) => {
        const rewritten = this.rewriteValue(value, context);
        if (rewritten === undefined) {
          return match;
        }
        count++;
        used.add(rewritten.role);
        return `${lead}font-family: ${rewritten.value}${trailing}`;
      });

    const rewriteCss = (css: string): string =>
      css.replace(CSS_RULE_PATTERN, (rule: string, selector: string, body: string) => {
        if (/@font-face/i.test(selector)) {
          return rule;
        }
        const context: FontRole = HEADING_SELECTOR.test(selector) ? 'heading' : 'body';
        return `${selector}{${rewriteDeclarations(body, context)}}`;
      });

    const rewriteTag = (tag: string, tagName: string, attrs: string): string => {
      const styleMatch = STYLE_ATTR_PATTERN.exec(attrs);
      if (!styleMatch || !/font-family/i.test(styleMatch[3])) {
        return tag;
      }
      const [styleAttr, prefix, quote, encoded] = styleMatch;
      const classMatch = CLASS_ATTR_PATTERN.exec(attrs);
      const context: FontRole =
        HEADING_TAG.test(tagName) || (classMatch !== null && HEADING_SELECTOR.test(classMatch[2]))
          ? 'heading'
          : 'body';

      const before = count;
      const decoded = decodeQuotes(encoded);
      const rewritten = rewriteDeclarations(decoded, context);
      if (count === before) {
        return tag;
      }
      const newAttr = `${prefix}${quote}${encodeQuote(rewritten, quote)}${quote}`;
      return `<${tagName}${attrs.replace(styleAttr, () => newAttr)}>`;
    };

    let output = html.replace(
      MARKUP_PATTERN,
      (
        token: string,
        styleOpen: string | undefined,
        css: string | undefined,
        styleClose: string | undefined,
        tagName: string | undefined,
        attrs: string | undefined
      ) => {
        if (styleOpen !== undefined && css !== undefined && styleClose !== undefined) {
          return `${styleOpen}${rewriteCss(css)}${styleClose}`;
        }
        if (tagName !== undefined && attrs !== undefined) {
          return rewriteTag(token, tagName, attrs);
        }
        return token;
      }
    );

    const fontsInUse: string[] = [];
    if (used.has('heading')) fontsInUse.push(this.fonts.heading);
    if (used.has('body') && !fontsInUse.some(f => fontKey(f) === this.bodyKey)) {
      fontsInUse.push(this.fonts.body);
    }

    if (fontsInUse.length > 0) {
      output = applyWebFontLink(output, fontsInUse);
    }

    if (count === 0) {
      this.logger.debug('No font-family declarations to rewrite');
    } else {
      this.logger.debug('Rewrote font declarations', { count, fontsInUse });
    }

    return { html: output, rewrittenDeclarations: count, fontsInUse, noop: count === 0 };
  }

  /**
   * Decides the canonical value for one font-family value, or undefined
   * when the declaration must stay as it is.
   */
  private rewriteValue(value: string, context: FontRole): { value: string; role: FontRole } | undefined {
    const important = IMPORTANT_SUFFIX.test(value);
    const list = value.replace(IMPORTANT_SUFFIX, '').trim();
    if (!list || CSS_WIDE_KEYWORD.test(list) || /var\(/i.test(list)) {
      return undefined;
    }

    const families = list
      .split(',')
      .map(cleanFamilyName)
      .filter(name => name.length > 0);
    if (families.length === 0 || families.some(isMonospaceFont)) {
      return undefined;
    }

    const primary = fontKey(families[0]);
    let role: FontRole;
    if (primary === this.headingKey) {
      role = 'heading';
    } else if (primary === this.bodyKey) {
      role = 'body';
    } else if (isReplaceableFont(families[0])) {
      role = context;
    } else {
      return undefined;
    }

    const font = role === 'heading' ? this.fonts.heading : this.fonts.body;
    return { value: `${font}, sans-serif${important ? ' !important' : ''}`, role };
  }
}

/**
 * Normalizes fonts in markup for the given selection.
 */
export function normalizeFonts(html: string, fonts: BrandFontSelection, logger?: ILogger): FontNormalizationResult {
  return new FontNormalizer(fonts, logger).run(html);
}

function decodeQuotes(value: string): string {
  return value.replace(/&quot;/gi, '"').replace(/&#x27;|&#39;|&apos;/gi, "'");
}

function encodeQuote(value: string, quote: string): string {
  return quote === '"' ? value.replace(/"/g, '&quot;') : value.replace(/'/g, '&#x27;');
}
