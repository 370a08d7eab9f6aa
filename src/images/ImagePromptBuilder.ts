import type { ImageRole } from '../types/index.js';
import { DEFAULT_COLORS } from '../content/DesignTokens.js';
import type { ImageResolutionContext } from './ImageProvider.js';

const PROCESS_PHASES = ['discovery', 'implementation', 'optimization'] as const;

/**
 * Builds a brand-aware generation prompt for one image slot.
 */
export function buildImagePrompt(role: ImageRole, index: number, ctx: ImageResolutionContext): string {
  const { brand, campaign } = ctx;
  const what = campaign.what?.trim() || 'business platform';
  const who = campaign.who?.trim() || 'business professionals';
  const primary = brand.colors.primary ?? DEFAULT_COLORS.primary;
  const secondary = brand.colors.secondary ?? DEFAULT_COLORS.secondary;
  const palette = `Colors: use ${primary} and ${secondary}.`;

  switch (role) {
    case 'hero': {
      const purpose = campaign.why?.trim() || 'transforming business processes';
      return [
        `Modern, professional illustration for the hero section of ${brand.name}.`,
        `Theme: ${what}. Purpose: ${purpose}. Audience: ${who}.`,
        'Style: clean, minimalist, high-quality digital illustration.',
        palette,
      ].join(' ');
    }
    case 'features': {
      const feature = featureTitle(ctx, index) ?? `feature ${index + 1}`;
      return [
        `Professional flat illustration for the feature "${feature}"`,
        `of ${what} for ${who}.`,
        'Style: modern, clean lines, suitable for a feature grid.',
        palette,
      ].join(' ');
    }
    case 'process': {
      const phase = PROCESS_PHASES[index % PROCESS_PHASES.length] ?? 'discovery';
      return [
        `Professional illustration of the ${phase} phase of ${what}.`,
        'Style: modern business illustration, clean design.',
        palette,
      ].join(' ');
    }
    case 'testimonials':
      return [
        `Professional portrait illustration of a ${who} representative using ${what}.`,
        'Style: headshot, modern, friendly.',
        palette,
      ].join(' ');
  }
}

function featureTitle(ctx: ImageResolutionContext, index: number): string | undefined {
  const section = ctx.content?.sections.find(s => s.kind === 'features');
  return section?.kind === 'features' ? section.payload.items[index]?.title : undefined;
}
