import type { BrandRecord, CampaignParameters } from '../../types/index.js';
import type { RemoteGenerationRequest } from './RemoteGenerationClient.js';

const SECTIONS = ['hero', 'features', 'how-it-works', 'testimonials', 'pricing', 'faq', 'cta', 'footer'];

export const REMOTE_SYSTEM_PROMPT =
  'You are an expert front-end engineer producing production-ready, responsive marketing pages.';

/**
 * Builds the generation brief for a brand, intent and campaign.
 */
export function buildRemotePrompt(
  brand: BrandRecord,
  intent: string,
  campaign: CampaignParameters,
  callToAction: string
): RemoteGenerationRequest {
  const fonts = [brand.typography.heading, brand.typography.body, ...brand.typography.fallbacks].filter(
    (font): font is string => Boolean(font)
  );
  const { colors } = brand;
  const palette = [colors.primary, colors.secondary, colors.accent, colors.muted, colors.background, colors.text]
    .filter((color): color is string => Boolean(color))
    .join(', ');
  const positioning = (brand.tagline ?? brand.description ?? '').slice(0, 240);

  const lines = [
    `Build a high-fidelity ${intent} for the brand **${brand.name}**.`,
    '',
    `Positioning: ${positioning}`,
    `Tone: ${brand.tone ?? 'confident, tech-forward, friendly'}`,
    `Keywords: ${brand.keywords.slice(0, 12).join(', ')}`,
    '',
    'Audience/angle:',
    `- What: ${campaign.what ?? ''}`,
    `- Why: ${campaign.why ?? ''}`,
    `- Who: ${campaign.who ?? ''}`,
    '',
    `Palette (hex): ${palette}`,
    `Primary font(s): ${fonts.join(', ') || 'Inter, system-ui'}`,
    '',
    `Sections: ${SECTIONS.join(', ')}`,
    '',
    'Requirements:',
    '- Responsive, accessible, semantic HTML.',
    '- Balanced white space and a consistent spacing scale.',
    '- Use primary as the brand color, secondary for actions and links, accent sparingly.',
    '- Output a complete page with a working live preview.',
  ];
  if (campaign.notes?.trim()) {
    lines.push('', `Notes: ${campaign.notes.trim()}`);
  }
  lines.push('', `CTA text: ${callToAction}`);

  return { message: lines.join('\n'), system: REMOTE_SYSTEM_PROMPT };
}
