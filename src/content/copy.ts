/**
 * Phrasing variants for assembled copy. Each variant is a function of the
 * campaign context so placeholders never leak into output.
 */

export interface CopyContext {
  brandName: string;
  /** Lower-cased "what", or undefined. */
  what?: string;
  /** Lower-cased "why", or undefined. */
  why?: string;
  /** Audience, defaulted when the campaign leaves it out. */
  who: string;
  description?: string;
}

type Variant = (ctx: CopyContext) => string;
type Variants = readonly [Variant, ...Variant[]];

export const DEFAULT_AUDIENCE = 'growing teams';

export const HERO_DESCRIPTIONS: Variants = [
  ctx => `Empowering ${ctx.who} with ${ctx.what ?? 'solutions'} built to deliver measurable results.`,
  ctx => `Transform your business with ${ctx.what ?? 'an innovative platform'} designed specifically for ${ctx.who}.`,
  ctx => `Leading the future of ${ctx.what ?? 'technology'} for ${ctx.who} who demand excellence.`,
];

export const VALUE_PROPOSITIONS: Variants = [
  ctx => `${capitalize(ctx.what ?? 'our platform')} addresses the need for ${ctx.why ?? 'better outcomes'}, helping ${ctx.who} achieve breakthrough results.`,
  ctx => `By focusing on ${ctx.what ?? 'innovation'}, ${ctx.brandName} solves the challenge of ${ctx.why ?? 'doing more with less'} for ${ctx.who}.`,
  ctx => `${ctx.brandName} builds ${ctx.what ?? 'focused tools'} because ${ctx.why ?? 'the work matters'}. Made for ${ctx.who} who need dependable, efficient tools.`,
  ctx => `Rethink your workflow with ${ctx.what ?? 'a modern platform'} that puts ${ctx.why ?? 'results'} first. Built for ${ctx.who} who value quality.`,
];

export const ABOUT_SUFFIXES: Variants = [
  ctx => `We deliver experiences that drive results for ${ctx.who}.`,
  ctx => `We combine technology with deep expertise to build ${ctx.what ?? 'solutions that exceed expectations'}.`,
  ctx => `Our mission is to equip ${ctx.who} with tools that make every day's work count.`,
];

export const FEATURE_DESCRIPTIONS: readonly [(keyword: string) => string, ...((keyword: string) => string)[]] = [
  keyword => `Advanced ${keyword} capabilities`,
  keyword => `Intelligent ${keyword} automation`,
  keyword => `Professional ${keyword} tools`,
  keyword => `Streamlined ${keyword} process`,
];

export const BENEFITS: readonly Variant[] = [
  ctx => `Streamlined ${ctx.what ?? 'workflow'} that saves time and reduces complexity`,
  ctx => `Enhanced efficiency designed for ${ctx.who}`,
  () => 'Professional-grade results that exceed industry standards',
  () => 'Automation that handles repetitive tasks',
  () => 'Data-driven insights that optimize performance',
  () => 'Solutions that scale as you grow',
];

export const SOCIAL_PROOF: Variants = [
  () => 'Join thousands of professionals who have transformed their workflow.',
  () => 'Trusted by industry leaders who demand excellence and innovation.',
  () => 'Proven results across diverse industries and business sizes.',
  () => 'Recognized for its impact and reliability.',
  () => 'Used by established companies and growing startups alike.',
];

export const CALLS_TO_ACTION: readonly [string, ...string[]] = [
  'Start Your Transformation',
  'Get Started Today',
  'Book a Demo',
  'Begin Your Journey',
  'Unlock Your Potential',
];

export const PROCESS_STEPS: readonly ((ctx: CopyContext) => { title: string; description: string })[] = [
  ctx => ({
    title: 'Discovery',
    description: `We analyze your needs${ctx.what ? ` around ${ctx.what}` : ''} and the challenges unique to ${ctx.who}.`,
  }),
  () => ({
    title: 'Implementation',
    description: 'We work closely with you to deploy the solution and integrate it with your tools.',
  }),
  () => ({
    title: 'Optimization',
    description: 'Continuous monitoring and improvement to maximize your results.',
  }),
];

/**
 * Keywords scraped from navigation chrome rather than product language.
 */
export const NAVIGATION_DENYLIST = ['menu', 'search', 'pages', 'about us', 'coming soon', 'store', 'channel'];

export const FEATURE_ICONS: Readonly<Record<string, string>> = {
  ai: '🤖',
  product: '📦',
  pricing: '💰',
  'book a demo': '📅',
  highlights: '⭐',
  'q&a': '❓',
  personalize: '🎯',
  insights: '📊',
};

export const DEFAULT_FEATURE_ICON = '✨';

export const SECTION_TITLES = {
  'value-prop': 'Why This Matters',
  about: 'About Us',
  features: 'Key Capabilities',
  benefits: "What You'll Get",
  process: 'How It Works',
  testimonials: 'What Our Clients Say',
  'social-proof': 'Trusted by Industry Leaders',
} as const;

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
