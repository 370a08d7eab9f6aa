/**
 * Turns a brand record and campaign parameters into a content document.
 */

import type {
  BrandRecord,
  CampaignParameters,
  ContentDocument,
  Feature,
  ImageSlots,
  Section,
} from '../types/index.js';
import { contentDocumentSchema } from '../types/index.js';
import { InvalidContentError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { RandomSource } from './RandomSource.js';
import { createRandomSource, pick } from './RandomSource.js';
import type { CopyContext } from './copy.js';
import {
  ABOUT_SUFFIXES,
  BENEFITS,
  CALLS_TO_ACTION,
  DEFAULT_AUDIENCE,
  DEFAULT_FEATURE_ICON,
  FEATURE_DESCRIPTIONS,
  FEATURE_ICONS,
  HERO_DESCRIPTIONS,
  NAVIGATION_DENYLIST,
  PROCESS_STEPS,
  SECTION_TITLES,
  SOCIAL_PROOF,
  VALUE_PROPOSITIONS,
} from './copy.js';

export const MAX_FEATURES = 8;

/**
 * Upper bounds on how many images a role asks for.
 */
export const MAX_IMAGES_PER_ROLE = {
  features: 6,
  testimonials: 2,
} as const;

export interface ContentAssemblerOptions {
  /** Source for variant selection; unseeded by default. */
  random?: RandomSource;
  logger?: ILogger;
}

/**
 * Builds content documents. Sections are only emitted when they have data,
 * so renderers never see empty blocks.
 */
export class ContentAssembler {
  private readonly random: RandomSource;
  private readonly logger: ILogger;

  constructor(options: ContentAssemblerOptions = {}) {
    this.random = options.random ?? createRandomSource();
    this.logger = options.logger ?? createLogger('warn', 'ContentAssembler');
  }

  assemble(brand: BrandRecord, campaign: CampaignParameters): ContentDocument {
    const what = present(campaign.what);
    const why = present(campaign.why);
    const who = present(campaign.who);
    const ctx: CopyContext = {
      brandName: brand.name,
      what: what?.toLowerCase(),
      why: why?.toLowerCase(),
      who: who ?? DEFAULT_AUDIENCE,
      description: present(brand.description),
    };

    const hero = {
      title: what ?? brand.name,
      subtitle: why ?? present(brand.tagline) ?? brand.name,
      description: pick(this.random, HERO_DESCRIPTIONS)(ctx),
      audience: ctx.who,
    };

    const sections: Section[] = [{ id: 'hero', kind: 'hero', payload: hero }];

    if (why) {
      sections.push({
        id: 'value-prop',
        kind: 'value-prop',
        payload: { title: SECTION_TITLES['value-prop'], text: pick(this.random, VALUE_PROPOSITIONS)(ctx) },
      });
    }

    if (ctx.description) {
      sections.push({
        id: 'about',
        kind: 'about',
        payload: {
          title: `About ${brand.name}`,
          text: `${ctx.description} ${pick(this.random, ABOUT_SUFFIXES)(ctx)}`,
        },
      });
    }

    const features = this.buildFeatures(brand.keywords);
    if (features.length > 0) {
      sections.push({
        id: 'features',
        kind: 'features',
        payload: { title: SECTION_TITLES.features, items: features },
      });
    }

    if (what || who) {
      sections.push({
        id: 'benefits',
        kind: 'benefits',
        payload: { title: SECTION_TITLES.benefits, items: BENEFITS.map(benefit => benefit(ctx)) },
      });
    }

    const steps = PROCESS_STEPS.map((step, index) => ({ step: index + 1, ...step(ctx) }));
    sections.push({
      id: 'process',
      kind: 'process',
      payload: { title: SECTION_TITLES.process, steps },
    });

    const testimonials = brand.testimonials ?? [];
    if (testimonials.length > 0) {
      sections.push({
        id: 'testimonials',
        kind: 'testimonials',
        payload: { title: SECTION_TITLES.testimonials, items: testimonials },
      });
      sections.push({
        id: 'social-proof',
        kind: 'social-proof',
        payload: { title: SECTION_TITLES['social-proof'], text: pick(this.random, SOCIAL_PROOF)(ctx) },
      });
    }

    const imageSlots: ImageSlots = {
      hero: 1,
      features: Math.min(features.length, MAX_IMAGES_PER_ROLE.features),
      process: steps.length,
      testimonials: Math.min(testimonials.length, MAX_IMAGES_PER_ROLE.testimonials),
    };

    const callToAction = present(campaign.callToAction) ?? pick(this.random, CALLS_TO_ACTION);

    this.logger.debug('Assembled content', {
      sections: sections.map(section => section.kind),
      imageSlots,
    });

    return { hero, callToAction, sections, imageSlots };
  }

  private buildFeatures(keywords: string[]): Feature[] {
    const seen = new Set<string>();
    const features: Feature[] = [];

    for (const raw of keywords) {
      const keyword = raw.trim();
      const key = keyword.toLowerCase();
      if (!keyword || NAVIGATION_DENYLIST.includes(key) || seen.has(key)) {
        continue;
      }
      seen.add(key);
      features.push({
        title: keyword,
        description: pick(this.random, FEATURE_DESCRIPTIONS)(key),
        icon: FEATURE_ICONS[key] ?? DEFAULT_FEATURE_ICON,
      });
      if (features.length === MAX_FEATURES) {
        break;
      }
    }

    return features;
  }
}

/**
 * Validates a content document supplied from outside the assembler,
 * such as a precomputed outline. Unknown section kinds are rejected.
 */
export function parseContentDocument(value: unknown): ContentDocument {
  const parsed = contentDocumentSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'document';
    throw new InvalidContentError(`Invalid content document at ${where || 'root'}: ${issue?.message ?? 'unknown error'}`, parsed.error);
  }
  return parsed.data;
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
