import { z } from 'zod';
import { testimonialSchema } from './brand.js';
import type { ImageRole } from './brand.js';

/**
 * The closed set of section kinds a content document may contain.
 */
export const SECTION_KINDS = [
  'hero',
  'value-prop',
  'about',
  'features',
  'benefits',
  'process',
  'testimonials',
  'social-proof',
] as const;

export type SectionKind = (typeof SECTION_KINDS)[number];

export const heroContentSchema = z.object({
  title: z.string(),
  subtitle: z.string(),
  description: z.string(),
  audience: z.string(),
});

export type HeroContent = z.infer<typeof heroContentSchema>;

export const featureSchema = z.object({
  title: z.string(),
  description: z.string(),
  icon: z.string(),
});

export type Feature = z.infer<typeof featureSchema>;

export const processStepSchema = z.object({
  step: z.number().int().positive(),
  title: z.string(),
  description: z.string(),
});

export type ProcessStep = z.infer<typeof processStepSchema>;

const textPayload = z.object({ title: z.string(), text: z.string().min(1) });

export const sectionSchema = z.discriminatedUnion('kind', [
  z.object({ id: z.string(), kind: z.literal('hero'), payload: heroContentSchema }),
  z.object({ id: z.string(), kind: z.literal('value-prop'), payload: textPayload }),
  z.object({ id: z.string(), kind: z.literal('about'), payload: textPayload }),
  z.object({
    id: z.string(),
    kind: z.literal('features'),
    payload: z.object({ title: z.string(), items: z.array(featureSchema).min(1) }),
  }),
  z.object({
    id: z.string(),
    kind: z.literal('benefits'),
    payload: z.object({ title: z.string(), items: z.array(z.string()).min(1) }),
  }),
  z.object({
    id: z.string(),
    kind: z.literal('process'),
    payload: z.object({ title: z.string(), steps: z.array(processStepSchema).min(1) }),
  }),
  z.object({
    id: z.string(),
    kind: z.literal('testimonials'),
    payload: z.object({ title: z.string(), items: z.array(testimonialSchema).min(1) }),
  }),
  z.object({ id: z.string(), kind: z.literal('social-proof'), payload: textPayload }),
]);

export type Section = z.infer<typeof sectionSchema>;

/**
 * Picks the section variant for a given kind.
 */
export type SectionOf<K extends SectionKind> = Extract<Section, { kind: K }>;

const slotCount = z.number().int().min(0);

export const imageSlotsSchema = z.object({
  hero: slotCount,
  features: slotCount,
  process: slotCount,
  testimonials: slotCount,
});

/**
 * Number of images each role requires.
 */
export type ImageSlots = Record<ImageRole, number>;

export const contentDocumentSchema = z.object({
  hero: heroContentSchema,
  callToAction: z.string(),
  sections: z.array(sectionSchema),
  imageSlots: imageSlotsSchema,
});

/**
 * Structured copy for one render, produced by the content assembler
 * and consumed by an engine.
 */
export type ContentDocument = z.infer<typeof contentDocumentSchema>;

/**
 * Image URLs per role; each list is exactly as long as its slot count.
 */
export type ResolvedImageSet = Record<ImageRole, string[]>;
