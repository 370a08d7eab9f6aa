import { z } from 'zod';

/**
 * Semantic image roles a template asks images for.
 */
export const IMAGE_ROLES = ['hero', 'features', 'process', 'testimonials'] as const;

export type ImageRole = (typeof IMAGE_ROLES)[number];

export const testimonialSchema = z.object({
  quote: z.string().min(1),
  author: z.string().min(1),
  role: z.string().optional(),
  company: z.string().optional(),
});

export type Testimonial = z.infer<typeof testimonialSchema>;

const roleImagesSchema = z
  .object({
    hero: z.array(z.string()).optional(),
    features: z.array(z.string()).optional(),
    process: z.array(z.string()).optional(),
    testimonials: z.array(z.string()).optional(),
  })
  .strict();

export type RoleImages = z.infer<typeof roleImagesSchema>;

/**
 * Brand identity and design tokens as delivered by the ingestion subsystem.
 * Read-only inside the pipeline.
 */
export const brandRecordSchema = z.object({
  name: z.string().min(1),
  tagline: z.string().optional(),
  description: z.string().optional(),
  website: z.string().optional(),
  tone: z.string().optional(),
  colors: z
    .object({
      primary: z.string().optional(),
      secondary: z.string().optional(),
      accent: z.string().optional(),
      muted: z.string().optional(),
      background: z.string().optional(),
      text: z.string().optional(),
      palette: z.array(z.string()).optional(),
    })
    .default({}),
  typography: z
    .object({
      heading: z.string().optional(),
      body: z.string().optional(),
      fallbacks: z.array(z.string()).default([]),
      detected: z.array(z.string()).default([]),
    })
    .default({}),
  keywords: z.array(z.string()).default([]),
  images: z.array(z.string()).default([]),
  testimonials: z.array(testimonialSchema).optional(),
  generatedImages: roleImagesSchema.optional(),
});

export type BrandRecord = z.infer<typeof brandRecordSchema>;

/**
 * Brand record as accepted from callers, before defaults are applied.
 */
export type BrandRecordInput = z.input<typeof brandRecordSchema>;

/**
 * Per-request campaign tuple: what we're building, why it matters,
 * who it's for and the call to action.
 */
export const campaignParametersSchema = z.object({
  what: z.string().optional(),
  why: z.string().optional(),
  who: z.string().optional(),
  callToAction: z.string().optional(),
  notes: z.string().optional(),
});

export type CampaignParameters = z.infer<typeof campaignParametersSchema>;

export { roleImagesSchema };
