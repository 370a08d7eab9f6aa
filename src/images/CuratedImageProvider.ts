import type { ImageRole } from '../types/index.js';
import type { ImageAttemptContext, ImageProvider } from './ImageProvider.js';

const STOCK = 'https://images.unsplash.com';

/**
 * Curated stock photography per role. Never empty.
 */
export const CURATED_IMAGES: Readonly<Record<ImageRole, readonly [string, ...string[]]>> = {
  hero: [
    `${STOCK}/photo-1451187580459-43490279c0fa?w=800&h=400&fit=crop&crop=center`,
    `${STOCK}/photo-1518709268805-4e9042af2176?w=800&h=400&fit=crop&crop=center`,
    `${STOCK}/photo-1551288049-bebda4e38f71?w=800&h=400&fit=crop&crop=center`,
  ],
  features: [
    `${STOCK}/photo-1551288049-bebda4e38f71?w=300&h=200&fit=crop&crop=center`,
    `${STOCK}/photo-1518709268805-4e9042af2176?w=300&h=200&fit=crop&crop=center`,
    `${STOCK}/photo-1451187580459-43490279c0fa?w=300&h=200&fit=crop&crop=center`,
  ],
  process: [
    `${STOCK}/photo-1551288049-bebda4e38f71?w=250&h=200&fit=crop&crop=center`,
    `${STOCK}/photo-1518709268805-4e9042af2176?w=250&h=200&fit=crop&crop=center`,
    `${STOCK}/photo-1451187580459-43490279c0fa?w=250&h=200&fit=crop&crop=center`,
  ],
  testimonials: [
    `${STOCK}/photo-1507003211169-0a1dd7228f2d?w=150&h=150&fit=crop&crop=face`,
    `${STOCK}/photo-1472099645785-5658abf4ff4e?w=150&h=150&fit=crop&crop=face`,
  ],
};

/**
 * Curated images for slot positions start..start+count-1 of a role,
 * cycling through the set.
 */
export function curatedImages(role: ImageRole, start: number, count: number): string[] {
  const set = CURATED_IMAGES[role];
  return Array.from({ length: count }, (_, i) => set[(start + i) % set.length] ?? set[0]);
}

/**
 * Last link of the chain: always produces exactly what is needed.
 */
export class CuratedImageProvider implements ImageProvider {
  readonly name = 'curated';

  async attempt(role: ImageRole, needed: number, ctx: ImageAttemptContext): Promise<string[]> {
    return curatedImages(role, ctx.alreadyResolved, needed);
  }
}
