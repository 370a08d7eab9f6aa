import type { ImageRole, ImageSlots } from '../types/index.js';
import { IMAGE_ROLES } from '../types/index.js';
import type { ImageAttemptContext, ImageProvider } from './ImageProvider.js';

/**
 * Splits the brand's extracted images by position: the first slots.hero go
 * to the hero, the next slots.features to features, then process, then
 * testimonials. A role whose partition is short gets what is there; leftover
 * images past the last partition are never used.
 */
export class ExtractedImageProvider implements ImageProvider {
  readonly name = 'extracted';

  async attempt(role: ImageRole, needed: number, ctx: ImageAttemptContext): Promise<string[] | undefined> {
    const images = ctx.brand.images.map(url => url.trim()).filter(url => url.length > 0);
    const partition = partitionImages(images, ctx.slots)[role];
    return partition.length > 0 ? partition.slice(0, needed) : undefined;
  }
}

/**
 * Position-based partition of extracted images per role.
 */
export function partitionImages(images: readonly string[], slots: ImageSlots): Record<ImageRole, string[]> {
  let offset = 0;
  const result: Record<ImageRole, string[]> = { hero: [], features: [], process: [], testimonials: [] };
  for (const role of IMAGE_ROLES) {
    result[role] = images.slice(offset, offset + slots[role]);
    offset += slots[role];
  }
  return result;
}
