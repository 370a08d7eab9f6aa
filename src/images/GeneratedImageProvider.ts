import type { ImageRole } from '../types/index.js';
import type { ImageAttemptContext, ImageProvider } from './ImageProvider.js';

/**
 * Uses images an upstream generation step already attached to the request or
 * the brand. A role is served only when its list covers the whole need.
 */
export class GeneratedImageProvider implements ImageProvider {
  readonly name = 'generated';

  async attempt(role: ImageRole, needed: number, ctx: ImageAttemptContext): Promise<string[] | undefined> {
    const source = ctx.generatedImages ?? ctx.brand.generatedImages;
    const images = (source?.[role] ?? []).map(url => url.trim()).filter(url => url.length > 0);
    if (images.length < needed) {
      if (images.length > 0) {
        ctx.logger.debug('Generated images insufficient for role', { role, available: images.length, needed });
      }
      return undefined;
    }
    return images.slice(0, needed);
  }
}
