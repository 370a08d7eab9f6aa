/**
 * Resolves images for every role through an ordered list of providers.
 *
 * Each role is filled independently: providers are tried in order and each
 * contributes up to what is still missing. A provider that throws counts as
 * having produced nothing. The resulting lists always match the slot counts.
 */

import type { ImageRole, ImageSlots, ResolvedImageSet } from '../types/index.js';
import { IMAGE_ROLES } from '../types/index.js';
import { ImageProviderError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger, errorMessage } from '../utils/Logger.js';
import { CuratedImageProvider, curatedImages } from './CuratedImageProvider.js';
import { ExtractedImageProvider } from './ExtractedImageProvider.js';
import { GeneratedImageProvider } from './GeneratedImageProvider.js';
import type { ImageGenerationClient } from './ImageGenerationClient.js';
import type { ImageProvider, ImageResolutionContext } from './ImageProvider.js';
import type { PromptedImageProviderOptions } from './PromptedImageProvider.js';
import { PromptedImageProvider } from './PromptedImageProvider.js';

export interface DefaultProvidersOptions {
  /** Enables prompted generation for slots the extracted images leave empty. */
  imageGeneration?: { client: ImageGenerationClient } & PromptedImageProviderOptions;
}

/**
 * Standard provider order: generated, extracted, prompted (when a client is
 * configured), curated.
 */
export function createDefaultImageProviders(options: DefaultProvidersOptions = {}): ImageProvider[] {
  const providers: ImageProvider[] = [new GeneratedImageProvider(), new ExtractedImageProvider()];
  if (options.imageGeneration) {
    const { client, ...rest } = options.imageGeneration;
    providers.push(new PromptedImageProvider(client, rest));
  }
  providers.push(new CuratedImageProvider());
  return providers;
}

export class ImageResolutionChain {
  private readonly providers: readonly ImageProvider[];
  private readonly logger: ILogger;

  constructor(providers: readonly ImageProvider[] = createDefaultImageProviders(), logger?: ILogger) {
    this.providers = providers;
    this.logger = logger ?? createLogger('warn', 'ImageResolutionChain');
  }

  get providerNames(): string[] {
    return this.providers.map(provider => provider.name);
  }

  async resolve(slots: ImageSlots, context: ImageResolutionContext, signal?: AbortSignal): Promise<ResolvedImageSet> {
    const entries = await Promise.all(
      IMAGE_ROLES.map(async role => [role, await this.resolveRole(role, slots, context, signal)] as const)
    );

    const resolved: ResolvedImageSet = { hero: [], features: [], process: [], testimonials: [] };
    for (const [role, images] of entries) {
      resolved[role] = images;
    }
    return resolved;
  }

  private async resolveRole(
    role: ImageRole,
    slots: ImageSlots,
    context: ImageResolutionContext,
    signal: AbortSignal | undefined
  ): Promise<string[]> {
    const target = slots[role];
    const images: string[] = [];
    const sources: Record<string, number> = {};

    for (const provider of this.providers) {
      const needed = target - images.length;
      if (needed <= 0) {
        break;
      }
      let produced: string[] | undefined;
      try {
        produced = await provider.attempt(role, needed, {
          ...context,
          slots,
          alreadyResolved: images.length,
          signal,
          logger: this.logger,
        });
      } catch (error) {
        const failure =
          error instanceof ImageProviderError ? error : new ImageProviderError(provider.name, errorMessage(error), error);
        this.logger.warn('Image provider failed', { role, provider: provider.name, kind: failure.kind, error: failure.message });
        continue;
      }
      const taken = (produced ?? []).slice(0, needed);
      if (taken.length > 0) {
        images.push(...taken);
        sources[provider.name] = taken.length;
      }
    }

    if (images.length < target) {
      // Only reachable with a custom provider list that ends before curated.
      const missing = target - images.length;
      images.push(...curatedImages(role, images.length, missing));
      sources.curated = (sources.curated ?? 0) + missing;
    }

    if (target > 0) {
      this.logger.debug('Resolved images for role', { role, count: images.length, sources });
    }
    return images;
  }
}
