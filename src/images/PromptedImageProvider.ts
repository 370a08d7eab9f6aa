import type { ImageRole } from '../types/index.js';
import { ImageProviderError, RenderTimeoutError } from '../core/errors.js';
import { Semaphore, withTimeout } from '../utils/concurrency.js';
import { errorMessage } from '../utils/Logger.js';
import type { ImageGenerationClient } from './ImageGenerationClient.js';
import type { ImageAttemptContext, ImageProvider } from './ImageProvider.js';
import { buildImagePrompt } from './ImagePromptBuilder.js';

export interface PromptedImageProviderOptions {
  /**
   * Concurrent generation calls across all roles.
   * @default 3
   */
  concurrency?: number;

  /**
   * Timeout per generation call in milliseconds.
   * @default 20000
   */
  timeoutMs?: number;
}

export const DEFAULT_PROMPTED_IMAGE_OPTIONS: Required<PromptedImageProviderOptions> = {
  concurrency: 3,
  timeoutMs: 20_000,
};

const SIZE_BY_ROLE: Record<ImageRole, string> = {
  hero: '1792x1024',
  features: '1024x1024',
  process: '1024x1024',
  testimonials: '1024x1024',
};

/**
 * Generates one image per remaining slot through an image generation client.
 * Slots that fail or time out are skipped, leaving them to later providers.
 */
export class PromptedImageProvider implements ImageProvider {
  readonly name = 'prompted';
  private readonly client: ImageGenerationClient;
  private readonly options: Required<PromptedImageProviderOptions>;
  private readonly semaphore: Semaphore;

  constructor(client: ImageGenerationClient, options: PromptedImageProviderOptions = {}) {
    this.client = client;
    this.options = { ...DEFAULT_PROMPTED_IMAGE_OPTIONS, ...options };
    this.semaphore = new Semaphore(this.options.concurrency);
  }

  async attempt(role: ImageRole, needed: number, ctx: ImageAttemptContext): Promise<string[] | undefined> {
    const indices = Array.from({ length: needed }, (_, i) => ctx.alreadyResolved + i);
    const results = await Promise.all(indices.map(index => this.generateOne(role, index, ctx)));
    const urls = results.filter((url): url is string => url !== undefined);
    return urls.length > 0 ? urls : undefined;
  }

  private async generateOne(role: ImageRole, index: number, ctx: ImageAttemptContext): Promise<string | undefined> {
    const prompt = buildImagePrompt(role, index, ctx);
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(ctx.signal?.reason);
    ctx.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await this.semaphore.run(
        () =>
          withTimeout(
            this.client.generate({ prompt, size: SIZE_BY_ROLE[role] }, controller.signal),
            this.options.timeoutMs,
            () => new RenderTimeoutError(`image generation for ${role}[${index}]`, this.options.timeoutMs),
            () => controller.abort()
          ),
        controller.signal
      );
    } catch (error) {
      const failure =
        error instanceof ImageProviderError ? error : new ImageProviderError(this.name, errorMessage(error), error);
      ctx.logger.warn('Image generation failed for slot', { role, index, kind: failure.kind, error: failure.message });
      return undefined;
    } finally {
      ctx.signal?.removeEventListener('abort', onAbort);
    }
  }
}
