import { z } from 'zod';
import { ImageProviderError } from '../core/errors.js';

export interface ImageGenerationRequest {
  prompt: string;
  /** e.g. "1024x1024" */
  size: string;
}

/**
 * A service that turns a prompt into a hosted image URL.
 */
export interface ImageGenerationClient {
  generate(request: ImageGenerationRequest, signal?: AbortSignal): Promise<string>;
}

export const DEFAULT_IMAGE_GENERATION_URL = 'https://api.openai.com/v1/images/generations';

const generationResponseSchema = z.object({
  data: z.array(z.object({ url: z.string().url() })).min(1),
});

export interface HttpImageGenerationClientOptions {
  apiKey: string;
  url?: string;
  /** Injected for tests. */
  fetch?: typeof fetch;
}

/**
 * Image generation over an OpenAI-compatible images endpoint.
 */
export class HttpImageGenerationClient implements ImageGenerationClient {
  private readonly apiKey: string;
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpImageGenerationClientOptions) {
    this.apiKey = options.apiKey;
    this.url = options.url ?? DEFAULT_IMAGE_GENERATION_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(request: ImageGenerationRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ prompt: request.prompt, n: 1, size: request.size }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new ImageProviderError('prompted', `HTTP ${response.status}: ${body.slice(0, 200)}`);
    }

    const parsed = generationResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ImageProviderError('prompted', 'Unexpected response shape', parsed.error);
    }
    const [first] = parsed.data.data;
    if (!first) {
      throw new ImageProviderError('prompted', 'Response contained no images');
    }
    return first.url;
  }
}
