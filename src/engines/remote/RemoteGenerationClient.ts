import { z } from 'zod';
import { RemoteGenerationError } from '../../core/errors.js';
import { errorMessage } from '../../utils/Logger.js';

export interface RemoteGenerationRequest {
  /** Full brief for the generator. */
  message: string;
  /** System instruction. */
  system: string;
}

export interface RemoteGenerationResult {
  id: string;
  /** Live preview of the generated page. */
  previewUrl: string;
  /** Link to the generation session, when the service returns one. */
  sessionUrl?: string;
}

/**
 * A hosted service that turns a brief into a live page preview.
 */
export interface RemoteGenerationClient {
  generate(request: RemoteGenerationRequest, signal?: AbortSignal): Promise<RemoteGenerationResult>;
}

export const DEFAULT_REMOTE_GENERATION_URL = 'https://api.v0.dev/v1/chats';

const chatResponseSchema = z.object({
  id: z.string().min(1),
  demo: z.string().url(),
  url: z.string().url().optional(),
});

export interface HttpRemoteGenerationClientOptions {
  apiKey: string;
  url?: string;
  /** Injected for tests. */
  fetch?: typeof fetch;
}

/**
 * Talks to a chat-style page generation API over HTTP with a bearer key.
 */
export class HttpRemoteGenerationClient implements RemoteGenerationClient {
  private readonly apiKey: string;
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRemoteGenerationClientOptions) {
    this.apiKey = options.apiKey;
    this.url = options.url ?? DEFAULT_REMOTE_GENERATION_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(request: RemoteGenerationRequest, signal?: AbortSignal): Promise<RemoteGenerationResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ message: request.message, system: request.system, chatPrivacy: 'private' }),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new RemoteGenerationError(`Request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new RemoteGenerationError(`HTTP ${response.status}: ${body.slice(0, 200)}`, { status: response.status });
    }

    const parsed = chatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RemoteGenerationError('Response is missing a preview URL', { cause: parsed.error });
    }
    return { id: parsed.data.id, previewUrl: parsed.data.demo, sessionUrl: parsed.data.url };
  }
}
