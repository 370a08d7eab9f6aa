import { RemoteGenerationError, RenderAbortedError, RenderTimeoutError } from '../../core/errors.js';
import { withTimeout } from '../../utils/concurrency.js';
import { escapeHtml, safeUrl } from '../../utils/html.js';
import type { ILogger } from '../../utils/Logger.js';
import { createLogger, errorMessage } from '../../utils/Logger.js';
import type { EngineContext, EngineOutput, RenderEngine } from '../RenderEngine.js';
import type { RemoteGenerationClient } from './RemoteGenerationClient.js';
import { buildRemotePrompt } from './RemotePromptBuilder.js';

export interface RemoteEngineOptions {
  /**
   * Upper bound on one generation call in milliseconds.
   * @default 120000
   */
  timeoutMs?: number;
}

export const DEFAULT_REMOTE_ENGINE_OPTIONS: Required<RemoteEngineOptions> = {
  timeoutMs: 120_000,
};

/**
 * Wraps a hosted preview in a full-viewport page.
 */
export function buildPreviewWrapper(title: string, previewUrl: string): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width,initial-scale=1">
<title>${escapeHtml(title)}</title>
<style>html,body{margin:0;height:100%}iframe{border:0;width:100%;height:100vh}</style>
</head>
<body>
<iframe src="${escapeHtml(previewUrl)}" allow="clipboard-write; fullscreen"></iframe>
</body>
</html>
`;
}

/**
 * Delegates page generation to a hosted service. Every failure surfaces as a
 * RemoteGenerationError so the pipeline can fall back; aborts pass through.
 */
export class RemoteEngine implements RenderEngine<EngineContext> {
  readonly id = 'remote' as const;
  private readonly client: RemoteGenerationClient;
  private readonly options: Required<RemoteEngineOptions>;
  private readonly logger: ILogger;

  constructor(client: RemoteGenerationClient, options: RemoteEngineOptions = {}, logger?: ILogger) {
    this.client = client;
    this.options = { ...DEFAULT_REMOTE_ENGINE_OPTIONS, ...options };
    this.logger = logger ?? createLogger('warn', 'RemoteEngine');
  }

  async render(input: EngineContext): Promise<EngineOutput> {
    const { brand, campaign, content, selection, signal } = input;
    const request = buildRemotePrompt(brand, selection.template, campaign, content.callToAction);
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await withTimeout(
        this.client.generate(request, controller.signal),
        this.options.timeoutMs,
        () => new RenderTimeoutError('remote generation', this.options.timeoutMs),
        () => controller.abort()
      );

      const previewUrl = safeUrl(result.previewUrl);
      if (!previewUrl) {
        throw new RemoteGenerationError(`Preview URL is not an http(s) URL: ${result.previewUrl}`);
      }
      this.logger.info('Remote generation completed', { id: result.id, previewUrl });
      return {
        html: buildPreviewWrapper(`${brand.name} - ${selection.template}`, previewUrl),
        sourcePrompt: request.message,
        previewUrl,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw new RenderAbortedError('remote generation');
      }
      if (error instanceof RemoteGenerationError) {
        throw error;
      }
      throw new RemoteGenerationError(errorMessage(error), { cause: error });
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
