import { stat } from 'node:fs/promises';
import { TemplateNotFoundError } from '../core/errors.js';
import type { LoadedComponent } from '../ssr/ComponentLoader.js';
import { ComponentLoader } from '../ssr/ComponentLoader.js';
import { renderComponent } from '../ssr/ComponentRenderer.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { EngineOutput, LocalEngineInput, RenderEngine } from './RenderEngine.js';

/**
 * Server-side renders a component artifact with the content document.
 * Loaded artifacts are reused until the file changes.
 */
export class ComponentSsrEngine implements RenderEngine {
  readonly id = 'component-ssr' as const;
  private readonly loader: ComponentLoader;
  private readonly logger: ILogger;
  private readonly cache = new Map<string, { mtimeMs: number; loaded: LoadedComponent }>();

  constructor(loader?: ComponentLoader, logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'ComponentSsrEngine');
    this.loader = loader ?? new ComponentLoader(this.logger.child('Loader'));
  }

  async render(input: LocalEngineInput): Promise<EngineOutput> {
    const { artifactPath } = input.selection;
    if (!artifactPath) {
      throw new TemplateNotFoundError(input.selection.template, 'no component artifact selected');
    }

    const loaded = await this.load(artifactPath);
    const html = renderComponent(loaded, {
      data: {
        brand: input.brand,
        content: input.content,
        images: input.images,
        tokens: input.tokens,
      },
      campaignParameters: input.campaign,
    });
    this.logger.debug('Rendered component', { artifactPath: loaded.artifactPath, length: html.length });
    return { html };
  }

  private async load(artifactPath: string): Promise<LoadedComponent> {
    const { mtimeMs } = await stat(artifactPath);
    const cached = this.cache.get(artifactPath);
    if (cached && cached.mtimeMs === mtimeMs) {
      return cached.loaded;
    }
    const loaded = await this.loader.load(artifactPath);
    this.cache.set(artifactPath, { mtimeMs, loaded });
    return loaded;
  }
}
