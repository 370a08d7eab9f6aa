import { TemplateNotFoundError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { EngineOutput, LocalEngineInput, RenderEngine } from './RenderEngine.js';
import type { TemplateRegistry } from './TemplateRegistry.js';

/**
 * Renders the built-in HTML templates.
 */
export class StaticMarkupEngine implements RenderEngine {
  readonly id = 'static-markup' as const;
  private readonly registry: TemplateRegistry;
  private readonly logger: ILogger;

  constructor(registry: TemplateRegistry, logger?: ILogger) {
    this.registry = registry;
    this.logger = logger ?? createLogger('warn', 'StaticMarkupEngine');
  }

  async render(input: LocalEngineInput): Promise<EngineOutput> {
    const template = this.registry.get(input.selection.template);
    if (!template) {
      throw new TemplateNotFoundError(input.selection.template, 'no static template registered');
    }
    const html = template.render({
      brand: input.brand,
      campaign: input.campaign,
      content: input.content,
      images: input.images,
      tokens: input.tokens,
    });
    this.logger.debug('Rendered static template', { template: template.name, length: html.length });
    return { html };
  }
}
