import type {
  BrandRecord,
  CampaignParameters,
  ContentDocument,
  DesignTokens,
  ResolvedImageSet,
} from '../types/index.js';
import { linkedinTemplate } from './templates/linkedin.js';
import { onepagerTemplate } from './templates/onepager.js';

export interface TemplateRenderContext {
  brand: BrandRecord;
  campaign: CampaignParameters;
  content: ContentDocument;
  images: ResolvedImageSet;
  tokens: DesignTokens;
}

/**
 * A built-in HTML template.
 */
export interface StaticTemplate {
  readonly name: string;
  readonly description: string;
  /** Canvas size used when the request does not give one. */
  readonly defaultSize: { width: number; height: number };
  render(ctx: TemplateRenderContext): string;
}

/**
 * Named static templates.
 */
export class TemplateRegistry {
  private readonly templates = new Map<string, StaticTemplate>();

  constructor(templates: readonly StaticTemplate[] = []) {
    for (const template of templates) {
      this.register(template);
    }
  }

  register(template: StaticTemplate): this {
    this.templates.set(template.name, template);
    return this;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  get(name: string): StaticTemplate | undefined {
    return this.templates.get(name);
  }

  names(): string[] {
    return [...this.templates.keys()].sort();
  }
}

/**
 * Registry with the built-in templates.
 */
export function createDefaultTemplateRegistry(): TemplateRegistry {
  return new TemplateRegistry([onepagerTemplate, linkedinTemplate]);
}
