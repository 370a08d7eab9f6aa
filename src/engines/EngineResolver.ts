/**
 * Chooses the rendering engine for a template.
 *
 * Strategies run in order and the first that can serve the request wins:
 * a forced static override, a component artifact on disk, a configured remote
 * generator, then a registered static template. An explicit component-ssr or
 * remote override is tried first but only honored when that engine can serve.
 */

import { stat } from 'node:fs/promises';
import path from 'node:path';
import type { EngineId } from '../types/index.js';
import { InvalidInputError, TemplateNotFoundError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { EngineSelection } from './RenderEngine.js';
import type { TemplateRegistry } from './TemplateRegistry.js';

export const COMPONENT_ENTRY_NAMES = ['index.tsx', 'index.jsx', 'index.ts', 'index.js', 'index.mjs'] as const;

const TEMPLATE_NAME = /^[a-z0-9][a-z0-9._-]*$/i;

export interface EngineResolveRequest {
  template: string;
  override?: EngineId;
}

export interface EngineResolverOptions {
  registry: TemplateRegistry;
  /** Directory holding one subdirectory per component template. */
  componentsDir?: string;
  /** Whether a remote generation client is configured. */
  remoteConfigured?: boolean;
  logger?: ILogger;
}

/**
 * One way of serving a template; undefined means "not me".
 */
interface EngineStrategy {
  readonly engine: EngineId;
  attempt(template: string): Promise<EngineSelection | undefined>;
}

export class EngineResolver {
  private readonly registry: TemplateRegistry;
  private readonly componentsDir?: string;
  private readonly remoteConfigured: boolean;
  private readonly logger: ILogger;
  private readonly strategies: readonly EngineStrategy[];

  constructor(options: EngineResolverOptions) {
    this.registry = options.registry;
    this.componentsDir = options.componentsDir;
    this.remoteConfigured = options.remoteConfigured ?? false;
    this.logger = options.logger ?? createLogger('warn', 'EngineResolver');
    this.strategies = [
      { engine: 'component-ssr', attempt: template => this.componentStrategy(template) },
      { engine: 'remote', attempt: async template => this.remoteStrategy(template) },
      { engine: 'static-markup', attempt: async template => this.staticStrategy(template, 'static template registered') },
    ];
  }

  async resolve(request: EngineResolveRequest): Promise<EngineSelection> {
    const { template, override } = request;
    if (!TEMPLATE_NAME.test(template)) {
      throw new InvalidInputError(`Invalid template name "${template}"`);
    }

    if (override === 'static-markup') {
      const forced = this.staticStrategy(template, 'static engine forced');
      if (!forced) {
        throw new TemplateNotFoundError(template, 'static engine forced but no static template is registered');
      }
      return this.selected(forced);
    }

    const ordered = override
      ? [...this.strategies.filter(s => s.engine === override), ...this.strategies.filter(s => s.engine !== override)]
      : this.strategies;

    for (const strategy of ordered) {
      const selection = await strategy.attempt(template);
      if (selection) {
        if (override && selection.engine !== override) {
          this.logger.info('Requested engine cannot serve template, falling through', {
            template,
            requested: override,
            engine: selection.engine,
          });
        }
        return this.selected(selection);
      }
    }

    throw new TemplateNotFoundError(template);
  }

  /**
   * Path of the component artifact for a template, if one exists.
   */
  async findComponentArtifact(template: string): Promise<string | undefined> {
    if (!this.componentsDir) {
      return undefined;
    }
    for (const entry of COMPONENT_ENTRY_NAMES) {
      const candidate = path.join(this.componentsDir, template, entry);
      try {
        if ((await stat(candidate)).isFile()) {
          return candidate;
        }
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    }
    return undefined;
  }

  private async componentStrategy(template: string): Promise<EngineSelection | undefined> {
    const artifactPath = await this.findComponentArtifact(template);
    return artifactPath
      ? { engine: 'component-ssr', template, artifactPath, reason: 'component artifact found' }
      : undefined;
  }

  private remoteStrategy(template: string): EngineSelection | undefined {
    return this.remoteConfigured ? { engine: 'remote', template, reason: 'remote generation configured' } : undefined;
  }

  private staticStrategy(template: string, reason: string): EngineSelection | undefined {
    return this.registry.has(template) ? { engine: 'static-markup', template, reason } : undefined;
  }

  private selected(selection: EngineSelection): EngineSelection {
    this.logger.debug('Engine selected', {
      template: selection.template,
      engine: selection.engine,
      reason: selection.reason,
    });
    return selection;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
