/**
 * Loads a UI component artifact from source.
 *
 * The artifact is bundled with esbuild into a CommonJS module, React kept
 * external so the component shares this process's React, then evaluated
 * once. The default export is checked at load time so a malformed artifact
 * fails here rather than midway through rendering.
 */

import { createRequire } from 'node:module';
import path from 'node:path';
import { Script } from 'node:vm';
import { build } from 'esbuild';
import type { ComponentType } from 'react';
import type { ComponentProps } from '../types/index.js';
import { InvalidComponentExportError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger, errorMessage } from '../utils/Logger.js';

/**
 * A component that renders a page from content props.
 */
export type Renderable = ComponentType<ComponentProps>;

export interface LoadedComponent {
  artifactPath: string;
  component: Renderable;
}

const REACT_EXTERNALS = ['react', 'react-dom', 'react/*', 'react-dom/*'];

const requireFromHere = createRequire(import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isRenderable(value: unknown): value is Renderable {
  return typeof value === 'function';
}

/**
 * Finds the component among a module's exports: the module itself, its
 * default export, or a default export wrapped once more by interop.
 */
export function selectDefaultExport(moduleExports: unknown): Renderable | undefined {
  if (isRenderable(moduleExports)) {
    return moduleExports;
  }
  if (!isRecord(moduleExports)) {
    return undefined;
  }
  const candidate = moduleExports.default;
  if (isRenderable(candidate)) {
    return candidate;
  }
  if (isRecord(candidate) && isRenderable(candidate.default)) {
    return candidate.default;
  }
  return undefined;
}

export class ComponentLoader {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'ComponentLoader');
  }

  async load(artifactPath: string): Promise<LoadedComponent> {
    const absolutePath = path.resolve(artifactPath);
    const code = await this.bundle(absolutePath);
    const moduleExports = this.evaluate(absolutePath, code);

    const component = selectDefaultExport(moduleExports);
    if (!component) {
      const found = isRecord(moduleExports) ? Object.keys(moduleExports) : [];
      throw new InvalidComponentExportError(
        absolutePath,
        `default export is missing or not a component (exports: ${found.length > 0 ? found.join(', ') : 'none'})`
      );
    }

    this.logger.debug('Loaded component artifact', { artifactPath: absolutePath, bytes: code.length });
    return { artifactPath: absolutePath, component };
  }

  private async bundle(artifactPath: string): Promise<string> {
    try {
      const result = await build({
        entryPoints: [artifactPath],
        bundle: true,
        write: false,
        platform: 'node',
        format: 'cjs',
        target: 'node20',
        jsx: 'automatic',
        external: REACT_EXTERNALS,
        logLevel: 'silent',
      });
      const [output] = result.outputFiles;
      if (!output) {
        throw new Error('esbuild produced no output');
      }
      return output.text;
    } catch (error) {
      throw new InvalidComponentExportError(artifactPath, `bundling failed: ${errorMessage(error)}`, error);
    }
  }

  private evaluate(artifactPath: string, code: string): unknown {
    const module: { exports: unknown } = { exports: {} };
    try {
      const wrapper: unknown = new Script(
        `(function (exports, require, module, __filename, __dirname) {\n${code}\n})`,
        { filename: artifactPath }
      ).runInThisContext();
      if (typeof wrapper !== 'function') {
        throw new Error('module wrapper did not evaluate to a function');
      }
      wrapper(module.exports, requireFromHere, module, artifactPath, path.dirname(artifactPath));
    } catch (error) {
      throw new InvalidComponentExportError(artifactPath, `module evaluation failed: ${errorMessage(error)}`, error);
    }
    return module.exports;
  }
}
