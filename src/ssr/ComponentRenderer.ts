import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { ComponentProps } from '../types/index.js';
import { ComponentRenderError } from '../core/errors.js';
import type { LoadedComponent } from './ComponentLoader.js';

export const DOCTYPE = '<!doctype html>';

/**
 * Renders a loaded component to a static HTML document. Rendering is
 * synchronous; anything the component throws becomes a ComponentRenderError.
 */
export function renderComponent(loaded: LoadedComponent, props: ComponentProps): string {
  let markup: string;
  try {
    markup = renderToStaticMarkup(createElement(loaded.component, props));
  } catch (error) {
    throw new ComponentRenderError(loaded.artifactPath, error);
  }
  return `${DOCTYPE}${markup}`;
}
