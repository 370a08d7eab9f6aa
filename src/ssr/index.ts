export { ComponentLoader, selectDefaultExport } from './ComponentLoader.js';
export type { LoadedComponent, Renderable } from './ComponentLoader.js';
export { DOCTYPE, renderComponent } from './ComponentRenderer.js';
