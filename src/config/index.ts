export { loadConfig } from './config.js';
export type { RendererConfig } from './config.js';
