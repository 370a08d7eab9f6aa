export { EngineResolver, COMPONENT_ENTRY_NAMES } from './EngineResolver.js';
export type { EngineResolveRequest, EngineResolverOptions } from './EngineResolver.js';
export type { EngineContext, EngineOutput, EngineSelection, LocalEngineInput, RenderEngine } from './RenderEngine.js';
export { StaticMarkupEngine } from './StaticMarkupEngine.js';
export { ComponentSsrEngine } from './ComponentSsrEngine.js';
export { TemplateRegistry, createDefaultTemplateRegistry } from './TemplateRegistry.js';
export type { StaticTemplate, TemplateRenderContext } from './TemplateRegistry.js';
export * from './remote/index.js';
