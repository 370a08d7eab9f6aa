export { RenderPipeline, createRenderPipeline } from './RenderPipeline.js';
export type { PipelineStateListener, PipelineTransitionEvent, RenderPipelineOptions } from './RenderPipeline.js';

export { ArtifactWriter, artifactPaths, sha256 } from './ArtifactWriter.js';
export type { ArtifactWriteRequest, WrittenArtifact } from './ArtifactWriter.js';

export {
  RenderPipelineError,
  TemplateNotFoundError,
  InvalidComponentExportError,
  ComponentRenderError,
  ImageProviderError,
  RemoteGenerationError,
  RenderTimeoutError,
  RenderAbortedError,
  InvalidInputError,
  InvalidContentError,
  isRenderPipelineError,
  throwIfAborted,
} from './errors.js';
export type { RenderErrorKind } from './errors.js';
