/**
 * Error taxonomy for the rendering pipeline.
 *
 * Structural failures (missing template, malformed component) abort a render.
 * Image provider and transient remote failures are recovered inside the
 * pipeline and only ever appear in logs.
 */

export type RenderErrorKind =
  | 'TemplateNotFound'
  | 'InvalidComponentExport'
  | 'ComponentRenderFailure'
  | 'ImageProviderFailure'
  | 'RemoteGenerationFailure'
  | 'RenderTimeout'
  | 'RenderAborted'
  | 'InvalidInput'
  | 'InvalidContent';

/**
 * Base class for every error the pipeline raises.
 */
export class RenderPipelineError extends Error {
  readonly kind: RenderErrorKind;
  /** Whether the caller may retry the failed step with identical input. */
  readonly retryable: boolean;

  constructor(kind: RenderErrorKind, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = `${kind}Error`;
    this.kind = kind;
    this.retryable = options.retryable ?? false;
  }
}

export class TemplateNotFoundError extends RenderPipelineError {
  readonly template: string;

  constructor(template: string, detail?: string) {
    super('TemplateNotFound', `No engine can render template "${template}"${detail ? `: ${detail}` : ''}`);
    this.template = template;
  }
}

export class InvalidComponentExportError extends RenderPipelineError {
  readonly artifactPath: string;

  constructor(artifactPath: string, detail: string, cause?: unknown) {
    super('InvalidComponentExport', `Invalid component artifact ${artifactPath}: ${detail}`, { cause });
    this.artifactPath = artifactPath;
  }
}

export class ComponentRenderError extends RenderPipelineError {
  constructor(artifactPath: string, cause: unknown) {
    super('ComponentRenderFailure', `Component ${artifactPath} threw while rendering`, { cause });
  }
}

export class ImageProviderError extends RenderPipelineError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super('ImageProviderFailure', `${provider}: ${message}`, { retryable: true, cause });
    this.provider = provider;
  }
}

export class RemoteGenerationError extends RenderPipelineError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('RemoteGenerationFailure', message, { retryable: true, cause: options.cause });
    this.status = options.status;
  }
}

export class RenderTimeoutError extends RenderPipelineError {
  readonly timeoutMs: number;

  constructor(stage: string, timeoutMs: number, cause?: unknown) {
    super('RenderTimeout', `${stage} timed out after ${timeoutMs}ms`, { retryable: true, cause });
    this.timeoutMs = timeoutMs;
  }
}

export class RenderAbortedError extends RenderPipelineError {
  constructor(stage: string) {
    super('RenderAborted', `Render aborted during ${stage}`);
  }
}

export class InvalidInputError extends RenderPipelineError {
  constructor(message: string, cause?: unknown) {
    super('InvalidInput', message, { cause });
  }
}

export class InvalidContentError extends RenderPipelineError {
  constructor(message: string, cause?: unknown) {
    super('InvalidContent', message, { cause });
  }
}

export function isRenderPipelineError(error: unknown): error is RenderPipelineError {
  return error instanceof RenderPipelineError;
}

/**
 * Throws RenderAbortedError if the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RenderAbortedError(stage);
  }
}
