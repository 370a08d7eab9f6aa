import type { EngineId, OutputFormat } from './options.js';
import type { ResolvedImageSet } from './content.js';

/**
 * States of a single pipeline run.
 */
export type PipelineState =
  | 'assembling'
  | 'engine-selected'
  | 'rendering'
  | 'font-normalizing'
  | 'rasterizing'
  | 'done'
  | 'failed';

/**
 * A recorded state transition.
 */
export interface StateTransition {
  state: PipelineState;
  at: string;
  /** Error kind when state is 'failed'. */
  errorKind?: string;
}

/**
 * Result of one render.
 */
export interface RenderArtifact {
  /**
   * Output format.
   */
  format: OutputFormat;

  /**
   * Artifact bytes: UTF-8 markup for HTML, image or document bytes otherwise.
   */
  data: Buffer;

  /**
   * Where the artifact was written, when an output path was given.
   */
  path?: string;

  /**
   * Where the manifest was written, when an output path was given.
   */
  manifestPath?: string;

  /**
   * Zip bundle path, when bundling was requested.
   */
  bundlePath?: string;

  /**
   * Canvas width in CSS pixels.
   */
  width: number;

  /**
   * Canvas height in CSS pixels.
   */
  height: number;

  /**
   * Device scale factor the artifact was captured at.
   */
  scale: number;

  /**
   * Engine that produced the markup.
   */
  engineUsed: EngineId;

  /**
   * ISO timestamp of completion.
   */
  generatedAt: string;
}

/**
 * Traceability record written next to every artifact.
 */
export interface RenderManifest {
  template: string;
  engine: EngineId;
  /** Engine that was selected first but failed transiently. */
  fallbackFrom?: EngineId;
  format: OutputFormat;
  width: number;
  height: number;
  scale: number;
  generatedAt: string;
  byteLength: number;
  sha256: string;
  /** Prompt sent to the remote engine, when it was used. */
  sourcePrompt?: string;
  previewUrl?: string;
  fonts: {
    heading: string;
    body: string;
    inUse: string[];
  };
  images: ResolvedImageSet;
  states: StateTransition[];
}
