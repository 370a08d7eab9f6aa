import type {
  BrandRecord,
  CampaignParameters,
  ContentDocument,
  DesignTokens,
  EngineId,
  ResolvedImageSet,
} from '../types/index.js';

/**
 * Outcome of engine resolution.
 */
export interface EngineSelection {
  engine: EngineId;
  template: string;
  /** Component artifact to load, for 'component-ssr'. */
  artifactPath?: string;
  /** Short reason for logs. */
  reason: string;
}

/**
 * What every engine receives.
 */
export interface EngineContext {
  selection: EngineSelection;
  brand: BrandRecord;
  campaign: CampaignParameters;
  content: ContentDocument;
  signal?: AbortSignal;
}

/**
 * Input for engines that render locally and need resolved images.
 */
export interface LocalEngineInput extends EngineContext {
  images: ResolvedImageSet;
  tokens: DesignTokens;
}

export interface EngineOutput {
  html: string;
  /** Prompt sent to a remote generator. */
  sourcePrompt?: string;
  /** Hosted preview the markup embeds. */
  previewUrl?: string;
}

/**
 * A rendering engine produces a complete HTML document.
 */
export interface RenderEngine<I extends EngineContext = LocalEngineInput> {
  readonly id: EngineId;
  render(input: I): Promise<EngineOutput>;
}
