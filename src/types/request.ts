import type { BrandRecordInput, CampaignParameters, RoleImages } from './brand.js';
import type { RenderOptions } from './options.js';

/**
 * One render job.
 */
export interface RenderRequest {
  /** Template name, e.g. 'onepager'. */
  template: string;
  brand: BrandRecordInput;
  campaign?: CampaignParameters;
  /**
   * Precomputed content document (an outline produced elsewhere). Validated
   * before use; when absent the content is assembled from brand and campaign.
   */
  content?: unknown;
  /** Generated images per role; take precedence over the brand's own. */
  generatedImages?: RoleImages;
  options?: RenderOptions;
  /**
   * Where to write the artifact. The manifest and optional bundle go beside
   * it. Without a path the artifact is only returned.
   */
  outputPath?: string;
  /** Pins copy variant selection. */
  seed?: number;
  signal?: AbortSignal;
}
