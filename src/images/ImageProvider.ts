import type {
  BrandRecord,
  CampaignParameters,
  ContentDocument,
  ImageRole,
  ImageSlots,
  RoleImages,
} from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';

/**
 * Inputs shared by every provider for one render.
 */
export interface ImageResolutionContext {
  brand: BrandRecord;
  campaign: CampaignParameters;
  /** Used for feature titles in generation prompts. */
  content?: ContentDocument;
  /** Generated images attached to the request; take precedence over the brand's. */
  generatedImages?: RoleImages;
}

/**
 * Context passed to a single attempt.
 */
export interface ImageAttemptContext extends ImageResolutionContext {
  slots: ImageSlots;
  /** Images already chosen for this role by earlier providers. */
  alreadyResolved: number;
  signal?: AbortSignal;
  logger: ILogger;
}

/**
 * One strategy in the image resolution chain.
 *
 * `attempt` resolves to at most `needed` URLs, or undefined when the provider
 * has nothing for the role. Throwing is treated the same as undefined.
 */
export interface ImageProvider {
  readonly name: string;
  attempt(role: ImageRole, needed: number, ctx: ImageAttemptContext): Promise<string[] | undefined>;
}
