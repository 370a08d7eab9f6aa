import type { BrandRecord, CampaignParameters } from './brand.js';
import type { ContentDocument, ResolvedImageSet } from './content.js';
import type { DesignTokens } from './tokens.js';

/**
 * Props every component artifact is rendered with.
 */
export interface ComponentProps {
  data: {
    brand: BrandRecord;
    content: ContentDocument;
    images: ResolvedImageSet;
    tokens: DesignTokens;
  };
  campaignParameters: CampaignParameters;
}
