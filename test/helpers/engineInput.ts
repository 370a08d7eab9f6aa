import { ContentAssembler } from '../../src/content/ContentAssembler.js';
import { createDesignTokens } from '../../src/content/DesignTokens.js';
import type { EngineSelection, LocalEngineInput } from '../../src/engines/RenderEngine.js';
import { curatedImages } from '../../src/images/CuratedImageProvider.js';
import type { BrandRecord, CampaignParameters } from '../../src/types/index.js';
import { brand as defaultBrand, campaign as defaultCampaign, constantRandom, silentLogger } from './fixtures.js';

/**
 * Engine input with content from a pinned assembler and curated images.
 */
export function engineInput(
  selection: EngineSelection,
  brand: BrandRecord = defaultBrand,
  campaign: CampaignParameters = defaultCampaign
): LocalEngineInput {
  const content = new ContentAssembler({ random: constantRandom(0), logger: silentLogger }).assemble(brand, campaign);
  const { imageSlots } = content;
  return {
    selection,
    brand,
    campaign,
    content,
    images: {
      hero: curatedImages('hero', 0, imageSlots.hero),
      features: curatedImages('features', 0, imageSlots.features),
      process: curatedImages('process', 0, imageSlots.process),
      testimonials: curatedImages('testimonials', 0, imageSlots.testimonials),
    },
    tokens: createDesignTokens(brand),
  };
}
