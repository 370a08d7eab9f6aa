export { ImageResolutionChain, createDefaultImageProviders } from './ImageResolutionChain.js';
export type { DefaultProvidersOptions } from './ImageResolutionChain.js';
export type { ImageAttemptContext, ImageProvider, ImageResolutionContext } from './ImageProvider.js';
export { GeneratedImageProvider } from './GeneratedImageProvider.js';
export { PromptedImageProvider, DEFAULT_PROMPTED_IMAGE_OPTIONS } from './PromptedImageProvider.js';
export type { PromptedImageProviderOptions } from './PromptedImageProvider.js';
export { ExtractedImageProvider, partitionImages } from './ExtractedImageProvider.js';
export { CuratedImageProvider, CURATED_IMAGES, curatedImages } from './CuratedImageProvider.js';
export { HttpImageGenerationClient, DEFAULT_IMAGE_GENERATION_URL } from './ImageGenerationClient.js';
export type {
  HttpImageGenerationClientOptions,
  ImageGenerationClient,
  ImageGenerationRequest,
} from './ImageGenerationClient.js';
export { buildImagePrompt } from './ImagePromptBuilder.js';
