export { RemoteEngine, DEFAULT_REMOTE_ENGINE_OPTIONS, buildPreviewWrapper } from './RemoteEngine.js';
export type { RemoteEngineOptions } from './RemoteEngine.js';
export { HttpRemoteGenerationClient, DEFAULT_REMOTE_GENERATION_URL } from './RemoteGenerationClient.js';
export type {
  HttpRemoteGenerationClientOptions,
  RemoteGenerationClient,
  RemoteGenerationRequest,
  RemoteGenerationResult,
} from './RemoteGenerationClient.js';
export { buildRemotePrompt, REMOTE_SYSTEM_PROMPT } from './RemotePromptBuilder.js';
