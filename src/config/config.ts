import { z } from 'zod';
import type { LogLevel } from '../types/index.js';
import { InvalidInputError } from '../core/errors.js';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value.trim() === '' ? fallback : Number(value)))
    .pipe(z.number().int().positive());

const envSchema = z.object({
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn')
  ),
  COMPONENTS_DIR: optionalString,
  REMOTE_GENERATION_API_KEY: optionalString,
  REMOTE_GENERATION_URL: optionalString.pipe(z.string().url().optional()),
  IMAGE_GENERATION_API_KEY: optionalString,
  IMAGE_GENERATION_URL: optionalString.pipe(z.string().url().optional()),
  IMAGE_GENERATION_CONCURRENCY: positiveInt(3),
  PUPPETEER_EXECUTABLE_PATH: optionalString,
  BROWSER_MAX_CONTEXTS: positiveInt(4),
  RENDER_TIMEOUT_MS: positiveInt(30_000),
});

/**
 * Runtime configuration read from the environment.
 */
export interface RendererConfig {
  logLevel: LogLevel;
  componentsDir?: string;
  remoteGeneration?: { apiKey: string; url?: string };
  imageGeneration?: { apiKey: string; url?: string; concurrency: number };
  browser: { executablePath?: string; maxContexts: number };
  renderTimeoutMs: number;
}

/**
 * Validates environment variables into a config. Credentials that are unset
 * or blank leave the corresponding integration disabled.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RendererConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidInputError(`Invalid configuration: ${details}`, parsed.error);
  }
  const vars = parsed.data;

  return {
    logLevel: vars.LOG_LEVEL,
    componentsDir: vars.COMPONENTS_DIR,
    remoteGeneration: vars.REMOTE_GENERATION_API_KEY
      ? { apiKey: vars.REMOTE_GENERATION_API_KEY, url: vars.REMOTE_GENERATION_URL }
      : undefined,
    imageGeneration: vars.IMAGE_GENERATION_API_KEY
      ? {
          apiKey: vars.IMAGE_GENERATION_API_KEY,
          url: vars.IMAGE_GENERATION_URL,
          concurrency: vars.IMAGE_GENERATION_CONCURRENCY,
        }
      : undefined,
    browser: {
      executablePath: vars.PUPPETEER_EXECUTABLE_PATH,
      maxContexts: vars.BROWSER_MAX_CONTEXTS,
    },
    renderTimeoutMs: vars.RENDER_TIMEOUT_MS,
  };
}
