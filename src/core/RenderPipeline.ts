/**
 * Orchestrates one render: content, engine selection, images, markup,
 * font normalization, optional rasterization and output.
 *
 * State machine:
 *   assembling -> engine-selected -> rendering -> font-normalizing
 *     -> done                 (html)
 *     -> rasterizing -> done  (png, pdf)
 *   any state -> failed
 */

import type {
  BrandRecord,
  CampaignParameters,
  ContentDocument,
  EngineId,
  LogLevel,
  PipelineState,
  RenderArtifact,
  RenderManifest,
  RenderRequest,
  ResolvedImageSet,
  ResolvedRenderOptions,
  StateTransition,
} from '../types/index.js';
import {
  DEFAULT_CANVAS,
  DEFAULT_RENDER_OPTIONS,
  brandRecordSchema,
  campaignParametersSchema,
  renderOptionsSchema,
} from '../types/index.js';
import { ContentAssembler, parseContentDocument } from '../content/ContentAssembler.js';
import { createDesignTokens } from '../content/DesignTokens.js';
import type { RandomSource } from '../content/RandomSource.js';
import { createRandomSource } from '../content/RandomSource.js';
import { ComponentSsrEngine } from '../engines/ComponentSsrEngine.js';
import { EngineResolver } from '../engines/EngineResolver.js';
import type { EngineContext, EngineOutput, EngineSelection, RenderEngine } from '../engines/RenderEngine.js';
import { StaticMarkupEngine } from '../engines/StaticMarkupEngine.js';
import type { TemplateRegistry } from '../engines/TemplateRegistry.js';
import { createDefaultTemplateRegistry } from '../engines/TemplateRegistry.js';
import type { RemoteEngineOptions } from '../engines/remote/RemoteEngine.js';
import { RemoteEngine } from '../engines/remote/RemoteEngine.js';
import type { RemoteGenerationClient } from '../engines/remote/RemoteGenerationClient.js';
import { HttpRemoteGenerationClient } from '../engines/remote/RemoteGenerationClient.js';
import { FontNormalizer } from '../fonts/FontNormalizer.js';
import { HttpImageGenerationClient } from '../images/ImageGenerationClient.js';
import type { ImageProvider } from '../images/ImageProvider.js';
import type { DefaultProvidersOptions } from '../images/ImageResolutionChain.js';
import { ImageResolutionChain, createDefaultImageProviders } from '../images/ImageResolutionChain.js';
import type { BrowserDriver } from '../rasterize/BrowserDriver.js';
import { BrowserPool } from '../rasterize/BrowserPool.js';
import { PuppeteerBrowserDriver } from '../rasterize/PuppeteerBrowserDriver.js';
import { VisualRasterizer } from '../rasterize/VisualRasterizer.js';
import type { RendererConfig } from '../config/config.js';
import type { ComponentLoader } from '../ssr/ComponentLoader.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger, errorMessage } from '../utils/Logger.js';
import { ArtifactWriter, sha256 } from './ArtifactWriter.js';
import {
  InvalidInputError,
  RemoteGenerationError,
  RenderAbortedError,
  TemplateNotFoundError,
  isRenderPipelineError,
  throwIfAborted,
} from './errors.js';

/**
 * Reported for every state change.
 */
export interface PipelineTransitionEvent extends StateTransition {
  template: string;
}

export type PipelineStateListener = (event: PipelineTransitionEvent) => void;

export interface RenderPipelineOptions {
  /** Logger to use; otherwise one is created at `logLevel`. */
  logger?: ILogger;
  /** @default 'warn' */
  logLevel?: LogLevel;
  /** Directory of component artifacts, one subdirectory per template. */
  componentsDir?: string;
  registry?: TemplateRegistry;
  /** Enables the remote engine. */
  remoteClient?: RemoteGenerationClient;
  remoteOptions?: RemoteEngineOptions;
  /** Replaces the default image provider chain. */
  imageProviders?: ImageProvider[];
  /** Enables prompted image generation in the default chain. */
  imageGeneration?: DefaultProvidersOptions['imageGeneration'];
  /** Required for png and pdf output. */
  browser?: BrowserDriver;
  /** @default 4 */
  maxBrowserContexts?: number;
  componentLoader?: ComponentLoader;
  /** Per-step timeout when a request gives none. @default 30000 */
  renderTimeoutMs?: number;
  /** Variant source when a request carries no seed. */
  random?: RandomSource;
  onStateChange?: PipelineStateListener;
}

/**
 * Records transitions and fans them out to logs and the listener.
 */
class StateTracker {
  readonly transitions: StateTransition[] = [];
  private current: PipelineState | undefined;

  constructor(
    private readonly template: string,
    private readonly logger: ILogger,
    private readonly listener?: PipelineStateListener
  ) {}

  get state(): PipelineState | undefined {
    return this.current;
  }

  enter(state: PipelineState, errorKind?: string): StateTransition {
    const transition: StateTransition = { state, at: new Date().toISOString(), ...(errorKind ? { errorKind } : {}) };
    this.record(transition);
    return transition;
  }

  /**
   * Records a transition created earlier, e.g. one embedded in a manifest.
   */
  record(transition: StateTransition): void {
    this.current = transition.state;
    this.transitions.push(transition);
    this.logger.debug('State', { state: transition.state, errorKind: transition.errorKind });
    if (this.listener) {
      try {
        this.listener({ ...transition, template: this.template });
      } catch (error) {
        this.logger.warn('State listener threw', { error: errorMessage(error) });
      }
    }
  }
}

export class RenderPipeline {
  private readonly logger: ILogger;
  private readonly registry: TemplateRegistry;
  private readonly resolver: EngineResolver;
  private readonly staticEngine: StaticMarkupEngine;
  private readonly componentEngine: ComponentSsrEngine;
  private readonly remoteEngine?: RemoteEngine;
  private readonly imageChain: ImageResolutionChain;
  private readonly pool?: BrowserPool;
  private readonly rasterizer?: VisualRasterizer;
  private readonly writer: ArtifactWriter;
  private readonly random?: RandomSource;
  private readonly renderTimeoutMs: number;
  private readonly onStateChange?: PipelineStateListener;

  constructor(options: RenderPipelineOptions = {}) {
    this.logger = options.logger ?? createLogger(options.logLevel ?? 'warn', 'RenderPipeline');
    this.registry = options.registry ?? createDefaultTemplateRegistry();
    this.resolver = new EngineResolver({
      registry: this.registry,
      componentsDir: options.componentsDir,
      remoteConfigured: options.remoteClient !== undefined,
      logger: this.logger.child('EngineResolver'),
    });
    this.staticEngine = new StaticMarkupEngine(this.registry, this.logger.child('StaticMarkup'));
    this.componentEngine = new ComponentSsrEngine(options.componentLoader, this.logger.child('ComponentSsr'));
    if (options.remoteClient) {
      this.remoteEngine = new RemoteEngine(options.remoteClient, options.remoteOptions, this.logger.child('Remote'));
    }
    this.imageChain = new ImageResolutionChain(
      options.imageProviders ?? createDefaultImageProviders({ imageGeneration: options.imageGeneration }),
      this.logger.child('Images')
    );
    if (options.browser) {
      this.pool = new BrowserPool(options.browser, {
        maxContexts: options.maxBrowserContexts,
        logger: this.logger.child('BrowserPool'),
      });
      this.rasterizer = new VisualRasterizer(this.pool, this.logger.child('Rasterizer'));
    }
    this.writer = new ArtifactWriter(this.logger.child('Writer'));
    this.random = options.random;
    this.renderTimeoutMs = options.renderTimeoutMs ?? DEFAULT_RENDER_OPTIONS.timeoutMs;
    this.onStateChange = options.onStateChange;
  }

  /**
   * Template names the static engine can serve.
   */
  get staticTemplates(): string[] {
    return this.registry.names();
  }

  async render(request: RenderRequest): Promise<RenderArtifact> {
    const { template, signal } = request;
    const tracker = new StateTracker(template, this.logger.child(template), this.onStateChange);
    const started = Date.now();

    try {
      throwIfAborted(signal, 'start');
      const { brand, campaign, options } = this.validate(request);
      if (options.format !== 'html' && !this.rasterizer) {
        throw new InvalidInputError(`Format "${options.format}" needs a browser driver; none is configured`);
      }

      tracker.enter('assembling');
      const content = this.buildContent(request, brand, campaign);

      throwIfAborted(signal, 'engine selection');
      let selection = await this.resolver.resolve({ template, override: options.engine });
      tracker.enter('engine-selected');

      tracker.enter('rendering');
      const tokens = createDesignTokens(brand);
      const context: EngineContext = { selection, brand, campaign, content, signal };
      let output: EngineOutput | undefined;
      let fallbackFrom: EngineId | undefined;
      let images: ResolvedImageSet = { hero: [], features: [], process: [], testimonials: [] };

      if (selection.engine === 'remote' && this.remoteEngine) {
        try {
          output = await this.remoteEngine.render(context);
        } catch (error) {
          if (!(error instanceof RemoteGenerationError)) {
            throw error;
          }
          selection = this.fallbackToStatic(selection, error);
          fallbackFrom = 'remote';
        }
      }

      if (!output) {
        throwIfAborted(signal, 'image resolution');
        images = await this.imageChain.resolve(
          content.imageSlots,
          { brand, campaign, content, generatedImages: request.generatedImages },
          signal
        );
        throwIfAborted(signal, 'rendering');
        output = await this.localEngine(selection).render({ ...context, selection, images, tokens });
      }

      throwIfAborted(signal, 'font normalization');
      tracker.enter('font-normalizing');
      const normalizer = new FontNormalizer(tokens.fonts, this.logger.child('Fonts'));
      const fonts = normalizer.run(output.html);
      const html = fonts.html;

      let data: Buffer;
      if (options.format === 'html') {
        data = Buffer.from(html, 'utf8');
      } else {
        tracker.enter('rasterizing');
        data = await this.rasterize(html, options, signal);
      }

      throwIfAborted(signal, 'writing output');
      const generatedAt = new Date().toISOString();
      const done: StateTransition = { state: 'done', at: generatedAt };
      const manifest: RenderManifest = {
        template,
        engine: selection.engine,
        ...(fallbackFrom ? { fallbackFrom } : {}),
        format: options.format,
        width: options.width,
        height: options.height,
        scale: options.scale,
        generatedAt,
        byteLength: data.length,
        sha256: sha256(data),
        ...(output.sourcePrompt ? { sourcePrompt: output.sourcePrompt } : {}),
        ...(output.previewUrl ? { previewUrl: output.previewUrl } : {}),
        fonts: { heading: normalizer.selection.heading, body: normalizer.selection.body, inUse: fonts.fontsInUse },
        images,
        states: [...tracker.transitions, done],
      };

      const written = request.outputPath
        ? await this.writer.write({
            outputPath: request.outputPath,
            data,
            manifest,
            sourceHtml: html,
            bundle: options.bundle,
            signal,
          })
        : undefined;

      tracker.record(done);
      this.logger.info('Render complete', {
        template,
        engine: selection.engine,
        fallbackFrom,
        format: options.format,
        bytes: data.length,
        ms: Date.now() - started,
      });

      return {
        format: options.format,
        data,
        path: written?.path,
        manifestPath: written?.manifestPath,
        bundlePath: written?.bundlePath,
        width: options.width,
        height: options.height,
        scale: options.scale,
        engineUsed: selection.engine,
        generatedAt,
      };
    } catch (error) {
      const failure =
        signal?.aborted && !(error instanceof RenderAbortedError)
          ? new RenderAbortedError(tracker.state ?? 'start')
          : error;
      const kind = isRenderPipelineError(failure) ? failure.kind : 'Internal';
      tracker.enter('failed', kind);
      this.logger.error('Render failed', { template, kind, error: errorMessage(failure) });
      throw failure;
    }
  }

  /**
   * Shuts down the browser, if one was started.
   */
  async close(): Promise<void> {
    await this.pool?.close();
  }

  private validate(request: RenderRequest): {
    brand: BrandRecord;
    campaign: CampaignParameters;
    options: ResolvedRenderOptions;
  } {
    const brand = brandRecordSchema.safeParse(request.brand);
    if (!brand.success) {
      throw new InvalidInputError(`Invalid brand record: ${describeIssues(brand.error.issues)}`, brand.error);
    }
    const campaign = campaignParametersSchema.safeParse(request.campaign ?? {});
    if (!campaign.success) {
      throw new InvalidInputError(`Invalid campaign parameters: ${describeIssues(campaign.error.issues)}`, campaign.error);
    }
    const options = renderOptionsSchema.safeParse(request.options ?? {});
    if (!options.success) {
      throw new InvalidInputError(`Invalid render options: ${describeIssues(options.error.issues)}`, options.error);
    }

    const templateSize = this.registry.get(request.template)?.defaultSize ?? DEFAULT_CANVAS;
    const format = options.data.format ?? DEFAULT_RENDER_OPTIONS.format;
    return {
      brand: brand.data,
      campaign: campaign.data,
      options: {
        format,
        width: options.data.width ?? templateSize.width,
        height: options.data.height ?? templateSize.height,
        // HTML and PDF carry no device pixel density.
        scale: format === 'png' ? (options.data.scale ?? DEFAULT_RENDER_OPTIONS.scale) : 1,
        engine: options.data.engine,
        timeoutMs: options.data.timeoutMs ?? this.renderTimeoutMs,
        pngOptimization: options.data.pngOptimization ?? DEFAULT_RENDER_OPTIONS.pngOptimization,
        bundle: options.data.bundle ?? DEFAULT_RENDER_OPTIONS.bundle,
      },
    };
  }

  private buildContent(request: RenderRequest, brand: BrandRecord, campaign: CampaignParameters): ContentDocument {
    if (request.content !== undefined) {
      return parseContentDocument(request.content);
    }
    const random = request.seed !== undefined ? createRandomSource(request.seed) : this.random;
    return new ContentAssembler({ random, logger: this.logger.child('Content') }).assemble(brand, campaign);
  }

  private fallbackToStatic(selection: EngineSelection, error: RemoteGenerationError): EngineSelection {
    if (!this.registry.has(selection.template)) {
      throw new TemplateNotFoundError(
        selection.template,
        `remote generation failed (${error.message}) and no static template is registered`
      );
    }
    this.logger.warn('Remote generation failed, falling back to static template', {
      template: selection.template,
      status: error.status,
      error: error.message,
    });
    return { engine: 'static-markup', template: selection.template, reason: 'fallback from remote' };
  }

  private localEngine(selection: EngineSelection): RenderEngine {
    switch (selection.engine) {
      case 'component-ssr':
        return this.componentEngine;
      case 'static-markup':
        return this.staticEngine;
      case 'remote':
        // Remote selections are only made when a client is configured.
        throw new TemplateNotFoundError(selection.template, 'remote engine is not configured');
    }
  }

  private async rasterize(
    html: string,
    options: ResolvedRenderOptions,
    signal: AbortSignal | undefined
  ): Promise<Buffer> {
    if (!this.rasterizer || options.format === 'html') {
      throw new InvalidInputError(`Format "${options.format}" needs a browser driver; none is configured`);
    }
    return this.rasterizer.rasterize(html, {
      format: options.format,
      width: options.width,
      height: options.height,
      scale: options.scale,
      timeoutMs: options.timeoutMs,
      pngOptimization: options.pngOptimization,
      signal,
    });
  }
}

/**
 * Builds a pipeline from environment configuration. Integrations whose
 * credentials are absent stay disabled; png and pdf output need a browser
 * executable path.
 */
export function createRenderPipeline(
  config: RendererConfig,
  overrides: Partial<RenderPipelineOptions> = {}
): RenderPipeline {
  const logger = overrides.logger ?? createLogger(config.logLevel, 'RenderPipeline');
  const { remoteGeneration, imageGeneration, browser } = config;

  return new RenderPipeline({
    logger,
    componentsDir: config.componentsDir,
    remoteClient: remoteGeneration
      ? new HttpRemoteGenerationClient({ apiKey: remoteGeneration.apiKey, url: remoteGeneration.url })
      : undefined,
    imageGeneration: imageGeneration
      ? {
          client: new HttpImageGenerationClient({ apiKey: imageGeneration.apiKey, url: imageGeneration.url }),
          concurrency: imageGeneration.concurrency,
        }
      : undefined,
    browser: browser.executablePath
      ? new PuppeteerBrowserDriver({ executablePath: browser.executablePath, logger: logger.child('Browser') })
      : undefined,
    maxBrowserContexts: browser.maxContexts,
    renderTimeoutMs: config.renderTimeoutMs,
    ...overrides,
  });
}

function describeIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`).join('; ');
}
