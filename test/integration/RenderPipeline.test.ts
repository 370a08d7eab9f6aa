import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import sharp from 'sharp';
import { loadConfig } from '../../src/config/index.js';
import { ContentAssembler } from '../../src/content/ContentAssembler.js';
import { RenderPipeline, createRenderPipeline } from '../../src/core/RenderPipeline.js';
import type { PipelineTransitionEvent, RenderPipelineOptions } from '../../src/core/RenderPipeline.js';
import {
  InvalidContentError,
  InvalidInputError,
  RenderAbortedError,
  TemplateNotFoundError,
} from '../../src/core/errors.js';
import type { RemoteGenerationClient } from '../../src/engines/remote/RemoteGenerationClient.js';
import { CURATED_IMAGES } from '../../src/images/CuratedImageProvider.js';
import type { RenderManifest } from '../../src/types/index.js';
import { FakeBrowserDriver } from '../helpers/FakeBrowserDriver.js';
import { brand, brandInput, campaign, constantRandom, silentLogger } from '../helpers/fixtures.js';

const COMPONENTS_DIR = fileURLToPath(new URL('../fixtures/components', import.meta.url));
const BUNDLED_COMPONENTS_DIR = fileURLToPath(new URL('../../components', import.meta.url));

function pipeline(options: RenderPipelineOptions = {}): RenderPipeline {
  return new RenderPipeline({ logger: silentLogger, random: constantRandom(0), ...options });
}

async function readManifest(manifestPath: string | undefined): Promise<RenderManifest> {
  if (!manifestPath) {
    throw new Error('no manifest was written');
  }
  return JSON.parse(await readFile(manifestPath, 'utf8'));
}

describe('RenderPipeline', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(path.join(tmpdir(), 'render-pipeline-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  describe('Static markup', () => {
    it('should render the onepager with campaign copy when nothing else is configured', async () => {
      const states: PipelineTransitionEvent[] = [];
      const renderer = pipeline({ onStateChange: event => states.push(event) });

      const artifact = await renderer.render({ template: 'onepager', brand: brandInput, campaign });
      const html = artifact.data.toString('utf8');

      expect(artifact.engineUsed).toBe('static-markup');
      expect(artifact.format).toBe('html');
      expect(artifact.width).toBe(1200);
      expect(artifact.height).toBe(1600);
      expect(artifact.scale).toBe(1);
      expect(artifact.path).toBeUndefined();
      expect(html).toContain('Northwind Labs');
      expect(html).toContain('small teams');
      expect(states.map(event => event.state)).toEqual([
        'assembling',
        'engine-selected',
        'rendering',
        'font-normalizing',
        'done',
      ]);
      expect(states.every(event => event.template === 'onepager')).toBe(true);
    });

    it('should put the audience in the hero copy for a campaign without a why', async () => {
      const artifact = await pipeline().render({
        template: 'onepager',
        brand: brandInput,
        campaign: { what: 'a scheduling tool', who: 'small teams' },
      });
      const html = artifact.data.toString('utf8');

      expect(artifact.engineUsed).toBe('static-markup');
      expect(html).toContain('Northwind Labs');
      expect(html).toContain(
        '<p class="description">Empowering small teams with a scheduling tool built to deliver measurable results.</p>'
      );
    });

    it('should fill every image role from the curated set for a brand without images', async () => {
      const renderer = pipeline();

      const artifact = await renderer.render({
        template: 'onepager',
        brand: brandInput,
        campaign,
        outputPath: path.join(outDir, 'onepager.html'),
      });
      const manifest = await readManifest(artifact.manifestPath);

      expect(manifest.images).toEqual({
        hero: [CURATED_IMAGES.hero[0]],
        features: [0, 1, 2, 0, 1, 2].map(i => CURATED_IMAGES.features[i]),
        process: [...CURATED_IMAGES.process],
        testimonials: [...CURATED_IMAGES.testimonials],
      });
      expect(manifest.engine).toBe('static-markup');
      expect(manifest.fallbackFrom).toBeUndefined();
      expect(manifest.fonts.heading).toBe('Poppins');
      expect(manifest.fonts.body).toBe('Lato');
      expect(manifest.byteLength).toBe(artifact.data.length);
      expect(manifest.states.map(transition => transition.state)).toEqual([
        'assembling',
        'engine-selected',
        'rendering',
        'font-normalizing',
        'done',
      ]);
      expect(await readFile(path.join(outDir, 'onepager.html'))).toEqual(artifact.data);
      expect((await readdir(outDir)).sort()).toEqual(['onepager.html', 'onepager.manifest.json']);
    });

    it('should prefer generated images over curated ones', async () => {
      const renderer = pipeline();

      const artifact = await renderer.render({
        template: 'onepager',
        brand: brandInput,
        campaign,
        generatedImages: { hero: ['https://gen.example/hero.png'] },
        outputPath: path.join(outDir, 'generated.html'),
      });

      expect((await readManifest(artifact.manifestPath)).images.hero).toEqual(['https://gen.example/hero.png']);
      expect(artifact.data.toString('utf8')).toContain('https://gen.example/hero.png');
    });

    it('should produce identical markup for the same seed', async () => {
      const renderer = new RenderPipeline({ logger: silentLogger });
      const request = { template: 'onepager', brand: brandInput, campaign, seed: 7 };

      const first = await renderer.render(request);
      const second = await renderer.render(request);

      expect(second.data.equals(first.data)).toBe(true);
    });

    it('should size the canvas from the template', async () => {
      const artifact = await pipeline().render({ template: 'linkedin', brand: brandInput, campaign });

      expect(artifact.width).toBe(1200);
      expect(artifact.height).toBe(627);
    });
  });

  describe('Component SSR', () => {
    it('should render a component artifact and normalize its fonts', async () => {
      const renderer = pipeline({ componentsDir: COMPONENTS_DIR });

      const artifact = await renderer.render({
        template: 'valid',
        brand: brandInput,
        campaign,
        outputPath: path.join(outDir, 'valid.html'),
      });
      const html = artifact.data.toString('utf8');
      const manifest = await readManifest(artifact.manifestPath);

      expect(artifact.engineUsed).toBe('component-ssr');
      expect(html).toContain('body { font-family: Lato, sans-serif; } h1 { font-family: Poppins, sans-serif; }');
      expect(html).toContain('<p class="audience">small teams</p>');
      expect(html).toContain('<span class="brand">Northwind Labs</span>');
      expect(html).toContain('<span class="images">1</span>');
      expect(manifest.fonts).toEqual({ heading: 'Poppins', body: 'Lato', inUse: ['Poppins', 'Lato'] });
    });

    it('should render the bundled one-pager component with brand fonts', async () => {
      const renderer = pipeline({ componentsDir: BUNDLED_COMPONENTS_DIR });

      const artifact = await renderer.render({ template: 'onepager', brand: brandInput, campaign });
      const html = artifact.data.toString('utf8');

      expect(artifact.engineUsed).toBe('component-ssr');
      expect(html).toContain('<span class="brand-name">Northwind Labs</span>');
      expect(html).not.toContain('BlinkMacSystemFont');
      expect(html).not.toContain('system-ui');
    });

    it('should fall back to the static template when the override cannot be served', async () => {
      const renderer = pipeline({ componentsDir: COMPONENTS_DIR });

      const artifact = await renderer.render({
        template: 'onepager',
        brand: brandInput,
        campaign,
        options: { engine: 'component-ssr' },
      });

      expect(artifact.engineUsed).toBe('static-markup');
    });

    it('should fail structurally when a component has no default export', async () => {
      const states: PipelineTransitionEvent[] = [];
      const renderer = pipeline({ componentsDir: COMPONENTS_DIR, onStateChange: event => states.push(event) });

      await expect(renderer.render({ template: 'no-default', brand: brandInput, campaign })).rejects.toMatchObject({
        kind: 'InvalidComponentExport',
      });
      expect(states[states.length - 1]).toMatchObject({ state: 'failed', errorKind: 'InvalidComponentExport' });
    });
  });

  describe('Remote generation', () => {
    it('should wrap the preview and record the prompt', async () => {
      const client: RemoteGenerationClient = {
        generate: async () => ({ id: 'chat-1', previewUrl: 'https://preview.example/abc' }),
      };
      const renderer = pipeline({ remoteClient: client });

      const artifact = await renderer.render({
        template: 'onepager',
        brand: brandInput,
        campaign,
        outputPath: path.join(outDir, 'remote.html'),
      });
      const manifest = await readManifest(artifact.manifestPath);

      expect(artifact.engineUsed).toBe('remote');
      expect(artifact.data.toString('utf8')).toContain('<iframe src="https://preview.example/abc"');
      expect(manifest.previewUrl).toBe('https://preview.example/abc');
      expect(manifest.sourcePrompt).toContain('**Northwind Labs**');
      expect(manifest.images).toEqual({ hero: [], features: [], process: [], testimonials: [] });
    });

    it('should fall back to static markup when generation fails', async () => {
      const client: RemoteGenerationClient = {
        generate: async () => {
          throw new Error('service unavailable');
        },
      };
      const renderer = pipeline({ remoteClient: client });

      const artifact = await renderer.render({
        template: 'onepager',
        brand: brandInput,
        campaign,
        outputPath: path.join(outDir, 'fallback.html'),
      });
      const manifest = await readManifest(artifact.manifestPath);

      expect(artifact.engineUsed).toBe('static-markup');
      expect(manifest.engine).toBe('static-markup');
      expect(manifest.fallbackFrom).toBe('remote');
      expect(manifest.sourcePrompt).toBeUndefined();
      expect(artifact.data.toString('utf8')).toContain('Northwind Labs');
    });

    it('should report a missing template when generation fails and no static template exists', async () => {
      const client: RemoteGenerationClient = {
        generate: async () => {
          throw new Error('service unavailable');
        },
      };

      await expect(
        pipeline({ remoteClient: client }).render({ template: 'brochure', brand: brandInput, campaign })
      ).rejects.toBeInstanceOf(TemplateNotFoundError);
    });
  });

  describe('Rasterization', () => {
    it('should print a PDF at the requested canvas size', async () => {
      const browser = new FakeBrowserDriver();
      const states: PipelineTransitionEvent[] = [];
      const renderer = pipeline({ browser, onStateChange: event => states.push(event) });

      const artifact = await renderer.render({
        template: 'onepager',
        brand: brandInput,
        campaign,
        options: { format: 'pdf', width: 1200, height: 1600 },
      });

      expect(artifact.format).toBe('pdf');
      expect(artifact.scale).toBe(1);
      expect(artifact.data.byteLength).toBeGreaterThan(0);
      expect(artifact.data.subarray(0, 5).toString('latin1')).toBe('%PDF-');
      expect(artifact.data.toString('latin1')).toContain('/MediaBox [0 0 900 1200]');
      expect(states.map(event => event.state)).toEqual([
        'assembling',
        'engine-selected',
        'rendering',
        'font-normalizing',
        'rasterizing',
        'done',
      ]);
      await renderer.close();
      expect(browser.closed).toBe(true);
    });

    it('should capture more pixels at a higher scale', async () => {
      const renderer = pipeline({ browser: new FakeBrowserDriver() });
      const request = { template: 'onepager', brand: brandInput, campaign };

      const single = await renderer.render({ ...request, options: { format: 'png', width: 1200, height: 1600, scale: 1 } });
      const double = await renderer.render({ ...request, options: { format: 'png', width: 1200, height: 1600, scale: 2 } });

      expect(double.data.byteLength).toBeGreaterThan(single.data.byteLength);
      const metadata = await sharp(double.data).metadata();
      expect(metadata.width).toBe(2400);
      expect(metadata.height).toBe(3200);
      expect(double.scale).toBe(2);
    });

    it('should bundle a raster with its manifest and source markup', async () => {
      const renderer = pipeline({ browser: new FakeBrowserDriver() });

      const artifact = await renderer.render({
        template: 'linkedin',
        brand: brandInput,
        campaign,
        options: { format: 'png', width: 120, height: 63, scale: 1, bundle: true },
        outputPath: path.join(outDir, 'post.png'),
      });

      expect(artifact.bundlePath).toBe(path.join(outDir, 'post.zip'));
      expect((await readdir(outDir)).sort()).toEqual(['post.manifest.json', 'post.png', 'post.zip']);
    });

    it('should reject raster formats when no browser is configured', async () => {
      const states: PipelineTransitionEvent[] = [];
      const renderer = pipeline({ onStateChange: event => states.push(event) });

      await expect(
        renderer.render({ template: 'onepager', brand: brandInput, campaign, options: { format: 'png' } })
      ).rejects.toThrow('Format "png" needs a browser driver; none is configured');
      expect(states.map(event => [event.state, event.errorKind])).toEqual([['failed', 'InvalidInput']]);
    });
  });

  describe('Failures', () => {
    it('should reject a content document with an unknown section kind', async () => {
      const states: PipelineTransitionEvent[] = [];
      const renderer = pipeline({ onStateChange: event => states.push(event) });
      const content = new ContentAssembler({ random: constantRandom(0), logger: silentLogger }).assemble(brand, campaign);

      await expect(
        renderer.render({
          template: 'onepager',
          brand: brandInput,
          campaign,
          content: { ...content, sections: [{ kind: 'pricing-table', payload: {} }] },
        })
      ).rejects.toBeInstanceOf(InvalidContentError);
      expect(states.map(event => [event.state, event.errorKind])).toEqual([
        ['assembling', undefined],
        ['failed', 'InvalidContent'],
      ]);
    });

    it('should reject an invalid brand record', async () => {
      const renderer = pipeline();

      await expect(
        renderer.render({ template: 'onepager', brand: { ...brandInput, name: '' }, campaign })
      ).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('should report an unknown template', async () => {
      await expect(pipeline().render({ template: 'brochure', brand: brandInput, campaign })).rejects.toMatchObject({
        kind: 'TemplateNotFound',
      });
    });

    it('should stop on abort and leave no output behind', async () => {
      const controller = new AbortController();
      const states: PipelineTransitionEvent[] = [];
      const renderer = pipeline({
        onStateChange: event => states.push(event),
        imageProviders: [
          {
            name: 'aborting',
            attempt: async () => {
              controller.abort();
              return [];
            },
          },
        ],
      });

      await expect(
        renderer.render({
          template: 'onepager',
          brand: brandInput,
          campaign,
          outputPath: path.join(outDir, 'aborted.html'),
          signal: controller.signal,
        })
      ).rejects.toBeInstanceOf(RenderAbortedError);
      expect(states[states.length - 1]).toMatchObject({ state: 'failed', errorKind: 'RenderAborted' });
      expect(await readdir(outDir)).toEqual([]);
    });
  });

  describe('createRenderPipeline', () => {
    it('should build an HTML-only pipeline from an empty environment', async () => {
      const renderer = createRenderPipeline(loadConfig({}), { logger: silentLogger, random: constantRandom(0) });

      expect(renderer.staticTemplates).toEqual(['linkedin', 'onepager']);
      const artifact = await renderer.render({ template: 'onepager', brand: brandInput, campaign });
      expect(artifact.engineUsed).toBe('static-markup');
      await expect(
        renderer.render({ template: 'onepager', brand: brandInput, campaign, options: { format: 'pdf' } })
      ).rejects.toBeInstanceOf(InvalidInputError);
      await renderer.close();
    });
  });
});
