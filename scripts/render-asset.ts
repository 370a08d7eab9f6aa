#!/usr/bin/env node
/**
 * Renders one brand asset from a brand record JSON file.
 *
 *   tsx scripts/render-asset.ts onepager brand.json --format png --out out/onepager.png
 */

import * as fs from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { brandRecordSchema, createRenderPipeline, loadConfig } from '../src/index.js';
import type { EngineId, OutputFormat, RenderOptions } from '../src/index.js';

const FORMATS: readonly OutputFormat[] = ['html', 'png', 'pdf'];
const ENGINES: readonly EngineId[] = ['remote', 'component-ssr', 'static-markup'];

const USAGE = `Usage: tsx scripts/render-asset.ts <template> <brand.json> [options]

  --format html|png|pdf   output format (default html)
  --width <px>            canvas width
  --height <px>           canvas height
  --scale <1-3>           device scale for png
  --engine <id>           remote | component-ssr | static-markup
  --out <path>            write artifact and manifest here
  --bundle                also write a zip bundle
  --seed <n>              pin copy variants
  --what, --why, --who, --cta, --notes   campaign parameters`;

function pick<T extends string>(value: string | undefined, allowed: readonly T[], flag: string): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find(candidate => candidate === value);
  if (!match) {
    throw new Error(`--${flag} must be one of ${allowed.join(', ')}, got "${value}"`);
  }
  return match;
}

function numberFlag(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      format: { type: 'string' },
      width: { type: 'string' },
      height: { type: 'string' },
      scale: { type: 'string' },
      engine: { type: 'string' },
      out: { type: 'string' },
      bundle: { type: 'boolean', default: false },
      seed: { type: 'string' },
      what: { type: 'string' },
      why: { type: 'string' },
      who: { type: 'string' },
      cta: { type: 'string' },
      notes: { type: 'string' },
    },
  });

  const [template, brandPath] = positionals;
  if (!template || !brandPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const options: RenderOptions = {
    format: pick(values.format, FORMATS, 'format'),
    width: numberFlag(values.width, 'width'),
    height: numberFlag(values.height, 'height'),
    scale: numberFlag(values.scale, 'scale'),
    engine: pick(values.engine, ENGINES, 'engine'),
    bundle: values.bundle,
  };

  const pipeline = createRenderPipeline(loadConfig());
  const startTime = Date.now();

  try {
    const parsed = brandRecordSchema.safeParse(JSON.parse(await fs.readFile(brandPath, 'utf8')));
    if (!parsed.success) {
      throw new Error(`${brandPath} is not a brand record: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    const artifact = await pipeline.render({
      template,
      brand: parsed.data,
      campaign: {
        what: values.what,
        why: values.why,
        who: values.who,
        callToAction: values.cta,
        notes: values.notes,
      },
      options,
      outputPath: values.out,
      seed: numberFlag(values.seed, 'seed'),
    });

    console.log(`Rendered ${template} with ${artifact.engineUsed}: ${artifact.width}x${artifact.height} @${artifact.scale}x`);
    if (artifact.path) {
      console.log(`  ${artifact.path}`);
      console.log(`  ${artifact.manifestPath}`);
    } else if (artifact.format === 'html') {
      process.stdout.write(artifact.data.toString('utf8'));
    } else {
      console.log(`  ${artifact.data.length} bytes (pass --out to save)`);
    }
    if (artifact.bundlePath) {
      console.log(`  ${artifact.bundlePath}`);
    }
    console.log(`\nCompleted in ${Date.now() - startTime}ms`);
  } finally {
    await pipeline.close();
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
