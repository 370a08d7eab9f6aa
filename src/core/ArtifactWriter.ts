/**
 * Writes an artifact, its manifest and an optional zip bundle.
 *
 * Every file is first written under a temporary name in the destination
 * directory and renamed into place only once all of them are complete. On
 * failure or abort the temporaries (and anything already renamed in this
 * call) are removed, so the destination never holds a partial result.
 */

import { createHash, randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import JSZip from 'jszip';
import type { OutputFormat, RenderManifest } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger, errorMessage } from '../utils/Logger.js';
import { throwIfAborted } from './errors.js';

export interface ArtifactWriteRequest {
  outputPath: string;
  data: Buffer;
  manifest: RenderManifest;
  /** Final markup; bundled next to raster output. */
  sourceHtml: string;
  bundle: boolean;
  signal?: AbortSignal;
}

export interface WrittenArtifact {
  path: string;
  manifestPath: string;
  bundlePath?: string;
}

export function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Sibling paths for an output path: "out/asset.png" gives
 * "out/asset.manifest.json" and "out/asset.zip".
 */
export function artifactPaths(outputPath: string): { path: string; manifestPath: string; bundlePath: string } {
  const resolved = path.resolve(outputPath);
  const parsed = path.parse(resolved);
  const base = path.join(parsed.dir, parsed.name);
  return { path: resolved, manifestPath: `${base}.manifest.json`, bundlePath: `${base}.zip` };
}

export class ArtifactWriter {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'ArtifactWriter');
  }

  async write(request: ArtifactWriteRequest): Promise<WrittenArtifact> {
    const { data, manifest, sourceHtml, bundle, signal } = request;
    const paths = artifactPaths(request.outputPath);
    const manifestJson = Buffer.from(`${JSON.stringify(manifest, null, 2)}\n`, 'utf8');

    const files: Array<{ target: string; contents: Buffer }> = [
      { target: paths.path, contents: data },
      { target: paths.manifestPath, contents: manifestJson },
    ];
    if (bundle) {
      const zip = await buildBundle(path.basename(paths.path), data, manifestJson, manifest.format, sourceHtml);
      files.push({ target: paths.bundlePath, contents: zip });
    }

    await mkdir(path.dirname(paths.path), { recursive: true });

    const token = randomUUID();
    const pending = files.map(file => ({ ...file, temp: `${file.target}.${token}.tmp` }));
    const committed: string[] = [];

    try {
      for (const file of pending) {
        throwIfAborted(signal, 'writing output');
        await writeFile(file.temp, file.contents);
      }
      throwIfAborted(signal, 'writing output');
      for (const file of pending) {
        await rename(file.temp, file.target);
        committed.push(file.target);
      }
    } catch (error) {
      await Promise.all([
        ...pending.map(file => this.remove(file.temp)),
        ...committed.map(target => this.remove(target)),
      ]);
      throw error;
    }

    this.logger.debug('Wrote artifact', { path: paths.path, bytes: data.length, bundle });
    return {
      path: paths.path,
      manifestPath: paths.manifestPath,
      bundlePath: bundle ? paths.bundlePath : undefined,
    };
  }

  private async remove(target: string): Promise<void> {
    try {
      await rm(target, { force: true });
    } catch (error) {
      this.logger.warn('Could not remove temporary output', { path: target, error: errorMessage(error) });
    }
  }
}

async function buildBundle(
  artifactName: string,
  data: Buffer,
  manifestJson: Buffer,
  format: OutputFormat,
  sourceHtml: string
): Promise<Buffer> {
  const zip = new JSZip();
  // Fixed dates keep bundles of identical renders byte-identical.
  const date = new Date(Date.UTC(2000, 0, 1));
  zip.file(artifactName, data, { date });
  zip.file('manifest.json', manifestJson, { date });
  if (format !== 'html') {
    zip.file('source.html', sourceHtml, { date });
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE', compressionOptions: { level: 9 } });
}
