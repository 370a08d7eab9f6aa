import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { PngOptimizer } from '../../src/utils/PngOptimizer.js';
import { silentLogger } from '../helpers/fixtures.js';

async function gradientPng(width: number, height: number): Promise<Buffer> {
  const raw = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const offset = (y * width + x) * 3;
      raw[offset] = x % 256;
      raw[offset + 1] = y % 256;
      raw[offset + 2] = 128;
    }
  }
  return sharp(raw, { raw: { width, height, channels: 3 } }).png({ compressionLevel: 0 }).toBuffer();
}

describe('PngOptimizer', () => {
  it('should return the same buffer for the none preset', async () => {
    const optimizer = new PngOptimizer(silentLogger);
    const input = await gradientPng(16, 16);

    expect(await optimizer.optimize(input, 'none')).toBe(input);
  });

  it('should shrink an uncompressed PNG and keep its dimensions', async () => {
    const optimizer = new PngOptimizer(silentLogger);
    const input = await gradientPng(64, 32);

    const output = await optimizer.optimize(input, 'balanced');
    const metadata = await sharp(output).metadata();

    expect(optimizer.isAvailable()).toBe(true);
    expect(output.length).toBeLessThan(input.length);
    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(64);
    expect(metadata.height).toBe(32);
  });

  it('should produce a valid PNG with the web preset', async () => {
    const optimizer = new PngOptimizer(silentLogger);
    const output = await optimizer.optimize(await gradientPng(32, 32), 'web');

    expect((await sharp(output).metadata()).format).toBe('png');
  });

  it('should return the input when the data is not an image', async () => {
    const optimizer = new PngOptimizer(silentLogger);
    const input = Buffer.from('not a png');

    expect(await optimizer.optimize(input, 'fast')).toBe(input);
  });
});
