import sharp from 'sharp';
import { describe, expect, it } from 'vitest';

import { computeUpscaleFactor, orientedDimensions, preprocessForOcr } from './preprocess.js';

describe('computeUpscaleFactor', () => {
  it('brings the short side up to 1000 px', () => {
    expect(computeUpscaleFactor({ width: 500, height: 800 })).toBe(2);
    expect(computeUpscaleFactor({ width: 2000, height: 250 })).toBe(4);
  });

  it('leaves large or invalid sizes alone', () => {
    expect(computeUpscaleFactor({ width: 1200, height: 1000 })).toBe(1);
    expect(computeUpscaleFactor({ width: 0, height: 300 })).toBe(1);
  });
});

describe('orientedDimensions', () => {
  it('swaps the axes for rotated orientations', () => {
    expect(orientedDimensions({ width: 800, height: 600, orientation: 6 })).toEqual({ width: 600, height: 800 });
    expect(orientedDimensions({ width: 800, height: 600, orientation: 3 })).toEqual({ width: 800, height: 600 });
    expect(orientedDimensions({ width: 800, height: 600 })).toEqual({ width: 800, height: 600 });
  });
});

describe('preprocessForOcr', () => {
  it('produces an upscaled PNG', async () => {
    const input = await sharp({
      create: { width: 200, height: 100, channels: 4, background: { r: 200, g: 30, b: 30, alpha: 0.5 } },
    })
      .png()
      .toBuffer();

    const output = await preprocessForOcr(input);
    const metadata = await sharp(output).metadata();

    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(2000);
    expect(metadata.height).toBe(1000);
  });

  it('upscales rotated photos without cropping them', async () => {
    const input = await sharp({
      create: { width: 800, height: 600, channels: 3, background: { r: 255, g: 255, b: 255 } },
    })
      .jpeg()
      .withMetadata({ orientation: 6 })
      .toBuffer();

    const output = await preprocessForOcr(input);
    const metadata = await sharp(output).metadata();

    // Displayed as 600x800 portrait; short side brought to 1000.
    expect(metadata.width).toBe(1000);
    expect(metadata.height).toBe(1333);
  });

  it('rejects bytes that are not an image', async () => {
    await expect(preprocessForOcr(new Uint8Array([1, 2, 3, 4]))).rejects.toThrow();
  });
});
