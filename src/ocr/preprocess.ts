import sharp from 'sharp';

/** Short-side size below which scans are upscaled before recognition. */
export const MIN_OCR_DIMENSION = 1000;

export type ImageDimensions = { width: number; height: number };

/** Scale factor that brings the short side up to `MIN_OCR_DIMENSION`; 1 when already large enough. */
export function computeUpscaleFactor({ width, height }: ImageDimensions): number {
  if (width <= 0 || height <= 0) return 1;
  if (width >= MIN_OCR_DIMENSION && height >= MIN_OCR_DIMENSION) return 1;
  return Math.max(MIN_OCR_DIMENSION / width, MIN_OCR_DIMENSION / height);
}

/** Size as displayed, after EXIF auto-orientation (orientations 5-8 swap the axes). */
export function orientedDimensions(metadata: {
  width?: number;
  height?: number;
  orientation?: number;
}): ImageDimensions {
  const width = metadata.width ?? 0;
  const height = metadata.height ?? 0;
  return (metadata.orientation ?? 1) >= 5 ? { width: height, height: width } : { width, height };
}

/**
 * Document-scan style cleanup: flatten transparency onto white, boost contrast,
 * sharpen, grayscale, median denoise, and upscale small images. Output is PNG.
 */
export async function preprocessForOcr(imageBytes: Uint8Array): Promise<Buffer> {
  const dimensions = orientedDimensions(await sharp(imageBytes).metadata());
  const factor = computeUpscaleFactor(dimensions);

  let pipeline = sharp(imageBytes)
    .rotate()
    .flatten({ background: '#ffffff' })
    .toColourspace('srgb')
    // contrast ×1.5 around mid-grey
    .linear(1.5, -(128 * 0.5))
    .sharpen({ sigma: 1 })
    .grayscale()
    .median(3);

  if (factor > 1) {
    pipeline = pipeline.resize({
      width: Math.round(dimensions.width * factor),
      height: Math.round(dimensions.height * factor),
      kernel: sharp.kernel.lanczos3,
    });
  }

  return pipeline.png().toBuffer();
}
