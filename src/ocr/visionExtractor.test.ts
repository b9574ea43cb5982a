import sharp from 'sharp';
import { describe, expect, it, vi } from 'vitest';

import { buildImageDataUrl, createVisionBackend, toVisionImage } from './visionExtractor.js';

const PNG_HEADER = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const OPTIONS = { apiKey: 'test-key', model: 'gpt-4o-mini', maxTokens: 500, timeoutMs: 1000 };

describe('vision backend', () => {
  it('encodes images as data URLs with the sniffed mime type', () => {
    expect(buildImageDataUrl(PNG_HEADER)).toBe('data:image/png;base64,iVBORw0KGgo=');
    expect(buildImageDataUrl(new Uint8Array([0xff, 0xd8, 0xff]))).toBe('data:image/jpeg;base64,/9j/');
  });

  it('returns the trimmed model answer', async () => {
    const complete = vi.fn(async () => '  Menu\nSoup 4.50  ');
    const backend = createVisionBackend(OPTIONS, { complete });

    await expect(backend.extract(PNG_HEADER)).resolves.toEqual({ ok: true, value: 'Menu\nSoup 4.50' });
    expect(complete).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gpt-4o-mini',
        maxTokens: 500,
        dataUrl: 'data:image/png;base64,iVBORw0KGgo=',
      }),
    );
  });

  it('sends TIFF scans as PNG', async () => {
    const tiff = await sharp({
      create: { width: 20, height: 10, channels: 3, background: { r: 255, g: 255, b: 255 } },
    })
      .tiff()
      .toBuffer();
    const complete = vi.fn(async () => 'Invoice');
    const backend = createVisionBackend(OPTIONS, { complete });

    await expect(backend.extract(tiff)).resolves.toEqual({ ok: true, value: 'Invoice' });
    expect(complete).toHaveBeenCalledWith(
      expect.objectContaining({ dataUrl: expect.stringMatching(/^data:image\/png;base64,/) }),
    );
  });

  it('passes formats the API accepts through untouched', async () => {
    await expect(toVisionImage(PNG_HEADER)).resolves.toBe(PNG_HEADER);
  });

  it('maps "no text" answers to empty text', async () => {
    const backend = createVisionBackend(OPTIONS, { complete: async () => 'No text.' });

    await expect(backend.extract(PNG_HEADER)).resolves.toEqual({ ok: true, value: '' });
  });

  it('fails when the model returns no content', async () => {
    const backend = createVisionBackend(OPTIONS, { complete: async () => null });

    await expect(backend.extract(PNG_HEADER)).resolves.toEqual({
      ok: false,
      kind: 'backend_failure',
      error: 'vision model returned no content',
    });
  });

  it('turns SDK errors into failures', async () => {
    const backend = createVisionBackend(OPTIONS, {
      complete: async () => {
        throw new Error('401 Incorrect API key provided');
      },
    });

    await expect(backend.extract(PNG_HEADER)).resolves.toEqual({
      ok: false,
      kind: 'backend_failure',
      error: 'vision OCR: 401 Incorrect API key provided',
    });
  });
});
