import { describe, expect, it, vi } from 'vitest';

import { ok } from '../utils/result.js';
import { buildTesseractArgs, createTesseractBackend, runTesseractProcess } from './tesseract.js';

describe('tesseract backend', () => {
  it('builds stdin/stdout arguments for the configured languages', () => {
    expect(buildTesseractArgs(['eng', 'rus'])).toEqual([
      'stdin',
      'stdout',
      '-l',
      'eng+rus',
      '--oem',
      '3',
      '--psm',
      '6',
    ]);
  });

  it('runs the configured command with the image on stdin', async () => {
    const run = vi.fn(async () => ok('Recognized text\n'));
    const backend = createTesseractBackend(
      { command: '/usr/bin/tesseract', languages: ['eng'], timeoutMs: 1000 },
      { run },
    );
    const image = new Uint8Array([1, 2, 3]);

    const result = await backend.extract(image);

    expect(result).toEqual({ ok: true, value: 'Recognized text\n' });
    expect(backend.name).toBe('tesseract');
    expect(backend.wantsPreprocessedInput).toBe(true);
    expect(run).toHaveBeenCalledWith({
      command: '/usr/bin/tesseract',
      args: ['stdin', 'stdout', '-l', 'eng', '--oem', '3', '--psm', '6'],
      stdin: image,
      signal: expect.any(AbortSignal),
    });
  });

  it('reports a missing executable as unavailable', async () => {
    const result = await runTesseractProcess({
      command: 'scanlate-test-missing-tesseract',
      args: ['--version'],
      stdin: new Uint8Array([1]),
      signal: new AbortController().signal,
    });

    expect(result).toEqual({
      ok: false,
      kind: 'unavailable',
      error: 'tesseract executable not found (scanlate-test-missing-tesseract)',
    });
  });
});
