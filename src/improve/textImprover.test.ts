import { describe, expect, it, vi } from 'vitest';

import type { LlmClient } from '../llm/agents.js';
import { fail, ok, type Result } from '../utils/result.js';
import { buildImprovePrompt, createTextImprover } from './textImprover.js';

const makeLlm = (complete: LlmClient['complete'], available = true) => {
  const mock = vi.fn<LlmClient['complete']>(complete);
  const llm: LlmClient = { available, complete: mock };
  return { llm, complete: mock };
};

describe('text improver', () => {
  it('runs the deterministic cleanup without an llm', async () => {
    const improver = createTextImprover({ timeoutMs: 1000 });

    await expect(improver.improve('Total:   12,345.67\r\n\n\n\nok')).resolves.toEqual({
      ok: true,
      value: { text: 'Total: 12,345.67\n\nok', method: 'cleanup' },
    });
  });

  it('rejects empty input', async () => {
    const improver = createTextImprover({ timeoutMs: 1000 });

    await expect(improver.improve('  \n ')).resolves.toEqual({
      ok: false,
      kind: 'input_rejected',
      error: 'Nothing to improve: the text is empty.',
    });
  });

  it('accepts llm repairs that keep every number', async () => {
    const { llm, complete } = makeLlm(async () => ok('Total: 12,345.67'));
    const improver = createTextImprover({ llm, timeoutMs: 1000 });

    const result = await improver.improve('Totl:  12,345.67', { context: 'shop receipt' });

    expect(result).toEqual({ ok: true, value: { text: 'Total: 12,345.67', method: 'llm' } });
    expect(complete).toHaveBeenCalledWith(
      'improve',
      'Document context: shop receipt\n\nOCR text:\nTotl: 12,345.67',
      { signal: expect.any(AbortSignal) },
    );
  });

  it('keeps the cleaned text when the llm changes a number', async () => {
    const { llm } = makeLlm(async () => ok('Total: 12,345.76'));
    const improver = createTextImprover({ llm, timeoutMs: 1000 });

    await expect(improver.improve('Totl: 12,345.67')).resolves.toEqual({
      ok: true,
      value: { text: 'Totl: 12,345.67', method: 'cleanup' },
    });
  });

  it('keeps the cleaned text when the llm fails or times out', async () => {
    const failing = makeLlm(async () => fail('backend_failure', 'HTTP 500'));
    const hanging = makeLlm(() => new Promise<Result<string>>(() => undefined));

    for (const { llm } of [failing, hanging]) {
      const improver = createTextImprover({ llm, timeoutMs: 5 });
      await expect(improver.improve('Hello  world')).resolves.toEqual({
        ok: true,
        value: { text: 'Hello world', method: 'cleanup' },
      });
    }
  });

  it('skips an unavailable llm client', async () => {
    const { llm, complete } = makeLlm(async () => ok('unused'), false);
    const improver = createTextImprover({ llm, timeoutMs: 1000 });

    await improver.improve('text');

    expect(complete).not.toHaveBeenCalled();
  });

  it('builds the prompt with and without context', () => {
    expect(buildImprovePrompt('abc')).toBe('OCR text:\nabc');
    expect(buildImprovePrompt('abc', '  ')).toBe('OCR text:\nabc');
  });
});
