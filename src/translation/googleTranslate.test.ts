import { describe, expect, it, vi } from 'vitest';

import { createGoogleTranslateClient, parseGoogleTranslateResponse } from './googleTranslate.js';
import { createLanguageDirectory, loadLanguageTable } from './languages.js';

const languages = createLanguageDirectory(loadLanguageTable());

const jsonResponse = (payload: unknown, status = 200) =>
  new Response(JSON.stringify(payload), {
    status,
    headers: { 'content-type': 'application/json' },
  });

describe('parseGoogleTranslateResponse', () => {
  it('joins translated segments and reads the detected language', () => {
    const res = parseGoogleTranslateResponse([
      [
        ['Hello ', 'Привет ', null],
        ['world', 'мир'],
      ],
      null,
      'ru',
    ]);

    expect(res).toEqual({ ok: true, value: { text: 'Hello world', detectedLanguage: 'ru' } });
  });

  it('tolerates a null segment list', () => {
    expect(parseGoogleTranslateResponse([null, null, 'EN'])).toEqual({
      ok: true,
      value: { text: '', detectedLanguage: 'en' },
    });
  });

  it('rejects unexpected shapes', () => {
    expect(parseGoogleTranslateResponse({ error: 'nope' })).toEqual({
      ok: false,
      kind: 'backend_failure',
      error: 'unexpected Google Translate response shape',
    });
  });
});

describe('google translate client', () => {
  it('translates and reports the detected source for auto requests', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([[['Hallo', 'Hello']], null, 'en']));
    const { backend } = createGoogleTranslateClient({ languages, timeoutMs: 1000, fetch: fetchMock });

    const result = await backend.translate({ text: 'Hello', sourceLanguage: 'auto', targetLanguage: 'German' });

    expect(result).toEqual({
      success: true,
      originalText: 'Hello',
      translatedText: 'Hallo',
      sourceLanguage: 'en',
      targetLanguage: 'de',
      method: 'google',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe('https://translate.googleapis.com/translate_a/single?client=gtx&sl=auto&tl=de&dt=t');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('q=Hello');
  });

  it('keeps an explicit source language', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([[['Hi', 'Привет']], null, 'ru']));
    const { backend } = createGoogleTranslateClient({ languages, timeoutMs: 1000, fetch: fetchMock });

    const result = await backend.translate({ text: 'Привет', sourceLanguage: 'russian', targetLanguage: 'en' });

    expect(result.success).toBe(true);
    expect(result.sourceLanguage).toBe('ru');
    expect(String(fetchMock.mock.calls[0][0])).toContain('sl=ru');
  });

  it('reports rate limiting as a backend failure', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({}, 429));
    const { backend } = createGoogleTranslateClient({ languages, timeoutMs: 1000, fetch: fetchMock });

    const result = await backend.translate({ text: 'Hello', sourceLanguage: 'en', targetLanguage: 'de' });

    expect(result).toEqual({
      success: false,
      originalText: 'Hello',
      sourceLanguage: 'en',
      targetLanguage: 'de',
      method: 'google',
      error: 'Google Translate rate limited',
      errorKind: 'backend_failure',
    });
  });

  it('treats an empty translation as a failure', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([[], null, 'en']));
    const { backend } = createGoogleTranslateClient({ languages, timeoutMs: 1000, fetch: fetchMock });

    const result = await backend.translate({ text: 'Hello', sourceLanguage: 'en', targetLanguage: 'de' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('Google Translate returned an empty translation');
    }
  });

  it('turns network errors into failures', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new Error('getaddrinfo ENOTFOUND');
    });
    const { backend } = createGoogleTranslateClient({ languages, timeoutMs: 1000, fetch: fetchMock });

    const result = await backend.translate({ text: 'Hello', sourceLanguage: 'en', targetLanguage: 'de' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errorKind).toBe('backend_failure');
      expect(result.error).toBe('Google Translate: getaddrinfo ENOTFOUND');
    }
  });

  it('detects the language of a text sample', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([[['Good morning', 'Guten Morgen']], null, 'de']));
    const { detector } = createGoogleTranslateClient({ languages, timeoutMs: 1000, fetch: fetchMock });

    await expect(detector.detect('Guten Morgen')).resolves.toEqual({ ok: true, value: 'de' });
    expect(String(fetchMock.mock.calls[0][0])).toContain('sl=auto&tl=en');
  });

  it('fails detection when no language is reported', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([[['x', 'x']]]));
    const { detector } = createGoogleTranslateClient({ languages, timeoutMs: 1000, fetch: fetchMock });

    await expect(detector.detect('x')).resolves.toEqual({
      ok: false,
      kind: 'backend_failure',
      error: 'Google Translate did not report a source language',
    });
  });
});
