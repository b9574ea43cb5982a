import { z } from 'zod';

import type {
  CallOptions,
  LanguageDetector,
  TranslationRequest,
  TranslationResult,
  TranslatorBackend,
} from '../pipeline/types.js';
import { fail, ok, settle, type Result } from '../utils/result.js';
import { AUTO_LANGUAGE, type LanguageDirectory } from './languages.js';

const GOOGLE_TRANSLATE_URL = 'https://translate.googleapis.com/translate_a/single';
const DETECTION_SAMPLE_CHARS = 500;

export const GOOGLE_METHOD = 'google';

// [[["<translated>", "<original>", ...], ...], <unused>, "<detected source>", ...]
const GOOGLE_RESPONSE_SCHEMA = z
  .tuple([z.array(z.array(z.unknown())).nullable()])
  .rest(z.unknown());

export type GoogleTranslation = {
  text: string;
  detectedLanguage?: string;
};

export function parseGoogleTranslateResponse(payload: unknown): Result<GoogleTranslation> {
  const res = GOOGLE_RESPONSE_SCHEMA.safeParse(payload);
  if (!res.success) {
    return fail('backend_failure', 'unexpected Google Translate response shape');
  }

  const [segments, , detected] = res.data;
  const text = (segments ?? [])
    .map((segment) => (typeof segment[0] === 'string' ? segment[0] : ''))
    .join('');

  return ok({
    text,
    detectedLanguage: typeof detected === 'string' && detected ? detected.toLowerCase() : undefined,
  });
}

type GoogleTranslateOptions = {
  languages: LanguageDirectory;
  timeoutMs: number;
  fetch?: typeof fetch;
};

export function createGoogleTranslateClient(options: GoogleTranslateOptions) {
  const fetchImpl = options.fetch ?? fetch;

  const request = async (
    input: { text: string; source: string; target: string },
    callOptions: CallOptions = {},
  ): Promise<Result<GoogleTranslation>> => {
    return settle(
      { label: 'Google Translate', timeoutMs: options.timeoutMs, signal: callOptions.signal },
      async (signal) => {
        const url = new URL(GOOGLE_TRANSLATE_URL);
        url.searchParams.set('client', 'gtx');
        url.searchParams.set('sl', input.source);
        url.searchParams.set('tl', input.target);
        url.searchParams.set('dt', 't');

        const response = await fetchImpl(url, {
          method: 'POST',
          headers: { 'content-type': 'application/x-www-form-urlencoded;charset=UTF-8' },
          body: new URLSearchParams({ q: input.text }).toString(),
          signal,
        });

        if (!response.ok) {
          const reason = response.status === 429 ? 'rate limited' : `HTTP ${response.status}`;
          return fail('backend_failure', `Google Translate ${reason}`);
        }

        return parseGoogleTranslateResponse(await response.json());
      },
    );
  };

  const backend: TranslatorBackend = {
    name: GOOGLE_METHOD,
    translate: async (req: TranslationRequest, callOptions?: CallOptions): Promise<TranslationResult> => {
      const target = options.languages.resolveCode(req.targetLanguage);
      const source =
        req.sourceLanguage === AUTO_LANGUAGE ? AUTO_LANGUAGE : options.languages.resolveCode(req.sourceLanguage);

      const res = await request({ text: req.text, source, target }, callOptions);
      if (!res.ok) {
        return {
          success: false,
          originalText: req.text,
          sourceLanguage: source,
          targetLanguage: target,
          method: GOOGLE_METHOD,
          error: res.error,
          errorKind: res.kind,
        };
      }

      if (!res.value.text.trim()) {
        return {
          success: false,
          originalText: req.text,
          sourceLanguage: source,
          targetLanguage: target,
          method: GOOGLE_METHOD,
          error: 'Google Translate returned an empty translation',
          errorKind: 'backend_failure',
        };
      }

      const detected = res.value.detectedLanguage
        ? options.languages.resolveCode(res.value.detectedLanguage)
        : undefined;

      return {
        success: true,
        originalText: req.text,
        translatedText: res.value.text,
        sourceLanguage: source === AUTO_LANGUAGE ? detected ?? AUTO_LANGUAGE : source,
        targetLanguage: target,
        method: GOOGLE_METHOD,
      };
    },
  };

  const detector: LanguageDetector = {
    name: GOOGLE_METHOD,
    detect: async (text, callOptions) => {
      const res = await request(
        { text: text.slice(0, DETECTION_SAMPLE_CHARS), source: AUTO_LANGUAGE, target: 'en' },
        callOptions,
      );
      if (!res.ok) return res;
      if (!res.value.detectedLanguage) {
        return fail('backend_failure', 'Google Translate did not report a source language');
      }
      return ok(options.languages.resolveCode(res.value.detectedLanguage));
    },
  };

  return { backend, detector };
}
