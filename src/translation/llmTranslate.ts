import type { LlmClient } from '../llm/agents.js';
import type {
  CallOptions,
  LanguageDetector,
  TranslationRequest,
  TranslationResult,
  TranslatorBackend,
} from '../pipeline/types.js';
import { fail, ok, settle } from '../utils/result.js';
import { AUTO_LANGUAGE, type LanguageDirectory } from './languages.js';

export const LLM_METHOD = 'llm';

const DETECTION_SAMPLE_CHARS = 500;

type LlmTranslateOptions = {
  llm: LlmClient;
  languages: LanguageDirectory;
  timeoutMs: number;
};

export function buildTranslationPrompt(input: {
  text: string;
  sourceName: string;
  targetName: string;
}): string {
  return [
    `Source language: ${input.sourceName}`,
    `Target language: ${input.targetName}`,
    '',
    'Text:',
    input.text,
  ].join('\n');
}

export function createLlmTranslatorBackend(options: LlmTranslateOptions): TranslatorBackend {
  const { llm, languages } = options;

  return {
    name: LLM_METHOD,
    translate: async (req: TranslationRequest, callOptions: CallOptions = {}): Promise<TranslationResult> => {
      const target = languages.resolveCode(req.targetLanguage);
      const source = req.sourceLanguage === AUTO_LANGUAGE ? AUTO_LANGUAGE : languages.resolveCode(req.sourceLanguage);

      const prompt = buildTranslationPrompt({
        text: req.text,
        sourceName: source === AUTO_LANGUAGE ? 'detect automatically' : languages.getName(source),
        targetName: languages.getName(target),
      });

      const res = await settle(
        { label: 'LLM translation', timeoutMs: options.timeoutMs, signal: callOptions.signal },
        (signal) => llm.complete('translate', prompt, { signal }),
      );

      if (!res.ok) {
        return {
          success: false,
          originalText: req.text,
          sourceLanguage: source,
          targetLanguage: target,
          method: LLM_METHOD,
          error: res.error,
          errorKind: res.kind,
        };
      }

      return {
        success: true,
        originalText: req.text,
        translatedText: res.value,
        sourceLanguage: source,
        targetLanguage: target,
        method: LLM_METHOD,
      };
    },
  };
}

export function createLlmLanguageDetector(options: LlmTranslateOptions): LanguageDetector {
  return {
    name: LLM_METHOD,
    detect: async (text, callOptions = {}) => {
      const res = await settle(
        { label: 'LLM language detection', timeoutMs: options.timeoutMs, signal: callOptions.signal },
        (signal) => options.llm.complete('detect_language', text.slice(0, DETECTION_SAMPLE_CHARS), { signal }),
      );
      if (!res.ok) return res;

      const answer = res.value.trim().replace(/[."'`]/g, '').split(/\s+/)[0] ?? '';
      const code = options.languages.resolveCode(answer);
      if (!/^[a-z]{2,3}(-[a-z]{2,4})?$/.test(code)) {
        return fail('backend_failure', `unrecognized language answer: ${res.value.slice(0, 40)}`);
      }
      return ok(code);
    },
  };
}
