import type {
  CallOptions,
  LanguageDetector,
  TranslationRequest,
  TranslationResult,
  Translator,
  TranslatorBackend,
} from '../pipeline/types.js';
import { fail, toErrorMessage, type Result } from '../utils/result.js';
import { silentLogger, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { AUTO_LANGUAGE, type LanguageDirectory } from './languages.js';

export const NO_OP_METHOD = 'no-op';

type TranslatorOptions = {
  /** LLM-based backend. Primary when the user prefers LLM translation. */
  llm: TranslatorBackend;
  /** Dictionary/statistical backend. Primary otherwise. */
  google: TranslatorBackend;
  /** Tried in order for `auto` sources; the first success wins. */
  detectors: LanguageDetector[];
  languages: LanguageDirectory;
  logger?: RuntimeLogger;
};

export function unavailableTranslatorBackend(name: string, reason: string): TranslatorBackend {
  return {
    name,
    translate: async (req) => ({
      success: false,
      originalText: req.text,
      sourceLanguage: req.sourceLanguage,
      targetLanguage: req.targetLanguage,
      method: name,
      error: reason,
      errorKind: 'unavailable',
    }),
  };
}

async function callBackend(
  backend: TranslatorBackend,
  req: TranslationRequest,
  options: CallOptions,
): Promise<TranslationResult> {
  try {
    return await backend.translate(req, options);
  } catch (err) {
    return {
      success: false,
      originalText: req.text,
      sourceLanguage: req.sourceLanguage,
      targetLanguage: req.targetLanguage,
      method: backend.name,
      error: `${backend.name}: ${toErrorMessage(err)}`,
      errorKind: 'backend_failure',
    };
  }
}

export function createTranslator(options: TranslatorOptions): Translator {
  const { languages } = options;
  const logger = options.logger ?? silentLogger;

  const detect = async (text: string, callOptions: CallOptions): Promise<Result<string>> => {
    let last: Result<string> = fail('unavailable', 'no language detector configured');
    for (const detector of options.detectors) {
      try {
        last = await detector.detect(text, callOptions);
      } catch (err) {
        last = fail('backend_failure', `${detector.name}: ${toErrorMessage(err)}`);
      }
      if (last.ok) {
        logger.debug('language detected', { detector: detector.name, language: last.value });
        return last;
      }
      logger.warn('language detection failed', { detector: detector.name, kind: last.kind, error: last.error });
    }
    return last;
  };

  return {
    translate: async (request, callOptions = {}) => {
      const targetLanguage = languages.resolveCode(request.targetLanguage);
      const declaredSource =
        request.sourceLanguage.trim().toLowerCase() === AUTO_LANGUAGE
          ? AUTO_LANGUAGE
          : languages.resolveCode(request.sourceLanguage);

      if (!request.text.trim()) {
        return {
          success: false,
          originalText: request.text,
          sourceLanguage: declaredSource,
          targetLanguage,
          method: NO_OP_METHOD,
          error: 'Nothing to translate: the text is empty.',
          errorKind: 'input_rejected',
        };
      }

      let sourceLanguage = declaredSource;
      if (declaredSource === AUTO_LANGUAGE) {
        const detected = await detect(request.text, callOptions);
        if (detected.ok) {
          sourceLanguage = detected.value;
        }
      }

      if (sourceLanguage === targetLanguage) {
        return {
          success: true,
          originalText: request.text,
          translatedText: request.text,
          sourceLanguage,
          targetLanguage,
          method: NO_OP_METHOD,
        };
      }

      const [primary, secondary] = request.preferLlm
        ? [options.llm, options.google]
        : [options.google, options.llm];
      const backendRequest: TranslationRequest = {
        text: request.text,
        sourceLanguage,
        targetLanguage,
      };

      const first = await callBackend(primary, backendRequest, callOptions);
      if (first.success) {
        logger.info('translation served', { method: first.method, source: first.sourceLanguage, target: targetLanguage });
        return first;
      }

      logger.warn('primary translator failed, retrying with secondary', {
        primary: primary.name,
        secondary: secondary.name,
        kind: first.errorKind,
        error: first.error,
      });

      const second = await callBackend(secondary, backendRequest, callOptions);
      if (second.success) {
        logger.info('translation served', { method: second.method, source: second.sourceLanguage, target: targetLanguage });
      } else {
        logger.error('all translators failed', {
          primary: { method: first.method, kind: first.errorKind, error: first.error },
          secondary: { method: second.method, kind: second.errorKind, error: second.error },
        });
      }
      return second;
    },
  };
}
