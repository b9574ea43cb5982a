import type {
  CallOptions,
  ExtractionResult,
  TextExtractor,
  TextExtractorBackend,
} from '../pipeline/types.js';
import { toErrorMessage, type ErrorKind } from '../utils/result.js';
import { silentLogger, type RuntimeLogger } from '../utils/runtimeLogger.js';

type TextExtractorOptions = {
  /** Priority order: on equal text length the earlier backend wins. */
  backends: TextExtractorBackend[];
  preprocess?: (imageBytes: Uint8Array) => Promise<Uint8Array>;
  logger?: RuntimeLogger;
};

/**
 * Length-derived score kept for diagnostics. It is not an OCR confidence and
 * nothing should branch on it.
 */
export function computeConfidence(text: string): number {
  return Math.min(100, Math.max(50, text.length * 2));
}

export function createTextExtractor(options: TextExtractorOptions): TextExtractor {
  const logger = options.logger ?? silentLogger;
  const combinedMethod = options.backends.map((backend) => backend.name).join('+') || 'none';

  return {
    extract: async (imageBytes: Uint8Array, callOptions: CallOptions = {}): Promise<ExtractionResult> => {
      if (options.backends.length === 0) {
        return {
          success: false,
          confidence: 0,
          method: combinedMethod,
          error: 'No text extraction backend is configured.',
          errorKind: 'unavailable',
        };
      }

      let preprocessed: Uint8Array | null = null;
      const inputFor = async (backend: TextExtractorBackend): Promise<Uint8Array> => {
        if (!backend.wantsPreprocessedInput || !options.preprocess) return imageBytes;
        if (preprocessed) return preprocessed;
        try {
          preprocessed = await options.preprocess(imageBytes);
        } catch (err) {
          logger.warn('image preprocessing failed, using original bytes', { error: toErrorMessage(err) });
          preprocessed = imageBytes;
        }
        return preprocessed;
      };

      let best: { method: string; text: string } | null = null;
      const failures: string[] = [];
      const failureKinds: ErrorKind[] = [];

      for (const backend of options.backends) {
        let text = '';
        try {
          const res = await backend.extract(await inputFor(backend), callOptions);
          if (!res.ok) {
            failures.push(`${backend.name}: ${res.error}`);
            failureKinds.push(res.kind);
            logger.warn('extraction backend failed', { backend: backend.name, kind: res.kind, error: res.error });
            continue;
          }
          text = res.value.trim();
        } catch (err) {
          failures.push(`${backend.name}: ${toErrorMessage(err)}`);
          failureKinds.push('backend_failure');
          logger.warn('extraction backend threw', { backend: backend.name, error: toErrorMessage(err) });
          continue;
        }

        logger.debug('extraction backend answered', { backend: backend.name, length: text.length });
        if (!text) {
          failures.push(`${backend.name}: no text found`);
          failureKinds.push('backend_failure');
          continue;
        }
        if (!best || text.length > best.text.length) {
          best = { method: backend.name, text };
        }
      }

      if (!best) {
        const allUnavailable = failureKinds.length > 0 && failureKinds.every((kind) => kind === 'unavailable');
        return {
          success: false,
          confidence: 0,
          method: combinedMethod,
          error: `No text found in the image (${failures.join('; ')})`,
          errorKind: allUnavailable ? 'unavailable' : 'backend_failure',
        };
      }

      logger.info('extraction served', { method: best.method, length: best.text.length });
      return {
        success: true,
        text: best.text,
        confidence: computeConfidence(best.text),
        method: best.method,
      };
    },
  };
}
