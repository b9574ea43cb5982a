import type { LanguageDirectory } from '../translation/languages.js';
import { fail, ok, settle, type ErrorKind, type Result } from '../utils/result.js';
import { silentLogger, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { formatImageReply, formatTextReply } from './replyFormat.js';
import type {
  CallOptions,
  ExtractionResult,
  ImageInput,
  ImprovedText,
  PipelineReply,
  PipelineStage,
  TextExtractor,
  TextImprover,
  TranslationResult,
  Translator,
  UserSettings,
} from './types.js';

type CoordinatorOptions = {
  extractor: TextExtractor;
  improver: TextImprover;
  translator: Translator;
  languages: LanguageDirectory;
  limits: {
    maxImageBytes: number;
    maxTextLength: number;
  };
  /** Upper bound for a single stage, on top of the backends' own network timeouts. */
  stageTimeoutMs: number;
  logger?: RuntimeLogger;
};

export type PipelineCoordinator = {
  handleImage: (input: ImageInput, settings: UserSettings, options?: CallOptions) => Promise<PipelineReply>;
  handleText: (text: string, settings: UserSettings, options?: CallOptions) => Promise<PipelineReply>;
};

export const NO_TEXT_MESSAGE =
  'No text found in the image. Try a sharper photo with good lighting and the text filling the frame.';

const formatBytes = (bytes: number) => `${(bytes / (1024 * 1024)).toFixed(1)} MB`;

export function imageTooLargeMessage(size: number, maxImageBytes: number): string {
  return `The image is too large (${formatBytes(size)}). Maximum size is ${formatBytes(maxImageBytes)}.`;
}

function rejected(error: string): PipelineReply {
  return {
    success: false,
    status: 'rejected',
    text: error,
    format: 'plain',
    failedStages: [],
    error,
    errorKind: 'input_rejected',
  };
}

export function createPipelineCoordinator(options: CoordinatorOptions): PipelineCoordinator {
  const logger = options.logger ?? silentLogger;
  const { limits, languages } = options;

  const runStage = <T>(stage: PipelineStage, signal: AbortSignal | undefined, task: (signal: AbortSignal) => Promise<Result<T>>) =>
    settle({ label: `${stage} stage`, timeoutMs: options.stageTimeoutMs, signal }, task);

  const extract = async (bytes: Uint8Array, signal?: AbortSignal): Promise<ExtractionResult> => {
    const res = await runStage('extract', signal, async (stageSignal) =>
      ok(await options.extractor.extract(bytes, { signal: stageSignal })),
    );
    if (res.ok) return res.value;
    return { success: false, confidence: 0, method: 'extractor', error: res.error, errorKind: res.kind };
  };

  const improve = (text: string, context: string | undefined, signal?: AbortSignal): Promise<Result<ImprovedText>> =>
    runStage('improve', signal, (stageSignal) => options.improver.improve(text, { signal: stageSignal, context }));

  const translate = async (
    text: string,
    settings: UserSettings,
    signal?: AbortSignal,
  ): Promise<TranslationResult> => {
    const res = await runStage('translate', signal, async (stageSignal) =>
      ok(
        await options.translator.translate(
          {
            text,
            sourceLanguage: settings.sourceLanguage,
            targetLanguage: settings.targetLanguage,
            preferLlm: settings.useLlmTranslation,
          },
          { signal: stageSignal },
        ),
      ),
    );
    if (res.ok) return res.value;
    return {
      success: false,
      originalText: text,
      sourceLanguage: settings.sourceLanguage,
      targetLanguage: settings.targetLanguage,
      method: 'translator',
      error: res.error,
      errorKind: res.kind,
    };
  };

  const handleImage: PipelineCoordinator['handleImage'] = async (input, settings, callOptions = {}) => {
    const size = input.imageBytes.byteLength;
    if (size === 0) {
      return rejected('The image is empty.');
    }
    if (size > limits.maxImageBytes) {
      return rejected(imageTooLargeMessage(size, limits.maxImageBytes));
    }

    const extraction = await extract(input.imageBytes, callOptions.signal);
    if (!extraction.success || !extraction.text.trim()) {
      logger.info('no text extracted', {
        method: extraction.method,
        error: extraction.success ? 'empty text' : extraction.error,
      });
      return {
        success: false,
        status: 'no_text',
        text: NO_TEXT_MESSAGE,
        format: 'plain',
        extraction,
        failedStages: ['extract'],
        error: extraction.success ? 'empty text' : extraction.error,
        errorKind: extraction.success ? 'backend_failure' : extraction.errorKind,
      };
    }
    logger.info('text extracted', { method: extraction.method, confidence: extraction.confidence });

    const failedStages: PipelineStage[] = [];
    let workingText = extraction.text;
    let improvedText: string | undefined;
    let improveMethod: string | undefined;
    let improveError: string | undefined;

    if (settings.improveExtractedText) {
      const improved = await improve(extraction.text, input.caption, callOptions.signal);
      if (improved.ok && improved.value.text.trim()) {
        improvedText = improved.value.text;
        improveMethod = improved.value.method;
        workingText = improved.value.text;
        logger.info('text improved', { method: improveMethod });
      } else {
        improveError = improved.ok ? 'improver returned empty text' : improved.error;
        failedStages.push('improve');
        logger.warn('improve stage failed, continuing with extracted text', { error: improveError });
      }
    }

    const translation = await translate(workingText, settings, callOptions.signal);
    if (!translation.success) {
      failedStages.push('translate');
    }

    const text = formatImageReply(
      { extractedText: extraction.text, improvedText, improveError, translation },
      languages.getName,
    );

    return {
      success: true,
      status: failedStages.length > 0 ? 'degraded' : 'ok',
      text,
      format: 'rich',
      extraction,
      improvedText,
      improveMethod,
      translation,
      failedStages,
      ...(translation.success ? {} : { error: translation.error, errorKind: translation.errorKind }),
    };
  };

  const handleText: PipelineCoordinator['handleText'] = async (text, settings, callOptions = {}) => {
    if (!text.trim()) {
      return rejected('The message is empty.');
    }
    if (text.length > limits.maxTextLength) {
      return rejected(
        `The text is too long (${text.length} characters). Maximum length is ${limits.maxTextLength} characters.`,
      );
    }

    const translation = await translate(text, settings, callOptions.signal);
    const reply = formatTextReply(translation, languages.getName);

    if (!translation.success) {
      return {
        success: false,
        status: 'failed',
        text: reply,
        format: 'rich',
        translation,
        failedStages: ['translate'],
        error: translation.error,
        errorKind: translation.errorKind,
      };
    }

    return {
      success: true,
      status: 'ok',
      text: reply,
      format: 'rich',
      translation,
      failedStages: [],
    };
  };

  return { handleImage, handleText };
}

/** Shape used when the pipeline never started (e.g. the file could not be downloaded). */
export function failedReply(error: string, errorKind: ErrorKind): PipelineReply {
  const failure = fail(errorKind, error);
  return {
    success: false,
    status: errorKind === 'input_rejected' ? 'rejected' : 'failed',
    text: failure.error,
    format: 'plain',
    failedStages: [],
    error: failure.error,
    errorKind: failure.kind,
  };
}
