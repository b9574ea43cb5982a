import type { ErrorKind, Result } from '../utils/result.js';

export type UserSettings = {
  /** Language code or free-form language name. */
  targetLanguage: string;
  /** Language code, name, or `auto`. */
  sourceLanguage: string;
  useLlmTranslation: boolean;
  improveExtractedText: boolean;
};

export type ExtractionResult =
  | {
      success: true;
      text: string;
      /** Length-derived diagnostic number, not a calibrated probability. */
      confidence: number;
      method: string;
    }
  | {
      success: false;
      confidence: 0;
      method: string;
      error: string;
      errorKind: ErrorKind;
    };

export type TranslationResult =
  | {
      success: true;
      originalText: string;
      translatedText: string;
      sourceLanguage: string;
      targetLanguage: string;
      method: string;
    }
  | {
      success: false;
      originalText: string;
      sourceLanguage: string;
      targetLanguage: string;
      method: string;
      error: string;
      errorKind: ErrorKind;
    };

export type CallOptions = {
  signal?: AbortSignal;
};

export type TextExtractor = {
  extract: (imageBytes: Uint8Array, options?: CallOptions) => Promise<ExtractionResult>;
};

/** One OCR engine. Returns the raw recognized text. */
export type TextExtractorBackend = {
  name: string;
  /** Feed this backend the contrast-boosted grayscale image instead of the original bytes. */
  wantsPreprocessedInput?: boolean;
  extract: (imageBytes: Uint8Array, options?: CallOptions) => Promise<Result<string>>;
};

export type ImprovedText = {
  text: string;
  method: string;
};

export type TextImprover = {
  improve: (
    text: string,
    options?: CallOptions & { context?: string },
  ) => Promise<Result<ImprovedText>>;
};

export type TranslationRequest = {
  text: string;
  sourceLanguage: string;
  targetLanguage: string;
};

export type TranslatorBackend = {
  name: string;
  translate: (request: TranslationRequest, options?: CallOptions) => Promise<TranslationResult>;
};

export type LanguageDetector = {
  name: string;
  /** Resolves the ISO-639-1 style code of the text's language. */
  detect: (text: string, options?: CallOptions) => Promise<Result<string>>;
};

export type Translator = {
  translate: (
    request: TranslationRequest & { preferLlm: boolean },
    options?: CallOptions,
  ) => Promise<TranslationResult>;
};

export type PipelineStage = 'extract' | 'improve' | 'translate';

export type ReplyFormat = 'plain' | 'rich';

export type PipelineReply = {
  success: boolean;
  status: 'ok' | 'degraded' | 'rejected' | 'no_text' | 'failed';
  /** User-facing message; HTML when `format` is `rich`. */
  text: string;
  format: ReplyFormat;
  extraction?: ExtractionResult;
  improvedText?: string;
  improveMethod?: string;
  translation?: TranslationResult;
  failedStages: PipelineStage[];
  error?: string;
  errorKind?: ErrorKind;
};

export type ImageInput = {
  imageBytes: Uint8Array;
  caption?: string;
};
