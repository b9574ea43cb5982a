import { createAgentsLlmClient, type LlmClient } from '../llm/agents.js';
import { createTextImprover } from '../improve/textImprover.js';
import { preprocessForOcr } from '../ocr/preprocess.js';
import { createTesseractBackend } from '../ocr/tesseract.js';
import { createTextExtractor } from '../ocr/textExtractor.js';
import { createVisionBackend } from '../ocr/visionExtractor.js';
import type { BotConfig, OcrBackendName } from '../runtime/botConfig.js';
import { createGoogleTranslateClient } from '../translation/googleTranslate.js';
import { getLanguageDirectory, type LanguageDirectory } from '../translation/languages.js';
import { createLlmLanguageDetector, createLlmTranslatorBackend, LLM_METHOD } from '../translation/llmTranslate.js';
import { createTranslator, unavailableTranslatorBackend } from '../translation/translator.js';
import { silentLogger, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { createPipelineCoordinator, type PipelineCoordinator } from './coordinator.js';
import type { TextExtractorBackend } from './types.js';

type PipelineConfig = Pick<BotConfig, 'openai' | 'ocr' | 'limits' | 'timeouts'>;

type BuildPipelineOptions = {
  logger?: RuntimeLogger;
  languages?: LanguageDirectory;
  llm?: LlmClient;
  fetch?: typeof fetch;
};

export type Pipeline = {
  coordinator: PipelineCoordinator;
  languages: LanguageDirectory;
  llm: LlmClient;
  ocrBackends: string[];
};

/** Wires every stage from config. Capabilities without credentials are left out or made unavailable. */
export function buildPipeline(config: PipelineConfig, options: BuildPipelineOptions = {}): Pipeline {
  const logger = options.logger ?? silentLogger;
  const languages = options.languages ?? getLanguageDirectory();
  const llm = options.llm ?? createAgentsLlmClient(config.openai);
  const timeoutMs = config.timeouts.networkMs;

  const createOcrBackend = (name: OcrBackendName): TextExtractorBackend | null => {
    if (name === 'tesseract') {
      return createTesseractBackend({
        command: config.ocr.tesseractCmd,
        languages: config.ocr.languages,
        timeoutMs,
      });
    }
    if (!config.openai.apiKey) {
      logger.warn('vision OCR disabled: OPENAI_API_KEY is not set');
      return null;
    }
    return createVisionBackend({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      maxTokens: config.openai.maxTokens,
      timeoutMs,
    });
  };

  const ocrBackends = config.ocr.backends
    .map(createOcrBackend)
    .filter((backend): backend is TextExtractorBackend => backend !== null);

  const extractor = createTextExtractor({
    backends: ocrBackends,
    preprocess: config.ocr.preprocessing ? preprocessForOcr : undefined,
    logger: logger.child('extractor'),
  });

  const google = createGoogleTranslateClient({ languages, timeoutMs, fetch: options.fetch });
  const llmBackend = llm.available
    ? createLlmTranslatorBackend({ llm, languages, timeoutMs })
    : unavailableTranslatorBackend(LLM_METHOD, 'OPENAI_API_KEY is not set');

  const translator = createTranslator({
    llm: llmBackend,
    google: google.backend,
    detectors: llm.available
      ? [google.detector, createLlmLanguageDetector({ llm, languages, timeoutMs })]
      : [google.detector],
    languages,
    logger: logger.child('translator'),
  });

  const improver = createTextImprover({
    llm: llm.available ? llm : undefined,
    timeoutMs,
    logger: logger.child('improver'),
  });

  const coordinator = createPipelineCoordinator({
    extractor,
    improver,
    translator,
    languages,
    limits: config.limits,
    stageTimeoutMs: config.timeouts.updateMs,
    logger: logger.child('pipeline'),
  });

  return {
    coordinator,
    languages,
    llm,
    ocrBackends: ocrBackends.map((backend) => backend.name),
  };
}
