import { z } from 'zod';

import { getLogDir } from './botHome.js';
import { normalizeLogLevel, type RuntimeLogLevel } from '../utils/runtimeLogger.js';

const TRUE_FLAGS = new Set(['true', '1', 'yes', 'on']);
const FALSE_FLAGS = new Set(['false', '0', 'no', 'off']);

const emptyToUndefined = (value: unknown) => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};

const parseFlag = (value: unknown) => {
  const normalized = emptyToUndefined(value);
  if (typeof normalized !== 'string') return normalized;
  const lowered = normalized.toLowerCase();
  if (TRUE_FLAGS.has(lowered)) return true;
  if (FALSE_FLAGS.has(lowered)) return false;
  return normalized;
};

const lowerCased = (value: unknown) => {
  const normalized = emptyToUndefined(value);
  return typeof normalized === 'string' ? normalized.toLowerCase() : normalized;
};

const splitList = (value: unknown) => {
  const normalized = emptyToUndefined(value);
  if (typeof normalized !== 'string') return normalized;
  return normalized
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
};

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());
const stringWithDefault = (fallback: string) =>
  z.preprocess(emptyToUndefined, z.string().default(fallback));
const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));
const flag = (fallback: boolean) => z.preprocess(parseFlag, z.boolean().default(fallback));

export const OCR_BACKEND_NAMES = ['tesseract', 'vision'] as const;
export type OcrBackendName = (typeof OCR_BACKEND_NAMES)[number];

export const TRANSLATION_SERVICES = ['llm', 'google'] as const;
export type TranslationService = (typeof TRANSLATION_SERVICES)[number];

const BOT_ENV_SCHEMA = z.object({
  TELEGRAM_BOT_TOKEN: z.preprocess(
    emptyToUndefined,
    z.string({ required_error: 'Missing TELEGRAM_BOT_TOKEN in environment' }),
  ),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: stringWithDefault('gpt-4o-mini'),
  OPENAI_TEMPERATURE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(2).default(0.3)),
  OPENAI_MAX_TOKENS: positiveInt(2000),

  MAX_IMAGE_SIZE: positiveInt(10 * 1024 * 1024),
  MAX_TEXT_LENGTH: positiveInt(4000),
  SUPPORTED_IMAGE_FORMATS: z.preprocess(
    splitList,
    z.array(z.string()).min(1).default(['jpg', 'jpeg', 'png', 'bmp', 'tiff', 'webp']),
  ),

  DEFAULT_SOURCE_LANG: stringWithDefault('auto'),
  DEFAULT_TARGET_LANG: stringWithDefault('en'),
  TRANSLATION_SERVICE: z.preprocess(lowerCased, z.enum(TRANSLATION_SERVICES).default('llm')),

  OCR_BACKENDS: z.preprocess(
    splitList,
    z.array(z.enum(OCR_BACKEND_NAMES)).min(1).default(['tesseract', 'vision']),
  ),
  OCR_LANGUAGES: z.preprocess(splitList, z.array(z.string()).min(1).default(['eng', 'rus'])),
  TESSERACT_CMD: stringWithDefault('tesseract'),
  IMAGE_PREPROCESSING_ENABLED: flag(true),
  IMPROVE_TEXT: flag(true),

  NETWORK_TIMEOUT_SECONDS: positiveInt(10),
  UPDATE_TIMEOUT_SECONDS: positiveInt(60),
  MAX_CONCURRENT_UPDATES: positiveInt(8),

  WEBHOOK_URL: optionalString,
  RENDER_EXTERNAL_URL: optionalString,
  WEBHOOK_PATH: stringWithDefault('/webhook'),
  WEBHOOK_SECRET_TOKEN: optionalString,
  SERVER_HOST: stringWithDefault('0.0.0.0'),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(8000)),

  KEEP_ALIVE_ENABLED: flag(false),
  KEEP_ALIVE_URL: optionalString,
  KEEP_ALIVE_INTERVAL_SECONDS: positiveInt(600),

  SCANLATE_LOG_LEVEL: optionalString,
});

export type BotConfig = {
  telegram: {
    token: string;
    webhook: {
      /** Public URL Telegram posts updates to. Absent means long polling. */
      url?: string;
      path: string;
      secretToken?: string;
      host: string;
      port: number;
    };
  };
  openai: {
    apiKey?: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  limits: {
    maxImageBytes: number;
    maxTextLength: number;
    supportedImageFormats: string[];
  };
  defaults: {
    sourceLanguage: string;
    targetLanguage: string;
    useLlmTranslation: boolean;
    improveExtractedText: boolean;
  };
  ocr: {
    backends: OcrBackendName[];
    languages: string[];
    tesseractCmd: string;
    preprocessing: boolean;
  };
  timeouts: {
    networkMs: number;
    updateMs: number;
  };
  concurrency: {
    maxUpdates: number;
  };
  keepAlive: {
    enabled: boolean;
    url?: string;
    intervalMs: number;
  };
  logging: {
    level: RuntimeLogLevel;
    logDir: string;
  };
};

const withPath = (base: string, routePath: string) => {
  const normalizedPath = routePath.startsWith('/') ? routePath : `/${routePath}`;
  return `${base.replace(/\/+$/, '')}${normalizedPath}`;
};

export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const res = BOT_ENV_SCHEMA.safeParse(env);
  if (!res.success) {
    const details = res.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid bot configuration: ${details}`);
  }

  const data = res.data;
  const webhookPath = data.WEBHOOK_PATH.startsWith('/') ? data.WEBHOOK_PATH : `/${data.WEBHOOK_PATH}`;
  // An explicit WEBHOOK_URL wins; a hosting platform URL implies webhook mode on WEBHOOK_PATH.
  const webhookUrl =
    data.WEBHOOK_URL ??
    (data.RENDER_EXTERNAL_URL ? withPath(data.RENDER_EXTERNAL_URL, webhookPath) : undefined);

  return {
    telegram: {
      token: data.TELEGRAM_BOT_TOKEN,
      webhook: {
        url: webhookUrl,
        path: webhookPath,
        secretToken: data.WEBHOOK_SECRET_TOKEN,
        host: data.SERVER_HOST,
        port: data.PORT,
      },
    },
    openai: {
      apiKey: data.OPENAI_API_KEY,
      model: data.OPENAI_MODEL,
      temperature: data.OPENAI_TEMPERATURE,
      maxTokens: data.OPENAI_MAX_TOKENS,
    },
    limits: {
      maxImageBytes: data.MAX_IMAGE_SIZE,
      maxTextLength: data.MAX_TEXT_LENGTH,
      supportedImageFormats: data.SUPPORTED_IMAGE_FORMATS,
    },
    defaults: {
      sourceLanguage: data.DEFAULT_SOURCE_LANG,
      targetLanguage: data.DEFAULT_TARGET_LANG,
      useLlmTranslation: data.TRANSLATION_SERVICE === 'llm',
      improveExtractedText: data.IMPROVE_TEXT,
    },
    ocr: {
      backends: Array.from(new Set(data.OCR_BACKENDS)),
      languages: data.OCR_LANGUAGES,
      tesseractCmd: data.TESSERACT_CMD,
      preprocessing: data.IMAGE_PREPROCESSING_ENABLED,
    },
    timeouts: {
      networkMs: data.NETWORK_TIMEOUT_SECONDS * 1000,
      updateMs: data.UPDATE_TIMEOUT_SECONDS * 1000,
    },
    concurrency: {
      maxUpdates: data.MAX_CONCURRENT_UPDATES,
    },
    keepAlive: {
      enabled: data.KEEP_ALIVE_ENABLED,
      url: data.KEEP_ALIVE_URL ?? data.RENDER_EXTERNAL_URL,
      intervalMs: data.KEEP_ALIVE_INTERVAL_SECONDS * 1000,
    },
    logging: {
      level: normalizeLogLevel(data.SCANLATE_LOG_LEVEL),
      logDir: getLogDir(env),
    },
  };
}
