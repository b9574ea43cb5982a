import { describe, expect, it } from 'vitest';

import { loadBotConfig } from './botConfig.js';

describe('botConfig', () => {
  it('applies defaults when only the token is set', () => {
    const config = loadBotConfig({ TELEGRAM_BOT_TOKEN: 'test-token', SCANLATE_HOME: '/tmp/scanlate-home' });

    expect(config.telegram).toEqual({
      token: 'test-token',
      webhook: { url: undefined, path: '/webhook', secretToken: undefined, host: '0.0.0.0', port: 8000 },
    });
    expect(config.openai).toEqual({ apiKey: undefined, model: 'gpt-4o-mini', temperature: 0.3, maxTokens: 2000 });
    expect(config.limits).toEqual({
      maxImageBytes: 10 * 1024 * 1024,
      maxTextLength: 4000,
      supportedImageFormats: ['jpg', 'jpeg', 'png', 'bmp', 'tiff', 'webp'],
    });
    expect(config.defaults).toEqual({
      sourceLanguage: 'auto',
      targetLanguage: 'en',
      useLlmTranslation: true,
      improveExtractedText: true,
    });
    expect(config.ocr).toEqual({
      backends: ['tesseract', 'vision'],
      languages: ['eng', 'rus'],
      tesseractCmd: 'tesseract',
      preprocessing: true,
    });
    expect(config.timeouts).toEqual({ networkMs: 10_000, updateMs: 60_000 });
    expect(config.concurrency).toEqual({ maxUpdates: 8 });
    expect(config.keepAlive).toEqual({ enabled: false, url: undefined, intervalMs: 600_000 });
    expect(config.logging).toEqual({ level: 'info', logDir: '/tmp/scanlate-home/logs' });
  });

  it('parses flags, lists and enums leniently', () => {
    const config = loadBotConfig({
      TELEGRAM_BOT_TOKEN: 'test-token',
      OPENAI_API_KEY: '  ',
      IMPROVE_TEXT: 'off',
      TRANSLATION_SERVICE: 'Google',
      OCR_BACKENDS: 'vision, tesseract, vision',
      SUPPORTED_IMAGE_FORMATS: 'PNG, jpg',
      NETWORK_TIMEOUT_SECONDS: '5',
      SCANLATE_LOG_LEVEL: 'warning',
    });

    expect(config.openai.apiKey).toBeUndefined();
    expect(config.defaults.improveExtractedText).toBe(false);
    expect(config.defaults.useLlmTranslation).toBe(false);
    expect(config.ocr.backends).toEqual(['vision', 'tesseract']);
    expect(config.limits.supportedImageFormats).toEqual(['png', 'jpg']);
    expect(config.timeouts.networkMs).toBe(5000);
    expect(config.logging.level).toBe('warn');
  });

  it('derives the webhook and keep-alive URLs from the hosting platform URL', () => {
    const config = loadBotConfig({
      TELEGRAM_BOT_TOKEN: 'test-token',
      RENDER_EXTERNAL_URL: 'https://scan.example.com/',
      WEBHOOK_PATH: 'hook',
      KEEP_ALIVE_ENABLED: 'yes',
    });

    expect(config.telegram.webhook.url).toBe('https://scan.example.com/hook');
    expect(config.telegram.webhook.path).toBe('/hook');
    expect(config.keepAlive).toEqual({ enabled: true, url: 'https://scan.example.com/', intervalMs: 600_000 });
  });

  it('prefers an explicit webhook URL', () => {
    const config = loadBotConfig({
      TELEGRAM_BOT_TOKEN: 'test-token',
      WEBHOOK_URL: 'https://bot.example.com/custom',
      RENDER_EXTERNAL_URL: 'https://scan.example.com',
    });

    expect(config.telegram.webhook.url).toBe('https://bot.example.com/custom');
  });

  it('names the offending keys', () => {
    expect(() => loadBotConfig({})).toThrow(/^Invalid bot configuration: TELEGRAM_BOT_TOKEN: /);
    expect(() => loadBotConfig({ TELEGRAM_BOT_TOKEN: 'test-token', PORT: 'abc' })).toThrow(
      /^Invalid bot configuration: PORT: /,
    );
    expect(() => loadBotConfig({ TELEGRAM_BOT_TOKEN: 'test-token', OCR_BACKENDS: 'paddle' })).toThrow(
      /^Invalid bot configuration: OCR_BACKENDS\.0: /,
    );
  });
});
