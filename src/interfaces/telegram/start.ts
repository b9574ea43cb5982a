import 'dotenv/config';

import process from 'node:process';
import { Bot } from 'grammy';
import { run, sequentialize } from '@grammyjs/runner';

import { createTelegramAdapter, type TelegramBotLike } from './bot.js';
import { createCommandHandler } from './commands.js';
import { startWebhookServer } from './webhook.js';
import { buildPipeline } from '../../pipeline/buildPipeline.js';
import { loadBotConfig } from '../../runtime/botConfig.js';
import { getBotHome, getLogDir } from '../../runtime/botHome.js';
import { createKeepAliveScheduler } from '../../runtime/keepAliveScheduler.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import { createSettingsStore } from '../../settings/settingsStore.js';
import { createEventLogWriter } from '../../utils/logging.js';
import { createRuntimeLogger, serializeError } from '../../utils/runtimeLogger.js';

const botHome = getBotHome(process.env);
const logDir = getLogDir(process.env);
let mode: 'telegram' | 'polling' | 'webhook' = 'telegram';

// Webhook requests may be held this much longer than the update deadline before grammy answers.
const WEBHOOK_GRACE_MS = 5000;

const waitForShutdownSignal = () =>
  new Promise<NodeJS.Signals>((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });

const start = async () => {
  const config = loadBotConfig(process.env);
  const logger = createRuntimeLogger({
    logDir: config.logging.logDir,
    component: 'scanlate',
    level: config.logging.level,
  });

  const pipeline = buildPipeline(config, { logger });
  const settings = createSettingsStore(config.defaults);
  const commands = createCommandHandler({ settings, languages: pipeline.languages, limits: config.limits });

  const bot = new Bot(config.telegram.token);
  // One update at a time per user; different users run concurrently.
  bot.use(sequentialize((ctx) => ctx.from?.id.toString() ?? ctx.chat?.id.toString()));

  createTelegramAdapter({
    token: config.telegram.token,
    logDir: config.logging.logDir,
    coordinator: pipeline.coordinator,
    commands,
    settings,
    limits: config.limits,
    timeouts: config.timeouts,
    bot: bot as unknown as TelegramBotLike,
    logger: logger.child('telegram'),
  });

  const keepAlive = createKeepAliveScheduler({
    ...config.keepAlive,
    timeoutMs: config.timeouts.networkMs,
    writeLog: createEventLogWriter({ logDir: config.logging.logDir }),
    logger: logger.child('keepalive'),
  });

  logger.info('pipeline ready', {
    ocrBackends: pipeline.ocrBackends,
    llmAvailable: pipeline.llm.available,
    defaults: config.defaults,
    maxConcurrentUpdates: config.concurrency.maxUpdates,
  });

  const webhookUrl = config.telegram.webhook.url;
  if (webhookUrl) {
    mode = 'webhook';
    const startedAtMs = Date.now();
    const server = await startWebhookServer({
      bot,
      host: config.telegram.webhook.host,
      port: config.telegram.webhook.port,
      path: config.telegram.webhook.path,
      secretToken: config.telegram.webhook.secretToken,
      updateTimeoutMs: config.timeouts.updateMs + WEBHOOK_GRACE_MS,
      getStatus: () => ({
        mode,
        uptimeSeconds: Math.round((Date.now() - startedAtMs) / 1000),
        keepAlive: keepAlive.getStatus(),
      }),
      logger: logger.child('webhook'),
    });

    await bot.api.setWebhook(webhookUrl, {
      secret_token: config.telegram.webhook.secretToken,
      max_connections: config.concurrency.maxUpdates,
      allowed_updates: ['message', 'callback_query'],
    });
    keepAlive.start();
    logger.info('scanlate (webhook) listening', { port: server.port, path: config.telegram.webhook.path });

    const signal = await waitForShutdownSignal();
    logger.info('shutting down', { signal });
    keepAlive.stop();
    await server.close();
    return;
  }

  mode = 'polling';
  await bot.api.deleteWebhook();
  const runner = run(bot, { sink: { concurrency: config.concurrency.maxUpdates } });
  keepAlive.start();
  logger.info('scanlate (polling) started');

  void waitForShutdownSignal()
    .then((signal) => {
      logger.info('shutting down', { signal });
      keepAlive.stop();
      return runner.stop();
    })
    .catch((err) => {
      logger.error('runner shutdown failed', { error: serializeError(err) });
    });

  try {
    await runner.task();
  } finally {
    keepAlive.stop();
  }
};

start().catch((err) => {
  reportStartupError(err, { mode, botHome, logDir });
  process.exit(1);
});
