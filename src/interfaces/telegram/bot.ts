import { Bot, type InlineKeyboard } from 'grammy';

import { failedReply, imageTooLargeMessage, type PipelineCoordinator } from '../../pipeline/coordinator.js';
import { splitMessage } from '../../pipeline/replyFormat.js';
import type { ImageInput, PipelineReply } from '../../pipeline/types.js';
import type { SettingsStore } from '../../settings/settingsStore.js';
import { isImageMimeType, isSupportedImageFile } from '../../ocr/imageFormat.js';
import { appendJsonl, createEventLogWriter } from '../../utils/logging.js';
import { ok, settle, toErrorMessage } from '../../utils/result.js';
import { serializeError, silentLogger, type RuntimeLogger } from '../../utils/runtimeLogger.js';
import { parseSlashCommand, type CommandHandler, type CommandReply } from './commands.js';

type TelegramDocument = {
  file_id: string;
  file_unique_id: string;
  file_name?: string;
  mime_type?: string;
  file_size?: number;
};

type TelegramPhotoSize = {
  file_id: string;
  file_unique_id: string;
  width: number;
  height: number;
  file_size?: number;
};

type TelegramReplyOptions = {
  parse_mode?: 'HTML';
  reply_markup?: InlineKeyboard;
};

export type TelegramContext = {
  chat?: { id: number; type: string };
  message?: {
    text?: string;
    caption?: string;
    document?: TelegramDocument;
    photo?: TelegramPhotoSize[];
    message_id: number;
  };
  callbackQuery?: { id: string; data?: string };
  from?: { id?: number | string };
  reply: (text: string, other?: TelegramReplyOptions) => Promise<unknown>;
  replyWithChatAction?: (action: 'typing') => Promise<unknown>;
  answerCallbackQuery?: (other?: { text?: string }) => Promise<unknown>;
  editMessageText?: (text: string, other?: TelegramReplyOptions) => Promise<unknown>;
  api?: {
    getFile?: (fileId: string) => Promise<{ file_path?: string }>;
  };
};

type TelegramEvent = 'message:text' | 'message:document' | 'message:photo' | 'callback_query:data';

export type TelegramBotLike = {
  on: (event: TelegramEvent, handler: (ctx: TelegramContext) => Promise<void> | void) => void;
  catch: (handler: (err: unknown) => Promise<void> | void) => void;
};

type DownloadedTelegramFile = {
  bytes: Uint8Array;
  filePath?: string;
};

type TelegramAdapterDeps = {
  appendJsonl: typeof appendJsonl;
  downloadTelegramFile: (input: {
    ctx: TelegramContext;
    token: string;
    fileId: string;
    signal: AbortSignal;
  }) => Promise<DownloadedTelegramFile>;
};

export type TelegramAdapterOptions = {
  token: string;
  logDir: string;
  coordinator: PipelineCoordinator;
  commands: CommandHandler;
  settings: SettingsStore;
  limits: {
    maxImageBytes: number;
    supportedImageFormats: string[];
  };
  timeouts: {
    /** Bound for the Telegram file download. */
    networkMs: number;
    /** Replies finished after this deadline are discarded. */
    updateMs: number;
  };
  bot?: TelegramBotLike;
  logger?: RuntimeLogger;
  now?: () => Date;
  deps?: Partial<TelegramAdapterDeps>;
};

export type TelegramAdapter = {
  bot: TelegramBotLike;
};

export const GENERIC_ERROR_REPLY = 'Something went wrong while processing your message. Please try again later.';
export const UNKNOWN_COMMAND_REPLY = 'Unknown command. Send /help for the list of commands.';
export const UNSUPPORTED_FILE_REPLY = 'Only image files can be processed. Send a photo or an image document.';

function getLargestPhotoSize(photoSizes: TelegramPhotoSize[]): TelegramPhotoSize {
  if (photoSizes.length === 1) return photoSizes[0];

  return photoSizes.reduce((best, current) => {
    const bestPixels = best.width * best.height;
    const currentPixels = current.width * current.height;

    if (currentPixels > bestPixels) return current;

    if (currentPixels === bestPixels) {
      const bestSize = best.file_size ?? 0;
      const currentSize = current.file_size ?? 0;
      if (currentSize > bestSize) return current;
    }

    return best;
  });
}

async function defaultDownloadTelegramFile(input: {
  ctx: TelegramContext;
  token: string;
  fileId: string;
  signal: AbortSignal;
}): Promise<DownloadedTelegramFile> {
  const { ctx, token, fileId, signal } = input;

  const file = ctx.api?.getFile ? await ctx.api.getFile(fileId) : null;
  const filePath = file?.file_path;
  if (!filePath) {
    throw new Error('Telegram file path is missing from getFile response.');
  }

  const response = await fetch(`https://api.telegram.org/file/bot${token}/${filePath}`, { signal });
  if (!response.ok) {
    throw new Error(`Failed to download Telegram file (${response.status}).`);
  }

  return {
    bytes: new Uint8Array(await response.arrayBuffer()),
    filePath,
  };
}

function describeBotError(err: unknown): { message: string; updateId?: number } {
  if (typeof err === 'object' && err !== null && 'error' in err) {
    const updateId =
      'ctx' in err &&
      typeof err.ctx === 'object' &&
      err.ctx !== null &&
      'update' in err.ctx &&
      typeof err.ctx.update === 'object' &&
      err.ctx.update !== null &&
      'update_id' in err.ctx.update &&
      typeof err.ctx.update.update_id === 'number'
        ? err.ctx.update.update_id
        : undefined;
    return { message: toErrorMessage(err.error), updateId };
  }
  return { message: toErrorMessage(err) };
}

export function createTelegramAdapter(options: TelegramAdapterOptions): TelegramAdapter {
  const {
    token,
    logDir,
    coordinator,
    commands,
    settings,
    limits,
    timeouts,
    bot: providedBot,
    now = () => new Date(),
    deps = {},
  } = options;

  if (!token) {
    throw new Error('Missing TELEGRAM_BOT_TOKEN in environment');
  }

  const { appendJsonl: appendJsonlImpl, downloadTelegramFile: downloadTelegramFileImpl } = {
    appendJsonl,
    downloadTelegramFile: defaultDownloadTelegramFile,
    ...deps,
  };

  const writeLog = createEventLogWriter({ logDir, now, append: appendJsonlImpl });
  const logger = options.logger ?? silentLogger;
  const bot = providedBot ?? (new Bot(token) as unknown as TelegramBotLike);

  const safeWriteLog: typeof writeLog = async (type, data) => {
    try {
      await writeLog(type, data);
    } catch (err) {
      logger.error('event log write failed', { type, error: serializeError(err) });
    }
  };

  const getUserId = (ctx: TelegramContext) => String(ctx.from?.id ?? 'unknown');

  const sendReply = async (ctx: TelegramContext, reply: PipelineReply) => {
    const parseMode = reply.format === 'rich' ? 'HTML' : undefined;
    for (const chunk of splitMessage(reply.text)) {
      await ctx.reply(chunk, parseMode ? { parse_mode: parseMode } : undefined);
    }
  };

  const sendCommandReply = async (ctx: TelegramContext, reply: CommandReply) => {
    await ctx.reply(reply.text, { parse_mode: 'HTML', ...(reply.keyboard ? { reply_markup: reply.keyboard } : {}) });
  };

  const showTyping = async (ctx: TelegramContext) => {
    if (!ctx.replyWithChatAction) return;
    try {
      await ctx.replyWithChatAction('typing');
    } catch (err) {
      logger.debug('chat action failed', { error: toErrorMessage(err) });
    }
  };

  /**
   * Runs one pipeline request under the per-update deadline. Work that outlives the
   * deadline is cancelled through the signal and its reply is never sent.
   */
  const runUpdate = async (
    ctx: TelegramContext,
    kind: 'text' | 'image',
    work: (signal: AbortSignal) => Promise<PipelineReply>,
  ) => {
    const userId = getUserId(ctx);
    const startedAt = Date.now();
    const controller = new AbortController();
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      controller.abort(new Error('update deadline exceeded'));
    }, timeouts.updateMs);

    try {
      await showTyping(ctx);
      const reply = await work(controller.signal);

      if (expired) {
        logger.warn('reply discarded after update deadline', { userId, kind });
        await safeWriteLog('pipeline.discarded', {
          chatId: ctx.chat?.id,
          userId,
          kind,
          status: reply.status,
          elapsedMs: Date.now() - startedAt,
          deadlineMs: timeouts.updateMs,
        });
        return;
      }

      await sendReply(ctx, reply);
      await safeWriteLog('pipeline.reply', {
        chatId: ctx.chat?.id,
        userId,
        kind,
        status: reply.status,
        failedStages: reply.failedStages,
        extractMethod: reply.extraction?.method,
        improveMethod: reply.improveMethod,
        translateMethod: reply.translation?.method,
        sourceLanguage: reply.translation?.sourceLanguage,
        targetLanguage: reply.translation?.targetLanguage,
        error: reply.error,
        errorKind: reply.errorKind,
        elapsedMs: Date.now() - startedAt,
      });
    } catch (err) {
      logger.error('update handling failed', { userId, kind, error: serializeError(err) });
      await safeWriteLog('telegram.error', {
        chatId: ctx.chat?.id,
        userId,
        kind,
        error: serializeError(err),
      });
      if (!expired) {
        await ctx.reply(GENERIC_ERROR_REPLY);
      }
    } finally {
      clearTimeout(timer);
    }
  };

  const handleImage = async (
    ctx: TelegramContext,
    input: { fileId: string; declaredSizeBytes?: number; caption?: string },
  ) => {
    if (input.declaredSizeBytes !== undefined && input.declaredSizeBytes > limits.maxImageBytes) {
      await ctx.reply(imageTooLargeMessage(input.declaredSizeBytes, limits.maxImageBytes));
      return;
    }

    const userId = getUserId(ctx);
    await runUpdate(ctx, 'image', async (signal) => {
      const downloaded = await settle(
        { label: 'Telegram file download', timeoutMs: timeouts.networkMs, signal },
        async (downloadSignal) =>
          ok(await downloadTelegramFileImpl({ ctx, token, fileId: input.fileId, signal: downloadSignal })),
      );
      if (!downloaded.ok) {
        logger.warn('telegram file download failed', { userId, kind: downloaded.kind, error: downloaded.error });
        return failedReply('Could not download the image from Telegram. Please send it again.', downloaded.kind);
      }

      const image: ImageInput = { imageBytes: downloaded.value.bytes, caption: input.caption };
      return coordinator.handleImage(image, settings.get(userId), { signal });
    });
  };

  bot.on('message:text', async (ctx) => {
    const text = ctx.message?.text?.trim();
    if (!ctx.message || !text) return;

    const userId = getUserId(ctx);
    await safeWriteLog('telegram.update', {
      chatId: ctx.chat?.id,
      userId,
      messageId: ctx.message.message_id,
      kind: 'text',
      length: text.length,
    });

    const command = parseSlashCommand(text);
    if (command) {
      const reply = await commands.handle(userId, command);
      if (!reply) {
        await ctx.reply(UNKNOWN_COMMAND_REPLY);
        return;
      }
      if (reply.changed) {
        await safeWriteLog('settings.update', { userId, command: command.commandName, changed: reply.changed });
      }
      await sendCommandReply(ctx, reply);
      return;
    }

    await runUpdate(ctx, 'text', (signal) => coordinator.handleText(text, settings.get(userId), { signal }));
  });

  bot.on('message:photo', async (ctx) => {
    const photoSizes = ctx.message?.photo;
    if (!ctx.message || !photoSizes || photoSizes.length === 0) return;

    const largestPhoto = getLargestPhotoSize(photoSizes);
    await safeWriteLog('telegram.update', {
      chatId: ctx.chat?.id,
      userId: getUserId(ctx),
      messageId: ctx.message.message_id,
      kind: 'photo',
      fileId: largestPhoto.file_id,
      sizeBytes: largestPhoto.file_size ?? null,
      width: largestPhoto.width,
      height: largestPhoto.height,
    });

    await handleImage(ctx, {
      fileId: largestPhoto.file_id,
      declaredSizeBytes: largestPhoto.file_size,
      caption: ctx.message.caption,
    });
  });

  bot.on('message:document', async (ctx) => {
    const document = ctx.message?.document;
    if (!ctx.message || !document) return;

    await safeWriteLog('telegram.update', {
      chatId: ctx.chat?.id,
      userId: getUserId(ctx),
      messageId: ctx.message.message_id,
      kind: 'document',
      fileId: document.file_id,
      filename: document.file_name ?? null,
      mimeType: document.mime_type ?? null,
      sizeBytes: document.file_size ?? null,
    });

    const isImage =
      isSupportedImageFile(document.file_name, limits.supportedImageFormats) ||
      (!document.file_name && isImageMimeType(document.mime_type));
    if (!isImage) {
      await ctx.reply(UNSUPPORTED_FILE_REPLY);
      return;
    }

    await handleImage(ctx, {
      fileId: document.file_id,
      declaredSizeBytes: document.file_size,
      caption: ctx.message.caption,
    });
  });

  bot.on('callback_query:data', async (ctx) => {
    const data = ctx.callbackQuery?.data;
    if (!data) return;

    const userId = getUserId(ctx);
    const reply = await commands.handleCallback(userId, data);
    await ctx.answerCallbackQuery?.();
    if (!reply) return;

    if (reply.changed) {
      await safeWriteLog('settings.update', { userId, callback: data, changed: reply.changed });
    }

    const editOptions: TelegramReplyOptions = {
      parse_mode: 'HTML',
      ...(reply.keyboard ? { reply_markup: reply.keyboard } : {}),
    };
    if (!ctx.editMessageText) {
      await ctx.reply(reply.text, editOptions);
      return;
    }
    try {
      await ctx.editMessageText(reply.text, editOptions);
    } catch (err) {
      // Telegram rejects edits that leave the message unchanged.
      logger.debug('settings message not edited', { userId, error: toErrorMessage(err) });
    }
  });

  bot.catch(async (err) => {
    const described = describeBotError(err);
    logger.error('unhandled telegram error', { ...described, error: serializeError(err) });
    await safeWriteLog('telegram.error', {
      updateId: described.updateId,
      error: { message: described.message },
    });
  });

  return { bot };
}
