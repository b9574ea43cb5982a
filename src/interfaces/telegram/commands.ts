import { InlineKeyboard } from 'grammy';

import { escapeHtml } from '../../pipeline/replyFormat.js';
import type { UserSettings } from '../../pipeline/types.js';
import type { SettingsPatch, SettingsStore } from '../../settings/settingsStore.js';
import { AUTO_LANGUAGE, type LanguageDirectory } from '../../translation/languages.js';

export type SlashCommand = {
  commandName: string;
  addressedBotUsername?: string;
  args: string;
};

export function parseSlashCommand(text: string): SlashCommand | null {
  const match = text.match(/^\/([a-zA-Z0-9_]+)(?:@([a-zA-Z0-9_]+))?(?:\s+([\s\S]+))?$/i);
  if (!match) return null;

  return {
    commandName: match[1].toLowerCase(),
    addressedBotUsername: match[2],
    args: match[3]?.trim() ?? '',
  };
}

export type CommandReply = {
  /** Telegram HTML. */
  text: string;
  keyboard?: InlineKeyboard;
  /** Set when the command changed the user's settings. */
  changed?: SettingsPatch;
};

export const SETTINGS_CALLBACK_PREFIX = 'settings:';

// Quick-pick target languages on the settings keyboard.
const KEYBOARD_TARGETS = ['en', 'ru', 'de', 'fr', 'es', 'zh'];

const ON_VALUES = new Set(['on', 'true', '1', 'yes']);
const OFF_VALUES = new Set(['off', 'false', '0', 'no']);

type CommandHandlerOptions = {
  settings: SettingsStore;
  languages: LanguageDirectory;
  limits: {
    maxImageBytes: number;
    maxTextLength: number;
    supportedImageFormats: string[];
  };
};

export type CommandHandler = {
  /** Returns null for commands this bot does not know. */
  handle: (userId: string, command: SlashCommand) => Promise<CommandReply | null>;
  handleCallback: (userId: string, data: string) => Promise<CommandReply | null>;
};

export function createCommandHandler(options: CommandHandlerOptions): CommandHandler {
  const { settings, languages, limits } = options;

  const describeLanguage = (code: string) =>
    code === AUTO_LANGUAGE ? 'auto-detect' : `${languages.getName(code)} (${code})`;

  const describeSettings = (current: UserSettings) =>
    [
      '<b>Current settings</b>',
      `Source language: ${escapeHtml(describeLanguage(current.sourceLanguage))}`,
      `Target language: ${escapeHtml(describeLanguage(current.targetLanguage))}`,
      `Translation engine: ${current.useLlmTranslation ? 'LLM (Google as fallback)' : 'Google (LLM as fallback)'}`,
      `Text improvement: ${current.improveExtractedText ? 'on' : 'off'}`,
    ].join('\n');

  const buildKeyboard = (current: UserSettings) => {
    const keyboard = new InlineKeyboard()
      .text(`Improve: ${current.improveExtractedText ? 'on' : 'off'}`, `${SETTINGS_CALLBACK_PREFIX}improve`)
      .text(`Engine: ${current.useLlmTranslation ? 'LLM' : 'Google'}`, `${SETTINGS_CALLBACK_PREFIX}engine`)
      .row();
    KEYBOARD_TARGETS.forEach((code, index) => {
      const marker = current.targetLanguage === code ? '• ' : '';
      keyboard.text(`${marker}${languages.getName(code)}`, `${SETTINGS_CALLBACK_PREFIX}target:${code}`);
      if (index % 3 === 2) keyboard.row();
    });
    return keyboard.text(
      current.sourceLanguage === AUTO_LANGUAGE ? '• Source: auto' : 'Source: auto',
      `${SETTINGS_CALLBACK_PREFIX}source:auto`,
    );
  };

  const settingsReply = (current: UserSettings, changed?: SettingsPatch): CommandReply => ({
    text: describeSettings(current),
    keyboard: buildKeyboard(current),
    ...(changed ? { changed } : {}),
  });

  const applyPatch = async (userId: string, patch: SettingsPatch, confirmation: string): Promise<CommandReply> => {
    await settings.update(userId, patch);
    return { text: escapeHtml(confirmation), changed: patch };
  };

  const resolveKnownLanguage = (input: string): string | null => {
    const code = languages.resolveCode(input);
    return languages.isKnownCode(code) ? code : null;
  };

  const unknownLanguage = (input: string): CommandReply => ({
    text: `Unknown language: <code>${escapeHtml(input)}</code>. Send /languages for the list.`,
  });

  const helpText = () =>
    [
      '<b>Commands</b>',
      '/start - welcome message',
      '/help - this message',
      '/settings - show settings with quick toggles',
      '/languages - supported languages',
      '/setlang &lt;language&gt; - set the target language',
      '/source &lt;language|auto&gt; - set the source language',
      '/improve on|off - toggle OCR text improvement',
      '/engine llm|google - choose the primary translator',
      '',
      '<b>Usage</b>',
      'Send a photo or an image file to extract and translate its text.',
      'Send plain text to translate it.',
      '',
      `Image formats: ${escapeHtml(limits.supportedImageFormats.map((item) => item.toUpperCase()).join(', '))}`,
      `Max image size: ${Math.round(limits.maxImageBytes / (1024 * 1024))} MB, max text length: ${limits.maxTextLength} characters.`,
    ].join('\n');

  const handle: CommandHandler['handle'] = async (userId, command) => {
    const current = settings.get(userId);

    switch (command.commandName) {
      case 'start':
        return {
          text: [
            '<b>Welcome!</b>',
            'I extract text from images (OCR), clean it up and translate it.',
            'Send me a photo, an image file or plain text. Use /help for the command list.',
            '',
            describeSettings(current),
          ].join('\n'),
        };
      case 'help':
        return { text: helpText() };
      case 'settings':
        return settingsReply(current);
      case 'languages':
        return {
          text: [
            '<b>Supported languages</b>',
            ...languages.entries.map((entry) => `<code>${escapeHtml(entry.code)}</code> ${escapeHtml(entry.name)}`),
            '',
            'Names work too, e.g. <code>/setlang german</code>.',
          ].join('\n'),
        };
      case 'setlang': {
        if (!command.args) return { text: 'Usage: /setlang &lt;language&gt;, e.g. /setlang en' };
        const code = resolveKnownLanguage(command.args);
        if (!code) return unknownLanguage(command.args);
        return applyPatch(userId, { targetLanguage: code }, `Target language set to ${describeLanguage(code)}.`);
      }
      case 'source': {
        if (!command.args) return { text: 'Usage: /source &lt;language|auto&gt;' };
        if (command.args.trim().toLowerCase() === AUTO_LANGUAGE) {
          return applyPatch(userId, { sourceLanguage: AUTO_LANGUAGE }, 'Source language will be detected automatically.');
        }
        const code = resolveKnownLanguage(command.args);
        if (!code) return unknownLanguage(command.args);
        return applyPatch(userId, { sourceLanguage: code }, `Source language set to ${describeLanguage(code)}.`);
      }
      case 'improve': {
        const value = command.args.toLowerCase();
        if (ON_VALUES.has(value)) {
          return applyPatch(userId, { improveExtractedText: true }, 'Text improvement enabled.');
        }
        if (OFF_VALUES.has(value)) {
          return applyPatch(userId, { improveExtractedText: false }, 'Text improvement disabled.');
        }
        return { text: 'Usage: /improve on|off' };
      }
      case 'engine': {
        const value = command.args.toLowerCase();
        if (value === 'llm' || value === 'openai') {
          return applyPatch(userId, { useLlmTranslation: true }, 'Primary translator: LLM.');
        }
        if (value === 'google') {
          return applyPatch(userId, { useLlmTranslation: false }, 'Primary translator: Google.');
        }
        return { text: 'Usage: /engine llm|google' };
      }
      default:
        return null;
    }
  };

  const handleCallback: CommandHandler['handleCallback'] = async (userId, data) => {
    if (!data.startsWith(SETTINGS_CALLBACK_PREFIX)) return null;
    const [action, value] = data.slice(SETTINGS_CALLBACK_PREFIX.length).split(':');

    const toPatch = (current: UserSettings): SettingsPatch | null => {
      if (action === 'improve') return { improveExtractedText: !current.improveExtractedText };
      if (action === 'engine') return { useLlmTranslation: !current.useLlmTranslation };
      if (action === 'target' && value && languages.isKnownCode(value)) return { targetLanguage: value };
      if (action === 'source' && value === AUTO_LANGUAGE) return { sourceLanguage: AUTO_LANGUAGE };
      return null;
    };

    // Toggles read the current value under the user's lock.
    const applied: { patch?: SettingsPatch } = {};
    const updated = await settings.update(userId, (current) => {
      const patch = toPatch(current);
      if (patch) applied.patch = patch;
      return patch ?? {};
    });

    return settingsReply(updated, applied.patch);
  };

  return { handle, handleCallback };
}
