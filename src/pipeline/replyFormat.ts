import type { TranslationResult } from './types.js';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

type LanguageNamer = (code: string) => string;

const heading = (title: string) => `<b>${escapeHtml(title)}</b>`;
const note = (message: string) => `<i>${escapeHtml(message)}</i>`;

function describeDirection(translation: TranslationResult, getName: LanguageNamer): string {
  return `${getName(translation.sourceLanguage)} → ${getName(translation.targetLanguage)}`;
}

function translationSection(translation: TranslationResult, getName: LanguageNamer): string {
  if (!translation.success) {
    return note(`Translation failed: ${translation.error}`);
  }
  if (translation.method === 'no-op') {
    return note(`Already in ${getName(translation.targetLanguage)}, no translation needed.`);
  }
  return [
    heading(`Translation (${describeDirection(translation, getName)})`),
    escapeHtml(translation.translatedText),
  ].join('\n');
}

export type ImageReplyParts = {
  extractedText: string;
  improvedText?: string;
  improveError?: string;
  translation?: TranslationResult;
};

export function formatImageReply(parts: ImageReplyParts, getName: LanguageNamer): string {
  const sections = [[heading('Extracted text'), escapeHtml(parts.extractedText)].join('\n')];

  if (parts.improvedText !== undefined && parts.improvedText !== parts.extractedText) {
    sections.push([heading('Improved text'), escapeHtml(parts.improvedText)].join('\n'));
  }
  if (parts.improveError) {
    sections.push(note(`Text improvement skipped: ${parts.improveError}`));
  }
  if (parts.translation) {
    sections.push(translationSection(parts.translation, getName));
  }

  return sections.join('\n\n');
}

export function formatTextReply(translation: TranslationResult, getName: LanguageNamer): string {
  if (!translation.success) {
    return [
      note(`Translation failed: ${translation.error}`),
      [heading('Original text'), escapeHtml(translation.originalText)].join('\n'),
    ].join('\n\n');
  }
  if (translation.method === 'no-op') {
    return [
      note(`The text is already in ${getName(translation.targetLanguage)}.`),
      escapeHtml(translation.originalText),
    ].join('\n\n');
  }
  return [
    heading(`Translation (${describeDirection(translation, getName)})`),
    escapeHtml(translation.translatedText),
  ].join('\n');
}

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

// Never cut inside an HTML entity such as `&amp;` or a surrogate pair.
function safeCut(text: string, limit: number): number {
  const ampersand = text.lastIndexOf('&', limit - 1);
  if (ampersand > 0) {
    const semicolon = text.indexOf(';', ampersand);
    if (semicolon >= limit) return ampersand;
  }
  return isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
}

/**
 * Splits a message into Telegram-sized chunks, preferring line boundaries.
 * Tags are only ever opened and closed on a single line, so line splits keep HTML balanced.
 */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const newline = rest.lastIndexOf('\n', limit);
    const cut = newline > 0 ? newline : safeCut(rest, limit);
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(newline > 0 ? cut + 1 : cut);
  }
  if (rest) chunks.push(rest);
  return chunks;
}
