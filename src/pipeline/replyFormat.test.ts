import { describe, expect, it } from 'vitest';

import { createLanguageDirectory, loadLanguageTable } from '../translation/languages.js';
import { escapeHtml, formatImageReply, formatTextReply, splitMessage } from './replyFormat.js';

const { getName } = createLanguageDirectory(loadLanguageTable());

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML reserves', () => {
    expect(escapeHtml('<b>Tom & "Jerry"</b>')).toBe('&lt;b&gt;Tom &amp; "Jerry"&lt;/b&gt;');
  });
});

describe('formatImageReply', () => {
  it('hides the improved section when nothing changed', () => {
    expect(formatImageReply({ extractedText: 'Hola', improvedText: 'Hola' }, getName)).toBe(
      '<b>Extracted text</b>\nHola',
    );
  });

  it('notes a same-language result instead of repeating the text', () => {
    const text = formatImageReply(
      {
        extractedText: 'Hello',
        translation: {
          success: true,
          originalText: 'Hello',
          translatedText: 'Hello',
          sourceLanguage: 'en',
          targetLanguage: 'en',
          method: 'no-op',
        },
      },
      getName,
    );

    expect(text).toBe('<b>Extracted text</b>\nHello\n\n<i>Already in English, no translation needed.</i>');
  });

  it('falls back to upper-cased codes for unknown languages', () => {
    const text = formatTextReply(
      {
        success: true,
        originalText: 'nuqneH',
        translatedText: 'hello',
        sourceLanguage: 'tlh',
        targetLanguage: 'en',
        method: 'llm',
      },
      getName,
    );

    expect(text).toBe('<b>Translation (TLH → English)</b>\nhello');
  });
});

describe('splitMessage', () => {
  it('keeps short messages whole', () => {
    expect(splitMessage('short', 10)).toEqual(['short']);
  });

  it('splits on the last line break that fits', () => {
    expect(splitMessage('aaaa\nbbbb\ncccc', 10)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('hard-cuts long lines', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('never cuts a surrogate pair in half', () => {
    expect(splitMessage('abc😀de', 4)).toEqual(['abc', '😀de']);
  });

  it('never cuts inside an entity', () => {
    expect(splitMessage('ab&amp;cd', 5)).toEqual(['ab', '&amp;', 'cd']);
  });
});
