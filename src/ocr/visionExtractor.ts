import OpenAI from 'openai';
import sharp from 'sharp';

import type { CallOptions, TextExtractorBackend } from '../pipeline/types.js';
import { fail, ok, settle, type Result } from '../utils/result.js';
import { detectImageMimeType } from './imageFormat.js';

const VISION_PROMPT =
  'Extract all text from this image exactly as written, keeping line breaks and table layout. ' +
  'Reply with the text only. If the image contains no text, reply with an empty message.';

// Models sometimes answer the "no text" case in words instead of an empty message.
const NO_TEXT_ANSWERS = new Set(['', 'no text', 'no text.', '(no text)', 'none']);

type VisionCompletion = (input: {
  model: string;
  dataUrl: string;
  prompt: string;
  maxTokens: number;
  signal: AbortSignal;
}) => Promise<string | null>;

type VisionExtractorOptions = {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
};

export function buildImageDataUrl(bytes: Uint8Array): string {
  const mimeType = detectImageMimeType(bytes) ?? 'image/png';
  return `data:${mimeType};base64,${Buffer.from(bytes).toString('base64')}`;
}

const VISION_MIME_TYPES = new Set(['image/png', 'image/jpeg', 'image/webp', 'image/gif']);

/** Re-encodes formats the vision API does not take (BMP, TIFF) as PNG. */
export async function toVisionImage(bytes: Uint8Array): Promise<Uint8Array> {
  const mimeType = detectImageMimeType(bytes);
  if (mimeType && VISION_MIME_TYPES.has(mimeType)) return bytes;
  return sharp(bytes).png().toBuffer();
}

export function createOpenAIVisionCompletion(apiKey: string): VisionCompletion {
  const client = new OpenAI({ apiKey, maxRetries: 0 });

  return async ({ model, dataUrl, prompt, maxTokens, signal }) => {
    const response = await client.chat.completions.create(
      {
        model,
        max_tokens: maxTokens,
        temperature: 0,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              { type: 'image_url', image_url: { url: dataUrl, detail: 'high' } },
            ],
          },
        ],
      },
      { signal },
    );
    return response.choices[0]?.message?.content ?? null;
  };
}

export function createVisionBackend(
  options: VisionExtractorOptions,
  deps: { complete?: VisionCompletion } = {},
): TextExtractorBackend {
  const complete = deps.complete ?? createOpenAIVisionCompletion(options.apiKey);

  return {
    name: 'vision',
    extract: (imageBytes: Uint8Array, callOptions: CallOptions = {}) =>
      settle(
        { label: 'vision OCR', timeoutMs: options.timeoutMs, signal: callOptions.signal },
        async (signal): Promise<Result<string>> => {
          const content = await complete({
            model: options.model,
            dataUrl: buildImageDataUrl(await toVisionImage(imageBytes)),
            prompt: VISION_PROMPT,
            maxTokens: options.maxTokens,
            signal,
          });
          if (content === null) {
            return fail('backend_failure', 'vision model returned no content');
          }
          const text = content.trim();
          return ok(NO_TEXT_ANSWERS.has(text.toLowerCase()) ? '' : text);
        },
      ),
  };
}
