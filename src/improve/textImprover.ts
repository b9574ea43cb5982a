import type { LlmClient } from '../llm/agents.js';
import type { CallOptions, ImprovedText, TextImprover } from '../pipeline/types.js';
import { fail, ok, settle, type Result } from '../utils/result.js';
import { silentLogger, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { cleanupOcrText, preservesNumericTokens } from './textCleanup.js';

export const CLEANUP_METHOD = 'cleanup';
export const LLM_IMPROVE_METHOD = 'llm';

type TextImproverOptions = {
  /** Optional grammar/structure repair after the deterministic cleanup. */
  llm?: LlmClient;
  timeoutMs: number;
  logger?: RuntimeLogger;
};

export function buildImprovePrompt(text: string, context?: string): string {
  const hint = context?.trim();
  return hint ? `Document context: ${hint}\n\nOCR text:\n${text}` : `OCR text:\n${text}`;
}

export function createTextImprover(options: TextImproverOptions): TextImprover {
  const logger = options.logger ?? silentLogger;
  const llm = options.llm?.available ? options.llm : null;

  return {
    improve: async (
      text: string,
      callOptions: CallOptions & { context?: string } = {},
    ): Promise<Result<ImprovedText>> => {
      if (!text.trim()) {
        return fail('input_rejected', 'Nothing to improve: the text is empty.');
      }

      const cleaned = cleanupOcrText(text);
      if (!llm) {
        return ok({ text: cleaned, method: CLEANUP_METHOD });
      }

      const res = await settle(
        { label: 'LLM text repair', timeoutMs: options.timeoutMs, signal: callOptions.signal },
        (signal) => llm.complete('improve', buildImprovePrompt(cleaned, callOptions.context), { signal }),
      );

      if (!res.ok) {
        logger.warn('LLM text repair failed, keeping cleanup output', { kind: res.kind, error: res.error });
        return ok({ text: cleaned, method: CLEANUP_METHOD });
      }

      if (!preservesNumericTokens(cleaned, res.value)) {
        logger.warn('LLM text repair altered numbers, keeping cleanup output');
        return ok({ text: cleaned, method: CLEANUP_METHOD });
      }

      return ok({ text: res.value, method: LLM_IMPROVE_METHOD });
    },
  };
}
