import { Agent, run, setDefaultOpenAIKey } from '@openai/agents';

import type { CallOptions } from '../pipeline/types.js';
import { fail, ok, type Result } from '../utils/result.js';

export type LlmTask = 'translate' | 'improve' | 'detect_language';

export type LlmClient = {
  available: boolean;
  complete: (task: LlmTask, input: string, options?: CallOptions) => Promise<Result<string>>;
};

export type LlmSettings = {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
};

type AgentRunResult = { finalOutput?: unknown };

/** Indirection over the SDK runner so tests can stub model calls. */
export const llmDeps: {
  run: (agent: Agent, input: string, options: { signal?: AbortSignal }) => Promise<AgentRunResult>;
} = {
  run: (agent, input, options) => run(agent, input, { signal: options.signal }),
};

const TASK_INSTRUCTIONS: Record<LlmTask, string> = {
  translate: [
    'You are a professional translator.',
    'Translate the user text into the requested target language.',
    'Keep the original structure and line breaks. If the text is a receipt, table or form, keep its layout.',
    'Copy numbers, dates, prices and special symbols exactly as they appear.',
    'Leave brand names and proper names unchanged.',
    'Reply with the translation only, without comments or quotes.',
  ].join('\n'),
  improve: [
    'You repair text produced by optical character recognition (OCR).',
    'Fix spelling mistakes and broken words, remove OCR artifacts (stray symbols, wrong line breaks).',
    'Restore the document structure; keep table columns aligned.',
    'Never change numbers, dates, amounts or codes.',
    'Do not translate, summarize or add anything. Reply with the corrected text only.',
  ].join('\n'),
  detect_language: [
    'Identify the language of the user text.',
    'Reply with its ISO 639-1 code only (for example: en, ru, de). No other words.',
  ].join('\n'),
};

// Detection answers are a couple of tokens and should not vary.
const TASK_TEMPERATURE: Partial<Record<LlmTask, number>> = {
  improve: 0.1,
  detect_language: 0,
};

export function createAgentsLlmClient(settings: LlmSettings): LlmClient {
  if (!settings.apiKey) {
    return unavailableLlmClient('OPENAI_API_KEY is not set');
  }

  setDefaultOpenAIKey(settings.apiKey);

  const agents = new Map<LlmTask, Agent>();
  const getAgent = (task: LlmTask): Agent => {
    const existing = agents.get(task);
    if (existing) return existing;

    const agent = new Agent({
      name: `scanlate.${task}`,
      instructions: TASK_INSTRUCTIONS[task],
      model: settings.model,
      modelSettings: {
        temperature: TASK_TEMPERATURE[task] ?? settings.temperature,
        maxTokens: task === 'detect_language' ? 16 : settings.maxTokens,
      },
    });
    agents.set(task, agent);
    return agent;
  };

  return {
    available: true,
    complete: async (task, input, options = {}) => {
      const result = await llmDeps.run(getAgent(task), input, { signal: options.signal });
      const output = typeof result.finalOutput === 'string' ? result.finalOutput.trim() : '';
      if (!output) {
        return fail('backend_failure', `model returned no output for ${task}`);
      }
      return ok(output);
    },
  };
}

export function unavailableLlmClient(reason: string): LlmClient {
  return {
    available: false,
    complete: async () => fail('unavailable', reason),
  };
}
