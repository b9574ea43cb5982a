import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { buildNextSteps, reportStartupError } from './startupErrors.js';

const DOCTOR_STEP = 'Run `npm run doctor` to validate env and dependencies.';

describe('startup errors', () => {
  it('points at each invalid configuration key', () => {
    expect(
      buildNextSteps(
        'Invalid bot configuration: PORT: Expected number, received nan; OPENAI_TEMPERATURE: Number must be less than or equal to 2',
      ),
    ).toEqual([
      'Fix PORT in your environment or .env file (see .env.example).',
      'Fix OPENAI_TEMPERATURE in your environment or .env file (see .env.example).',
      DOCTOR_STEP,
    ]);
  });

  it('explains a missing token and polling conflicts', () => {
    expect(buildNextSteps('Missing TELEGRAM_BOT_TOKEN in environment')).toEqual([
      'Set TELEGRAM_BOT_TOKEN in your environment or .env file.',
      DOCTOR_STEP,
    ]);
    expect(buildNextSteps('Call to getUpdates failed! (409: Conflict: terminated by other getUpdates request)')).toEqual([
      'Another instance is polling this bot or a webhook is set. Stop it, or set WEBHOOK_URL for webhook mode.',
      DOCTOR_STEP,
    ]);
  });

  it('writes the reason, paths and next steps', () => {
    const lines: string[] = [];

    reportStartupError(new Error('listen EADDRINUSE: address already in use 0.0.0.0:8000'), {
      mode: 'webhook',
      botHome: '/tmp/scanlate-home',
      logDir: '/tmp/scanlate-home/logs',
      write: (line) => lines.push(line),
    });

    expect(lines).toEqual([
      'scanlate (webhook) failed to start.',
      'Reason: listen EADDRINUSE: address already in use 0.0.0.0:8000',
      'Relevant paths:',
      '- SCANLATE_HOME: /tmp/scanlate-home',
      `- Env file: ${path.resolve('.env')}`,
      '- Logs (events): /tmp/scanlate-home/logs/events.jsonl',
      '- Logs (runtime): /tmp/scanlate-home/logs/runtime.jsonl',
      'Next steps:',
      '- PORT is already in use. Pick a free PORT or stop the other process.',
      `- ${DOCTOR_STEP}`,
    ]);
  });
});
