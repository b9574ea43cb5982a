import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';

import { createEventLogWriter } from './logging.js';
import { createRuntimeLogger, normalizeLogLevel, serializeError } from './runtimeLogger.js';

const readLines = async (file: string) =>
  (await readFile(file, 'utf8'))
    .split('\n')
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line));

describe('runtime logger', () => {
  it('writes records at or above the threshold with child component names', async () => {
    const logDir = await mkdtemp(path.join(tmpdir(), 'scanlate-logs-'));
    const logger = createRuntimeLogger({ logDir, component: 'scanlate', level: 'info', echoToConsole: false });

    logger.debug('hidden');
    logger.child('pipeline').warn('improve stage failed', { error: 'boom' });

    await vi.waitFor(async () => {
      const lines = await readLines(path.join(logDir, 'runtime.jsonl'));
      expect(lines).toEqual([
        {
          ts: expect.any(String),
          level: 'warn',
          component: 'scanlate.pipeline',
          message: 'improve stage failed',
          data: { error: 'boom' },
        },
      ]);
    });
  });

  it('normalizes level names', () => {
    expect(normalizeLogLevel(' DEBUG ')).toBe('debug');
    expect(normalizeLogLevel('warning')).toBe('warn');
    expect(normalizeLogLevel('verbose')).toBe('info');
    expect(normalizeLogLevel(undefined)).toBe('info');
  });

  it('serializes errors and other values', () => {
    expect(serializeError(new TypeError('bad'))).toMatchObject({ name: 'TypeError', message: 'bad' });
    expect(serializeError(42)).toBe('42');
  });
});

describe('event log writer', () => {
  it('appends typed records to events.jsonl', async () => {
    const logDir = await mkdtemp(path.join(tmpdir(), 'scanlate-events-'));
    const writeLog = createEventLogWriter({ logDir, now: () => new Date('2026-01-02T03:04:05.000Z') });

    await writeLog('settings.update', { userId: '42', changed: { targetLanguage: 'de' } });
    await writeLog('keepalive.ping', { ok: true });

    expect(await readLines(path.join(logDir, 'events.jsonl'))).toEqual([
      { ts: '2026-01-02T03:04:05.000Z', type: 'settings.update', data: { userId: '42', changed: { targetLanguage: 'de' } } },
      { ts: '2026-01-02T03:04:05.000Z', type: 'keepalive.ping', data: { ok: true } },
    ]);
  });
});
