import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';

export type EventLogType =
  | 'telegram.update'
  | 'telegram.error'
  | 'pipeline.reply'
  | 'pipeline.discarded'
  | 'settings.update'
  | 'keepalive.ping';

export type EventLogRecord = {
  ts: string;
  type: EventLogType;
  data: Record<string, unknown>;
};

export async function appendJsonl(path: string, record: EventLogRecord) {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(record) + '\n', 'utf8');
}

export type EventLogWriter = (type: EventLogType, data: Record<string, unknown>) => Promise<void>;

/** Binds the events.jsonl path and clock so handlers only pass the payload. */
export function createEventLogWriter(options: {
  logDir: string;
  now?: () => Date;
  append?: typeof appendJsonl;
}): EventLogWriter {
  const logPath = join(options.logDir, 'events.jsonl');
  const now = options.now ?? (() => new Date());
  const append = options.append ?? appendJsonl;

  return (type, data) => append(logPath, { ts: now().toISOString(), type, data });
}
