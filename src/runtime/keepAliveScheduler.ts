import type { EventLogWriter } from '../utils/logging.js';
import { settle, ok, fail, type Result } from '../utils/result.js';
import { serializeError, silentLogger, type RuntimeLogger } from '../utils/runtimeLogger.js';

type KeepAliveSchedulerOptions = {
  enabled: boolean;
  url?: string;
  intervalMs: number;
  timeoutMs: number;
  fetch?: typeof fetch;
  writeLog?: EventLogWriter;
  logger?: RuntimeLogger;
};

export type KeepAliveStatusSnapshot = {
  enabled: boolean;
  url: string | null;
  intervalSeconds: number | null;
  running: boolean;
  lastPingAtMs: number | null;
  lastSuccessAtMs: number | null;
  lastStatusCode: number | null;
  totalPings: number;
  totalFailures: number;
  lastError: string | null;
};

type InternalStatus = {
  running: boolean;
  lastPingAtMs: number | null;
  lastSuccessAtMs: number | null;
  lastStatusCode: number | null;
  totalPings: number;
  totalFailures: number;
  lastError: string | null;
};

export function createKeepAliveScheduler(options: KeepAliveSchedulerOptions) {
  const logger = options.logger ?? silentLogger;
  const fetchImpl = options.fetch ?? fetch;
  const url = options.enabled && options.url ? options.url : null;

  let intervalHandle: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  const status: InternalStatus = {
    running: false,
    lastPingAtMs: null,
    lastSuccessAtMs: null,
    lastStatusCode: null,
    totalPings: 0,
    totalFailures: 0,
    lastError: null,
  };

  const ping = (target: string): Promise<Result<number>> =>
    settle({ label: 'keep-alive ping', timeoutMs: options.timeoutMs }, async (signal) => {
      const response = await fetchImpl(target, { method: 'GET', signal });
      status.lastStatusCode = response.status;
      return response.ok ? ok(response.status) : fail('backend_failure', `HTTP ${response.status}`);
    });

  const runNow = async (): Promise<void> => {
    if (!url) return;
    if (inFlight) return inFlight;

    inFlight = (async () => {
      status.running = true;
      status.totalPings += 1;
      status.lastPingAtMs = Date.now();

      const res = await ping(url);
      if (res.ok) {
        status.lastSuccessAtMs = Date.now();
        status.lastError = null;
        logger.debug('keep-alive ping ok', { url, statusCode: res.value });
      } else {
        status.totalFailures += 1;
        status.lastError = res.error;
        logger.warn('keep-alive ping failed', { url, kind: res.kind, error: res.error });
      }

      try {
        await options.writeLog?.('keepalive.ping', {
          url,
          ok: res.ok,
          statusCode: status.lastStatusCode,
          ...(res.ok ? {} : { error: res.error }),
        });
      } catch (err) {
        logger.error('keep-alive event log write failed', { error: serializeError(err) });
      }
      status.running = false;
    })().finally(() => {
      inFlight = null;
    });

    return inFlight;
  };

  const start = () => {
    if (!url) return;
    if (intervalHandle) return;

    intervalHandle = setInterval(() => {
      void runNow();
    }, options.intervalMs);

    intervalHandle.unref?.();
  };

  const stop = () => {
    if (!intervalHandle) return;
    clearInterval(intervalHandle);
    intervalHandle = null;
  };

  const getStatus = (): KeepAliveStatusSnapshot => ({
    enabled: Boolean(url),
    url,
    intervalSeconds: url ? options.intervalMs / 1000 : null,
    running: status.running,
    lastPingAtMs: status.lastPingAtMs,
    lastSuccessAtMs: status.lastSuccessAtMs,
    lastStatusCode: status.lastStatusCode,
    totalPings: status.totalPings,
    totalFailures: status.totalFailures,
    lastError: status.lastError,
  });

  return {
    isEnabled: () => Boolean(url),
    runNow,
    start,
    stop,
    getStatus,
  };
}

export type KeepAliveScheduler = ReturnType<typeof createKeepAliveScheduler>;
