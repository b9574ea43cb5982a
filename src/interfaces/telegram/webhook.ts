import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { webhookCallback, type Bot } from 'grammy';

import { serializeError, silentLogger, type RuntimeLogger } from '../../utils/runtimeLogger.js';

type RequestLike = {
  method?: string;
  url?: string;
};

type ResponseLike = {
  statusCode: number;
  setHeader: (name: string, value: string) => void;
  end: (body?: string) => void;
};

export type WebhookRequestHandler<Req extends RequestLike, Res extends ResponseLike> = (
  req: Req,
  res: Res,
) => Promise<void>;

type WebhookRequestHandlerOptions<Req extends RequestLike, Res extends ResponseLike> = {
  path: string;
  onUpdate: (req: Req, res: Res) => Promise<unknown>;
  getStatus: () => Record<string, unknown>;
  logger?: RuntimeLogger;
};

export function createWebhookRequestHandler<Req extends RequestLike, Res extends ResponseLike>(
  options: WebhookRequestHandlerOptions<Req, Res>,
): WebhookRequestHandler<Req, Res> {
  const logger = options.logger ?? silentLogger;

  return async (req, res) => {
    const sendJson = (statusCode: number, payload: unknown) => {
      res.statusCode = statusCode;
      res.setHeader('content-type', 'application/json; charset=utf-8');
      res.end(JSON.stringify(payload));
    };

    try {
      const path = req.url?.split('?')[0] ?? '';

      if (req.method === 'POST' && path === options.path) {
        await options.onUpdate(req, res);
        return;
      }

      if (req.method === 'GET' && (path === '/' || path === '/health')) {
        sendJson(200, { ok: true, ...options.getStatus() });
        return;
      }

      if (path === options.path || path === '/' || path === '/health') {
        sendJson(405, { error: 'method_not_allowed' });
        return;
      }

      sendJson(404, { error: 'not_found' });
    } catch (err) {
      logger.error('webhook request failed', { path: req.url, error: serializeError(err) });
      sendJson(500, { error: 'internal_error' });
    }
  };
}

type WebhookServerOptions = {
  bot: Bot;
  host: string;
  port: number;
  path: string;
  secretToken?: string;
  /** How long a POST may hold the connection before grammy answers and keeps processing. */
  updateTimeoutMs: number;
  getStatus: () => Record<string, unknown>;
  logger?: RuntimeLogger;
};

export type WebhookServer = {
  server: Server;
  port: number;
  close: () => Promise<void>;
};

export async function startWebhookServer(options: WebhookServerOptions): Promise<WebhookServer> {
  const onUpdate = webhookCallback(options.bot, 'http', {
    secretToken: options.secretToken,
    onTimeout: 'return',
    timeoutMilliseconds: options.updateTimeoutMs,
  });

  const handler = createWebhookRequestHandler<IncomingMessage, ServerResponse>({
    path: options.path,
    onUpdate: (req, res) => onUpdate(req, res),
    getStatus: options.getStatus,
    logger: options.logger,
  });

  const server = createServer((req, res) => {
    void handler(req, res);
  });

  let port = options.port;
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address && typeof address === 'object') {
        port = address.port;
      }
      resolve();
    });
  });

  return {
    server,
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
