import Fastify, { type FastifyInstance } from 'fastify';
import type { Context } from 'grammy';

type Update = Context['update'];

const SECRET_TOKEN_HEADER = 'x-telegram-bot-api-secret-token';

export interface CreateServerOptions {
  logLevel?: string;
  /** `false` silences request logging (tests). */
  logger?: boolean;
  /** Destination for log lines instead of stdout. */
  logStream?: { write(line: string): void };
}

export function createServer(options: CreateServerOptions = {}): FastifyInstance {
  const server = Fastify({
    logger:
      options.logger === false
        ? false
        : { level: options.logLevel ?? 'info', stream: options.logStream },
  });

  server.get('/', async () => ({ ok: true }));

  return server;
}

export interface WebhookRouteOptions {
  path: string;
  /** When set, requests must carry it in X-Telegram-Bot-Api-Secret-Token. */
  secretToken?: string;
  processUpdate(update: Update): Promise<void>;
}

function isTelegramUpdate(body: unknown): body is Update {
  return (
    typeof body === 'object' &&
    body !== null &&
    'update_id' in body &&
    typeof body.update_id === 'number'
  );
}

export function registerWebhookRoute(
  server: FastifyInstance,
  options: WebhookRouteOptions,
): void {
  const { path, secretToken, processUpdate } = options;

  server.post(path, async (request, reply) => {
    if (secretToken) {
      const header = request.headers[SECRET_TOKEN_HEADER];
      if (header !== secretToken) {
        request.log.warn({ ip: request.ip }, 'Rejected webhook call with invalid secret token');
        return reply.code(403).send();
      }
    }

    const body: unknown = request.body;
    if (!isTelegramUpdate(body)) {
      request.log.warn('Rejected webhook call without a Telegram update payload');
      return reply.code(400).send();
    }

    try {
      await processUpdate(body);
    } catch (err) {
      // Telegram redelivers on non-2xx, which would repeat the whole pipeline.
      request.log.error(
        { err, updateId: body.update_id, chatId: body.message?.chat.id },
        'Failed to process Telegram update',
      );
    }
    return reply.code(200).send();
  });
}
