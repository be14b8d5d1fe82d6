import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import type { AppContext } from './context';
import { FeedParseError } from './lib/normalizer';
import { isNotFound } from './lib/requisition';
import { logger } from './logger';
import accounts from './routes/accounts';
import banks from './routes/banks';
import sync from './routes/sync';
import { BankNotFoundError } from './workers/linkManager';

function statusCodeFor(error: Error & { statusCode?: number }): number {
  if (error instanceof BankNotFoundError || isNotFound(error)) {
    return 404;
  }
  if (error instanceof FeedParseError) {
    return 502;
  }
  return error.statusCode ?? 500;
}

export async function buildServer(context: AppContext): Promise<FastifyInstance> {
  const baseLogger: FastifyBaseLogger = logger;
  const app = Fastify({
    logger: baseLogger,
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    trustProxy: true,
  });

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  app.get('/health', async () => ({ ok: true, service: 'bank-feed-archiver' }));

  await app.register(banks, { prefix: '/v1', context });
  await app.register(accounts, { prefix: '/v1', context });
  await app.register(sync, { prefix: '/v1', context });

  app.setErrorHandler((error, request, reply) => {
    const statusCode = statusCodeFor(error);
    request.log.error(
      {
        err: error,
        reqId: request.id,
        method: request.method,
        url: request.url,
      },
      'Request error'
    );

    reply.status(statusCode).send({
      error: error.name || 'InternalServerError',
      message: error.message || 'An error occurred',
      statusCode,
    });
  });

  return app;
}
