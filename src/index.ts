import { getConfig } from './config';
import { type AppContext, createContext } from './context';
import { PollScheduler } from './lib/scheduler';
import { logger } from './logger';
import { buildServer } from './server';
import { syncTransactions } from './workers/syncRunner';

/**
 * Start the HTTP admin surface and, when a poll interval is set, the
 * background archive loop. Runs until SIGINT or SIGTERM.
 */
export async function serve(context: AppContext, port: number): Promise<void> {
  const app = await buildServer(context);

  const scheduler =
    context.pollIntervalSeconds > 0
      ? new PollScheduler(
          () => context.cycleLock.run('poll', () => syncTransactions(context)),
          { intervalSeconds: context.pollIntervalSeconds }
        )
      : null;

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach((signal) => {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down gracefully');
      scheduler?.stop();
      app
        .close()
        .then(() => context.store.close())
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  });

  try {
    const address = await app.listen({ port, host: '0.0.0.0' });
    logger.info({ address }, 'Server started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    await context.store.close();
    throw err;
  }

  if (scheduler) {
    scheduler.start().catch((err) => {
      logger.error({ err }, 'Poll scheduler stopped unexpectedly');
    });
  }
}

async function bootstrap(): Promise<void> {
  const config = getConfig();
  await serve(createContext(config), config.port);
}

if (require.main === module) {
  bootstrap().catch((err) => {
    logger.fatal({ err }, 'Bootstrap failed');
    process.exit(1);
  });
}
