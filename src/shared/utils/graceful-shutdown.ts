import { INestApplicationContext, Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/lib/util';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Close the Nest context on SIGINT/SIGTERM so module destroy hooks run
 * (proxy agents closed, cron jobs stopped) before the process exits.
 */
export function setupGracefulShutdown(
  app: INestApplicationContext,
  exit: (code: number) => void = (code) => process.exit(code),
) {
  const logger = new Logger('GracefulShutdown');
  let closing = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;

    logger.log(`${signal} received: closing application...`);
    try {
      await app.close();
      logger.log('Application closed gracefully.');
      exit(0);
    } catch (err) {
      logger.error(`Error during graceful shutdown: ${errorMessage(err)}`);
      exit(1);
    }
  };

  SHUTDOWN_SIGNALS.forEach((signal) => {
    process.once(signal, (received: NodeJS.Signals) => {
      void shutdown(received);
    });
  });

  return shutdown;
}
