import type { Logger } from './logger';
import type { Telemetry } from './telemetry';

export type ClosableServer = {
  close(callback: (error?: Error) => void): unknown;
};

export type ShutdownDeps = {
  server: ClosableServer;
  telemetry: Pick<Telemetry, 'close'>;
  logger: Logger;
};

// The final flush waits for the server to drain, so in-flight requests are counted.
export const createShutdown =
  ({ server, telemetry, logger }: ShutdownDeps) =>
  (signal: NodeJS.Signals): Promise<void> =>
    new Promise((resolve) => {
      logger.info({ signal }, 'Shutting down.');
      server.close((closeError) => {
        if (closeError) {
          logger.warn({ err: closeError }, 'Server was not running at shutdown.');
        }
        telemetry
          .close()
          .then(() => logger.info('Final telemetry snapshot written.'))
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Final telemetry flush failed.');
            process.exitCode = 1;
          })
          .finally(resolve);
      });
    });
