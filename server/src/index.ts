import path from 'node:path';
import { envLoadError } from './env';
import { createApp } from './app';
import { CourseRepository } from './catalog/courseRepository';
import { loadConfig } from './config/loadConfig';
import { logger } from './logger';
import { createShutdown } from './shutdown';
import { createFileTelemetry } from './telemetry';

const main = async () => {
  if (envLoadError) {
    logger.debug(envLoadError, 'No .env loaded at bootstrap.');
  }

  const configResult = loadConfig();
  if (!configResult.config) {
    logger.error({ errors: configResult.errors ?? [] }, 'Invalid config at startup.');
    process.exitCode = 1;
    return;
  }
  const { config } = configResult;
  logger.info({ hash: configResult.hash }, 'Config loaded.');

  const telemetry = await createFileTelemetry({
    filePath: path.resolve(config.telemetry.file),
    restoreOnStart: config.telemetry.restoreOnStart,
    flushDebounceMs: config.telemetry.flushDebounceMs,
  });
  const courses = new CourseRepository(path.resolve(config.storage.courseFile));
  const app = createApp({ courses, telemetry, requiredFields: config.courses.requiredFields });

  const port = Number(process.env.PORT ?? 3001);
  const server = app.listen(port, () => {
    logger.info(`Server running on http://localhost:${port}`);
  });

  const shutdown = createShutdown({ server, telemetry, logger });
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Server failed to start.');
  process.exitCode = 1;
});
