import express, { type ErrorRequestHandler } from 'express';
import type { CourseField } from './catalog/course';
import type { CourseRepository } from './catalog/courseRepository';
import { httpLogger, logger } from './logger';
import { buildErrorResponse, createCatalogRouter } from './routes/catalog';
import { createSystemRouter } from './routes/system';
import { openRequestScope, requestAttributes, trackRoute, type Telemetry } from './telemetry';

export type AppDeps = {
  courses: CourseRepository;
  telemetry: Telemetry;
  requiredFields: readonly CourseField[];
};

// body-parser errors carry an http status and a `type` such as 'entity.parse.failed'.
const parserErrorStatus = (error: unknown) => {
  if (typeof error !== 'object' || error === null || !('status' in error) || !('type' in error)) return null;
  const { status, type } = error;
  return typeof type === 'string' && typeof status === 'number' && status >= 400 && status < 500 ? status : null;
};

// Parser rejections never reach a route, so they are bracketed as bad_request here.
const createErrorHandler =
  (telemetry: Telemetry): ErrorRequestHandler =>
  (error: unknown, req, res, _next) => {
    const reqLogger = req.log ?? logger;
    const status = parserErrorStatus(error);
    if (status !== null) {
      const scope = openRequestScope(telemetry, 'bad_request', requestAttributes(req));
      try {
        scope.fail(error);
        reqLogger.warn({ err: error }, 'Rejected request');
        if (!res.headersSent) {
          res.status(status).json(buildErrorResponse('Invalid request', error instanceof Error ? error.message : undefined));
        }
      } finally {
        scope.end();
      }
      return;
    }

    reqLogger.error({ err: error }, 'Unhandled request error');
    if (res.headersSent) return;
    res.status(500).json(buildErrorResponse('Internal server error'));
  };

export const createApp = ({ courses, telemetry, requiredFields }: AppDeps) => {
  const app = express();

  app.use(httpLogger);
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false }));
  app.use(createCatalogRouter({ courses, telemetry, requiredFields }));
  app.use(createSystemRouter(telemetry));
  app.use(
    trackRoute(telemetry, 'not_found', (req, res) => {
      res.status(404).json(buildErrorResponse('Not found', `${req.method} ${req.path}`));
    }),
  );
  app.use(createErrorHandler(telemetry));

  return app;
};
