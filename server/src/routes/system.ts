import { Router } from 'express';
import { trackRoute, type Telemetry } from '../telemetry';

export const createSystemRouter = (telemetry: Telemetry) => {
  const router = Router();

  router.get(
    '/health',
    trackRoute(telemetry, 'health', (_req, res) => {
      res.json({
        ok: true,
        uptimeSeconds: Math.round(process.uptime()),
        version: process.env.npm_package_version ?? 'unknown',
        time: new Date().toISOString(),
      });
    }),
  );

  router.get(
    '/metrics',
    trackRoute(telemetry, 'metrics', (_req, res) => {
      res.json({
        ok: true,
        metrics: telemetry.snapshot(),
      });
    }),
  );

  return router;
};
