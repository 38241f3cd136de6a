import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { context, SpanKind, SpanStatusCode, trace, type Attributes, type Span } from '@opentelemetry/api';
import type { Telemetry } from './telemetry';

export type RequestScope = {
  readonly route: string;
  readonly span: Span;
  fail(error: unknown): void;
  end(): void;
};

export type RouteHandler = (req: Request, res: Response) => void | Promise<void>;

export const requestAttributes = (req: Pick<Request, 'method' | 'originalUrl' | 'ip'>): Attributes => ({
  'http.method': req.method,
  'http.target': req.originalUrl,
  'net.peer.ip': req.ip,
});

/** `end` is idempotent. */
export const openRequestScope = (telemetry: Telemetry, route: string, attributes: Attributes = {}): RequestScope => {
  const span = telemetry.tracer.startSpan(`http ${route}`, {
    kind: SpanKind.SERVER,
    attributes: { ...attributes, 'http.route': route },
  });
  const token = telemetry.startRequest(route);
  let ended = false;

  return {
    route,
    span,
    fail(error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof Error) {
        span.recordException(error);
      }
    },
    end() {
      if (ended) return;
      ended = true;
      telemetry.endRequest(route, token);
      span.end();
    },
  };
};

export const withRequestScope = async <T>(
  telemetry: Telemetry,
  route: string,
  attributes: Attributes,
  fn: (scope: RequestScope) => T | Promise<T>,
): Promise<T> => {
  const scope = openRequestScope(telemetry, route, attributes);
  try {
    return await context.with(trace.setSpan(context.active(), scope.span), () => fn(scope));
  } catch (error) {
    scope.fail(error);
    throw error;
  } finally {
    scope.end();
  }
};

export const trackRoute =
  (telemetry: Telemetry, route: string, handler: RouteHandler): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    withRequestScope(telemetry, route, requestAttributes(req), () => handler(req, res)).catch(next);
  };
