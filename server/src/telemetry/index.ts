export { MetricsStore, emptySnapshot, monotonicSeconds } from './metricsStore';
export type { Clock, MetricsSnapshot, StartToken } from './metricsStore';
export { JsonFileSink, TelemetryDocumentError, telemetryDocumentSchema } from './persistenceSink';
export type { TelemetrySink } from './persistenceSink';
export { TelemetryFlusher } from './flusher';
export { ErrorReporter } from './errorReporter';
export { Telemetry, createFileTelemetry } from './telemetry';
export type { FileTelemetryOptions, TelemetryOptions } from './telemetry';
export { openRequestScope, requestAttributes, trackRoute, withRequestScope } from './requestScope';
export type { RequestScope, RouteHandler } from './requestScope';
