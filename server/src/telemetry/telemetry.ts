import { trace, type Tracer } from '@opentelemetry/api';
import { logger as defaultLogger, type Logger } from '../logger';
import { ErrorReporter } from './errorReporter';
import { TelemetryFlusher } from './flusher';
import { MetricsStore, type Clock, type MetricsSnapshot, type StartToken } from './metricsStore';
import { JsonFileSink, TelemetryDocumentError, type TelemetrySink } from './persistenceSink';

export type TelemetryOptions = {
  sink: TelemetrySink;
  store?: MetricsStore;
  clock?: Clock;
  flushDebounceMs?: number;
  logger?: Logger;
  tracer?: Tracer;
};

export class Telemetry {
  readonly store: MetricsStore;
  readonly flusher: TelemetryFlusher;
  readonly errors: ErrorReporter;
  readonly tracer: Tracer;
  readonly logger: Logger;

  constructor(options: TelemetryOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.store = options.store ?? new MetricsStore({ clock: options.clock });
    this.flusher = new TelemetryFlusher(this.store, options.sink, {
      debounceMs: options.flushDebounceMs ?? 0,
      logger: this.logger,
    });
    this.errors = new ErrorReporter(this.store, this.flusher, this.logger);
    this.tracer = options.tracer ?? trace.getTracer('course-catalog');
  }

  startRequest(route: string): StartToken {
    return this.store.recordRequestStart(route);
  }

  endRequest(route: string, token: StartToken): void {
    this.store.recordRequestEnd(route, token);
    this.flusher.request();
  }

  reportError(message: string): void {
    this.errors.report(message);
  }

  snapshot(): MetricsSnapshot {
    return this.store.snapshot();
  }

  close(): Promise<void> {
    return this.flusher.close();
  }
}

export type FileTelemetryOptions = {
  filePath: string;
  restoreOnStart: boolean;
  flushDebounceMs: number;
  logger?: Logger;
};

export const createFileTelemetry = async (options: FileTelemetryOptions): Promise<Telemetry> => {
  const log = options.logger ?? defaultLogger;
  const sink = new JsonFileSink(options.filePath);
  let store: MetricsStore | undefined;

  if (options.restoreOnStart) {
    try {
      const previous = await sink.load();
      if (previous) {
        store = MetricsStore.fromSnapshot(previous);
        log.info({ filePath: options.filePath }, 'Telemetry restored from previous snapshot');
      }
    } catch (error) {
      if (!(error instanceof TelemetryDocumentError)) throw error;
      log.warn({ err: error.message, filePath: options.filePath }, 'Ignoring unreadable telemetry snapshot');
    }
  }

  return new Telemetry({
    sink,
    store,
    flushDebounceMs: options.flushDebounceMs,
    logger: log,
  });
};
