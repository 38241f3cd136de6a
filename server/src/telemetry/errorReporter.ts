import type { Logger } from '../logger';
import type { TelemetryFlusher } from './flusher';
import type { MetricsStore } from './metricsStore';

export class ErrorReporter {
  constructor(
    private readonly store: MetricsStore,
    private readonly flusher: TelemetryFlusher,
    private readonly logger: Logger,
  ) {}

  /** Counts a domain failure by its exact message. Never throws. */
  report(message: string): void {
    try {
      this.store.recordError(message);
      this.flusher.request();
    } catch (error) {
      this.logger.error({ err: error, reportedMessage: message }, 'Failed to record reported error');
    }
  }
}
