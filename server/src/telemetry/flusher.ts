import type { Logger } from '../logger';
import type { MetricsStore } from './metricsStore';
import type { TelemetrySink } from './persistenceSink';

export type FlusherOptions = {
  /** 0 writes on every request; a positive value coalesces writes inside that window. */
  debounceMs: number;
  logger: Logger;
};

export class TelemetryFlusher {
  private queue: Promise<void> = Promise.resolve();
  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(
    private readonly store: MetricsStore,
    private readonly sink: TelemetrySink,
    private readonly options: FlusherOptions,
  ) {}

  request(): void {
    if (this.closed) return;
    if (this.options.debounceMs <= 0) {
      this.flushInBackground();
      return;
    }
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flushInBackground();
    }, this.options.debounceMs);
    this.timer.unref();
  }

  flushNow(): Promise<void> {
    const snapshot = this.store.snapshot();
    const write = this.queue.then(() => this.sink.flush(snapshot));
    // The queue only orders writes; a failed write is reported through `write`.
    this.queue = write.catch(() => undefined);
    return write;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.flushNow();
  }

  private flushInBackground() {
    this.flushNow().catch((error: unknown) => {
      this.options.logger.error({ err: error }, 'Telemetry flush failed');
    });
  }
}
