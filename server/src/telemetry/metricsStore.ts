import { performance } from 'node:perf_hooks';

export type MetricsSnapshot = {
  route_requests: Record<string, number>;
  route_processing_time: Record<string, number>;
  errors: Record<string, number>;
};

export type StartToken = {
  readonly route: string;
  readonly startedAt: number;
};

/** Returns a monotonic time in seconds. */
export type Clock = () => number;

type RouteStats = {
  count: number;
  totalSeconds: number;
};

export const monotonicSeconds: Clock = () => performance.now() / 1000;

export const emptySnapshot = (): MetricsSnapshot => ({
  route_requests: {},
  route_processing_time: {},
  errors: {},
});

const ownValue = (values: Record<string, number>, key: string) => (Object.hasOwn(values, key) ? values[key] : 0);

// Mutations are synchronous; route count and time share one entry.
export class MetricsStore {
  private readonly routes = new Map<string, RouteStats>();
  private readonly errors = new Map<string, number>();
  private readonly clock: Clock;

  constructor(options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? monotonicSeconds;
  }

  static fromSnapshot(snapshot: MetricsSnapshot, options: { clock?: Clock } = {}): MetricsStore {
    const store = new MetricsStore(options);
    const routeNames = new Set([
      ...Object.keys(snapshot.route_requests),
      ...Object.keys(snapshot.route_processing_time),
    ]);
    for (const route of routeNames) {
      store.routes.set(route, {
        count: ownValue(snapshot.route_requests, route),
        totalSeconds: ownValue(snapshot.route_processing_time, route),
      });
    }
    for (const [message, count] of Object.entries(snapshot.errors)) {
      store.errors.set(message, count);
    }
    return store;
  }

  recordRequestStart(route: string): StartToken {
    this.routeEntry(route).count += 1;
    return { route, startedAt: this.clock() };
  }

  recordRequestEnd(route: string, token: StartToken): void {
    const elapsed = Math.max(0, this.clock() - token.startedAt);
    this.routeEntry(route).totalSeconds += elapsed;
  }

  recordError(message: string): void {
    this.errors.set(message, (this.errors.get(message) ?? 0) + 1);
  }

  snapshot(): MetricsSnapshot {
    const routes = [...this.routes];
    return Object.freeze({
      route_requests: Object.freeze(
        Object.fromEntries(routes.map(([route, stats]): [string, number] => [route, stats.count])),
      ),
      route_processing_time: Object.freeze(
        Object.fromEntries(routes.map(([route, stats]): [string, number] => [route, stats.totalSeconds])),
      ),
      errors: Object.freeze(Object.fromEntries(this.errors)),
    });
  }

  private routeEntry(route: string): RouteStats {
    let stats = this.routes.get(route);
    if (!stats) {
      stats = { count: 0, totalSeconds: 0 };
      this.routes.set(route, stats);
    }
    return stats;
  }
}
