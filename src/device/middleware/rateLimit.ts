import { Request } from 'express';
import rateLimit, { IncrementResponse, RateLimitRequestHandler, Store } from 'express-rate-limit';
import { RateLimitError } from '../../protocol/errors';

export interface PathClass {
  name: string;
  matches: (path: string) => boolean;
}

export const CAMERA_PATH_CLASS: PathClass = {
  name: 'camera',
  matches: path => path.includes('/camera')
};

export type Clock = () => number;

/**
 * Minimum-interval store: one accepted request per key per interval.
 * A rejected request leaves the last-accepted timestamp where it was.
 */
export class MinIntervalStore implements Store {
  readonly localKeys = true;
  private readonly lastAccepted = new Map<string, number>();

  constructor(
    private readonly intervalMs: number,
    private readonly clock: Clock = Date.now
  ) {}

  /** Returns 0 when the request is accepted, otherwise the ms left to wait. */
  acquire(key: string): number {
    const now = this.clock();
    const last = this.lastAccepted.get(key);

    if (last === undefined || now - last >= this.intervalMs) {
      this.lastAccepted.set(key, now);
      return 0;
    }
    return Math.max(0, Math.ceil(last + this.intervalMs - now));
  }

  waitMs(key: string): number {
    const last = this.lastAccepted.get(key);
    if (last === undefined) return 0;
    return Math.max(0, Math.ceil(last + this.intervalMs - this.clock()));
  }

  increment(key: string): IncrementResponse {
    const wait = this.acquire(key);
    const resetAt = (this.lastAccepted.get(key) ?? this.clock()) + this.intervalMs;
    return { totalHits: wait === 0 ? 1 : 2, resetTime: new Date(resetAt) };
  }

  // Accepted slots are never refunded.
  decrement(): void {}

  resetKey(key: string): void {
    this.lastAccepted.delete(key);
  }

  resetAll(): void {
    this.lastAccepted.clear();
  }
}

export interface PathRateLimiterOptions {
  intervalMs: number;
  classes?: PathClass[];
  clock?: Clock;
}

/**
 * Applies a minimum interval between requests per path class. Paths in no
 * class pass freely. Used as express middleware and directly by the
 * WebSocket command handler so both share the same budget.
 */
export class PathRateLimiter {
  readonly store: MinIntervalStore;
  private readonly classes: PathClass[];

  constructor(options: PathRateLimiterOptions) {
    this.store = new MinIntervalStore(options.intervalMs, options.clock);
    this.classes = options.classes ?? [CAMERA_PATH_CLASS];
  }

  classify(path: string): PathClass | undefined {
    return this.classes.find(pathClass => pathClass.matches(path));
  }

  /** Throws RateLimitError when `path` is in a class whose interval has not elapsed. */
  check(path: string): void {
    const pathClass = this.classify(path);
    if (!pathClass) return;

    const wait = this.store.acquire(pathClass.name);
    if (wait > 0) {
      throw new RateLimitError(wait);
    }
  }

  middleware(): RateLimitRequestHandler {
    const keyFor = (req: Request): string => this.classify(req.path)?.name ?? '';

    return rateLimit({
      store: this.store,
      limit: 1,
      standardHeaders: true,
      legacyHeaders: false,
      validate: false,
      skip: req => this.classify(req.path) === undefined,
      keyGenerator: keyFor,
      handler: (req, _res, next) => {
        next(new RateLimitError(this.store.waitMs(keyFor(req))));
      }
    });
  }
}
