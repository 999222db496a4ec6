import type {
  Clock,
  OriginLimit,
  OriginStateSnapshot,
  RateLimitConfig,
} from '../types/index.js';
import { Semaphore } from '../utils/semaphore.js';
import { systemClock } from '../utils/clock.js';
import { AdmissionTimeoutError, RateLimiterError, isTimeoutAbort } from '../utils/errors.js';
import { createContextLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';

interface OriginState {
  limit: OriginLimit;
  semaphore: Semaphore;
  lastAdmittedAt: number | null;
  held: Set<number>;
}

export interface AcquireOptions {
  /** Overrides the limiter's admission timeout for this call; 0 waits forever */
  timeoutMs?: number;
}

/**
 * Proof of a held slot. Handed back to {@link RateLimiter.release}.
 */
export class RateLimitToken {
  constructor(
    readonly id: number,
    readonly origin: string,
    readonly admittedAt: number,
  ) {}
}

export interface RateLimiterOptions extends Partial<Pick<RateLimitConfig, 'origins' | 'admissionTimeoutMs'>> {
  defaultLimit: OriginLimit;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Per-origin admission control. Each origin gets a concurrency bound and a
 * minimum spacing between admissions. The two compose: a caller first waits
 * for a slot, then for the spacing window of that origin.
 */
export class RateLimiter {
  private readonly origins = new Map<string, OriginState>();
  private readonly table: Record<string, OriginLimit>;
  private readonly defaultLimit: OriginLimit;
  private readonly admissionTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private nextTokenId = 1;

  constructor(options: RateLimiterOptions) {
    this.table = options.origins ?? {};
    this.defaultLimit = options.defaultLimit;
    this.admissionTimeoutMs = options.admissionTimeoutMs ?? 0;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createContextLogger({ component: 'rate-limiter' });
  }

  static originOf(url: string): string {
    return new URL(url).origin;
  }

  async acquire(url: string, options: AcquireOptions = {}): Promise<RateLimitToken> {
    const origin = RateLimiter.originOf(url);
    const state = this.getOrCreateState(origin);
    const timeoutMs = options.timeoutMs ?? this.admissionTimeoutMs;

    try {
      await state.semaphore.acquire(timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined);
    } catch (error) {
      if (isTimeoutAbort(error)) {
        throw new AdmissionTimeoutError(origin, url, timeoutMs);
      }
      throw error;
    }

    // The admission time is reserved before suspending, so concurrent slot
    // holders of the same origin queue up behind each other's window.
    const now = this.clock.now();
    const admittedAt = state.lastAdmittedAt === null
      ? now
      : Math.max(now, state.lastAdmittedAt + state.limit.minIntervalMs);
    state.lastAdmittedAt = admittedAt;

    const token = new RateLimitToken(this.nextTokenId++, origin, admittedAt);
    state.held.add(token.id);

    if (admittedAt > now) {
      this.logger.debug({ origin, waitMs: admittedAt - now }, 'Waiting for origin spacing window');
      await this.clock.sleep(admittedAt - now);
    }
    return token;
  }

  /**
   * Returns the slot held by `token`. The url form is accepted for call sites
   * that only kept the url around; it must match the token's origin.
   */
  release(token: RateLimitToken): void;
  release(url: string, token: RateLimitToken): void;
  release(urlOrToken: string | RateLimitToken, maybeToken?: RateLimitToken): void {
    const token = typeof urlOrToken === 'string' ? maybeToken : urlOrToken;
    if (!token) {
      throw new RateLimiterError('release() needs the token returned by acquire()');
    }

    if (typeof urlOrToken === 'string' && RateLimiter.originOf(urlOrToken) !== token.origin) {
      throw new RateLimiterError(`Token for ${token.origin} released against ${urlOrToken}`);
    }

    const state = this.origins.get(token.origin);
    if (!state || !state.held.delete(token.id)) {
      throw new RateLimiterError(`Token ${token.id} for ${token.origin} is not currently held`);
    }
    state.semaphore.release();
  }

  /**
   * Runs `fn` while holding a slot for the url's origin; the slot is given
   * back on every exit path.
   */
  async withAdmission<T>(url: string, fn: (token: RateLimitToken) => Promise<T>, options?: AcquireOptions): Promise<T> {
    const token = await this.acquire(url, options);
    try {
      return await fn(token);
    } finally {
      this.release(token);
    }
  }

  getLimit(origin: string): OriginLimit {
    return this.origins.get(origin)?.limit ?? this.table[origin] ?? this.defaultLimit;
  }

  getOriginState(origin: string): OriginStateSnapshot | undefined {
    const state = this.origins.get(origin);
    if (!state) return undefined;

    return {
      origin,
      concurrency: state.limit.concurrency,
      minIntervalMs: state.limit.minIntervalMs,
      inFlight: state.held.size,
      waiting: state.semaphore.getWaiting(),
      lastAdmittedAt: state.lastAdmittedAt,
    };
  }

  private getOrCreateState(origin: string): OriginState {
    let state = this.origins.get(origin);
    if (!state) {
      const limit = this.table[origin] ?? this.defaultLimit;
      state = {
        limit,
        semaphore: new Semaphore(limit.concurrency),
        lastAdmittedAt: null,
        held: new Set(),
      };
      this.origins.set(origin, state);
      this.logger.debug({ origin, ...limit, configured: origin in this.table }, 'Initialized origin rate limit');
    }
    return state;
  }
}
