/**
 * Rate limiting: sliding window per (user, action class).
 *
 * Admission control for user-triggered actions only; the scheduler's own
 * outbound prompts are never counted here.
 *
 * Each action class has its own (max requests, window) pair. Buckets are
 * independent per key: a check is a synchronous critical section on the
 * event loop, so two checks for the same key can never interleave, and no
 * check ever waits on another user's bucket.
 *
 * Defaults:
 * - general: 20 per minute
 * - friend_request: 5 per hour
 * - settings: 10 per minute
 * - discovery: 3 per minute
 * - admin: 50 per minute
 * - callback: 30 per minute
 * - feedback: 3 per hour
 * - voice_message: 10 per hour
 */

import { logger } from './logger.js';

export type ActionClass =
  | 'general'
  | 'friend_request'
  | 'settings'
  | 'discovery'
  | 'admin'
  | 'callback'
  | 'feedback'
  | 'voice_message';

export interface RateLimitTier {
  maxRequests: number;
  windowSeconds: number;
}

export const DEFAULT_RATE_LIMIT_TIERS: Readonly<Record<ActionClass, RateLimitTier>> = {
  general: { maxRequests: 20, windowSeconds: 60 },
  friend_request: { maxRequests: 5, windowSeconds: 3600 },
  settings: { maxRequests: 10, windowSeconds: 60 },
  discovery: { maxRequests: 3, windowSeconds: 60 },
  admin: { maxRequests: 50, windowSeconds: 60 },
  callback: { maxRequests: 30, windowSeconds: 60 },
  feedback: { maxRequests: 3, windowSeconds: 3600 },
  voice_message: { maxRequests: 10, windowSeconds: 3600 },
};

export interface RateLimitDecision {
  allowed: boolean;
  /** Whole seconds until the oldest counted request leaves the window; null when allowed. */
  retryAfterSeconds: number | null;
}

export interface RateLimitUsage {
  current: number;
  max: number;
  windowSeconds: number;
  remaining: number;
}

export interface RateLimiter {
  check(userId: number, action: string): RateLimitDecision;
  usage(userId: number, action: string): RateLimitUsage;
  /** Drop buckets idle for longer than the stale threshold. Returns buckets removed. */
  sweep(now?: number): number;
  readonly bucketCount: number;
}

export interface RateLimiterOptions {
  tiers?: Partial<Record<ActionClass, RateLimitTier>>;
  /** Buckets untouched for this long are evicted by sweep(). */
  staleAfterMs?: number;
  now?: () => number;
}

interface Bucket {
  /** Request timestamps (ms), oldest first. */
  window: number[];
  lastSeenAt: number;
}

const STALE_AFTER_MS = 24 * 60 * 60 * 1000; // 24 hours

/** Prune timestamps at or before the cutoff; the window is (now - W, now]. */
function prune(window: number[], cutoff: number): number[] {
  let i = 0;
  while (i < window.length && window[i] <= cutoff) i++;
  return i > 0 ? window.slice(i) : window;
}

function isActionClass(value: string): value is ActionClass {
  return Object.prototype.hasOwnProperty.call(DEFAULT_RATE_LIMIT_TIERS, value);
}

export function createRateLimiter(options: RateLimiterOptions = {}): RateLimiter {
  const tiers: Record<ActionClass, RateLimitTier> = { ...DEFAULT_RATE_LIMIT_TIERS, ...options.tiers };
  const staleAfterMs = options.staleAfterMs ?? STALE_AFTER_MS;
  const now = options.now ?? Date.now;
  const buckets = new Map<string, Bucket>();

  const resolveAction = (action: string): ActionClass => (isActionClass(action) ? action : 'general');

  return {
    check(userId: number, action: string): RateLimitDecision {
      const actionClass = resolveAction(action);
      const tier = tiers[actionClass];
      const key = `${userId}:${actionClass}`;
      const ts = now();
      const windowMs = tier.windowSeconds * 1000;

      const bucket = buckets.get(key) ?? { window: [], lastSeenAt: ts };
      bucket.window = prune(bucket.window, ts - windowMs);
      bucket.lastSeenAt = ts;
      buckets.set(key, bucket);

      if (bucket.window.length < tier.maxRequests) {
        bucket.window.push(ts);
        return { allowed: true, retryAfterSeconds: null };
      }

      const oldest = bucket.window[0];
      const retryAfterSeconds = Math.max(1, Math.ceil((oldest + windowMs - ts) / 1000));
      logger.warn(
        { userId, action: actionClass, count: bucket.window.length, limit: tier.maxRequests, retryAfterSeconds },
        'User rate limited',
      );
      return { allowed: false, retryAfterSeconds };
    },

    usage(userId: number, action: string): RateLimitUsage {
      const actionClass = resolveAction(action);
      const tier = tiers[actionClass];
      const bucket = buckets.get(`${userId}:${actionClass}`);
      const cutoff = now() - tier.windowSeconds * 1000;
      const current = bucket ? bucket.window.filter((ts) => ts > cutoff).length : 0;

      return {
        current,
        max: tier.maxRequests,
        windowSeconds: tier.windowSeconds,
        remaining: Math.max(0, tier.maxRequests - current),
      };
    },

    sweep(at: number = now()): number {
      let removed = 0;
      for (const [key, bucket] of buckets) {
        if (at - bucket.lastSeenAt > staleAfterMs) {
          buckets.delete(key);
          removed += 1;
        }
      }
      if (removed > 0) logger.debug({ removed, remaining: buckets.size }, 'Rate limiter buckets swept');
      return removed;
    },

    get bucketCount(): number {
      return buckets.size;
    },
  };
}
