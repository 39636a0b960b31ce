import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createMaintenance, msUntilHour } from '../src/core/maintenance.js';
import { createReplyCorrelator, DAY_MS } from '../src/core/reply-correlator.js';
import {
  buildHealthPayload,
  getConnectionState,
  isHealthRequestRateLimited,
  markConnected,
  markDisconnected,
  markUpdateReceived,
  stopHealthServer,
} from '../src/middleware/health.js';
import { createRateLimiter } from '../src/middleware/rate-limit.js';
import {
  getStats,
  recordBroadcast,
  recordPromptFailed,
  recordPromptSent,
  recordRateLimitRejection,
  recordReply,
  recordTick,
  resetStats,
} from '../src/middleware/stats.js';
import { createTestServices, localTime, type TestServices } from './helpers.js';

describe('Health state', () => {
  beforeEach(() => {
    markDisconnected();
  });

  it('tracks connection transitions and reconnects', () => {
    expect(getConnectionState().status).toBe('disconnected');

    markConnected();
    const first = getConnectionState();
    expect(first.status).toBe('connected');
    expect(first.connectedAt).toBeTypeOf('number');

    markDisconnected();
    markConnected();
    expect(getConnectionState().reconnectCount).toBeGreaterThan(0);
  });

  it('records when the last update arrived', () => {
    markUpdateReceived();
    const lastUpdateAt = getConnectionState().lastUpdateAt ?? 0;
    expect(buildHealthPayload(lastUpdateAt + 5_500).lastUpdateAgo).toBe(5);
  });
});

describe('Health payload', () => {
  beforeEach(() => {
    resetStats();
  });

  it('reports the last tick and process counters', () => {
    recordPromptSent();
    recordPromptSent();
    recordPromptFailed('blocked');
    recordReply(true);
    recordReply(false);
    recordRateLimitRejection();
    recordBroadcast();
    recordTick({ evaluated: 4, sent: 2, failed: 1, skipped: 1 }, localTime(10), 35);

    const payload = buildHealthPayload(localTime(10, 1));

    expect(payload.scheduler).toEqual({
      lastTickAt: localTime(10),
      lastTickDurationMs: 35,
      evaluated: 4,
      sent: 2,
      failed: 1,
      skipped: 1,
    });
    expect(payload.counters).toEqual({
      promptsSent: 2,
      promptsFailed: 1,
      repliesAttributed: 1,
      repliesUnattributed: 1,
      rateLimitRejections: 1,
      broadcastsRun: 1,
    });
    expect(getStats().failuresByCategory.blocked).toBe(1);
  });

  it('reports an empty scheduler section before the first tick', () => {
    expect(buildHealthPayload().scheduler).toEqual({
      lastTickAt: null,
      lastTickDurationMs: null,
      evaluated: 0,
      sent: 0,
      failed: 0,
      skipped: 0,
    });
  });

  it('returns snapshots that do not leak mutations', () => {
    const snapshot = getStats();
    snapshot.failuresByCategory.timeout = 99;
    expect(getStats().failuresByCategory.timeout).toBe(0);
  });
});

describe('Health endpoint rate limiting', () => {
  afterEach(() => {
    stopHealthServer();
  });

  it('allows 120 requests per minute per address', () => {
    const start = 1_000_000;
    for (let i = 0; i < 120; i += 1) {
      expect(isHealthRequestRateLimited('10.0.0.1', start + i)).toBe(false);
    }
    expect(isHealthRequestRateLimited('10.0.0.1', start + 500)).toBe(true);
    expect(isHealthRequestRateLimited('10.0.0.2', start + 500)).toBe(false);
    expect(isHealthRequestRateLimited('10.0.0.1', start + 60_000)).toBe(false);
  });
});

describe('msUntilHour', () => {
  it('counts forward to the next occurrence of the hour', () => {
    expect(msUntilHour(3, new Date(2026, 2, 10, 1, 30))).toBe(90 * 60_000);
    expect(msUntilHour(3, new Date(2026, 2, 10, 3, 0))).toBe(DAY_MS);
    expect(msUntilHour(3, new Date(2026, 2, 10, 22, 0))).toBe(5 * 60 * 60_000);
  });
});

describe('Maintenance jobs', () => {
  let services: TestServices;

  beforeEach(() => {
    services = createTestServices();
  });

  afterEach(async () => {
    await services.store.close();
  });

  const maintenance = () =>
    createMaintenance({
      store: services.store,
      questions: services.questions,
      correlator: createReplyCorrelator(services.store, 1),
      rateLimiter: createRateLimiter({ now: () => localTime(12) }),
      now: () => localTime(3),
    });

  it('restores missing default questions for enabled users', async () => {
    await services.settings.register({ tgId: 1 }, localTime(1));
    await services.store.upsertUser({ tgId: 2 }, localTime(1));
    await services.store.upsertUser({ tgId: 3 }, localTime(1));
    await services.store.updateUserSettings(3, { enabled: false });

    expect(await maintenance().repairDefaultQuestions()).toEqual({ checked: 2, failed: 0 });
    expect(await services.store.getActiveDefaultQuestion(2)).toMatchObject({ name: 'Main', createdAt: localTime(3) });
    expect(await services.store.getActiveDefaultQuestion(3)).toBeUndefined();
    expect(await services.store.getActiveQuestions(1)).toHaveLength(1);
  });

  it('sweeps expired correlation records', async () => {
    await services.settings.register({ tgId: 1 }, localTime(1));
    const question = await services.store.getActiveDefaultQuestion(1);
    const correlator = createReplyCorrelator(services.store, 1);
    await correlator.record(1, question?.id ?? 0, '10', localTime(2, 0, -2));
    await correlator.record(1, question?.id ?? 0, '11', localTime(2));

    expect(await maintenance().sweepCorrelations()).toBe(1);
  });

  it('evicts idle rate-limit buckets', () => {
    let clock = localTime(12);
    const rateLimiter = createRateLimiter({ now: () => clock });
    rateLimiter.check(1, 'general');
    rateLimiter.check(2, 'settings');
    clock += DAY_MS + 1;
    rateLimiter.check(2, 'settings');

    const jobs = createMaintenance({
      store: services.store,
      questions: services.questions,
      correlator: createReplyCorrelator(services.store, 1),
      rateLimiter,
      now: () => clock,
    });

    expect(jobs.sweepRateLimits()).toBe(1);
    expect(rateLimiter.bucketCount).toBe(1);
  });

  it('runs the daily jobs on timers and stops cleanly', async () => {
    vi.useFakeTimers();
    try {
      const sweep = vi.fn(async () => 0);
      const jobs = createMaintenance({
        store: { listEnabledUsers: async () => [] },
        questions: { ensureDefault: vi.fn() },
        correlator: { sweep },
        rateLimiter: { sweep: () => 0 },
        now: () => new Date(2026, 2, 10, 2, 0).getTime(),
      });
      jobs.start();

      await vi.advanceTimersByTimeAsync(60 * 60_000);
      expect(sweep).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(60 * 60_000);
      expect(sweep).toHaveBeenCalledTimes(1);

      jobs.stop();
      await vi.advanceTimersByTimeAsync(2 * DAY_MS);
      expect(sweep).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });
});
