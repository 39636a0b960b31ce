/**
 * Process statistics: in-memory counters since start.
 *
 * Tracks prompts sent/failed, reply attribution, rate-limit rejections,
 * broadcasts and the most recent scheduler tick. Surfaced by /health and
 * the admin /stats command.
 */

import type { DeliveryErrorCategory } from '../core/errors.js';

export interface TickSummary {
  evaluated: number;
  sent: number;
  failed: number;
  skipped: number;
}

export interface ProcessStats {
  startedAt: number;
  promptsSent: number;
  promptsFailed: number;
  failuresByCategory: Record<DeliveryErrorCategory, number>;
  repliesAttributed: number;
  repliesUnattributed: number;
  rateLimitRejections: number;
  broadcastsRun: number;
  lastTick: (TickSummary & { at: number; durationMs: number }) | null;
}

function emptyFailures(): Record<DeliveryErrorCategory, number> {
  return { blocked: 0, chat_not_found: 0, rate_limited: 0, transient_error: 0, timeout: 0 };
}

function freshStats(): ProcessStats {
  return {
    startedAt: Date.now(),
    promptsSent: 0,
    promptsFailed: 0,
    failuresByCategory: emptyFailures(),
    repliesAttributed: 0,
    repliesUnattributed: 0,
    rateLimitRejections: 0,
    broadcastsRun: 0,
    lastTick: null,
  };
}

let current: ProcessStats = freshStats();

export function recordPromptSent(): void {
  current.promptsSent++;
}

export function recordPromptFailed(category: DeliveryErrorCategory): void {
  current.promptsFailed++;
  current.failuresByCategory[category]++;
}

export function recordReply(attributed: boolean): void {
  if (attributed) current.repliesAttributed++;
  else current.repliesUnattributed++;
}

export function recordRateLimitRejection(): void {
  current.rateLimitRejections++;
}

export function recordBroadcast(): void {
  current.broadcastsRun++;
}

export function recordTick(summary: TickSummary, at: number, durationMs: number): void {
  current.lastTick = { ...summary, at, durationMs };
}

/** Snapshot copy; mutating it does not affect the live counters. */
export function getStats(): ProcessStats {
  return {
    ...current,
    failuresByCategory: { ...current.failuresByCategory },
    lastTick: current.lastTick ? { ...current.lastTick } : null,
  };
}

export function resetStats(): void {
  current = freshStats();
}
