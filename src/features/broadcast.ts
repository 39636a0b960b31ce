/**
 * Admin broadcast: send one message to every enabled user.
 *
 * Recipients are paged out of the store, split into batches and dispatched
 * with at most `concurrency` batches in flight. Sends inside a batch run
 * together; a slot waits `batchDelayMs` after its batch before taking the
 * next one. Per-recipient failures are counted, never thrown. One broadcast
 * at a time; there is no cancellation.
 */

import { BroadcastInProgressError, ValidationError } from '../core/errors.js';
import type { Dispatcher, SendOutcome } from '../core/dispatcher.js';
import { logger } from '../middleware/logger.js';
import { recordBroadcast } from '../middleware/stats.js';
import { Semaphore, sleep } from '../utils/async.js';
import type { DbBackend } from '../utils/db-backend.js';

export type BroadcastState = 'idle' | 'pending' | 'fetching-users' | 'dispatching' | 'completed' | 'failed';

export interface BroadcastProgress {
  total: number;
  successful: number;
  failed: number;
  completedBatches: number;
  totalBatches: number;
}

export interface BroadcastResult {
  total: number;
  successful: number;
  failed: number;
  /** successful / total, 0 when there were no recipients. */
  deliveryRate: number;
  durationMs: number;
}

export interface BroadcastPreview {
  text: string;
  recipients: number;
  batches: number;
  estimatedSeconds: number;
}

export type ProgressCallback = (progress: BroadcastProgress) => void | Promise<void>;

export interface BroadcastOptions {
  batchSize: number;
  concurrency: number;
  batchDelayMs: number;
  pageSize: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const ESTIMATED_BATCH_SEND_MS = 1000;
const MAX_BROADCAST_LENGTH = 4096;

const IN_PROGRESS: ReadonlySet<BroadcastState> = new Set(['pending', 'fetching-users', 'dispatching']);

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function validateBroadcastText(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) throw new ValidationError('Broadcast text is empty', 'text');
  if (trimmed.length > MAX_BROADCAST_LENGTH) {
    throw new ValidationError(`Broadcast text must be at most ${MAX_BROADCAST_LENGTH} characters`, 'text');
  }
  return trimmed;
}

export class BroadcastManager {
  private currentState: BroadcastState = 'idle';
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly store: Pick<DbBackend, 'listEnabledUsers' | 'countEnabledUsers'>,
    private readonly dispatcher: Dispatcher,
    private readonly options: BroadcastOptions,
  ) {
    if (options.batchSize < 1 || options.concurrency < 1 || options.pageSize < 1) {
      throw new RangeError('Broadcast batch size, concurrency and page size must be at least 1');
    }
    this.wait = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  get state(): BroadcastState {
    return this.currentState;
  }

  get inProgress(): boolean {
    return IN_PROGRESS.has(this.currentState);
  }

  async sendBroadcast(text: string, onProgress?: ProgressCallback): Promise<BroadcastResult> {
    if (this.inProgress) throw new BroadcastInProgressError();
    const message = validateBroadcastText(text);

    this.currentState = 'pending';
    const startedAt = this.now();
    try {
      this.currentState = 'fetching-users';
      const recipients = await this.fetchRecipients();

      this.currentState = 'dispatching';
      const result = await this.dispatch(recipients, message, startedAt, onProgress);

      this.currentState = 'completed';
      recordBroadcast();
      logger.info({ ...result }, 'Broadcast completed');
      return result;
    } catch (err) {
      this.currentState = 'failed';
      logger.error({ err }, 'Broadcast failed');
      throw err;
    }
  }

  async previewBroadcast(text: string): Promise<BroadcastPreview> {
    const message = validateBroadcastText(text);
    const recipients = await this.store.countEnabledUsers();
    const batches = Math.ceil(recipients / this.options.batchSize);
    const waves = Math.ceil(batches / this.options.concurrency);
    const estimatedMs = waves * ESTIMATED_BATCH_SEND_MS + Math.max(0, waves - 1) * this.options.batchDelayMs;
    return { text: message, recipients, batches, estimatedSeconds: Math.ceil(estimatedMs / 1000) };
  }

  /** Send the broadcast text to the admin only. */
  async sendTestBroadcast(adminId: number, text: string): Promise<SendOutcome> {
    const message = validateBroadcastText(text);
    const outcome = await this.dispatcher.send(adminId, `🧪 Test broadcast\n\n${message}`);
    logger.info({ adminId, success: outcome.success }, 'Test broadcast sent');
    return outcome;
  }

  private async fetchRecipients(): Promise<number[]> {
    const ids: number[] = [];
    let after: number | null = null;
    for (;;) {
      const page = await this.store.listEnabledUsers(after, this.options.pageSize);
      for (const user of page) ids.push(user.tgId);
      const last = page[page.length - 1];
      if (!last || page.length < this.options.pageSize) break;
      after = last.tgId;
    }
    return ids;
  }

  private async dispatch(
    recipients: number[],
    text: string,
    startedAt: number,
    onProgress?: ProgressCallback,
  ): Promise<BroadcastResult> {
    const batches = chunk(recipients, this.options.batchSize);
    const progress: BroadcastProgress = {
      total: recipients.length,
      successful: 0,
      failed: 0,
      completedBatches: 0,
      totalBatches: batches.length,
    };
    logger.info({ total: progress.total, totalBatches: progress.totalBatches }, 'Broadcast dispatch started');

    const semaphore = new Semaphore(this.options.concurrency);
    let started = 0;

    const runBatch = async (batch: number[], release: () => void): Promise<void> => {
      try {
        const outcomes = await Promise.all(batch.map((userId) => this.dispatcher.send(userId, text)));
        outcomes.forEach((outcome, i) => {
          if (outcome.success) {
            progress.successful += 1;
          } else {
            progress.failed += 1;
            logger.warn({ userId: batch[i], category: outcome.error.category }, 'Broadcast delivery failed');
          }
        });
        progress.completedBatches += 1;
        await this.reportProgress(progress, onProgress);
        if (started < batches.length) await this.wait(this.options.batchDelayMs);
      } finally {
        release();
      }
    };

    const inFlight: Promise<void>[] = [];
    for (const batch of batches) {
      const release = await semaphore.acquire();
      started += 1;
      inFlight.push(runBatch(batch, release));
    }
    await Promise.all(inFlight);

    const durationMs = this.now() - startedAt;
    return {
      total: progress.total,
      successful: progress.successful,
      failed: progress.failed,
      deliveryRate: progress.total === 0 ? 0 : progress.successful / progress.total,
      durationMs,
    };
  }

  private async reportProgress(progress: BroadcastProgress, onProgress?: ProgressCallback): Promise<void> {
    if (!onProgress) return;
    try {
      await onProgress({ ...progress });
    } catch (err) {
      logger.warn({ err }, 'Broadcast progress callback failed');
    }
  }
}

// ── Formatting ──────────────────────────────────────────────────────

function percent(part: number, whole: number): string {
  return whole === 0 ? '0.0' : ((part / whole) * 100).toFixed(1);
}

export function formatBroadcastPreview(preview: BroadcastPreview): string {
  return [
    '📢 Broadcast preview',
    '',
    `Recipients: ${preview.recipients}`,
    `Batches: ${preview.batches}`,
    `Estimated time: ~${preview.estimatedSeconds}s`,
    '',
    preview.text,
  ].join('\n');
}

export function formatBroadcastProgress(progress: BroadcastProgress): string {
  const done = progress.successful + progress.failed;
  return [
    '📢 Broadcast progress',
    `Progress: ${percent(done, progress.total)}%`,
    `Sent: ${progress.successful}/${progress.total}`,
    `Failed: ${progress.failed}`,
    `Batch: ${progress.completedBatches}/${progress.totalBatches}`,
  ].join('\n');
}

export function formatBroadcastResult(result: BroadcastResult): string {
  return [
    '✅ Broadcast complete',
    `Total: ${result.total}`,
    `Delivered: ${result.successful}`,
    `Failed: ${result.failed}`,
    `Delivery rate: ${(result.deliveryRate * 100).toFixed(1)}%`,
    `Duration: ${(result.durationMs / 1000).toFixed(1)}s`,
  ].join('\n');
}
