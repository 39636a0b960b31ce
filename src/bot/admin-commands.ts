import { AdminRequiredError, BroadcastInProgressError, errorMessage } from '../core/errors.js';
import {
  formatBroadcastPreview,
  formatBroadcastProgress,
  formatBroadcastResult,
  type BroadcastManager,
  type BroadcastResult,
  type ProgressCallback,
  validateBroadcastText,
} from '../features/broadcast.js';
import { logger } from '../middleware/logger.js';
import { getStats } from '../middleware/stats.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { CommandDefinition } from './commands.js';

/** Progress message cadence while a broadcast runs. */
export const PROGRESS_EVERY_BATCHES = 5;

export interface AdminCommandDeps {
  adminId: number;
  broadcast: BroadcastManager;
  store: Pick<DbBackend, 'getUserStats'>;
}

export interface AdminCommands {
  commands: CommandDefinition[];
  /** Resolves once no broadcast started from a command is still running. */
  whenIdle(): Promise<void>;
}

/**
 * Start a broadcast on behalf of `requesterId`. Only the configured admin
 * may broadcast.
 */
export function initiateBroadcast(
  deps: Pick<AdminCommandDeps, 'adminId' | 'broadcast'>,
  requesterId: number,
  text: string,
  onProgress?: ProgressCallback,
): Promise<BroadcastResult> {
  if (requesterId !== deps.adminId) {
    logger.warn({ requesterId }, 'Broadcast attempted by non-admin');
    return Promise.reject(new AdminRequiredError());
  }
  logger.info({ requesterId, length: text.length }, 'Broadcast requested');
  return deps.broadcast.sendBroadcast(text, onProgress);
}

export function createAdminCommands(deps: AdminCommandDeps): AdminCommands {
  let running: Promise<void> | null = null;

  const commands: CommandDefinition[] = [
    {
      name: 'broadcast',
      action: 'admin',
      adminOnly: true,
      async run(ctx) {
        // The run must be claimed before the first await so overlapping commands see it.
        if (deps.broadcast.inProgress) throw new BroadcastInProgressError();
        validateBroadcastText(ctx.args);
        const result = initiateBroadcast(deps, ctx.inbound.senderId, ctx.args, async (progress) => {
          if (progress.completedBatches % PROGRESS_EVERY_BATCHES === 0 && progress.completedBatches < progress.totalBatches) {
            await ctx.reply(formatBroadcastProgress(progress));
          }
        });

        const current: Promise<void> = result
          .then((final) => ctx.reply(formatBroadcastResult(final)))
          .catch(async (err: unknown) => {
            logger.error({ err }, 'Broadcast command failed');
            await ctx.reply(`❌ Broadcast failed: ${errorMessage(err)}`);
          })
          .catch((err: unknown) => {
            logger.error({ err }, 'Failed to report broadcast failure');
          })
          .finally(() => {
            if (running === current) running = null;
          });
        running = current;

        const preview = await deps.broadcast.previewBroadcast(ctx.args);
        return `📢 Broadcast started to ${preview.recipients} users in ${preview.batches} batches`;
      },
    },
    {
      name: 'broadcast_preview',
      action: 'admin',
      adminOnly: true,
      run: async (ctx) => formatBroadcastPreview(await deps.broadcast.previewBroadcast(ctx.args)),
    },
    {
      name: 'broadcast_test',
      action: 'admin',
      adminOnly: true,
      async run(ctx) {
        const outcome = await deps.broadcast.sendTestBroadcast(ctx.inbound.senderId, ctx.args);
        return outcome.success ? null : `❌ Test broadcast failed: ${outcome.error.message}`;
      },
    },
    {
      name: 'stats',
      action: 'admin',
      adminOnly: true,
      async run(ctx) {
        const users = await deps.store.getUserStats(ctx.now);
        const stats = getStats();
        return [
          '📊 Stats',
          `Users: ${users.total}`,
          `Enabled: ${users.enabled}`,
          `New this week: ${users.newThisWeek}`,
          `Activities: ${users.activities}`,
          '',
          `Prompts sent: ${stats.promptsSent}`,
          `Prompts failed: ${stats.promptsFailed}`,
          `Replies attributed: ${stats.repliesAttributed}`,
          `Replies unattributed: ${stats.repliesUnattributed}`,
          `Rate-limit rejections: ${stats.rateLimitRejections}`,
        ].join('\n');
      },
    },
  ];

  return {
    commands,
    whenIdle: async () => {
      if (running) await running;
    },
  };
}
