import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createAdminCommands, initiateBroadcast, type AdminCommands } from '../src/bot/admin-commands.js';
import type { CommandContext, CommandDefinition } from '../src/bot/commands.js';
import { createDispatcher } from '../src/core/dispatcher.js';
import { AdminRequiredError, BroadcastInProgressError, ValidationError } from '../src/core/errors.js';
import { BroadcastManager } from '../src/features/broadcast.js';
import { resetStats } from '../src/middleware/stats.js';
import type { DbBackend } from '../src/utils/db-backend.js';
import { IN_MEMORY } from '../src/utils/db-schema.js';
import { createSqliteBackend } from '../src/utils/db-sqlite.js';
import { FakeAdapter, inboundText, localTime } from './helpers.js';

const ADMIN_ID = 900;

describe('Admin commands', () => {
  let store: DbBackend;
  let adapter: FakeAdapter;
  let broadcast: BroadcastManager;
  let admin: AdminCommands;
  let replies: string[];

  const command = (name: string): CommandDefinition => {
    const found = admin.commands.find((c) => c.name === name);
    if (!found) throw new Error(`missing command ${name}`);
    return found;
  };

  const context = (text: string, senderId = ADMIN_ID): CommandContext => ({
    inbound: inboundText(senderId, text),
    args: text.replace(/^\/\S+\s*/, ''),
    now: localTime(12),
    reply: async (body) => {
      replies.push(body);
    },
  });

  const seedUsers = async (count: number): Promise<void> => {
    for (let tgId = 1; tgId <= count; tgId += 1) {
      await store.upsertUser({ tgId }, localTime(7));
    }
  };

  beforeEach(() => {
    resetStats();
    store = createSqliteBackend(IN_MEMORY);
    adapter = new FakeAdapter();
    replies = [];
    const dispatcher = createDispatcher({
      adapter,
      correlator: { record: vi.fn() },
      sendTimeoutMs: 1_000,
      disableUnreachableUsers: false,
    });
    broadcast = new BroadcastManager(store, dispatcher, {
      batchSize: 1,
      concurrency: 1,
      batchDelayMs: 0,
      pageSize: 50,
      sleep: async () => undefined,
      now: () => localTime(12),
    });
    admin = createAdminCommands({ adminId: ADMIN_ID, broadcast, store });
  });

  afterEach(async () => {
    await admin.whenIdle();
    await store.close();
  });

  it('marks every command admin-only', () => {
    expect(admin.commands.map((c) => [c.name, c.adminOnly, c.action])).toEqual([
      ['broadcast', true, 'admin'],
      ['broadcast_preview', true, 'admin'],
      ['broadcast_test', true, 'admin'],
      ['stats', true, 'admin'],
    ]);
  });

  it('/broadcast answers at once and reports the result when done', async () => {
    await seedUsers(3);

    const started = await command('broadcast').run(context('/broadcast Server restart at 22:00'));
    expect(started).toBe('📢 Broadcast started to 3 users in 3 batches');

    await admin.whenIdle();
    expect(adapter.sent.map((s) => [s.chatId, s.text])).toEqual([
      ['1', 'Server restart at 22:00'],
      ['2', 'Server restart at 22:00'],
      ['3', 'Server restart at 22:00'],
    ]);
    expect(replies).toEqual([
      ['✅ Broadcast complete', 'Total: 3', 'Delivered: 3', 'Failed: 0', 'Delivery rate: 100.0%', 'Duration: 0.0s'].join('\n'),
    ]);
  });

  it('/broadcast posts progress every five batches', async () => {
    await seedUsers(12);

    await command('broadcast').run(context('/broadcast hello'));
    await admin.whenIdle();

    expect(replies).toHaveLength(3);
    expect(replies[0]).toBe(['📢 Broadcast progress', 'Progress: 41.7%', 'Sent: 5/12', 'Failed: 0', 'Batch: 5/12'].join('\n'));
    expect(replies[1]).toBe(['📢 Broadcast progress', 'Progress: 83.3%', 'Sent: 10/12', 'Failed: 0', 'Batch: 10/12'].join('\n'));
    expect(replies[2]).toContain('Delivered: 12');
  });

  it('/broadcast refuses while another broadcast runs', async () => {
    await seedUsers(2);
    adapter.delayMs = 10;

    await command('broadcast').run(context('/broadcast one'));
    await expect(command('broadcast').run(context('/broadcast two'))).rejects.toBeInstanceOf(BroadcastInProgressError);
  });

  it('/broadcast rejects an overlapping command without losing track of the first run', async () => {
    await seedUsers(2);
    adapter.delayMs = 10;

    const first = command('broadcast').run(context('/broadcast one'));
    const second = command('broadcast').run(context('/broadcast two'));

    await expect(second).rejects.toBeInstanceOf(BroadcastInProgressError);
    expect(await first).toBe('📢 Broadcast started to 2 users in 2 batches');

    await admin.whenIdle();
    expect(broadcast.inProgress).toBe(false);
    expect(adapter.sent.map((s) => s.text)).toEqual(['one', 'one']);
    expect(replies).toHaveLength(1);
    expect(replies[0]).toContain('Delivered: 2');
  });

  it('/broadcast rejects empty text before starting', async () => {
    await seedUsers(1);

    await expect(command('broadcast').run(context('/broadcast   '))).rejects.toBeInstanceOf(ValidationError);
    expect(broadcast.state).toBe('idle');
  });

  it('/broadcast reports a failed run', async () => {
    const broken = new BroadcastManager(
      {
        listEnabledUsers: async () => {
          throw new Error('connection lost');
        },
        countEnabledUsers: async () => 4,
      },
      createDispatcher({ adapter, correlator: { record: vi.fn() }, sendTimeoutMs: 1_000, disableUnreachableUsers: false }),
      { batchSize: 10, concurrency: 1, batchDelayMs: 0, pageSize: 10 },
    );
    admin = createAdminCommands({ adminId: ADMIN_ID, broadcast: broken, store });

    expect(await command('broadcast').run(context('/broadcast hello'))).toBe('📢 Broadcast started to 4 users in 1 batches');
    await admin.whenIdle();
    expect(replies).toEqual(['❌ Broadcast failed: connection lost']);
  });

  it('/broadcast_preview shows recipients without sending', async () => {
    await seedUsers(3);

    expect(await command('broadcast_preview').run(context('/broadcast_preview Hi all'))).toBe(
      ['📢 Broadcast preview', '', 'Recipients: 3', 'Batches: 3', 'Estimated time: ~3s', '', 'Hi all'].join('\n'),
    );
    expect(adapter.sent).toHaveLength(0);
  });

  it('/broadcast_test sends to the admin only', async () => {
    await seedUsers(3);

    expect(await command('broadcast_test').run(context('/broadcast_test Hi all'))).toBeNull();
    expect(adapter.sent.map((s) => s.chatId)).toEqual([String(ADMIN_ID)]);
  });

  it('/stats summarizes users and counters', async () => {
    await seedUsers(3);
    await store.updateUserSettings(2, { enabled: false });
    await store.logActivity({ userId: 1, questionId: null, text: 'reading', timestamp: localTime(9) });

    expect(await command('stats').run(context('/stats'))).toBe(
      [
        '📊 Stats',
        'Users: 3',
        'Enabled: 2',
        'New this week: 3',
        'Activities: 1',
        '',
        'Prompts sent: 0',
        'Prompts failed: 0',
        'Replies attributed: 0',
        'Replies unattributed: 0',
        'Rate-limit rejections: 0',
      ].join('\n'),
    );
  });
});

describe('initiateBroadcast', () => {
  it('rejects anyone but the admin', async () => {
    const store = createSqliteBackend(IN_MEMORY);
    const dispatcher = createDispatcher({
      adapter: new FakeAdapter(),
      correlator: { record: vi.fn() },
      sendTimeoutMs: 1_000,
      disableUnreachableUsers: false,
    });
    const broadcast = new BroadcastManager(store, dispatcher, { batchSize: 10, concurrency: 1, batchDelayMs: 0, pageSize: 10 });
    const sendBroadcast = vi.spyOn(broadcast, 'sendBroadcast');

    await expect(initiateBroadcast({ adminId: ADMIN_ID, broadcast }, 5, 'hello')).rejects.toBeInstanceOf(AdminRequiredError);
    expect(sendBroadcast).not.toHaveBeenCalled();
    await store.close();
  });
});
