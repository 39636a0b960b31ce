/**
 * User commands. Each command names the rate-limit class it is admitted
 * under and returns the reply text (or null when it already replied).
 */

import { ValidationError } from '../core/errors.js';
import type { InboundMessage } from '../core/inbound-message.js';
import { getAdminHelpMessage, getHelpMessage } from '../features/help.js';
import type { QuestionService } from '../features/questions.js';
import type { SettingsService } from '../features/settings.js';
import {
  customizeTemplate,
  formatTemplateCategory,
  formatTemplateLine,
  formatTemplateOverview,
  requireTemplate,
  type TemplateCatalog,
  type TemplateCustomization,
} from '../features/templates.js';
import type { ActionClass } from '../middleware/rate-limit.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { QuestionRecord, UserRecord } from '../utils/db-types.js';
import { formatTimeOfDay, formatWindow, minuteOfDay, parseWindowRange } from '../utils/time-window.js';

export const HISTORY_LIMIT = 10;

export interface CommandContext {
  inbound: InboundMessage;
  /** Text after the command name, trimmed. */
  args: string;
  now: number;
  reply(text: string): Promise<void>;
}

export interface CommandDefinition {
  name: string;
  action: ActionClass;
  adminOnly?: boolean;
  run(ctx: CommandContext): Promise<string | null>;
}

export interface ParsedCommand {
  name: string;
  args: string;
}

/** `/cmd@BotName rest` → { name: 'cmd', args: 'rest' }; null for plain text. */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([a-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/i.exec(text.trim());
  if (!match || !match[1]) return null;
  return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

export function parsePositiveInt(value: string, field: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(`Expected a positive whole number for ${field}`, field);
  }
  const parsed = Number.parseInt(value.trim(), 10);
  if (parsed < 1) throw new ValidationError(`Expected a positive whole number for ${field}`, field);
  return parsed;
}

export function formatTimestamp(ms: number): string {
  const date = new Date(ms);
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd} ${formatTimeOfDay(Math.floor(minuteOfDay(date)))}`;
}

export function formatSettings(user: UserRecord): string {
  return [
    '⚙️ Your settings',
    `Check-ins: ${user.enabled ? 'on' : 'off'}`,
    `Window: ${formatWindow({ start: user.windowStart, end: user.windowEnd })}`,
    `Every: ${user.intervalMinutes} minutes`,
  ].join('\n');
}

export function formatQuestionLine(question: QuestionRecord): string {
  const window = formatWindow({ start: question.windowStart, end: question.windowEnd });
  const marker = question.isDefault ? ' (default)' : '';
  return `#${question.id} ${question.name}${marker} — ${window}, every ${question.intervalMinutes} min\n   ${question.text}`;
}

/** `name | HH:MM-HH:MM | minutes | text` */
export function parseQuestionAddArgs(args: string): { name: string; window: { start: string; end: string }; intervalMinutes: number; text: string } {
  const parts = args.split('|').map((part) => part.trim());
  if (parts.length < 4) {
    throw new ValidationError('Usage: /question_add name | HH:MM-HH:MM | minutes | text', 'args');
  }
  const [name = '', windowText = '', minutes = '', ...rest] = parts;
  return {
    name,
    window: parseWindowRange(windowText),
    intervalMinutes: parsePositiveInt(minutes, 'interval'),
    text: rest.join(' | '),
  };
}

/** `key [| HH:MM-HH:MM [| minutes]]` */
export function parseTemplateAddArgs(args: string): { key: string; customization: TemplateCustomization } {
  const [key = '', windowText = '', minutes = ''] = args.split('|').map((part) => part.trim());
  if (!key) throw new ValidationError('Usage: /template_add key [| HH:MM-HH:MM [| minutes]]', 'args');
  return {
    key,
    customization: {
      ...(windowText ? { window: parseWindowRange(windowText) } : {}),
      ...(minutes ? { intervalMinutes: parsePositiveInt(minutes, 'interval') } : {}),
    },
  };
}

function splitIdAndRest(args: string, usage: string): { id: number; rest: string } {
  const match = /^(\S+)\s*([\s\S]*)$/.exec(args);
  if (!match || !match[1]) throw new ValidationError(usage, 'args');
  return { id: parsePositiveInt(match[1], 'id'), rest: (match[2] ?? '').trim() };
}

export interface UserCommandDeps {
  settings: SettingsService;
  questions: QuestionService;
  store: Pick<DbBackend, 'getRecentActivities' | 'countActivities'>;
  templates: TemplateCatalog;
  adminId: number;
}

export function createUserCommands(deps: UserCommandDeps): CommandDefinition[] {
  const { settings, questions, store, templates } = deps;

  const help = (ctx: CommandContext): string =>
    ctx.inbound.senderId === deps.adminId
      ? `${getHelpMessage()}\n\n${getAdminHelpMessage()}`
      : getHelpMessage();

  return [
    {
      name: 'start',
      action: 'general',
      async run(ctx) {
        await settings.register(
          { tgId: ctx.inbound.senderId, username: ctx.inbound.username, firstName: ctx.inbound.firstName },
          ctx.now,
        );
        return help(ctx);
      },
    },
    {
      name: 'help',
      action: 'general',
      run: async (ctx) => help(ctx),
    },
    {
      name: 'settings',
      action: 'settings',
      run: async (ctx) => formatSettings(await settings.require(ctx.inbound.senderId)),
    },
    {
      name: 'window',
      action: 'settings',
      async run(ctx) {
        if (!ctx.args) throw new ValidationError('Usage: /window HH:MM-HH:MM', 'args');
        const user = await settings.setWindow(ctx.inbound.senderId, parseWindowRange(ctx.args));
        return `✅ Window set to ${formatWindow({ start: user.windowStart, end: user.windowEnd })}`;
      },
    },
    {
      name: 'freq',
      action: 'settings',
      async run(ctx) {
        if (!ctx.args) throw new ValidationError('Usage: /freq minutes', 'args');
        const user = await settings.setInterval(ctx.inbound.senderId, parsePositiveInt(ctx.args, 'interval'));
        return `✅ I'll check in every ${user.intervalMinutes} minutes`;
      },
    },
    {
      name: 'notify_on',
      action: 'settings',
      async run(ctx) {
        await settings.setEnabled(ctx.inbound.senderId, true);
        return '🔔 Check-ins are on';
      },
    },
    {
      name: 'notify_off',
      action: 'settings',
      async run(ctx) {
        await settings.setEnabled(ctx.inbound.senderId, false);
        return '🔕 Check-ins are paused. Send /notify_on to resume.';
      },
    },
    {
      name: 'questions',
      action: 'general',
      async run(ctx) {
        const active = await questions.listActive(ctx.inbound.senderId);
        if (active.length === 0) return 'You have no active questions.';
        return ['📋 Your questions', ...active.map(formatQuestionLine)].join('\n');
      },
    },
    {
      name: 'question_add',
      action: 'settings',
      async run(ctx) {
        const created = await questions.create(ctx.inbound.senderId, parseQuestionAddArgs(ctx.args), ctx.now);
        return `✅ Added question #${created.id} "${created.name}"`;
      },
    },
    {
      name: 'templates',
      action: 'general',
      async run(ctx) {
        if (!ctx.args) return formatTemplateOverview(templates);
        const category = templates.category(ctx.args);
        if (category) return formatTemplateCategory(category);
        const matches = templates.search(ctx.args);
        if (matches.length === 0) return `No templates match "${ctx.args}". See /templates`;
        return [`🔎 Templates matching "${ctx.args}"`, ...matches.map(formatTemplateLine)].join('\n');
      },
    },
    {
      name: 'template_add',
      action: 'settings',
      async run(ctx) {
        const { key, customization } = parseTemplateAddArgs(ctx.args);
        const template = requireTemplate(templates, key);
        const created = await questions.create(ctx.inbound.senderId, customizeTemplate(template, customization), ctx.now);
        return `✅ Added question #${created.id} "${created.name}"`;
      },
    },
    {
      name: 'question_edit',
      action: 'settings',
      async run(ctx) {
        const { id, rest } = splitIdAndRest(ctx.args, 'Usage: /question_edit id new text');
        const next = await questions.editText(ctx.inbound.senderId, id, rest, ctx.now);
        return `✅ Question updated (now #${next.id})`;
      },
    },
    {
      name: 'question_toggle',
      action: 'settings',
      async run(ctx) {
        const { id } = splitIdAndRest(ctx.args, 'Usage: /question_toggle id');
        const updated = await questions.toggle(ctx.inbound.senderId, id);
        return updated.active ? `✅ Question #${id} is active` : `⏸ Question #${id} is paused`;
      },
    },
    {
      name: 'question_delete',
      action: 'settings',
      async run(ctx) {
        const { id } = splitIdAndRest(ctx.args, 'Usage: /question_delete id');
        await questions.remove(ctx.inbound.senderId, id);
        return `🗑 Question #${id} removed`;
      },
    },
    {
      name: 'history',
      action: 'general',
      async run(ctx) {
        const userId = ctx.inbound.senderId;
        const [entries, total] = await Promise.all([
          store.getRecentActivities(userId, HISTORY_LIMIT),
          store.countActivities(userId),
        ]);
        if (entries.length === 0) return 'Your log is empty. Reply to a check-in to start it.';
        return [
          `📝 Last ${entries.length} of ${total} entries`,
          ...entries.map((entry) => `${formatTimestamp(entry.timestamp)} — ${entry.text}`),
        ].join('\n');
      },
    },
  ];
}
