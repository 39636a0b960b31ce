/**
 * Question templates: ready-made questions grouped by category that a user
 * can add in one step, optionally with their own window or interval.
 *
 * The catalog lives in question-templates.json next to this module and is
 * validated on load.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';

import { ConfigError, NotFoundError } from '../core/errors.js';
import { PROJECT_ROOT } from '../utils/config.js';
import { formatWindow, type TimeWindow } from '../utils/time-window.js';
import { MIN_INTERVAL_MINUTES, type NewQuestionInput } from './questions.js';

const templateSchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/),
  name: z.string().min(1),
  text: z.string().min(1),
  windowStart: z.string(),
  windowEnd: z.string(),
  intervalMinutes: z.number().int().positive(),
  description: z.string(),
});

const catalogSchema = z.object({
  popular: z.array(z.string()),
  categories: z.array(
    z.object({
      key: z.string().regex(/^[a-z0-9_]+$/),
      title: z.string().min(1),
      templates: z.array(templateSchema),
    }),
  ),
});

export type QuestionTemplate = z.infer<typeof templateSchema>;

export interface TemplateCategory {
  key: string;
  title: string;
  templates: QuestionTemplate[];
}

export interface TemplateCustomization {
  window?: TimeWindow;
  intervalMinutes?: number;
}

export interface TemplateCatalog {
  categories(): TemplateCategory[];
  category(key: string): TemplateCategory | undefined;
  find(key: string): QuestionTemplate | undefined;
  /** Case-insensitive match on name, text or description. */
  search(query: string): QuestionTemplate[];
  popular(): QuestionTemplate[];
}

export function createTemplateCatalog(raw: unknown): TemplateCatalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `templates.${issue.path.join('.')}: ${issue.message}`));
  }

  const categories: TemplateCategory[] = parsed.data.categories;
  const byKey = new Map<string, QuestionTemplate>();
  for (const category of categories) {
    for (const template of category.templates) {
      if (byKey.has(template.key)) throw new ConfigError([`duplicate question template key: ${template.key}`]);
      byKey.set(template.key, template);
    }
  }
  const popular = parsed.data.popular.flatMap((key) => {
    const template = byKey.get(key);
    return template ? [template] : [];
  });

  return {
    categories: () => categories,
    category: (key) => categories.find((c) => c.key === key.toLowerCase()),
    find: (key) => byKey.get(key.toLowerCase()),
    search(query) {
      const needle = query.trim().toLowerCase();
      if (!needle) return [];
      return [...byKey.values()].filter((t) =>
        [t.name, t.text, t.description].some((field) => field.toLowerCase().includes(needle)));
    },
    popular: () => popular,
  };
}

function resolveTemplatesPath(): string {
  const candidates = [
    resolve(PROJECT_ROOT, 'src', 'features', 'question-templates.json'),
    resolve(PROJECT_ROOT, 'dist', 'src', 'features', 'question-templates.json'),
  ];
  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) throw new ConfigError(['question-templates.json not found']);
  return found;
}

export function loadTemplateCatalog(path: string = resolveTemplatesPath()): TemplateCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return createTemplateCatalog(raw);
}

/**
 * Question input for a template. Customizations replace the template's own
 * window and interval; the interval never drops below the minimum.
 */
export function customizeTemplate(template: QuestionTemplate, customization: TemplateCustomization = {}): NewQuestionInput {
  return {
    name: template.name,
    text: template.text,
    window: customization.window ?? { start: template.windowStart, end: template.windowEnd },
    intervalMinutes: Math.max(MIN_INTERVAL_MINUTES, customization.intervalMinutes ?? template.intervalMinutes),
  };
}

// ── Formatting ──────────────────────────────────────────────────────

export function formatTemplateLine(template: QuestionTemplate): string {
  const window = formatWindow({ start: template.windowStart, end: template.windowEnd });
  return `• ${template.key}: ${template.name} (${window}, every ${template.intervalMinutes} min)\n   ${template.text}`;
}

export function formatTemplateOverview(catalog: TemplateCatalog): string {
  return [
    '🧩 Question templates',
    '',
    ...catalog.categories().map((c) => `${c.title}: /templates ${c.key}`),
    '',
    '⭐ Popular',
    ...catalog.popular().map(formatTemplateLine),
    '',
    'Add one with /template_add key',
  ].join('\n');
}

export function formatTemplateCategory(category: TemplateCategory): string {
  return [category.title, ...category.templates.map(formatTemplateLine), '', 'Add one with /template_add key'].join('\n');
}

export function requireTemplate(catalog: TemplateCatalog, key: string): QuestionTemplate {
  const template = catalog.find(key);
  if (!template) throw new NotFoundError(`Template "${key}" not found. See /templates`);
  return template;
}
