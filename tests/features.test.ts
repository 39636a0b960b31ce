import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError, NotFoundError, ValidationError } from '../src/core/errors.js';
import {
  DEFAULT_QUESTION_NAME,
  DEFAULT_QUESTION_TEXT,
  formatQuestionText,
  MAX_ACTIVE_QUESTIONS,
  validateInterval,
  validateQuestionName,
  validateQuestionText,
} from '../src/features/questions.js';
import { settingsCacheKey } from '../src/features/settings.js';
import { getAdminHelpMessage, getHelpMessage } from '../src/features/help.js';
import { createTemplateCatalog, customizeTemplate, loadTemplateCatalog, requireTemplate } from '../src/features/templates.js';
import { createTestServices, localTime, type TestServices } from './helpers.js';

const daytime = { start: '09:00', end: '18:00' };

describe('Question validation', () => {
  it('trims and bounds names and text', () => {
    expect(validateQuestionName('  Mood ')).toBe('Mood');
    expect(() => validateQuestionName('   ')).toThrow(ValidationError);
    expect(() => validateQuestionName('n'.repeat(101))).toThrow(ValidationError);
    expect(validateQuestionText('t'.repeat(500))).toHaveLength(500);
    expect(() => validateQuestionText('t'.repeat(501))).toThrow(ValidationError);
  });

  it('bounds the interval', () => {
    expect(validateInterval(30)).toBe(30);
    expect(validateInterval(1440)).toBe(1440);
    expect(() => validateInterval(29)).toThrow(ValidationError);
    expect(() => validateInterval(1441)).toThrow(ValidationError);
    expect(() => validateInterval(45.5)).toThrow(ValidationError);
  });

  it('substitutes {name} and {time}', () => {
    const now = new Date(2026, 2, 10, 9, 5);
    expect(formatQuestionText('Hi {name}, it is {time}. {name}?', { firstName: 'Ada', now })).toBe('Hi Ada, it is 09:05. Ada?');
    expect(formatQuestionText('Hi {name}', { firstName: null, now })).toBe('Hi friend');
    expect(formatQuestionText('Hi {name}', { firstName: '  ', now })).toBe('Hi friend');
  });

  it('inserts names containing $ sequences literally', () => {
    const now = new Date(2026, 2, 10, 9, 5);
    expect(formatQuestionText('Hi {name}!', { firstName: '$&', now })).toBe('Hi $&!');
    expect(formatQuestionText("{name} at {time}", { firstName: "$'$`$$", now })).toBe("$'$`$$ at 09:05");
  });
});

describe('Question service', () => {
  let services: TestServices;

  beforeEach(async () => {
    services = createTestServices();
    await services.settings.register({ tgId: 41, firstName: 'Ada' }, localTime(7));
  });

  afterEach(async () => {
    await services.store.close();
  });

  it('creates a default question from user settings on registration', async () => {
    const [question] = await services.questions.listActive(41);
    expect(question).toMatchObject({
      name: DEFAULT_QUESTION_NAME,
      text: DEFAULT_QUESTION_TEXT,
      windowStart: '09:00',
      windowEnd: '22:00',
      intervalMinutes: 120,
      isDefault: true,
      active: true,
    });
  });

  it('does not create a second default', async () => {
    const user = await services.settings.require(41);
    const first = await services.questions.ensureDefault(user, localTime(8));
    const second = await services.questions.ensureDefault(user, localTime(9));
    expect(second.id).toBe(first.id);
    expect(await services.questions.listActive(41)).toHaveLength(1);
  });

  it('caps active questions at five', async () => {
    for (let i = 1; i < MAX_ACTIVE_QUESTIONS; i += 1) {
      await services.questions.create(41, { name: `Q${i}`, text: 'What?', window: daytime, intervalMinutes: 60 }, localTime(8));
    }
    await expect(
      services.questions.create(41, { name: 'Q5', text: 'What?', window: daytime, intervalMinutes: 60 }, localTime(8)),
    ).rejects.toThrow('You can have at most 5 active questions');
  });

  it('rejects a duplicate active name', async () => {
    await services.questions.create(41, { name: 'Mood', text: 'How?', window: daytime, intervalMinutes: 60 }, localTime(8));
    await expect(
      services.questions.create(41, { name: 'Mood', text: 'Again?', window: daytime, intervalMinutes: 60 }, localTime(8)),
    ).rejects.toThrow('You already have an active question named "Mood"');
  });

  it('versions a question when its text changes', async () => {
    const created = await services.questions.create(41, { name: 'Mood', text: 'How?', window: daytime, intervalMinutes: 60 }, localTime(8));
    await services.store.markQuestionSent(created.id, localTime(10), null);

    const next = await services.questions.editText(41, created.id, 'How are you, {name}?', localTime(11));

    expect(next).toMatchObject({
      name: 'Mood',
      text: 'How are you, {name}?',
      windowStart: '09:00',
      windowEnd: '18:00',
      intervalMinutes: 60,
      isDefault: false,
      active: true,
      parentQuestionId: created.id,
      lastNotificationSent: localTime(10),
    });
    expect((await services.store.getQuestion(created.id))?.active).toBe(false);
    expect((await services.questions.listActive(41)).map((q) => q.id)).toEqual([expect.any(Number), next.id]);
  });

  it('keeps the default flag across a text edit', async () => {
    const [defaultQuestion] = await services.questions.listActive(41);
    const next = await services.questions.editText(41, defaultQuestion?.id ?? 0, 'Status?', localTime(9));

    expect(next.isDefault).toBe(true);
    expect((await services.store.getActiveDefaultQuestion(41))?.id).toBe(next.id);
  });

  it('updates settings in place', async () => {
    const created = await services.questions.create(41, { name: 'Mood', text: 'How?', window: daytime, intervalMinutes: 60 }, localTime(8));
    const updated = await services.questions.updateSettings(41, created.id, { window: { start: '20:00', end: '02:00' }, intervalMinutes: 90 });

    expect(updated).toMatchObject({ id: created.id, windowStart: '20:00', windowEnd: '02:00', intervalMinutes: 90 });
  });

  it('never deactivates the default question', async () => {
    const [defaultQuestion] = await services.questions.listActive(41);
    const id = defaultQuestion?.id ?? 0;

    await expect(services.questions.toggle(41, id)).rejects.toThrow('The default question cannot be deactivated');
    await expect(services.questions.remove(41, id)).rejects.toThrow('The default question cannot be deactivated');
  });

  it('toggles custom questions off and on', async () => {
    const created = await services.questions.create(41, { name: 'Mood', text: 'How?', window: daytime, intervalMinutes: 60 }, localTime(8));

    expect((await services.questions.toggle(41, created.id)).active).toBe(false);
    expect(await services.questions.listActive(41)).toHaveLength(1);
    expect((await services.questions.toggle(41, created.id)).active).toBe(true);
    expect(await services.questions.listActive(41)).toHaveLength(2);
  });

  it('refuses to reactivate when the name is taken again', async () => {
    const created = await services.questions.create(41, { name: 'Mood', text: 'How?', window: daytime, intervalMinutes: 60 }, localTime(8));
    await services.questions.remove(41, created.id);
    await services.questions.create(41, { name: 'Mood', text: 'New', window: daytime, intervalMinutes: 60 }, localTime(9));

    await expect(services.questions.toggle(41, created.id)).rejects.toBeInstanceOf(ValidationError);
  });

  it('never reactivates a version that has been replaced', async () => {
    const first = await services.questions.create(41, { name: 'Mood', text: 'v1', window: daytime, intervalMinutes: 60 }, localTime(8));
    const second = await services.questions.editText(41, first.id, 'v2', localTime(9));
    await services.questions.remove(41, second.id);

    await expect(services.questions.toggle(41, first.id)).rejects.toThrow(`Question ${first.id} was replaced by a newer version`);
    expect((await services.store.getQuestion(first.id))?.active).toBe(false);
    expect((await services.questions.toggle(41, second.id)).text).toBe('v2');
  });

  it('hides other users\' questions', async () => {
    await services.settings.register({ tgId: 42 }, localTime(7));
    const [theirs] = await services.questions.listActive(42);

    await expect(services.questions.get(41, theirs?.id ?? 0)).rejects.toBeInstanceOf(NotFoundError);
    await expect(services.questions.editText(41, theirs?.id ?? 0, 'Mine now', localTime(9))).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('Settings service', () => {
  let services: TestServices;

  beforeEach(async () => {
    services = createTestServices();
    await services.settings.register({ tgId: 51, username: 'ada', firstName: 'Ada' }, localTime(7));
  });

  afterEach(async () => {
    await services.store.close();
  });

  it('registers with defaults and keeps settings on re-registration', async () => {
    await services.settings.setInterval(51, 45);
    const again = await services.settings.register({ tgId: 51, firstName: 'Ada L.' }, localTime(8));

    expect(again).toMatchObject({
      tgId: 51,
      username: 'ada',
      firstName: 'Ada L.',
      enabled: true,
      windowStart: '09:00',
      windowEnd: '22:00',
      intervalMinutes: 45,
    });
  });

  it('never serves a stale value after a write', async () => {
    const before = await services.settings.require(51);
    expect(services.settingsCache.get(settingsCacheKey(51))).toEqual(before);

    await services.settings.setWindow(51, { start: '07:00', end: '23:30' });
    const after = await services.settings.require(51);
    expect(after).toMatchObject({ windowStart: '07:00', windowEnd: '23:30' });

    await services.settings.setEnabled(51, false);
    expect((await services.settings.require(51)).enabled).toBe(false);
  });

  it('carries window and interval changes to the default question', async () => {
    await services.settings.setWindow(51, { start: '22:00', end: '06:00' });
    await services.settings.setInterval(51, 240);

    const defaultQuestion = await services.store.getActiveDefaultQuestion(51);
    expect(defaultQuestion).toMatchObject({ windowStart: '22:00', windowEnd: '06:00', intervalMinutes: 240 });
  });

  it('validates before writing', async () => {
    await expect(services.settings.setInterval(51, 10)).rejects.toBeInstanceOf(ValidationError);
    await expect(services.settings.setWindow(51, { start: '10:00', end: '10:00' })).rejects.toBeInstanceOf(ValidationError);
    expect(await services.settings.require(51)).toMatchObject({ intervalMinutes: 120, windowStart: '09:00' });
  });

  it('reports unknown users', async () => {
    expect(await services.settings.get(999)).toBeUndefined();
    await expect(services.settings.require(999)).rejects.toBeInstanceOf(NotFoundError);
    await expect(services.settings.setEnabled(999, false)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('Help text', () => {
  it('lists user commands and keeps admin commands separate', () => {
    expect(getHelpMessage()).toContain('/question_add name | 09:00-18:00 | 180 | text');
    expect(getHelpMessage()).not.toContain('/broadcast');
    expect(getAdminHelpMessage()).toContain('/broadcast_preview');
  });
});

describe('Question templates', () => {
  const catalog = loadTemplateCatalog();

  it('loads the shipped catalog', () => {
    expect(catalog.categories().map((c) => c.key)).toEqual(['work', 'personal', 'daily', 'health']);
    expect(catalog.categories().every((c) => c.templates.length === 3)).toBe(true);
    expect(catalog.popular().map((t) => t.key)).toEqual(['work_tasks', 'mood', 'morning_checkin', 'evening_review', 'learning']);
  });

  it('finds templates by key and searches case-insensitively', () => {
    expect(catalog.find('MOOD')?.name).toBe('Mood');
    expect(catalog.find('nope')).toBeUndefined();
    expect(catalog.search('check-in').map((t) => t.key)).toEqual(['morning_checkin', 'lunch_break']);
    expect(catalog.search('   ')).toEqual([]);
    expect(() => requireTemplate(catalog, 'nope')).toThrow(NotFoundError);
  });

  it('customizes window and interval with a floor on the interval', () => {
    const mood = requireTemplate(catalog, 'mood');

    expect(customizeTemplate(mood)).toEqual({
      name: 'Mood',
      text: '😊 How is your mood?',
      window: { start: '10:00', end: '20:00' },
      intervalMinutes: 360,
    });
    expect(customizeTemplate(mood, { window: { start: '22:00', end: '02:00' }, intervalMinutes: 5 })).toMatchObject({
      window: { start: '22:00', end: '02:00' },
      intervalMinutes: 30,
    });
  });

  it('rejects a malformed catalog', () => {
    const template = {
      key: 'a',
      name: 'A',
      text: 'A?',
      windowStart: '09:00',
      windowEnd: '10:00',
      intervalMinutes: 60,
      description: '',
    };
    expect(() => createTemplateCatalog({ popular: [], categories: [{ key: 'x', title: 'X', templates: [{ ...template, intervalMinutes: 'often' }] }] }))
      .toThrow(ConfigError);
    expect(() => createTemplateCatalog({ popular: [], categories: [{ key: 'x', title: 'X', templates: [template, template] }] }))
      .toThrow('duplicate question template key: a');
  });

  it('adds a template through the question service', async () => {
    const services = createTestServices();
    try {
      await services.settings.register({ tgId: 51 }, localTime(7));
      const created = await services.questions.create(51, customizeTemplate(requireTemplate(catalog, 'sleep')), localTime(8));

      expect(created).toMatchObject({ name: 'Sleep', windowStart: '08:00', windowEnd: '11:00', intervalMinutes: 1440, isDefault: false });
    } finally {
      await services.store.close();
    }
  });
});
