/**
 * Time-of-day helpers for notification windows.
 *
 * Windows are half-open `[start, end)` in local time. A window whose end is
 * earlier than its start spans midnight: 22:00-06:00 is active from 22:00
 * through midnight until 06:00 the next morning.
 */

import { ValidationError } from '../core/errors.js';

export const MINUTES_PER_DAY = 24 * 60;

const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

export interface TimeWindow {
  start: string;
  end: string;
}

/** Parse "HH:MM" (or "HH:MM:SS", as Postgres TIME renders) into minutes after midnight. */
export function parseTimeOfDay(value: string): number {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid time "${value}" — use HH:MM (00:00 to 23:59)`, 'time');
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

export function formatTimeOfDay(minutes: number): string {
  const normalized = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hh = String(Math.floor(normalized / 60)).padStart(2, '0');
  const mm = String(normalized % 60).padStart(2, '0');
  return `${hh}:${mm}`;
}

/** Normalise "9:5"-style input to canonical "HH:MM". */
export function normalizeTimeOfDay(value: string): string {
  return formatTimeOfDay(parseTimeOfDay(value));
}

/** Fractional minutes since local midnight. */
export function minuteOfDay(date: Date): number {
  return date.getHours() * 60 + date.getMinutes() + date.getSeconds() / 60 + date.getMilliseconds() / 60_000;
}

export function isWithinWindow(date: Date, window: TimeWindow): boolean {
  const start = parseTimeOfDay(window.start);
  const end = parseTimeOfDay(window.end);
  const now = minuteOfDay(date);

  if (start < end) return now >= start && now < end;
  // overnight
  return now >= start || now < end;
}

/**
 * Validate and normalise a window. Start and end must differ; an end before
 * the start is accepted as an overnight window.
 */
export function validateWindow(window: TimeWindow): TimeWindow {
  const start = normalizeTimeOfDay(window.start);
  const end = normalizeTimeOfDay(window.end);
  if (start === end) {
    throw new ValidationError('Window start and end must differ', 'window');
  }
  return { start, end };
}

/** Parse user input like "09:00-22:00" or "22:00 - 06:30". */
export function parseWindowRange(input: string): TimeWindow {
  const parts = input.split('-').map((part) => part.trim());
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ValidationError('Invalid window — use HH:MM-HH:MM, for example 09:00-22:00', 'window');
  }
  return validateWindow({ start: parts[0], end: parts[1] });
}

export function formatWindow(window: TimeWindow): string {
  return `${window.start}-${window.end}`;
}
