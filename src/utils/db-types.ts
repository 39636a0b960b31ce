/**
 * Shared database domain types used by all backends.
 *
 * Keep this file backend-agnostic so sqlite and postgres implementations
 * can share the exact same API contract. Timestamps are epoch milliseconds;
 * times of day are "HH:MM" strings.
 */

export interface UserRecord {
  tgId: number;
  username: string | null;
  firstName: string | null;
  enabled: boolean;
  windowStart: string;
  windowEnd: string;
  intervalMinutes: number;
  lastNotificationSent: number | null;
  createdAt: number;
}

export interface NewUser {
  tgId: number;
  username?: string | null;
  firstName?: string | null;
}

export interface UserSettingsUpdate {
  enabled?: boolean;
  windowStart?: string;
  windowEnd?: string;
  intervalMinutes?: number;
}

export interface QuestionRecord {
  id: number;
  userId: number;
  name: string;
  text: string;
  windowStart: string;
  windowEnd: string;
  intervalMinutes: number;
  isDefault: boolean;
  active: boolean;
  /** Previous version of this question when the text was edited. */
  parentQuestionId: number | null;
  lastNotificationSent: number | null;
  createdAt: number;
}

export interface NewQuestion {
  userId: number;
  name: string;
  text: string;
  windowStart: string;
  windowEnd: string;
  intervalMinutes: number;
  isDefault: boolean;
  parentQuestionId?: number | null;
}

export interface QuestionSettingsUpdate {
  name?: string;
  windowStart?: string;
  windowEnd?: string;
  intervalMinutes?: number;
  active?: boolean;
}

export interface NotificationRecord {
  id: number;
  userId: number;
  questionId: number;
  outboundMessageId: string;
  sentAt: number;
  expiresAt: number;
}

export type NewNotification = Omit<NotificationRecord, 'id'>;

export interface ActivityEntry {
  id: number;
  userId: number;
  /** Null when the reply could not be attributed to a question. */
  questionId: number | null;
  text: string;
  timestamp: number;
}

export type NewActivity = Omit<ActivityEntry, 'id'>;

export interface UserStats {
  total: number;
  enabled: number;
  newThisWeek: number;
  activities: number;
}
