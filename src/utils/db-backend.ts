import type {
  ActivityEntry,
  NewActivity,
  NewNotification,
  NewQuestion,
  NewUser,
  NotificationRecord,
  QuestionRecord,
  QuestionSettingsUpdate,
  UserRecord,
  UserSettingsUpdate,
  UserStats,
} from './db-types.js';

/**
 * A database backend implements the storage API the scheduler, correlator,
 * broadcast and command layers depend on.
 *
 * Every method either resolves or rejects with a StoreError (or a
 * ValidationError when a uniqueness/check constraint rejects the write).
 */
export interface DbBackend {
  readonly dialect: 'sqlite' | 'postgres';

  // Users
  /** Insert with default settings, or refresh username/first name of an existing user. */
  upsertUser(user: NewUser, now: number): Promise<UserRecord>;
  getUser(tgId: number): Promise<UserRecord | undefined>;
  updateUserSettings(tgId: number, update: UserSettingsUpdate): Promise<UserRecord | undefined>;
  setUserLastNotification(tgId: number, sentAt: number): Promise<void>;
  /** Keyset page of enabled users ordered by tg_id, starting after `afterTgId`. */
  listEnabledUsers(afterTgId: number | null, limit: number): Promise<UserRecord[]>;
  countEnabledUsers(): Promise<number>;
  getUserStats(now: number): Promise<UserStats>;

  // Questions
  /** Active questions, default first, then oldest first. */
  getActiveQuestions(userId: number): Promise<QuestionRecord[]>;
  getQuestion(id: number): Promise<QuestionRecord | undefined>;
  getActiveDefaultQuestion(userId: number): Promise<QuestionRecord | undefined>;
  createQuestion(question: NewQuestion, now: number): Promise<QuestionRecord>;
  updateQuestion(id: number, update: QuestionSettingsUpdate): Promise<QuestionRecord | undefined>;
  /**
   * Atomically deactivate `id` and insert its successor with `text`,
   * linked through parent_question_id. Returns the new version.
   */
  createQuestionVersion(id: number, text: string, now: number): Promise<QuestionRecord>;
  /** True when some row names `id` as its parent_question_id. */
  hasSuccessor(id: number): Promise<boolean>;
  /**
   * Compare-and-set last_notification_sent on an active question. Succeeds
   * only if the stored value still equals `expectedPrevious` (null matches
   * NULL). Passing `sentAt: null` releases a claim.
   */
  markQuestionSent(id: number, sentAt: number | null, expectedPrevious: number | null): Promise<boolean>;

  // Reply correlation
  insertNotification(notification: NewNotification): Promise<NotificationRecord>;
  /** Most recent record for (user, outbound message) with expires_at > now. */
  findActiveNotification(userId: number, outboundMessageId: string, now: number): Promise<NotificationRecord | undefined>;
  /** DELETE ... WHERE expires_at < now. Returns rows removed. */
  deleteExpiredNotifications(now: number): Promise<number>;

  // Activity log
  logActivity(activity: NewActivity): Promise<ActivityEntry>;
  getRecentActivities(userId: number, limit: number): Promise<ActivityEntry[]>;
  countActivities(userId: number): Promise<number>;

  // Lifecycle
  close(): Promise<void>;
}

export const DEFAULT_USER_SETTINGS = {
  enabled: true,
  windowStart: '09:00',
  windowEnd: '22:00',
  intervalMinutes: 120,
} as const;
