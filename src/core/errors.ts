/**
 * Error taxonomy.
 *
 * Admission (rate limit) and delivery errors are normal outcomes that
 * callers convert into user-facing text or counters; store and validation
 * errors propagate to the caller of the failing operation.
 */

export class BotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends BotError {
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.field = field;
  }
}

export class NotFoundError extends BotError {}

export class StoreError extends BotError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Store operation failed: ${operation}`, { cause });
    this.operation = operation;
  }
}

export class RateLimitExceededError extends BotError {
  readonly retryAfterSeconds: number;
  readonly action: string;

  constructor(action: string, retryAfterSeconds: number) {
    super(`Too many ${action} requests. Try again in ${retryAfterSeconds} seconds.`);
    this.action = action;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class AdminRequiredError extends BotError {
  constructor() {
    super('This command is only available to the administrator');
  }
}

export class BroadcastInProgressError extends BotError {
  constructor() {
    super('A broadcast is already running');
  }
}

export class ConfigError extends BotError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export type DeliveryErrorCategory =
  | 'blocked'
  | 'chat_not_found'
  | 'rate_limited'
  | 'transient_error'
  | 'timeout';

const PERMANENT_CATEGORIES: ReadonlySet<DeliveryErrorCategory> = new Set(['blocked', 'chat_not_found']);

/** Raised by messaging adapters when the platform rejects or loses a send. */
export class DeliveryError extends BotError {
  readonly category: DeliveryErrorCategory;
  readonly retryAfterSeconds: number | null;

  constructor(
    category: DeliveryErrorCategory,
    message: string,
    options?: { retryAfterSeconds?: number | null; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.category = category;
    this.retryAfterSeconds = options?.retryAfterSeconds ?? null;
  }

  get permanent(): boolean {
    return PERMANENT_CATEGORIES.has(this.category);
  }
}

export function isPermanentCategory(category: DeliveryErrorCategory): boolean {
  return PERMANENT_CATEGORIES.has(category);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
