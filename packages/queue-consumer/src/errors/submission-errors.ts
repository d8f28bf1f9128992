/**
 * Error classification for the submission pipeline.
 *
 * Only a failure to reach a dependency at startup is fatal to the process.
 * Every other category is handled per item and the consumer loop continues.
 */
export enum ErrorCategory {
  /**
   * Infrastructure was unreachable or timed out. Retried at startup,
   * logged and skipped inside the loop.
   */
  TRANSIENT = "TRANSIENT",

  /**
   * The payload can never become a valid envelope. Discarded, never retried.
   */
  MALFORMED = "MALFORMED",

  /**
   * A uniqueness constraint rejected a concurrent insert of the same pack or
   * submission. The other writer already recorded it, so this is treated as
   * an idempotent success.
   */
  DUPLICATE = "DUPLICATE",

  /**
   * Anything else. Rolled back and logged with full context.
   */
  UNEXPECTED = "UNEXPECTED",
}

export interface ErrorPattern {
  pattern: RegExp | string;
  description: string;
}

/** PostgreSQL SQLSTATE for unique_violation */
export const UNIQUE_VIOLATION_CODE = "23505";

export const TRANSIENT_ERROR_CODES: Record<string, string> = {
  ECONNREFUSED: "Connection refused (ECONNREFUSED)",
  ECONNRESET: "Connection reset (ECONNRESET)",
  ETIMEDOUT: "Connection timed out (ETIMEDOUT)",
  ENOTFOUND: "DNS lookup failed (ENOTFOUND)",
  EAI_AGAIN: "DNS lookup failed (EAI_AGAIN)",
  // admin_shutdown, crash_shutdown, cannot_connect_now
  "57P01": "Database is shutting down",
  "57P02": "Database crashed",
  "57P03": "Database is starting up",
};

export const TRANSIENT_ERROR_PATTERNS: ErrorPattern[] = [
  { pattern: /connection refused/i, description: "Connection refused" },
  { pattern: /ECONNREFUSED/, description: "Connection refused (ECONNREFUSED)" },
  { pattern: /ETIMEDOUT/, description: "Connection timed out (ETIMEDOUT)" },
  { pattern: /ENOTFOUND/, description: "DNS lookup failed (ENOTFOUND)" },
  {
    pattern: /connection terminated/i,
    description: "Database connection terminated",
  },
  { pattern: /timeout exceeded/i, description: "Connection pool timeout" },
  { pattern: /connection is closed/i, description: "Redis connection closed" },
];

export interface ErrorClassificationResult {
  category: ErrorCategory;
  reason: string;
  originalMessage: string;
  /** Driver error code (SQLSTATE or errno name) when present */
  code?: string;
  /** Violated constraint name for DUPLICATE */
  constraint?: string;
}

/**
 * Raised when a dequeued payload is not a valid submission envelope.
 */
export class MalformedEnvelopeError extends Error {
  constructor(
    message: string,
    readonly problems: string[] = [],
  ) {
    super(message);
    this.name = "MalformedEnvelopeError";
  }
}

/**
 * Raised when a dependency never answered within the startup retry budget.
 */
export class DependencyUnavailableError extends Error {
  constructor(
    readonly dependency: string,
    readonly attempts: number,
    readonly lastError?: string,
  ) {
    super(
      `${dependency} is not available after ${attempts} attempts` +
        (lastError ? `: ${lastError}` : ""),
    );
    this.name = "DependencyUnavailableError";
  }
}
