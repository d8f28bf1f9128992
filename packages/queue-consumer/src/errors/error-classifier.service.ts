import { Injectable, Logger } from "@nestjs/common";
import {
  ErrorCategory,
  ErrorClassificationResult,
  MalformedEnvelopeError,
  TRANSIENT_ERROR_CODES,
  TRANSIENT_ERROR_PATTERNS,
  UNIQUE_VIOLATION_CODE,
} from "./submission-errors";

/**
 * ErrorClassifierService - decides how the consumer reacts to a failure
 *
 * Classification order:
 * 1. MalformedEnvelopeError
 * 2. Unique violation reported by PostgreSQL
 * 3. Known transient driver codes
 * 4. Transient message patterns
 * 5. Everything else is UNEXPECTED
 */
@Injectable()
export class ErrorClassifierService {
  private readonly logger = new Logger(ErrorClassifierService.name);

  classify(error: unknown): ErrorClassificationResult {
    const errorMessage = this.extractErrorMessage(error);
    const code = this.extractCode(error);

    if (error instanceof MalformedEnvelopeError) {
      return {
        category: ErrorCategory.MALFORMED,
        reason: "Payload is not a valid submission envelope",
        originalMessage: errorMessage,
      };
    }

    if (code === UNIQUE_VIOLATION_CODE) {
      const constraint = this.extractConstraint(error);
      this.logger.debug(
        `[DUPLICATE] Unique violation${constraint ? ` on ${constraint}` : ""}`,
      );
      return {
        category: ErrorCategory.DUPLICATE,
        reason: "Unique constraint violation",
        originalMessage: errorMessage,
        code,
        constraint,
      };
    }

    if (code && TRANSIENT_ERROR_CODES[code]) {
      return {
        category: ErrorCategory.TRANSIENT,
        reason: TRANSIENT_ERROR_CODES[code],
        originalMessage: errorMessage,
        code,
      };
    }

    for (const { pattern, description } of TRANSIENT_ERROR_PATTERNS) {
      const matched =
        pattern instanceof RegExp
          ? pattern.test(errorMessage)
          : errorMessage.toLowerCase().includes(pattern.toLowerCase());
      if (matched) {
        return {
          category: ErrorCategory.TRANSIENT,
          reason: description,
          originalMessage: errorMessage,
          code,
        };
      }
    }

    return {
      category: ErrorCategory.UNEXPECTED,
      reason: "Unexpected error",
      originalMessage: errorMessage,
      code,
    };
  }

  isDuplicate(error: unknown): boolean {
    return this.classify(error).category === ErrorCategory.DUPLICATE;
  }

  private extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }

    if (typeof error === "string") {
      return error;
    }

    if (
      error &&
      typeof error === "object" &&
      "message" in error &&
      typeof error.message === "string"
    ) {
      return error.message;
    }

    return String(error);
  }

  /**
   * `pg` puts the SQLSTATE on `code`; Node socket errors put the errno name there.
   */
  private extractCode(error: unknown): string | undefined {
    if (
      error &&
      typeof error === "object" &&
      "code" in error &&
      typeof error.code === "string"
    ) {
      return error.code;
    }
    return undefined;
  }

  private extractConstraint(error: unknown): string | undefined {
    if (
      error &&
      typeof error === "object" &&
      "constraint" in error &&
      typeof error.constraint === "string"
    ) {
      return error.constraint;
    }
    return undefined;
  }
}
