/**
 * Error codes for the runtime core.
 *
 * - UNKNOWN_ENTITY, CAPACITY_EXCEEDED, TURN_NOT_READY: caller bugs, thrown.
 * - CELL_OCCUPIED, OUT_OF_BOUNDS: contention, resolved by scheduler policy.
 * - NO_PATH_FOUND: AI falls back to a default action.
 * - MISSING_CAPABILITY: treated as a no-op by the scheduler.
 */
export type CoreErrorCode =
  | "UNKNOWN_ENTITY"
  | "CAPACITY_EXCEEDED"
  | "CELL_OCCUPIED"
  | "OUT_OF_BOUNDS"
  | "ALREADY_PLACED"
  | "NOT_PLACED"
  | "NO_PATH_FOUND"
  | "MISSING_CAPABILITY"
  | "NOT_AN_ACTOR"
  | "ACTION_ALREADY_SUBMITTED"
  | "WRONG_PHASE"
  | "TURN_NOT_READY"
  | "INVALID_CONFIG"
  | "INVALID_MAP";

/**
 * Unified error type for all core operations.
 *
 * @example
 * ```typescript
 * throw CoreError.unknownEntity("Stale entity reference", { entity });
 * ```
 */
export class CoreError extends Error {
  override readonly name = "CoreError";

  constructor(
    public readonly code: CoreErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CoreError);
    }
  }

  static unknownEntity(
    message: string,
    details?: Record<string, unknown>,
  ): CoreError {
    return new CoreError("UNKNOWN_ENTITY", message, details);
  }

  static cellOccupied(
    message: string,
    details?: Record<string, unknown>,
  ): CoreError {
    return new CoreError("CELL_OCCUPIED", message, details);
  }

  static noPathFound(
    message: string,
    details?: Record<string, unknown>,
  ): CoreError {
    return new CoreError("NO_PATH_FOUND", message, details);
  }

  static missingCapability(
    message: string,
    details?: Record<string, unknown>,
  ): CoreError {
    return new CoreError("MISSING_CAPABILITY", message, details);
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): CoreError {
    return new CoreError("INVALID_CONFIG", message, details);
  }

  static mapInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): CoreError {
    return new CoreError("INVALID_MAP", message, details);
  }

  /**
   * Check if an unknown error is a CoreError, optionally of a given code.
   */
  static isCoreError(error: unknown, code?: CoreErrorCode): error is CoreError {
    return (
      error instanceof CoreError && (code === undefined || error.code === code)
    );
  }

  toJSON(): {
    name: string;
    code: CoreErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
