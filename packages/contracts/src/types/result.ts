/**
 * A Result type for explicit, type-safe error handling.
 *
 * Expected outcomes that can fail (a blocked cell, an unreachable goal, a
 * missing capability) come back as a Result. Programmer misuse throws.
 *
 * @example
 * ```typescript
 * const steps = pathfinder
 *   .findPath(start, goal)
 *   .map((path) => path.cost)
 *   .getOrThrow();
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly _value: T | undefined,
    private readonly _error: E | undefined,
    private readonly _isOk: boolean,
  ) {}

  /**
   * Create a successful Result containing a value.
   */
  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>(value, undefined, true);
  }

  /**
   * Create a failed Result containing an error.
   */
  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>(undefined, error, false);
  }

  isOk(): boolean {
    return this._isOk;
  }

  isErr(): boolean {
    return !this._isOk;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    if (this._isOk) {
      return Result.ok(fn(this._value as T));
    }
    return Result.err(this._error as E);
  }

  andThen<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    if (this._isOk) {
      return fn(this._value as T);
    }
    return Result.err(this._error as E);
  }

  getOrThrow(): T {
    if (this._isOk) {
      return this._value as T;
    }
    throw this._error;
  }

  tapErr(fn: (error: E) => void): Result<T, E> {
    if (!this._isOk) {
      fn(this._error as E);
    }
    return this;
  }

  get value(): T {
    if (!this._isOk) {
      throw new Error("Cannot access value of Err Result");
    }
    return this._value as T;
  }

  get error(): E {
    if (this._isOk) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this._error as E;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
