/**
 * A Result type for fallible level operations (decoding, validation,
 * configuration building).
 *
 * Expected no-ops of the geometry engine (a full wall slot, an edge with no
 * fillable gap) are NOT Results: they are plain discriminated unions on the
 * engine side. Result is reserved for boundaries where input can be wrong.
 *
 * @example
 * ```typescript
 * const level = decodeLevel(text)
 *   .flatMap((decoded) => validateLevel(decoded, limits).map(() => decoded))
 *   .getOrThrow();
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly _value: T | undefined,
    private readonly _error: E | undefined,
    private readonly _isOk: boolean,
  ) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>(value, undefined, true);
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>(undefined, error, false);
  }

  /**
   * Run a function that might throw, mapping the thrown value to E.
   */
  static fromThrowable<T, E>(
    fn: () => T,
    onError: (e: unknown) => E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(onError(e));
    }
  }

  isOk(): boolean {
    return this._isOk;
  }

  isErr(): boolean {
    return !this._isOk;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.match(
      (value) => Result.ok<U, E>(fn(value)),
      (error) => Result.err<U, E>(error),
    );
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return this.match(
      (value) => Result.ok<T, F>(value),
      (error) => Result.err<T, F>(fn(error)),
    );
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return this.match(fn, (error) => Result.err<U, E>(error));
  }

  getOrElse(defaultValue: T): T {
    return this.match(
      (value) => value,
      () => defaultValue,
    );
  }

  getOrThrow(): T {
    return this.match(
      (value) => value,
      (error) => {
        throw error;
      },
    );
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    if (this._isOk) {
      return onOk(this._value as T);
    }
    return onErr(this._error as E);
  }

  get success(): boolean {
    return this._isOk;
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
