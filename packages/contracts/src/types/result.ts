/**
 * A Result type for explicit, type-safe error handling.
 *
 * Fallible grid operations return a Result so the caller decides whether a
 * failure is fatal (`getOrThrow`) or handled (`match`, `getOrElse`).
 *
 * @example
 * ```typescript
 * const map = OrthoMap.create(32, 32, tiles)
 *   .mapErr((err) => new Error(`bad map: ${err.message}`))
 *   .getOrThrow();
 * ```
 */

type ResultState<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  /**
   * Create a successful Result containing a value.
   */
  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  /**
   * Create a failed Result containing an error.
   */
  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Run a function that might throw. `onError` maps the thrown value to `E`;
   * it may rethrow values it does not recognise.
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
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    const { state } = this;
    return state.ok ? Result.ok(fn(state.value)) : Result.err(state.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    const { state } = this;
    return state.ok ? Result.ok(state.value) : Result.err(fn(state.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    const { state } = this;
    return state.ok ? fn(state.value) : Result.err(state.error);
  }

  getOrElse(defaultValue: T): T {
    return this.state.ok ? this.state.value : defaultValue;
  }

  getOrThrow(): T {
    const { state } = this;
    if (state.ok) {
      return state.value;
    }
    throw state.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    const { state } = this;
    return state.ok ? onOk(state.value) : onErr(state.error);
  }

  toJSON(): { success: true; value: T } | { success: false; error: E } {
    const { state } = this;
    return state.ok
      ? { success: true, value: state.value }
      : { success: false, error: state.error };
  }

  get success(): boolean {
    return this.state.ok;
  }

  get value(): T {
    const { state } = this;
    if (!state.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return state.value;
  }

  get error(): E {
    const { state } = this;
    if (state.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return state.error;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;

export type ResultOk<R> = R extends Result<infer T, unknown> ? T : never;
export type ResultErr<R> = R extends Result<unknown, infer E> ? E : never;
