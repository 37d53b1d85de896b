/**
 * Type-Safe Result Pattern
 *
 * Outcomes that are expected to fail (provider calls) travel as values
 * instead of exceptions, so the caller must branch on them.
 *
 * @module
 */

/** Success result */
export interface Ok<T> {
  readonly _tag: "Ok";
  readonly value: T;
}

/** Error result */
export interface Err<E> {
  readonly _tag: "Err";
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

export const ok = <T>(value: T): Ok<T> => ({ _tag: "Ok", value });

export const err = <E>(error: E): Err<E> => ({ _tag: "Err", error });

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result._tag === "Ok";

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => result._tag === "Err";
