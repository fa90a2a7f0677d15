/*
 *  Copyright 2019 Yuriy Bogomolov
 *
 *  Licensed under the Apache License, Version 2.0 (the "License");
 *  you may not use this file except in compliance with the License.
 *  You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 *  Unless required by applicable law or agreed to in writing, software
 *  distributed under the License is distributed on an "AS IS" BASIS,
 *  WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 *  See the License for the specific language governing permissions and
 *  limitations under the License.
 */

import { Either, fold, left, right } from 'fp-ts/lib/Either';
import { constVoid, identity, pipe } from 'fp-ts/lib/function';

import { ErrorType, isUncheckedFailure, UncheckedError } from './error';
import { requireNonNull } from './require';

/**
 * A plain function from the argument tuple `A` to `R`.
 */
export type Operation<A extends ReadonlyArray<unknown>, R> = (...args: A) => R;

const isDeclared = <X>(e: unknown): e is X => !isUncheckedFailure(e);

const raise = (e: unknown): never => {
  throw e;
};

/**
 * Runs `f`, yielding either the declared error it failed with or its result.
 * Unchecked failures are rethrown untouched, so that they never reach the error channel.
 * Every transformation below is built on top of this function.
 * @param f Function to run
 */
export const attempt = <A extends ReadonlyArray<unknown>, R, X>(f: Operation<A, R>) =>
  (...args: A): Either<X, R> => {
    try {
      return right(f(...args));
    } catch (e) {
      if (isDeclared<X>(e)) {
        return left(e);
      }
      throw e;
    }
  };

/**
 * Throw the result of `errorMapper` instead of a declared error.
 * @param f Base function
 * @param errorMapper Function to transform the declared error
 */
export const rethrowAs = <A extends ReadonlyArray<unknown>, R, X, E>(
  f: Operation<A, R>,
  errorMapper: (x: X) => E,
): Operation<A, R> => {
  requireNonNull(errorMapper, 'errorMapper');
  return (...args) => pipe(
    attempt<A, R, X>(f)(...args),
    fold<X, R, R>((x) => raise(errorMapper(x)), identity),
  );
};

/**
 * Recover from a declared error with the result of `errorHandler`.
 * A failure of `errorHandler` itself is relayed to the caller.
 * @param f Base function
 * @param errorHandler Function to run on the declared error
 */
export const handleWith = <A extends ReadonlyArray<unknown>, R, X>(
  f: Operation<A, R>,
  errorHandler: (x: X) => R,
): Operation<A, R> => {
  requireNonNull(errorHandler, 'errorHandler');
  return (...args) => pipe(
    attempt<A, R, X>(f)(...args),
    fold<X, R, R>(errorHandler, identity),
  );
};

/**
 * Discard a declared error and run `fallback` with the original arguments.
 * @param f Base function
 * @param fallback Function of the same shape as `f`
 */
export const fallbackTo = <A extends ReadonlyArray<unknown>, R, X>(
  f: Operation<A, R>,
  fallback: Operation<A, R>,
): Operation<A, R> => {
  requireNonNull(fallback, 'fallback');
  return (...args) => pipe(
    attempt<A, R, X>(f)(...args),
    fold<X, R, R>(() => fallback(...args), identity),
  );
};

/**
 * Discard a declared error and the arguments, and return the result of `fallback`.
 * @param f Base function
 * @param fallback Function without arguments
 */
export const fallbackToGet = <A extends ReadonlyArray<unknown>, R, X>(
  f: Operation<A, R>,
  fallback: () => R,
): Operation<A, R> => {
  requireNonNull(fallback, 'fallback');
  return (...args) => pipe(
    attempt<A, R, X>(f)(...args),
    fold<X, R, R>(() => fallback(), identity),
  );
};

/**
 * Discard a declared error and return `fallback`.
 * @param f Base function
 * @param fallback Value to return, which may be `null` or `undefined`
 */
export const fallbackToValue = <A extends ReadonlyArray<unknown>, R, X>(
  f: Operation<A, R>,
  fallback: R,
): Operation<A, R> =>
  (...args) => pipe(
    attempt<A, R, X>(f)(...args),
    fold<X, R, R>(() => fallback, identity),
  );

/**
 * Discard a declared error and the result.
 * @param f Base function
 */
export const discard = <A extends ReadonlyArray<unknown>, R, X>(f: Operation<A, R>): Operation<A, void> =>
  (...args) => pipe(
    attempt<A, R, X>(f)(...args),
    fold<X, R, void>(constVoid, constVoid),
  );

/**
 * Wrap a declared error in an `UncheckedError` without a stack trace of its own.
 * @param f Base function
 */
export const uncheck = <A extends ReadonlyArray<unknown>, R, X>(f: Operation<A, R>): Operation<A, R> =>
  rethrowAs<A, R, X, UncheckedError>(f, UncheckedError.withoutStackTrace);

/**
 * Runs `f` with `args`. An `UncheckedError` thrown by `f` whose cause is an instance of `errorType`
 * is unwrapped and its cause thrown instead; anything else is relayed unmodified.
 * @param f Function to run
 * @param errorType Type of the declared error to recover
 * @param args Arguments of `f`
 */
export const invokeAndUnwrap = <A extends ReadonlyArray<unknown>, R, X>(
  f: Operation<A, R>,
  errorType: ErrorType<X>,
  ...args: A
): R => {
  requireNonNull(errorType, 'errorType');
  try {
    return f(...args);
  } catch (e) {
    if (e instanceof UncheckedError && e.cause instanceof errorType) {
      throw e.cause;
    }
    throw e;
  }
};

/**
 * Recover declared errors of type `errorType` from `UncheckedError`s thrown by `f`.
 * @see invokeAndUnwrap
 * @param f Plain function
 * @param errorType Type of the declared error to recover
 */
export const unwrapping = <A extends ReadonlyArray<unknown>, R, X>(
  f: Operation<A, R>,
  errorType: ErrorType<X>,
): Operation<A, R> => {
  requireNonNull(f, 'operation');
  requireNonNull(errorType, 'errorType');
  return (...args) => invokeAndUnwrap(f, errorType, ...args);
};

/**
 * Unfolds the `Either` returned by `f`, throwing the left value or returning the right one.
 * @param f Function returning `Either`
 */
export const unfold = <A extends ReadonlyArray<unknown>, R, X>(f: Operation<A, Either<X, R>>): Operation<A, R> => {
  requireNonNull(f, 'operation');
  return (...args) => pipe(
    f(...args),
    fold<X, R, R>(raise, identity),
  );
};
