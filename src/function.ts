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

import { Either } from 'fp-ts/lib/Either';

import { ErrorType } from './error';
import {
  fallbackTo,
  fallbackToGet,
  fallbackToValue,
  handleWith,
  invokeAndUnwrap,
  Operation,
  rethrowAs,
  unfold,
  unwrapping,
} from './protocol';
import { requireNonNull } from './require';
import { Lifted, runOf, Throwing } from './throwing';

/**
 * ThrowingFunction – a function from the arguments `A` to `R` which may fail with a declared error of type `X`.
 * Suppliers, unary and binary operators are `ThrowingFunction`s of zero, one and two arguments.
 *
 * @template A argument tuple
 * @template R result type
 * @template X declared error type
 */
export class ThrowingFunction<A extends ReadonlyArray<unknown>, R, X> extends Throwing<A, R, X> {
  private constructor(run: Operation<A, R>) { super(run); }

  /**
   * Compose current function with the next one.
   * Errors of either function are relayed to the caller.
   * @param after Function to apply to the result of current function
   */
  andThen<V>(after: Lifted<[R], V, X>): ThrowingFunction<A, V, X> {
    const next = runOf(after, 'after');
    return new ThrowingFunction<A, V, X>((...args) => next(this._run(...args)));
  }

  /**
   * Compose `before` with current single-argument function.
   * Errors of either function are relayed to the caller.
   * @param before Function whose result current function is applied to
   */
  compose<T, B extends ReadonlyArray<unknown>>(
    this: ThrowingFunction<[T], R, X>,
    before: Lifted<B, T, X>,
  ): ThrowingFunction<B, R, X> {
    const previous = runOf(before, 'before');
    return new ThrowingFunction<B, R, X>((...args) => this._run(previous(...args)));
  }

  /**
   * Throw the result of `errorMapper` for any declared error.
   * @param errorMapper Function to transform the declared error
   */
  onErrorThrowAsChecked<E>(errorMapper: (x: X) => E): ThrowingFunction<A, R, E> {
    return new ThrowingFunction<A, R, E>(rethrowAs<A, R, X, E>(this._run, errorMapper));
  }

  /**
   * Return the result of `errorHandler` for any declared error. The handler may fail with errors of its own.
   * @param errorHandler Function to apply to the declared error
   */
  onErrorHandleChecked<E = never>(errorHandler: Lifted<[X], R, E>): ThrowingFunction<A, R, E> {
    return new ThrowingFunction<A, R, E>(handleWith<A, R, X>(this._run, runOf(errorHandler, 'errorHandler')));
  }

  /**
   * Returns a plain function which returns the result of `errorHandler` for any declared error.
   * @param errorHandler Function to apply to the declared error
   */
  onErrorHandleUnchecked(errorHandler: (x: X) => R): Operation<A, R> {
    return handleWith<A, R, X>(this._run, errorHandler);
  }

  /**
   * Discard any declared error and apply `fallback` to the original arguments.
   * @param fallback Function to apply instead
   */
  onErrorApplyChecked<E = never>(fallback: Lifted<A, R, E>): ThrowingFunction<A, R, E> {
    return new ThrowingFunction<A, R, E>(fallbackTo<A, R, X>(this._run, runOf(fallback, 'fallback')));
  }

  /**
   * Returns a plain function which discards any declared error and applies `fallback` to the original arguments.
   * @param fallback Function to apply instead
   */
  onErrorApplyUnchecked(fallback: Operation<A, R>): Operation<A, R> {
    return fallbackTo<A, R, X>(this._run, fallback);
  }

  /**
   * Discard any declared error and return the result of `fallback`.
   * @param fallback Supplier of the result
   */
  onErrorGetChecked<E = never>(fallback: Lifted<[], R, E>): ThrowingFunction<A, R, E> {
    return new ThrowingFunction<A, R, E>(fallbackToGet<A, R, X>(this._run, runOf(fallback, 'fallback')));
  }

  /**
   * Returns a plain function which discards any declared error and returns the result of `fallback`.
   * @param fallback Supplier of the result
   */
  onErrorGetUnchecked(fallback: () => R): Operation<A, R> {
    return fallbackToGet<A, R, X>(this._run, fallback);
  }

  /**
   * Returns a plain function which discards any declared error and returns `fallback`.
   * @param fallback Value to return
   */
  onErrorReturn(fallback: R): Operation<A, R> {
    return fallbackToValue<A, R, X>(this._run, fallback);
  }

  /**
   * Turn a function into a `ThrowingFunction` declaring `X`.
   * A `ThrowingFunction` is returned as it is.
   * @param operation Function or operation to convert
   */
  static of<A extends ReadonlyArray<unknown>, R, X>(operation: Lifted<A, R, X>): ThrowingFunction<A, R, X> {
    const checked = requireNonNull(operation, 'operation');
    return checked instanceof ThrowingFunction ? checked : new ThrowingFunction<A, R, X>(runOf(checked, 'operation'));
  }

  /**
   * A function which returns its argument.
   */
  static identity<T, X = never>(): ThrowingFunction<[T], T, X> {
    return new ThrowingFunction<[T], T, X>((t) => t);
  }

  /**
   * Use a plain function where a `ThrowingFunction` is expected.
   * Without `errorType` nothing is recovered and the declared error type is `never`;
   * with it, declared errors of that type are recovered from any `UncheckedError` the function throws.
   * @param operation Plain function
   * @param errorType Type of the declared error to recover
   */
  static checked<A extends ReadonlyArray<unknown>, R>(operation: Operation<A, R>): ThrowingFunction<A, R, never>;
  static checked<A extends ReadonlyArray<unknown>, R, X>(
    operation: Operation<A, R>,
    errorType: ErrorType<X>,
  ): ThrowingFunction<A, R, X>;
  static checked<A extends ReadonlyArray<unknown>, R, X>(
    operation: Operation<A, R>,
    errorType?: ErrorType<X>,
  ): ThrowingFunction<A, R, X> {
    const run = requireNonNull(operation, 'operation');
    return new ThrowingFunction<A, R, X>(arguments.length < 2 ? run : unwrapping(run, requireNonNull(errorType, 'errorType')));
  }

  /**
   * Returns a plain function which wraps any declared error of `operation` in an `UncheckedError`.
   * @param operation Operation to convert
   */
  static unchecked<A extends ReadonlyArray<unknown>, R, X>(operation: ThrowingFunction<A, R, X>): Operation<A, R> {
    return requireNonNull(operation, 'operation').unchecked();
  }

  /**
   * Applies `operation`, recovering declared errors of type `errorType` from an `UncheckedError`.
   * @param operation Plain function
   * @param errorType Type of the declared error to recover
   * @param args Arguments of `operation`
   */
  static invokeAndUnwrap<A extends ReadonlyArray<unknown>, R, X>(
    operation: Operation<A, R>,
    errorType: ErrorType<X>,
    ...args: A
  ): R {
    return invokeAndUnwrap(requireNonNull(operation, 'operation'), errorType, ...args);
  }

  /**
   * Create a `ThrowingFunction` from a function which reports a declared error as the left side of `Either`.
   * @param operation Function returning `Either`
   */
  static fromEither<A extends ReadonlyArray<unknown>, R, X>(operation: Operation<A, Either<X, R>>): ThrowingFunction<A, R, X> {
    return new ThrowingFunction<A, R, X>(unfold<A, R, X>(operation));
  }
}
