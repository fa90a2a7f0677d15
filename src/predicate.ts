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
 * ThrowingPredicate – a boolean-valued function of the arguments `A` which may fail with a declared error of type `X`.
 *
 * @template A argument tuple
 * @template X declared error type
 */
export class ThrowingPredicate<A extends ReadonlyArray<unknown>, X> extends Throwing<A, boolean, X> {
  private constructor(run: Operation<A, boolean>) { super(run); }

  /**
   * Short-circuiting logical AND of current predicate and `other`.
   * `other` is not tested if current predicate is `false` or fails.
   * @param other Predicate to AND with
   */
  and(other: Lifted<A, boolean, X>): ThrowingPredicate<A, X> {
    const test = runOf(other, 'other');
    return new ThrowingPredicate<A, X>((...args) => this._run(...args) && test(...args));
  }

  /**
   * Short-circuiting logical OR of current predicate and `other`.
   * `other` is not tested if current predicate is `true` or fails.
   * @param other Predicate to OR with
   */
  or(other: Lifted<A, boolean, X>): ThrowingPredicate<A, X> {
    const test = runOf(other, 'other');
    return new ThrowingPredicate<A, X>((...args) => this._run(...args) || test(...args));
  }

  /**
   * Logical negation of current predicate.
   */
  negate(): ThrowingPredicate<A, X> {
    return new ThrowingPredicate<A, X>((...args) => !this._run(...args));
  }

  /**
   * Throw the result of `errorMapper` for any declared error.
   * @param errorMapper Function to transform the declared error
   */
  onErrorThrowAsChecked<E>(errorMapper: (x: X) => E): ThrowingPredicate<A, E> {
    return new ThrowingPredicate<A, E>(rethrowAs<A, boolean, X, E>(this._run, errorMapper));
  }

  /**
   * Return the result of `errorHandler` for any declared error. The handler may fail with errors of its own.
   * @param errorHandler Function to apply to the declared error
   */
  onErrorHandleChecked<E = never>(errorHandler: Lifted<[X], boolean, E>): ThrowingPredicate<A, E> {
    return new ThrowingPredicate<A, E>(handleWith<A, boolean, X>(this._run, runOf(errorHandler, 'errorHandler')));
  }

  /**
   * Returns a plain function which returns the result of `errorHandler` for any declared error.
   * @param errorHandler Function to apply to the declared error
   */
  onErrorHandleUnchecked(errorHandler: (x: X) => boolean): Operation<A, boolean> {
    return handleWith<A, boolean, X>(this._run, errorHandler);
  }

  /**
   * Discard any declared error and test the original arguments with `fallback`.
   * @param fallback Predicate to test instead
   */
  onErrorTestChecked<E = never>(fallback: Lifted<A, boolean, E>): ThrowingPredicate<A, E> {
    return new ThrowingPredicate<A, E>(fallbackTo<A, boolean, X>(this._run, runOf(fallback, 'fallback')));
  }

  /**
   * Returns a plain function which discards any declared error and tests the original arguments with `fallback`.
   * @param fallback Predicate to test instead
   */
  onErrorTestUnchecked(fallback: Operation<A, boolean>): Operation<A, boolean> {
    return fallbackTo<A, boolean, X>(this._run, fallback);
  }

  /**
   * Discard any declared error and return the result of `fallback`.
   * @param fallback Supplier of the result
   */
  onErrorGetChecked<E = never>(fallback: Lifted<[], boolean, E>): ThrowingPredicate<A, E> {
    return new ThrowingPredicate<A, E>(fallbackToGet<A, boolean, X>(this._run, runOf(fallback, 'fallback')));
  }

  /**
   * Returns a plain function which discards any declared error and returns the result of `fallback`.
   * @param fallback Supplier of the result
   */
  onErrorGetUnchecked(fallback: () => boolean): Operation<A, boolean> {
    return fallbackToGet<A, boolean, X>(this._run, fallback);
  }

  /**
   * Returns a plain function which discards any declared error and returns `fallback`.
   * @param fallback Value to return
   */
  onErrorReturn(fallback: boolean): Operation<A, boolean> {
    return fallbackToValue<A, boolean, X>(this._run, fallback);
  }

  /**
   * Turn a boolean-valued function into a `ThrowingPredicate` declaring `X`.
   * A `ThrowingPredicate` is returned as it is.
   * @param operation Function or operation to convert
   */
  static of<A extends ReadonlyArray<unknown>, X>(operation: Lifted<A, boolean, X>): ThrowingPredicate<A, X> {
    const checked = requireNonNull(operation, 'operation');
    return checked instanceof ThrowingPredicate ? checked : new ThrowingPredicate<A, X>(runOf(checked, 'operation'));
  }

  /**
   * Logical negation of `target`.
   * @param target Predicate to negate
   */
  static not<A extends ReadonlyArray<unknown>, X>(target: Lifted<A, boolean, X>): ThrowingPredicate<A, X> {
    return ThrowingPredicate.of<A, X>(requireNonNull(target, 'target')).negate();
  }

  /**
   * Use a plain predicate where a `ThrowingPredicate` is expected.
   * Without `errorType` nothing is recovered and the declared error type is `never`;
   * with it, declared errors of that type are recovered from any `UncheckedError` the predicate throws.
   * @param operation Plain predicate
   * @param errorType Type of the declared error to recover
   */
  static checked<A extends ReadonlyArray<unknown>>(operation: Operation<A, boolean>): ThrowingPredicate<A, never>;
  static checked<A extends ReadonlyArray<unknown>, X>(
    operation: Operation<A, boolean>,
    errorType: ErrorType<X>,
  ): ThrowingPredicate<A, X>;
  static checked<A extends ReadonlyArray<unknown>, X>(
    operation: Operation<A, boolean>,
    errorType?: ErrorType<X>,
  ): ThrowingPredicate<A, X> {
    const run = requireNonNull(operation, 'operation');
    return new ThrowingPredicate<A, X>(arguments.length < 2 ? run : unwrapping(run, requireNonNull(errorType, 'errorType')));
  }

  /**
   * Returns a plain predicate which wraps any declared error of `operation` in an `UncheckedError`.
   * @param operation Predicate to convert
   */
  static unchecked<A extends ReadonlyArray<unknown>, X>(operation: ThrowingPredicate<A, X>): Operation<A, boolean> {
    return requireNonNull(operation, 'operation').unchecked();
  }

  /**
   * Tests `operation`, recovering declared errors of type `errorType` from an `UncheckedError`.
   * @param operation Plain predicate
   * @param errorType Type of the declared error to recover
   * @param args Arguments of `operation`
   */
  static invokeAndUnwrap<A extends ReadonlyArray<unknown>, X>(
    operation: Operation<A, boolean>,
    errorType: ErrorType<X>,
    ...args: A
  ): boolean {
    return invokeAndUnwrap(requireNonNull(operation, 'operation'), errorType, ...args);
  }

  /**
   * Create a `ThrowingPredicate` from a function which reports a declared error as the left side of `Either`.
   * @param operation Function returning `Either`
   */
  static fromEither<A extends ReadonlyArray<unknown>, X>(operation: Operation<A, Either<X, boolean>>): ThrowingPredicate<A, X> {
    return new ThrowingPredicate<A, X>(unfold<A, boolean, X>(operation));
  }
}
