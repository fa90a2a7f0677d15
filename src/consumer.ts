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
  discard,
  fallbackTo,
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
 * ThrowingConsumer – an operation which accepts the arguments `A`, returns no result,
 * and may fail with a declared error of type `X`.
 *
 * @template A argument tuple
 * @template X declared error type
 */
export class ThrowingConsumer<A extends ReadonlyArray<unknown>, X> extends Throwing<A, void, X> {
  private constructor(run: Operation<A, void>) { super(run); }

  /**
   * Perform current operation followed by `after`, with the same arguments.
   * Errors of either operation are relayed; `after` is skipped if current operation fails.
   * @param after Operation to perform next
   */
  andThen(after: Lifted<A, void, X>): ThrowingConsumer<A, X> {
    const next = runOf(after, 'after');
    return new ThrowingConsumer<A, X>((...args) => {
      this._run(...args);
      next(...args);
    });
  }

  /**
   * Throw the result of `errorMapper` for any declared error.
   * @param errorMapper Function to transform the declared error
   */
  onErrorThrowAsChecked<E>(errorMapper: (x: X) => E): ThrowingConsumer<A, E> {
    return new ThrowingConsumer<A, E>(rethrowAs<A, void, X, E>(this._run, errorMapper));
  }

  /**
   * Handle any declared error with `errorHandler`, which may fail with errors of its own.
   * @param errorHandler Operation to perform on the declared error
   */
  onErrorHandleChecked<E = never>(errorHandler: Lifted<[X], void, E>): ThrowingConsumer<A, E> {
    return new ThrowingConsumer<A, E>(handleWith<A, void, X>(this._run, runOf(errorHandler, 'errorHandler')));
  }

  /**
   * Returns a plain function which handles any declared error with `errorHandler`.
   * @param errorHandler Function to run on the declared error
   */
  onErrorHandleUnchecked(errorHandler: (x: X) => void): Operation<A, void> {
    return handleWith<A, void, X>(this._run, errorHandler);
  }

  /**
   * Discard any declared error and perform `fallback` with the original arguments.
   * @param fallback Operation to perform instead
   */
  onErrorAcceptChecked<E = never>(fallback: Lifted<A, void, E>): ThrowingConsumer<A, E> {
    return new ThrowingConsumer<A, E>(fallbackTo<A, void, X>(this._run, runOf(fallback, 'fallback')));
  }

  /**
   * Returns a plain function which discards any declared error and performs `fallback` with the original arguments.
   * @param fallback Function to run instead
   */
  onErrorAcceptUnchecked(fallback: Operation<A, void>): Operation<A, void> {
    return fallbackTo<A, void, X>(this._run, fallback);
  }

  /**
   * Returns a plain function which discards any declared error.
   */
  onErrorDiscard(): Operation<A, void> {
    return discard<A, void, X>(this._run);
  }

  /**
   * Turn a consumer-shaped function into a `ThrowingConsumer` declaring `X`.
   * A `ThrowingConsumer` is returned as it is.
   * @param operation Function or operation to convert
   */
  static of<A extends ReadonlyArray<unknown>, X>(operation: Lifted<A, void, X>): ThrowingConsumer<A, X> {
    const checked = requireNonNull(operation, 'operation');
    return checked instanceof ThrowingConsumer ? checked : new ThrowingConsumer<A, X>(runOf(checked, 'operation'));
  }

  /**
   * Use a plain function where a `ThrowingConsumer` is expected.
   * Without `errorType` nothing is recovered and the declared error type is `never`;
   * with it, declared errors of that type are recovered from any `UncheckedError` the function throws.
   * @param operation Plain function
   * @param errorType Type of the declared error to recover
   */
  static checked<A extends ReadonlyArray<unknown>>(operation: Operation<A, void>): ThrowingConsumer<A, never>;
  static checked<A extends ReadonlyArray<unknown>, X>(
    operation: Operation<A, void>,
    errorType: ErrorType<X>,
  ): ThrowingConsumer<A, X>;
  static checked<A extends ReadonlyArray<unknown>, X>(
    operation: Operation<A, void>,
    errorType?: ErrorType<X>,
  ): ThrowingConsumer<A, X> {
    const run = requireNonNull(operation, 'operation');
    return new ThrowingConsumer<A, X>(arguments.length < 2 ? run : unwrapping(run, requireNonNull(errorType, 'errorType')));
  }

  /**
   * Returns a plain function which wraps any declared error of `operation` in an `UncheckedError`.
   * @param operation Operation to convert
   */
  static unchecked<A extends ReadonlyArray<unknown>, X>(operation: ThrowingConsumer<A, X>): Operation<A, void> {
    return requireNonNull(operation, 'operation').unchecked();
  }

  /**
   * Performs `operation`, recovering declared errors of type `errorType` from an `UncheckedError`.
   * @param operation Plain function
   * @param errorType Type of the declared error to recover
   * @param args Arguments of `operation`
   */
  static invokeAndUnwrap<A extends ReadonlyArray<unknown>, X>(
    operation: Operation<A, void>,
    errorType: ErrorType<X>,
    ...args: A
  ): void {
    invokeAndUnwrap(requireNonNull(operation, 'operation'), errorType, ...args);
  }

  /**
   * Create a `ThrowingConsumer` from a function which reports a declared error as the left side of `Either`.
   * @param operation Function returning `Either`
   */
  static fromEither<A extends ReadonlyArray<unknown>, X>(operation: Operation<A, Either<X, void>>): ThrowingConsumer<A, X> {
    return new ThrowingConsumer<A, X>(unfold<A, void, X>(operation));
  }
}
