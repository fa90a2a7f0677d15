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

import { UncheckedFailure } from './error';
import { attempt, Operation, rethrowAs, uncheck } from './protocol';
import { requireNonNull } from './require';

/**
 * Throwing – a function from `A` to `R` which may fail with a declared error of type `X`.
 * Unchecked failures (see `isUncheckedFailure`) are never part of `X`, and no combinator intercepts them.
 *
 * @template A argument tuple
 * @template R result type
 * @template X declared error type
 */
export abstract class Throwing<A extends ReadonlyArray<unknown>, R, X> {
  protected constructor(readonly _run: Operation<A, R>) {
    requireNonNull(_run, 'operation');
  }

  /**
   * Executes current operation, relaying its result or any error it throws.
   * @param args Arguments of the operation
   */
  run = (...args: A): R => this._run(...args);

  /**
   * Executes current operation, yielding either the declared error it failed with or its result.
   * Unchecked failures are still thrown.
   * @param args Arguments of the operation
   */
  either = (...args: A): Either<X, R> => attempt<A, R, X>(this._run)(...args);

  /**
   * Returns a plain function which throws the result of `errorMapper` for any declared error.
   * @param errorMapper Function to transform the declared error into an unchecked failure
   */
  onErrorThrowAsUnchecked<E extends UncheckedFailure>(errorMapper: (x: X) => E): Operation<A, R> {
    return rethrowAs<A, R, X, E>(this._run, errorMapper);
  }

  /**
   * Returns a plain function which wraps any declared error in an `UncheckedError` without a stack trace.
   */
  unchecked(): Operation<A, R> {
    return uncheck<A, R, X>(this._run);
  }
}

/**
 * Either a throwing operation or a plain function of the same shape.
 * Plain functions are trusted to throw nothing but errors of type `X`.
 */
export type Lifted<A extends ReadonlyArray<unknown>, R, X> = Throwing<A, R, X> | Operation<A, R>;

/**
 * Returns the function to run for `op`, failing with a `TypeError` if it is missing.
 * @param op Throwing operation or plain function
 * @param name Argument name to report
 */
export const runOf = <A extends ReadonlyArray<unknown>, R, X>(op: Lifted<A, R, X>, name: string): Operation<A, R> => {
  const checked = requireNonNull(op, name);
  return checked instanceof Throwing ? checked._run : checked;
};
