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

/**
 * A constructor of errors of type `X`, used for runtime type tests when unwrapping.
 */
export type ErrorType<X> = abstract new (...args: never[]) => X;

/**
 * Base class of failures which are never treated as a declared error.
 * Extend it for errors that signal a programming mistake rather than an expected outcome.
 */
export class RuntimeError extends Error {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * String form of a thrown value. Values which cannot be converted, such as objects without a prototype,
 * are described by their object tag.
 */
const describeCause = (cause: unknown): string => {
  try {
    return String(cause);
  } catch {
    return Object.prototype.toString.call(cause);
  }
};

/**
 * Thrown when a wrapped cause is not an instance of any of the requested error types.
 */
export class UnexpectedCauseError extends RuntimeError {
  constructor(cause: unknown) {
    super(`Unexpected error thrown: ${describeCause(cause)}`, { cause });
  }
}

const requireCause = (cause: unknown): void => {
  if (cause === null || cause === undefined) {
    throw new TypeError('cause must not be null or undefined');
  }
};

const requireErrorType = (errorType: unknown, name: string): void => {
  if (typeof errorType !== 'function') {
    throw new TypeError(`${name} must be an error constructor`);
  }
};

const withoutCapture = <T>(create: () => T): T => {
  const limit = Error.stackTraceLimit;
  Error.stackTraceLimit = 0;
  try {
    return create();
  } finally {
    Error.stackTraceLimit = limit;
  }
};

/**
 * Carries a declared error through code that only accepts plain functions.
 * The original error is available as `cause`, and can be rethrown with `throwCauseAs`.
 *
 * @example
 * const read = ThrowingFunction.of<[string], string, IOError>(readConfig);
 *
 * try {
 *   paths.map(read.unchecked());
 * } catch (e) {
 *   if (e instanceof UncheckedError) {
 *     e.throwCauseAs(IOError);
 *   }
 *   throw e;
 * }
 */
export class UncheckedError extends RuntimeError {
  private constructor(message: string, cause: unknown) {
    super(message, { cause });
  }

  /**
   * Wraps `cause`, capturing a stack trace at the wrap site.
   * @param cause The error to wrap
   * @param message Defaults to the string form of `cause`
   */
  static withStackTrace(cause: unknown, message?: string): UncheckedError {
    requireCause(cause);
    return new UncheckedError(message ?? describeCause(cause), cause);
  }

  /**
   * Wraps `cause` without capturing a stack trace of its own, which makes the wrapper cheap to create.
   * The stack of the created error consists of its header line only.
   * @param cause The error to wrap
   * @param message Defaults to the string form of `cause`
   */
  static withoutStackTrace(cause: unknown, message?: string): UncheckedError {
    requireCause(cause);
    return withoutCapture(() => new UncheckedError(message ?? describeCause(cause), cause));
  }

  /**
   * Throws the wrapped cause if it is an instance of `errorType`, or an `UnexpectedCauseError` otherwise.
   */
  throwCauseAs<X>(errorType: ErrorType<X>): never {
    requireErrorType(errorType, 'errorType');
    if (this.cause instanceof errorType) {
      throw this.cause;
    }
    throw new UnexpectedCauseError(this.cause);
  }

  /**
   * Throws the wrapped cause if it is an instance of one of the given error types, checked in order,
   * or an `UnexpectedCauseError` otherwise.
   */
  throwCauseAsOneOf<X1, X2, X3 = never>(
    errorType1: ErrorType<X1>,
    errorType2: ErrorType<X2>,
    errorType3?: ErrorType<X3>,
  ): never {
    requireErrorType(errorType1, 'errorType1');
    requireErrorType(errorType2, 'errorType2');
    if (errorType3 !== undefined) {
      requireErrorType(errorType3, 'errorType3');
    }

    const cause = this.cause;
    if (cause instanceof errorType1 || cause instanceof errorType2) {
      throw cause;
    }
    if (errorType3 !== undefined && cause instanceof errorType3) {
      throw cause;
    }
    throw new UnexpectedCauseError(cause);
  }
}

const nativeErrors: ReadonlyArray<ErrorType<Error>> = [
  TypeError,
  RangeError,
  ReferenceError,
  SyntaxError,
  EvalError,
  URIError,
];

/**
 * Whether `e` is a failure that no combinator may intercept: a `RuntimeError`, one of the engine's own
 * error classes, an assertion failure, or a thrown `null` or `undefined`, which no `UncheckedError` can carry.
 * Everything else that can be thrown is a declared error.
 */
export const isUncheckedFailure = (e: unknown): boolean =>
  e === null ||
  e === undefined ||
  e instanceof RuntimeError ||
  nativeErrors.some((type) => e instanceof type) ||
  (e instanceof Error && e.name === 'AssertionError');

/**
 * Failures which may be thrown by `onErrorThrowAsUnchecked` mappers.
 */
export type UncheckedFailure = RuntimeError | TypeError | RangeError | ReferenceError | SyntaxError | EvalError | URIError;
