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

import { AssertionError } from 'node:assert';

import { RuntimeError, UncheckedError } from './error';

export class IOError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IOError';
  }
}

export class ParseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParseError';
  }
}

export class NotFoundError extends IOError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Failures which no combinator may intercept, one factory per kind.
 */
export const uncheckedFailures: ReadonlyArray<{ kind: string; create: (message: string) => unknown }> = [
  { kind: 'TypeError', create: (message) => new TypeError(message) },
  { kind: 'RangeError', create: (message) => new RangeError(message) },
  { kind: 'ReferenceError', create: (message) => new ReferenceError(message) },
  { kind: 'RuntimeError', create: (message) => new RuntimeError(message) },
  { kind: 'UncheckedError', create: (message) => UncheckedError.withoutStackTrace(new IOError('wrapped'), message) },
  { kind: 'AssertionError', create: (message) => new AssertionError({ message }) },
  { kind: 'null', create: () => null },
  { kind: 'undefined', create: () => undefined },
];

/**
 * A function which records the arguments of every call.
 */
export interface Spy<A extends ReadonlyArray<unknown>, R> {
  (...args: A): R;
  readonly calls: A[];
}

export const spy = <A extends ReadonlyArray<unknown>, R>(f: (...args: A) => R): Spy<A, R> => {
  const calls: A[] = [];
  const recorder = (...args: A): R => {
    calls.push(args);
    return f(...args);
  };
  return Object.assign(recorder, { calls });
};

/**
 * Runs `f` and returns what it throws.
 */
export const thrownBy = (f: () => unknown): unknown => {
  try {
    f();
  } catch (e) {
    return e;
  }
  throw new Error('nothing was thrown');
};

/**
 * Calls `method` on `target` with `null`, bypassing the compile-time argument checks.
 */
export const callWithNull = (target: object, method: PropertyKey, ...rest: unknown[]): unknown =>
  Reflect.apply(Reflect.get(target, method), target, [null, ...rest]);
