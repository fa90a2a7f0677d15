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

export { ThrowingConsumer } from './consumer';
export { isUncheckedFailure, RuntimeError, UncheckedError, UnexpectedCauseError } from './error';
export type { ErrorType, UncheckedFailure } from './error';
export { ThrowingFunction } from './function';
export { ThrowingPredicate } from './predicate';
export type { Operation } from './protocol';
export * from './shapes';
export { Throwing } from './throwing';
export type { Lifted } from './throwing';
