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
 * Returns `value`, or throws a `TypeError` naming the argument if it is `null` or `undefined`.
 */
export const requireNonNull = <T>(value: T, name: string): NonNullable<T> => {
  if (value === null || value === undefined) {
    throw new TypeError(`${name} must not be null or undefined`);
  }
  return value;
};
