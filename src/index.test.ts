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

import { expect } from 'chai';

import * as api from './index';

describe('Index suite', () => {
  it('exports the operation families and error classes', () => {
    expect(api).to.include.keys(
      'Throwing',
      'ThrowingConsumer',
      'ThrowingFunction',
      'ThrowingPredicate',
      'RuntimeError',
      'UncheckedError',
      'UnexpectedCauseError',
      'isUncheckedFailure',
    );
  });

  it('keeps the error-handling plumbing internal', () => {
    expect(api).not.to.have.any.keys(
      'requireNonNull',
      'runOf',
      'attempt',
      'rethrowAs',
      'handleWith',
      'fallbackTo',
      'fallbackToGet',
      'fallbackToValue',
      'discard',
      'uncheck',
      'invokeAndUnwrap',
      'unwrapping',
      'unfold',
    );
  });
});
