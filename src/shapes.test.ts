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

import { ThrowingConsumer } from './consumer';
import { UncheckedError, UnexpectedCauseError } from './error';
import { ThrowingFunction } from './function';
import { ThrowingPredicate } from './predicate';
import {
  BiConsumer,
  ThrowingBiConsumer,
  ThrowingBigIntBinaryOperator,
  ThrowingBigIntPredicate,
  ThrowingBooleanSupplier,
  ThrowingNumberToBigIntFunction,
  ThrowingNumberUnaryOperator,
  ThrowingObjNumberConsumer,
  ThrowingRunnable,
  ThrowingSupplier,
  ThrowingToNumberFunction,
  ThrowingUnaryFunction,
} from './shapes';
import { IOError, NotFoundError, ParseError, spy, thrownBy } from './test-fixtures';

describe('Shapes suite', () => {
  describe('bi-consumer', () => {
    const effects: Array<[number, number]> = [];
    const store: ThrowingBiConsumer<number, number, IOError> = ThrowingConsumer.of((a: number, b: number) => {
      if (a < 0) {
        throw new IOError('boom');
      }
      effects.push([a, b]);
    });

    beforeEach(() => {
      effects.length = 0;
    });

    it('performs the fallback with the original arguments on a declared error', () => {
      const fallback = spy((_a: number, _b: number) => undefined);
      const safeStore: BiConsumer<number, number> = store.onErrorAcceptUnchecked(fallback);

      expect(() => safeStore(-1, 5)).not.to.throw();
      expect(fallback.calls).to.deep.equal([[-1, 5]]);
      expect(effects).to.deep.equal([]);
    });

    it('performs the operation and skips the fallback on success', () => {
      const fallback = spy((_a: number, _b: number) => undefined);

      store.onErrorAcceptUnchecked(fallback)(1, 5);

      expect(effects).to.deep.equal([[1, 5]]);
      expect(fallback.calls).to.have.lengthOf(0);
    });
  });

  describe('runnable', () => {
    it('runs without arguments', () => {
      let count = 0;
      const increment: ThrowingRunnable<IOError> = ThrowingConsumer.of(() => {
        count++;
      });

      increment.andThen(increment).run();

      expect(count).to.equal(2);
    });
  });

  describe('object-number consumer', () => {
    it('accepts an object and a number', () => {
      const scores = new Map<string, number>();
      const record: ThrowingObjNumberConsumer<string, IOError> = ThrowingConsumer.of((name: string, score: number) => {
        scores.set(name, score);
      });

      record.run('foo', 42);

      expect(scores.get('foo')).to.equal(42);
    });
  });

  describe('supplier', () => {
    it('supplies a value or a fallback', () => {
      const values = ['foo'];
      const next: ThrowingSupplier<string, NotFoundError> = ThrowingFunction.of(() => {
        const value = values.shift();
        if (value === undefined) {
          throw new NotFoundError('no more values');
        }
        return value;
      });
      const nextOrDefault = next.onErrorReturn('default');

      expect(nextOrDefault()).to.equal('foo');
      expect(nextOrDefault()).to.equal('default');
    });

    it('supplies a boolean', () => {
      const ready: ThrowingBooleanSupplier<IOError> = ThrowingPredicate.of(() => true);

      expect(ready.negate().run()).to.equal(false);
    });
  });

  describe('number and bigint shapes', () => {
    const reciprocal: ThrowingNumberUnaryOperator<RangeError | ParseError> = ThrowingFunction.of((n: number) => {
      if (n === 0) {
        throw new ParseError('division by zero');
      }
      return 1 / n;
    });

    it('applies a number operator', () => {
      expect(reciprocal.run(4)).to.equal(0.25);
      expect(reciprocal.onErrorReturn(Number.POSITIVE_INFINITY)(0)).to.equal(Number.POSITIVE_INFINITY);
    });

    it('converts between number and bigint', () => {
      const toBigInt: ThrowingNumberToBigIntFunction<ParseError> = ThrowingFunction.of((n: number) => {
        if (!Number.isInteger(n)) {
          throw new ParseError(`not an integer: ${n}`);
        }
        return BigInt(n);
      });

      expect(toBigInt.run(42)).to.equal(42n);
      expect(toBigInt.onErrorGetUnchecked(() => 0n)(4.2)).to.equal(0n);
    });

    it('applies a bigint operator', () => {
      const divide: ThrowingBigIntBinaryOperator<ParseError> = ThrowingFunction.of((a: bigint, b: bigint) => {
        if (b === 0n) {
          throw new ParseError('division by zero');
        }
        return a / b;
      });

      expect(divide.run(7n, 2n)).to.equal(3n);
      expect(() => divide.run(7n, 0n)).to.throw(ParseError, 'division by zero');
    });

    it('tests a bigint', () => {
      const isEven: ThrowingBigIntPredicate<never> = ThrowingPredicate.checked((n: bigint) => n % 2n === 0n);

      expect(isEven.run(42n)).to.equal(true);
      expect(ThrowingPredicate.not(isEven).run(42n)).to.equal(false);
    });
  });

  describe('declared error type', () => {
    it('widens from never to any declared error', () => {
      const length: ThrowingToNumberFunction<string, IOError> = ThrowingFunction.checked((s: string) => s.length);
      const read: ThrowingUnaryFunction<string, string, IOError> = ThrowingFunction.of((path: string) => {
        throw new NotFoundError(path);
      });

      expect(read.andThen(length).onErrorReturn(-1)('foo')).to.equal(-1);
    });
  });

  describe('unchecked boundary', () => {
    const parse: ThrowingToNumberFunction<string, ParseError> = ThrowingFunction.of((s: string) => {
      const n = Number(s);
      if (s.trim().length === 0 || Number.isNaN(n)) {
        throw new ParseError(`not a number: ${s}`);
      }
      return n;
    });

    const sum = (values: string[]) => values.map(parse.unchecked()).reduce((a, b) => a + b, 0);

    it('passes values through a plain callback', () => {
      expect(ThrowingFunction.checked(sum, ParseError).run(['1', '2.5'])).to.equal(3.5);
    });

    it('recovers the declared error after the callback', () => {
      const thrown = thrownBy(() => ThrowingFunction.checked(sum, ParseError).run(['1', 'foo']));

      expect(thrown).to.be.an.instanceOf(ParseError).and.to.have.property('message').that.equals('not a number: foo');
    });

    it('recovers the declared error with throwCauseAs', () => {
      const thrown = thrownBy(() => {
        try {
          sum(['foo']);
        } catch (e) {
          if (e instanceof UncheckedError) {
            e.throwCauseAs(ParseError);
          }
          throw e;
        }
      });

      expect(thrown).to.be.an.instanceOf(ParseError);
    });

    it('fails with UnexpectedCauseError for another cause', () => {
      const thrown = thrownBy(() => {
        try {
          sum(['foo']);
        } catch (e) {
          if (e instanceof UncheckedError) {
            e.throwCauseAs(IOError);
          }
          throw e;
        }
      });

      expect(thrown).to.be.an.instanceOf(UnexpectedCauseError);
      expect(thrown).to.have.property('cause').that.is.an.instanceOf(ParseError);
    });
  });
});
