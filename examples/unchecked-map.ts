import { ThrowingFunction, ThrowingPredicate, ThrowingToNumberFunction } from '../src';

class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

const parse: ThrowingToNumberFunction<string, ParseError> = ThrowingFunction.of((s: string) => {
  const n = Number(s);
  if (s.trim().length === 0 || Number.isNaN(n)) {
    throw new ParseError(`not a number: '${s}'`);
  }
  return n;
});

const isPositive = ThrowingPredicate.checked((n: number) => n > 0);

const sumPositive = ThrowingFunction.checked(
  (values: string[]) => values.map(parse.unchecked()).filter(isPositive.unchecked()).reduce((a, b) => a + b, 0),
  ParseError,
);

console.log(sumPositive.run(['1', '-2', '3.5'])); // 4.5
console.log(sumPositive.either(['1', 'two', '3'])); // { _tag: 'Left', left: ParseError: not a number: 'two' }
console.log(parse.onErrorReturn(0)('two')); // 0
