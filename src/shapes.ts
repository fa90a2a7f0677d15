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

import { ThrowingConsumer } from './consumer';
import { ThrowingFunction } from './function';
import { ThrowingPredicate } from './predicate';

// Plain counterparts

export type Runnable = () => void;
export type Supplier<R> = () => R;
export type BooleanSupplier = Supplier<boolean>;
export type NumberSupplier = Supplier<number>;
export type BigIntSupplier = Supplier<bigint>;

export type Consumer<T> = (t: T) => void;
export type BiConsumer<T, U> = (t: T, u: U) => void;
export type NumberConsumer = Consumer<number>;
export type BigIntConsumer = Consumer<bigint>;
export type ObjNumberConsumer<T> = BiConsumer<T, number>;
export type ObjBigIntConsumer<T> = BiConsumer<T, bigint>;

export type Func<T, R> = (t: T) => R;
export type BiFunc<T, U, R> = (t: T, u: U) => R;
export type UnaryOperator<T> = Func<T, T>;
export type BinaryOperator<T> = BiFunc<T, T, T>;

export type Predicate<T> = (t: T) => boolean;
export type BiPredicate<T, U> = (t: T, u: U) => boolean;

// Throwing consumers

export type ThrowingRunnable<X> = ThrowingConsumer<[], X>;
export type ThrowingUnaryConsumer<T, X> = ThrowingConsumer<[T], X>;
export type ThrowingBiConsumer<T, U, X> = ThrowingConsumer<[T, U], X>;
export type ThrowingNumberConsumer<X> = ThrowingConsumer<[number], X>;
export type ThrowingBigIntConsumer<X> = ThrowingConsumer<[bigint], X>;
export type ThrowingObjNumberConsumer<T, X> = ThrowingConsumer<[T, number], X>;
export type ThrowingObjBigIntConsumer<T, X> = ThrowingConsumer<[T, bigint], X>;

// Throwing suppliers

export type ThrowingSupplier<R, X> = ThrowingFunction<[], R, X>;
export type ThrowingNumberSupplier<X> = ThrowingFunction<[], number, X>;
export type ThrowingBigIntSupplier<X> = ThrowingFunction<[], bigint, X>;
export type ThrowingBooleanSupplier<X> = ThrowingPredicate<[], X>;

// Throwing functions

export type ThrowingUnaryFunction<T, R, X> = ThrowingFunction<[T], R, X>;
export type ThrowingBiFunction<T, U, R, X> = ThrowingFunction<[T, U], R, X>;
export type ThrowingNumberFunction<R, X> = ThrowingFunction<[number], R, X>;
export type ThrowingBigIntFunction<R, X> = ThrowingFunction<[bigint], R, X>;
export type ThrowingToNumberFunction<T, X> = ThrowingFunction<[T], number, X>;
export type ThrowingToBigIntFunction<T, X> = ThrowingFunction<[T], bigint, X>;
export type ThrowingToNumberBiFunction<T, U, X> = ThrowingFunction<[T, U], number, X>;
export type ThrowingToBigIntBiFunction<T, U, X> = ThrowingFunction<[T, U], bigint, X>;
export type ThrowingNumberToBigIntFunction<X> = ThrowingFunction<[number], bigint, X>;
export type ThrowingBigIntToNumberFunction<X> = ThrowingFunction<[bigint], number, X>;

// Throwing operators

export type ThrowingUnaryOperator<T, X> = ThrowingFunction<[T], T, X>;
export type ThrowingBinaryOperator<T, X> = ThrowingFunction<[T, T], T, X>;
export type ThrowingNumberUnaryOperator<X> = ThrowingUnaryOperator<number, X>;
export type ThrowingNumberBinaryOperator<X> = ThrowingBinaryOperator<number, X>;
export type ThrowingBigIntUnaryOperator<X> = ThrowingUnaryOperator<bigint, X>;
export type ThrowingBigIntBinaryOperator<X> = ThrowingBinaryOperator<bigint, X>;

// Throwing predicates

export type ThrowingUnaryPredicate<T, X> = ThrowingPredicate<[T], X>;
export type ThrowingBiPredicate<T, U, X> = ThrowingPredicate<[T, U], X>;
export type ThrowingNumberPredicate<X> = ThrowingPredicate<[number], X>;
export type ThrowingBigIntPredicate<X> = ThrowingPredicate<[bigint], X>;
