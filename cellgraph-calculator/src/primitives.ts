/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2024 trebco, llc. 
 * info@treb.app
 * 
 */

import type { UnionValue } from 'cellgraph-base-types';
import { ValueType, FloatUnion, BoolUnion, TextUnion } from 'cellgraph-base-types';
import type { BinaryOperator } from 'cellgraph-parser';
import { DivideByZeroError, NumError, ValueError } from './function-error';
import { CoerceNumber, CoerceText, CompareValues, IsErrorUnion } from './utilities';

export type PrimitiveBinaryExpression = (a: UnionValue, b: UnionValue) => UnionValue;

/**
 * wrap a numeric function. operands are coerced, errors in operands
 * are returned (left first). the result is always a float; results that
 * aren't finite are `#NUM!`.
 */
const Arithmetic = (fn: (x: number, y: number) => number): PrimitiveBinaryExpression => {
  return (a: UnionValue, b: UnionValue): UnionValue => {

    const x = CoerceNumber(a);
    if (IsErrorUnion(x)) { return x; }

    const y = CoerceNumber(b);
    if (IsErrorUnion(y)) { return y; }

    const value = fn(x, y);
    return Number.isFinite(value) ? FloatUnion(value) : NumError();
  };
};

export const Add = Arithmetic((x, y) => x + y);

export const Subtract = Arithmetic((x, y) => x - y);

export const Multiply = Arithmetic((x, y) => x * y);

export const Power = Arithmetic((x, y) => Math.pow(x, y));

export const Divide = (a: UnionValue, b: UnionValue): UnionValue => {

  const x = CoerceNumber(a);
  if (IsErrorUnion(x)) { return x; }

  const y = CoerceNumber(b);
  if (IsErrorUnion(y)) { return y; }

  if (y === 0) {
    return DivideByZeroError();
  }

  const value = x / y;
  return Number.isFinite(value) ? FloatUnion(value) : NumError();
};

export const Concatenate = (a: UnionValue, b: UnionValue): UnionValue => {

  const x = CoerceText(a);
  if (IsErrorUnion(x)) { return x; }

  const y = CoerceText(b);
  if (IsErrorUnion(y)) { return y; }

  return TextUnion(x + y);
};

/**
 * equality never fails: values that can't be compared are not equal.
 */
export const Equals = (a: UnionValue, b: UnionValue): UnionValue => {
  if (a.type === ValueType.error) { return a; }
  if (b.type === ValueType.error) { return b; }
  return BoolUnion(CompareValues(a, b) === 0);
};

export const NotEquals = (a: UnionValue, b: UnionValue): UnionValue => {
  if (a.type === ValueType.error) { return a; }
  if (b.type === ValueType.error) { return b; }
  return BoolUnion(CompareValues(a, b) !== 0);
};

/**
 * ordering comparisons return `#VALUE!` if the values can't be ordered.
 */
const Ordering = (test: (comparison: number) => boolean): PrimitiveBinaryExpression => {
  return (a: UnionValue, b: UnionValue): UnionValue => {

    if (a.type === ValueType.error) { return a; }
    if (b.type === ValueType.error) { return b; }

    const comparison = CompareValues(a, b);
    if (comparison === undefined) {
      return ValueError();
    }

    return BoolUnion(test(comparison));
  };
};

export const GreaterThan = Ordering(comparison => comparison > 0);

export const GreaterThanEqual = Ordering(comparison => comparison >= 0);

export const LessThan = Ordering(comparison => comparison < 0);

export const LessThanEqual = Ordering(comparison => comparison <= 0);

const operators: Record<BinaryOperator, PrimitiveBinaryExpression> = {
  '+': Add,
  '-': Subtract,
  '*': Multiply,
  '/': Divide,
  '^': Power,
  '&': Concatenate,
  '=': Equals,
  '<>': NotEquals,
  '>': GreaterThan,
  '>=': GreaterThanEqual,
  '<': LessThan,
  '<=': LessThanEqual,
};

export const MapOperator = (operator: BinaryOperator): PrimitiveBinaryExpression => operators[operator];
