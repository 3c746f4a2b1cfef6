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

import type { CellValue } from './value-type';
import { ValueType, ErrorType, GetValueType } from './value-type';

export interface NumberUnion {
  type: ValueType.number;
  value: number;
}

export interface IntegerUnion {
  type: ValueType.integer;
  value: number;
}

export interface StringUnion {
  type: ValueType.string;
  value: string;
}

export interface ErrorUnion {
  type: ValueType.error;
  value: ErrorType;
}

export interface BooleanUnion {
  type: ValueType.boolean;
  value: boolean;
}

export interface UndefinedUnion {
  type: ValueType.undefined;
  value?: undefined;
}

/**
 * potentially recursive structure. arrays are row-major: `value[row][column]`.
 * a 1D array is a single row.
 */
export interface ArrayUnion {
  type: ValueType.array;
  value: UnionValue[][];
}

/** discriminated union. implicit type guards! */
export type UnionValue
    = NumberUnion
    | IntegerUnion
    | ArrayUnion
    | StringUnion
    | UndefinedUnion
    | BooleanUnion
    | ErrorUnion
    ;

/** union of the two numeric types */
export type NumericUnion = NumberUnion | IntegerUnion;

/** type guard for either numeric type */
export const IsNumeric = (value: UnionValue): value is NumericUnion => {
  return value.type === ValueType.number || value.type === ValueType.integer;
};

// factories. these return new objects so nothing downstream can
// pollute a shared instance.

export const EmptyUnion = (): UndefinedUnion => ({ type: ValueType.undefined });

export const FloatUnion = (value: number): NumberUnion => ({ type: ValueType.number, value });

export const IntUnion = (value: number): IntegerUnion => ({ type: ValueType.integer, value: Math.trunc(value) });

export const TextUnion = (value: string): StringUnion => ({ type: ValueType.string, value });

export const BoolUnion = (value: boolean): BooleanUnion => ({ type: ValueType.boolean, value });

export const ErrorValueUnion = (value: ErrorType): ErrorUnion => ({ type: ValueType.error, value });

/**
 * box a raw storage value. JS numbers box as floats; callers that want
 * an integer should use IntUnion.
 */
export const Box = (value: CellValue): UnionValue => {

  switch (GetValueType(value)) {
    case ValueType.number:
      return FloatUnion(Number(value));

    case ValueType.string:
      return TextUnion(String(value));

    case ValueType.boolean:
      return BoolUnion(value === true);

    default:
      return EmptyUnion();
  }

};
