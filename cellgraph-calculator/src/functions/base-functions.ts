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
import { ValueType, FloatUnion, IntUnion, BoolUnion, IsNumeric } from 'cellgraph-base-types';

import type { FunctionMap } from '../descriptors';
import { DivideByZeroError, NumError, ValueError } from '../function-error';
import * as Utils from '../utilities';

const MILLISECONDS_PER_DAY = 24 * 60 * 60 * 1000;

/** date serial 0 */
const DATE_EPOCH = Date.UTC(1899, 11, 30);

/**
 * collect numbers from arguments and ranges. only actual numbers count;
 * text, booleans and empty cells are skipped, including text passed
 * directly (`SUM("5",1)` is 1). returns the first error, if there is one.
 */
const CollectNumbers = (args: UnionValue[]): number[]|UnionValue => {

  const numbers: number[] = [];

  for (const value of Utils.FlattenBoxed(args)) {
    if (value.type === ValueType.error) {
      return value;
    }
    if (IsNumeric(value)) {
      numbers.push(value.value);
    }
  }

  return numbers;

};

/**
 * read a numeric argument for the single-value math functions
 */
const NumberArgument = (value: UnionValue|undefined, default_value = 0): number|UnionValue => {
  if (!value) {
    return default_value;
  }
  const number = Utils.CoerceNumber(value);
  if (Utils.IsErrorUnion(number)) {
    return number;
  }
  return Number.isFinite(number) ? number : ValueError();
};

/** wrap a float result, checking for overflow/NaN */
const Result = (value: number): UnionValue => Number.isFinite(value) ? FloatUnion(value) : NumError();

/**
 * rounding helper. `fn` rounds a non-negative value; we apply it to the
 * magnitude so rounding is symmetric around zero.
 */
const RoundTo = (value: number, digits: number, fn: (x: number) => number): number => {
  const m = Math.pow(10, digits);
  const sign = value < 0 ? -1 : 1;

  // toPrecision drops representation noise (1.005 * 100 = 100.49999...)
  return sign * fn(Number((Math.abs(value) * m).toPrecision(15))) / m;
};

/**
 * fold booleans for AND/OR. text is skipped in ranges but an error as
 * a direct argument; empty cells are skipped.
 */
const CollectBooleans = (args: UnionValue[]): boolean[]|UnionValue => {

  const result: boolean[] = [];

  for (const arg of args) {
    const in_range = arg.type === ValueType.array;
    for (const value of Utils.FlattenBoxed([arg])) {
      if (value.type === ValueType.undefined || (in_range && value.type === ValueType.string)) {
        continue;
      }
      const test = Utils.CoerceBoolean(value);
      if (Utils.IsErrorUnion(test)) {
        return test;
      }
      result.push(test);
    }
  }

  if (!result.length) {
    return ValueError();
  }

  return result;

};

export const BaseFunctionLibrary: FunctionMap = {

  Sum: {
    description: 'Adds arguments and ranges',
    arguments: [{ name: 'values or ranges', repeat: true }],
    fn: (args: UnionValue[]): UnionValue => {
      const numbers = CollectNumbers(args);
      if (!Array.isArray(numbers)) {
        return numbers;
      }
      return Result(numbers.reduce((a, b) => a + b, 0));
    },
  },

  Average: {
    description: 'Returns the arithmetic mean of all numeric arguments',
    arguments: [{ name: 'values or ranges', repeat: true }],
    fn: (args: UnionValue[]): UnionValue => {
      const numbers = CollectNumbers(args);
      if (!Array.isArray(numbers)) {
        return numbers;
      }
      if (!numbers.length) {
        return DivideByZeroError();
      }
      return Result(numbers.reduce((a, b) => a + b, 0) / numbers.length);
    },
  },

  Min: {
    description: 'Returns the smallest numeric argument',
    arguments: [{ name: 'values or ranges', repeat: true }],
    fn: (args: UnionValue[]): UnionValue => {
      const numbers = CollectNumbers(args);
      if (!Array.isArray(numbers)) {
        return numbers;
      }
      if (!numbers.length) {
        return ValueError();
      }
      return FloatUnion(numbers.reduce((a, b) => Math.min(a, b)));
    },
  },

  Max: {
    description: 'Returns the largest numeric argument',
    arguments: [{ name: 'values or ranges', repeat: true }],
    fn: (args: UnionValue[]): UnionValue => {
      const numbers = CollectNumbers(args);
      if (!Array.isArray(numbers)) {
        return numbers;
      }
      if (!numbers.length) {
        return ValueError();
      }
      return FloatUnion(numbers.reduce((a, b) => Math.max(a, b)));
    },
  },

  Count: {
    description: 'Counts cells that contain numbers',
    arguments: [{ name: 'values or ranges', repeat: true, allow_error: true }],
    fn: (args: UnionValue[]): UnionValue => {
      return IntUnion(Utils.FlattenBoxed(args).reduce((a, value) => IsNumeric(value) ? a + 1 : a, 0));
    },
  },

  CountA: {
    description: 'Counts cells that are not empty',
    arguments: [{ name: 'values or ranges', repeat: true, allow_error: true }],
    fn: (args: UnionValue[]): UnionValue => {
      return IntUnion(Utils.FlattenBoxed(args).reduce((a, value) =>
        value.type === ValueType.undefined ? a : a + 1, 0));
    },
  },

  Product: {
    description: 'Multiplies arguments and ranges',
    arguments: [{ name: 'values or ranges', repeat: true }],
    fn: (args: UnionValue[]): UnionValue => {
      const numbers = CollectNumbers(args);
      if (!Array.isArray(numbers)) {
        return numbers;
      }
      return Result(numbers.reduce((a, b) => a * b, 1));
    },
  },

  If: {
    description: 'Returns one value or another, depending on a test',
    arguments: [
      { name: 'test value' },
      { name: 'value if true', allow_error: true },
      { name: 'value if false', allow_error: true, optional: true },
    ],
    fn: (args: UnionValue[]): UnionValue => {

      const [test, if_true] = args;
      const if_false = args.length > 2 ? args[2] : BoolUnion(false);

      // an array test selects elementwise. the branches can be arrays
      // too, in which case we take the matching element.

      const Select = (condition: UnionValue, row: number, column: number): UnionValue => {
        const truthy = Utils.CoerceBoolean(condition);
        if (Utils.IsErrorUnion(truthy)) {
          return truthy;
        }
        const branch = truthy ? if_true : if_false;
        if (branch.type === ValueType.array) {
          return branch.value[row]?.[column] || ValueError();
        }
        return branch;
      };

      if (test.type === ValueType.array) {
        return {
          type: ValueType.array,
          value: test.value.map((cells, row) => cells.map((cell, column) => Select(cell, row, column))),
        };
      }

      const truthy = Utils.CoerceBoolean(test);
      if (Utils.IsErrorUnion(truthy)) {
        return truthy;
      }
      return truthy ? if_true : if_false;

    },
  },

  IfError: {
    description: 'Returns the original value, or the alternate value if the original value is an error',
    arguments: [
      { name: 'original value', allow_error: true },
      { name: 'alternate value', allow_error: true },
    ],
    fn: ([value, alternate]: UnionValue[]): UnionValue => {
      return value.type === ValueType.error ? alternate : value;
    },
  },

  And: {
    description: 'Returns true if all arguments are true',
    arguments: [{ name: 'logical values', repeat: true }],
    fn: (args: UnionValue[]): UnionValue => {
      const values = CollectBooleans(args);
      return Array.isArray(values) ? BoolUnion(values.every(value => value)) : values;
    },
  },

  Or: {
    description: 'Returns true if any argument is true',
    arguments: [{ name: 'logical values', repeat: true }],
    fn: (args: UnionValue[]): UnionValue => {
      const values = CollectBooleans(args);
      return Array.isArray(values) ? BoolUnion(values.some(value => value)) : values;
    },
  },

  Not: {
    arguments: [{ name: 'logical value' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const test = Utils.CoerceBoolean(value);
      return Utils.IsErrorUnion(test) ? test : BoolUnion(!test);
    },
  },

  Abs: {
    description: 'Returns the absolute value of a number',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      if (value.type === ValueType.integer) {
        return IntUnion(Math.abs(value.value));
      }
      const number = NumberArgument(value);
      return typeof number === 'number' ? FloatUnion(Math.abs(number)) : number;
    },
  },

  Round: {
    description: 'Round to a specified number of digits',
    arguments: [{ name: 'value to round' }, { name: 'digits', optional: true }],
    fn: ([value, digits]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      const places = NumberArgument(digits);
      if (typeof number !== 'number') { return number; }
      if (typeof places !== 'number') { return places; }
      return Result(RoundTo(number, Math.trunc(places), Math.round));
    },
  },

  RoundUp: {
    description: 'Round away from zero',
    arguments: [{ name: 'value to round' }, { name: 'digits', optional: true }],
    fn: ([value, digits]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      const places = NumberArgument(digits);
      if (typeof number !== 'number') { return number; }
      if (typeof places !== 'number') { return places; }
      return Result(RoundTo(number, Math.trunc(places), Math.ceil));
    },
  },

  RoundDown: {
    description: 'Round toward zero',
    arguments: [{ name: 'value to round' }, { name: 'digits', optional: true }],
    fn: ([value, digits]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      const places = NumberArgument(digits);
      if (typeof number !== 'number') { return number; }
      if (typeof places !== 'number') { return places; }
      return Result(RoundTo(number, Math.trunc(places), Math.floor));
    },
  },

  Int: {
    description: 'Round down to the nearest integer',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      return typeof number === 'number' ? IntUnion(Math.floor(number)) : number;
    },
  },

  Mod: {
    description: 'Returns the remainder after division. The result has the sign of the divisor',
    arguments: [{ name: 'number' }, { name: 'divisor' }],
    fn: ([a, b]: UnionValue[]): UnionValue => {
      const number = NumberArgument(a);
      const divisor = NumberArgument(b);
      if (typeof number !== 'number') { return number; }
      if (typeof divisor !== 'number') { return divisor; }
      if (divisor === 0) {
        return DivideByZeroError();
      }
      return Result(number - divisor * Math.floor(number / divisor));
    },
  },

  Power: {
    description: 'Returns base raised to the given power',
    arguments: [{ name: 'base' }, { name: 'exponent' }],
    fn: ([a, b]: UnionValue[]): UnionValue => {
      const base = NumberArgument(a);
      const exponent = NumberArgument(b);
      if (typeof base !== 'number') { return base; }
      if (typeof exponent !== 'number') { return exponent; }
      return Result(Math.pow(base, exponent));
    },
  },

  Sqrt: {
    description: 'Returns the square root of the argument',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      if (typeof number !== 'number') { return number; }
      if (number < 0) {
        return NumError();
      }
      return FloatUnion(Math.sqrt(number));
    },
  },

  Trunc: {
    description: 'Truncates a number toward zero',
    arguments: [{ name: 'number' }, { name: 'digits', optional: true }],
    fn: ([value, digits]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      const places = NumberArgument(digits);
      if (typeof number !== 'number') { return number; }
      if (typeof places !== 'number') { return places; }
      const multiplier = Math.pow(10, Math.floor(places));
      return Result(Math.trunc(number * multiplier) / multiplier);
    },
  },

  Sign: {
    description: 'Returns -1, 0 or 1 depending on the sign of the argument',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      if (typeof number !== 'number') { return number; }
      return IntUnion(number > 0 ? 1 : number < 0 ? -1 : 0);
    },
  },

  Even: {
    description: 'Rounds away from zero to the nearest even integer',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      if (typeof number !== 'number') { return number; }
      const rounded = Math.ceil(Math.abs(number));
      const result = rounded % 2 ? rounded + 1 : rounded;
      return IntUnion(number < 0 ? -result : result);
    },
  },

  Odd: {
    description: 'Rounds away from zero to the nearest odd integer',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      if (typeof number !== 'number') { return number; }
      const rounded = Math.ceil(Math.abs(number));
      const result = rounded % 2 ? rounded : rounded + 1;
      return IntUnion(number < 0 ? -result : result);
    },
  },

  PI: {
    arguments: [],
    fn: (): UnionValue => FloatUnion(Math.PI),
  },

  Exp: {
    description: 'Returns e raised to the given power',
    arguments: [{ name: 'exponent' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      return typeof number === 'number' ? Result(Math.exp(number)) : number;
    },
  },

  Ln: {
    description: 'Returns the natural logarithm of a number',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      if (typeof number !== 'number') { return number; }
      return number > 0 ? FloatUnion(Math.log(number)) : NumError();
    },
  },

  Log: {
    description: 'Returns the logarithm of a number in the given base (default 10)',
    arguments: [{ name: 'number' }, { name: 'base', optional: true }],
    fn: ([value, base_value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      const base = NumberArgument(base_value, 10);
      if (typeof number !== 'number') { return number; }
      if (typeof base !== 'number') { return base; }
      if (number <= 0 || base <= 0 || base === 1) {
        return NumError();
      }
      return FloatUnion(base === 10 ? Math.log10(number) : Math.log(number) / Math.log(base));
    },
  },

  Log10: {
    description: 'Returns the base-10 logarithm of a number',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      if (typeof number !== 'number') { return number; }
      return number > 0 ? FloatUnion(Math.log10(number)) : NumError();
    },
  },

  Fact: {
    description: 'Returns the factorial of a number',
    arguments: [{ name: 'number' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const number = NumberArgument(value);
      if (typeof number !== 'number') { return number; }

      // 171! is past the float range

      const n = Math.floor(number);
      if (n < 0 || n > 170) {
        return NumError();
      }
      let result = 1;
      for (let i = 2; i <= n; i++) {
        result *= i;
      }
      return Number.isSafeInteger(result) ? IntUnion(result) : FloatUnion(result);
    },
  },

  Date: {
    description: 'Returns a date serial number (days since 1899-12-30)',
    arguments: [{ name: 'year' }, { name: 'month' }, { name: 'day' }],
    fn: ([year_value, month_value, day_value]: UnionValue[]): UnionValue => {

      const year = NumberArgument(year_value);
      const month = NumberArgument(month_value);
      const day = NumberArgument(day_value);
      if (typeof year !== 'number') { return year; }
      if (typeof month !== 'number') { return month; }
      if (typeof day !== 'number') { return day; }

      const y = Math.floor(year);
      const m = Math.floor(month);
      const d = Math.floor(day);

      // setUTCFullYear, not Date.UTC, which maps years 0-99 to 19xx. the
      // date has to come back unchanged; Date rolls over days past the
      // end of the month and we don't.

      const date = new Date(0);
      date.setUTCFullYear(y, m - 1, d);

      if (date.getUTCFullYear() !== y || date.getUTCMonth() !== m - 1 || date.getUTCDate() !== d) {
        return ValueError();
      }

      return FloatUnion((date.getTime() - DATE_EPOCH) / MILLISECONDS_PER_DAY);

    },
  },

};
