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
import { ValueType, IntUnion, FloatUnion, TextUnion, BoolUnion } from 'cellgraph-base-types';

import type { FunctionMap } from '../descriptors';
import { ValueError } from '../function-error';
import * as Utils from '../utilities';

/**
 * apply a string -> string function to a single text argument
 */
const TextTransform = (fn: (text: string) => string) => {
  return ([value]: UnionValue[]): UnionValue => {
    const text = Utils.CoerceText(value);
    return Utils.IsErrorUnion(text) ? text : TextUnion(fn(text));
  };
};

/**
 * shared implementation for LEFT/RIGHT. counts are in characters (code
 * points), not UTF-16 units.
 */
const Substring = (value: UnionValue, count_value: UnionValue|undefined, from_end: boolean): UnionValue => {

  const text = Utils.CoerceText(value);
  if (Utils.IsErrorUnion(text)) {
    return text;
  }

  let count = 1;
  if (count_value) {
    const integer = Utils.IntegerArgument(count_value);
    if (Utils.IsErrorUnion(integer)) {
      return integer;
    }
    count = integer;
  }

  if (count < 0) {
    return ValueError();
  }

  const chars = Array.from(text);
  return TextUnion(from_end ?
    chars.slice(Math.max(0, chars.length - count)).join('') :
    chars.slice(0, count).join(''));

};

export const TextFunctionLibrary: FunctionMap = {

  Concatenate: {
    description: 'Pastes strings together',
    arguments: [{ name: 'text', repeat: true }],
    fn: (args: UnionValue[]): UnionValue => {

      // ranges concatenate all their values, row-major

      let result = '';
      for (const value of Utils.FlattenBoxed(args)) {
        const text = Utils.CoerceText(value);
        if (Utils.IsErrorUnion(text)) {
          return text;
        }
        result += text;
      }
      return TextUnion(result);

    },
  },

  Len: {
    description: 'Returns the length of a string, in characters',
    arguments: [{ name: 'text' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      const text = Utils.CoerceText(value);
      return Utils.IsErrorUnion(text) ? text : IntUnion(Array.from(text).length);
    },
  },

  Left: {
    arguments: [{ name: 'text' }, { name: 'count', optional: true }],
    fn: (args: UnionValue[]): UnionValue => Substring(args[0], Utils.OptionalArgument(args, 1), false),
  },

  Right: {
    arguments: [{ name: 'text' }, { name: 'count', optional: true }],
    fn: (args: UnionValue[]): UnionValue => Substring(args[0], Utils.OptionalArgument(args, 1), true),
  },

  Upper: {
    arguments: [{ name: 'text' }],
    fn: TextTransform(text => text.toUpperCase()),
  },

  Lower: {
    arguments: [{ name: 'text' }],
    fn: TextTransform(text => text.toLowerCase()),
  },

  Trim: {
    description: 'Removes leading and trailing spaces, and collapses runs of spaces',
    arguments: [{ name: 'text' }],
    fn: TextTransform(text => text.trim().replace(/ {2,}/g, ' ')),
  },

  Proper: {
    description: 'Capitalizes the first letter of each word',
    arguments: [{ name: 'text' }],
    fn: TextTransform(text => text.toLowerCase().replace(/(^|[^a-z])([a-z])/g,
      (_, prefix: string, letter: string) => prefix + letter.toUpperCase())),
  },

  Exact: {
    description: 'Compares two strings, case-sensitive',
    arguments: [{ name: 'text' }, { name: 'text' }],
    fn: ([a, b]: UnionValue[]): UnionValue => {
      const x = Utils.CoerceText(a);
      if (Utils.IsErrorUnion(x)) { return x; }
      const y = Utils.CoerceText(b);
      if (Utils.IsErrorUnion(y)) { return y; }
      return BoolUnion(x === y);
    },
  },

  Value: {
    description: 'Parses text as a number',
    arguments: [{ name: 'text' }],
    fn: ([value]: UnionValue[]): UnionValue => {
      if (value.type === ValueType.integer || value.type === ValueType.number) {
        return value;
      }
      const number = Utils.CoerceNumber(value);
      return Utils.IsErrorUnion(number) ? number : FloatUnion(number);
    },
  },

};
