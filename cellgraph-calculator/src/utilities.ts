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

import type { ErrorUnion, UnionValue } from 'cellgraph-base-types';
import { ValueType, IsNumeric, EmptyUnion } from 'cellgraph-base-types';
import { ValueError, NumError } from './function-error';

/**
 * assuming boxed (union) arguments, return a flat list of values.
 * arrays flatten row-major.
 */
export const FlattenBoxed = (args: UnionValue[]): UnionValue[] => {

  const result: UnionValue[] = [];
  for (const arg of args) {
    if (arg.type === ValueType.array) {
      for (const row of arg.value) {
        result.push(...FlattenBoxed(row));
      }
    }
    else {
      result.push(arg);
    }
  }

  return result;

};

/**
 * 2D view of a value. scalars become a 1x1 table.
 */
export const ToTable = (value: UnionValue): UnionValue[][] => {
  if (value.type === ValueType.array) {
    return value.value;
  }
  return [[value]];
};

/** decimal numbers with an optional exponent. no hex, no `Infinity` */
const numeric_text = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * numeric parse for strings. whitespace is trimmed; empty strings are not
 * numbers. returns undefined if the text isn't a number.
 */
export const ParseNumber = (text: string): number|undefined => {
  const trimmed = text.trim();
  if (!numeric_text.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
};

/**
 * coerce for arithmetic. booleans are 1/0, empty is 0, strings are
 * parsed. anything else (or unparseable text) is `#VALUE!`, and errors
 * are returned as-is.
 */
export const CoerceNumber = (value: UnionValue): number|ErrorUnion => {
  switch (value.type) {
    case ValueType.integer:
    case ValueType.number:
      return value.value;

    case ValueType.boolean:
      return value.value ? 1 : 0;

    case ValueType.undefined:
      return 0;

    case ValueType.string:
      return ParseNumber(value.value) ?? ValueError();

    case ValueType.error:
      return value;

    default:
      return ValueError();
  }
};

/**
 * coerce for logical tests. numbers are true if nonzero; text must be
 * `TRUE` or `FALSE` (any case).
 */
export const CoerceBoolean = (value: UnionValue): boolean|ErrorUnion => {
  switch (value.type) {
    case ValueType.boolean:
      return value.value;

    case ValueType.integer:
    case ValueType.number:
      if (Number.isNaN(value.value)) {
        return NumError();
      }
      return value.value !== 0;

    case ValueType.undefined:
      return false;

    case ValueType.string:
      {
        const upper = value.value.trim().toUpperCase();
        if (upper === 'TRUE') { return true; }
        if (upper === 'FALSE') { return false; }
        return ValueError();
      }

    case ValueType.error:
      return value;

    default:
      return ValueError();
  }
};

/**
 * coerce for text functions and concatenation. arrays use their first
 * element.
 */
export const CoerceText = (value: UnionValue): string|ErrorUnion => {
  switch (value.type) {
    case ValueType.undefined:
      return '';

    case ValueType.string:
      return value.value;

    case ValueType.integer:
    case ValueType.number:
      return String(value.value);

    case ValueType.boolean:
      return value.value ? 'TRUE' : 'FALSE';

    case ValueType.error:
      return value;

    case ValueType.array:
      return CoerceText(value.value[0]?.[0] || EmptyUnion());
  }
};

/** type guard, for the coercion results above */
export const IsErrorUnion = (value: unknown): value is ErrorUnion => {
  return typeof value === 'object' && !!value
    && 'type' in value && value.type === ValueType.error;
};

const Sign = (value: number): number => value < 0 ? -1 : value > 0 ? 1 : 0;

const CompareStrings = (a: string, b: string): number => a < b ? -1 : a > b ? 1 : 0;

/**
 * compare two scalars. numbers compare numerically regardless of int
 * or float. a string compared with a number is parsed; if it parses we
 * compare numerically, otherwise we compare the number's text lexically.
 * string comparison is case-sensitive unless `icase` is set.
 *
 * empty compares as zero against numbers, as the empty string against
 * text and as false against booleans.
 *
 * returns undefined if the values can't be ordered (booleans against
 * numbers or text, errors and arrays).
 */
export const CompareValues = (a: UnionValue, b: UnionValue, icase = false): number|undefined => {

  if (a.type === ValueType.undefined && b.type === ValueType.undefined) {
    return 0;
  }

  if (a.type === ValueType.undefined) {
    switch (b.type) {
      case ValueType.integer:
      case ValueType.number:
        return Sign(0 - b.value);
      case ValueType.string:
        return b.value ? -1 : 0;
      case ValueType.boolean:
        return b.value ? -1 : 0;
      default:
        return undefined;
    }
  }

  if (b.type === ValueType.undefined) {
    const reverse = CompareValues(b, a, icase);
    return reverse === undefined ? undefined : -reverse;
  }

  if (IsNumeric(a)) {
    if (IsNumeric(b)) {
      return Sign(a.value - b.value);
    }
    if (b.type === ValueType.string) {
      const parsed = ParseNumber(b.value);
      if (parsed !== undefined) {
        return Sign(a.value - parsed);
      }
      return CompareStrings(String(a.value), b.value);
    }
    return undefined;
  }

  if (a.type === ValueType.string) {
    if (b.type === ValueType.string) {
      return icase ?
        CompareStrings(a.value.toLowerCase(), b.value.toLowerCase()) :
        CompareStrings(a.value, b.value);
    }
    if (IsNumeric(b)) {
      const reverse = CompareValues(b, a, icase);
      return reverse === undefined ? undefined : -reverse;
    }
    return undefined;
  }

  if (a.type === ValueType.boolean && b.type === ValueType.boolean) {
    return Sign(Number(a.value) - Number(b.value));
  }

  return undefined;

};

/**
 * comparison for lookups. same as CompareValues, except that empty
 * never matches and never orders: lookups skip empty cells.
 */
export const LookupCompare = (candidate: UnionValue, lookup: UnionValue, icase = false): number|undefined => {
  if (candidate.type === ValueType.undefined || lookup.type === ValueType.undefined) {
    return undefined;
  }
  return CompareValues(candidate, lookup, icase);
};

/** exact match for lookups. empty never matches anything, even empty. */
export const LookupEquals = (candidate: UnionValue, lookup: UnionValue, icase = false): boolean => {
  return LookupCompare(candidate, lookup, icase) === 0;
};

type WildcardToken = { type: 'any' } | { type: 'one' } | { type: 'literal', char: string };

const TokenizeWildcard = (pattern: string): WildcardToken[] => {

  const tokens: WildcardToken[] = [];
  const chars = Array.from(pattern);

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];
    if (char === '~' || char === '\\') {
      // escape: next char is literal. a trailing escape is itself literal
      tokens.push({ type: 'literal', char: i + 1 < chars.length ? chars[++i] : char });
    }
    else if (char === '*') {
      tokens.push({ type: 'any' });
    }
    else if (char === '?') {
      tokens.push({ type: 'one' });
    }
    else {
      tokens.push({ type: 'literal', char });
    }
  }

  return tokens;

};

/**
 * wildcard match. `*` matches any sequence, `?` matches one character,
 * and `~` or `\` escapes the next character. the whole text must match.
 */
export const WildcardMatch = (pattern: string, text: string, icase = false): boolean => {

  if (icase) {
    pattern = pattern.toLowerCase();
    text = text.toLowerCase();
  }

  const chars = Array.from(text);

  // matched[i] means the tokens so far match the first i characters

  let matched: boolean[] = new Array(chars.length + 1).fill(false);
  matched[0] = true;

  for (const token of TokenizeWildcard(pattern)) {

    const next: boolean[] = new Array(chars.length + 1).fill(false);

    switch (token.type) {
      case 'any':
        {
          let seen = false;
          for (let i = 0; i <= chars.length; i++) {
            seen = seen || matched[i];
            next[i] = seen;
          }
        }
        break;

      case 'one':
        for (let i = 0; i < chars.length; i++) {
          next[i + 1] = matched[i];
        }
        break;

      case 'literal':
        for (let i = 0; i < chars.length; i++) {
          next[i + 1] = matched[i] && chars[i] === token.char;
        }
        break;
    }

    matched = next;
  }

  return matched[chars.length];

};

/**
 * read an integer argument, truncating. returns an error for anything
 * that isn't a finite number.
 */
export const IntegerArgument = (value: UnionValue): number|ErrorUnion => {
  const number = CoerceNumber(value);
  if (IsErrorUnion(number)) {
    return number;
  }
  if (!Number.isFinite(number)) {
    return ValueError();
  }
  return Math.trunc(number);
};

/**
 * optional argument. returns undefined if the argument was omitted, or
 * written as a missing argument (`FN(1,,2)`).
 */
export const OptionalArgument = (args: UnionValue[], index: number): UnionValue|undefined => {
  if (index >= args.length || args[index].type === ValueType.undefined) {
    return undefined;
  }
  return args[index];
};

/**
 * wrap a single-argument function so it applies elementwise if the
 * argument is an array.
 */
export const ApplyAsArray = (base: (value: UnionValue) => UnionValue) => {
  return ([value]: UnionValue[]): UnionValue => {
    if (value.type === ValueType.array) {
      return {
        type: ValueType.array,
        value: value.value.map(row => row.map(element => base(element))),
      };
    }
    return base(value);
  };
};
