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
import { Area, ValueType, IntUnion, EmptyUnion } from 'cellgraph-base-types';
import { MAX_ROWS, MAX_COLUMNS } from 'cellgraph-parser';

import type { FunctionMap } from '../descriptors';
import { NAError, ReferenceError, ValueError } from '../function-error';
import {
  ToTable, FlattenBoxed, CoerceBoolean, IntegerArgument, OptionalArgument,
  IsErrorUnion, LookupCompare, LookupEquals, WildcardMatch } from '../utilities';

/**
 * binary search over a sorted list. returns the index of the last entry
 * that is <= the lookup value (ascending) or >= the lookup value
 * (descending), or -1 if there's no such entry.
 *
 * the list is assumed to be sorted. if it isn't, the result is some
 * entry; we don't check.
 */
export const BinarySearch = (values: UnionValue[], lookup: UnionValue, descending = false, icase = false): number => {

  let low = 0;
  let high = values.length;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const comparison = LookupCompare(values[mid], lookup, icase);
    const before = comparison !== undefined && (descending ? comparison >= 0 : comparison <= 0);
    if (before) {
      low = mid + 1;
    }
    else {
      high = mid;
    }
  }

  return low - 1;

};

/**
 * linear scan for an exact match, first occurrence. returns -1 if
 * not found.
 */
export const LinearSearch = (values: UnionValue[], lookup: UnionValue, icase = false): number => {
  for (let i = 0; i < values.length; i++) {
    if (LookupEquals(values[i], lookup, icase)) {
      return i;
    }
  }
  return -1;
};

/**
 * the 4th argument to VLOOKUP/HLOOKUP. omitted or true means the table
 * is sorted and we want the closest match; false means exact match.
 */
const ApproximateArgument = (value: UnionValue|undefined): boolean|UnionValue => {
  if (!value) {
    return true;
  }
  return CoerceBoolean(value);
};

/**
 * shared implementation for VLOOKUP and HLOOKUP. we search `keys` and
 * return from `results(index)`, which has the result index applied.
 */
const TableLookup = (
    lookup: UnionValue,
    keys: UnionValue[],
    approximate_argument: UnionValue|undefined,
    result: (match: number) => UnionValue): UnionValue => {

  const approximate = ApproximateArgument(approximate_argument);
  if (typeof approximate !== 'boolean') {
    return approximate;
  }

  const match = approximate ? BinarySearch(keys, lookup) : LinearSearch(keys, lookup);
  if (match < 0) {
    return NAError();
  }

  return result(match);

};

/**
 * result for XLOOKUP. the lookup array is a column or a row; for a
 * column we return the matching row of the return array, for a row
 * the matching column. single values are returned as scalars.
 */
const XLookupResult = (table: UnionValue[][], vertical: boolean, index: number): UnionValue => {

  if (vertical) {
    const row = table[index];
    return row.length === 1 ? row[0] : { type: ValueType.array, value: [row.slice(0)] };
  }

  if (table.length === 1) {
    return table[0][index];
  }

  return { type: ValueType.array, value: table.map(row => [row[index]]) };

};

/**
 * XLOOKUP search, returns the matching index or -1. match modes are
 * 0 (exact), -1 (exact or next smaller), 1 (exact or next larger) and
 * 2 (wildcard). search modes are 1 (first to last), -1 (last to first)
 * and 2/-2 (binary search, ascending/descending).
 */
const XLookupSearch = (
    values: UnionValue[],
    lookup: UnionValue,
    match_mode: number,
    search_mode: number,
    icase: boolean): number|UnionValue => {

  if (search_mode === 2 || search_mode === -2) {

    if (match_mode === 2) {
      return ValueError();
    }

    const descending = search_mode === -2;
    const index = BinarySearch(values, lookup, descending, icase);

    if (index >= 0 && LookupEquals(values[index], lookup, icase)) {
      return index;
    }

    // index is the last entry on the "before" side. the entry after it
    // is the first one past the lookup value.

    const after = index + 1 < values.length ? index + 1 : -1;

    if (descending) {
      return match_mode === 1 ? index : match_mode === -1 ? after : -1;
    }
    return match_mode === -1 ? index : match_mode === 1 ? after : -1;

  }

  const order: number[] = values.map((_, index) => index);
  if (search_mode === -1) {
    order.reverse();
  }

  if (match_mode === 2) {
    if (lookup.type !== ValueType.string) {
      return ValueError();
    }
    for (const index of order) {
      const candidate = values[index];
      if (candidate.type === ValueType.string && WildcardMatch(lookup.value, candidate.value, icase)) {
        return index;
      }
    }
    return -1;
  }

  for (const index of order) {
    if (LookupEquals(values[index], lookup, icase)) {
      return index;
    }
  }

  if (match_mode === 0) {
    return -1;
  }

  // next smaller (-1) or next larger (1). ties go to the first in
  // search order.

  let best = -1;

  for (const index of order) {
    const comparison = LookupCompare(values[index], lookup, icase);
    if (comparison === undefined || Math.sign(comparison) !== match_mode) {
      continue;
    }
    if (best < 0) {
      best = index;
      continue;
    }
    const versus = LookupCompare(values[index], values[best], icase);
    if (versus !== undefined && Math.sign(versus) === -match_mode) {
      best = index;
    }
  }

  return best;

};

export const LookupFunctionLibrary: FunctionMap = {

  VLookup: {
    description: 'Looks up a value in the first column of a table',
    arguments: [
      { name: 'lookup value' },
      { name: 'table' },
      { name: 'result index' },
      { name: 'inexact', optional: true },
    ],
    fn: (args: UnionValue[]): UnionValue => {

      const [lookup, table_value, index_value] = args;

      const index = IntegerArgument(index_value);
      if (IsErrorUnion(index)) {
        return index;
      }
      if (index < 1) {
        return ValueError();
      }

      const table = ToTable(table_value);
      if (index > (table[0]?.length || 0)) {
        return ReferenceError();
      }

      const keys = table.map(row => row[0] || EmptyUnion());

      return TableLookup(lookup, keys, OptionalArgument(args, 3),
        match => table[match][index - 1] || EmptyUnion());

    },
  },

  HLookup: {
    description: 'Looks up a value in the first row of a table',
    arguments: [
      { name: 'lookup value' },
      { name: 'table' },
      { name: 'result index' },
      { name: 'inexact', optional: true },
    ],
    fn: (args: UnionValue[]): UnionValue => {

      const [lookup, table_value, index_value] = args;

      const index = IntegerArgument(index_value);
      if (IsErrorUnion(index)) {
        return index;
      }
      if (index < 1) {
        return ValueError();
      }

      const table = ToTable(table_value);
      if (index > table.length) {
        return ReferenceError();
      }

      return TableLookup(lookup, table[0] || [], OptionalArgument(args, 3),
        match => table[index - 1][match] || EmptyUnion());

    },
  },

  Index: {
    description: 'Returns an element from an array, by 1-based position',
    arguments: [
      { name: 'array' },
      { name: 'row' },
      { name: 'column', optional: true },
    ],
    fn: (args: UnionValue[]): UnionValue => {

      const table = ToTable(args[0]);
      const rows = table.length;
      const columns = table[0]?.length || 0;

      let row = IntegerArgument(args[1]);
      if (IsErrorUnion(row)) {
        return row;
      }

      const column_argument = OptionalArgument(args, 2);
      let column: number|UnionValue = 1;

      if (column_argument) {
        column = IntegerArgument(column_argument);
        if (IsErrorUnion(column)) {
          return column;
        }
      }
      else if (rows === 1) {
        // a single row: the index is a column
        column = row;
        row = 1;
      }
      else if (columns > 1) {

        // no column in a 2D array: return the whole row

        if (row < 1) {
          return ValueError();
        }
        if (row > rows) {
          return ReferenceError();
        }
        return { type: ValueType.array, value: [table[row - 1].slice(0)] };

      }

      if (row < 1 || column < 1) {
        return ValueError();
      }

      if (row > rows || column > columns) {
        return ReferenceError();
      }

      return table[row - 1][column - 1];

    },
  },

  Match: {
    description: 'Returns the 1-based position of a value in an array',
    arguments: [
      { name: 'lookup value' },
      { name: 'array' },
      { name: 'match type', optional: true },
    ],
    fn: (args: UnionValue[]): UnionValue => {

      const [lookup, array] = args;
      const values = FlattenBoxed([array]);

      const match_type = IntegerArgument(OptionalArgument(args, 2) || IntUnion(1));
      if (IsErrorUnion(match_type)) {
        return match_type;
      }

      let index: number;

      switch (match_type) {
        case 0:
          index = LinearSearch(values, lookup);
          break;
        case 1:
          index = BinarySearch(values, lookup);
          break;
        case -1:
          index = BinarySearch(values, lookup, true);
          break;
        default:
          return ValueError();
      }

      return index < 0 ? NAError() : IntUnion(index + 1);

    },
  },

  XLookup: {
    description: 'Looks up a value in one array and returns the matching element of another',
    arguments: [
      { name: 'lookup value' },
      { name: 'lookup array' },
      { name: 'return array' },
      { name: 'if not found', optional: true },
      { name: 'match mode', optional: true },
      { name: 'search mode', optional: true },
      { name: 'case insensitive', optional: true },
    ],
    fn: (args: UnionValue[]): UnionValue => {

      const [lookup, lookup_array, return_array] = args;

      const lookup_table = ToTable(lookup_array);
      const return_table = ToTable(return_array);

      const rows = lookup_table.length;
      const columns = lookup_table[0]?.length || 0;

      // the lookup array has to be one-dimensional

      if (rows > 1 && columns > 1) {
        return ValueError();
      }

      const vertical = columns <= 1;
      const values = vertical ?
        lookup_table.map(row => row[0] || EmptyUnion()) :
        lookup_table[0];

      const return_length = vertical ? return_table.length : (return_table[0]?.length || 0);
      if (return_length !== values.length) {
        return ValueError();
      }

      const match_mode = IntegerArgument(OptionalArgument(args, 4) || IntUnion(0));
      if (IsErrorUnion(match_mode)) {
        return match_mode;
      }

      const search_mode = IntegerArgument(OptionalArgument(args, 5) || IntUnion(1));
      if (IsErrorUnion(search_mode)) {
        return search_mode;
      }

      if (![0, -1, 1, 2].includes(match_mode) || ![1, -1, 2, -2].includes(search_mode)) {
        return ValueError();
      }

      const icase_argument = OptionalArgument(args, 6);
      const icase = icase_argument ? CoerceBoolean(icase_argument) : false;
      if (typeof icase !== 'boolean') {
        return icase;
      }

      const index = XLookupSearch(values, lookup, match_mode, search_mode, icase);

      if (typeof index !== 'number') {
        return index;
      }

      if (index < 0) {
        return OptionalArgument(args, 3) || NAError();
      }

      return XLookupResult(return_table, vertical, index);

    },
  },

  Offset: {
    description: 'Returns a range shifted and resized from a reference',
    volatile: true,
    arguments: [
      { name: 'reference', address: true },
      { name: 'rows' },
      { name: 'columns' },
      { name: 'height', optional: true },
      { name: 'width', optional: true },
    ],
    fn: (args, context): UnionValue => {

      const rows = IntegerArgument(args[1]);
      if (IsErrorUnion(rows)) {
        return rows;
      }

      const columns = IntegerArgument(args[2]);
      if (IsErrorUnion(columns)) {
        return columns;
      }

      const size: number[] = [];

      for (const index of [3, 4]) {
        const argument = OptionalArgument(args, index);
        if (argument) {
          const value = IntegerArgument(argument);
          if (IsErrorUnion(value)) {
            return value;
          }
          if (value < 1) {
            return ValueError();
          }
          size[index - 3] = value;
        }
      }

      const reference = context.references[0];

      if (reference) {

        const start = reference.area.start;
        const height = size[0] || reference.area.rows;
        const width = size[1] || reference.area.columns;

        const row = start.row + rows;
        const column = start.column + columns;

        if (row < 0 || column < 0 || row + height > MAX_ROWS || column + width > MAX_COLUMNS) {
          return ReferenceError();
        }

        const area = new Area({ row, column }, { row: row + height - 1, column: column + width - 1 });

        return context.Resolve({
          sheet: reference.sheet,
          area,
          single: area.count === 1,
        });

      }

      // not a reference (an array literal, or a calculated array).
      // the offset has to stay within the value.

      const table = ToTable(args[0]);
      const height = size[0] || table.length;
      const width = size[1] || (table[0]?.length || 0);

      if (rows < 0 || columns < 0 || !height || !width
          || rows + height > table.length || columns + width > (table[0]?.length || 0)) {
        return ReferenceError();
      }

      if (height === 1 && width === 1) {
        return table[rows][columns];
      }

      return {
        type: ValueType.array,
        value: table.slice(rows, rows + height).map(row => row.slice(columns, columns + width)),
      };

    },
  },

};
