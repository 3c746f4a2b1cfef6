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

import type { ICellAddress } from 'cellgraph-base-types';
import { Parser } from './parser';
import type { UnitAddress, UnitRange } from './parser-types';

const parser = new Parser();

export type ReferenceKind = 'cell' | 'range' | 'r1c1-cell' | 'r1c1-range';

export type ReferenceMode = 'relative' | 'absolute' | 'mixed';

/** reference as it appears in formula text */
export interface FormulaReference {
  text: string;
  sheet?: string;
  kind: ReferenceKind;
  mode: ReferenceMode;
}

const OPEN = ['(', '['];
const CLOSE = [')', ']'];

/**
 * text is a formula if it starts with `=`. we also accept the
 * lotus-style alternates: a leading `@`, or a leading sign followed by
 * something that is not just a number.
 */
export const IsFormula = (text: string): boolean => {

  if (text.startsWith('=') || text.startsWith('@')) {
    return true;
  }

  if (!text.startsWith('+') && !text.startsWith('-')) {
    return false;
  }

  const after_sign = text.substring(1).trim();
  if (!after_sign || !isNaN(Number(after_sign))) {
    return false;
  }

  // "- 3 4" is not a formula, "-3 * 4" is

  if (/\s/.test(after_sign) && !/[A-Za-z]/.test(after_sign)) {
    return /[+*/^=<>]/.test(after_sign);
  }

  return true;

};

/**
 * check that parentheses and square brackets nest properly. this is a
 * character scan; it doesn't know about strings.
 */
export const IsBalancedParentheses = (text: string): boolean => {
  let depth = 0;
  for (const char of text) {
    if (OPEN.includes(char)) {
      depth++;
    }
    else if (CLOSE.includes(char)) {
      if (depth === 0) {
        return false;
      }
      depth--;
    }
  }
  return depth === 0;
};

/**
 * append closers for any unclosed parentheses or brackets, innermost
 * first. unmatched closers are left alone.
 */
export const BalanceParentheses = (text: string): string => {
  const stack: string[] = [];
  for (const char of text) {
    const open = OPEN.indexOf(char);
    if (open >= 0) {
      stack.push(CLOSE[open]);
    }
    else if (CLOSE.includes(char)) {
      stack.pop();
    }
  }
  return text + stack.reverse().join('');
};

/**
 * close an unterminated string. the closing quote goes before any
 * trailing parentheses that were opened before the string started,
 * so `=UPPER("abc)` becomes `=UPPER("abc")`.
 */
export const BalanceQuotes = (text: string): string => {

  let in_string = false;
  let depth = 0;
  let depth_at_string_start = 0;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '"') {
      if (in_string && text[i + 1] === '"') {
        i++; // escaped
        continue;
      }
      in_string = !in_string;
      if (in_string) {
        depth_at_string_start = depth;
      }
      continue;
    }
    if (!in_string) {
      if (OPEN.includes(char)) {
        depth++;
      }
      else if (CLOSE.includes(char) && depth > 0) {
        depth--;
      }
    }
  }

  if (!in_string) {
    return text;
  }

  let insert_index = text.length;
  while (insert_index > 0 && /\s/.test(text[insert_index - 1])) {
    insert_index--;
  }

  let close_start = insert_index;
  while (close_start > 0 && CLOSE.includes(text[close_start - 1])) {
    close_start--;
  }

  const insert = insert_index - Math.min(depth_at_string_start, insert_index - close_start);
  return text.substring(0, insert) + '"' + text.substring(insert);

};

/**
 * close strings, then parentheses. for repairing partially-typed
 * formulas.
 */
export const BalanceFormula = (text: string): string => BalanceParentheses(BalanceQuotes(text));

/**
 * valid formula requires the leading `=` and must parse.
 */
export const IsValidFormula = (text: string): boolean => {
  const trimmed = text.trim();
  if (!trimmed.startsWith('=') || trimmed.length < 2) {
    return false;
  }
  return parser.Parse(trimmed).valid;
};

/**
 * translate a formula as if it were copied from source to destination.
 * relative A1 references move; absolute references (and R1C1
 * references, which are position-independent) do not. references that
 * move off the sheet become `#REF!`.
 *
 * text that doesn't parse is returned unchanged.
 */
export const TranslateFormula = (text: string, source: ICellAddress, destination: ICellAddress): string => {

  const rows = destination.row - source.row;
  const columns = destination.column - source.column;

  if (!text || (!rows && !columns)) {
    return text;
  }

  const result = parser.Parse(text);
  if (!result.valid || !result.expression) {
    return text;
  }

  const prefix = text.trimStart().startsWith('=') ? '=' : '';
  return prefix + parser.Render(result.expression, { offset: { rows, columns }, missing: '', compact: true });

};

const AddressMode = (address: UnitAddress): ReferenceMode => {
  if (address.r1c1) {
    if (address.offset_row && address.offset_column) return 'relative';
    if (!address.offset_row && !address.offset_column) return 'absolute';
    return 'mixed';
  }
  if (address.absolute_row && address.absolute_column) return 'absolute';
  if (!address.absolute_row && !address.absolute_column) return 'relative';
  return 'mixed';
};

const RangeMode = (range: UnitRange): ReferenceMode => {
  const start = AddressMode(range.start);
  const end = AddressMode(range.end);
  return start === end ? start : 'mixed';
};

/**
 * list references in formula text, in order. returns an empty list if
 * the formula doesn't parse.
 */
export const ExtractReferences = (text: string): FormulaReference[] => {

  const result = parser.Parse(text);
  if (!result.valid) {
    return [];
  }

  return result.full_reference_list.map((reference): FormulaReference => {
    if (reference.type === 'range') {
      return {
        text: parser.Render(reference),
        sheet: reference.start.sheet,
        kind: reference.start.r1c1 ? 'r1c1-range' : 'range',
        mode: RangeMode(reference),
      };
    }
    return {
      text: parser.Render(reference),
      sheet: reference.sheet,
      kind: reference.r1c1 ? 'r1c1-cell' : 'cell',
      mode: AddressMode(reference),
    };
  });

};
