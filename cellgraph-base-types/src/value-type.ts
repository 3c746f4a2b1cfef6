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

/**
 * list of value types. undefined is 0 so we can test it as falsy.
 *
 * we distinguish integers from floats because lookup results and counts
 * report integers, while arithmetic always produces floats. anything that
 * wants "a number" should use IsNumeric and not test the type directly.
 */
export enum ValueType {
  undefined = 0,
  string = 1,
  integer = 2,
  number = 3,
  boolean = 4,
  error = 5,

  // not a cell value; only produced by ranges, array literals
  // and functions that return more than one value
  array = 6,
}

/**
 * spreadsheet error kinds. errors are values: they can be stored,
 * compared and returned like anything else.
 */
export enum ErrorType {
  NA =        'N/A',
  Reference = 'REF',
  Value =     'VALUE',
  Div0 =      'DIV/0',
  Name =      'NAME',
  Num =       'NUM',
  Circular =  'CIRCULAR',
}

const error_labels: Record<ErrorType, string> = {
  [ErrorType.NA]:        '#N/A',
  [ErrorType.Reference]: '#REF!',
  [ErrorType.Value]:     '#VALUE!',
  [ErrorType.Div0]:      '#DIV/0!',
  [ErrorType.Name]:      '#NAME?',
  [ErrorType.Num]:       '#NUM!',
  [ErrorType.Circular]:  '#CIRCULAR!',
};

/** spreadsheet label for an error, e.g. `#N/A` or `#DIV/0!` */
export const ErrorLabel = (error: ErrorType): string => error_labels[error];

/** raw values as they come from storage */
export type CellValue = undefined | string | number | boolean;

export const GetValueType = (value: unknown): ValueType => {

  switch (typeof value) {

    case 'undefined':
      return ValueType.undefined;

    case 'number':
      return ValueType.number;

    case 'boolean':
      return ValueType.boolean;

    case 'string':
      return ValueType.string;

    case 'object':
      if (value === null) {
        return ValueType.undefined;
      }
      if (Array.isArray(value)) {
        return ValueType.array;
      }
      return ValueType.error;

    default: // function, symbol, bigint
      return ValueType.error;

  }
};
