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

import type { ErrorType } from 'cellgraph-base-types';

/**
 * base type, for common data (atm only ID). id is unique within the
 * context of a single parse pass.
 */
export interface BaseUnit {
  id: number;
}

export interface UnitLiteralNumber extends BaseUnit {
  type: 'literal';
  position: number;
  value: number;

  /** original text, preserved for rendering */
  text?: string;

  /**
   * set if the literal was written without a fraction, exponent or
   * percent. integer literals evaluate to integers; everything else
   * evaluates to a float.
   */
  integer?: boolean;
}

export interface UnitLiteralString extends BaseUnit {
  type: 'literal';
  position: number;
  value: string;
  text?: string;
}

export interface UnitLiteralBoolean extends BaseUnit {
  type: 'literal';
  position: number;
  value: boolean;
  text?: string;
}

export type UnitLiteral = UnitLiteralNumber|UnitLiteralBoolean|UnitLiteralString;

/**
 * error literal, like `#N/A`. error literals are case-insensitive.
 */
export interface UnitErrorLiteral extends BaseUnit {
  type: 'error';
  position: number;
  value: ErrorType;
}

/**
 * expression unit representing an array of literal values. arrays are
 * row-major, `values[row][column]`, and must be rectangular. arrays cannot
 * contain arrays, references or expressions.
 */
export interface UnitArray extends BaseUnit {
  type: 'array';
  position: number;
  values: UnitLiteral[][];
}

/**
 * expression unit representing a missing value, intended for missing
 * arguments in function calls.
 */
export interface UnitMissing extends BaseUnit {
  type: 'missing';
}

/**
 * expression unit representing a group of units; like parentheses in an
 * expression. only produced for explicit (user-typed) parentheses.
 */
export interface UnitGroup extends BaseUnit {
  type: 'group';
  position: number;
  elements: ExpressionUnit[];
}

/**
 * expression unit representing a function call: has call and arguments.
 * the name is not validated by the parser; unknown functions are an
 * evaluation-time error.
 */
export interface UnitCall extends BaseUnit {
  type: 'call';
  name: string;
  position: number;
  args: ExpressionUnit[];
}

/**
 * this isn't an output type, it only exists in the unit stream before
 * operators are arranged.
 */
export interface UnitOperator extends BaseUnit {
  type: 'operator';
  position: number;
  operator: string;
}

export type BinaryOperator =
  '+' | '-' | '*' | '/' | '^' | '&' | '=' | '<>' | '<' | '>' | '<=' | '>=';

/**
 * expression unit representing a binary operation.
 */
export interface UnitBinary extends BaseUnit {
  type: 'binary';
  left: ExpressionUnit;
  operator: BinaryOperator;
  right: ExpressionUnit;
  position: number; // this is the _operator_ position, since that will be the error
}

/**
 * expression unit representing a unary operation. `%` is postfix; the
 * others are prefix.
 */
export interface UnitUnary extends BaseUnit {
  type: 'unary';
  operator: '-' | '+' | '%';
  operand: ExpressionUnit;
  position: number;
}

/**
 * expression unit representing a spreadsheet address
 */
export interface UnitAddress extends BaseUnit {
  type: 'address';
  sheet?: string;
  label: string;
  row: number;
  column: number;
  absolute_row?: boolean;
  absolute_column?: boolean;

  /**
   * this means the row is a relative offset from the current row. this
   * happens if you use R1C1 syntax with square brackets, or omit the row
   * number (`RC2`).
   */
  offset_row?: boolean;

  /**
   * this means the column is a relative offset from the current column.
   */
  offset_column?: boolean;

  /** the address was written in R1C1 notation */
  r1c1?: boolean;

  position: number;
}

/**
 * expression unit representing a spreadsheet range. ranges are not
 * normalized by the parser; `B2:A1` keeps its corners.
 */
export interface UnitRange extends BaseUnit {
  type: 'range';
  label: string;
  start: UnitAddress;
  end: UnitAddress;
  position: number;
}

/**
 * discriminated union for type guards, all types
 */
export type ExpressionUnit =
  | UnitLiteral
  | UnitErrorLiteral
  | UnitArray
  | UnitCall
  | UnitMissing
  | UnitGroup
  | UnitOperator
  | UnitBinary
  | UnitUnary
  | UnitAddress
  | UnitRange
  ;

/** list of addresses and ranges in the formula, for graphs */
export interface DependencyList {
  addresses: { [index: string]: UnitAddress };
  ranges: { [index: string]: UnitRange };
}

/**
 * compile error kinds. every parse failure maps to exactly one of these.
 */
export enum CompileErrorKind {
  UnexpectedToken = 'UnexpectedToken',
  UnbalancedDelimiter = 'UnbalancedDelimiter',
  InvalidReference = 'InvalidReference',
  InvalidLiteral = 'InvalidLiteral',
}

/**
 * argument separator type for i18n
 */
export enum ArgumentSeparatorType {
  Comma = ',',
  Semicolon = ';',
}

/**
 * compound result of a parse operation includes dependency list
 * and an error flag (inverted). on error, the position is an offset
 * into the text as passed to Parse (including any leading `=`).
 */
export interface ParseResult {
  expression?: ExpressionUnit;
  valid: boolean;
  error_position?: number;
  error?: string;
  error_kind?: CompileErrorKind;
  dependencies: DependencyList;
  separator?: string;

  /** every address and range, in order, including duplicates */
  full_reference_list: Array<UnitAddress | UnitRange>;
}

export interface ParserFlags {

  /**
   * support R1C1 addressing. we support absolute (`R2C3`) and relative
   * (`R[-1]C[0]`, `RC`) addresses. A1 takes precedence where a token is
   * valid in both notations (`RC1`).
   */
  r1c1: boolean;

  /** string representing boolean true, for parsing/rendering */
  boolean_true: string;

  /** string representing boolean false, for parsing/rendering */
  boolean_false: string;

}

export interface RenderOptions {

  /** offset for relative addresses (and ranges), for copy/move */
  offset: { rows: number; columns: number };

  /** string to represent missing arguments */
  missing: string;

  /** render with a different argument separator */
  convert_argument_separator: ArgumentSeparatorType;

  /** no spaces around binary operators */
  compact: boolean;

}

export const DefaultParserFlags: ParserFlags = {
  r1c1: true,
  boolean_true: 'TRUE',
  boolean_false: 'FALSE',
};
