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

import { Area, ErrorType, ErrorLabel } from 'cellgraph-base-types';

import type {
  ExpressionUnit,
  UnitAddress,
  UnitRange,
  UnitArray,
  UnitCall,
  UnitLiteral,
  UnitLiteralNumber,
  UnitErrorLiteral,
  UnitOperator,
  BinaryOperator,
  DependencyList,
  ParseResult,
  ParserFlags,
  RenderOptions,
} from './parser-types';

import {
  ArgumentSeparatorType,
  CompileErrorKind,
  DefaultParserFlags,
} from './parser-types';

/**
 * regex determines if a sheet name requires quotes. centralizing
 * this to simplify maintenance and reduce overlap/errors
 */
export const QuotedSheetNameRegex = /[\s\-+=<>!()'&,;*\/^%{}"#]/;

/** largest legal row and column, 1-based */
export const MAX_ROWS = 1048576;
export const MAX_COLUMNS = 16384;

const DOUBLE_QUOTE = 0x22; // '"'.charCodeAt(0);
const SINGLE_QUOTE = 0x27; // `'`.charCodeAt(0);

const NON_BREAKING_SPACE = 0xa0;
const SPACE = 0x20;
const TAB = 0x09;
const CR = 0x0a;
const LF = 0x0d;

const ZERO = 0x30;
const NINE = 0x39;
const PERIOD = 0x2e;

const PLUS = 0x2b;
const MINUS = 0x2d;

const OPEN_PAREN = 0x28;
const CLOSE_PAREN = 0x29;

const COMMA = 0x2c;
const PERCENT = 0x25;
const EQUALS = 0x3d;

const UNDERSCORE = 0x5f;
const DOLLAR_SIGN = 0x24;

const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;

const OPEN_SQUARE_BRACKET = 0x5b;
const CLOSE_SQUARE_BRACKET = 0x5d;

const EXCLAMATION_MARK = 0x21;

const SEMICOLON = 0x3b;

const HASH = 0x23;  // #

const UC_A = 0x41;
const LC_A = 0x61;
const UC_E = 0x45;
const LC_E = 0x65;
const UC_Z = 0x5a;
const LC_Z = 0x7a;

const ACCENTED_RANGE_START = 192;
const ACCENTED_RANGE_END = 312;

/** returned by ParseNext at the end of input, or after an error */
const END = -1;

/**
 * precedence map. comparison is lowest, then concatenation, then the
 * arithmetic operators. everything is left-associative, including `^`.
 */
const binary_operators_precedence: Record<BinaryOperator, number> = {
  '<>': 6,
  '=': 6,
  '<': 6,
  '>': 6,
  '<=': 6,
  '>=': 6,
  '&': 8,
  '+': 9,
  '-': 9,
  '*': 10,
  '/': 10,
  '^': 11,
};

/**
 * prefix unary operators bind tighter than `*` and `/` but looser than
 * `^`, so `-2^2` is `-(2^2)`.
 */
const unary_precedence = 11;

/**
 * every token the operator scanner recognizes, sorted by length so we
 * can compare long ops first. `:` (range) and `%` (postfix) are handled
 * before and during arrangement, respectively.
 */
const operator_tokens = [...Object.keys(binary_operators_precedence), ':', '%'].sort(
  (a, b) => b.length - a.length,
);

const IsBinaryOperator = (operator: string): operator is BinaryOperator => {
  return operator in binary_operators_precedence;
};

/** error literal labels, longest first */
const error_literals = Object.values(ErrorType)
  .map(value => ({ value, label: ErrorLabel(value) }))
  .sort((a, b) => b.label.length - a.label.length);

const a1_regex = /^(\$?)([A-Za-z]{1,3})(\$?)(\d+)$/;
const r1c1_regex = /^[rR](\[[-+]?\d+\]|\d+)?[cC](\[[-+]?\d+\]|\d+)?$/;

/** looks like an address, but failed to parse as one */
const address_like_regex = /^\$?[A-Za-z]+\$?\d+$/;

/** legal function name */
const function_name_regex = /^[A-Za-z_\u00C0-\u0138][A-Za-z0-9_.\u00C0-\u0138]*$/;

/**
 * quote a sheet name, if necessary. single quotes in the name are
 * doubled.
 */
export const QuoteSheetName = (name: string): string => {
  if (QuotedSheetNameRegex.test(name) || /^\d/.test(name)) {
    return `'${name.replace(/'/g, `''`)}'`;
  }
  return name;
};

/**
 * parser for spreadsheet language.
 *
 * there is internal state, but it's only used during a Parse() call,
 * which runs synchronously. the parse tree it returns is not referenced
 * by the parser after the call.
 */
export class Parser {

  /**
   * argument separator. this can be changed prior to parsing/rendering.
   */
  public argument_separator = ArgumentSeparatorType.Comma;

  /**
   * unifying flags
   */
  public flags: ParserFlags = { ...DefaultParserFlags };

  /**
   * internal argument separator, as a number. this is set internally on
   * parse call, following the argument_separator value.
   */
  protected argument_separator_char = COMMA;

  /**
   * internal counter for incrementing IDs
   */
  protected id_counter = 0;

  protected expression = '';
  protected data: number[] = [];
  protected index = 0;
  protected length = 0;

  /** success flag */
  protected valid = true;

  /** rolling error state. we only keep the first error. */
  protected error_position: number | undefined;
  protected error: string | undefined;
  protected error_kind: CompileErrorKind | undefined;

  protected dependencies: DependencyList = {
    addresses: {},
    ranges: {},
  };

  // referenced addresses -- addresses that turn out to be range corners
  // are dropped from the dependency list
  protected address_refcount: { [index: string]: number } = {};

  /**
   * full list of referenced addresses and ranges, including duplicates
   * and in order of appearance.
   */
  protected full_reference_list: Array<UnitAddress | UnitRange> = [];

  /**
   * recursive tree walk.
   *
   * @param func function called on each node. for nodes that have children
   * (operations, calls, groups) return false to skip the subtree, or true to
   * traverse.
   */
  public Walk(unit: ExpressionUnit, func: (unit: ExpressionUnit) => boolean): void {
    switch (unit.type) {
      case 'address':
      case 'missing':
      case 'literal':
      case 'error':
      case 'operator':
        func(unit);
        return;

      case 'array':
        if (func(unit)) {
          unit.values.forEach(row => row.forEach(value => this.Walk(value, func)));
        }
        return;

      case 'range':
        if (func(unit)) {
          this.Walk(unit.start, func);
          this.Walk(unit.end, func);
        }
        return;

      case 'binary':
        if (func(unit)) {
          this.Walk(unit.left, func);
          this.Walk(unit.right, func);
        }
        return;

      case 'unary':
        if (func(unit)) {
          this.Walk(unit.operand, func);
        }
        return;

      case 'group':
        if (func(unit)) {
          unit.elements.forEach((element) => this.Walk(element, func));
        }
        return;

      case 'call':
        if (func(unit)) {
          unit.args.forEach((arg) => this.Walk(arg, func));
        }
    }
  }

  /**
   * renders the passed expression as a string (without a leading `=`).
   * relative addresses are shifted by `offset`; an address shifted off
   * the sheet renders as `#REF!`.
   */
  public Render(unit: ExpressionUnit, options: Partial<RenderOptions> = {}): string {

    const offset = options.offset || { rows: 0, columns: 0 };

    // use default separator, unless we're explicitly converting.

    const separator = (options.convert_argument_separator || this.argument_separator) + (options.compact ? '' : ' ');

    switch (unit.type) {
      case 'address':
        return this.AddressLabel(unit, offset);

      case 'range':
        {
          const start = this.AddressLabel(unit.start, offset);
          const end = this.AddressLabel({ ...unit.end, sheet: undefined }, offset);
          if (start.endsWith(ErrorLabel(ErrorType.Reference)) || end === ErrorLabel(ErrorType.Reference)) {
            return ErrorLabel(ErrorType.Reference);
          }
          return start + ':' + end;
        }

      case 'missing':
        return options.missing ?? '';

      case 'array':
        return '{' + unit.values.map(row => row.map(value => this.Render(value, options)).join(',')).join(';') + '}';

      case 'binary':
        return this.Render(unit.left, options)
          + (options.compact ? unit.operator : ' ' + unit.operator + ' ')
          + this.Render(unit.right, options);

      case 'unary':
        if (unit.operator === '%') {
          return this.Render(unit.operand, options) + '%';
        }
        return unit.operator + this.Render(unit.operand, options);

      case 'literal':
        if (typeof unit.value === 'string') {

          // escape any quotation marks in string
          return '"' + unit.value.replace(/"/g, '""') + '"';
        }
        else if (typeof unit.value === 'boolean') {
          return unit.value ? this.flags.boolean_true : this.flags.boolean_false;
        }
        else if (unit.text) return unit.text;
        return unit.value.toString();

      case 'error':
        return ErrorLabel(unit.value);

      case 'operator':
        return '[' + unit.operator + ']'; // this should be invalid output

      case 'group':
        return '(' + unit.elements.map(element => this.Render(element, options)).join(separator) + ')';

      case 'call':
        return unit.name + '(' + unit.args.map(arg => this.Render(arg, options)).join(separator) + ')';

    }
  }

  /**
   * parses expression and returns the root of the parse tree, plus a
   * list of dependencies (addresses and ranges) found in the expression.
   * a leading `=` is optional.
   *
   * we don't trim the expression, so error positions are offsets into
   * the text as passed.
   */
  public Parse(expression: string): ParseResult {

    this.expression = expression;
    this.data = [];
    this.length = expression.length;
    this.index = 0;
    this.valid = true;
    this.error_position = undefined;
    this.error = undefined;
    this.error_kind = undefined;
    this.dependencies = { addresses: {}, ranges: {} };
    this.address_refcount = {};
    this.full_reference_list = [];

    // reset ID
    this.id_counter = 0;

    // set separator
    switch (this.argument_separator) {
      case ArgumentSeparatorType.Semicolon:
        this.argument_separator_char = SEMICOLON;
        break;
      default:
        this.argument_separator_char = COMMA;
        break;
    }

    // NOTE on this function: charCodeAt returns UTF-16. codePointAt returns
    // unicode. length returns UTF-16 length. we want UTF-16 so positions
    // match string offsets; don't be tempted to replace this with
    // codePointAt.

    for (let i = 0; i < this.length; i++) {
      this.data[i] = expression.charCodeAt(i);
    }

    // remove leading =

    this.ConsumeWhiteSpace();
    if (this.data[this.index] === EQUALS) {
      this.index++;
    }

    const expr = this.ParseGeneric();

    if (this.valid && !expr) {
      this.SetError(CompileErrorKind.UnexpectedToken, 'empty formula', this.index);
    }

    // remove addresses that were consumed as range corners

    const addresses: { [index: string]: UnitAddress } = {};
    for (const key of Object.keys(this.dependencies.addresses)) {
      if (this.address_refcount[key]) {
        addresses[key] = this.dependencies.addresses[key];
      }
    }
    this.dependencies.addresses = addresses;

    return {
      expression: (this.valid && expr) ? expr : undefined,
      valid: this.valid,
      error: this.error,
      error_kind: this.error_kind,
      error_position: this.error_position,
      dependencies: this.dependencies,
      separator: this.argument_separator,
      full_reference_list: this.full_reference_list.slice(0),
    };
  }

  /** record an error. only the first one sticks. */
  protected SetError(kind: CompileErrorKind, message: string, position: number): void {
    if (this.valid) {
      this.valid = false;
      this.error_kind = kind;
      this.error = message;
      this.error_position = position;
    }
  }

  /** generates address label ("C3") from address (0-based) */
  protected AddressLabel(
    address: UnitAddress,
    offset: { rows: number; columns: number },
  ): string {

    const label = address.sheet ? QuoteSheetName(address.sheet) + '!' : '';

    if (address.r1c1) {

      // relative R1C1 addresses are position-independent; absolute
      // addresses don't move. so nothing to offset here.

      const part = (offset_flag: boolean|undefined, value: number) => {
        if (offset_flag) {
          return value ? `[${value}]` : '';
        }
        return String(value + 1);
      };

      return label + 'R' + part(address.offset_row, address.row) + 'C' + part(address.offset_column, address.column);
    }

    let column = address.column;
    if (!address.absolute_column) column += offset.columns;

    let row = address.row;
    if (!address.absolute_row) row += offset.rows;

    if (row < 0 || column < 0 || row >= MAX_ROWS || column >= MAX_COLUMNS) {
      return label + ErrorLabel(ErrorType.Reference);
    }

    return (
      label +
      (address.absolute_column ? '$' : '') +
      Area.ColumnToLabel(column) +
      (address.absolute_row ? '$' : '') +
      (row + 1)
    );
  }

  /**
   * base parse routine; may recurse inside parens (either as grouped
   * operations or in function arguments).
   *
   * @param exit exit on specific characters (not consumed)
   */
  protected ParseGeneric(exit: number[] = []): ExpressionUnit | null {
    const stream: ExpressionUnit[] = [];

    while (this.valid && this.index < this.length) {
      const unit = this.ParseNext();
      if (unit === END) {
        break;
      }
      if (typeof unit === 'number') {

        if (exit.some((test) => unit === test)) {
          break;
        }
        else if (unit === OPEN_PAREN) {

          // note that function calls are handled elsewhere,
          // so we only have to worry about grouping. parse
          // up to the closing paren...

          const position = this.index;
          this.index++; // open paren
          const group = this.ParseGeneric([CLOSE_PAREN]);

          if (!this.valid) break;

          if (this.data[this.index] !== CLOSE_PAREN) {
            this.SetError(CompileErrorKind.UnbalancedDelimiter, 'unbalanced parenthesis', position);
            break;
          }
          this.index++; // close paren

          if (!group) {
            this.SetError(CompileErrorKind.UnexpectedToken, 'empty parentheses', position);
            break;
          }

          stream.push({
            type: 'group',
            id: this.id_counter++,
            position,
            elements: [group],
          });

        }
        else if (unit === CLOSE_PAREN || unit === CLOSE_BRACE) {
          this.SetError(CompileErrorKind.UnbalancedDelimiter, `unexpected ${String.fromCharCode(unit)}`, this.index);
        }
        else {
          const operator = this.ConsumeOperator();
          if (operator) {
            stream.push(operator);
          }
          else {
            this.SetError(CompileErrorKind.UnexpectedToken,
              `unexpected character: ${String.fromCharCode(unit)}, 0x${unit.toString(16)}`, this.index);
          }
        }
      }
      else {
        stream.push(unit);
      }
    }

    if (!this.valid || stream.length === 0) {
      return null;
    }

    return this.ArrangeUnits(this.BinaryToRange(stream));
  }

  /**
   * merges `address : address` triplets in the stream into ranges. range
   * construction has the highest precedence, so we do this before
   * arranging anything else. a range operator anywhere else is an
   * invalid reference.
   */
  protected BinaryToRange(stream: ExpressionUnit[]): ExpressionUnit[] {

    const result: ExpressionUnit[] = [];

    for (let i = 0; i < stream.length; i++) {
      const unit = stream[i];

      if (unit.type === 'operator' && unit.operator === ':') {
        this.SetError(CompileErrorKind.InvalidReference, 'invalid range', unit.position);
        return stream;
      }

      const op = stream[i + 1];
      const end = stream[i + 2];

      if (unit.type === 'address'
          && op && op.type === 'operator' && op.operator === ':'
          && end && end.type === 'address') {

        if (end.sheet && end.sheet !== unit.sheet) {
          this.SetError(CompileErrorKind.InvalidReference, 'range spans sheets', end.position);
          return stream;
        }

        const range: UnitRange = {
          type: 'range',
          id: this.id_counter++,
          label: unit.label + ':' + end.label.substring(end.label.lastIndexOf('!') + 1),
          start: unit,
          end: { ...end, sheet: unit.sheet },
          position: unit.position,
        };

        this.address_refcount[unit.label]--;
        this.address_refcount[end.label]--;
        this.dependencies.ranges[range.label] = range;

        // swap the two corners in the reference list for the range

        const index = this.full_reference_list.indexOf(unit);
        if (index >= 0) {
          this.full_reference_list.splice(index, 2, range);
        }

        result.push(range);
        i += 2;
      }
      else {
        result.push(unit);
      }
    }

    return result;
  }

  /**
   * arrange the unit stream into a tree, by precedence climbing. the
   * stream alternates operands and operators; prefix operators may
   * appear where an operand is expected and postfix `%` may follow
   * any operand.
   */
  protected ArrangeUnits(stream: ExpressionUnit[]): ExpressionUnit | null {

    let index = 0;

    const Position = (unit: ExpressionUnit|undefined): number => {
      if (!unit || unit.type === 'missing') {
        return this.length;
      }
      return unit.position;
    };

    const ParseOperand = (): ExpressionUnit | null => {

      const unit = stream[index];

      if (!unit) {
        this.SetError(CompileErrorKind.UnexpectedToken, 'expected operand', this.length);
        return null;
      }

      if (unit.type === 'operator') {
        if (unit.operator === '-' || unit.operator === '+') {
          index++;
          const operand = ParseExpression(unary_precedence);
          if (!operand) {
            return null;
          }
          return {
            type: 'unary',
            id: this.id_counter++,
            operator: unit.operator,
            operand,
            position: unit.position,
          };
        }
        this.SetError(CompileErrorKind.UnexpectedToken, `unexpected operator ${unit.operator}`, unit.position);
        return null;
      }

      index++;

      let operand: ExpressionUnit = unit;
      for (let next = stream[index]; next && next.type === 'operator' && next.operator === '%'; next = stream[index]) {
        operand = {
          type: 'unary',
          id: this.id_counter++,
          operator: '%',
          operand,
          position: next.position,
        };
        index++;
      }

      return operand;

    };

    const ParseExpression = (min_precedence: number): ExpressionUnit | null => {

      let left = ParseOperand();

      while (left) {

        const next = stream[index];
        if (!next) {
          return left;
        }

        if (next.type !== 'operator') {
          this.SetError(CompileErrorKind.UnexpectedToken, 'missing operator', Position(next));
          return null;
        }

        const operator = next.operator;
        if (!IsBinaryOperator(operator)) {
          this.SetError(CompileErrorKind.UnexpectedToken, `unexpected operator ${operator}`, next.position);
          return null;
        }

        const precedence = binary_operators_precedence[operator];
        if (precedence < min_precedence) {
          return left;
        }

        index++;

        // left-associative: the right side only takes tighter operators

        const right = ParseExpression(precedence + 1);
        if (!right) {
          return null;
        }

        left = {
          type: 'binary',
          id: this.id_counter++,
          left,
          operator,
          right,
          position: next.position,
        };

      }

      return null;

    };

    if (!this.valid) {
      return null;
    }

    return ParseExpression(0);

  }

  /**
   * returns a unit, or the character code at the current position if
   * it doesn't start a unit (the character is not consumed). returns
   * END at the end of input or on error.
   */
  protected ParseNext(): ExpressionUnit | number {

    this.ConsumeWhiteSpace();

    if (this.index >= this.length) {
      return END;
    }

    const char = this.data[this.index];
    let unit: ExpressionUnit | undefined;

    if (char === DOUBLE_QUOTE) {
      const position = this.index;
      const value = this.ConsumeString();
      if (typeof value === 'string') {
        unit = {
          type: 'literal',
          id: this.id_counter++,
          position,
          value,
        };
      }
    }
    else if ((char >= ZERO && char <= NINE) || char === PERIOD) {
      unit = this.ConsumeNumber();
    }
    else if (char === OPEN_BRACE) {
      unit = this.ConsumeArray();
    }
    else if (char === HASH) {
      unit = this.ConsumeErrorLiteral();
    }
    else if (char === SINGLE_QUOTE) {
      unit = this.ConsumeQuotedReference();
    }
    else if (
      (char >= UC_A && char <= UC_Z) ||
      (char >= LC_A && char <= LC_Z) ||
      char === UNDERSCORE ||
      char === DOLLAR_SIGN ||
      (char >= ACCENTED_RANGE_START && char <= ACCENTED_RANGE_END)
    ) {
      unit = this.ConsumeToken();
    }
    else {
      return char;
    }

    return unit || END;
  }

  /**
   * array literals are row-major: comma separates columns, semicolon
   * separates rows.
   */
  protected ConsumeArray(): UnitArray | undefined {

    const position = this.index;
    const values: UnitLiteral[][] = [[]];

    this.index++; // open brace

    let expect_value = true;

    for (;;) {

      this.ConsumeWhiteSpace();

      if (this.index >= this.length) {
        this.SetError(CompileErrorKind.UnbalancedDelimiter, 'unbalanced brace', position);
        return undefined;
      }

      const char = this.data[this.index];

      if (char === CLOSE_BRACE) {
        if (expect_value) {
          this.SetError(CompileErrorKind.UnexpectedToken, 'missing value in array literal', this.index);
          return undefined;
        }
        this.index++;
        break;
      }

      if (char === COMMA || char === SEMICOLON) {
        if (expect_value) {
          this.SetError(CompileErrorKind.UnexpectedToken, 'missing value in array literal', this.index);
          return undefined;
        }
        if (char === SEMICOLON) {
          values.push([]);
        }
        this.index++;
        expect_value = true;
        continue;
      }

      const start = this.index;

      if (!expect_value) {
        this.SetError(CompileErrorKind.UnexpectedToken, 'missing separator in array literal', start);
        return undefined;
      }

      let item: ExpressionUnit | number;

      if (char === MINUS) {
        this.index++;
        const next = this.data[this.index];
        if (!((next >= ZERO && next <= NINE) || next === PERIOD)) {
          this.SetError(CompileErrorKind.UnexpectedToken, 'invalid value in array literal', start);
          return undefined;
        }
        const number = this.ConsumeNumber();
        if (!number) {
          return undefined;
        }
        item = {
          ...number,
          value: -number.value,
          text: '-' + (number.text || ''),
          position: start,
        };
      }
      else {
        item = this.ParseNext();
      }

      if (!this.valid) {
        return undefined;
      }

      if (typeof item === 'number' || item.type !== 'literal') {
        this.SetError(CompileErrorKind.UnexpectedToken, 'invalid value in array literal', start);
        return undefined;
      }

      values[values.length - 1].push(item);
      expect_value = false;

    }

    const columns = values[0].length;
    if (values.some(row => row.length !== columns)) {
      this.SetError(CompileErrorKind.InvalidLiteral, 'array rows must be the same length', position);
      return undefined;
    }

    return {
      type: 'array',
      id: this.id_counter++,
      values,
      position,
    };

  }

  protected ConsumeOperator(): UnitOperator | null {
    for (const operator of operator_tokens) {
      if (this.expression.substring(this.index, this.index + operator.length) === operator) {
        const position = this.index;
        this.index += operator.length;
        return {
          type: 'operator',
          id: this.id_counter++,
          operator,
          position,
        };
      }
    }
    return null;
  }

  /**
   * consume function arguments, which can be of any type. empty
   * arguments are represented as `missing`.
   */
  protected ConsumeArguments(open_position: number): ExpressionUnit[] {
    this.index++; // open paren

    let argument_index = 0;
    const args: ExpressionUnit[] = [];

    while (this.valid) {
      const unit = this.ParseGeneric([
        this.argument_separator_char,
        CLOSE_PAREN,
      ]);

      if (!this.valid) {
        break;
      }

      if (null !== unit) args.push(unit);

      // why did parsing stop?
      const char = this.data[this.index];

      if (char === this.argument_separator_char) {
        this.index++;
        argument_index++;
        while (args.length < argument_index) {
          args.push({ type: 'missing', id: this.id_counter++ });
        }
      }
      else if (char === CLOSE_PAREN) {
        this.index++;
        if (argument_index > 0 && args.length <= argument_index) {
          args.push({ type: 'missing', id: this.id_counter++ });
        }
        return args;
      }
      else {
        this.SetError(CompileErrorKind.UnbalancedDelimiter, 'unbalanced parenthesis', open_position);
      }
    }

    return args;
  }

  /**
   * reads raw token characters from the current position. tokens are
   * names, addresses (with optional sheet prefix) and R1C1 references,
   * which use square brackets and signs for relative offsets.
   *
   * returns the token text and the bracket balance, which should be 0.
   */
  protected ReadToken(): { text: string, square_bracket: number } {

    const start = this.index;
    let square_bracket = 0;

    for (; this.index < this.length; this.index++) {
      const char = this.data[this.index];
      if (
        (char >= UC_A && char <= UC_Z) ||
        (char >= LC_A && char <= LC_Z) ||
        (char >= ACCENTED_RANGE_START && char <= ACCENTED_RANGE_END) ||
        (char >= ZERO && char <= NINE) ||
        char === UNDERSCORE ||
        char === DOLLAR_SIGN ||
        char === PERIOD ||
        char === EXCLAMATION_MARK
      ) {
        continue;
      }

      if (char === OPEN_SQUARE_BRACKET) {
        square_bracket++;
        continue;
      }

      if (square_bracket > 0 && char === CLOSE_SQUARE_BRACKET) {
        square_bracket--;
        continue;
      }

      // signs are only legal immediately inside the bracket

      if (square_bracket > 0 && (char === MINUS || char === PLUS)
          && this.data[this.index - 1] === OPEN_SQUARE_BRACKET) {
        continue;
      }

      break;
    }

    return { text: this.expression.substring(start, this.index), square_bracket };

  }

  /**
   * consume token. also checks for function call, because parens
   * have a different meaning (grouping/precedence) when they appear
   * not immediately after a token.
   *
   * tokens that are neither booleans, calls nor addresses are errors:
   * we don't support names.
   */
  protected ConsumeToken(): ExpressionUnit | undefined {

    const position = this.index;
    const { text, square_bracket } = this.ReadToken();

    if (square_bracket) {
      this.SetError(CompileErrorKind.UnbalancedDelimiter, 'unbalanced square bracket', position);
      return undefined;
    }

    // function takes precendence over address? I guess so

    const after_token = this.index;
    this.ConsumeWhiteSpace();

    if (this.data[this.index] === OPEN_PAREN) {
      if (!function_name_regex.test(text)) {
        this.SetError(CompileErrorKind.UnexpectedToken, `invalid function name: ${text}`, position);
        return undefined;
      }
      const call: UnitCall = {
        type: 'call',
        id: this.id_counter++,
        name: text,
        args: [],
        position,
      };
      call.args = this.ConsumeArguments(this.index);
      return call;
    }

    this.index = after_token;

    // special handling. booleans are not addresses, but they can be
    // function names (`TRUE()`)

    if (text.toUpperCase() === this.flags.boolean_true.toUpperCase()) {
      return {
        type: 'literal',
        id: this.id_counter++,
        value: true,
        position,
      };
    }
    if (text.toUpperCase() === this.flags.boolean_false.toUpperCase()) {
      return {
        type: 'literal',
        id: this.id_counter++,
        value: false,
        position,
      };
    }

    const address = this.ConsumeAddress(text, position);
    if (address) {
      return address;
    }

    if (text.includes('!') || text.includes('[') || address_like_regex.test(text)
        || (this.flags.r1c1 && r1c1_regex.test(text))) {
      this.SetError(CompileErrorKind.InvalidReference, `invalid reference: ${text}`, position);
    }
    else {
      this.SetError(CompileErrorKind.UnexpectedToken, `unexpected token: ${text}`, position);
    }

    return undefined;

  }

  /**
   * quoted sheet name, followed by `!` and an address. quotes in the
   * name are escaped by doubling them (`'My''Sheet'!A1`).
   */
  protected ConsumeQuotedReference(): UnitAddress | undefined {

    const position = this.index;
    const name: number[] = [];
    let closed = false;

    for (++this.index; this.index < this.length; this.index++) {
      const char = this.data[this.index];
      if (char === SINGLE_QUOTE) {
        if (this.data[this.index + 1] === SINGLE_QUOTE) {
          name.push(char);
          this.index++;
          continue;
        }
        this.index++;
        closed = true;
        break;
      }
      name.push(char);
    }

    if (!closed) {
      this.SetError(CompileErrorKind.UnbalancedDelimiter, 'unbalanced single quote', position);
      return undefined;
    }

    if (!name.length || this.data[this.index] !== EXCLAMATION_MARK) {
      this.SetError(CompileErrorKind.InvalidReference, 'expected sheet reference', position);
      return undefined;
    }

    this.index++; // !

    const sheet = name.map((char) => String.fromCharCode(char)).join('');
    const { text, square_bracket } = this.ReadToken();

    const address = square_bracket ? null : this.ConsumeAddress(text, position, sheet);
    if (!address) {
      this.SetError(CompileErrorKind.InvalidReference, `invalid reference: ${this.expression.substring(position, this.index)}`, position);
      return undefined;
    }

    return address;

  }

  /**
   * check if the token is an address. if the sheet name was quoted, it's
   * passed separately; otherwise it's split from the token on `!`.
   *
   * A1 is tested first, then R1C1 (if enabled).
   */
  protected ConsumeAddress(
    token: string,
    position: number,
    sheet?: string,
  ): UnitAddress | null {

    let part = token;

    if (sheet === undefined) {
      const tokens = token.split('!');
      if (tokens.length > 2) {
        return null;
      }
      if (tokens.length === 2) {
        sheet = tokens[0];
        part = tokens[1];
        if (!sheet) {
          return null;
        }
      }
    }

    const prefix = sheet !== undefined ? QuoteSheetName(sheet) + '!' : '';

    const a1 = part.match(a1_regex);
    if (a1) {

      let column = -1; // clever
      for (const char of a1[2].toUpperCase()) {
        column = 26 * (1 + column) + (char.charCodeAt(0) - UC_A);
      }

      const row = Number(a1[4]) - 1;

      if (row < 0 || row >= MAX_ROWS || column >= MAX_COLUMNS) {
        return null;
      }

      return this.RegisterAddress({
        type: 'address',
        id: this.id_counter++,
        label: prefix + part.toUpperCase(),
        row,
        column,
        absolute_row: a1[3] === '$',
        absolute_column: a1[1] === '$',
        position,
        sheet,
      });

    }

    if (this.flags.r1c1) {

      const match = part.match(r1c1_regex);
      if (match) {

        const r1c1: UnitAddress = {
          type: 'address',
          id: this.id_counter++,
          label: prefix + part.toUpperCase(),
          row: 0,
          column: 0,
          position,
          sheet,
          r1c1: true,
        };

        // missing row or column means "this row" or "this column"

        if (!match[1]) {
          r1c1.offset_row = true;
        }
        else if (match[1][0] === '[') { // relative
          r1c1.offset_row = true;
          r1c1.row = Number(match[1].substring(1, match[1].length - 1));
        }
        else { // absolute
          r1c1.absolute_row = true;
          r1c1.row = Number(match[1]) - 1; // R1C1 is 1-based
        }

        if (!match[2]) {
          r1c1.offset_column = true;
        }
        else if (match[2][0] === '[') { // relative
          r1c1.offset_column = true;
          r1c1.column = Number(match[2].substring(1, match[2].length - 1));
        }
        else { // absolute
          r1c1.absolute_column = true;
          r1c1.column = Number(match[2]) - 1; // R1C1 is 1-based
        }

        if ((r1c1.absolute_row && (r1c1.row < 0 || r1c1.row >= MAX_ROWS))
            || (r1c1.absolute_column && (r1c1.column < 0 || r1c1.column >= MAX_COLUMNS))) {
          return null;
        }

        return this.RegisterAddress(r1c1);

      }
    }

    return null;
  }

  /** store ref, increment count */
  protected RegisterAddress(address: UnitAddress): UnitAddress {
    this.dependencies.addresses[address.label] = address;
    this.address_refcount[address.label] = (this.address_refcount[address.label] || 0) + 1;
    this.full_reference_list.push(address);
    return address;
  }

  /**
   * error literals, like `#N/A` or `#DIV/0!`. case-insensitive.
   */
  protected ConsumeErrorLiteral(): UnitErrorLiteral | undefined {

    const position = this.index;

    for (const { value, label } of error_literals) {
      if (this.expression.substring(this.index, this.index + label.length).toUpperCase() === label) {
        this.index += label.length;
        return {
          type: 'error',
          id: this.id_counter++,
          position,
          value,
        };
      }
    }

    this.SetError(CompileErrorKind.InvalidLiteral, 'unknown error literal', position);
    return undefined;

  }

  /**
   * consumes number. supported formats:
   *
   * 3
   * 100.9
   * .5
   * 10.0%
   * 1e-2
   *
   * signs are not part of the number; they're unary operators. commas
   * (grouping) are not acceptable in numbers, we can't distinguish
   * between them and function argument separators.
   *
   * a number running into letters, a second decimal point or an exponent
   * without digits is an invalid literal.
   */
  protected ConsumeNumber(): UnitLiteralNumber | undefined {

    const start_index = this.index;

    let state: 'integer' | 'fraction' | 'exponent' = 'integer';
    let digits = 0;

    for (; this.index < this.length; this.index++) {
      const char = this.data[this.index];

      if (char >= ZERO && char <= NINE) {
        if (state !== 'exponent') digits++;
      }
      else if (char === PERIOD) {
        if (state === 'integer') state = 'fraction';
        else {
          this.SetError(CompileErrorKind.InvalidLiteral, 'invalid number', start_index);
          return undefined;
        }
      }
      else if (char === UC_E || char === LC_E) {
        if (state === 'exponent') {
          break; // caught below
        }

        let next = this.data[this.index + 1];
        if (next === PLUS || next === MINUS) {
          this.index++;
          next = this.data[this.index + 1];
        }

        if (!(next >= ZERO && next <= NINE)) {
          this.SetError(CompileErrorKind.InvalidLiteral, 'invalid exponent', start_index);
          return undefined;
        }

        state = 'exponent';
      }
      else break;
    }

    const text = this.expression.substring(start_index, this.index);

    if (!digits) {
      this.SetError(CompileErrorKind.InvalidLiteral, 'invalid number', start_index);
      return undefined;
    }

    let value = Number(text);
    let percent = false;

    if (this.data[this.index] === PERCENT) {
      value /= 100;
      percent = true;
      this.index++;
    }

    // a number can't run into a name or another number

    const char = this.data[this.index];
    if ((char >= UC_A && char <= UC_Z) ||
        (char >= LC_A && char <= LC_Z) ||
        (char >= ZERO && char <= NINE) ||
        (char >= ACCENTED_RANGE_START && char <= ACCENTED_RANGE_END) ||
        char === UNDERSCORE ||
        char === PERIOD) {
      this.SetError(CompileErrorKind.InvalidLiteral, 'invalid number', start_index);
      return undefined;
    }

    return {
      type: 'literal',
      id: this.id_counter++,
      position: start_index,
      value,
      text: this.expression.substring(start_index, this.index),
      integer: state === 'integer' && !percent,
    };

  }

  /**
   * in spreadsheet language ONLY double-quoted strings are legal. there
   * are no escape characters, and a backslash is a legal character. to
   * embed a quotation mark, use "" (double-double quote); that's an escaped
   * double-quote.
   *
   * returns undefined (and sets the error) if the string is not closed.
   */
  protected ConsumeString(): string | undefined {
    const position = this.index;
    this.index++; // open quote
    const str: number[] = [];

    for (; this.index < this.length; this.index++) {
      const char = this.data[this.index];
      if (char === DOUBLE_QUOTE) {
        // always do this: either it's part of the string (and
        // we want to skip the next one), or it's the end of the
        // string and we want to close the literal.

        this.index++;

        if (this.data[this.index] !== DOUBLE_QUOTE) {
          return str.map((code) => String.fromCharCode(code)).join('');
        }
      }
      str.push(char);
    }

    this.SetError(CompileErrorKind.UnbalancedDelimiter, 'unterminated string', position);
    return undefined;
  }

  /** run through any intervening whitespace */
  protected ConsumeWhiteSpace(): void {
    for (; this.index < this.length;) {
      const char = this.data[this.index];
      if (
        char === SPACE ||
        char === TAB ||
        char === CR ||
        char === LF ||
        char === NON_BREAKING_SPACE
      ) {
        this.index++;
      }
      else return;
    }
  }
}
