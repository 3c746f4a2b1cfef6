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

import type { ICellAddress, UnionValue, ArrayUnion } from 'cellgraph-base-types';
import {
  Area, ValueType, ErrorType, ErrorLabel, EmptyUnion,
  IntUnion, FloatUnion, TextUnion, BoolUnion, ErrorValueUnion } from 'cellgraph-base-types';
import type {
  CompiledFormula, ExpressionUnit, UnitAddress, UnitRange, UnitBinary,
  UnitUnary, UnitCall, UnitGroup, UnitLiteral } from 'cellgraph-parser';
import { MAX_ROWS, MAX_COLUMNS } from 'cellgraph-parser';

import type { EvalContext } from './eval-context';
import type { ArgumentDescriptor, FunctionContext, ResolvedReference } from './descriptors';
import type { FunctionLibrary } from './function-library';
import { GetArity, ArityLabel } from './function-library';
import { FormulaError, NameError, ReferenceError, ValueError } from './function-error';
import { CoerceBoolean, CoerceNumber, IsErrorUnion } from './utilities';
import * as Primitives from './primitives';

export interface CalculatorOptions {

  /** log unexpected input (unknown functions, malformed trees) */
  debug: boolean;

}

/**
 * state for one calculation. `error_site` is the call site that most
 * recently produced (not propagated) an error value; if the result is an
 * error, that's where it came from.
 */
export interface CalculationContext {
  data: EvalContext;
  address?: ICellAddress;
  text: string;
  error_site?: string;
}

export interface CalculationResult {
  value: UnionValue;
  error_site?: string;
}

export class ExpressionCalculator {

  protected context: CalculationContext = {
    data: {
      GetCell: () => EmptyUnion(),
      GetRange: () => [],
    },
    text: '',
  };

  // --- public API -----------------------------------------------------------

  constructor(
    protected readonly library: FunctionLibrary,
    protected readonly options: Partial<CalculatorOptions> = {}) {}

  /**
   * calculate a compiled formula against a context. spreadsheet errors
   * come back as values. throws FormulaError if a function is called with
   * the wrong number of arguments.
   */
  public Calculate(formula: CompiledFormula, data: EvalContext): CalculationResult {

    this.context = {
      data,
      address: data.current_cell,
      text: formula.text,
    };

    const value = this.CalculateExpression(formula.expression);

    return {
      value,
      error_site: value.type === ValueType.error ? this.context.error_site : undefined,
    };

  }

  // --- /public API ----------------------------------------------------------

  /**
   * pass a value through, recording the call site if it's an error. use
   * this for values we create; propagated errors keep their original site.
   */
  protected Produce<T extends UnionValue>(site: string, value: T): T {
    if (value.type === ValueType.error) {
      this.context.error_site = site;
    }
    return value;
  }

  /**
   * resolve an address to absolute coordinates. relative R1C1 parts are
   * offsets from the current cell, so they need one. returns undefined
   * if we can't resolve or the result is off the sheet.
   */
  protected ResolveAddress(unit: UnitAddress): ICellAddress|undefined {

    let row = unit.row;
    let column = unit.column;

    if (unit.offset_row || unit.offset_column) {
      const base = this.context.address;
      if (!base) {
        return undefined;
      }
      if (unit.offset_row) { row += base.row; }
      if (unit.offset_column) { column += base.column; }
    }

    if (row < 0 || column < 0 || row >= MAX_ROWS || column >= MAX_COLUMNS) {
      return undefined;
    }

    return { row, column };

  }

  protected ResolveReference(unit: UnitAddress|UnitRange): ResolvedReference|undefined {

    if (unit.type === 'address') {
      const address = this.ResolveAddress(unit);
      if (!address) {
        return undefined;
      }
      return { sheet: unit.sheet, area: new Area(address), single: true };
    }

    const start = this.ResolveAddress(unit.start);
    const end = this.ResolveAddress(unit.end);

    if (!start || !end) {
      return undefined;
    }

    return { sheet: unit.start.sheet, area: new Area(start, end, true), single: false };

  }

  /**
   * read a reference from the context. single addresses are scalars,
   * ranges (even 1x1 ranges) are arrays.
   */
  protected ReadReference(reference: ResolvedReference): UnionValue {

    const data = this.context.data;
    const sheet = reference.sheet;

    if (reference.single) {
      const address = reference.area.start;
      if (sheet) {
        return data.GetSheetCell ? data.GetSheetCell(sheet, address) : ReferenceError();
      }
      return data.GetCell(address);
    }

    let value: UnionValue[][];
    if (sheet) {
      if (!data.GetSheetRange) return ReferenceError();
      value = data.GetSheetRange(sheet, reference.area);
    }
    else {
      value = data.GetRange(reference.area);
    }

    return { type: ValueType.array, value };

  }

  protected Reference(unit: UnitAddress|UnitRange): UnionValue {
    const reference = this.ResolveReference(unit);
    if (!reference) {
      return this.Produce(unit.label, ReferenceError());
    }
    return this.Produce(unit.label, this.ReadReference(reference));
  }

  protected CallExpression(expr: UnitCall): UnionValue {

    const call_site = expr.name.toUpperCase();

    // get the function descriptor. unknown names are not an exception,
    // they're a value.

    const func = this.library.Get(expr.name);

    if (!func) {
      if (this.options.debug) {
        console.info('missing function', expr.name);
      }
      return this.Produce(call_site, NameError());
    }

    const arity = GetArity(func);
    if (expr.args.length < arity.min || expr.args.length > arity.max) {
      throw new FormulaError(ErrorType.Value, call_site,
        `expected ${ArityLabel(arity)} argument(s), got ${expr.args.length}`, this.context.text);
    }

    // we recurse calculation, but in the specific case of IF functions
    // we can short-circuit and skip the unused code path. doesn't apply
    // anywhere else atm

    const if_function = call_site === 'IF';
    let skip_argument_index = -1;

    const argument_descriptors = func.arguments || [];
    const references: Array<ResolvedReference|undefined> = [];
    const args: UnionValue[] = [];

    for (let index = 0; index < expr.args.length; index++) {

      const arg = expr.args[index];

      // if the number of arguments exceeds the number of descriptors,
      // recycle the last one (that's the repeating argument)

      const descriptor: ArgumentDescriptor = argument_descriptors[Math.min(index, argument_descriptors.length - 1)] || {};

      // if function, wrong branch

      if (index === skip_argument_index) {
        args.push(EmptyUnion());
        continue;
      }

      if (arg.type === 'missing') {
        if (if_function && index === 0) { skip_argument_index = 1; }
        args.push(EmptyUnion());
        continue;
      }

      if (descriptor.address && (arg.type === 'address' || arg.type === 'range')) {
        const reference = this.ResolveReference(arg);
        if (!reference) {
          return this.Produce(arg.label, ReferenceError());
        }
        references[index] = reference;
        args.push(EmptyUnion());
        continue;
      }

      const result = this.CalculateExpression(arg);

      // arguments stop at the first error, unless the function wants it

      if (result.type === ValueType.error && !descriptor.allow_error) {
        return result;
      }

      // can't shortcut if you have an array (or we need to test all the values)

      if (if_function && index === 0 && result.type !== ValueType.array) {
        const truthy = CoerceBoolean(result);
        if (!IsErrorUnion(truthy)) {
          skip_argument_index = truthy ? 2 : 1;
        }
      }

      args.push(result);

    }

    const context: FunctionContext = {
      address: this.context.address ? { ...this.context.address } : undefined,
      references,
      Resolve: (reference: ResolvedReference) => this.ReadReference(reference),
    };

    return this.Produce(call_site, func.fn(args, context));

  }

  protected UnaryExpression(expr: UnitUnary): UnionValue {

    const operand = this.CalculateExpression(expr.operand);

    if (operand.type === ValueType.error) {
      return operand;
    }

    if (expr.operator === '+') {
      return operand;
    }

    const fn = expr.operator === '-' ? this.Negate : this.Percent;

    const site = `'${expr.operator}' operator`;

    if (operand.type === ValueType.array) {
      return {
        type: ValueType.array,
        value: operand.value.map(row => row.map(value => this.Produce(site, fn(value)))),
      };
    }

    return this.Produce(site, fn(operand));

  }

  protected Negate(value: UnionValue): UnionValue {
    if (value.type === ValueType.integer) {
      return IntUnion(0 - value.value);
    }
    return Primitives.Subtract(FloatUnion(0), value);
  }

  protected Percent(value: UnionValue): UnionValue {
    const number = CoerceNumber(value);
    return IsErrorUnion(number) ? number : FloatUnion(number / 100);
  }

  /**
   * expands the size of an array by recycling values in rows and columns.
   * returns a new array, the original is not modified.
   */
  protected RecycleArray<T>(arr: T[][], rows: number, columns: number): T[][] {

    const result: T[][] = [];

    for (let r = 0; r < rows; r++) {
      const source = arr[r % arr.length];
      const row: T[] = [];
      for (let c = 0; c < columns; c++) {
        row.push(source[c % source.length]);
      }
      result.push(row);
    }

    return result;

  }

  protected ElementwiseBinaryExpression(
      fn: Primitives.PrimitiveBinaryExpression,
      left: ArrayUnion,
      right: ArrayUnion,
      site: string): ArrayUnion {

    const rows = Math.max(left.value.length, right.value.length);
    const columns = Math.max(left.value[0]?.length || 0, right.value[0]?.length || 0);

    // an empty array on either side gives an empty result

    if (!left.value.length || !right.value.length || !columns) {
      return { type: ValueType.array, value: [] };
    }

    const left_values = this.RecycleArray(left.value, rows, columns);
    const right_values = this.RecycleArray(right.value, rows, columns);

    const value: UnionValue[][] = [];

    for (let r = 0; r < rows; r++) {
      const row: UnionValue[] = [];
      for (let c = 0; c < columns; c++) {
        row.push(this.Produce(site, fn(
          left_values[r][c] || EmptyUnion(),
          right_values[r][c] || EmptyUnion())));
      }
      value.push(row);
    }

    return { type: ValueType.array, value };

  }

  protected BinaryExpression(expr: UnitBinary): UnionValue {

    const fn = Primitives.MapOperator(expr.operator);
    const site = `'${expr.operator}' operator`;

    // errors short-circuit, left to right

    const left = this.CalculateExpression(expr.left);
    if (left.type === ValueType.error) {
      return left;
    }

    const right = this.CalculateExpression(expr.right);
    if (right.type === ValueType.error) {
      return right;
    }

    // check for arrays. do elementwise operations.

    if (left.type === ValueType.array) {
      if (right.type === ValueType.array) {
        return this.ElementwiseBinaryExpression(fn, left, right, site);
      }
      return this.ElementwiseBinaryExpression(fn, left, { type: ValueType.array, value: [[right]] }, site);
    }
    else if (right.type === ValueType.array) {
      return this.ElementwiseBinaryExpression(fn, { type: ValueType.array, value: [[left]] }, right, site);
    }

    return this.Produce(site, fn(left, right));

  }

  protected GroupExpression(expr: UnitGroup): UnionValue {

    // a group is an expression in parentheses. expressions nest, so
    // there's no case where a group should have length !== 1

    if (expr.elements.length !== 1) {
      if (this.options.debug) {
        console.warn(`can't handle group !== 1`);
      }
      return this.Produce('group', ValueError());
    }

    return this.CalculateExpression(expr.elements[0]);
  }

  /**
   * integer literals (no fraction, exponent or percent) are integers;
   * all other numbers are floats.
   */
  protected Literal(unit: UnitLiteral): UnionValue {

    const value = unit.value;

    switch (typeof value) {
      case 'number':
        return ('integer' in unit && unit.integer && Number.isSafeInteger(value)) ?
          IntUnion(value) : FloatUnion(value);

      case 'string':
        return TextUnion(value);

      default:
        return BoolUnion(value);
    }

  }

  protected CalculateExpression(expr: ExpressionUnit): UnionValue {

    switch (expr.type) {

      case 'call':
        return this.CallExpression(expr);

      case 'address':
      case 'range':
        return this.Reference(expr);

      case 'binary':
        return this.BinaryExpression(expr);

      case 'unary':
        return this.UnaryExpression(expr);

      case 'group':
        return this.GroupExpression(expr);

      case 'missing':
        return EmptyUnion();

      case 'literal':
        return this.Literal(expr);

      case 'error':
        return this.Produce(ErrorLabel(expr.value), ErrorValueUnion(expr.value));

      case 'array':
        return {
          type: ValueType.array,
          value: expr.values.map(row => row.map(literal => this.Literal(literal))),
        };

      default:
        if (this.options.debug) {
          console.warn('unhandled parse expr:', expr);
        }
        return this.Produce(expr.type, ValueError());
    }

  }

}
