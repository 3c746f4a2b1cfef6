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

import { ErrorType } from 'cellgraph-base-types';
import { Parser } from './parser';
import type { ExpressionUnit } from './parser-types';
import { ArgumentSeparatorType, CompileErrorKind } from './parser-types';

const parser = new Parser();

test('constructor', () => {
  expect(typeof parser).toBe('object');
});

describe('basic parsing', () => {

  test('3 + 4', () => {
    const result = parser.Parse('3 + 4');
    expect(result).toBeDefined();
    expect(result.valid).toBeTruthy();
  });

  test('/ 2', () => {
    const result = parser.Parse('/ 2');
    expect(result.valid).toBeFalsy();
    expect(result.error_kind).toEqual(CompileErrorKind.UnexpectedToken);
    expect(result.error_position).toEqual(0);
  });

  test('leading =', () => {
    const result = parser.Parse('  = 1 + 2');
    expect(result.valid).toBeTruthy();
    expect(result.expression).toMatchObject({ type: 'binary', operator: '+' });
  });

  test('empty', () => {
    expect(parser.Parse('=').error_position).toEqual(1);
    expect(parser.Parse('').error_kind).toEqual(CompileErrorKind.UnexpectedToken);
  });

});

describe('parsing/rendering', () => {

  const expression = '2.2 + (3 / foo(bar("1"), 8))';

  test(expression, () => {
    const result = parser.Parse(expression);
    expect(result.valid).toBeTruthy();
    expect(result.expression).toBeDefined();
    if (result.expression){
      const rendered = parser.Render(result.expression);
      expect(rendered).toEqual(expression);
    }
  });

  test('converting separators', () => {
    const result = parser.Parse(expression);
    expect(result.valid).toBeTruthy();
    if (result.expression){
      const rendered = parser.Render(result.expression, {
        convert_argument_separator: ArgumentSeparatorType.Semicolon });
      expect(rendered).toEqual('2.2 + (3 / foo(bar("1"); 8))');
    }
  });

  test('strings escape quotes', () => {
    const result = parser.Parse('"a""b"');
    expect(result.expression).toMatchObject({ type: 'literal', value: 'a"b' });
    if (result.expression) {
      expect(parser.Render(result.expression)).toEqual('"a""b"');
    }
  });

  test('booleans', () => {
    const result = parser.Parse('true');
    expect(result.expression).toMatchObject({ type: 'literal', value: true });
    if (result.expression) {
      expect(parser.Render(result.expression)).toEqual('TRUE');
    }
  });

  test('boolean names can be functions', () => {
    expect(parser.Parse('TRUE()').expression).toMatchObject({ type: 'call', name: 'TRUE', args: [] });
  });

});

describe('precedence', () => {

  test('multiplication before addition', () => {
    const result = parser.Parse('1+2*3');
    expect(result.expression).toMatchObject({
      type: 'binary', operator: '+',
      left: { type: 'literal', value: 1 },
      right: { type: 'binary', operator: '*' },
    });
  });

  test('left-associative', () => {
    expect(parser.Parse('1-2-3').expression).toMatchObject({
      operator: '-',
      left: { type: 'binary', operator: '-' },
      right: { type: 'literal', value: 3 },
    });
    expect(parser.Parse('2^3^2').expression).toMatchObject({
      operator: '^',
      left: { type: 'binary', operator: '^' },
      right: { type: 'literal', value: 2 },
    });
  });

  test('power binds tighter than negation', () => {
    expect(parser.Parse('-2^2').expression).toMatchObject({
      type: 'unary', operator: '-',
      operand: { type: 'binary', operator: '^' },
    });
  });

  test('negation binds tighter than multiplication', () => {
    expect(parser.Parse('-2*3').expression).toMatchObject({
      type: 'binary', operator: '*',
      left: { type: 'unary', operator: '-' },
    });
    expect(parser.Parse('2*-3').expression).toMatchObject({
      type: 'binary', operator: '*',
      right: { type: 'unary', operator: '-' },
    });
  });

  test('comparison is lowest', () => {
    expect(parser.Parse('1&2=12').expression).toMatchObject({
      type: 'binary', operator: '=',
      left: { type: 'binary', operator: '&' },
    });
  });

  test('groups', () => {
    expect(parser.Parse('(1+2)*3').expression).toMatchObject({
      type: 'binary', operator: '*',
      left: { type: 'group', elements: [{ type: 'binary', operator: '+' }] },
    });
  });

  test('postfix percent', () => {
    expect(parser.Parse('A1%').expression).toMatchObject({
      type: 'unary', operator: '%', operand: { type: 'address', label: 'A1' },
    });
  });

  test('missing operator', () => {
    const result = parser.Parse('1 2');
    expect(result.error_kind).toEqual(CompileErrorKind.UnexpectedToken);
    expect(result.error_position).toEqual(2);
  });

  test('missing operand', () => {
    const result = parser.Parse('= 1 +');
    expect(result.error_kind).toEqual(CompileErrorKind.UnexpectedToken);
    expect(result.error_position).toEqual(5);
  });

});

describe('number parsing', () => {

  const decimals = [1, 1.11, 2.2343, 123819238, 0.00012];

  decimals.forEach((decimal) => {
    const as_string = decimal.toString();
    test(as_string, () => {
      const result = parser.Parse(as_string);
      expect(result.expression).toMatchObject({ type: 'literal', value: decimal });
    });
  });

  test('integer flag', () => {
    expect(parser.Parse('42').expression).toMatchObject({ value: 42, integer: true });
    expect(parser.Parse('4.0').expression).toMatchObject({ value: 4, integer: false });
    expect(parser.Parse('1e3').expression).toMatchObject({ value: 1000, integer: false });
    expect(parser.Parse('.5').expression).toMatchObject({ value: 0.5, integer: false });
  });

  test('33.33%', () => {
    const result = parser.Parse('33.33%');
    expect(result.expression).toMatchObject({ type: 'literal', text: '33.33%', integer: false });
  });

  test('negative numbers are unary', () => {
    expect(parser.Parse('-6').expression).toMatchObject({
      type: 'unary', operator: '-', operand: { type: 'literal', value: 6 } });
  });

  test('malformed numbers', () => {
    for (const text of ['1.2.3', '12abc', '1e', '1e+']) {
      const result = parser.Parse(text);
      expect(result.error_kind).toEqual(CompileErrorKind.InvalidLiteral);
      expect(result.error_position).toEqual(0);
    }
  });

});

describe('error literals', () => {

  test('known errors', () => {
    expect(parser.Parse('#n/a').expression).toMatchObject({ type: 'error', value: ErrorType.NA });
    expect(parser.Parse('#DIV/0!').expression).toMatchObject({ type: 'error', value: ErrorType.Div0 });
    const result = parser.Parse('#REF!');
    if (result.expression) {
      expect(parser.Render(result.expression)).toEqual('#REF!');
    }
  });

  test('unknown error', () => {
    const result = parser.Parse('=1+#FOO');
    expect(result.error_kind).toEqual(CompileErrorKind.InvalidLiteral);
    expect(result.error_position).toEqual(3);
  });

});

describe('addresses', () => {

  test('A1', () => {
    expect(parser.Parse('A1').expression).toMatchObject({
      type: 'address', label: 'A1', row: 0, column: 0, absolute_row: false, absolute_column: false });
    expect(parser.Parse('$B$3').expression).toMatchObject({
      type: 'address', row: 2, column: 1, absolute_row: true, absolute_column: true });
    expect(parser.Parse('aa10').expression).toMatchObject({
      type: 'address', label: 'AA10', row: 9, column: 26 });
  });

  test('sheet names', () => {
    expect(parser.Parse('Sheet2!C4').expression).toMatchObject({
      type: 'address', sheet: 'Sheet2', label: 'Sheet2!C4', row: 3, column: 2 });
    expect(parser.Parse(`'My Sheet'!A1`).expression).toMatchObject({
      type: 'address', sheet: 'My Sheet', label: `'My Sheet'!A1` });
    expect(parser.Parse(`'My''Sheet'!B2`).expression).toMatchObject({
      type: 'address', sheet: `My'Sheet`, row: 1, column: 1 });
  });

  test('ranges', () => {
    const result = parser.Parse('Sheet1!A1:B2');
    expect(result.expression).toMatchObject({
      type: 'range', label: 'Sheet1!A1:B2',
      start: { sheet: 'Sheet1', row: 0, column: 0 },
      end: { sheet: 'Sheet1', row: 1, column: 1 },
    });
    expect(Object.keys(result.dependencies.ranges)).toEqual(['Sheet1!A1:B2']);
    expect(Object.keys(result.dependencies.addresses)).toEqual([]);
  });

  test('degenerate range is still a range', () => {
    expect(parser.Parse('A1:A1').expression).toMatchObject({ type: 'range' });
    expect(parser.Parse('A1').expression).toMatchObject({ type: 'address' });
  });

  test('R1C1', () => {
    expect(parser.Parse('R1C1').expression).toMatchObject({
      type: 'address', r1c1: true, row: 0, column: 0, absolute_row: true, absolute_column: true });
    expect(parser.Parse('R[-1]C[2]').expression).toMatchObject({
      type: 'address', r1c1: true, row: -1, column: 2, offset_row: true, offset_column: true });
    expect(parser.Parse('RC').expression).toMatchObject({
      type: 'address', r1c1: true, row: 0, column: 0, offset_row: true, offset_column: true });
    const result = parser.Parse('R[-1]C');
    if (result.expression) {
      expect(parser.Render(result.expression)).toEqual('R[-1]C');
    }
  });

  test('A1 wins where both notations match', () => {
    expect(parser.Parse('RC1').expression).toMatchObject({ type: 'address', row: 0, column: 470 });
  });

  test('invalid references', () => {
    for (const text of ['A0', 'Sheet1!', 'R0C1', 'A1:', '1+:B2']) {
      expect(parser.Parse(text).error_kind).toEqual(CompileErrorKind.InvalidReference);
    }
  });

  test('names are not supported', () => {
    const result = parser.Parse('=foo + 1');
    expect(result.error_kind).toEqual(CompileErrorKind.UnexpectedToken);
    expect(result.error_position).toEqual(1);
  });

  test('reference list', () => {
    const result = parser.Parse('SUM(A1:B2, C3, A1)');
    expect(result.full_reference_list.map(unit => unit.type)).toEqual(['range', 'address', 'address']);
    expect(Object.keys(result.dependencies.addresses)).toEqual(['A1', 'C3']);
  });

});

describe('delimiters', () => {

  const cases: Array<[string, number]> = [
    ['=SUM(1, 2', 4],
    ['=(1+2', 1],
    ['=1+2)', 4],
    ['="abc', 1],
    ['={1,2', 1],
    [`='Sheet1!A1`, 1],
    ['=R[1C1', 1],
  ];

  for (const [text, position] of cases) {
    test(text, () => {
      const result = parser.Parse(text);
      expect(result.error_kind).toEqual(CompileErrorKind.UnbalancedDelimiter);
      expect(result.error_position).toEqual(position);
    });
  }

});

describe('arrays', () => {

  test('row-major', () => {
    const result = parser.Parse('{1,2;3,4}');
    expect(result.expression).toMatchObject({
      type: 'array',
      values: [
        [{ value: 1 }, { value: 2 }],
        [{ value: 3 }, { value: 4 }],
      ],
    });
    if (result.expression) {
      expect(parser.Render(result.expression)).toEqual('{1,2;3,4}');
    }
  });

  test('negative values and strings', () => {
    expect(parser.Parse('{-1.5,"x",TRUE}').expression).toMatchObject({
      values: [[{ value: -1.5, text: '-1.5' }, { value: 'x' }, { value: true }]],
    });
  });

  test('ragged', () => {
    expect(parser.Parse('{1,2;3}').error_kind).toEqual(CompileErrorKind.InvalidLiteral);
  });

  test('references are not allowed', () => {
    expect(parser.Parse('{A1}').error_kind).toEqual(CompileErrorKind.UnexpectedToken);
  });

});

describe('function calls', () => {

  test('missing arguments', () => {
    expect(parser.Parse('IF(A1,,2)').expression).toMatchObject({
      type: 'call', name: 'IF',
      args: [{ type: 'address' }, { type: 'missing' }, { type: 'literal', value: 2 }],
    });
    expect(parser.Parse('F(1,)').expression).toMatchObject({
      args: [{ type: 'literal' }, { type: 'missing' }],
    });
  });

  test('whitespace before paren', () => {
    expect(parser.Parse('SUM (1)').expression).toMatchObject({ type: 'call', name: 'SUM' });
  });

  test('semicolon separator', () => {
    const local = new Parser();
    local.argument_separator = ArgumentSeparatorType.Semicolon;
    expect(local.Parse('SUM(1;2)').expression).toMatchObject({ type: 'call', args: [{ value: 1 }, { value: 2 }] });
    expect(local.Parse('SUM(1,2)').valid).toBeFalsy();
  });

});

test('walk', () => {
  const result = parser.Parse('1+SUM(2,3)');
  let literals = 0;
  if (result.expression) {
    parser.Walk(result.expression, (unit: ExpressionUnit) => {
      if (unit.type === 'literal') literals++;
      return true;
    });
  }
  expect(literals).toEqual(3);
});
