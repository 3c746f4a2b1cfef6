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
import { ValueType, ErrorType, IntUnion, FloatUnion, TextUnion } from 'cellgraph-base-types';

import { DataEvalContext } from '../eval-context';
import { EvaluateFormula } from '../evaluate';
import { BinarySearch } from './lookup-functions';

const products = DataEvalContext.FromRows([
  ['Apple', 1.5, 100],
  ['Banana', 0.75, 200],
  ['Cherry', 2, 150],
]);

const Calc = (text: string): UnionValue => EvaluateFormula(text, products);

const NA = { type: ValueType.error, value: ErrorType.NA };
const REF = { type: ValueType.error, value: ErrorType.Reference };
const VALUE = { type: ValueType.error, value: ErrorType.Value };

describe('binary search', () => {

  test('ascending', () => {
    const values = [IntUnion(10), IntUnion(50), IntUnion(100)];
    expect(BinarySearch(values, IntUnion(75))).toEqual(1);
    expect(BinarySearch(values, IntUnion(100))).toEqual(2);
    expect(BinarySearch(values, IntUnion(500))).toEqual(2);
    expect(BinarySearch(values, IntUnion(5))).toEqual(-1);
  });

  test('descending', () => {
    const values = [IntUnion(100), IntUnion(50), IntUnion(10)];
    expect(BinarySearch(values, IntUnion(75), true)).toEqual(0);
    expect(BinarySearch(values, IntUnion(50), true)).toEqual(1);
    expect(BinarySearch(values, IntUnion(500), true)).toEqual(-1);
  });

});

describe('VLOOKUP', () => {

  test('exact match', () => {
    expect(Calc('=VLOOKUP("Banana",A1:C3,2,FALSE)')).toEqual(FloatUnion(0.75));
    expect(Calc('=VLOOKUP("Cherry",A1:C3,3,FALSE)')).toEqual(FloatUnion(150));
  });

  test('missing value is #N/A', () => {
    expect(Calc('=VLOOKUP("Pear",A1:C3,2,FALSE)')).toEqual(NA);
  });

  test('exact match is case-sensitive', () => {
    expect(Calc('=VLOOKUP("banana",A1:C3,2,FALSE)')).toEqual(NA);
  });

  test('approximate match returns the largest entry <= value', () => {
    expect(Calc('=VLOOKUP("Blueberry",A1:C3,3)')).toEqual(FloatUnion(200));
    expect(Calc('=VLOOKUP("Blueberry",A1:C3,3,TRUE)')).toEqual(FloatUnion(200));
    expect(Calc('=VLOOKUP("Aardvark",A1:C3,2)')).toEqual(NA);
  });

  test('numbers match text numbers', () => {
    expect(EvaluateFormula('=VLOOKUP("2",{1,"a";2,"b"},2,FALSE)', products)).toEqual(TextUnion('b'));
  });

  test('result index', () => {
    expect(Calc('=VLOOKUP("Banana",A1:C3,4,FALSE)')).toEqual(REF);
    expect(Calc('=VLOOKUP("Banana",A1:C3,0,FALSE)')).toEqual(VALUE);
  });

});

describe('HLOOKUP', () => {

  test('looks across the first row', () => {
    expect(Calc('=HLOOKUP("b",{"a","b","c";1,2,3},2,FALSE)')).toEqual(IntUnion(2));
    expect(Calc('=HLOOKUP("bb",{"a","b","c";1,2,3},2)')).toEqual(IntUnion(2));
    expect(Calc('=HLOOKUP("d",{"a","b","c";1,2,3},2,FALSE)')).toEqual(NA);
    expect(Calc('=HLOOKUP("b",{"a","b","c";1,2,3},3,FALSE)')).toEqual(REF);
  });

});

describe('INDEX', () => {

  test('2D access', () => {
    expect(Calc('=INDEX(A1:C3,2,3)')).toEqual(FloatUnion(200));
    expect(Calc('=INDEX(A1:C3,3,1)')).toEqual(TextUnion('Cherry'));
  });

  test('1D access', () => {
    expect(Calc('=INDEX({10,20,30},2)')).toEqual(IntUnion(20));
    expect(Calc('=INDEX(A1:A3,2)')).toEqual(TextUnion('Banana'));
  });

  test('row of a 2D array', () => {
    expect(Calc('=INDEX(A1:C3,2)')).toEqual({
      type: ValueType.array,
      value: [[TextUnion('Banana'), FloatUnion(0.75), FloatUnion(200)]],
    });
  });

  test('bounds', () => {
    expect(Calc('=INDEX(A1:C3,0,1)')).toEqual(VALUE);
    expect(Calc('=INDEX(A1:C3,4,1)')).toEqual(REF);
    expect(Calc('=INDEX(A1:C3,1,4)')).toEqual(REF);
  });

});

describe('MATCH', () => {

  test('ascending (default)', () => {
    expect(Calc('=MATCH(75,{10,50,100},1)')).toEqual(IntUnion(2));
    expect(Calc('=MATCH(75,{10,50,100})')).toEqual(IntUnion(2));
    expect(Calc('=MATCH(5,{10,50,100})')).toEqual(NA);
  });

  test('descending returns the smallest value >= lookup', () => {
    expect(Calc('=MATCH(75,{100,50,10},-1)')).toEqual(IntUnion(1));
    expect(Calc('=MATCH(50,{100,50,10},-1)')).toEqual(IntUnion(2));
    expect(Calc('=MATCH(500,{100,50,10},-1)')).toEqual(NA);
  });

  test('exact', () => {
    expect(Calc('=MATCH(50,{10,50,100},0)')).toEqual(IntUnion(2));
    expect(Calc('=MATCH(2.0,{1,2,3},0)')).toEqual(IntUnion(2));
    expect(Calc('=MATCH(60,{10,50,100},0)')).toEqual(NA);
    expect(Calc('=MATCH("Cherry",A1:A3,0)')).toEqual(IntUnion(3));
  });

  test('empty cells never match', () => {
    expect(Calc('=MATCH(D1,D1:D3,0)')).toEqual(NA);
  });

  test('invalid mode', () => {
    expect(Calc('=MATCH(75,{10,50,100},2)')).toEqual(VALUE);
  });

});

describe('XLOOKUP', () => {

  test('wildcard', () => {
    expect(Calc('=XLOOKUP("App*",{"Apple","Apricot"},{1,2},"N/A",2)')).toEqual(IntUnion(1));
    expect(Calc('=XLOOKUP("Apr?cot",{"Apple","Apricot"},{1,2},"N/A",2)')).toEqual(IntUnion(2));
  });

  test('not found', () => {
    expect(Calc('=XLOOKUP("Kiwi",{"Apple","Apricot"},{1,2},"none")')).toEqual(TextUnion('none'));
    expect(Calc('=XLOOKUP("Kiwi",{"Apple","Apricot"},{1,2})')).toEqual(NA);
  });

  test('vertical, case-insensitive', () => {
    expect(Calc('=XLOOKUP("banana",A1:A3,B1:B3)')).toEqual(NA);
    expect(Calc('=XLOOKUP("banana",A1:A3,B1:B3,,0,1,TRUE)')).toEqual(FloatUnion(0.75));
  });

  test('returns the matching row', () => {
    expect(Calc('=XLOOKUP("Cherry",A1:A3,B1:C3)')).toEqual({
      type: ValueType.array,
      value: [[FloatUnion(2), FloatUnion(150)]],
    });
  });

  test('next smaller and next larger', () => {
    expect(Calc('=XLOOKUP(75,{10,50,100},{"a","b","c"},,-1)')).toEqual(TextUnion('b'));
    expect(Calc('=XLOOKUP(75,{10,50,100},{"a","b","c"},,1)')).toEqual(TextUnion('c'));
    expect(Calc('=XLOOKUP(500,{10,50,100},{"a","b","c"},,1)')).toEqual(NA);
  });

  test('search last to first', () => {
    expect(Calc('=XLOOKUP(1,{1,2,1},{"a","b","c"},,0,-1)')).toEqual(TextUnion('c'));
    expect(Calc('=XLOOKUP(1,{1,2,1},{"a","b","c"})')).toEqual(TextUnion('a'));
  });

  test('binary search', () => {
    expect(Calc('=XLOOKUP(50,{10,50,100},{"a","b","c"},,0,2)')).toEqual(TextUnion('b'));
    expect(Calc('=XLOOKUP(75,{10,50,100},{"a","b","c"},,-1,2)')).toEqual(TextUnion('b'));
    expect(Calc('=XLOOKUP(75,{10,50,100},{"a","b","c"},,1,2)')).toEqual(TextUnion('c'));
    expect(Calc('=XLOOKUP(75,{100,50,10},{"a","b","c"},,1,-2)')).toEqual(TextUnion('a'));
    expect(Calc('=XLOOKUP("A*",{"Apple"},{1},,2,2)')).toEqual(VALUE);
  });

  test('shape mismatch', () => {
    expect(Calc('=XLOOKUP(1,{1,2,3},{1,2})')).toEqual(VALUE);
  });

});

describe('OFFSET', () => {

  test('single cell', () => {
    expect(Calc('=OFFSET(A1,1,1)')).toEqual(FloatUnion(0.75));
  });

  test('resized', () => {
    expect(Calc('=OFFSET(A1,0,0,2,2)')).toEqual({
      type: ValueType.array,
      value: [
        [TextUnion('Apple'), FloatUnion(1.5)],
        [TextUnion('Banana'), FloatUnion(0.75)],
      ],
    });
  });

  test('keeps the shape of the reference', () => {
    expect(Calc('=OFFSET(A1:B2,1,0)')).toEqual({
      type: ValueType.array,
      value: [
        [TextUnion('Banana'), FloatUnion(0.75)],
        [TextUnion('Cherry'), FloatUnion(2)],
      ],
    });
  });

  test('works with aggregates', () => {
    expect(Calc('=SUM(OFFSET(A1,0,2,3,1))')).toEqual(FloatUnion(450));
  });

  test('off the sheet', () => {
    expect(Calc('=OFFSET(A1,-1,0)')).toEqual(REF);
    expect(Calc('=OFFSET(A1,0,0,0)')).toEqual(VALUE);
  });

  test('arrays', () => {
    expect(Calc('=OFFSET({1,2;3,4},1,1,1,1)')).toEqual(IntUnion(4));
    expect(Calc('=OFFSET({1,2;3,4},1,1)')).toEqual(REF);
    expect(Calc('=OFFSET({1,2;3,4},1,1,2)')).toEqual(REF);
  });

});
