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

import { Compile, CompileError } from './compile';
import { CompileErrorKind } from './parser-types';

/** compile and return the error, or undefined if it compiles */
const CompileErrorFor = (text: string, r1c1 = true): CompileError | undefined => {
  try {
    Compile(text, { r1c1 });
  }
  catch (err) {
    if (err instanceof CompileError) {
      return err;
    }
    throw err;
  }
  return undefined;
};

describe('compile', () => {

  test('compiled formula keeps the text and references', () => {
    const formula = Compile('=SUM(A1:B2) + C3');
    expect(formula.text).toEqual('=SUM(A1:B2) + C3');
    expect(formula.references.map(reference => reference.label)).toEqual(['A1:B2', 'C3']);
  });

  test('compiled formula is frozen', () => {
    const formula = Compile('=A1+1');
    expect(Object.isFrozen(formula)).toBeTruthy();
    expect(Object.isFrozen(formula.expression)).toBeTruthy();
    expect(Object.isFrozen(formula.references)).toBeTruthy();
  });

  test('unknown functions compile', () => {
    expect(CompileErrorFor('=NOSUCHFUNCTION(1)')).toBeUndefined();
  });

  test('error kinds and offsets', () => {

    let error = CompileErrorFor('=(1');
    expect(error?.kind).toEqual(CompileErrorKind.UnbalancedDelimiter);
    expect(error?.offset).toEqual(1);

    error = CompileErrorFor('=1 + $$A1');
    expect(error?.kind).toEqual(CompileErrorKind.UnexpectedToken);
    expect(error?.offset).toEqual(5);

    error = CompileErrorFor('=SUM(A0)');
    expect(error?.kind).toEqual(CompileErrorKind.InvalidReference);
    expect(error?.offset).toEqual(5);

    error = CompileErrorFor('=1..2');
    expect(error?.kind).toEqual(CompileErrorKind.InvalidLiteral);
    expect(error?.offset).toEqual(1);

  });

  test('error message', () => {
    expect(CompileErrorFor('=(1')?.message).toEqual(
      'UnbalancedDelimiter at offset 1: unbalanced parenthesis (formula: "=(1")');
  });

  test('R1C1 can be turned off', () => {
    expect(CompileErrorFor('=R1C1')).toBeUndefined();
    expect(CompileErrorFor('=R1C1', false)?.kind).toEqual(CompileErrorKind.UnexpectedToken);
  });

});
