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
import { ValueType, ErrorLabel } from 'cellgraph-base-types';
import type { CompiledFormula, CompileOptions } from 'cellgraph-parser';
import { Compile } from 'cellgraph-parser';

import type { EvalContext } from './eval-context';
import type { CalculatorOptions } from './expression-calculator';
import { ExpressionCalculator } from './expression-calculator';
import { FunctionLibrary } from './function-library';
import { FormulaError } from './function-error';

import { BaseFunctionLibrary } from './functions/base-functions';
import { TextFunctionLibrary } from './functions/text-functions';
import { InformationFunctionLibrary } from './functions/information-functions';
import { LookupFunctionLibrary } from './functions/lookup-functions';

/** alternate names, alias -> canonical name */
export const FunctionAliases: Record<string, string> = {
  Avg: 'Average',
  Concat: 'Concatenate',
};

/**
 * create a function table with the built-in functions. each table is
 * independent; registering functions in one doesn't affect others.
 */
export const CreateLibrary = (): FunctionLibrary => {

  const library = new FunctionLibrary();

  library.Register(
    BaseFunctionLibrary,
    TextFunctionLibrary,
    InformationFunctionLibrary,
    LookupFunctionLibrary,
  );

  for (const key of Object.keys(FunctionAliases)) {
    library.Alias(key, FunctionAliases[key]);
  }

  return library;

};

export interface EvaluateOptions extends CalculatorOptions {

  /** function table. defaults to the built-in functions */
  library: FunctionLibrary;

}

let default_calculator: ExpressionCalculator|undefined;

const GetCalculator = (options: Partial<EvaluateOptions>): ExpressionCalculator => {
  if (options.library || options.debug) {
    return new ExpressionCalculator(options.library || CreateLibrary(), options);
  }
  if (!default_calculator) {
    default_calculator = new ExpressionCalculator(CreateLibrary());
  }
  return default_calculator;
};

/**
 * evaluate a compiled formula. spreadsheet errors (`#N/A`, `#REF!` and
 * so on) are returned as values.
 *
 * throws FormulaError if a function is called with the wrong number of
 * arguments; that's a problem with the formula, not with the data.
 */
export const Evaluate = (formula: CompiledFormula, context: EvalContext, options: Partial<EvaluateOptions> = {}): UnionValue => {
  return GetCalculator(options).Calculate(formula, context).value;
};

/**
 * evaluate, but throw if the result is an error value. the FormulaError
 * carries the call site that produced the error, like
 *
 * `Formula error in VLOOKUP: #N/A (formula: "=VLOOKUP(A1,B1:C3,2,FALSE)")`
 */
export const EvaluateStrict = (formula: CompiledFormula, context: EvalContext, options: Partial<EvaluateOptions> = {}): UnionValue => {

  const result = GetCalculator(options).Calculate(formula, context);

  if (result.value.type === ValueType.error) {
    const label = ErrorLabel(result.value.value);
    throw new FormulaError(result.value.value, result.error_site || label, label, formula.text);
  }

  return result.value;

};

/** compile and evaluate, for one-off formulas */
export const EvaluateFormula = (
    text: string,
    context: EvalContext,
    options: Partial<EvaluateOptions & CompileOptions> = {}): UnionValue => {
  return Evaluate(Compile(text, options), context, options);
};
