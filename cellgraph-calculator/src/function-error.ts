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

import type { ErrorUnion } from 'cellgraph-base-types';
import { ErrorType, ErrorLabel, ValueType } from 'cellgraph-base-types';

// spreadsheet errors are values, not exceptions. these factories return
// new objects so nobody can pollute a shared instance.

export const NAError = (): ErrorUnion => {
  return { type: ValueType.error, value: ErrorType.NA };
};

export const ReferenceError = (): ErrorUnion => {
  return { type: ValueType.error, value: ErrorType.Reference };
};

export const ValueError = (): ErrorUnion => {
  return { type: ValueType.error, value: ErrorType.Value };
};

export const DivideByZeroError = (): ErrorUnion => {
  return { type: ValueType.error, value: ErrorType.Div0 };
};

export const NameError = (): ErrorUnion => {
  return { type: ValueType.error, value: ErrorType.Name };
};

export const NumError = (): ErrorUnion => {
  return { type: ValueType.error, value: ErrorType.Num };
};

/**
 * thrown by evaluation when a formula can't be evaluated at all (wrong
 * number of arguments), or by EvaluateStrict when the result is an error
 * value. wraps the error value plus the call site that produced it and
 * the original formula text.
 */
export class FormulaError extends Error {

  constructor(
    public readonly error: ErrorType,
    public readonly call_site: string,
    public readonly detail: string,
    public readonly text: string) {

    super(`Formula error in ${call_site}: ${detail} (formula: "${text}")`);
    this.name = 'FormulaError';
  }

  /** the wrapped error as a value */
  public get value(): ErrorUnion {
    return { type: ValueType.error, value: this.error };
  }

  /** spreadsheet label for the wrapped error, e.g. `#N/A` */
  public get label(): string {
    return ErrorLabel(this.error);
  }

}
