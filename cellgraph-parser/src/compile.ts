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

import { Parser } from './parser';
import type { ExpressionUnit, UnitAddress, UnitRange } from './parser-types';
import { ArgumentSeparatorType, CompileErrorKind } from './parser-types';

/**
 * thrown by Compile. offset is a character offset into the original
 * formula text.
 */
export class CompileError extends Error {

  constructor(
    public readonly kind: CompileErrorKind,
    public readonly offset: number,
    public readonly detail: string,
    public readonly text: string) {

    super(`${kind} at offset ${offset}: ${detail} (formula: "${text}")`);
    this.name = 'CompileError';
  }

}

/**
 * compiled formula. the tree is frozen; it's safe to share and evaluate
 * repeatedly. `references` lists every address and range in the order
 * they appear, including duplicates.
 */
export interface CompiledFormula {
  readonly text: string;
  readonly expression: ExpressionUnit;
  readonly references: ReadonlyArray<UnitAddress | UnitRange>;
}

export interface CompileOptions {
  argument_separator: ArgumentSeparatorType;
  r1c1: boolean;
}

/** recursive freeze. the tree is a plain object graph, no cycles. */
const DeepFreeze = <T extends object>(target: T): T => {
  for (const value of Object.values(target)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      DeepFreeze(value);
    }
  }
  Object.freeze(target);
  return target;
};

// the parser is synchronous, so one instance per option set is plenty

const parsers = new Map<string, Parser>();

const GetParser = (options: Partial<CompileOptions>): Parser => {

  const argument_separator = options.argument_separator || ArgumentSeparatorType.Comma;
  const r1c1 = options.r1c1 ?? true;
  const key = `${argument_separator}:${r1c1}`;

  let parser = parsers.get(key);
  if (!parser) {
    parser = new Parser();
    parser.argument_separator = argument_separator;
    parser.flags.r1c1 = r1c1;
    parsers.set(key, parser);
  }

  return parser;

};

/**
 * compile formula text. the leading `=` is optional. throws a
 * CompileError on any syntax error; function names are not checked
 * here, that happens when the formula is evaluated.
 */
export const Compile = (text: string, options: Partial<CompileOptions> = {}): CompiledFormula => {

  const result = GetParser(options).Parse(text);

  if (!result.valid || !result.expression) {
    throw new CompileError(
      result.error_kind || CompileErrorKind.UnexpectedToken,
      result.error_position ?? 0,
      result.error || 'invalid formula',
      text);
  }

  return DeepFreeze({
    text,
    expression: result.expression,
    references: result.full_reference_list,
  });

};

/**
 * walk a compiled tree. see Parser.Walk; the callback returns false to
 * skip a subtree.
 */
export const Walk = (unit: ExpressionUnit, func: (unit: ExpressionUnit) => boolean): void => {
  GetParser({}).Walk(unit, func);
};
