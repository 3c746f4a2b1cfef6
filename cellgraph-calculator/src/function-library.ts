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

import type {
  ExtendedFunctionDescriptor, CompositeFunctionDescriptor,
  FunctionMap, ExtendedFunctionMap } from './descriptors';

/** how many arguments a function takes. max is Infinity for variadics. */
export interface Arity {
  min: number;
  max: number;
}

/**
 * argument count from the descriptor list. the minimum is the count of
 * leading required arguments.
 */
export const GetArity = (descriptor: CompositeFunctionDescriptor): Arity => {

  const args = descriptor.arguments || [];

  let min = 0;
  for (const arg of args) {
    if (arg.optional || (arg.repeat && min > 0)) {
      break;
    }
    min++;
  }

  const repeat = args.length > 0 && !!args[args.length - 1].repeat;
  return { min, max: repeat ? Infinity : args.length };

};

/** label for messages, like `3`, `2..3` or `1+` */
export const ArityLabel = (arity: Arity): string => {
  if (arity.max === Infinity) {
    return `${arity.min}+`;
  }
  if (arity.max === arity.min) {
    return `${arity.min}`;
  }
  return `${arity.min}..${arity.max}`;
};

/**
 * function table. names are case-insensitive. the table can be extended
 * at any time; formulas look up functions when they're evaluated, so
 * nothing has to be recompiled.
 */
export class FunctionLibrary {

  /** the actual functions, keyed by lowercase name */
  protected functions: Map<string, ExtendedFunctionDescriptor> = new Map();

  /**
   * register one or more functions. keys in the passed object are
   * considered the canonical function names, and must be (icase) unique.
   */
  public Register(...maps: FunctionMap[]): void {

    for (const map of maps) {

      for (const name of Object.keys(map)) {

        // some rules for names. the length thing is arbitrary, but come on.
        // leading ascii-letter is also kind of arbitrary, but it can't be
        // a number, or the parser would read it as one.

        if (/[^a-zA-Z0-9._]/.test(name)) {
          throw new Error('invalid function name (invalid character)');
        }

        if (name.length > 255) {
          throw new Error('invalid function name (too long, > 255)');
        }

        if (/^[^a-zA-Z]/.test(name)) {
          throw new Error('invalid function name (start with an ascii letter)');
        }

        const normalized = name.toLowerCase();
        if (this.functions.has(normalized)) {
          throw new Error(`function name (${normalized}) is already in use`);
        }

        this.functions.set(normalized, { ...map[name], canonical_name: name });
      }

    }

  }

  /** lookup function (actual map is protected) */
  public Get(name: string): ExtendedFunctionDescriptor|undefined {
    return this.functions.get(name.toLowerCase());
  }

  /** get a list, keyed by lowercase name */
  public List(): ExtendedFunctionMap {
    const list: ExtendedFunctionMap = {};
    for (const [key, descriptor] of this.functions) {
      list[key] = descriptor;
    }
    return list;
  }

  /**
   * create an alias. we clone the descriptor and Register replaces the
   * canonical name, so should work better than just a pointer.
   */
  public Alias(name: string, reference: string): void {
    const ref = this.Get(reference);
    if (!ref) {
      throw new Error(`referenced function ${reference} does not exist`);
    }
    this.Register({ [name]: { ...ref } });
  }

}
