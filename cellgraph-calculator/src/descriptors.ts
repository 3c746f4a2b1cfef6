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

import type { Area, ICellAddress, UnionValue } from 'cellgraph-base-types';

/**
 * a reference argument, resolved to absolute coordinates but not
 * read. `single` is set if the reference was written as an address and
 * not a range; that's the difference between `A1` and `A1:A1`.
 */
export interface ResolvedReference {
  sheet?: string;
  area: Area;
  single: boolean;
}

/**
 * descriptor for an individual argument
 */
export interface ArgumentDescriptor {

  name?: string;
  description?: string;

  /**
   * argument may be omitted. only trailing arguments can be optional;
   * the first optional argument sets the minimum argument count.
   */
  optional?: boolean;

  /**
   * the last argument may repeat (SUM, COUNT). a repeating argument is
   * also optional unless it's the only argument.
   */
  repeat?: boolean;

  /**
   * allows error values to pass through to the function. otherwise, a
   * function will return the first error in its arguments without being
   * called. used for IFERROR and the IS functions, and in COUNTA.
   */
  allow_error?: boolean;

  /**
   * if the argument is written as a reference (address or range), pass
   * the reference itself in `context.references` and don't read it. the
   * argument value is empty. used for OFFSET.
   */
  address?: boolean;

}

/**
 * calling context for a function. `references` is indexed by argument
 * position and is only populated for `address` arguments.
 */
export interface FunctionContext {

  /** the cell being calculated, if the context knows it */
  address?: ICellAddress;

  references: Array<ResolvedReference|undefined>;

  /**
   * read a reference through the evaluation context. a single cell
   * resolves to a scalar, anything else to an array.
   */
  Resolve(reference: ResolvedReference): UnionValue;

}

/**
 * function implementation: unified signature, boxed arguments in, boxed
 * value out. functions return error values; they don't throw.
 */
export type FunctionImplementation = (args: UnionValue[], context: FunctionContext) => UnionValue;

/**
 * wrapper object that contains the function and (mostly optional)
 * metadata.
 */
export interface CompositeFunctionDescriptor {

  /**
   * description, for listings
   */
  description?: string;

  /**
   * list of arguments. this also determines the number of arguments the
   * function accepts; a function with no descriptors takes none.
   */
  arguments?: ArgumentDescriptor[];

  /**
   * volatile: the result can change even if the static references in
   * the formula don't change. the dependency graph treats formulas that
   * call volatile functions as dirty on every change.
   */
  volatile?: boolean;

  /** the actual function */
  fn: FunctionImplementation;

}

export interface FunctionMap {
  [index: string]: CompositeFunctionDescriptor;
}

/**
 * the stored value also includes a canonical name, which is the name
 * as registered (we look up case-insensitively).
 */
export interface ExtendedFunctionDescriptor extends CompositeFunctionDescriptor {
  canonical_name: string;
}

export interface ExtendedFunctionMap {
  [index: string]: ExtendedFunctionDescriptor;
}
