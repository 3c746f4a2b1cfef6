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
import { ValueType, ErrorType, BoolUnion, IsNumeric } from 'cellgraph-base-types';

import type { FunctionMap } from '../descriptors';
import * as Utils from '../utilities';

export const InformationFunctionLibrary: FunctionMap = {

  IsBlank: {
    description: 'Returns true if the reference is blank',
    arguments: [{ name: 'reference', allow_error: true }],
    fn: Utils.ApplyAsArray((value: UnionValue): UnionValue => BoolUnion(value.type === ValueType.undefined)),
  },

  IsNumber: {
    description: 'Returns true if the reference is a number',
    arguments: [{ name: 'reference', allow_error: true }],
    fn: Utils.ApplyAsArray((value: UnionValue): UnionValue => BoolUnion(IsNumeric(value))),
  },

  IsLogical: {
    description: 'Returns true if the reference is a logical TRUE or FALSE',
    arguments: [{ name: 'reference', allow_error: true }],
    fn: Utils.ApplyAsArray((value: UnionValue): UnionValue => BoolUnion(value.type === ValueType.boolean)),
  },

  IsText: {
    description: 'Returns true if the reference is text',
    arguments: [{ name: 'reference', allow_error: true }],
    fn: Utils.ApplyAsArray((value: UnionValue): UnionValue => BoolUnion(value.type === ValueType.string)),
  },

  IsError: {
    description: 'Returns true if the value is any error',
    arguments: [{ name: 'value', allow_error: true }],
    fn: Utils.ApplyAsArray((value: UnionValue): UnionValue => BoolUnion(value.type === ValueType.error)),
  },

  IsNA: {
    description: 'Returns true if the value is a #N/A error',
    arguments: [{ name: 'value', allow_error: true }],
    fn: Utils.ApplyAsArray((value: UnionValue): UnionValue =>
      BoolUnion(value.type === ValueType.error && value.value === ErrorType.NA)),
  },

};
