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

export * from './descriptors';
export * from './eval-context';
export * from './function-error';
export * from './function-library';
export * from './expression-calculator';
export * from './evaluate';
export * from './calculator';
export * from './dag/graph';
export * from './dag/vertex';

export { BaseFunctionLibrary } from './functions/base-functions';
export { TextFunctionLibrary } from './functions/text-functions';
export { InformationFunctionLibrary } from './functions/information-functions';
export { LookupFunctionLibrary, BinarySearch, LinearSearch } from './functions/lookup-functions';

export {
  CoerceNumber, CoerceBoolean, CoerceText, CompareValues, WildcardMatch,
  FlattenBoxed } from './utilities';
