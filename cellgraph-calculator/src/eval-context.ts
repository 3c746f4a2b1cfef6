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

import type { CellValue, ICellAddress, IArea, UnionValue } from 'cellgraph-base-types';
import { Area, Box, EmptyUnion } from 'cellgraph-base-types';

/**
 * read-only view of cell data for one evaluation. supplied by the storage
 * layer; the calculator never writes to it.
 *
 * ranges are returned row-major, `values[row][column]`, and should have
 * the same shape as the requested area. sheet-scoped accessors are
 * optional; without them, sheet-qualified references evaluate to `#REF!`.
 */
export interface EvalContext {

  /**
   * the cell being calculated. required to resolve relative R1C1
   * references; without it they evaluate to `#REF!`.
   */
  readonly current_cell?: ICellAddress;

  GetCell(address: ICellAddress): UnionValue;
  GetRange(area: IArea): UnionValue[][];

  GetSheetCell?(sheet: string, address: ICellAddress): UnionValue;
  GetSheetRange?(sheet: string, area: IArea): UnionValue[][];

}

/** anything we'll accept as cell data */
export type CellInput = CellValue | UnionValue;

const ToUnion = (value: CellInput): UnionValue => {
  if (value !== undefined && typeof value === 'object') {
    return value;
  }
  return Box(value);
};

/**
 * in-memory context backed by a map. useful for tests and for hosts that
 * don't have their own storage. sheet names are case-insensitive; the
 * empty name is the default sheet.
 */
export class DataEvalContext implements EvalContext {

  /** build a context from a block of rows, starting at A1 */
  public static FromRows(rows: CellInput[][], current_cell?: ICellAddress): DataEvalContext {
    const context = new DataEvalContext(current_cell);
    context.SetRows(rows);
    return context;
  }

  private cells: Map<string, UnionValue> = new Map();

  constructor(public current_cell?: ICellAddress) {}

  public Set(address: ICellAddress, value: CellInput, sheet = ''): void {
    this.cells.set(this.Key(sheet, address), ToUnion(value));
  }

  /** set a block of values, row-major, starting at `start` */
  public SetRows(rows: CellInput[][], start: ICellAddress = { row: 0, column: 0 }, sheet = ''): void {
    rows.forEach((row, r) => row.forEach((value, c) => {
      this.Set({ row: start.row + r, column: start.column + c }, value, sheet);
    }));
  }

  public Clear(address: ICellAddress, sheet = ''): void {
    this.cells.delete(this.Key(sheet, address));
  }

  public GetCell(address: ICellAddress): UnionValue {
    return this.GetSheetCell('', address);
  }

  public GetRange(area: IArea): UnionValue[][] {
    return this.GetSheetRange('', area);
  }

  public GetSheetCell(sheet: string, address: ICellAddress): UnionValue {
    return this.cells.get(this.Key(sheet, address)) || EmptyUnion();
  }

  public GetSheetRange(sheet: string, area: IArea): UnionValue[][] {

    const normalized = new Area(area.start, area.end, true);
    const start = normalized.start;
    const end = normalized.end;

    const values: UnionValue[][] = [];
    for (let row = start.row; row <= end.row; row++) {
      const row_values: UnionValue[] = [];
      for (let column = start.column; column <= end.column; column++) {
        row_values.push(this.GetSheetCell(sheet, { row, column }));
      }
      values.push(row_values);
    }

    return values;
  }

  protected Key(sheet: string, address: ICellAddress): string {
    return `${sheet.toUpperCase()}!${address.row},${address.column}`;
  }

}
