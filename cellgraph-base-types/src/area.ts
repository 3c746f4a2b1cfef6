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

/**
 * zero-based cell address. sheet_id is optional; without it the address
 * refers to whatever sheet the caller is working in.
 */
export interface ICellAddress {
  row: number;
  column: number;
  absolute_row?: boolean;
  absolute_column?: boolean;
  sheet_id?: number;
}

/** inclusive rectangle */
export interface IArea {
  start: ICellAddress;
  end: ICellAddress;
}

/**
 * class represents a rectangular area on a sheet. a 1x1 area is still an
 * area: `A1:A1` resolves to an array of one, which is not the same thing
 * as the address `A1`.
 */
export class Area implements IArea {

  public static ColumnToLabel(c: number): string {
    let s = String.fromCharCode(65 + c % 26);
    while (c > 25){
      c = Math.floor(c / 26) - 1;
      s = String.fromCharCode(65 + c % 26) + s;
    }
    return s;
  }

  public static CellAddressToLabel(address: ICellAddress): string {
    return (address.absolute_column ? '$' : '')
      + this.ColumnToLabel(address.column)
      + (address.absolute_row ? '$' : '')
      + (address.row + 1);
  }

  private start_: ICellAddress;

  private end_: ICellAddress;

  /** accessor returns a _copy_ of the start address */
  public get start(): ICellAddress {
    return { ...this.start_ };
  }

  /** accessor returns a _copy_ of the end address */
  public get end(): ICellAddress {
    return { ...this.end_ };
  }

  public get rows(): number {
    return this.end_.row - this.start_.row + 1;
  }

  public get columns(): number {
    return this.end_.column - this.start_.column + 1;
  }

  public get count(): number {
    return this.rows * this.columns;
  }

  /**
   * @param normalize: calls the normalize function
   */
  constructor(start: ICellAddress, end: ICellAddress = start, normalize = false) {
    this.start_ = { ...start };
    this.end_ = { ...end };
    if (normalize) this.Normalize();
  }

  /**
   * order corners so that start <= end component-wise. we need to carry
   * the absolute/relative flags along with the values, so sorting is too
   * simple.
   */
  public Normalize(): void {

    const start = { ...this.start_ };
    const end = { ...this.end_ };

    if (start.row > end.row){
      start.row = this.end_.row;
      start.absolute_row = this.end_.absolute_row;
      end.row = this.start_.row;
      end.absolute_row = this.start_.absolute_row;
    }

    if (start.column > end.column){
      start.column = this.end_.column;
      start.absolute_column = this.end_.absolute_column;
      end.column = this.start_.column;
      end.absolute_column = this.start_.absolute_column;
    }

    this.start_ = start;
    this.end_ = end;

  }

  /**
   * sheet is compared only if both sides have one; an address with no
   * sheet is taken to be on this area's sheet.
   */
  public Contains(address: ICellAddress): boolean {
    if (typeof address.sheet_id === 'number' && typeof this.start_.sheet_id === 'number'
        && address.sheet_id !== this.start_.sheet_id) {
      return false;
    }
    return address.row >= this.start_.row && address.row <= this.end_.row
      && address.column >= this.start_.column && address.column <= this.end_.column;
  }

  public Clone(): Area {
    return new Area(this.start_, this.end_);
  }

  /**
   * returns the range in A1-style spreadsheet addressing. a 1x1 area is
   * rendered as `A1:A1`, to keep it distinct from a single address.
   */
  public get spreadsheet_label(): string {
    return Area.CellAddressToLabel(this.start_) + ':' + Area.CellAddressToLabel(this.end_);
  }

  public toJSON(): IArea {
    return {
      start: { ...this.start_ },
      end: { ...this.end_ },
    };
  }

}
