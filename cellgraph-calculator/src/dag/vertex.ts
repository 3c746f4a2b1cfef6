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

import type { Area } from 'cellgraph-base-types';
import type { CompiledFormula } from 'cellgraph-parser';

/**
 * base vertex. edges are kept in both directions so we can walk
 * dependents (for dirty propagation) and precedents (to retract edges
 * when a formula changes).
 */
export class Vertex {

  /** dependencies */
  public edges_in: Vertex[] = [];

  /** dependents */
  public edges_out: Vertex[] = [];

  get has_outbound_edges(): boolean { return this.edges_out.length > 0; }

  /** removes all inbound edges (dependencies) */
  public ClearDependencies(): void {
    for (const edge of this.edges_in) {
      edge.RemoveDependent(this);
    }
    this.edges_in = [];
  }

  /** add a dependent. doesn't add if already in the list */
  public AddDependent(edge: Vertex): void {
    if (edge === this) return; // circular
    if (!this.edges_out.includes(edge)) {
      this.edges_out.push(edge);
    }
  }

  /** remove a dependent */
  public RemoveDependent(edge: Vertex): void {
    const index = this.edges_out.indexOf(edge);
    if (index >= 0) {
      this.edges_out.splice(index, 1);
    }
  }

  /** add a dependency. doesn't add if already in the list */
  public AddDependency(edge: Vertex): void {
    if (edge === this) return; // circular
    if (!this.edges_in.includes(edge)) {
      this.edges_in.push(edge);
    }
  }

  /**
   * creates a pair of forward/backward links, such that _this_ depends
   * on _edge_.
   */
  public DependsOn(edge: Vertex): void {
    this.AddDependency(edge);
    edge.AddDependent(this);
  }

}

/**
 * a single cell. raw cells only exist in the graph while something
 * depends on them; formula cells exist while they have a formula.
 */
export class CellVertex extends Vertex {

  public formula?: CompiledFormula;

  /** formula calls a volatile function */
  public volatile = false;

  constructor(
    public readonly key: string,
    public readonly sheet_id: number,
    public readonly row: number,
    public readonly column: number) {
    super();
  }

  public get has_formula(): boolean {
    return !!this.formula;
  }

}

/**
 * a range reference. ranges have no dependencies of their own; a cell
 * inside the range reaches the range's dependents by containment, so we
 * don't need a vertex for every cell in the range.
 */
export class RangeVertex extends Vertex {

  constructor(
    public readonly key: string,
    public readonly sheet_id: number,
    public readonly area: Area) {
    super();
  }

  public Contains(sheet_id: number, row: number, column: number): boolean {
    return sheet_id === this.sheet_id && this.area.Contains({ row, column });
  }

}
