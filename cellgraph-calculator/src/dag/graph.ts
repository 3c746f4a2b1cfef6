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

import type { ICellAddress, IArea } from 'cellgraph-base-types';
import { Area, ErrorType } from 'cellgraph-base-types';
import type { CompiledFormula, CompileOptions, UnitAddress, UnitRange } from 'cellgraph-parser';
import { Compile, CompileError, CompileErrorKind, Walk, MAX_ROWS, MAX_COLUMNS } from 'cellgraph-parser';

import { FormulaError } from '../function-error';
import { Vertex, CellVertex, RangeVertex } from './vertex';

/** one formula (or raw) cell, identified by sheet and position */
export interface DependencyNode {
  sheet_id: number;
  row: number;
  column: number;
}

export interface DependencyRange {
  sheet_id: number;
  area: IArea;
}

/**
 * map a sheet name (as written in a formula, `Sheet2!A1`) to a sheet id.
 * return undefined for unknown sheets. names are passed as written;
 * case handling is up to the resolver.
 */
export type SheetIdResolver = (name: string) => number|undefined;

export interface GraphOptions {

  /** ranges larger than this (in cells) are rejected */
  max_range_cells: number;

  /** log rejected formulas */
  debug: boolean;

  /** compile options, passed through to the compiler */
  compile: Partial<CompileOptions>;

}

const DefaultGraphOptions: GraphOptions = {
  max_range_cells: 10000,
  debug: false,
  compile: {},
};

/**
 * thrown by SetFormulaWithSheet if the formula would create a cycle.
 * nothing is committed.
 */
export class CircularReferenceError extends FormulaError {

  constructor(call_site: string, text: string) {
    super(ErrorType.Circular, call_site, 'circular reference', text);
    this.name = 'CircularReferenceError';
  }

}

/**
 * thrown by SetFormulaWithSheet if the formula references a range with
 * more than `max_range_cells` cells. nothing is committed.
 */
export class RangeTooLargeError extends FormulaError {

  constructor(call_site: string, cells: number, max: number, text: string) {
    super(ErrorType.Reference, call_site, `range dependency too large: ${cells} cells (max ${max})`, text);
    this.name = 'RangeTooLargeError';
  }

}

/** sort order for results: sheet, then row, then column */
export const CompareNodes = (a: DependencyNode, b: DependencyNode): number => {
  return (a.sheet_id - b.sheet_id) || (a.row - b.row) || (a.column - b.column);
};

const CellKey = (sheet_id: number, row: number, column: number): string => `${sheet_id}!${row},${column}`;

const RangeKey = (sheet_id: number, area: Area): string => `${sheet_id}!${area.spreadsheet_label}`;

const ToNode = (vertex: CellVertex): DependencyNode => ({
  sheet_id: vertex.sheet_id,
  row: vertex.row,
  column: vertex.column,
});

/** precedents of a formula, resolved but not yet linked */
interface PrecedentList {
  cells: DependencyNode[];
  ranges: Array<{ sheet_id: number; area: Area }>;
}

/**
 * dependency graph for formula cells, across sheets.
 *
 * formula cells depend on cells and ranges. we keep a vertex for each
 * formula cell, for each raw cell something depends on, and for each
 * distinct range. a change to a cell reaches the formulas that depend
 * on it directly, plus the formulas that depend on any range containing
 * the cell.
 *
 * the graph is acyclic: SetFormulaWithSheet rejects a formula that would
 * create a loop, before changing anything.
 *
 * dirty tracking is separate from calculation. MarkDirtyWithSheet flags
 * every formula downstream of a change; the caller gets the dirty set in
 * calculation order, recalculates, and clears.
 */
export class DependencyGraph {

  protected readonly options: GraphOptions;

  /** cell vertices, by key */
  protected cells: Map<string, CellVertex> = new Map();

  /** range vertices, by key */
  protected ranges: Map<string, RangeVertex> = new Map();

  /** range vertices by sheet, for containment lookups */
  protected ranges_by_sheet: Map<number, Set<RangeVertex>> = new Map();

  /** dirty formula cells, by key */
  protected dirty: Set<string> = new Set();

  /** formula cells that call volatile functions */
  protected volatile_list: Set<CellVertex> = new Set();

  constructor(options: Partial<GraphOptions> = {}) {
    this.options = { ...DefaultGraphOptions, ...options };
  }

  // --- formulas ---------------------------------------------------------------

  /**
   * compile a formula and register it for the given cell. any existing
   * formula in the cell is replaced, and its edges are removed.
   *
   * sheet names in references are resolved through `resolver`; an unknown
   * sheet is a compile error. relative R1C1 references are resolved
   * against this cell.
   *
   * throws CompileError, CircularReferenceError or RangeTooLargeError.
   * on any error, the graph is unchanged. on success the cell and its
   * dependents are marked dirty.
   */
  public SetFormulaWithSheet(
      sheet_id: number,
      address: ICellAddress,
      text: string,
      resolver?: SheetIdResolver): CompiledFormula {

    const formula = Compile(text, this.options.compile);
    const precedents = this.ResolvePrecedents(sheet_id, address, formula, resolver);

    if (this.WouldCreateCycle(sheet_id, address, precedents)) {
      if (this.options.debug) {
        console.info('rejecting circular formula', sheet_id, address, text);
      }
      throw new CircularReferenceError(Area.CellAddressToLabel(address), text);
    }

    // commit. clear old edges first.

    const vertex = this.EnsureCell(sheet_id, address.row, address.column);
    this.Detach(vertex);

    vertex.formula = formula;
    vertex.volatile = this.ContainsVolatile(formula);

    if (vertex.volatile) {
      this.volatile_list.add(vertex);
    }
    else {
      this.volatile_list.delete(vertex);
    }

    for (const cell of precedents.cells) {
      vertex.DependsOn(this.EnsureCell(cell.sheet_id, cell.row, cell.column));
    }

    for (const range of precedents.ranges) {
      vertex.DependsOn(this.EnsureRange(range.sheet_id, range.area));
    }

    this.dirty.add(vertex.key);
    this.Propagate(this.DependentsOf(sheet_id, address.row, address.column));

    return formula;

  }

  /**
   * remove a formula. the cell's dependents stay linked (they still
   * reference the cell), and they're marked dirty.
   */
  public RemoveFormula(sheet_id: number, address: ICellAddress): void {

    const vertex = this.cells.get(CellKey(sheet_id, address.row, address.column));
    if (!vertex || !vertex.formula) {
      return;
    }

    this.Detach(vertex);
    vertex.formula = undefined;
    vertex.volatile = false;
    this.volatile_list.delete(vertex);
    this.dirty.delete(vertex.key);

    this.Propagate(this.DependentsOf(vertex.sheet_id, vertex.row, vertex.column));
    this.Prune(vertex);

  }

  public GetFormula(sheet_id: number, address: ICellAddress): CompiledFormula|undefined {
    return this.cells.get(CellKey(sheet_id, address.row, address.column))?.formula;
  }

  /**
   * remove everything on a sheet. formulas on other sheets that referenced
   * it are marked dirty; their references to the sheet are dropped.
   */
  public DeleteSheet(sheet_id: number): void {

    const removed: Vertex[] = [];

    for (const vertex of this.cells.values()) {
      if (vertex.sheet_id === sheet_id) {
        removed.push(vertex);
      }
    }

    for (const vertex of this.ranges_by_sheet.get(sheet_id) || []) {
      removed.push(vertex);
    }

    const affected: CellVertex[] = [];

    for (const vertex of removed) {
      for (const dependent of vertex.edges_out) {
        if (dependent instanceof CellVertex && dependent.sheet_id !== sheet_id) {
          affected.push(dependent);
        }
      }
    }

    this.Propagate(affected);

    for (const vertex of removed) {
      if (vertex instanceof CellVertex) {
        this.Detach(vertex);
      }
      for (const dependent of vertex.edges_out) {
        dependent.edges_in = dependent.edges_in.filter(check => check !== vertex);
      }
      vertex.edges_out = [];
      if (vertex instanceof CellVertex) {
        this.cells.delete(vertex.key);
        this.dirty.delete(vertex.key);
        this.volatile_list.delete(vertex);
      }
      else if (vertex instanceof RangeVertex) {
        this.ranges.delete(vertex.key);
      }
    }

    this.ranges_by_sheet.delete(sheet_id);

  }

  /** remove everything */
  public Reset(): void {
    this.cells.clear();
    this.ranges.clear();
    this.ranges_by_sheet.clear();
    this.dirty.clear();
    this.volatile_list.clear();
  }

  // --- dirty tracking -------------------------------------------------------

  /**
   * mark a cell as changed. every formula that depends on it, directly or
   * through other formulas, is marked dirty; if the cell itself holds a
   * formula, it's marked as well. formulas that call volatile functions
   * are always marked.
   */
  public MarkDirtyWithSheet(sheet_id: number, address: ICellAddress): void {

    const start: CellVertex[] = [...this.volatile_list];

    const vertex = this.cells.get(CellKey(sheet_id, address.row, address.column));
    if (vertex?.formula) {
      start.push(vertex);
    }

    start.push(...this.DependentsOf(sheet_id, address.row, address.column));
    this.Propagate(start);

  }

  /**
   * the dirty set, in calculation order: every node comes after all of
   * its dirty precedents. ties are ordered by sheet, row and column.
   * doesn't clear anything.
   */
  public GetDirtyNodesWithSheet(): DependencyNode[] {
    return this.TopologicalLayers().flat();
  }

  /** return the dirty set (as GetDirtyNodesWithSheet) and clear it */
  public TakeDirtyNodes(): DependencyNode[] {
    const nodes = this.GetDirtyNodesWithSheet();
    this.dirty.clear();
    return nodes;
  }

  public IsDirty(sheet_id: number, address: ICellAddress): boolean {
    return this.dirty.has(CellKey(sheet_id, address.row, address.column));
  }

  /** clear the dirty flag for one node, after it's been recalculated */
  public ClearDirty(sheet_id: number, address: ICellAddress): void {
    this.dirty.delete(CellKey(sheet_id, address.row, address.column));
  }

  public ClearAllDirty(): void {
    this.dirty.clear();
  }

  /**
   * group nodes into layers. nodes in a layer don't depend on each other,
   * only on nodes in earlier layers, so a layer can be calculated in any
   * order (or in parallel). only dependencies among the given nodes count.
   * defaults to the dirty set.
   */
  public TopologicalLayers(nodes?: DependencyNode[]): DependencyNode[][] {

    const members: Map<string, CellVertex> = new Map();

    if (nodes) {
      for (const node of nodes) {
        const vertex = this.cells.get(CellKey(node.sheet_id, node.row, node.column));
        if (vertex?.formula) {
          members.set(vertex.key, vertex);
        }
      }
    }
    else {
      for (const key of this.dirty) {
        const vertex = this.cells.get(key);
        if (vertex) {
          members.set(key, vertex);
        }
      }
    }

    const in_degree: Map<CellVertex, number> = new Map();
    const dependents: Map<CellVertex, CellVertex[]> = new Map();

    for (const vertex of members.values()) {
      in_degree.set(vertex, in_degree.get(vertex) || 0);
      const list = this.DependentsOf(vertex.sheet_id, vertex.row, vertex.column)
        .filter(dependent => members.has(dependent.key));
      dependents.set(vertex, list);
      for (const dependent of list) {
        in_degree.set(dependent, (in_degree.get(dependent) || 0) + 1);
      }
    }

    const layers: DependencyNode[][] = [];
    let current = [...members.values()].filter(vertex => !in_degree.get(vertex));

    while (current.length) {

      layers.push(current.map(ToNode).sort(CompareNodes));

      const next: CellVertex[] = [];
      for (const vertex of current) {
        for (const dependent of dependents.get(vertex) || []) {
          const count = (in_degree.get(dependent) || 0) - 1;
          in_degree.set(dependent, count);
          if (count === 0) {
            next.push(dependent);
          }
        }
      }

      current = next;

    }

    return layers;

  }

  // --- queries --------------------------------------------------------------

  /** cells and ranges the formula in this cell references */
  public GetPrecedents(sheet_id: number, address: ICellAddress): { cells: DependencyNode[], ranges: DependencyRange[] } {

    const result: { cells: DependencyNode[], ranges: DependencyRange[] } = { cells: [], ranges: [] };
    const vertex = this.cells.get(CellKey(sheet_id, address.row, address.column));

    for (const edge of vertex?.edges_in || []) {
      if (edge instanceof CellVertex) {
        result.cells.push(ToNode(edge));
      }
      else if (edge instanceof RangeVertex) {
        result.ranges.push({ sheet_id: edge.sheet_id, area: edge.area.toJSON() });
      }
    }

    result.cells.sort(CompareNodes);
    return result;

  }

  /**
   * formulas that depend on this cell directly, either by address or by
   * a range that contains it.
   */
  public GetDependents(sheet_id: number, address: ICellAddress): DependencyNode[] {
    return this.DependentsOf(sheet_id, address.row, address.column).map(ToNode).sort(CompareNodes);
  }

  // --- internals ------------------------------------------------------------

  /**
   * volatility depends on the function table, which the graph doesn't
   * have. subclasses that know about functions override this.
   */
  protected IsVolatile(_name: string): boolean {
    return false;
  }

  protected ContainsVolatile(formula: CompiledFormula): boolean {
    let volatile = false;
    Walk(formula.expression, unit => {
      if (unit.type === 'call' && this.IsVolatile(unit.name)) {
        volatile = true;
      }
      return !volatile;
    });
    return volatile;
  }

  /** resolve a sheet prefix. no prefix means the formula's own sheet */
  protected ResolveSheet(
      sheet_id: number,
      unit: UnitAddress,
      text: string,
      resolver?: SheetIdResolver): number {

    if (!unit.sheet) {
      return sheet_id;
    }

    const resolved = resolver ? resolver(unit.sheet) : undefined;
    if (resolved === undefined) {
      throw new CompileError(CompileErrorKind.InvalidReference, unit.position,
        `unknown sheet "${unit.sheet}"`, text);
    }

    return resolved;

  }

  /** resolve relative parts. returns undefined if it's off the sheet */
  protected ResolveAddress(base: ICellAddress, unit: UnitAddress): ICellAddress|undefined {

    const row = unit.offset_row ? base.row + unit.row : unit.row;
    const column = unit.offset_column ? base.column + unit.column : unit.column;

    if (row < 0 || column < 0 || row >= MAX_ROWS || column >= MAX_COLUMNS) {
      return undefined;
    }

    return { row, column };

  }

  /**
   * list the cells and ranges a formula references. references that
   * resolve off the sheet evaluate to #REF! and have no dependency.
   */
  protected ResolvePrecedents(
      sheet_id: number,
      address: ICellAddress,
      formula: CompiledFormula,
      resolver?: SheetIdResolver): PrecedentList {

    const result: PrecedentList = { cells: [], ranges: [] };

    for (const reference of formula.references) {

      if (reference.type === 'address') {
        const target_sheet = this.ResolveSheet(sheet_id, reference, formula.text, resolver);
        const target = this.ResolveAddress(address, reference);
        if (target) {
          result.cells.push({ sheet_id: target_sheet, row: target.row, column: target.column });
        }
        continue;
      }

      const range: UnitRange = reference;
      const target_sheet = this.ResolveSheet(sheet_id, range.start, formula.text, resolver);
      const start = this.ResolveAddress(address, range.start);
      const end = this.ResolveAddress(address, range.end);

      if (!start || !end) {
        continue;
      }

      const area = new Area(start, end, true);

      if (area.count > this.options.max_range_cells) {
        throw new RangeTooLargeError(range.label, area.count, this.options.max_range_cells, formula.text);
      }

      result.ranges.push({ sheet_id: target_sheet, area });

    }

    return result;

  }

  /**
   * check if linking this cell to its new precedents would create a
   * loop. everything reachable from the cell (including itself) must not
   * be a precedent, or inside a precedent range.
   */
  protected WouldCreateCycle(sheet_id: number, address: ICellAddress, precedents: PrecedentList): boolean {

    const reachable: DependencyNode[] = [{ sheet_id, row: address.row, column: address.column }];
    const visited: Set<string> = new Set([CellKey(sheet_id, address.row, address.column)]);

    for (let index = 0; index < reachable.length; index++) {
      const node = reachable[index];
      for (const dependent of this.DependentsOf(node.sheet_id, node.row, node.column)) {
        if (!visited.has(dependent.key)) {
          visited.add(dependent.key);
          reachable.push(ToNode(dependent));
        }
      }
    }

    for (const cell of precedents.cells) {
      if (visited.has(CellKey(cell.sheet_id, cell.row, cell.column))) {
        return true;
      }
    }

    for (const range of precedents.ranges) {
      for (const node of reachable) {
        if (node.sheet_id === range.sheet_id && range.area.Contains({ row: node.row, column: node.column })) {
          return true;
        }
      }
    }

    return false;

  }

  /**
   * formulas that depend directly on a cell: the cell's own dependents
   * (if it has a vertex) plus the dependents of every range containing it.
   * may be called for cells that have no vertex.
   */
  protected DependentsOf(sheet_id: number, row: number, column: number): CellVertex[] {

    const result: Set<CellVertex> = new Set();

    const Add = (vertex: Vertex) => {
      for (const edge of vertex.edges_out) {
        if (edge instanceof CellVertex) {
          result.add(edge);
        }
      }
    };

    const vertex = this.cells.get(CellKey(sheet_id, row, column));
    if (vertex) {
      Add(vertex);
    }

    for (const range of this.ranges_by_sheet.get(sheet_id) || []) {
      if (range.Contains(sheet_id, row, column)) {
        Add(range);
      }
    }

    return [...result];

  }

  /**
   * mark formulas dirty, and everything downstream of them. each vertex
   * is visited once.
   */
  protected Propagate(start: CellVertex[]): void {

    const queue: CellVertex[] = [];

    for (const vertex of start) {
      if (vertex.formula && !this.dirty.has(vertex.key)) {
        this.dirty.add(vertex.key);
        queue.push(vertex);
      }
    }

    while (queue.length) {
      const vertex = queue.shift();
      if (!vertex) { break; }
      for (const dependent of this.DependentsOf(vertex.sheet_id, vertex.row, vertex.column)) {
        if (dependent.formula && !this.dirty.has(dependent.key)) {
          this.dirty.add(dependent.key);
          queue.push(dependent);
        }
      }
    }

  }

  protected EnsureCell(sheet_id: number, row: number, column: number): CellVertex {
    const key = CellKey(sheet_id, row, column);
    let vertex = this.cells.get(key);
    if (!vertex) {
      vertex = new CellVertex(key, sheet_id, row, column);
      this.cells.set(key, vertex);
    }
    return vertex;
  }

  protected EnsureRange(sheet_id: number, area: Area): RangeVertex {

    const key = RangeKey(sheet_id, area);
    let vertex = this.ranges.get(key);

    if (!vertex) {
      vertex = new RangeVertex(key, sheet_id, area.Clone());
      this.ranges.set(key, vertex);

      let list = this.ranges_by_sheet.get(sheet_id);
      if (!list) {
        list = new Set();
        this.ranges_by_sheet.set(sheet_id, list);
      }
      list.add(vertex);
    }

    return vertex;

  }

  /**
   * remove a formula cell's inbound edges, and drop precedents that are
   * no longer needed.
   */
  protected Detach(vertex: CellVertex): void {
    const precedents = vertex.edges_in;
    vertex.ClearDependencies();
    for (const precedent of precedents) {
      this.Prune(precedent);
    }
  }

  /**
   * drop a vertex if nothing depends on it and it has no formula. ranges
   * never have inbound edges, so a range is dropped when its last
   * dependent goes.
   */
  protected Prune(vertex: Vertex): void {

    if (vertex.has_outbound_edges) {
      return;
    }

    if (vertex instanceof CellVertex && !vertex.has_formula) {
      this.cells.delete(vertex.key);
    }
    else if (vertex instanceof RangeVertex) {
      this.ranges.delete(vertex.key);
      this.ranges_by_sheet.get(vertex.sheet_id)?.delete(vertex);
    }

  }

}
