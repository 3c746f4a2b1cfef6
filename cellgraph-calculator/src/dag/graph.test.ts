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

import { CompileError, CompileErrorKind } from 'cellgraph-parser';

import { FormulaError } from '../function-error';
import type { SheetIdResolver } from './graph';
import { DependencyGraph, CircularReferenceError, RangeTooLargeError } from './graph';

const A1 = { row: 0, column: 0 };
const B1 = { row: 0, column: 1 };
const C1 = { row: 0, column: 2 };
const D1 = { row: 0, column: 3 };
const B2 = { row: 1, column: 1 };

const sheets: Record<string, number> = { Sheet1: 1, Sheet2: 2 };
const resolver: SheetIdResolver = name => sheets[name];

describe('dependency graph', () => {

  test('dependents are marked dirty', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B1, '=A1+1');
    graph.ClearAllDirty();
    graph.MarkDirtyWithSheet(1, A1);
    expect(graph.GetDirtyNodesWithSheet()).toContainEqual({ sheet_id: 1, row: 0, column: 1 });
  });

  test('a new formula is dirty', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B1, '=A1+1');
    expect(graph.GetDirtyNodesWithSheet()).toEqual([{ sheet_id: 1, row: 0, column: 1 }]);
  });

  test('raw cells are not in the dirty set', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B1, '=A1+1');
    graph.ClearAllDirty();
    graph.MarkDirtyWithSheet(1, A1);
    expect(graph.IsDirty(1, A1)).toEqual(false);
    expect(graph.IsDirty(1, B1)).toEqual(true);
  });

  test('cycles are rejected and nothing is committed', () => {

    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, A1, '=B1');

    expect(() => graph.SetFormulaWithSheet(1, B1, '=A1')).toThrow(CircularReferenceError);

    expect(graph.GetFormula(1, B1)).toBeUndefined();
    expect(graph.GetDependents(1, A1)).toEqual([]);
    expect(graph.GetPrecedents(1, A1).cells).toEqual([{ sheet_id: 1, row: 0, column: 1 }]);

  });

  test('circular reference error message', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, A1, '=B1');
    let error: unknown;
    try {
      graph.SetFormulaWithSheet(1, B1, '=A1');
    }
    catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(FormulaError);
    if (error instanceof FormulaError) {
      expect(error.message).toEqual('Formula error in B1: circular reference (formula: "=A1")');
      expect(error.label).toEqual('#CIRCULAR!');
    }
  });

  test('self reference', () => {
    const graph = new DependencyGraph();
    expect(() => graph.SetFormulaWithSheet(1, A1, '=A1+1')).toThrow(CircularReferenceError);
    expect(graph.GetFormula(1, A1)).toBeUndefined();
  });

  test('cycles through ranges', () => {
    const graph = new DependencyGraph();
    expect(() => graph.SetFormulaWithSheet(1, { row: 1, column: 0 }, '=SUM(A1:A3)')).toThrow(CircularReferenceError);

    graph.SetFormulaWithSheet(1, B1, '=SUM(A1:A3)');
    expect(() => graph.SetFormulaWithSheet(1, { row: 1, column: 0 }, '=B1')).toThrow(CircularReferenceError);
  });

  test('a rejected replacement keeps the old formula', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, A1, '=C1');
    graph.SetFormulaWithSheet(1, B1, '=A1');
    expect(() => graph.SetFormulaWithSheet(1, A1, '=B1')).toThrow(CircularReferenceError);
    expect(graph.GetFormula(1, A1)?.text).toEqual('=C1');
    expect(graph.GetDependents(1, C1)).toEqual([{ sheet_id: 1, row: 0, column: 0 }]);
  });

  test('old edges are retracted', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B1, '=A1');
    graph.SetFormulaWithSheet(1, B1, '=C1');
    graph.ClearAllDirty();

    graph.MarkDirtyWithSheet(1, A1);
    expect(graph.GetDirtyNodesWithSheet()).toEqual([]);

    graph.MarkDirtyWithSheet(1, C1);
    expect(graph.GetDirtyNodesWithSheet()).toEqual([{ sheet_id: 1, row: 0, column: 1 }]);

    // B1 no longer reads A1, so A1 can read B1
    graph.SetFormulaWithSheet(1, A1, '=B1');
    expect(graph.GetFormula(1, A1)?.text).toEqual('=B1');
  });

  test('dirty nodes come in dependency order', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, D1, '=A1+C1');
    graph.SetFormulaWithSheet(1, C1, '=B1*2');
    graph.SetFormulaWithSheet(1, B1, '=A1');
    graph.ClearAllDirty();

    graph.MarkDirtyWithSheet(1, A1);

    expect(graph.GetDirtyNodesWithSheet()).toEqual([
      { sheet_id: 1, row: 0, column: 1 },
      { sheet_id: 1, row: 0, column: 2 },
      { sheet_id: 1, row: 0, column: 3 },
    ]);
  });

  test('layers', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B2, '=A1');
    graph.SetFormulaWithSheet(1, B1, '=A1');
    graph.SetFormulaWithSheet(1, C1, '=B1+B2');

    expect(graph.TopologicalLayers()).toEqual([
      [{ sheet_id: 1, row: 0, column: 1 }, { sheet_id: 1, row: 1, column: 1 }],
      [{ sheet_id: 1, row: 0, column: 2 }],
    ]);

    expect(graph.TopologicalLayers([{ sheet_id: 1, row: 0, column: 2 }, { sheet_id: 1, row: 0, column: 0 }]))
      .toEqual([[{ sheet_id: 1, row: 0, column: 2 }]]);
  });

  test('take clears the dirty set', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B1, '=A1');
    expect(graph.TakeDirtyNodes()).toEqual([{ sheet_id: 1, row: 0, column: 1 }]);
    expect(graph.GetDirtyNodesWithSheet()).toEqual([]);
  });

  test('clear one node', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B1, '=A1');
    graph.SetFormulaWithSheet(1, C1, '=A1');
    graph.ClearDirty(1, B1);
    expect(graph.GetDirtyNodesWithSheet()).toEqual([{ sheet_id: 1, row: 0, column: 2 }]);
  });

  test('ranges reach their dependents', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, { row: 0, column: 4 }, '=SUM(A1:A10)');
    graph.ClearAllDirty();

    graph.MarkDirtyWithSheet(1, { row: 10, column: 0 });
    expect(graph.GetDirtyNodesWithSheet()).toEqual([]);

    graph.MarkDirtyWithSheet(1, { row: 4, column: 0 });
    expect(graph.GetDirtyNodesWithSheet()).toEqual([{ sheet_id: 1, row: 0, column: 4 }]);
    expect(graph.GetDependents(1, { row: 9, column: 0 })).toEqual([{ sheet_id: 1, row: 0, column: 4 }]);
  });

  test('precedents', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, D1, '=C1+A1+SUM(B2:A1)');
    const precedents = graph.GetPrecedents(1, D1);
    expect(precedents.cells).toEqual([
      { sheet_id: 1, row: 0, column: 0 },
      { sheet_id: 1, row: 0, column: 2 },
    ]);
    expect(precedents.ranges).toEqual([{
      sheet_id: 1,
      area: { start: { row: 0, column: 0 }, end: { row: 1, column: 1 } },
    }]);
  });

  test('cross-sheet references', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, A1, '=Sheet2!B1*2', resolver);
    graph.ClearAllDirty();

    graph.MarkDirtyWithSheet(1, B1);
    expect(graph.GetDirtyNodesWithSheet()).toEqual([]);

    graph.MarkDirtyWithSheet(2, B1);
    expect(graph.GetDirtyNodesWithSheet()).toEqual([{ sheet_id: 1, row: 0, column: 0 }]);
  });

  test('cross-sheet cycles', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, A1, '=Sheet2!A1', resolver);
    expect(() => graph.SetFormulaWithSheet(2, A1, '=Sheet1!A1', resolver)).toThrow(CircularReferenceError);
    graph.SetFormulaWithSheet(2, A1, '=B1+1', resolver);
  });

  test('unknown sheets are compile errors', () => {
    const graph = new DependencyGraph();
    let error: unknown;
    try {
      graph.SetFormulaWithSheet(1, A1, '=Nowhere!A1', resolver);
    }
    catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(CompileError);
    if (error instanceof CompileError) {
      expect(error.kind).toEqual(CompileErrorKind.InvalidReference);
    }
    expect(graph.GetFormula(1, A1)).toBeUndefined();
    expect(() => graph.SetFormulaWithSheet(1, A1, '=Sheet2!A1')).toThrow(CompileError);
  });

  test('syntax errors', () => {
    const graph = new DependencyGraph();
    expect(() => graph.SetFormulaWithSheet(1, A1, '=(1')).toThrow(CompileError);
    expect(graph.GetDirtyNodesWithSheet()).toEqual([]);
  });

  test('range size limit', () => {
    const graph = new DependencyGraph({ max_range_cells: 4 });
    expect(() => graph.SetFormulaWithSheet(1, D1, '=SUM(A1:B3)')).toThrow(RangeTooLargeError);
    graph.SetFormulaWithSheet(1, D1, '=SUM(A1:B2)');
  });

  test('relative R1C1 references resolve against the cell', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B2, '=R[-1]C');
    expect(graph.GetPrecedents(1, B2).cells).toEqual([{ sheet_id: 1, row: 0, column: 1 }]);
  });

  test('remove formula', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(1, B1, '=A1');
    graph.SetFormulaWithSheet(1, C1, '=B1');
    graph.ClearAllDirty();

    graph.RemoveFormula(1, B1);

    expect(graph.GetFormula(1, B1)).toBeUndefined();
    expect(graph.GetDirtyNodesWithSheet()).toEqual([{ sheet_id: 1, row: 0, column: 2 }]);
    expect(graph.GetDependents(1, B1)).toEqual([{ sheet_id: 1, row: 0, column: 2 }]);
    expect(graph.GetDependents(1, A1)).toEqual([]);
  });

  test('delete sheet', () => {
    const graph = new DependencyGraph();
    graph.SetFormulaWithSheet(2, A1, '=1');
    graph.SetFormulaWithSheet(1, A1, '=Sheet2!A1', resolver);
    graph.ClearAllDirty();

    graph.DeleteSheet(2);

    expect(graph.GetFormula(2, A1)).toBeUndefined();
    expect(graph.GetDirtyNodesWithSheet()).toEqual([{ sheet_id: 1, row: 0, column: 0 }]);
    expect(graph.GetPrecedents(1, A1).cells).toEqual([]);
  });

});
