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
import type { CompiledFormula } from 'cellgraph-parser';
import { Compile } from 'cellgraph-parser';

import type { EvalContext } from './eval-context';
import type { FunctionMap } from './descriptors';
import type { FunctionLibrary } from './function-library';
import type { DependencyNode, GraphOptions } from './dag/graph';
import { DependencyGraph } from './dag/graph';
import { ExpressionCalculator } from './expression-calculator';
import { CreateLibrary, EvaluateStrict } from './evaluate';

/**
 * graph plus function table. this is the piece a host holds on to: it
 * registers formulas as cells change, asks what's dirty, and evaluates
 * the dirty formulas against its own data.
 *
 * the calculator owns its function table, so functions registered here
 * don't affect other instances.
 */
export class Calculator extends DependencyGraph {

  public readonly library: FunctionLibrary = CreateLibrary();

  protected readonly expression_calculator: ExpressionCalculator;

  constructor(options: Partial<GraphOptions> = {}) {
    super(options);
    this.expression_calculator = new ExpressionCalculator(this.library, { debug: this.options.debug });
  }

  /**
   * dynamic extension. names must not collide with existing functions.
   * formulas already in the graph pick up new functions the next time
   * they're evaluated; volatility is checked when a formula is set.
   */
  public RegisterFunction(map: FunctionMap): void {
    this.library.Register(map);
  }

  /** compile with this calculator's options, without registering */
  public Compile(text: string): CompiledFormula {
    return Compile(text, this.options.compile);
  }

  /** evaluate a formula. error values are returned as values */
  public Evaluate(formula: CompiledFormula, context: EvalContext): UnionValue {
    return this.expression_calculator.Calculate(formula, context).value;
  }

  /** evaluate a formula, throwing FormulaError for error values */
  public EvaluateStrict(formula: CompiledFormula, context: EvalContext): UnionValue {
    return EvaluateStrict(formula, context, { library: this.library, debug: this.options.debug });
  }

  /**
   * evaluate the formula registered for a node. relative R1C1 references
   * resolve against the node. returns undefined if there's no formula.
   */
  public CalculateNode(node: DependencyNode, context: EvalContext): UnionValue|undefined {

    const address = { row: node.row, column: node.column };
    const formula = this.GetFormula(node.sheet_id, address);

    if (!formula) {
      return undefined;
    }

    const scoped: EvalContext = {
      current_cell: address,
      GetCell: context.GetCell.bind(context),
      GetRange: context.GetRange.bind(context),
      GetSheetCell: context.GetSheetCell?.bind(context),
      GetSheetRange: context.GetSheetRange?.bind(context),
    };

    return this.Evaluate(formula, scoped);

  }

  /**
   * recalculate everything that's dirty, in dependency order, and clear
   * the dirty set. `context` returns the data view for a sheet; `store`
   * receives each result, and has to update that view before the next
   * node is calculated, since later nodes may read it.
   */
  public Recalculate(
      context: (sheet_id: number) => EvalContext,
      store: (node: DependencyNode, value: UnionValue) => void): DependencyNode[] {

    const nodes = this.TakeDirtyNodes();

    for (const node of nodes) {
      const value = this.CalculateNode(node, context(node.sheet_id));
      if (value) {
        store(node, value);
      }
    }

    return nodes;

  }

  protected IsVolatile(name: string): boolean {
    return !!this.library.Get(name)?.volatile;
  }

}
