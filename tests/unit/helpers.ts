/**
 * Shared helpers for building and analyzing IR in tests
 */

import type { FunctionOp, Operation, Value } from '../../src/ir/index.js';
import { CpaContext, formatConstraint, type ConstraintSet, type TypeVarSet } from '../../src/cpa/index.js';
import { CollectingSink } from '../../src/diagnostics/index.js';
import { InitialConstraintGenerator, type GenerationResult } from '../../src/inference/index.js';

export function arg(func: FunctionOp, index: number): Value {
  const value = func.arguments[index];
  if (!value) throw new Error(`@${func.symName} has no argument ${index}`);
  return value;
}

export function result(op: Operation, index = 0): Value {
  const value = op.results[index];
  if (!value) throw new Error(`'${op.name}' has no result ${index}`);
  return value;
}

export interface Analysis {
  result: GenerationResult;
  generator: InitialConstraintGenerator;
  constraints: ConstraintSet;
  typeVars: TypeVarSet;
  sink: CollectingSink;
  /** Constraints in trace form, e.g. `α :> β  [arith.select]` */
  lines: string[];
  /** `name <- %index` for every type variable */
  vars: string[];
}

export function analyze(func: FunctionOp): Analysis {
  const context = new CpaContext();
  const constraints = context.newConstraintSet();
  const typeVars = context.newTypeVarSet();
  const sink = new CollectingSink();
  const generator = new InitialConstraintGenerator(context, constraints, typeVars, sink);
  const outcome = generator.runOnFunction(func);
  return {
    result: outcome,
    generator,
    constraints,
    typeVars,
    sink,
    lines: constraints.constraints.map(formatConstraint),
    vars: typeVars.typeVars.map(tv => `${tv.name} <- %${tv.anchor.index}`),
  };
}
