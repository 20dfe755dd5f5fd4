/**
 * Function type inference pass
 *
 * Runs constraint generation for one function (or each function of a
 * module) with a fresh context and fresh output sets, and dumps the result
 * to the sink's trace channel.
 *
 * A failed run keeps whatever was emitted before the failure so it can be
 * inspected, but it is not a usable constraint problem: use
 * `constraintProblemOf`, which refuses failed runs, before handing the
 * sets to a solver.
 */

import type { FunctionOp, IRModule, Operation } from '../ir/index.js';
import {
  CpaContext,
  printConstraintSet,
  printTypeVarSet,
  type Constraint,
  type ConstraintSet,
  type TypeVar,
  type TypeVarSet,
} from '../cpa/index.js';
import type { Diagnostic, DiagnosticSink } from '../diagnostics/index.js';
import { InitialConstraintGenerator } from './generator.js';

export interface FunctionInferenceResult {
  readonly func: FunctionOp;
  readonly success: boolean;
  /** The error that stopped the walk */
  readonly error: Diagnostic | null;
  readonly constraints: ConstraintSet;
  readonly typeVars: TypeVarSet;
  readonly lastReturnOp: Operation | null;
  readonly innerReturnLikeOps: readonly Operation[];
}

/**
 * Input for a solver
 */
export interface ConstraintProblem {
  readonly functionName: string;
  readonly typeVars: readonly TypeVar[];
  readonly constraints: readonly Constraint[];
}

export function runFunctionTypeInference(func: FunctionOp, sink: DiagnosticSink): FunctionInferenceResult {
  const context = new CpaContext();
  const constraints = context.newConstraintSet();
  const typeVars = context.newTypeVarSet();

  const generator = new InitialConstraintGenerator(context, constraints, typeVars, sink);
  const result = generator.runOnFunction(func);

  if (!func.isDeclaration) {
    sink.trace([
      `FUNCTION @${func.symName}`,
      printConstraintSet(constraints),
      printTypeVarSet(typeVars),
    ].join('\n'));
  }

  return {
    func,
    success: result.success,
    error: result.success ? null : result.error,
    constraints,
    typeVars,
    lastReturnOp: generator.getLastReturnOp(),
    innerReturnLikeOps: generator.getInnerReturnLikeOps(),
  };
}

/**
 * Analyze every function of `module` in order. Functions never share
 * constraints, so each result has its own sets.
 */
export function runModuleTypeInference(module: IRModule, sink: DiagnosticSink): FunctionInferenceResult[] {
  return module.functions.map(func => runFunctionTypeInference(func, sink));
}

/**
 * The constraint problem of a successful run, null for a failed one
 */
export function constraintProblemOf(result: FunctionInferenceResult): ConstraintProblem | null {
  if (!result.success) return null;
  return {
    functionName: result.func.symName,
    typeVars: result.typeVars.typeVars,
    constraints: result.constraints.constraints,
  };
}
