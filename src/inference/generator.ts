/**
 * Initial Constraint Generator - one walk over a function body
 *
 * Entry block arguments are resolved first, whether or not anything uses
 * them, since callers may constrain parameters later. Then every nested
 * operation is traced and handed to the rule dispatcher in program order.
 * The walk stops at the first function return whose arity differs from the
 * first return's; constraints emitted up to that point are left in place.
 */

import { operationHead, type FunctionOp, type Operation, type Value } from '../ir/index.js';
import type { ConstraintSet, CpaContext, TypeTerm, TypeVarSet } from '../cpa/index.js';
import type { Diagnostic, DiagnosticSink } from '../diagnostics/index.js';
import { ConstraintEmitter } from './emitter.js';
import { RuleDispatcher } from './dispatcher.js';
import { ValueResolver } from './resolver.js';

export type GenerationResult =
  | { readonly success: true }
  | { readonly success: false; readonly error: Diagnostic }
  ;

interface FunctionWalk {
  readonly resolver: ValueResolver;
  readonly dispatcher: RuleDispatcher;
}

export class InitialConstraintGenerator {
  private walk: FunctionWalk | null = null;

  constructor(
    private readonly context: CpaContext,
    private readonly constraints: ConstraintSet,
    private readonly typeVars: TypeVarSet,
    private readonly sink: DiagnosticSink,
  ) {}

  runOnFunction(func: FunctionOp): GenerationResult {
    this.walk = null;
    const entryBlock = func.entryBlock;
    if (!entryBlock) {
      return { success: true };
    }

    // Each function gets its own memoization
    const resolver = new ValueResolver(this.context, this.typeVars);
    const emitter = new ConstraintEmitter(this.context, resolver, this.constraints);
    const dispatcher = new RuleDispatcher(func, resolver, emitter, this.sink);
    this.walk = { resolver, dispatcher };

    for (const arg of entryBlock.arguments) {
      resolver.resolve(arg);
    }

    const stop: { error?: Diagnostic } = {};
    func.walk((op) => {
      if (op === func) return 'advance';
      this.sink.trace(`  + visit: ${operationHead(op)}`);
      stop.error = dispatcher.apply(op);
      return stop.error ? 'interrupt' : 'advance';
    });

    return stop.error ? { success: false, error: stop.error } : { success: true };
  }

  /**
   * Term assigned to `value` during the last run, if it was resolved
   */
  getValueType(value: Value): TypeTerm | undefined {
    return this.walk?.resolver.lookup(value);
  }

  /** If a function-level return was visited, the last one */
  getLastReturnOp(): Operation | null {
    return this.walk?.dispatcher.getLastReturnOp() ?? null;
  }

  /** The first function-level return, which fixes the return arity */
  getReferenceReturnOp(): Operation | null {
    return this.walk?.dispatcher.getReferenceReturnOp() ?? null;
  }

  /**
   * Return-like operations that do not return from the function itself,
   * left for a later rewrite of their enclosing regions
   */
  getInnerReturnLikeOps(): readonly Operation[] {
    return this.walk?.dispatcher.getInnerReturnLikeOps() ?? [];
  }
}
