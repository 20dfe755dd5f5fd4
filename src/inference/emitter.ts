/**
 * Constraint Emitter - turns a pair of values into a subtype constraint
 */

import type { Operation, Value } from '../ir/index.js';
import type { ConstraintSet, CpaContext, SubtypeConstraint } from '../cpa/index.js';
import type { ValueResolver } from './resolver.js';

export class ConstraintEmitter {
  constructor(
    private readonly context: CpaContext,
    private readonly resolver: ValueResolver,
    private readonly constraints: ConstraintSet,
  ) {}

  /**
   * Require `subValue`'s type to be assignable to `superValue`'s.
   * No deduplication: redundant and cyclic constraints are the solver's
   * business.
   */
  constrain(superValue: Value, subValue: Value, contextOp: Operation): SubtypeConstraint {
    const sup = this.resolver.resolve(superValue);
    const sub = this.resolver.resolve(subValue);
    const constraint = this.context.newConstraint(sup, sub, contextOp);
    this.constraints.add(constraint);
    return constraint;
  }
}
