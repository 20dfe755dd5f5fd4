/**
 * CPA Context - factory for type terms, constraints and output sets
 *
 * A context is scoped to one analysis. Concrete type terms are interned
 * per context, so two values of the same IR type share a term.
 */

import type { IRType, Operation, Value } from '../ir/index.js';
import { TypeVarManager } from './type-variable.js';
import {
  ConstraintSet,
  TypeVarSet,
  type IRValueType,
  type SubtypeConstraint,
  type TypeTerm,
  type TypeVar,
} from './types.js';

export class CpaContext {
  private readonly typeVarManager = new TypeVarManager();
  private readonly irValueTypes = new Map<IRType, IRValueType>();

  /**
   * Create a fresh type variable for `anchor`. The caller registers it in
   * whichever TypeVarSet it is building.
   */
  newTypeVar(anchor: Value): TypeVar {
    return this.typeVarManager.fresh(anchor);
  }

  /**
   * The shared term wrapping a concrete IR type
   */
  getIRValueType(irType: IRType): IRValueType {
    let term = this.irValueTypes.get(irType);
    if (!term) {
      term = { kind: 'ir', irType };
      this.irValueTypes.set(irType, term);
    }
    return term;
  }

  newConstraint(sup: TypeTerm, sub: TypeTerm, contextOp: Operation): SubtypeConstraint {
    return { kind: 'subtype', sup, sub, contextOp };
  }

  newConstraintSet(): ConstraintSet {
    return new ConstraintSet();
  }

  newTypeVarSet(): TypeVarSet {
    return new TypeVarSet();
  }

  getStats(): { typeVars: number; irTypes: number } {
    return {
      typeVars: this.typeVarManager.getCount(),
      irTypes: this.irValueTypes.size,
    };
  }
}
