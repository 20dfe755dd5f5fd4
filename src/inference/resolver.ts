/**
 * Value Resolver - memoized mapping from IR values to type terms
 *
 * A value of unknown type gets a fresh type variable, registered in the
 * output TypeVarSet; any other value gets the shared term for its concrete
 * type. Once resolved, a value keeps its term for the rest of the walk.
 */

import { isUnknownType, type Value } from '../ir/index.js';
import type { CpaContext, TypeTerm, TypeVarSet } from '../cpa/index.js';

interface Slot {
  readonly value: Value;
  readonly term: TypeTerm;
}

export class ValueResolver {
  /** Indexed by the function-local value index */
  private readonly slots: (Slot | undefined)[] = [];
  /** Values whose index slot is taken by a value of another function */
  private readonly overflow = new Map<Value, TypeTerm>();

  constructor(
    private readonly context: CpaContext,
    private readonly typeVars: TypeVarSet,
  ) {}

  resolve(value: Value): TypeTerm {
    const cached = this.lookup(value);
    if (cached) return cached;

    let term: TypeTerm;
    if (isUnknownType(value.type)) {
      const typeVar = this.context.newTypeVar(value);
      this.typeVars.add(typeVar);
      term = typeVar;
    } else {
      term = this.context.getIRValueType(value.type);
    }

    this.store(value, term);
    return term;
  }

  /**
   * The term of an already resolved value
   */
  lookup(value: Value): TypeTerm | undefined {
    const slot = this.slots[value.index];
    if (slot?.value === value) return slot.term;
    return this.overflow.get(value);
  }

  private store(value: Value, term: TypeTerm): void {
    while (this.slots.length <= value.index) {
      this.slots.push(undefined);
    }
    if (this.slots[value.index]) {
      this.overflow.set(value, term);
    } else {
      this.slots[value.index] = { value, term };
    }
  }
}
