/**
 * Constraint Types - the vocabulary of the constraint problem
 *
 * Constraint generation produces two flat collections:
 * 1. Type variables, one per value whose type is unknown
 * 2. Subtype constraints between type terms
 *
 * Both are handed to a solver, which is not part of this package.
 */

import type { IRType, Operation, Value } from '../ir/index.js';

// ============================================================================
// Type Terms
// ============================================================================

/**
 * A placeholder for the type of a value whose IR type is unknown
 */
export interface TypeVar {
  readonly kind: 'typevar';
  /** Unique identifier within its context */
  readonly id: number;
  /** Human-readable name for traces (e.g., α, β, α₁) */
  readonly name: string;
  /** The value that spawned this variable */
  readonly anchor: Value;
}

/**
 * A concrete IR type lifted into the constraint language.
 * One instance exists per IR type per context.
 */
export interface IRValueType {
  readonly kind: 'ir';
  readonly irType: IRType;
}

export type TypeTerm = TypeVar | IRValueType;

export function isTypeVar(term: TypeTerm): term is TypeVar {
  return term.kind === 'typevar';
}

// ============================================================================
// Constraints
// ============================================================================

/**
 * Subtype constraint: sub <: sup
 * The type of `sub` must be assignable to the type of `sup`.
 */
export interface SubtypeConstraint {
  readonly kind: 'subtype';
  /** The supertype */
  readonly sup: TypeTerm;
  /** The subtype */
  readonly sub: TypeTerm;
  /** Operation that justified the constraint, for diagnostics only */
  readonly contextOp: Operation;
}

export type Constraint = SubtypeConstraint;

// ============================================================================
// Sets
// ============================================================================

/**
 * Append-only, ordered collection of constraints
 */
export class ConstraintSet {
  private readonly items: Constraint[] = [];

  add(constraint: Constraint): void {
    this.items.push(constraint);
  }

  get constraints(): readonly Constraint[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }
}

/**
 * Append-only, ordered collection of type variables
 */
export class TypeVarSet {
  private readonly items: TypeVar[] = [];

  add(typeVar: TypeVar): void {
    this.items.push(typeVar);
  }

  get typeVars(): readonly TypeVar[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }
}
