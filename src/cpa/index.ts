/**
 * Constraint problem model
 *
 * Type terms, subtype constraints and the sets that carry them from
 * constraint generation to a solver.
 *
 * @module cpa
 */

export type {
  TypeVar,
  IRValueType,
  TypeTerm,
  SubtypeConstraint,
  Constraint,
} from './types.js';
export { ConstraintSet, TypeVarSet, isTypeVar } from './types.js';

export { TypeVarManager, typeVarName } from './type-variable.js';

export { CpaContext } from './context.js';

export {
  formatTypeTerm,
  formatConstraint,
  formatTypeVarBinding,
  printConstraintSet,
  printTypeVarSet,
} from './printer.js';
