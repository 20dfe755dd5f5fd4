/**
 * Trace printing for constraint sets and type variable sets.
 * Meant for people reading logs, not for machines.
 */

import { typeToString, valueName } from '../ir/index.js';
import type { Constraint, ConstraintSet, TypeTerm, TypeVar, TypeVarSet } from './types.js';

export function formatTypeTerm(term: TypeTerm): string {
  return term.kind === 'typevar' ? term.name : typeToString(term.irType);
}

/**
 * e.g. `α :> β  [arith.select]`
 */
export function formatConstraint(constraint: Constraint): string {
  return `${formatTypeTerm(constraint.sup)} :> ${formatTypeTerm(constraint.sub)}  [${constraint.contextOp.name}]`;
}

/**
 * e.g. `α <- %0`
 */
export function formatTypeVarBinding(typeVar: TypeVar): string {
  return `${typeVar.name} <- ${valueName(typeVar.anchor)}`;
}

export function printConstraintSet(set: ConstraintSet): string {
  const lines = ['CONSTRAINTS:', '------------'];
  for (const constraint of set.constraints) {
    lines.push(`  ${formatConstraint(constraint)}`);
  }
  return lines.join('\n');
}

export function printTypeVarSet(set: TypeVarSet): string {
  const lines = ['TYPEVARS:', '---------'];
  for (const typeVar of set.typeVars) {
    lines.push(`  ${formatTypeVarBinding(typeVar)}`);
  }
  return lines.join('\n');
}
