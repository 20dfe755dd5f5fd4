/**
 * Operation names understood by the IR and their default traits
 */

import type { OpTrait } from './operation.js';

export const Ops = {
  return: 'func.return',
  call: 'func.call',
  select: 'arith.select',
  toBoolean: 'dyn.to_boolean',
  not: 'dyn.not',
  if: 'ctl.if',
  for: 'ctl.for',
  yield: 'ctl.yield',
  unknownCast: 'dyn.unknown_cast',
  binaryExpr: 'dyn.binary_expr',
  binaryCompare: 'dyn.binary_compare',
  unaryExpr: 'dyn.unary_expr',
  constant: 'dyn.constant',
  none: 'dyn.none',
} as const;

const DEFAULT_TRAITS: ReadonlyMap<string, readonly OpTrait[]> = new Map<string, readonly OpTrait[]>([
  [Ops.return, ['return-like', 'terminator']],
  [Ops.yield, ['terminator']],
  [Ops.constant, ['constant-like']],
  [Ops.none, ['constant-like']],
]);

/**
 * Traits an operation of the given name carries unless told otherwise
 */
export function defaultTraits(name: string): readonly OpTrait[] {
  return DEFAULT_TRAITS.get(name) ?? [];
}

/**
 * Operators of `dyn.binary_expr`
 */
export type BinaryOperator =
  | 'Add' | 'Sub' | 'Mult' | 'Div' | 'Mod' | 'Pow'
  | 'LShift' | 'RShift' | 'BitOr' | 'BitXor' | 'BitAnd'
  ;

/**
 * Predicates of `dyn.binary_compare`
 */
export type ComparePredicate =
  | 'Eq' | 'NotEq' | 'Lt' | 'LtE' | 'Gt' | 'GtE' | 'In'
  ;
