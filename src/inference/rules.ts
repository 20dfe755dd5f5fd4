/**
 * Operation rules - classification of operations for constraint generation
 *
 * Every operation maps to exactly one rule. Specific operation kinds are
 * matched first, then the constant-like and return-like traits, and
 * everything else is `unhandled`. An operation that carries a known name
 * but not the operand/result layout of that kind is `unhandled` as well,
 * so classification never fails.
 */

import { Ops, type Operation, type Value } from '../ir/index.js';

/** `c ? t : f`; the i1 condition takes no part in inference */
export interface SelectRule {
  readonly kind: 'select';
  readonly op: Operation;
  readonly trueValue: Value;
  readonly falseValue: Value;
}

/** Coercion to i1; only the operand takes part in inference */
export interface ToBooleanRule {
  readonly kind: 'to-boolean';
  readonly op: Operation;
  readonly operand: Value;
}

/** Structured conditional; its branches constrain the results through their yields */
export interface ConditionalRule {
  readonly kind: 'conditional';
  readonly op: Operation;
  readonly results: readonly Value[];
}

/** Yield from a region of `regionOp` */
export interface YieldRule {
  readonly kind: 'yield';
  readonly op: Operation;
  readonly regionOp: Operation;
}

export interface UnknownCastRule {
  readonly kind: 'unknown-cast';
  readonly op: Operation;
  readonly operand: Value;
  readonly result: Value;
}

export interface BinaryExprRule {
  readonly kind: 'binary-expr';
  readonly op: Operation;
  readonly left: Value;
  readonly right: Value;
  readonly result: Value;
}

/** Comparison; the boolean result takes no part in inference */
export interface BinaryCompareRule {
  readonly kind: 'binary-compare';
  readonly op: Operation;
  readonly left: Value;
  readonly right: Value;
}

export interface ConstantRule {
  readonly kind: 'constant';
  readonly op: Operation;
  readonly result: Value;
}

/** Return-like operation directly in the function body */
export interface FunctionReturnRule {
  readonly kind: 'function-return';
  readonly op: Operation;
}

/** Return-like operation nested in some other operation's region */
export interface InnerReturnRule {
  readonly kind: 'inner-return';
  readonly op: Operation;
}

export interface UnhandledRule {
  readonly kind: 'unhandled';
  readonly op: Operation;
  /** Why a recognized operation could not be used */
  readonly reason?: string;
}

export type OperationRule =
  | SelectRule
  | ToBooleanRule
  | ConditionalRule
  | YieldRule
  | UnknownCastRule
  | BinaryExprRule
  | BinaryCompareRule
  | ConstantRule
  | FunctionReturnRule
  | InnerReturnRule
  | UnhandledRule
  ;

function malformed(op: Operation, operands: number, results: number): UnhandledRule {
  return {
    kind: 'unhandled',
    op,
    reason: `expected ${operands} operand(s) and ${results} result(s), found ${op.numOperands} and ${op.numResults}`,
  };
}

/**
 * Pick the rule for `op`, an operation nested in `func`
 */
export function classifyOperation(op: Operation, func: Operation): OperationRule {
  switch (op.name) {
    case Ops.select: {
      const [, trueValue, falseValue] = op.operands;
      if (op.numOperands !== 3 || !trueValue || !falseValue) return malformed(op, 3, 1);
      return { kind: 'select', op, trueValue, falseValue };
    }

    case Ops.toBoolean: {
      const [operand] = op.operands;
      if (op.numOperands !== 1 || !operand) return malformed(op, 1, 1);
      return { kind: 'to-boolean', op, operand };
    }

    case Ops.if:
      return { kind: 'conditional', op, results: op.results };

    case Ops.yield: {
      const regionOp = op.parentOp;
      if (!regionOp) {
        return { kind: 'unhandled', op, reason: 'yield outside of any region' };
      }
      return { kind: 'yield', op, regionOp };
    }

    case Ops.unknownCast: {
      const [operand] = op.operands;
      const [result] = op.results;
      if (op.numOperands !== 1 || op.numResults !== 1 || !operand || !result) return malformed(op, 1, 1);
      return { kind: 'unknown-cast', op, operand, result };
    }

    case Ops.binaryExpr: {
      const [left, right] = op.operands;
      const [result] = op.results;
      if (op.numOperands !== 2 || op.numResults !== 1 || !left || !right || !result) return malformed(op, 2, 1);
      return { kind: 'binary-expr', op, left, right, result };
    }

    case Ops.binaryCompare: {
      const [left, right] = op.operands;
      if (op.numOperands !== 2 || !left || !right) return malformed(op, 2, 1);
      return { kind: 'binary-compare', op, left, right };
    }
  }

  // Fallback trait based rules
  if (op.hasTrait('constant-like')) {
    const [result] = op.results;
    if (!result) {
      return { kind: 'unhandled', op, reason: 'constant-like operation without a result' };
    }
    return { kind: 'constant', op, result };
  }

  if (op.hasTrait('return-like')) {
    return op.parentOp === func
      ? { kind: 'function-return', op }
      : { kind: 'inner-return', op };
  }

  return { kind: 'unhandled', op };
}
