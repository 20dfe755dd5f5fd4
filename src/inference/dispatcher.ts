/**
 * Rule Dispatcher - applies the rule of each visited operation
 *
 * Besides the per-operation rules this tracks the function's return
 * signature: the first function-level return is the reference, every
 * later one must match its arity and is constrained against it.
 */

import type { FunctionOp, Operation } from '../ir/index.js';
import type { Diagnostic, DiagnosticSink } from '../diagnostics/index.js';
import type { ConstraintEmitter } from './emitter.js';
import type { ValueResolver } from './resolver.js';
import { classifyOperation, type OperationRule } from './rules.js';

export const Messages = {
  unhandledOp: 'unhandled op in type inference',
  yieldArity: 'cannot run type inference on yield due to arity mismatch',
  returnArity: 'different arity of function returns',
} as const;

export class RuleDispatcher {
  private referenceReturnOp: Operation | null = null;
  private lastReturnOp: Operation | null = null;
  private readonly innerReturnLikeOps: Operation[] = [];

  constructor(
    private readonly func: FunctionOp,
    private readonly resolver: ValueResolver,
    private readonly emitter: ConstraintEmitter,
    private readonly sink: DiagnosticSink,
  ) {}

  /**
   * Apply the rule for `op`.
   * @returns the error that must stop the walk, if any
   */
  apply(op: Operation): Diagnostic | undefined {
    return this.applyRule(classifyOperation(op, this.func));
  }

  private applyRule(rule: OperationRule): Diagnostic | undefined {
    switch (rule.kind) {
      case 'select':
        this.emitter.constrain(rule.trueValue, rule.falseValue, rule.op);
        return undefined;

      case 'to-boolean':
        this.resolver.resolve(rule.operand);
        return undefined;

      case 'conditional':
        for (const result of rule.results) {
          this.resolver.resolve(result);
        }
        return undefined;

      case 'yield': {
        const { op, regionOp } = rule;
        if (regionOp.numResults !== op.numOperands) {
          this.sink.report({ severity: 'warning', message: Messages.yieldArity, op });
          return undefined;
        }
        op.operands.forEach((operand, i) => {
          const result = regionOp.results[i];
          if (result) this.emitter.constrain(operand, result, op);
        });
        return undefined;
      }

      case 'unknown-cast':
        this.emitter.constrain(rule.operand, rule.result, rule.op);
        return undefined;

      case 'binary-expr':
        // Strict equality between operands and result, not numeric promotion
        this.emitter.constrain(rule.left, rule.right, rule.op);
        this.emitter.constrain(rule.left, rule.result, rule.op);
        return undefined;

      case 'binary-compare':
        this.emitter.constrain(rule.left, rule.right, rule.op);
        return undefined;

      case 'constant':
        this.resolver.resolve(rule.result);
        return undefined;

      case 'function-return':
        return this.unifyReturn(rule.op);

      case 'inner-return':
        // Left for a later rewrite of the enclosing regions
        this.innerReturnLikeOps.push(rule.op);
        return undefined;

      case 'unhandled': {
        const message = rule.reason ? `${Messages.unhandledOp}: ${rule.reason}` : Messages.unhandledOp;
        this.sink.report({ severity: 'remark', message, op: rule.op });
        return undefined;
      }
    }
  }

  private unifyReturn(op: Operation): Diagnostic | undefined {
    const reference = this.referenceReturnOp;
    if (!reference) {
      // No constraints yet, but the returned values get their terms
      for (const operand of op.operands) {
        this.resolver.resolve(operand);
      }
      this.referenceReturnOp = op;
      this.lastReturnOp = op;
      return undefined;
    }

    if (reference.numOperands !== op.numOperands) {
      const error: Diagnostic = { severity: 'error', message: Messages.returnArity, op };
      this.sink.report(error);
      return error;
    }

    op.operands.forEach((operand, i) => {
      const referenceOperand = reference.operands[i];
      if (referenceOperand) this.emitter.constrain(operand, referenceOperand, op);
    });
    this.lastReturnOp = op;
    return undefined;
  }

  /** The return whose operands every other function-level return is checked against */
  getReferenceReturnOp(): Operation | null {
    return this.referenceReturnOp;
  }

  getLastReturnOp(): Operation | null {
    return this.lastReturnOp;
  }

  getInnerReturnLikeOps(): readonly Operation[] {
    return this.innerReturnLikeOps;
  }
}
