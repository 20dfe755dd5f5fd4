/**
 * Tests for operation classification
 */

import { describe, it, expect } from 'vitest';
import { IRBuilder, IRTypes, Operation, Ops } from '../../src/ir/index.js';
import { classifyOperation } from '../../src/inference/index.js';
import { arg } from './helpers.js';

describe('classifyOperation', () => {
  it('should classify known operations by name', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown, IRTypes.unknown, IRTypes.i1]);
    const [x, y, c] = [arg(f, 0), arg(f, 1), arg(f, 2)];

    const select = b.select(c, x, y);
    const toBoolean = b.toBoolean(x);
    const cast = b.unknownCast(x, IRTypes.f64);
    const sum = b.binaryExpr(x, 'Mult', y);
    const compare = b.binaryCompare(x, 'Lt', y);
    const constant = b.constant(1.5, IRTypes.f64);

    expect(classifyOperation(select.owner, f)).toEqual({ kind: 'select', op: select.owner, trueValue: x, falseValue: y });
    expect(classifyOperation(toBoolean.owner, f)).toEqual({ kind: 'to-boolean', op: toBoolean.owner, operand: x });
    expect(classifyOperation(cast.owner, f)).toEqual({ kind: 'unknown-cast', op: cast.owner, operand: x, result: cast });
    expect(classifyOperation(sum.owner, f)).toEqual({ kind: 'binary-expr', op: sum.owner, left: x, right: y, result: sum });
    expect(classifyOperation(compare.owner, f)).toEqual({ kind: 'binary-compare', op: compare.owner, left: x, right: y });
    expect(classifyOperation(constant.owner, f)).toEqual({ kind: 'constant', op: constant.owner, result: constant });
  });

  it('should classify conditionals with and without results', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.i1]);
    const withResult = b.if(arg(f, 0), [IRTypes.unknown], b.createBlock(), b.createBlock());
    const withoutResult = b.if(arg(f, 0), [], b.createBlock(), b.createBlock());

    expect(classifyOperation(withResult, f)).toEqual({ kind: 'conditional', op: withResult, results: withResult.results });
    expect(classifyOperation(withoutResult, f)).toEqual({ kind: 'conditional', op: withoutResult, results: [] });
  });

  it('should tie yields to the operation owning their region', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.i1]);
    const thenBlock = b.createBlock();
    const yieldOp = b.withInsertionPoint(thenBlock, () => b.yield());
    const ifOp = b.if(arg(f, 0), [], thenBlock, b.createBlock());

    expect(classifyOperation(yieldOp, f)).toEqual({ kind: 'yield', op: yieldOp, regionOp: ifOp });
  });

  it('should tell function returns from inner returns', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.i1]);
    const thenBlock = b.createBlock();
    const inner = b.withInsertionPoint(thenBlock, () => b.ret());
    b.if(arg(f, 0), [], thenBlock, b.createBlock());
    const outer = b.ret();

    expect(classifyOperation(inner, f)).toEqual({ kind: 'inner-return', op: inner });
    expect(classifyOperation(outer, f)).toEqual({ kind: 'function-return', op: outer });
  });

  it('should apply trait rules to unknown operation names', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown]);
    const leave = b.create({ name: 'test.leave', operands: [arg(f, 0)], traits: ['return-like', 'terminator'] });
    const literal = b.create({ name: 'test.literal', resultTypes: [IRTypes.str], traits: ['constant-like'] });

    expect(classifyOperation(leave, f)).toEqual({ kind: 'function-return', op: leave });
    expect(classifyOperation(literal, f)).toEqual({ kind: 'constant', op: literal, result: literal.results[0] });
  });

  it('should leave other operations unhandled without a reason', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown]);
    const call = b.call('g', [arg(f, 0)]);
    const negate = b.unaryExpr('-', arg(f, 0));

    expect(classifyOperation(call, f)).toEqual({ kind: 'unhandled', op: call });
    expect(classifyOperation(negate.owner, f)).toEqual({ kind: 'unhandled', op: negate.owner });
  });

  it('should explain why a known operation is malformed', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown, IRTypes.i1]);
    const select = b.create({ name: Ops.select, operands: [arg(f, 1), arg(f, 0)], resultTypes: [IRTypes.unknown] });
    const cast = b.create({ name: Ops.unknownCast, operands: [arg(f, 0)] });
    const constant = b.create({ name: Ops.constant });

    expect(classifyOperation(select, f)).toEqual({
      kind: 'unhandled',
      op: select,
      reason: 'expected 3 operand(s) and 1 result(s), found 2 and 1',
    });
    expect(classifyOperation(cast, f)).toEqual({
      kind: 'unhandled',
      op: cast,
      reason: 'expected 1 operand(s) and 1 result(s), found 1 and 0',
    });
    expect(classifyOperation(constant, f)).toEqual({
      kind: 'unhandled',
      op: constant,
      reason: 'constant-like operation without a result',
    });
  });

  it('should not classify a detached yield as a yield', () => {
    const f = new IRBuilder().createFunction('f', []);
    const op = new Operation({ name: Ops.yield, traits: ['terminator'] });

    expect(classifyOperation(op, f)).toEqual({ kind: 'unhandled', op, reason: 'yield outside of any region' });
  });
});
