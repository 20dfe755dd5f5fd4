/**
 * Tests for initial constraint generation over hand-built functions
 */

import { describe, it, expect } from 'vitest';
import { IRBuilder, IRTypes, Ops, type Value } from '../../src/ir/index.js';
import { CpaContext, CollectingSink, InitialConstraintGenerator, Messages } from '../../src/index.js';
import { analyze, arg, result } from './helpers.js';

describe('InitialConstraintGenerator', () => {
  describe('Functions', () => {
    it('should constrain the branches of a select', () => {
      // f(x, y, cond: i1) { c = select cond, x, y; return c }
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown, IRTypes.unknown, IRTypes.i1]);
      const c = b.select(arg(f, 2), arg(f, 0), arg(f, 1));
      const ret = b.ret([c]);

      const analysis = analyze(f);

      expect(analysis.result).toEqual({ success: true });
      expect(analysis.vars).toEqual(['α <- %0', 'β <- %1', 'γ <- %3']);
      expect(analysis.lines).toEqual(['α :> β  [arith.select]']);
      expect(analysis.generator.getLastReturnOp()).toBe(ret);
      expect(analysis.sink.diagnostics).toEqual([]);
    });

    it('should constrain conditional results through their yields', () => {
      // f(p, cond: i1) { r = if cond { yield p } else { yield 7 }; return r }
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown, IRTypes.i1]);
      const thenBlock = b.createBlock();
      const elseBlock = b.createBlock();
      b.withInsertionPoint(thenBlock, () => b.yield([arg(f, 0)]));
      b.withInsertionPoint(elseBlock, () => b.yield([b.constant(7, IRTypes.i64)]));
      const ifOp = b.if(arg(f, 1), [IRTypes.unknown], thenBlock, elseBlock);
      b.ret(ifOp.results);

      const analysis = analyze(f);

      expect(analysis.result.success).toBe(true);
      expect(analysis.vars).toEqual(['α <- %0', 'β <- %3']);
      expect(analysis.lines).toEqual([
        'α :> β  [ctl.yield]',
        'i64 :> β  [ctl.yield]',
      ]);
    });

    it('should constrain every later return against the first', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', Array.from({ length: 6 }, () => IRTypes.unknown));
      const first = b.ret([arg(f, 0), arg(f, 1)]);
      b.setInsertionPointToEnd(f.body.addBlock(b.createBlock()));
      b.ret([arg(f, 2), arg(f, 3)]);
      b.setInsertionPointToEnd(f.body.addBlock(b.createBlock()));
      const last = b.ret([arg(f, 4), arg(f, 5)]);

      const analysis = analyze(f);

      expect(analysis.result.success).toBe(true);
      expect(analysis.lines).toEqual([
        'γ :> α  [func.return]',
        'δ :> β  [func.return]',
        'ε :> α  [func.return]',
        'ζ :> β  [func.return]',
      ]);
      expect(analysis.generator.getReferenceReturnOp()).toBe(first);
      expect(analysis.generator.getLastReturnOp()).toBe(last);
    });

    it('should stop at a return of a different arity', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown, IRTypes.unknown, IRTypes.i1]);
      const c = b.select(arg(f, 2), arg(f, 0), arg(f, 1));
      const first = b.ret([c]);
      b.setInsertionPointToEnd(f.body.addBlock(b.createBlock()));
      const mismatched = b.ret([arg(f, 0), arg(f, 1)]);
      b.setInsertionPointToEnd(f.body.addBlock(b.createBlock()));
      b.call('g', [arg(f, 0)]);

      const analysis = analyze(f);

      expect(analysis.result.success).toBe(false);
      if (analysis.result.success) return;
      expect(analysis.result.error.op).toBe(mismatched);
      expect(analysis.result.error.message).toBe(Messages.returnArity);
      // The call after the failure is never visited, so it reports nothing
      expect(analysis.sink.diagnostics).toEqual([analysis.result.error]);
      expect(analysis.sink.diagnostics[0]?.severity).toBe('error');
      expect(analysis.lines).toEqual(['α :> β  [arith.select]']);
      expect(analysis.generator.getLastReturnOp()).toBe(first);
    });

    it('should trace each operation before applying its rule', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown]);
      b.ret([arg(f, 0)]);
      b.setInsertionPointToEnd(f.body.addBlock(b.createBlock()));
      b.ret();
      b.setInsertionPointToEnd(f.body.addBlock(b.createBlock()));
      b.none();

      const analysis = analyze(f);

      expect(analysis.result.success).toBe(false);
      expect(analysis.sink.traces).toEqual([
        '  + visit: func.return %0 : (!dyn.unknown) -> ()',
        '  + visit: func.return',
      ]);
    });

    it('should skip yields whose arity does not match their region', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown, IRTypes.i1]);
      const p = arg(f, 0);
      const thenBlock = b.createBlock();
      const elseBlock = b.createBlock();
      const badYield = b.withInsertionPoint(thenBlock, () => b.yield([p, p]));
      b.withInsertionPoint(elseBlock, () => b.yield([p]));
      const ifOp = b.if(arg(f, 1), [IRTypes.unknown], thenBlock, elseBlock);
      b.ret(ifOp.results);

      const analysis = analyze(f);

      expect(analysis.result.success).toBe(true);
      expect(analysis.lines).toEqual(['α :> β  [ctl.yield]']);
      expect(analysis.sink.diagnostics).toEqual([
        { severity: 'warning', message: Messages.yieldArity, op: badYield },
      ]);
    });

    it('should produce nothing for empty functions and declarations', () => {
      const b = new IRBuilder();
      const empty = b.createFunction('empty', []);
      const declared = b.createFunction('declared', [IRTypes.unknown], { declaration: true });

      for (const func of [empty, declared]) {
        const analysis = analyze(func);
        expect(analysis.result.success).toBe(true);
        expect(analysis.typeVars.size).toBe(0);
        expect(analysis.constraints.size).toBe(0);
        expect(analysis.generator.getLastReturnOp()).toBeNull();
      }
    });

    it('should resolve parameters nothing uses', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown, IRTypes.str]);
      b.ret();

      const analysis = analyze(f);

      expect(analysis.vars).toEqual(['α <- %0']);
      expect(analysis.generator.getValueType(arg(f, 1))).toEqual({ kind: 'ir', irType: IRTypes.str });
    });
  });

  describe('Operations', () => {
    it('should allocate a variable for the operand of to_boolean', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown]);
      const call = b.call('g', [arg(f, 0)]);
      b.toBoolean(result(call));

      const analysis = analyze(f);

      expect(analysis.vars).toEqual(['α <- %0', 'β <- %1']);
      expect(analysis.lines).toEqual([]);
      expect(analysis.sink.ofSeverity('remark').map(d => d.op)).toEqual([call]);
    });

    it('should constrain casts from unknown', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown]);
      b.unknownCast(arg(f, 0), IRTypes.f64);

      expect(analyze(f).lines).toEqual(['α :> f64  [dyn.unknown_cast]']);
    });

    it('should constrain both operands and the result of a binary expression', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown, IRTypes.unknown]);
      b.binaryExpr(arg(f, 0), 'Add', arg(f, 1));

      const analysis = analyze(f);

      expect(analysis.lines).toEqual([
        'α :> β  [dyn.binary_expr]',
        'α :> γ  [dyn.binary_expr]',
      ]);
      expect(analysis.vars).toEqual(['α <- %0', 'β <- %1', 'γ <- %2']);
    });

    it('should leave the result of a comparison alone', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown, IRTypes.unknown]);
      const compare = b.binaryCompare(arg(f, 0), 'Eq', arg(f, 1));

      const analysis = analyze(f);

      expect(analysis.lines).toEqual(['α :> β  [dyn.binary_compare]']);
      expect(analysis.generator.getValueType(compare)).toBeUndefined();
    });

    it('should give constants their concrete type', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', []);
      const text = b.constant('hi', IRTypes.str);
      const nothing = b.none();

      const analysis = analyze(f);

      expect(analysis.typeVars.size).toBe(0);
      expect(analysis.generator.getValueType(text)).toEqual({ kind: 'ir', irType: IRTypes.str });
      expect(analysis.generator.getValueType(nothing)).toEqual({ kind: 'ir', irType: IRTypes.none });
    });

    it('should collect returns nested in other regions without reporting them', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.i1]);
      const thenBlock = b.createBlock();
      const inner = b.withInsertionPoint(thenBlock, () => b.ret());
      b.if(arg(f, 0), [], thenBlock, b.createBlock());
      const outer = b.ret();

      const analysis = analyze(f);

      expect(analysis.result.success).toBe(true);
      expect(analysis.generator.getInnerReturnLikeOps()).toEqual([inner]);
      expect(analysis.generator.getLastReturnOp()).toBe(outer);
      expect(analysis.sink.diagnostics).toEqual([]);
    });

    it('should report loops but still visit their bodies', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown]);
      const bounds: Value[] = [0, 4, 1].map(n => b.constant(n, IRTypes.i64));
      const body = b.createBlock([IRTypes.i64, IRTypes.unknown]);
      const [lb, ub, step] = bounds;
      const carried = body.arguments[1];
      if (!lb || !ub || !step || !carried) throw new Error('missing loop values');
      b.withInsertionPoint(body, () => b.yield([carried]));
      const forOp = b.for(lb, ub, step, [arg(f, 0)], body);
      b.ret(forOp.results);

      const analysis = analyze(f);

      expect(analysis.sink.diagnostics).toEqual([
        { severity: 'remark', message: Messages.unhandledOp, op: forOp },
      ]);
      expect(analysis.lines).toEqual(['β :> γ  [ctl.yield]']);
      expect(analysis.vars).toEqual(['α <- %0', 'β <- %5', 'γ <- %6']);
    });

    it('should name the problem with a malformed operation', () => {
      const b = new IRBuilder();
      const f = b.createFunction('f', [IRTypes.unknown]);
      const op = b.create({ name: Ops.toBoolean, resultTypes: [IRTypes.i1] });

      const analysis = analyze(f);

      expect(analysis.sink.diagnostics).toEqual([{
        severity: 'remark',
        message: 'unhandled op in type inference: expected 1 operand(s) and 1 result(s), found 0 and 1',
        op,
      }]);
    });
  });

  it('should start over for each function it runs on', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown]);
    const fRet = b.ret([arg(f, 0)]);
    const g = b.createFunction('g', [IRTypes.unknown, IRTypes.unknown]);
    b.ret([arg(g, 0), arg(g, 1)]);

    const context = new CpaContext();
    const constraints = context.newConstraintSet();
    const typeVars = context.newTypeVarSet();
    const generator = new InitialConstraintGenerator(context, constraints, typeVars, new CollectingSink());

    expect(generator.runOnFunction(f)).toEqual({ success: true });
    expect(generator.getLastReturnOp()).toBe(fRet);
    // A different arity in another function is not a mismatch
    expect(generator.runOnFunction(g)).toEqual({ success: true });
    expect(generator.getValueType(arg(f, 0))).toBeUndefined();
    expect(typeVars.typeVars.map(tv => tv.name)).toEqual(['α', 'β', 'γ']);
  });
});
