/**
 * Tests for the constraint problem model
 */

import { describe, it, expect } from 'vitest';
import { IRBuilder, IRTypes } from '../../src/ir/index.js';
import {
  CpaContext,
  TypeVarManager,
  formatConstraint,
  formatTypeTerm,
  isTypeVar,
  printConstraintSet,
  printTypeVarSet,
  typeVarName,
} from '../../src/cpa/index.js';
import { arg } from './helpers.js';

describe('Type variable names', () => {
  it('should use Greek letters, then subscripts', () => {
    expect(typeVarName(0)).toBe('α');
    expect(typeVarName(2)).toBe('γ');
    expect(typeVarName(23)).toBe('ω');
    expect(typeVarName(24)).toBe('α₁');
    expect(typeVarName(49)).toBe('β₂');
    expect(typeVarName(24 * 12)).toBe('α₁₂');
  });

  it('should hand out unique ids', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown]);
    const manager = new TypeVarManager();

    const first = manager.fresh(arg(f, 0));
    const second = manager.fresh(arg(f, 0));

    expect(first.id).toBe(0);
    expect(second.id).toBe(1);
    expect(second.name).toBe('β');
    expect(second.anchor).toBe(arg(f, 0));
    expect(manager.getCount()).toBe(2);
  });
});

describe('CpaContext', () => {
  it('should intern concrete terms per context', () => {
    const context = new CpaContext();
    const other = new CpaContext();

    expect(context.getIRValueType(IRTypes.i64)).toBe(context.getIRValueType(IRTypes.i64));
    expect(context.getIRValueType(IRTypes.i64)).not.toBe(context.getIRValueType(IRTypes.f64));
    expect(context.getIRValueType(IRTypes.i64)).not.toBe(other.getIRValueType(IRTypes.i64));
    expect(context.getStats()).toEqual({ typeVars: 0, irTypes: 2 });
  });

  it('should not register new type variables anywhere', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown]);
    const context = new CpaContext();
    const typeVars = context.newTypeVarSet();

    const tv = context.newTypeVar(arg(f, 0));

    expect(isTypeVar(tv)).toBe(true);
    expect(typeVars.size).toBe(0);
    expect(context.getStats().typeVars).toBe(1);
  });

  it('should build constraints with their context operation', () => {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown]);
    const ret = b.ret([arg(f, 0)]);
    const context = new CpaContext();
    const sup = context.newTypeVar(arg(f, 0));
    const sub = context.getIRValueType(IRTypes.str);

    const constraint = context.newConstraint(sup, sub, ret);

    expect(constraint).toEqual({ kind: 'subtype', sup, sub, contextOp: ret });
    expect(isTypeVar(constraint.sub)).toBe(false);
  });
});

describe('Constraint printing', () => {
  function fixture() {
    const b = new IRBuilder();
    const f = b.createFunction('f', [IRTypes.unknown, IRTypes.unknown]);
    const select = b.select(b.constant(true, IRTypes.i1), arg(f, 0), arg(f, 1));
    const context = new CpaContext();
    const alpha = context.newTypeVar(arg(f, 0));
    const beta = context.newTypeVar(arg(f, 1));
    return { context, alpha, beta, selectOp: select.owner };
  }

  it('should format terms', () => {
    const { context, alpha } = fixture();
    expect(formatTypeTerm(alpha)).toBe('α');
    expect(formatTypeTerm(context.getIRValueType(IRTypes.f64))).toBe('f64');
    expect(formatTypeTerm(context.getIRValueType(IRTypes.none))).toBe('!dyn.none');
  });

  it('should print sets in insertion order', () => {
    const { context, alpha, beta, selectOp } = fixture();
    const constraints = context.newConstraintSet();
    const typeVars = context.newTypeVarSet();
    typeVars.add(beta);
    typeVars.add(alpha);
    constraints.add(context.newConstraint(alpha, beta, selectOp));
    constraints.add(context.newConstraint(context.getIRValueType(IRTypes.i64), alpha, selectOp));

    expect(constraints.constraints.map(formatConstraint)).toEqual([
      'α :> β  [arith.select]',
      'i64 :> α  [arith.select]',
    ]);
    expect(printConstraintSet(constraints)).toBe(
      'CONSTRAINTS:\n------------\n  α :> β  [arith.select]\n  i64 :> α  [arith.select]',
    );
    expect(printTypeVarSet(typeVars)).toBe('TYPEVARS:\n---------\n  β <- %1\n  α <- %0');
  });

  it('should print empty sets as headers only', () => {
    const context = new CpaContext();
    expect(printConstraintSet(context.newConstraintSet())).toBe('CONSTRAINTS:\n------------');
    expect(printTypeVarSet(context.newTypeVarSet())).toBe('TYPEVARS:\n---------');
  });
});
