/**
 * IR Builder - creates functions and operations at an insertion point
 */

import {
  Block,
  FunctionOp,
  Operation,
  Region,
  type FunctionOptions,
  type OpResult,
  type OperationState,
  type SourceLocation,
  type Value,
} from './operation.js';
import { Ops, defaultTraits, type BinaryOperator, type ComparePredicate } from './ops.js';
import { IRTypes, type IRType } from './types.js';

/**
 * The single result of an operation
 */
export function singleResult(op: Operation): OpResult {
  const [result] = op.results;
  if (!result || op.numResults !== 1) {
    throw new Error(`'${op.name}' does not have exactly one result`);
  }
  return result;
}

export class IRBuilder {
  private func: FunctionOp | null = null;
  private block: Block | null = null;
  private loc: SourceLocation | undefined;

  /**
   * Create a function and move the insertion point to its entry block
   */
  createFunction(symName: string, argTypes: readonly IRType[], options: FunctionOptions = {}): FunctionOp {
    const func = new FunctionOp(symName, argTypes, options);
    this.func = func;
    this.block = func.entryBlock ?? null;
    return func;
  }

  get currentFunction(): FunctionOp {
    if (!this.func) {
      throw new Error('no function is being built');
    }
    return this.func;
  }

  get insertionBlock(): Block | null {
    return this.block;
  }

  setInsertionPointToEnd(block: Block | null): void {
    this.block = block;
  }

  /**
   * Build into `block`, restoring the previous insertion point afterwards
   */
  withInsertionPoint<T>(block: Block, build: () => T): T {
    const saved = this.block;
    this.block = block;
    try {
      return build();
    } finally {
      this.block = saved;
    }
  }

  /** Location attached to operations created from now on */
  setLocation(loc: SourceLocation | undefined): void {
    this.loc = loc;
  }

  /**
   * Create a detached block whose arguments are numbered by the current function
   */
  createBlock(argTypes: readonly IRType[] = []): Block {
    const block = new Block();
    for (const type of argTypes) {
      block.addArgument(type, this.currentFunction);
    }
    return block;
  }

  create(state: OperationState): Operation {
    const op = new Operation(
      {
        ...state,
        traits: state.traits ?? defaultTraits(state.name),
        loc: state.loc ?? this.loc,
      },
      this.currentFunction,
    );
    this.block?.append(op);
    return op;
  }

  // ===========================================================================
  // Convenience constructors
  // ===========================================================================

  constant(value: number | string | boolean, type: IRType): OpResult {
    return singleResult(this.create({ name: Ops.constant, resultTypes: [type], attributes: { value } }));
  }

  none(): OpResult {
    return singleResult(this.create({ name: Ops.none, resultTypes: [IRTypes.none] }));
  }

  select(condition: Value, trueValue: Value, falseValue: Value, resultType: IRType = IRTypes.unknown): OpResult {
    return singleResult(this.create({
      name: Ops.select,
      operands: [condition, trueValue, falseValue],
      resultTypes: [resultType],
    }));
  }

  toBoolean(value: Value): OpResult {
    return singleResult(this.create({ name: Ops.toBoolean, operands: [value], resultTypes: [IRTypes.i1] }));
  }

  not(condition: Value): OpResult {
    return singleResult(this.create({ name: Ops.not, operands: [condition], resultTypes: [IRTypes.bool] }));
  }

  unknownCast(value: Value, type: IRType): OpResult {
    return singleResult(this.create({ name: Ops.unknownCast, operands: [value], resultTypes: [type] }));
  }

  binaryExpr(left: Value, operator: BinaryOperator, right: Value, resultType: IRType = IRTypes.unknown): OpResult {
    return singleResult(this.create({
      name: Ops.binaryExpr,
      operands: [left, right],
      resultTypes: [resultType],
      attributes: { operator },
    }));
  }

  binaryCompare(left: Value, predicate: ComparePredicate, right: Value): OpResult {
    return singleResult(this.create({
      name: Ops.binaryCompare,
      operands: [left, right],
      resultTypes: [IRTypes.bool],
      attributes: { predicate },
    }));
  }

  unaryExpr(operator: string, operand: Value): OpResult {
    return singleResult(this.create({
      name: Ops.unaryExpr,
      operands: [operand],
      resultTypes: [IRTypes.unknown],
      attributes: { operator },
    }));
  }

  call(callee: string, args: readonly Value[], resultTypes: readonly IRType[] = [IRTypes.unknown]): Operation {
    return this.create({ name: Ops.call, operands: args, resultTypes, attributes: { callee } });
  }

  ret(values: readonly Value[] = []): Operation {
    return this.create({ name: Ops.return, operands: values });
  }

  yield(values: readonly Value[] = []): Operation {
    return this.create({ name: Ops.yield, operands: values });
  }

  /**
   * Structured conditional over two detached branch blocks
   */
  if(condition: Value, resultTypes: readonly IRType[], thenBlock: Block, elseBlock: Block): Operation {
    const thenRegion = new Region();
    thenRegion.addBlock(thenBlock);
    const elseRegion = new Region();
    elseRegion.addBlock(elseBlock);
    return this.create({
      name: Ops.if,
      operands: [condition],
      resultTypes,
      regions: [thenRegion, elseRegion],
    });
  }

  /**
   * Structured loop; `body` takes the induction variable followed by the
   * loop-carried values and must yield the next loop-carried values
   */
  for(
    lowerBound: Value,
    upperBound: Value,
    step: Value,
    initArgs: readonly Value[],
    body: Block,
  ): Operation {
    const bodyRegion = new Region();
    bodyRegion.addBlock(body);
    return this.create({
      name: Ops.for,
      operands: [lowerBound, upperBound, step, ...initArgs],
      resultTypes: initArgs.map(v => v.type),
      regions: [bodyRegion],
    });
  }
}
