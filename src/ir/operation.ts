/**
 * IR structure - operations, blocks, regions and values
 *
 * The IR is a tree: a function owns a region of blocks, blocks hold an
 * ordered list of operations, and operations may own nested regions
 * (the branches of a conditional, the body of a loop).
 */

import type { IRType } from './types.js';

export interface SourceLocation {
  readonly file: string;
  /** Line number (1-indexed) */
  readonly line: number;
  /** Column number (0-indexed) */
  readonly column: number;
}

/**
 * Semantic traits an operation may carry
 */
export type OpTrait =
  | 'constant-like'   // materializes a constant, exactly one result
  | 'return-like'     // ends control flow, operands are the returned values
  | 'terminator'      // must be the last operation of its block
  ;

export type Attribute = string | number | boolean;

// ============================================================================
// Values
// ============================================================================

/**
 * An argument of a block (function parameters are entry block arguments)
 */
export interface BlockArgument {
  readonly kind: 'block-argument';
  /** Function-local index, unique among the values of one function */
  readonly index: number;
  readonly type: IRType;
  readonly owner: Block;
  readonly argNumber: number;
}

/**
 * A value produced by an operation
 */
export interface OpResult {
  readonly kind: 'op-result';
  /** Function-local index, unique among the values of one function */
  readonly index: number;
  readonly type: IRType;
  readonly owner: Operation;
  readonly resultNumber: number;
}

export type Value = BlockArgument | OpResult;

/**
 * Source of function-local value indices
 */
export interface ValueNumbering {
  nextValueIndex(): number;
}

const unnumbered: ValueNumbering = {
  nextValueIndex(): number {
    throw new Error('operation results need a value numbering');
  },
};

// ============================================================================
// Walking
// ============================================================================

/**
 * Verdict returned by a walk callback
 * - advance: continue, descending into the operation's regions
 * - skip: continue, but do not descend into this operation's regions
 * - interrupt: stop the whole walk
 */
export type WalkResult = 'advance' | 'skip' | 'interrupt';

export type WalkOutcome = 'completed' | 'interrupted';

// ============================================================================
// Operations
// ============================================================================

export interface OperationState {
  readonly name: string;
  readonly operands?: readonly Value[];
  readonly resultTypes?: readonly IRType[];
  /** Detached regions; the new operation becomes their parent */
  readonly regions?: readonly Region[];
  readonly attributes?: Readonly<Record<string, Attribute>>;
  readonly traits?: readonly OpTrait[];
  readonly loc?: SourceLocation;
}

export class Operation {
  readonly name: string;
  readonly operands: readonly Value[];
  readonly results: readonly OpResult[];
  readonly regions: readonly Region[];
  readonly attributes: ReadonlyMap<string, Attribute>;
  readonly traits: ReadonlySet<OpTrait>;
  readonly loc: SourceLocation | undefined;

  /** Block this operation is appended to, null while detached */
  parentBlock: Block | null = null;

  constructor(state: OperationState, numbering: ValueNumbering = unnumbered) {
    this.name = state.name;
    this.operands = [...(state.operands ?? [])];
    this.results = (state.resultTypes ?? []).map((type, resultNumber): OpResult => ({
      kind: 'op-result',
      index: numbering.nextValueIndex(),
      type,
      owner: this,
      resultNumber,
    }));
    this.regions = [...(state.regions ?? [])];
    this.attributes = new Map(Object.entries(state.attributes ?? {}));
    this.traits = new Set(state.traits ?? []);
    this.loc = state.loc;

    for (const region of this.regions) {
      if (region.parentOp) {
        throw new Error(`region is already owned by '${region.parentOp.name}'`);
      }
      region.parentOp = this;
    }
  }

  /**
   * The structural parent: the operation owning the region this one is in
   */
  get parentOp(): Operation | null {
    return this.parentBlock?.parentRegion?.parentOp ?? null;
  }

  get numOperands(): number {
    return this.operands.length;
  }

  get numResults(): number {
    return this.results.length;
  }

  hasTrait(trait: OpTrait): boolean {
    return this.traits.has(trait);
  }

  getAttribute(name: string): Attribute | undefined {
    return this.attributes.get(name);
  }

  /**
   * Visit this operation and every operation nested in it, in program order
   * (pre-order: an operation before the contents of its regions).
   */
  walk(callback: (op: Operation) => WalkResult): WalkOutcome {
    const verdict = callback(this);
    if (verdict === 'interrupt') return 'interrupted';
    if (verdict === 'skip') return 'completed';

    for (const region of this.regions) {
      for (const block of region.blocks) {
        for (const op of block.operations) {
          if (op.walk(callback) === 'interrupted') {
            return 'interrupted';
          }
        }
      }
    }
    return 'completed';
  }
}

// ============================================================================
// Blocks and Regions
// ============================================================================

export class Block {
  readonly arguments: BlockArgument[] = [];
  readonly operations: Operation[] = [];
  parentRegion: Region | null = null;

  addArgument(type: IRType, numbering: ValueNumbering): BlockArgument {
    const arg: BlockArgument = {
      kind: 'block-argument',
      index: numbering.nextValueIndex(),
      type,
      owner: this,
      argNumber: this.arguments.length,
    };
    this.arguments.push(arg);
    return arg;
  }

  append(op: Operation): Operation {
    if (op.parentBlock) {
      throw new Error(`operation '${op.name}' is already in a block`);
    }
    op.parentBlock = this;
    this.operations.push(op);
    return op;
  }

  /**
   * Detach every operation after the first `length`
   */
  truncate(length: number): void {
    for (const op of this.operations.splice(length)) {
      op.parentBlock = null;
    }
  }

  /**
   * Last operation if it is a terminator
   */
  get terminator(): Operation | undefined {
    const last = this.operations[this.operations.length - 1];
    return last?.hasTrait('terminator') ? last : undefined;
  }
}

export class Region {
  readonly blocks: Block[] = [];
  parentOp: Operation | null = null;

  addBlock(block: Block = new Block()): Block {
    block.parentRegion = this;
    this.blocks.push(block);
    return block;
  }

  get empty(): boolean {
    return this.blocks.length === 0;
  }
}

// ============================================================================
// Functions and Modules
// ============================================================================

export const FUNC_OP_NAME = 'func.func';

export interface FunctionOptions {
  /** A declaration has no body */
  readonly declaration?: boolean;
  readonly loc?: SourceLocation;
}

/**
 * A function: one body region whose entry block arguments are the
 * parameters. The function numbers every value defined in its body.
 */
export class FunctionOp extends Operation implements ValueNumbering {
  readonly body: Region;
  private valueCount = 0;

  constructor(symName: string, argTypes: readonly IRType[], options: FunctionOptions = {}) {
    const body = new Region();
    super({
      name: FUNC_OP_NAME,
      regions: [body],
      attributes: { sym_name: symName },
      loc: options.loc,
    });
    this.body = body;

    if (!options.declaration) {
      const entry = body.addBlock();
      for (const type of argTypes) {
        entry.addArgument(type, this);
      }
    }
  }

  get symName(): string {
    return String(this.getAttribute('sym_name'));
  }

  get entryBlock(): Block | undefined {
    return this.body.blocks[0];
  }

  get arguments(): readonly BlockArgument[] {
    return this.entryBlock?.arguments ?? [];
  }

  get isDeclaration(): boolean {
    return this.body.empty;
  }

  /** Number of values numbered so far */
  get numValues(): number {
    return this.valueCount;
  }

  nextValueIndex(): number {
    return this.valueCount++;
  }
}

export class IRModule {
  readonly functions: FunctionOp[] = [];

  add(func: FunctionOp): FunctionOp {
    this.functions.push(func);
    return func;
  }

  lookup(symName: string): FunctionOp | undefined {
    return this.functions.find(f => f.symName === symName);
  }
}
