/**
 * IR module exports
 */

export type {
  IRType,
  UnknownType,
  IntegerType,
  FloatType,
  BoolType,
  NoneType,
  StrType,
  BytesType,
} from './types.js';
export { IRTypes, isUnknownType, typeToString } from './types.js';

export type {
  SourceLocation,
  OpTrait,
  Attribute,
  BlockArgument,
  OpResult,
  Value,
  ValueNumbering,
  WalkResult,
  WalkOutcome,
  OperationState,
  FunctionOptions,
} from './operation.js';
export {
  Operation,
  Block,
  Region,
  FunctionOp,
  IRModule,
  FUNC_OP_NAME,
} from './operation.js';

export { Ops, defaultTraits } from './ops.js';
export type { BinaryOperator, ComparePredicate } from './ops.js';

export { IRBuilder, singleResult } from './builder.js';

export { valueName, operationHead, printOperation, printModule } from './printer.js';
