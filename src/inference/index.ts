/**
 * Constraint generation for functions with dynamically typed values
 *
 * The system works in one pass:
 * 1. Resolve every entry block argument to a type term
 * 2. Walk the body in program order, applying one rule per operation
 * 3. Hand the collected type variables and constraints to a solver
 *
 * @module inference
 */

export { ValueResolver } from './resolver.js';
export { ConstraintEmitter } from './emitter.js';

export { classifyOperation } from './rules.js';
export type {
  OperationRule,
  SelectRule,
  ToBooleanRule,
  ConditionalRule,
  YieldRule,
  UnknownCastRule,
  BinaryExprRule,
  BinaryCompareRule,
  ConstantRule,
  FunctionReturnRule,
  InnerReturnRule,
  UnhandledRule,
} from './rules.js';

export { RuleDispatcher, Messages } from './dispatcher.js';

export { InitialConstraintGenerator } from './generator.js';
export type { GenerationResult } from './generator.js';

export {
  runFunctionTypeInference,
  runModuleTypeInference,
  constraintProblemOf,
} from './pass.js';
export type { FunctionInferenceResult, ConstraintProblem } from './pass.js';
