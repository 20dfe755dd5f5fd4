/**
 * Lowering - turns JavaScript/TypeScript function declarations into IR
 *
 * Every local is tracked as an SSA value; reassignment rebinds the name.
 * An `if` statement becomes a `ctl.if` whose results are the variables its
 * branches reassign or declare, each live branch yielding its own values
 * for them (`dyn.none` for a name that branch never declared).
 * A `return` inside a branch stays where it is, nested in the conditional.
 *
 * Values are dynamically typed (`!dyn.unknown`) unless a literal or a
 * TypeScript annotation says otherwise. Block scoping is not modelled:
 * a declaration inside a block rebinds the name for the rest of the
 * function.
 */

import * as t from '@babel/types';
import {
  IRBuilder,
  IRModule,
  IRTypes,
  singleResult,
  type BinaryOperator,
  type ComparePredicate,
  type FunctionOp,
  type IRType,
  type SourceLocation,
  type Value,
} from '../ir/index.js';

export class LoweringError extends Error {
  constructor(message: string, readonly loc: SourceLocation | undefined) {
    super(message);
    this.name = 'LoweringError';
  }
}

export interface LowerResult {
  module: IRModule;
  /** Statements that could not be lowered; the rest of their function still was */
  errors: LoweringError[];
}

type Env = Map<string, Value>;

const BINARY_OPERATORS: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
  ['+', 'Add'],
  ['-', 'Sub'],
  ['*', 'Mult'],
  ['/', 'Div'],
  ['%', 'Mod'],
  ['**', 'Pow'],
  ['<<', 'LShift'],
  ['>>', 'RShift'],
  ['|', 'BitOr'],
  ['^', 'BitXor'],
  ['&', 'BitAnd'],
]);

const COMPARE_PREDICATES: ReadonlyMap<string, ComparePredicate> = new Map<string, ComparePredicate>([
  ['==', 'Eq'],
  ['===', 'Eq'],
  ['!=', 'NotEq'],
  ['!==', 'NotEq'],
  ['<', 'Lt'],
  ['<=', 'LtE'],
  ['>', 'Gt'],
  ['>=', 'GtE'],
  ['in', 'In'],
]);

/**
 * IR type named by a TypeScript annotation; anything it cannot name is unknown
 */
export function typeFromAnnotation(node: t.TSType): IRType {
  switch (node.type) {
    case 'TSNumberKeyword':
      return IRTypes.f64;
    case 'TSStringKeyword':
      return IRTypes.str;
    case 'TSBooleanKeyword':
      return IRTypes.bool;
    case 'TSNullKeyword':
    case 'TSUndefinedKeyword':
    case 'TSVoidKeyword':
      return IRTypes.none;
    default:
      return IRTypes.unknown;
  }
}

/**
 * Whether a numeric literal is written as an integer that i64 holds exactly;
 * `1.0` and `1e3` are floats
 */
function isIntegerLiteral(node: t.NumericLiteral): boolean {
  if (!Number.isSafeInteger(node.value)) return false;
  const raw = node.extra?.raw;
  if (typeof raw !== 'string' || /^0[xob]/i.test(raw)) return true;
  return !/[.e]/i.test(raw);
}

function parameterType(param: t.Identifier): IRType {
  const annotation = param.typeAnnotation;
  return t.isTSTypeAnnotation(annotation) ? typeFromAnnotation(annotation.typeAnnotation) : IRTypes.unknown;
}

class FunctionLowering {
  private readonly builder = new IRBuilder();

  constructor(
    private readonly filename: string,
    private readonly errors: LoweringError[],
  ) {}

  lowerDeclaration(node: t.TSDeclareFunction): FunctionOp {
    const params = this.lowerParams(node.params);
    return this.builder.createFunction(node.id?.name ?? 'anonymous', params.map(p => p.type), {
      declaration: true,
      loc: this.location(node),
    });
  }

  lowerFunction(node: t.FunctionDeclaration): FunctionOp {
    const params = this.lowerParams(node.params);
    const func = this.builder.createFunction(node.id?.name ?? 'anonymous', params.map(p => p.type), {
      loc: this.location(node),
    });

    if (node.async || node.generator) {
      this.errors.push(new LoweringError('async and generator functions are lowered as plain functions', this.location(node)));
    }

    const env: Env = new Map();
    func.arguments.forEach((arg, i) => {
      const param = params[i];
      if (param) env.set(param.name, arg);
    });

    if (!this.lowerStatements(node.body.body, env)) {
      this.at(node.body).ret([]);
    }
    return func;
  }

  private lowerParams(params: readonly t.Node[]): { name: string; type: IRType }[] {
    const lowered: { name: string; type: IRType }[] = [];
    for (const param of params) {
      if (t.isIdentifier(param)) {
        lowered.push({ name: param.name, type: parameterType(param) });
      } else {
        this.errors.push(new LoweringError(`unsupported parameter '${param.type}'`, this.location(param)));
      }
    }
    return lowered;
  }

  // ===========================================================================
  // Statements
  // ===========================================================================

  /**
   * @returns whether control cannot fall off the end of the statements
   */
  private lowerStatements(statements: readonly t.Statement[], env: Env): boolean {
    for (const stmt of statements) {
      const block = this.builder.insertionBlock;
      const mark = block?.operations.length ?? 0;
      const bindings = new Map(env);
      try {
        if (this.lowerStatement(stmt, env)) return true;
      } catch (error) {
        if (!(error instanceof LoweringError)) throw error;
        this.errors.push(error);
        // A rejected statement leaves neither operations nor bindings behind
        block?.truncate(mark);
        env.clear();
        bindings.forEach((value, name) => env.set(name, value));
      }
    }
    return false;
  }

  private lowerStatement(stmt: t.Statement, env: Env): boolean {
    switch (stmt.type) {
      case 'VariableDeclaration':
        for (const decl of stmt.declarations) {
          if (!t.isIdentifier(decl.id)) {
            throw new LoweringError(`unsupported binding pattern '${decl.id.type}'`, this.location(decl));
          }
          const value = decl.init ? this.lowerExpression(decl.init, env) : this.at(decl).none();
          env.set(decl.id.name, value);
        }
        return false;

      case 'ExpressionStatement':
        this.lowerExpression(stmt.expression, env);
        return false;

      case 'ReturnStatement': {
        const values = stmt.argument ? [this.lowerExpression(stmt.argument, env)] : [];
        this.at(stmt).ret(values);
        return true;
      }

      case 'IfStatement':
        return this.lowerIf(stmt, env);

      case 'BlockStatement':
        return this.lowerStatements(stmt.body, env);

      case 'EmptyStatement':
        return false;

      default:
        throw new LoweringError(`unsupported statement '${stmt.type}'`, this.location(stmt));
    }
  }

  private lowerIf(stmt: t.IfStatement, env: Env): boolean {
    const test = this.lowerExpression(stmt.test, env);
    const condition = this.at(stmt).toBoolean(test);

    const thenBlock = this.builder.createBlock();
    const thenEnv: Env = new Map(env);
    const thenReturns = this.builder.withInsertionPoint(thenBlock, () =>
      this.lowerStatements([stmt.consequent], thenEnv));

    const elseBlock = this.builder.createBlock();
    const elseEnv: Env = new Map(env);
    const alternate = stmt.alternate;
    const elseReturns = alternate
      ? this.builder.withInsertionPoint(elseBlock, () => this.lowerStatements([alternate], elseEnv))
      : false;

    const live = [
      { block: thenBlock, env: thenEnv, returns: thenReturns },
      { block: elseBlock, env: elseEnv, returns: elseReturns },
    ].filter(branch => !branch.returns);

    // Names rebound or first declared in a live branch
    const bound = new Set(live.flatMap(branch => Array.from(branch.env.keys())));
    const merged = Array.from(bound)
      .filter(name => live.some(branch => branch.env.get(name) !== env.get(name)));

    for (const branch of live) {
      this.builder.withInsertionPoint(branch.block, () => {
        // A name the branch never declared is none on that path
        const values = merged.map(name => branch.env.get(name) ?? this.at(stmt).none());
        return this.at(stmt).yield(values);
      });
    }

    const ifOp = this.at(stmt).if(condition, merged.map(() => IRTypes.unknown), thenBlock, elseBlock);
    ifOp.results.forEach((result, i) => {
      const name = merged[i];
      if (name !== undefined) env.set(name, result);
    });

    return live.length === 0;
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  private lowerExpression(expr: t.Expression, env: Env): Value {
    switch (expr.type) {
      case 'NumericLiteral':
        return this.at(expr).constant(expr.value, isIntegerLiteral(expr) ? IRTypes.i64 : IRTypes.f64);

      case 'StringLiteral':
        return this.at(expr).constant(expr.value, IRTypes.str);

      case 'BooleanLiteral':
        return this.at(expr).constant(expr.value, IRTypes.bool);

      case 'NullLiteral':
        return this.at(expr).none();

      case 'Identifier':
        if (expr.name === 'undefined' && !env.has(expr.name)) {
          return this.at(expr).none();
        }
        return this.lookup(env, expr.name, expr);

      case 'ParenthesizedExpression':
        return this.lowerExpression(expr.expression, env);

      case 'BinaryExpression':
        return this.lowerBinary(expr, env);

      case 'LogicalExpression': {
        if (expr.operator === '??') {
          throw new LoweringError(`unsupported operator '${expr.operator}'`, this.location(expr));
        }
        const left = this.lowerExpression(expr.left, env);
        const right = this.lowerExpression(expr.right, env);
        const condition = this.at(expr).toBoolean(left);
        return expr.operator === '||'
          ? this.at(expr).select(condition, left, right)
          : this.at(expr).select(condition, right, left);
      }

      case 'ConditionalExpression': {
        const test = this.lowerExpression(expr.test, env);
        const condition = this.at(expr).toBoolean(test);
        const consequent = this.lowerExpression(expr.consequent, env);
        const alternate = this.lowerExpression(expr.alternate, env);
        return this.at(expr).select(condition, consequent, alternate);
      }

      case 'UnaryExpression': {
        const operand = this.lowerExpression(expr.argument, env);
        if (expr.operator === '!') {
          return this.at(expr).not(this.at(expr).toBoolean(operand));
        }
        if (expr.operator === '-' || expr.operator === '+' || expr.operator === '~') {
          return this.at(expr).unaryExpr(expr.operator, operand);
        }
        throw new LoweringError(`unsupported operator '${expr.operator}'`, this.location(expr));
      }

      case 'AssignmentExpression':
        return this.lowerAssignment(expr, env);

      case 'CallExpression': {
        if (!t.isIdentifier(expr.callee)) {
          throw new LoweringError('only calls to named functions are supported', this.location(expr));
        }
        const args = expr.arguments.map((arg) => {
          if (!t.isExpression(arg)) {
            throw new LoweringError(`unsupported argument '${arg.type}'`, this.location(arg));
          }
          return this.lowerExpression(arg, env);
        });
        return singleResult(this.at(expr).call(expr.callee.name, args));
      }

      case 'TSAsExpression': {
        const value = this.lowerExpression(expr.expression, env);
        const type = typeFromAnnotation(expr.typeAnnotation);
        return type === IRTypes.unknown ? value : this.at(expr).unknownCast(value, type);
      }

      default:
        throw new LoweringError(`unsupported expression '${expr.type}'`, this.location(expr));
    }
  }

  private lowerBinary(expr: t.BinaryExpression, env: Env): Value {
    if (!t.isExpression(expr.left)) {
      throw new LoweringError('private names are not supported', this.location(expr));
    }
    const left = this.lowerExpression(expr.left, env);
    const right = this.lowerExpression(expr.right, env);

    const operator = BINARY_OPERATORS.get(expr.operator);
    if (operator) {
      return this.at(expr).binaryExpr(left, operator, right);
    }
    const predicate = COMPARE_PREDICATES.get(expr.operator);
    if (predicate) {
      return this.at(expr).binaryCompare(left, predicate, right);
    }
    throw new LoweringError(`unsupported operator '${expr.operator}'`, this.location(expr));
  }

  private lowerAssignment(expr: t.AssignmentExpression, env: Env): Value {
    if (!t.isIdentifier(expr.left)) {
      throw new LoweringError(`unsupported assignment target '${expr.left.type}'`, this.location(expr));
    }
    const name = expr.left.name;
    if (!env.has(name)) {
      throw new LoweringError(`assignment to undeclared variable '${name}'`, this.location(expr));
    }

    const right = this.lowerExpression(expr.right, env);
    let value = right;
    if (expr.operator !== '=') {
      const operator = BINARY_OPERATORS.get(expr.operator.slice(0, -1));
      if (!operator) {
        throw new LoweringError(`unsupported operator '${expr.operator}'`, this.location(expr));
      }
      value = this.at(expr).binaryExpr(this.lookup(env, name, expr), operator, right);
    }

    env.set(name, value);
    return value;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private lookup(env: Env, name: string, node: t.Node): Value {
    const value = env.get(name);
    if (!value) {
      throw new LoweringError(`undefined variable '${name}'`, this.location(node));
    }
    return value;
  }

  /** The builder, with `node`'s location attached to what it creates next */
  private at(node: t.Node): IRBuilder {
    this.builder.setLocation(this.location(node));
    return this.builder;
  }

  private location(node: t.Node): SourceLocation | undefined {
    if (!node.loc) return undefined;
    return {
      file: this.filename,
      line: node.loc.start.line,
      column: node.loc.start.column,
    };
  }
}

/**
 * Lower every top-level (possibly exported) function of a program.
 * Other top-level statements are not part of any function and are ignored.
 */
export function lowerProgram(ast: t.File, filename = 'unknown'): LowerResult {
  const module = new IRModule();
  const errors: LoweringError[] = [];
  const lowering = new FunctionLowering(filename, errors);

  for (const stmt of ast.program.body) {
    const decl = t.isExportNamedDeclaration(stmt) || t.isExportDefaultDeclaration(stmt)
      ? stmt.declaration
      : stmt;

    if (t.isFunctionDeclaration(decl)) {
      module.add(lowering.lowerFunction(decl));
    } else if (t.isTSDeclareFunction(decl)) {
      module.add(lowering.lowerDeclaration(decl));
    }
  }

  return { module, errors };
}
