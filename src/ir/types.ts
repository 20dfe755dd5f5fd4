/**
 * IR types
 *
 * Every value in the IR carries one of these types. The `unknown` type is
 * the marker for values whose type is only known at run time; everything
 * else is a concrete type.
 *
 * Types are interned: asking the factory twice for the same type returns
 * the same object, so identity comparison is type equality.
 */

export type IRType =
  | UnknownType
  | IntegerType
  | FloatType
  | BoolType
  | NoneType
  | StrType
  | BytesType
  ;

export interface UnknownType {
  readonly kind: 'unknown';
}

export interface IntegerType {
  readonly kind: 'integer';
  /** Bit width (1 for the condition type of selects and branches) */
  readonly width: number;
}

export interface FloatType {
  readonly kind: 'float';
  readonly width: number;
}

export interface BoolType {
  readonly kind: 'bool';
}

export interface NoneType {
  readonly kind: 'none';
}

export interface StrType {
  readonly kind: 'str';
}

export interface BytesType {
  readonly kind: 'bytes';
}

const unknownSingleton: UnknownType = { kind: 'unknown' };
const boolSingleton: BoolType = { kind: 'bool' };
const noneSingleton: NoneType = { kind: 'none' };
const strSingleton: StrType = { kind: 'str' };
const bytesSingleton: BytesType = { kind: 'bytes' };

const integerTypes = new Map<number, IntegerType>();
const floatTypes = new Map<number, FloatType>();

function integer(width: number): IntegerType {
  let type = integerTypes.get(width);
  if (!type) {
    type = { kind: 'integer', width };
    integerTypes.set(width, type);
  }
  return type;
}

function float(width: number): FloatType {
  let type = floatTypes.get(width);
  if (!type) {
    type = { kind: 'float', width };
    floatTypes.set(width, type);
  }
  return type;
}

/**
 * Interned type factory
 */
export const IRTypes = {
  unknown: unknownSingleton,
  bool: boolSingleton,
  none: noneSingleton,
  str: strSingleton,
  bytes: bytesSingleton,
  i1: integer(1),
  i64: integer(64),
  f64: float(64),
  integer,
  float,
} as const;

export function isUnknownType(type: IRType): type is UnknownType {
  return type.kind === 'unknown';
}

export function typeToString(type: IRType): string {
  switch (type.kind) {
    case 'unknown':
      return '!dyn.unknown';
    case 'integer':
      return `i${type.width}`;
    case 'float':
      return `f${type.width}`;
    case 'bool':
      return '!dyn.bool';
    case 'none':
      return '!dyn.none';
    case 'str':
      return '!dyn.str';
    case 'bytes':
      return '!dyn.bytes';
  }
}
