/**
 * Type Variable Management - creation of type variables with unique IDs
 * and readable names
 */

import type { Value } from '../ir/index.js';
import type { TypeVar } from './types.js';

/** Greek letters for naming type variables */
const GREEK = [
  'α', 'β', 'γ', 'δ', 'ε', 'ζ', 'η', 'θ',
  'ι', 'κ', 'λ', 'μ', 'ν', 'ξ', 'ο', 'π',
  'ρ', 'σ', 'τ', 'υ', 'φ', 'χ', 'ψ', 'ω',
] as const;

const SUBSCRIPTS = '₀₁₂₃₄₅₆₇₈₉';

/**
 * Convert a number to Unicode subscript characters
 */
function toSubscript(n: number): string {
  return n.toString().split('').map(d => SUBSCRIPTS.charAt(Number(d))).join('');
}

/**
 * Name for the id-th type variable: α ... ω, then α₁ ... ω₁, and so on
 */
export function typeVarName(id: number): string {
  const letter = GREEK[id % GREEK.length] ?? 'τ';
  const round = Math.floor(id / GREEK.length);
  return round === 0 ? letter : `${letter}${toSubscript(round)}`;
}

/**
 * Hands out type variables with ids unique to one manager
 */
export class TypeVarManager {
  private counter = 0;

  fresh(anchor: Value): TypeVar {
    const id = this.counter++;
    return {
      kind: 'typevar',
      id,
      name: typeVarName(id),
      anchor,
    };
  }

  /** Number of variables created so far */
  getCount(): number {
    return this.counter;
  }
}
