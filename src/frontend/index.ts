/**
 * Front end exports - source functions to IR
 */

export { lowerProgram, typeFromAnnotation, LoweringError } from './lower.js';
export type { LowerResult } from './lower.js';
