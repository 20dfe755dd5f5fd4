/**
 * Output module exports
 */

export { formatReport, formatJSON } from './formatter.js';
export type { FormatOptions } from './formatter.js';
