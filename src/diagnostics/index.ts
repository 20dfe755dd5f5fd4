/**
 * Diagnostics module exports
 */

export { CollectingSink, ConsoleSink, formatDiagnostic, formatLocation } from './diagnostics.js';
export type {
  Diagnostic,
  DiagnosticSeverity,
  DiagnosticSink,
  ConsoleSinkOptions,
} from './diagnostics.js';
