/**
 * Diagnostics - remarks, warnings and errors attached to IR operations
 *
 * Analyses never print on their own; they report to a DiagnosticSink
 * handed to them by the caller.
 */

import { operationHead, type Operation, type SourceLocation } from '../ir/index.js';

export type DiagnosticSeverity = 'remark' | 'warning' | 'error';

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** The offending operation */
  readonly op: Operation;
}

export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
  /** Free-form debug output (constraint dumps and the like) */
  trace(message: string): void;
}

/**
 * Keeps everything it is given, in order
 */
export class CollectingSink implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];
  readonly traces: string[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  trace(message: string): void {
    this.traces.push(message);
  }

  ofSeverity(severity: DiagnosticSeverity): Diagnostic[] {
    return this.diagnostics.filter(d => d.severity === severity);
  }
}

export interface ConsoleSinkOptions {
  /** Also print traces */
  verbose?: boolean;
  /** Hide remarks */
  quiet?: boolean;
}

/**
 * Writes diagnostics (and, when verbose, traces) to stderr
 */
export class ConsoleSink implements DiagnosticSink {
  private readonly options: Required<ConsoleSinkOptions>;

  constructor(options: ConsoleSinkOptions = {}) {
    this.options = { verbose: false, quiet: false, ...options };
  }

  report(diagnostic: Diagnostic): void {
    if (this.options.quiet && diagnostic.severity === 'remark') return;
    console.error(formatDiagnostic(diagnostic));
  }

  trace(message: string): void {
    if (this.options.verbose) {
      console.error(message);
    }
  }
}

export function formatLocation(loc: SourceLocation | undefined): string {
  return loc ? `${loc.file}:${loc.line}:${loc.column}` : '<unknown>';
}

/**
 * e.g.
 * ```
 * test.js:3:2: warning: cannot run type inference on yield due to arity mismatch
 *   see: ctl.yield %4 : (!dyn.unknown) -> ()
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${formatLocation(diagnostic.op.loc)}: ${diagnostic.severity}: ${diagnostic.message}\n` +
    `  see: ${operationHead(diagnostic.op)}`;
}
