/**
 * Output formatters for constraint generation results
 *
 * Supports two output formats:
 * 1. Report (human-readable, per function)
 * 2. JSON (constraint problems for a solver)
 */

import { valueName } from '../ir/index.js';
import { formatConstraint, formatTypeTerm, formatTypeVarBinding } from '../cpa/index.js';
import { constraintProblemOf, type FunctionInferenceResult } from '../inference/index.js';

export interface FormatOptions {
  /** Indentation of JSON output */
  indent?: number;
  /** Source file named in the report header */
  filename?: string;
}

const DEFAULT_FORMAT_OPTIONS: Required<FormatOptions> = {
  indent: 2,
  filename: 'unknown',
};

const HEAVY_RULE = '═══════════════════════════════════════════════════════════════';
const LIGHT_RULE = '───────────────────────────────────────────────────────────────';

/**
 * Format results as a human-readable report
 */
export function formatReport(results: readonly FunctionInferenceResult[], options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const lines: string[] = [];

  lines.push(HEAVY_RULE);
  lines.push(`  Constraint Generation Report: ${opts.filename}`);
  lines.push(HEAVY_RULE);
  lines.push('');

  const totals = {
    failed: results.filter(r => !r.success).length,
    typeVars: results.reduce((sum, r) => sum + r.typeVars.size, 0),
    constraints: results.reduce((sum, r) => sum + r.constraints.size, 0),
  };

  lines.push('  Summary:');
  lines.push(`    Functions:   ${results.length}`);
  lines.push(`    Failed:      ${totals.failed}`);
  lines.push(`    Type vars:   ${totals.typeVars}`);
  lines.push(`    Constraints: ${totals.constraints}`);
  lines.push('');

  for (const result of results) {
    lines.push(LIGHT_RULE);
    lines.push(`  @${result.func.symName} (${result.success ? 'success' : 'failed'})`);
    lines.push(LIGHT_RULE);

    if (result.error) {
      lines.push(`    Error: ${result.error.message}`);
    }
    lines.push('    Type variables:');
    for (const typeVar of result.typeVars.typeVars) {
      lines.push(`      ${formatTypeVarBinding(typeVar)}`);
    }
    lines.push('    Constraints:');
    for (const constraint of result.constraints.constraints) {
      lines.push(`      ${formatConstraint(constraint)}`);
    }
    if (result.innerReturnLikeOps.length > 0) {
      lines.push(`    Inner returns: ${result.innerReturnLikeOps.length}`);
    }
    lines.push('');
  }

  lines.push(HEAVY_RULE);

  return lines.join('\n');
}

/**
 * Format results as JSON. Failed functions carry no constraint data.
 */
export function formatJSON(results: readonly FunctionInferenceResult[], options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };

  const functions = results.map((result) => {
    const problem = constraintProblemOf(result);
    if (!problem) {
      return {
        name: result.func.symName,
        status: 'failed',
        error: result.error?.message ?? null,
      };
    }
    return {
      name: problem.functionName,
      status: 'success',
      typeVars: problem.typeVars.map(typeVar => ({
        name: typeVar.name,
        value: valueName(typeVar.anchor),
      })),
      constraints: problem.constraints.map(constraint => ({
        super: formatTypeTerm(constraint.sup),
        sub: formatTypeTerm(constraint.sub),
        op: constraint.contextOp.name,
      })),
      innerReturns: result.innerReturnLikeOps.length,
    };
  });

  return JSON.stringify({ functions }, null, opts.indent);
}
