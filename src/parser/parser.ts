/**
 * JavaScript/TypeScript parser wrapper
 *
 * Uses @babel/parser to parse source code into an AST
 */

import { parse as babelParse, type ParserOptions, type ParserPlugin } from '@babel/parser';
import * as t from '@babel/types';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
  /** Enable TypeScript syntax (type annotations, `as` casts, `declare function`) */
  typescript?: boolean;
  /** Source type */
  sourceType?: 'script' | 'module' | 'unambiguous';
}

export interface ParseResult {
  /** The parsed AST, an empty program when parsing failed */
  ast: t.File;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

/**
 * Line and column carried by a @babel/parser SyntaxError
 */
function errorPosition(error: unknown): { line: number; column: number } {
  if (typeof error === 'object' && error !== null && 'loc' in error) {
    const loc = error.loc;
    if (typeof loc === 'object' && loc !== null && 'line' in loc && 'column' in loc) {
      return {
        line: typeof loc.line === 'number' ? loc.line : 0,
        column: typeof loc.column === 'number' ? loc.column : 0,
      };
    }
  }
  return { line: 0, column: 0 };
}

/**
 * Parse source code into an AST
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const plugins: ParserPlugin[] = [
    'bigInt',
    'logicalAssignment',
    'nullishCoalescingOperator',
    'numericSeparator',
    'optionalChaining',
  ];

  // Add TypeScript if requested
  if (options.typescript) {
    plugins.push('typescript');
  }

  const parserOptions: ParserOptions = {
    sourceType: options.sourceType ?? 'unambiguous',
    sourceFilename: options.filename,
    plugins,
  };

  try {
    const ast = babelParse(source, parserOptions);
    return { ast, errors: [] };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return {
        ast: t.file(t.program([])),
        errors: [{ message: error.message, ...errorPosition(error) }],
      };
    }
    throw error;
  }
}
