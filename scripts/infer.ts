#!/usr/bin/env npx tsx
/**
 * CLI script to run constraint generation on the functions of a file
 * Usage: npx tsx scripts/infer.ts <file.js|file.ts> [options]
 */

import { readFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { parse } from '../src/parser/index.js';
import { lowerProgram } from '../src/frontend/index.js';
import { printModule } from '../src/ir/index.js';
import { ConsoleSink, formatLocation } from '../src/diagnostics/index.js';
import { runModuleTypeInference } from '../src/inference/index.js';
import { formatJSON, formatReport } from '../src/output/index.js';

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.log('Usage: npx tsx scripts/infer.ts <file.js|file.ts> [options]');
    console.log('');
    console.log('Options:');
    console.log('  --format=report   Human-readable report (default)');
    console.log('  --format=json     Constraint problems as JSON');
    console.log('  --print-ir        Print the lowered IR before analyzing it');
    console.log('  --typescript      Parse as TypeScript (default for .ts files)');
    console.log('  --verbose         Show constraint traces on stderr');
    console.log('  --quiet           Hide remarks');
    process.exit(1);
  }

  // Parse arguments
  let filePath = '';
  let format = 'report';
  let printIR = false;
  let typescript: boolean | undefined;
  let verbose = false;
  let quiet = false;

  for (const arg of args) {
    if (arg.startsWith('--format=')) {
      format = arg.slice('--format='.length);
    } else if (arg === '--print-ir') {
      printIR = true;
    } else if (arg === '--typescript') {
      typescript = true;
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '--quiet') {
      quiet = true;
    } else if (!arg.startsWith('-')) {
      filePath = arg;
    }
  }

  if (!filePath) {
    console.error('Error: No file path provided');
    process.exit(1);
  }
  if (format !== 'report' && format !== 'json') {
    console.error(`Error: Unknown format '${format}'`);
    process.exit(1);
  }

  // Resolve and read file
  const absolutePath = resolve(process.cwd(), filePath);
  let source: string;

  try {
    source = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    console.error(`Error: Could not read file '${absolutePath}': ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  // Parse the source
  const { ast, errors: parseErrors } = parse(source, {
    filename: filePath,
    typescript: typescript ?? ['.ts', '.mts', '.cts'].includes(extname(filePath)),
  });

  if (parseErrors.length > 0) {
    console.error('Parse errors:');
    for (const err of parseErrors) {
      console.error(`  ${filePath}:${err.line}:${err.column}: ${err.message}`);
    }
    process.exit(1);
  }

  // Lower to IR
  const { module, errors: lowerErrors } = lowerProgram(ast, filePath);
  for (const err of lowerErrors) {
    console.error(`${formatLocation(err.loc)}: error: ${err.message}`);
  }

  if (printIR) {
    console.log(printModule(module));
    console.log('');
  }

  // Generate constraints
  const results = runModuleTypeInference(module, new ConsoleSink({ verbose, quiet }));

  if (format === 'json') {
    console.log(formatJSON(results));
  } else {
    console.log(formatReport(results, { filename: filePath }));
  }

  const failed = results.filter(r => !r.success).length;
  if (lowerErrors.length > 0 || failed > 0) {
    process.exit(1);
  }
}

main();
