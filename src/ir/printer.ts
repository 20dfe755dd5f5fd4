/**
 * IR Printer - textual form of functions and operations
 */

import {
  FunctionOp,
  type Attribute,
  type Block,
  type IRModule,
  type Operation,
  type Value,
} from './operation.js';
import { typeToString } from './types.js';

export function valueName(value: Value): string {
  return `%${value.index}`;
}

function formatAttribute(value: Attribute): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

function formatTypedValue(value: Value): string {
  return `${valueName(value)}: ${typeToString(value.type)}`;
}

/**
 * First line of an operation, without its regions
 *
 * e.g. `%2 = dyn.binary_expr %0, %1 {operator = "Add"} : (!dyn.unknown, i64) -> (!dyn.unknown)`
 */
export function operationHead(op: Operation): string {
  if (op instanceof FunctionOp) {
    return `${op.name} @${op.symName}(${op.arguments.map(formatTypedValue).join(', ')})`;
  }

  let text = '';
  if (op.numResults > 0) {
    text += `${op.results.map(valueName).join(', ')} = `;
  }
  text += op.name;
  if (op.numOperands > 0) {
    text += ` ${op.operands.map(valueName).join(', ')}`;
  }
  if (op.attributes.size > 0) {
    const attrs = Array.from(op.attributes.entries())
      .map(([name, value]) => `${name} = ${formatAttribute(value)}`)
      .join(', ');
    text += ` {${attrs}}`;
  }
  if (op.numOperands > 0 || op.numResults > 0) {
    const operandTypes = op.operands.map(v => typeToString(v.type)).join(', ');
    const resultTypes = op.results.map(v => typeToString(v.type)).join(', ');
    text += ` : (${operandTypes}) -> (${resultTypes})`;
  }
  return text;
}

/**
 * Full textual form of an operation, including nested regions
 */
export function printOperation(op: Operation, indent = 0): string {
  const pad = '  '.repeat(indent);
  const lines: string[] = [];

  op.regions.forEach((region, regionIndex) => {
    if (region.empty) return;
    lines.push(regionIndex === 0 || lines.length === 0
      ? `${pad}${operationHead(op)} {`
      : `${pad}} {`);
    region.blocks.forEach((block, blockIndex) => {
      if (block.arguments.length > 0 && !(op instanceof FunctionOp && blockIndex === 0)) {
        lines.push(`${pad}^bb${blockIndex}(${block.arguments.map(formatTypedValue).join(', ')}):`);
      }
      lines.push(...printBlockOperations(block, indent + 1));
    });
  });

  if (lines.length === 0) {
    return `${pad}${operationHead(op)}`;
  }
  lines.push(`${pad}}`);
  return lines.join('\n');
}

function printBlockOperations(block: Block, indent: number): string[] {
  return block.operations.map(op => printOperation(op, indent));
}

export function printModule(module: IRModule): string {
  return module.functions.map(f => printOperation(f)).join('\n\n');
}
