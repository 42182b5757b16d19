/**
 * Value evaluation for `$definevariable` / `$redefinevariable`.
 *
 * Arithmetic is parsed with jsep and evaluated over a small whitelist of
 * node types; anything else keeps its literal text.
 */

import jsep from 'jsep';

import type { VariableEnvironment } from './variable-environment.js';
import { parseNumber } from './condition.js';

type ExpressionNode = ReturnType<typeof jsep>;

function isNode(value: unknown): value is ExpressionNode {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

function evaluateNumeric(node: ExpressionNode, variables: VariableEnvironment): number | null {
  switch (node.type) {
    case 'Literal':
      return typeof node['value'] === 'number' ? node['value'] : null;

    case 'Identifier': {
      const name = node['name'];
      if (typeof name !== 'string') return null;
      const value = variables.lookup(name);
      return value === undefined ? null : parseNumber(value);
    }

    case 'UnaryExpression': {
      const argument = node['argument'];
      if (!isNode(argument)) return null;
      const value = evaluateNumeric(argument, variables);
      if (value === null) return null;
      if (node['operator'] === '-') return -value;
      if (node['operator'] === '+') return value;
      return null;
    }

    case 'BinaryExpression': {
      const left = node['left'];
      const right = node['right'];
      if (!isNode(left) || !isNode(right)) return null;
      const a = evaluateNumeric(left, variables);
      const b = evaluateNumeric(right, variables);
      if (a === null || b === null) return null;
      switch (node['operator']) {
        case '+': return a + b;
        case '-': return a - b;
        case '*': return a * b;
        case '/': return a / b;
        case '%': return a % b;
        default: return null;
      }
    }

    default:
      return null;
  }
}

export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toFixed(6)));
}

/**
 * Evaluate a variable value expression whose `$name$` references have
 * already been substituted.
 *
 * - `"text"` yields `text`
 * - arithmetic over numbers and numeric variables yields the computed number
 * - a lone literal or identifier, or anything non-numeric, yields the text as written
 */
export function evaluateValueExpression(text: string, variables: VariableEnvironment): string {
  const trimmed = text.trim();
  const quoted = /^"([^"]*)"$/.exec(trimmed);
  if (quoted) return quoted[1]!;
  if (trimmed === '') return '';

  let node: ExpressionNode;
  try {
    node = jsep(trimmed);
  } catch {
    // not an arithmetic expression
    return trimmed;
  }

  if (node.type !== 'BinaryExpression' && node.type !== 'UnaryExpression') return trimmed;
  const value = evaluateNumeric(node, variables);
  return value === null || !Number.isFinite(value) ? trimmed : formatNumber(value);
}
