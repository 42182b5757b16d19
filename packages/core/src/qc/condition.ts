/**
 * `$if` / `$elif` expression evaluation.
 *
 * Grammar (no parentheses):
 *   expr    := and ( '||' and )*
 *   and     := term ( '&&' term )*
 *   term    := operand [ cmp operand ]
 *   cmp     := '==' | '!=' | '>' | '<' | '>=' | '<='
 *   operand := "quoted literal" | bare token
 *
 * Quoted literals are variable-substituted. A bare token is looked up as a
 * variable, then read as a numeric literal. An operand that cannot be
 * resolved makes its comparison false.
 */

import type { VariableEnvironment } from './variable-environment.js';

export type ComparisonOperator = '==' | '!=' | '>' | '<' | '>=' | '<=';

type ConditionToken =
  | { kind: 'quoted'; text: string }
  | { kind: 'bare'; text: string }
  | { kind: 'compare'; operator: ComparisonOperator }
  | { kind: 'and' }
  | { kind: 'or' };

export interface ConditionResult {
  value: boolean;
  /** Set when the expression is malformed; `value` is then false. */
  error?: string;
}

const OPERATORS: readonly (ComparisonOperator | '&&' | '||')[] = [
  '==', '!=', '>=', '<=', '&&', '||', '>', '<',
];

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/** Truthiness of a resolved value: empty, "0" and "false" are false. */
export function isTruthy(value: string | undefined): boolean {
  if (value === undefined) return false;
  const trimmed = value.trim();
  return trimmed !== '' && trimmed !== '0' && trimmed.toLowerCase() !== 'false';
}

function tokenize(expression: string): ConditionToken[] {
  const tokens: ConditionToken[] = [];
  let i = 0;

  while (i < expression.length) {
    const ch = expression[i]!;
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '"') {
      const end = expression.indexOf('"', i + 1);
      const stop = end === -1 ? expression.length : end;
      tokens.push({ kind: 'quoted', text: expression.slice(i + 1, stop) });
      i = stop + 1;
      continue;
    }

    const operator = OPERATORS.find((op) => expression.startsWith(op, i));
    if (operator) {
      if (operator === '&&') tokens.push({ kind: 'and' });
      else if (operator === '||') tokens.push({ kind: 'or' });
      else tokens.push({ kind: 'compare', operator });
      i += operator.length;
      continue;
    }

    let end = i;
    while (
      end < expression.length
      && !/\s/.test(expression[end]!)
      && expression[end] !== '"'
      && !OPERATORS.some((op) => expression.startsWith(op, end))
    ) {
      end++;
    }
    tokens.push({ kind: 'bare', text: expression.slice(i, end) });
    i = end;
  }

  return tokens;
}

function resolveOperand(
  token: ConditionToken,
  variables: VariableEnvironment,
): string | undefined {
  if (token.kind === 'quoted') {
    const substituted = variables.substitute(token.text);
    return substituted.ok ? substituted.text : undefined;
  }
  if (token.kind !== 'bare') return undefined;

  // `$name$` written without quotes
  const reference = /^\$([A-Za-z_][A-Za-z0-9_]*)\$$/.exec(token.text);
  if (reference) return variables.lookup(reference[1]!);

  const value = variables.lookup(token.text);
  if (value !== undefined) return value;
  return parseNumber(token.text) !== null ? token.text : undefined;
}

function compare(left: string, operator: ComparisonOperator, right: string): boolean {
  const leftNumber = parseNumber(left);
  const rightNumber = parseNumber(right);
  if (leftNumber !== null && rightNumber !== null) {
    switch (operator) {
      case '==': return leftNumber === rightNumber;
      case '!=': return leftNumber !== rightNumber;
      case '>': return leftNumber > rightNumber;
      case '<': return leftNumber < rightNumber;
      case '>=': return leftNumber >= rightNumber;
      case '<=': return leftNumber <= rightNumber;
    }
  }
  if (operator === '==') return left === right;
  if (operator === '!=') return left !== right;
  return false;
}

function evaluateTerm(
  term: ConditionToken[],
  variables: VariableEnvironment,
): boolean | string {
  if (term.length === 1) {
    const [operand] = term;
    if (!operand || (operand.kind !== 'quoted' && operand.kind !== 'bare')) {
      return 'expected an operand';
    }
    return isTruthy(resolveOperand(operand, variables));
  }

  if (term.length === 3) {
    const [left, op, right] = term;
    if (!left || !op || !right || op.kind !== 'compare') {
      return 'expected a comparison';
    }
    const leftValue = resolveOperand(left, variables);
    const rightValue = resolveOperand(right, variables);
    if (leftValue === undefined || rightValue === undefined) return false;
    return compare(leftValue, op.operator, rightValue);
  }

  return term.length === 0 ? 'empty condition' : 'expected a comparison';
}

/**
 * Evaluate an OR of AND groups, left to right. Every term is checked for
 * syntax even after the outcome is known.
 */
export function evaluateCondition(
  expression: string,
  variables: VariableEnvironment,
): ConditionResult {
  const groups: ConditionToken[][][] = [[[]]];
  for (const token of tokenize(expression)) {
    const group = groups[groups.length - 1]!;
    if (token.kind === 'or') {
      groups.push([[]]);
    } else if (token.kind === 'and') {
      group.push([]);
    } else {
      group[group.length - 1]!.push(token);
    }
  }

  let value = false;
  for (const group of groups) {
    let groupValue = true;
    for (const term of group) {
      const termValue = evaluateTerm(term, variables);
      if (typeof termValue === 'string') {
        return { value: false, error: `${termValue} in "${expression.trim()}"` };
      }
      groupValue = groupValue && termValue;
    }
    value = value || groupValue;
  }
  return { value };
}
