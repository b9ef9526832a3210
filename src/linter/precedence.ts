/**
 * Implicit precedence resolution.
 *
 * Where one nesting level mixes operators (`a OR b AND c`), the level is
 * regrouped by operator precedence and the groups are wrapped in artificial
 * parentheses (span `[-1, -1]`). Operators of equal precedence but different
 * kind group left to right. Levels using a single operator are left untouched.
 */

import { NO_SPAN, OperatorKind, Span, Token } from '../query/types.js';

export interface PrecedenceResult {
  tokens: Token[];
  /** One span per regrouped level, covering its operators */
  ambiguousLevels: Span[];
}

type Item = { kind: 'operand'; tokens: Token[] } | { kind: 'operator'; token: Token };

type Expression =
  | { kind: 'operand'; tokens: Token[] }
  | { kind: 'operator'; token: Token; key: string; left: Expression; right: Expression };

const ARTIFICIAL_OPEN: Token = { value: '(', kind: 'PAREN_OPEN', span: NO_SPAN };
const ARTIFICIAL_CLOSE: Token = { value: ')', kind: 'PAREN_CLOSE', span: NO_SPAN };

export function isOperatorToken(token: Token): boolean {
  return token.kind === 'LOGIC_OP' || token.kind === 'PROXIMITY_OP';
}

/** Operator kind of a LOGIC_OP or PROXIMITY_OP token */
export function operatorKindOf(token: Token): OperatorKind {
  const value = token.value.toUpperCase();
  if (value === 'AND' || value === 'OR' || value === 'NOT') {
    return value;
  }
  return 'NEAR';
}

/** Operators sharing a key may be merged into one node */
export function operatorKey(token: Token): string {
  return token.value.toUpperCase();
}

function findClosing(tokens: Token[], openIndex: number, end: number): number {
  let depth = 0;
  for (let i = openIndex; i < end; i++) {
    if (tokens[i].kind === 'PAREN_OPEN') {
      depth++;
    } else if (tokens[i].kind === 'PAREN_CLOSE') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return end - 1;
}

export function insertArtificialParentheses(
  tokens: Token[],
  precedence: Record<OperatorKind, number>
): PrecedenceResult {
  const ambiguousLevels: Span[] = [];

  const processLevel = (start: number, end: number): Token[] => {
    const items: Item[] = [];
    let run: Token[] = [];
    const flush = () => {
      if (run.length > 0) {
        items.push({ kind: 'operand', tokens: run });
        run = [];
      }
    };

    let i = start;
    while (i < end) {
      const token = tokens[i];
      if (token.kind === 'PAREN_OPEN') {
        const close = findClosing(tokens, i, end);
        run.push(token, ...processLevel(i + 1, close), tokens[close]);
        i = close + 1;
        continue;
      }
      if (isOperatorToken(token)) {
        flush();
        items.push({ kind: 'operator', token });
      } else {
        run.push(token);
      }
      i++;
    }
    flush();

    const operators = items.flatMap((item) => (item.kind === 'operator' ? [item.token] : []));
    const keys = new Set(operators.map(operatorKey));
    if (keys.size <= 1) {
      return items.flatMap((item) => (item.kind === 'operand' ? item.tokens : [item.token]));
    }

    ambiguousLevels.push([
      operators[0].span[0],
      operators[operators.length - 1].span[1],
    ]);

    let index = 0;
    const parseOperand = (): Expression => {
      const item = items[index];
      index++;
      return item && item.kind === 'operand' ? item : { kind: 'operand', tokens: [] };
    };
    const parseExpression = (minPrecedence: number): Expression => {
      let left = parseOperand();
      while (index < items.length) {
        const item = items[index];
        if (item.kind !== 'operator') {
          break;
        }
        const strength = precedence[operatorKindOf(item.token)];
        if (strength < minPrecedence) {
          break;
        }
        index++;
        const right = parseExpression(strength + 1);
        left = { kind: 'operator', token: item.token, key: operatorKey(item.token), left, right };
      }
      return left;
    };

    return emit(parseExpression(0), undefined);
  };

  return { tokens: processLevel(0, tokens.length), ambiguousLevels };
}

function emit(expression: Expression, parentKey: string | undefined): Token[] {
  if (expression.kind === 'operand') {
    return expression.tokens;
  }

  const inner = [
    ...emit(expression.left, expression.key),
    expression.token,
    ...emit(expression.right, expression.key),
  ];

  if (parentKey === undefined || parentKey === expression.key) {
    return inner;
  }
  return [ARTIFICIAL_OPEN, ...inner, ARTIFICIAL_CLOSE];
}
