import type { Operator, Token } from './types.js';
import { mismatchedParentheses } from './errors.js';
import { PRECEDENCE } from './utils.js';

type StackEntry = { type: 'operator'; op: Operator } | { type: 'leftParen' };

/**
 * Shunting-yard: reorders infix tokens into postfix (RPN).
 * Operators of equal precedence associate to the left.
 * @throws CalcError (MismatchedParentheses) on a stray ")" or an unclosed "("
 */
export const toRpn = (tokens: Token[]): Token[] => {
  const output: Token[] = [];
  const operators: StackEntry[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'value':
        output.push(token);
        break;

      case 'leftParen':
        operators.push(token);
        break;

      case 'rightParen': {
        let top = operators.pop();
        while (top && top.type === 'operator') {
          output.push(top);
          top = operators.pop();
        }
        if (!top) {
          throw mismatchedParentheses();
        }
        break;
      }

      case 'operator': {
        let top = operators[operators.length - 1];
        while (top && top.type === 'operator' && PRECEDENCE[top.op] >= PRECEDENCE[token.op]) {
          output.push(top);
          operators.pop();
          top = operators[operators.length - 1];
        }
        operators.push(token);
        break;
      }
    }
  }

  while (operators.length) {
    const top = operators.pop();
    if (!top || top.type === 'leftParen') {
      throw mismatchedParentheses();
    }
    output.push(top);
  }

  return output;
}
