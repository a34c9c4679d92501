import type { BaseType, Operator, Token, UnitValue } from './types.js';
import {
  dimensionMismatch,
  divisionByZero,
  mismatchedParentheses,
  missingOperand,
  tooManyOperands,
  unsupportedOperator,
} from './errors.js';

// Products and ratios of two quantities collapse to a plain number;
// composite dimensions (area, velocity) are not tracked.
const multiplyType = (left: BaseType, right: BaseType): BaseType => {
  if (left === 'unit') return right;
  if (right === 'unit') return left;
  return 'unit';
}

const divideType = (left: BaseType, right: BaseType): BaseType => {
  if (left === 'byte' && right === 'second') return 'dataRate';
  if (right === 'unit') return left;
  return 'unit';
}

/**
 * Applies one operator to its left (op1) and right (op2) operands
 * @throws CalcError (DimensionMismatch, DivisionByZero, UnsupportedOperator)
 */
export const applyOperator = (op: Operator, op1: UnitValue, op2: UnitValue): UnitValue => {
  switch (op) {
    case '+':
    case '-':
      if (op1.baseType !== op2.baseType) {
        throw dimensionMismatch(op, op1.baseType, op2.baseType);
      }
      return {
        value: op === '+' ? op1.value + op2.value : op1.value - op2.value,
        baseType: op1.baseType,
      };

    case '*':
      return { value: op1.value * op2.value, baseType: multiplyType(op1.baseType, op2.baseType) };

    case '/':
      if (op2.value === 0) {
        throw divisionByZero();
      }
      return { value: op1.value / op2.value, baseType: divideType(op1.baseType, op2.baseType) };

    default: {
      const unknown: never = op;
      throw unsupportedOperator(String(unknown));
    }
  }
}

/**
 * Runs an RPN sequence on a value stack
 * @returns the single value left on the stack
 * @throws CalcError (MissingOperand, TooManyOperands, and whatever applyOperator throws)
 */
export const evaluateRpn = (rpn: Token[]): UnitValue => {
  const stack: UnitValue[] = [];

  for (const token of rpn) {
    switch (token.type) {
      case 'value':
        stack.push(token.value);
        break;

      case 'operator': {
        const op2 = stack.pop();
        const op1 = stack.pop();
        if (!op1 || !op2) {
          throw missingOperand(token.op);
        }
        stack.push(applyOperator(token.op, op1, op2));
        break;
      }

      case 'leftParen':
      case 'rightParen':
        // toRpn never emits parentheses
        throw mismatchedParentheses();
    }
  }

  const [result] = stack;
  if (stack.length !== 1 || !result) {
    throw tooManyOperands();
  }
  return result;
}
