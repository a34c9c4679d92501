import type { BaseType, CalcErrorKind } from './types.js';

/**
 * Terminal failure of a single calculation. The message is what gets shown to the user.
 */
export class CalcError extends Error {
  constructor(public readonly kind: CalcErrorKind, message: string) {
    super(message);
    this.name = 'CalcError';
  }
}

export const emptyInput = (): CalcError =>
  new CalcError('EmptyInput', 'Input cannot be empty.');

export const unknownUnit = (key: string): CalcError =>
  new CalcError('UnknownUnit', `Unknown unit: ${key}`);

export const unrecognizedToken = (text: string): CalcError =>
  new CalcError('UnrecognizedToken', `Unrecognized token: ${text}`);

export const mismatchedParentheses = (): CalcError =>
  new CalcError('MismatchedParentheses', 'Mismatched parentheses.');

export const missingOperand = (op: string): CalcError =>
  new CalcError('MissingOperand', `Invalid expression structure (missing operand for operator ${op}).`);

export const dimensionMismatch = (op: string, left: BaseType, right: BaseType): CalcError =>
  new CalcError('DimensionMismatch', `Cannot perform ${op} between different unit types: ${left} and ${right}.`);

export const divisionByZero = (): CalcError =>
  new CalcError('DivisionByZero', 'Division by zero.');

export const unsupportedOperator = (op: string): CalcError =>
  new CalcError('UnsupportedOperator', `Unsupported operator: ${op}`);

export const tooManyOperands = (): CalcError =>
  new CalcError('TooManyOperands', 'Invalid expression structure (too many operands remaining).');
