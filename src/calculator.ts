import type { CalculationResult, EvaluationOutcome, UnitValue } from './types.js';
import { defaultRegistry, type UnitRegistry } from './registry.js';
import { CalcError, emptyInput } from './errors.js';
import { tokenize } from './tokenizer.js';
import { toRpn } from './parser.js';
import { evaluateRpn } from './evaluator.js';
import { formatResult } from './formatter.js';

/**
 * Tokenizes, parses and evaluates an expression without formatting it
 * @throws CalcError for blank input and for the first failing stage
 */
export const computeValue = (input: string, registry: UnitRegistry = defaultRegistry): UnitValue => {
  if (!input.trim()) {
    throw emptyInput();
  }
  const tokens = tokenize(input, registry);
  const rpn = toRpn(tokens);
  return evaluateRpn(rpn);
}

/**
 * @throws CalcError
 */
export const calculate = (input: string, registry: UnitRegistry = defaultRegistry): CalculationResult => {
  return formatResult(computeValue(input, registry), registry);
}

/**
 * Same as calculate, but a calculation failure comes back as a value instead of being thrown.
 * Anything that is not a CalcError is a bug and still propagates.
 */
export const evaluate = (input: string, registry: UnitRegistry = defaultRegistry): EvaluationOutcome => {
  try {
    return { ok: true, result: calculate(input, registry) };
  } catch (error) {
    if (error instanceof CalcError) {
      return { ok: false, error: { kind: error.kind, message: error.message } };
    }
    throw error;
  }
}
