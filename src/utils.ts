import type { Operator } from './types.js'

export const isObject = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
};

export const isOperator = (value: string): value is Operator => {
  return value === '+' || value === '-' || value === '*' || value === '/';
}

/**
 * Reads a positive integer from an environment value
 * @returns the parsed value, or fallback when the value is absent or malformed
 */
export const parsePositiveInt = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Accepts `{ expressions: [...] }` or a single `{ expression }` and returns the list of expressions
 * @returns null if the body is neither shape or holds a non-string entry
 */
export const normalizeToArray = (body: unknown): string[] | null => {
  if (!isObject(body)) {
    return null;
  }

  const { expressions, expression } = body;
  if (Array.isArray(expressions)) {
    const items: unknown[] = expressions;
    return items.every((item): item is string => typeof item === 'string') ? items : null;
  }

  if (typeof expression === 'string') {
    return [expression];
  }

  return null;
};

// constants
export const DATA_BASE = 1024;
export const TIME_BASE = 60;

export const PRECEDENCE: Record<Operator, number> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
};

// Periods a data rate is projected over, in seconds
export const PROJECTION_PERIODS: ReadonlyArray<readonly [string, number]> = [
  ['minute', TIME_BASE],
  ['hour', TIME_BASE * 60],
  ['day', TIME_BASE * 60 * 24],
  ['week', TIME_BASE * 60 * 24 * 7],
];

export const DEFAULT_PORT = 3000;
export const DEFAULT_MAX_EXPRESSION_LENGTH = 1000;
