import type { Token, UnitValue } from './types.js';
import type { UnitRegistry } from './registry.js';
import { unknownUnit, unrecognizedToken } from './errors.js';
import { isOperator } from './utils.js';

// number | letters | operator or paren | anything else (reported as unrecognized)
const TOKEN_PATTERN = /(\d+(?:\.\d+)?)|([a-z]+)|([-+*/()])|([^\s\da-z+*/()-]+)/g;

type RawToken =
  | { kind: 'number'; text: string }
  | { kind: 'word'; text: string }
  | { kind: 'symbol'; text: string };

/**
 * Lowercases, pads operators and parentheses with spaces and collapses whitespace
 */
export const normalizeExpression = (input: string): string => {
  return input
    .toLowerCase()
    .replace(/[-+*/()]/g, (symbol) => ` ${symbol} `)
    .replace(/\s+/g, ' ')
    .trim();
}

const scan = (text: string): RawToken[] => {
  const raw: RawToken[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const [whole, number, word, symbol] = match;
    if (number !== undefined) {
      raw.push({ kind: 'number', text: number });
    } else if (word !== undefined) {
      raw.push({ kind: 'word', text: word });
    } else if (symbol !== undefined) {
      raw.push({ kind: 'symbol', text: symbol });
    } else {
      throw unrecognizedToken(whole);
    }
  }
  return raw;
}

const toBaseValue = (value: number, key: string, registry: UnitRegistry): UnitValue => {
  const unit = registry.lookup(key);
  if (!unit) {
    throw unknownUnit(key);
  }
  return { value: value * unit.multiplier, baseType: unit.base, unitKey: key };
}

/**
 * Turns an expression into values, operators and parentheses.
 * A number directly followed by a known unit key becomes one value; a bare unit key means one of that unit.
 * @throws CalcError (UnrecognizedToken, UnknownUnit)
 */
export const tokenize = (input: string, registry: UnitRegistry): Token[] => {
  const raw = scan(normalizeExpression(input));
  const tokens: Token[] = [];

  for (let i = 0; i < raw.length; i++) {
    const current = raw[i];
    const next = raw[i + 1];

    switch (current.kind) {
      case 'number': {
        const parsed = Number.parseFloat(current.text);
        if (!Number.isFinite(parsed)) {
          throw unrecognizedToken(current.text);
        }
        if (next?.kind === 'word' && registry.has(next.text)) {
          tokens.push({ type: 'value', value: toBaseValue(parsed, next.text, registry) });
          i++; // unit consumed
        } else {
          tokens.push({ type: 'value', value: { value: parsed, baseType: 'unit' } });
        }
        break;
      }
      case 'word':
        tokens.push({ type: 'value', value: toBaseValue(1, current.text, registry) });
        break;
      case 'symbol':
        if (current.text === '(') {
          tokens.push({ type: 'leftParen' });
        } else if (current.text === ')') {
          tokens.push({ type: 'rightParen' });
        } else if (isOperator(current.text)) {
          tokens.push({ type: 'operator', op: current.text });
        } else {
          throw unrecognizedToken(current.text);
        }
        break;
    }
  }

  return tokens;
}
