import { normalizeExpression, tokenize } from '../src/tokenizer.js';
import { defaultRegistry } from '../src/registry.js';
import { CalcError } from '../src/errors.js';
import type { Token } from '../src/types.js';

const tokensOf = (input: string): Token[] => tokenize(input, defaultRegistry);

describe('Tokenizer', () => {
  describe('normalizeExpression', () => {
    it('should lowercase, pad symbols and collapse whitespace', () => {
      expect(normalizeExpression('  5GB+(2 mb)  ')).toBe('5gb + ( 2 mb )');
      expect(normalizeExpression('10-4')).toBe('10 - 4');
    });
  });

  describe('tokenize', () => {
    it('should merge a number with the unit that follows it', () => {
      expect(tokensOf('5 gb')).toEqual([
        { type: 'value', value: { value: 5368709120, baseType: 'byte', unitKey: 'gb' } },
      ]);
      expect(tokensOf('1.5KB')).toEqual([
        { type: 'value', value: { value: 1536, baseType: 'byte', unitKey: 'kb' } },
      ]);
    });

    it('should treat a bare number as a plain count', () => {
      expect(tokensOf('42')).toEqual([
        { type: 'value', value: { value: 42, baseType: 'unit' } },
      ]);
    });

    it('should treat a bare unit key as one of that unit', () => {
      expect(tokensOf('hour')).toEqual([
        { type: 'value', value: { value: 3600, baseType: 'second', unitKey: 'hour' } },
      ]);
    });

    it('should emit operators and parentheses as their own tokens', () => {
      expect(tokensOf('2*(3-1)').map(t => t.type)).toEqual([
        'value', 'operator', 'leftParen', 'value', 'operator', 'value', 'rightParen',
      ]);
      expect(tokensOf('1 / 2')[1]).toEqual({ type: 'operator', op: '/' });
    });

    it('should leave adjacent values for the evaluator to reject', () => {
      expect(tokensOf('5 gb 3')).toEqual([
        { type: 'value', value: { value: 5368709120, baseType: 'byte', unitKey: 'gb' } },
        { type: 'value', value: { value: 3, baseType: 'unit' } },
      ]);
    });

    it('should throw on unknown unit words', () => {
      expect(() => tokensOf('5 parsecs')).toThrow('Unknown unit: parsecs');
      expect(() => tokensOf('lightyear')).toThrow(CalcError);
      expect(() => tokensOf('lightyear')).toThrow(expect.objectContaining({ kind: 'UnknownUnit' }));
    });

    it('should throw on characters that are neither numbers, words nor operators', () => {
      expect(() => tokensOf('5 % 3')).toThrow('Unrecognized token: %');
      expect(() => tokensOf('5.gb')).toThrow('Unrecognized token: .');
    });

    it('should reject number literals too large to represent', () => {
      const huge = '9'.repeat(400);
      expect(() => tokensOf(`${huge} + 1`)).toThrow(`Unrecognized token: ${huge}`);
      expect(() => tokensOf(huge)).toThrow(expect.objectContaining({ kind: 'UnrecognizedToken' }));
    });
  });
});
