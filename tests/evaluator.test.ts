import { applyOperator, evaluateRpn } from '../src/evaluator.js';
import { toRpn } from '../src/parser.js';
import { tokenize } from '../src/tokenizer.js';
import { defaultRegistry } from '../src/registry.js';
import type { Operator, Token, UnitValue } from '../src/types.js';

const run = (input: string): UnitValue => evaluateRpn(toRpn(tokenize(input, defaultRegistry)));

const bytes = (value: number): UnitValue => ({ value, baseType: 'byte' });
const seconds = (value: number): UnitValue => ({ value, baseType: 'second' });
const meters = (value: number): UnitValue => ({ value, baseType: 'meter' });
const count = (value: number): UnitValue => ({ value, baseType: 'unit' });

describe('Evaluator', () => {
  describe('applyOperator', () => {
    it('should add and subtract quantities of the same dimension', () => {
      expect(applyOperator('+', bytes(1024), bytes(1))).toEqual(bytes(1025));
      expect(applyOperator('-', seconds(60), seconds(90))).toEqual(seconds(-30));
    });

    it('should reject addition across dimensions', () => {
      expect(() => applyOperator('+', meters(5), seconds(3)))
        .toThrow('Cannot perform + between different unit types: meter and second.');
      expect(() => applyOperator('-', bytes(5), count(3)))
        .toThrow('Cannot perform - between different unit types: byte and unit.');
    });

    it('should keep the dimension when multiplying by a plain number', () => {
      expect(applyOperator('*', count(3), meters(2))).toEqual(meters(6));
      expect(applyOperator('*', meters(2), count(3))).toEqual(meters(6));
    });

    it('should collapse products of two quantities to a plain number', () => {
      expect(applyOperator('*', meters(2), meters(3))).toEqual(count(6));
      expect(applyOperator('*', bytes(2), seconds(3))).toEqual(count(6));
    });

    it('should produce a data rate only for bytes over seconds', () => {
      expect(applyOperator('/', bytes(3600), seconds(60))).toEqual({ value: 60, baseType: 'dataRate' });
      expect(applyOperator('/', seconds(60), bytes(3600)).baseType).toBe('unit');
    });

    it('should keep the dimension when dividing by a plain number', () => {
      expect(applyOperator('/', meters(10), count(4))).toEqual(meters(2.5));
    });

    it('should collapse other ratios to a plain number', () => {
      expect(applyOperator('/', meters(100), seconds(10))).toEqual(count(10));
      expect(applyOperator('/', bytes(2048), bytes(1024))).toEqual(count(2));
    });

    it('should reject division by zero', () => {
      expect(() => applyOperator('/', count(10), count(0))).toThrow('Division by zero.');
    });

    it('should report operators outside the known set', () => {
      const caret = '^' as unknown as Operator;
      expect(() => applyOperator(caret, count(2), count(3))).toThrow('Unsupported operator: ^');
    });
  });

  describe('evaluateRpn', () => {
    it('should evaluate with precedence and parentheses', () => {
      expect(run('2 + 3 * 4')).toEqual(count(14));
      expect(run('(2 + 3) * 4')).toEqual(count(20));
      expect(run('10 - 4 - 3')).toEqual(count(3));
      expect(run('100 / 10 / 5')).toEqual(count(2));
    });

    it('should evaluate mixed-unit arithmetic in base units', () => {
      expect(run('5 gb - 100 mb')).toEqual(bytes(5 * 1024 ** 3 - 100 * 1024 ** 2));
      expect(run('1 hour + 30 min')).toEqual(seconds(5400));
    });

    it('should throw when an operator lacks an operand', () => {
      expect(() => run('5 +')).toThrow('Invalid expression structure (missing operand for operator +).');
      expect(() => run('- 5')).toThrow('Invalid expression structure (missing operand for operator -).');
    });

    it('should throw when values are left over', () => {
      expect(() => run('5 5')).toThrow('Invalid expression structure (too many operands remaining).');
    });

    it('should throw when nothing is left to return', () => {
      expect(() => run('()')).toThrow('Invalid expression structure (too many operands remaining).');
    });

    it('should reject parentheses in postfix input', () => {
      const rpn: Token[] = [{ type: 'leftParen' }];
      expect(() => evaluateRpn(rpn)).toThrow('Mismatched parentheses.');
    });
  });
});
