import { describe, expect, it } from 'vitest';
import { evaluateExpression, ExpressionError, parseExpression, usesAdvancedFunctions } from './arithmetic.js';

describe('evaluateExpression', () => {
  it('respects precedence and parentheses', () => {
    expect(evaluateExpression('2 + 3 * 4')).toBe(14);
    expect(evaluateExpression('(2 + 3) * 4')).toBe(20);
    expect(evaluateExpression('10 - 4 - 3')).toBe(3);
    expect(evaluateExpression('17 % 5')).toBe(2);
  });

  it('binds exponentiation tighter than unary minus and to the right', () => {
    expect(evaluateExpression('-2^2')).toBe(-4);
    expect(evaluateExpression('2^3^2')).toBe(512);
    expect(evaluateExpression('2 ** -1')).toBe(0.5);
  });

  it('supports functions and constants', () => {
    expect(evaluateExpression('sqrt(16) + abs(-3)')).toBe(7);
    expect(evaluateExpression('log(e)')).toBe(1);
    expect(evaluateExpression('cos(0) * pi')).toBe(Math.PI);
  });

  it('rejects division by zero', () => {
    expect(() => evaluateExpression('1 / 0')).toThrow('Division by zero is not allowed');
    expect(() => evaluateExpression('5 % (2 - 2)')).toThrow(ExpressionError);
  });

  it('rejects results that are not finite', () => {
    expect(() => evaluateExpression('sqrt(-1)')).toThrow('does not evaluate to a finite number');
  });

  it('rejects invalid input', () => {
    expect(() => parseExpression('')).toThrow('Expression is empty');
    expect(() => parseExpression('2 +')).toThrow('Unexpected end of expression');
    expect(() => parseExpression('(1 + 2')).toThrow('Expected ")" at position 6');
    expect(() => parseExpression('2 $ 3')).toThrow('Unexpected character "$" at position 2');
    expect(() => parseExpression('process(1)')).toThrow('Unknown identifier "process"');
    expect(() => parseExpression('constructor')).toThrow('Unknown identifier "constructor"');
    expect(() => parseExpression('sqrt 4')).toThrow('must be called with parentheses');
    expect(() => parseExpression('1 2')).toThrow('Unexpected token at position 2');
  });
});

describe('usesAdvancedFunctions', () => {
  it('detects function calls anywhere in the tree', () => {
    expect(usesAdvancedFunctions(parseExpression('1 + 2 * 3'))).toBe(false);
    expect(usesAdvancedFunctions(parseExpression('1 + -sin(0)'))).toBe(true);
  });
});
