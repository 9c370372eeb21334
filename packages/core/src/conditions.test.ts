import { describe, expect, it } from 'vitest';
import { parseCondition } from './conditions.js';
import { ConditionSyntaxError } from './errors.js';

describe('parseCondition', () => {
  it('parses a comparison with a bare word literal', () => {
    expect(parseCondition('decision == retry')).toEqual({ field: 'decision', operator: '==', value: 'retry' });
  });

  it('parses quoted strings, numbers and keywords', () => {
    expect(parseCondition("status != 'needs review'")).toEqual({
      field: 'status',
      operator: '!=',
      value: 'needs review',
    });
    expect(parseCondition('output.confidence >= 0.75')).toEqual({
      field: 'output.confidence',
      operator: '>=',
      value: 0.75,
    });
    expect(parseCondition('delta > -2')).toEqual({ field: 'delta', operator: '>', value: -2 });
    expect(parseCondition('context.flag == null')).toEqual({ field: 'context.flag', operator: '==', value: null });
    expect(parseCondition('done == false')).toEqual({ field: 'done', operator: '==', value: false });
  });

  it('treats a bare path as a truthiness check', () => {
    expect(parseCondition('valid')).toEqual({ field: 'valid', operator: '==', value: true });
  });

  it('binds and tighter than or', () => {
    expect(parseCondition('a == 1 or b == 2 and c == 3')).toEqual({
      logic: 'or',
      conditions: [
        { field: 'a', operator: '==', value: 1 },
        {
          logic: 'and',
          conditions: [
            { field: 'b', operator: '==', value: 2 },
            { field: 'c', operator: '==', value: 3 },
          ],
        },
      ],
    });
  });

  it('supports symbolic operators, negation and parentheses', () => {
    expect(parseCondition('!(valid && score > 5) || retry')).toEqual({
      logic: 'or',
      conditions: [
        {
          not: {
            logic: 'and',
            conditions: [
              { field: 'valid', operator: '==', value: true },
              { field: 'score', operator: '>', value: 5 },
            ],
          },
        },
        { field: 'retry', operator: '==', value: true },
      ],
    });
    expect(parseCondition('not valid')).toEqual({ not: { field: 'valid', operator: '==', value: true } });
  });

  it('rejects malformed conditions with their offset', () => {
    expect(() => parseCondition('')).toThrow(ConditionSyntaxError);
    expect(() => parseCondition('decision ==')).toThrow('Invalid condition "decision ==" at offset 11: expected a literal value');
    expect(() => parseCondition('(a == 1')).toThrow('expected ")"');
    expect(() => parseCondition("a == 'open")).toThrow('unterminated string literal');
    expect(() => parseCondition('a == 1 b')).toThrow('unexpected path');
    expect(() => parseCondition('a == b.c')).toThrow('quote "b.c" to use it as text');
    expect(() => parseCondition('a # 1')).toThrow('unexpected character "#"');
  });
});
