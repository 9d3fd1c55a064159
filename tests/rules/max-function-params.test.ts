import { describe, it, expect } from 'vitest';
import { maxFunctionParams } from '../../src/rules/max-function-params.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

const ADVICE = 'Use an options object as the second parameter instead';

describe('max-function-params', () => {
  it('flags functions, arrows and methods with more than two parameters', () => {
    const source = [
      'function three(a: number, b: number, c: number): number { return a + b + c; }',
      'const arrow = (a: number, b: number, c: number): number => a + b + c;',
      'const shape = { area(a: number, b: number, c: number): number { return a * b * c; } };',
      'function two(a: number, b: number): number { return a + b; }',
      '',
    ].join('\n');
    expect(messagesOf(lintSnippet(source, [maxFunctionParams]))).toEqual([
      `Function 'three' has 3 parameters (max: 2). ${ADVICE}`,
      `Arrow function has 3 parameters (max: 2). ${ADVICE}`,
      `Function 'area' has 3 parameters (max: 2). ${ADVICE}`,
    ]);
  });
});
