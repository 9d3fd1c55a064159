import { describe, it, expect } from 'vitest';
import { paramMissingType } from '../../src/rules/param-missing-type.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('param-missing-type', () => {
  it('flags untyped parameters of named functions', () => {
    const source = [
      'function greet(name, greeting: string): string { return greeting + name; }',
      'const shout = function (text) { return text; };',
      'const wave = (who, ...rest) => who;',
      '',
    ].join('\n');
    expect(messagesOf(lintSnippet(source, [paramMissingType]))).toEqual([
      "Parameter 'name' in function 'greet' must have a type",
      "Parameter 'text' in function 'shout' must have a type",
      "Parameter 'who' in function 'wave' must have a type",
      "Parameter 'rest' in function 'wave' must have a type",
    ]);
  });

  it('skips defaults, destructuring and anonymous callbacks', () => {
    const source = [
      'function withDefault(count = 1, { a }: { a: number }): number { return count + a; }',
      'declare const items: ReadonlyArray<number>;',
      'const doubled = items.map((item) => item * 2);',
      '',
    ].join('\n');
    expect(lintSnippet(source, [paramMissingType])).toHaveLength(0);
  });
});
