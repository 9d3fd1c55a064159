import { describe, it, expect } from 'vitest';
import { noAsCast } from '../../src/rules/no-as-cast.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('no-as-cast', () => {
  it('flags as-expressions and angle-bracket assertions', () => {
    const source = ['declare const value: unknown;', 'const a = value as number;', 'const b = <string>value;', ''].join(
      '\n'
    );
    const diagnostics = lintSnippet(source, [noAsCast]);
    expect(messagesOf(diagnostics)).toEqual([
      "Type assertion with 'as' is discouraged. Consider using 'satisfies' for type checking or narrowing the type properly",
      "Type assertion <Type>value is not allowed. Use 'satisfies' operator or proper type narrowing instead",
    ]);
    expect(diagnostics.map((d) => d.column)).toEqual([11, 11]);
  });

  it('allows as const', () => {
    expect(lintSnippet("const sizes = ['s', 'm'] as const;\n", [noAsCast])).toHaveLength(0);
  });

  it('passes satisfies', () => {
    expect(lintSnippet('const point = { x: 1 } satisfies { x: number };\n', [noAsCast])).toHaveLength(0);
  });
});
