import { describe, it, expect } from 'vitest';
import { noEnums } from '../../src/rules/no-enums.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('no-enums', () => {
  it('flags enums and const enums', () => {
    const source = ['enum Color { Red, Green }', 'const enum Size { Small }', ''].join('\n');
    const diagnostics = lintSnippet(source, [noEnums]);
    expect(messagesOf(diagnostics)).toEqual([
      'Enums are not allowed in pure TypeScript subset',
      'Enums are not allowed in pure TypeScript subset',
    ]);
    expect(diagnostics.map((d) => d.line)).toEqual([1, 2]);
  });

  it('passes literal unions', () => {
    expect(lintSnippet("type Color = 'red' | 'green';\n", [noEnums])).toHaveLength(0);
  });
});
