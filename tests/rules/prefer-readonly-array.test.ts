import { describe, it, expect } from 'vitest';
import { preferReadonlyArray } from '../../src/rules/prefer-readonly-array.js';
import { lintSnippet } from '../helpers/lint-snippet.js';

describe('prefer-readonly-array', () => {
  it('flags arrays that are never mutated', () => {
    const source = [
      'const fixed = [1, 2];',
      'const grown: number[] = [];',
      'grown.push(1);',
      'const safe: ReadonlyArray<number> = [];',
      'const copy = new Array<number>(3);',
      'copy[0] = 1;',
      '',
    ].join('\n');
    const diagnostics = lintSnippet(source, [preferReadonlyArray]);
    expect(diagnostics.map((d) => [d.line, d.column, d.message])).toEqual([
      [1, 7, "Array 'fixed' is never mutated. Consider using 'ReadonlyArray' or 'readonly' modifier"],
    ]);
  });

  it('sees mutations written above the declaration', () => {
    const source = [
      'function fill(): void {',
      '  xs.push(1);',
      '}',
      'const xs: number[] = [];',
      'const ys: number[] = [];',
      '',
    ].join('\n');
    const diagnostics = lintSnippet(source, [preferReadonlyArray]);
    expect(diagnostics.map((d) => [d.line, d.column, d.message])).toEqual([
      [5, 7, "Array 'ys' is never mutated. Consider using 'ReadonlyArray' or 'readonly' modifier"],
    ]);
  });

  it('does not flag an array that is pushed to', () => {
    const source = 'function collect(): number[] {\n  const out: number[] = [];\n  out.push(1);\n  return out;\n}\n';
    expect(lintSnippet(source, [preferReadonlyArray])).toHaveLength(0);
  });
});
