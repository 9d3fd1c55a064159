import { describe, it, expect } from 'vitest';
import { noDefineProperty } from '../../src/rules/no-define-property.js';
import { lintSnippet } from '../helpers/lint-snippet.js';

const MESSAGE = 'Object.defineProperty is not allowed. Use direct property assignment or object literals instead';

describe('no-define-property', () => {
  it('flags Object.defineProperty and Object.defineProperties', () => {
    const source = [
      'declare const target: object;',
      "Object.defineProperty(target, 'x', { value: 1 });",
      'Object.defineProperties(target, {});',
      '',
    ].join('\n');
    const diagnostics = lintSnippet(source, [noDefineProperty]);
    expect(diagnostics.map((d) => [d.line, d.message])).toEqual([
      [2, MESSAGE],
      [3, MESSAGE],
    ]);
  });

  it('ignores defineProperty on other objects', () => {
    const source = "declare const target: object;\nReflect.defineProperty(target, 'x', { value: 1 });\n";
    expect(lintSnippet(source, [noDefineProperty])).toHaveLength(0);
  });
});
