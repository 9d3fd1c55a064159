import { describe, it, expect } from 'vitest';
import { noEvalFunction } from '../../src/rules/no-eval-function.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('no-eval-function', () => {
  it('flags eval, Function() and new Function()', () => {
    const source = ["eval('1');", "Function('return 1');", "new Function('return 1');", ''].join('\n');
    const diagnostics = lintSnippet(source, [noEvalFunction]);
    expect(messagesOf(diagnostics)).toEqual([
      'eval() is not allowed in pure TypeScript subset due to security risks',
      'Function() is not allowed in pure TypeScript subset due to security risks',
      'new Function() is not allowed in pure TypeScript subset due to security risks',
    ]);
  });

  it('ignores methods that happen to be named eval', () => {
    expect(lintSnippet("declare const engine: { eval(code: string): void };\nengine.eval('1');\n", [noEvalFunction])).toHaveLength(0);
  });
});
