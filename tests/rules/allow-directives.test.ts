import { describe, it, expect } from 'vitest';
import { allowDirectives } from '../../src/rules/allow-directives.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('allow-directives', () => {
  it('gates console, timers, DOM and network access', () => {
    const source = [
      "console.log('start');",
      'setTimeout(() => {}, 1);',
      'const title = document.title;',
      "const response = fetch('/api');",
      'let element: HTMLElement | undefined;',
      '',
    ].join('\n');
    const diagnostics = lintSnippet(source, [allowDirectives]);
    expect(diagnostics.map((d) => [d.line, d.message])).toEqual([
      [1, "Use of 'console' requires '@allow console' directive"],
      [2, "Use of 'setTimeout' requires '@allow timers' directive"],
      [3, "Access to 'document' requires '@allow dom' directive"],
      [4, "Access to 'fetch' requires '@allow net' directive"],
      [5, "Type 'HTMLElement' requires '@allow dom' directive"],
    ]);
  });

  it('passes granted features and reports unused grants', () => {
    const source = ['/**', ' * @allow console', ' * @allow net', ' */', "console.log('start');", ''].join('\n');
    const diagnostics = lintSnippet(source, [allowDirectives]);
    expect(diagnostics.map((d) => [d.line, d.column, d.message])).toEqual([[1, 1, "Unused '@allow net' directive"]]);
  });

  it('counts a throw as using the throws grant', () => {
    const source = "/** @allow throws */\nfunction fail(): never {\n  throw new Error('boom');\n}\n";
    expect(messagesOf(lintSnippet(source, [allowDirectives]))).toEqual([]);
  });
});
