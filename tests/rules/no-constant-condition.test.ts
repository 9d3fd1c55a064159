import { describe, it, expect } from 'vitest';
import { noConstantCondition } from '../../src/rules/no-constant-condition.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('no-constant-condition', () => {
  it('flags boolean literal tests in if and while', () => {
    const source = [
      'function loop(): void {',
      '  while (false) {}',
      '  if ((true)) {}',
      '}',
      '',
    ].join('\n');
    expect(messagesOf(lintSnippet(source, [noConstantCondition]))).toEqual([
      'while (false) is not allowed. Constant conditions are banned',
      'if (true) is not allowed. Constant conditions are banned',
    ]);
  });

  it('passes real conditions', () => {
    const source = 'declare const ready: boolean;\nif (ready) {}\nif (1) {}\n';
    expect(lintSnippet(source, [noConstantCondition])).toHaveLength(0);
  });
});
