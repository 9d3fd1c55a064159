import { describe, it, expect } from 'vitest';
import { onePublicFunction } from '../../src/rules/one-public-function.js';
import { lintSnippet } from '../helpers/lint-snippet.js';

describe('one-public-function', () => {
  it('reports non-function exports and every function after the first', () => {
    const source = [
      'export const LIMIT: number = 3;',
      'export function a(): number { return LIMIT; }',
      'export function b(): number { return 2; }',
      'export type Shape = { size: number };',
      '',
    ].join('\n');
    const diagnostics = lintSnippet(source, [onePublicFunction]);
    expect(diagnostics.map((d) => [d.line, d.message])).toEqual([
      [1, 'Only functions can be exported. Found non-function export: LIMIT'],
      [3, 'Only one function can be exported per file. Found additional export: b'],
    ]);
  });

  it('passes a single exported function', () => {
    expect(lintSnippet('export function a(): number { return 1; }\n', [onePublicFunction])).toHaveLength(0);
  });
});
