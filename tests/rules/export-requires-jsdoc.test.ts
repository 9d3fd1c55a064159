import { describe, it, expect } from 'vitest';
import { exportRequiresJsdoc } from '../../src/rules/export-requires-jsdoc.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('export-requires-jsdoc', () => {
  it('requires a doc block directly above exported functions', () => {
    const source = [
      '/** Adds two numbers. */',
      'export function add(a: number, b: number): number { return a + b; }',
      'export function sub(a: number, b: number): number { return a - b; }',
      'export const mul = (a: number, b: number): number => a * b;',
      '// a line comment is not documentation',
      'export function div(a: number, b: number): number { return a / b; }',
      'export default function (): void {}',
      '',
    ].join('\n');
    expect(messagesOf(lintSnippet(source, [exportRequiresJsdoc]))).toEqual([
      "Exported function 'sub' must have a JSDoc comment",
      "Exported function 'mul' must have a JSDoc comment",
      "Exported function 'div' must have a JSDoc comment",
      "Exported function 'anonymous' must have a JSDoc comment",
    ]);
  });

  it('requires docs on exported types only inside types directories', () => {
    const source = 'export type User = { id: string };\n';
    expect(messagesOf(lintSnippet(source, [exportRequiresJsdoc], { filePath: 'src/types/User.ts' }))).toEqual([
      "Exported type 'User' must have a JSDoc comment",
    ]);
    expect(lintSnippet(source, [exportRequiresJsdoc])).toHaveLength(0);
  });

  it('requires docs on exported error classes', () => {
    const source = 'export class ParseError extends Error {}\n';
    expect(messagesOf(lintSnippet(source, [exportRequiresJsdoc], { filePath: 'src/errors/ParseError.ts' }))).toEqual([
      "Exported error class 'ParseError' must have a JSDoc comment",
    ]);
  });

  it('passes documented exports', () => {
    const source = '/**\n * Doubles a number.\n */\nexport const double = (n: number): number => n * 2;\n';
    expect(lintSnippet(source, [exportRequiresJsdoc])).toHaveLength(0);
  });
});
