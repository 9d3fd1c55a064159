import { describe, it, expect } from 'vitest';
import { catchErrorHandling } from '../../src/rules/catch-error-handling.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

const PRELUDE = 'declare function run(): void;\ndeclare function report(error: Error): void;\n';

function lintCatch(handler: string): string[] {
  return messagesOf(lintSnippet(`${PRELUDE}try {\n  run();\n} ${handler}\n`, [catchErrorHandling]));
}

describe('catch-error-handling', () => {
  it('requires a catch parameter', () => {
    expect(lintCatch('catch {\n  run();\n}')).toEqual([
      'Catch clause must have an error parameter to handle errors properly',
    ]);
  });

  it('flags empty catch blocks', () => {
    expect(lintCatch('catch (err) {}')).toEqual(['Empty catch block is not allowed. Check the error type and handle it']);
  });

  it('requires a type check as the first statement', () => {
    expect(lintCatch('catch (err) {\n  run();\n}')).toEqual([
      "Catch block must check error type with 'if (err instanceof Error)' or 'if (Error.isError(err))' as its first statement",
    ]);
  });

  it('accepts instanceof Error', () => {
    expect(lintCatch('catch (err) {\n  if (err instanceof Error) report(err);\n}')).toEqual([]);
  });

  it('accepts Error.isError', () => {
    expect(lintCatch('catch (err) {\n  if (Error.isError(err)) run();\n}')).toEqual([]);
  });

  it('rejects a check against another parameter name', () => {
    const messages = lintCatch('catch (err) {\n  if (other instanceof Error) run();\n}');
    expect(messages).toHaveLength(1);
  });
});
