import { describe, it, expect } from 'vitest';
import { noGlobalProcess } from '../../src/rules/no-global-process.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('no-global-process', () => {
  it('flags the global process', () => {
    const diagnostics = lintSnippet('const env = process.env;\n', [noGlobalProcess]);
    expect(messagesOf(diagnostics)).toEqual(["Global 'process' is not allowed. Import it from 'node:process' instead"]);
    expect(diagnostics[0]?.column).toBe(13);
  });

  it('passes an imported process', () => {
    const source = "import process from 'node:process';\nconst env = process.env;\n";
    expect(lintSnippet(source, [noGlobalProcess])).toHaveLength(0);
  });

  it('ignores property names called process', () => {
    const source = 'declare const job: { process: number };\nconst steps = { process: job.process };\n';
    expect(lintSnippet(source, [noGlobalProcess])).toHaveLength(0);
  });
});
