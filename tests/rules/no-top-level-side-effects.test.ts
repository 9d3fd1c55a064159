import { describe, it, expect } from 'vitest';
import { noTopLevelSideEffects } from '../../src/rules/no-top-level-side-effects.js';
import { testRunners } from '../../src/testRunner.js';
import { lintSnippet } from '../helpers/lint-snippet.js';

describe('no-top-level-side-effects', () => {
  it('flags side effects at module scope', () => {
    const source = [
      "import { run } from './run.js';",
      'run();',
      'let count: number = 0;',
      'count = 1;',
      'count++;',
      'new Date();',
      'for (const x of [1]) {}',
      'if (count > 0) {}',
      'if (true) {}',
      '(() => {})();',
      '',
    ].join('\n');
    const diagnostics = lintSnippet(source, [noTopLevelSideEffects]);
    expect(diagnostics.map((d) => [d.line, d.message])).toEqual([
      [2, 'Top-level function calls are not allowed (side effects)'],
      [4, 'Top-level assignments are not allowed (side effects)'],
      [5, 'Top-level update expressions are not allowed (side effects)'],
      [6, 'Top-level new expressions are not allowed (side effects)'],
      [7, 'Top-level loops are not allowed (side effects)'],
      [8, 'Top-level if statements are not allowed (side effects)'],
    ]);
  });

  it('skips test files', () => {
    expect(lintSnippet('run();\n', [noTopLevelSideEffects], { filePath: 'src/run.test.ts' })).toHaveLength(0);
  });

  it('allows main() in the main entry', () => {
    const source = 'function main(): void {}\nmain();\n';
    expect(lintSnippet(source, [noTopLevelSideEffects], { filePath: 'src/main.ts' })).toHaveLength(0);
    expect(lintSnippet(source, [noTopLevelSideEffects], { filePath: 'src/app.ts' })).toHaveLength(1);
  });

  it('allows the test runner registration calls', () => {
    const source = "describe('suite', () => {});\n";
    const options = { filePath: 'src/setup.ts', testRunner: testRunners.vitest };
    expect(lintSnippet(source, [noTopLevelSideEffects], options)).toHaveLength(0);
  });
});
