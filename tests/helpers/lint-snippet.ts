import { classifyFile, type ClassifyOptions } from '../../src/classifier.js';
import { analyzeFile } from '../../src/engine.js';
import type { TestRunner } from '../../src/testRunner.js';
import type { Diagnostic, FilePolicy, Rule } from '../../src/types.js';

interface SnippetOptions {
  /** Defaults to `src/snippet.ts`. */
  filePath?: string;
  policies?: readonly FilePolicy[];
  testRunner?: TestRunner;
  classify?: ClassifyOptions;
}

/**
 * Runs the given rules over an inline source string and returns what they
 * reported. Throws when the snippet does not parse, so a typo in a test
 * cannot pass as "no diagnostics".
 *
 * @param source - TypeScript source text
 * @param rules - Rules to run; pass `[]` to run only `options.policies`
 */
export function lintSnippet(source: string, rules: readonly Rule[], options: SnippetOptions = {}): Diagnostic[] {
  const filePath = options.filePath ?? 'src/snippet.ts';
  const result = analyzeFile({
    filePath,
    source,
    traits: classifyFile(filePath, options.classify),
    testRunner: options.testRunner,
    rules,
    policies: options.policies ?? [],
  });

  if (result.parseErrors.length > 0) {
    throw new Error(`Snippet failed to parse: ${result.parseErrors.join('; ')}`);
  }
  return result.diagnostics;
}

export function messagesOf(diagnostics: readonly Diagnostic[]): string[] {
  return diagnostics.map((diagnostic) => diagnostic.message);
}
