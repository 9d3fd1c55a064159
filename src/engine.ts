import { checkProgram } from './analysis/combinedVisitor.js';
import type { FileTraits } from './classifier.js';
import { parseTypeScript } from './parsers/typescript.js';
import type { TestRunner } from './testRunner.js';
import type { Diagnostic, FilePolicy, Rule } from './types.js';

interface AnalyzeFileOptions {
  filePath: string;
  source: string;
  traits: FileTraits;
  testRunner?: TestRunner;
  rules: readonly Rule[];
  policies: readonly FilePolicy[];
}

export interface FileAnalysis {
  diagnostics: Diagnostic[];
  /** Parser messages; when present the file was not analyzed. */
  parseErrors: string[];
}

export function analyzeFile(options: AnalyzeFileOptions): FileAnalysis {
  const { filePath, source, traits, testRunner, rules, policies } = options;

  const parsed = parseTypeScript(source, filePath);
  if (parsed.errors.length > 0) return { diagnostics: [], parseErrors: parsed.errors };
  if (!parsed.program) return { diagnostics: [], parseErrors: ['Parser returned no program'] };

  const diagnostics = checkProgram({
    filePath,
    source,
    program: parsed.program,
    comments: parsed.comments,
    traits,
    testRunner,
    rules,
    policies,
  });

  return { diagnostics, parseErrors: [] };
}
