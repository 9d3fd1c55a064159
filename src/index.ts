import * as fs from 'node:fs';
import * as path from 'node:path';
import { classifyFile } from './classifier.js';
import { loadConfig, type PuretsConfig } from './config.js';
import { analyzeFile, type FileAnalysis } from './engine.js';
import { allPolicies } from './policies/index.js';
import { selectEnabled, type PresetName } from './presets.js';
import { countErrors } from './reporters/terminal.js';
import { allRules } from './rules/index.js';
import { scanFiles } from './scanner.js';
import { testRunners, type TestRunnerName } from './testRunner.js';
import type { RuleId } from './types.js';

export interface LintOptions {
  /** Skips loading configuration from the project root. */
  config?: PuretsConfig;
  preset?: PresetName;
  testRunner?: TestRunnerName;
  entry?: readonly string[];
  main?: readonly string[];
  rules?: Partial<Record<RuleId, boolean>>;
}

export interface FileResult extends FileAnalysis {
  /** Relative to the project root. */
  filePath: string;
  source: string;
}

export interface LintResult {
  files: FileResult[];
  filesScanned: number;
  errorCount: number;
}

/** Checks one in-memory source; no configuration is read. */
export function lintSource(filePath: string, source: string, options: LintOptions = {}): FileAnalysis {
  const selection = { preset: options.preset, rules: options.rules };
  const runnerName = options.testRunner;

  return analyzeFile({
    filePath,
    source,
    traits: classifyFile(filePath, { entry: options.entry, main: options.main }),
    testRunner: runnerName === undefined ? undefined : testRunners[runnerName],
    rules: selectEnabled(allRules, selection),
    policies: selectEnabled(allPolicies, selection),
  });
}

/** Merges CLI-style options over the loaded configuration; options win. */
function resolveOptions(config: PuretsConfig, options: LintOptions): LintOptions {
  return {
    preset: options.preset ?? config.preset,
    testRunner: options.testRunner ?? config.testRunner,
    entry: options.entry ?? config.entry,
    main: options.main ?? config.main,
    rules: { ...config.rules, ...options.rules },
  };
}

export async function lintProject(projectRoot: string, options: LintOptions = {}): Promise<LintResult> {
  const resolvedRoot = path.resolve(projectRoot);
  const config = options.config ?? loadConfig(resolvedRoot);
  const resolved = resolveOptions(config, options);

  const filePaths = await scanFiles(resolvedRoot, config);
  const files: FileResult[] = [];

  for (const absolutePath of filePaths) {
    const filePath = path.relative(resolvedRoot, absolutePath).split(path.sep).join('/');
    const source = fs.readFileSync(absolutePath, 'utf-8');
    files.push({ filePath, source, ...lintSource(filePath, source, resolved) });
  }

  return { files, filesScanned: filePaths.length, errorCount: countErrors(files) };
}

export { analyzeFile } from './engine.js';
export { checkProgram } from './analysis/combinedVisitor.js';
export { classifyFile } from './classifier.js';
export { loadConfig, configSchema } from './config.js';
export { presets, isRuleEnabled, resolveRuleEnabled } from './presets.js';
export { allRules } from './rules/index.js';
export { allPolicies } from './policies/index.js';
export { testRunners } from './testRunner.js';
export { RULE_IDS } from './types.js';
export type { Diagnostic, Rule, FilePolicy, RuleContext, RuleId, Span } from './types.js';
export type { FileTraits } from './classifier.js';
export type { PuretsConfig } from './config.js';
export type { PresetName, RulePreset } from './presets.js';
export type { TestRunner, TestRunnerName } from './testRunner.js';
export type { FileAnalysis };
