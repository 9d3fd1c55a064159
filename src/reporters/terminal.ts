import pc from 'picocolors';
import type { Diagnostic } from '../types.js';

export type Palette = ReturnType<typeof pc.createColors>;

export interface FileReport {
  filePath: string;
  source: string;
  diagnostics: readonly Diagnostic[];
  parseErrors: readonly string[];
}

export interface ReportOptions {
  verbose?: boolean;
  /** Defaults to picocolors' own detection of colour support. */
  colors?: Palette;
}

function sourceLine(source: string, line: number): string {
  return (source.split('\n')[line - 1] ?? '').replace(/\r$/, '');
}

/** `path:line:col [rule] message`, plus the offending line and a caret when verbose. */
export function formatDiagnostic(diagnostic: Diagnostic, source: string, options: ReportOptions = {}): string {
  const c = options.colors ?? pc;
  const { filePath, line, column, ruleId, message } = diagnostic;
  const header = `${c.bold(`${filePath}:${line}:${column}`)} ${c.red(`[${ruleId}]`)} ${message}`;
  if (!options.verbose) return header;

  const caret = `${' '.repeat(Math.max(column - 1, 0))}^`;
  return [header, `  ${sourceLine(source, line)}`, `  ${c.yellow(caret)}`].join('\n');
}

export function formatParseError(filePath: string, message: string, options: ReportOptions = {}): string {
  const c = options.colors ?? pc;
  return `${c.bold(`${filePath}:1:1`)} ${c.red('Parse error:')} ${message}`;
}

export function countErrors(files: readonly FileReport[]): number {
  return files.reduce((sum, file) => sum + file.diagnostics.length + file.parseErrors.length, 0);
}

export function formatSummary(
  summary: { errorCount: number; fileCount: number; elapsedMs: number },
  options: ReportOptions = {}
): string {
  const c = options.colors ?? pc;
  const seconds = (summary.elapsedMs / 1000).toFixed(2);
  if (summary.errorCount === 0) {
    return c.green(`✓ No errors found in ${summary.fileCount} files (${seconds}s)`);
  }
  const noun = summary.errorCount === 1 ? 'error' : 'errors';
  return c.red(`✗ ${summary.errorCount} ${noun} found in ${seconds}s`);
}

export function formatTerminalReport(
  files: readonly FileReport[],
  elapsedMs: number,
  options: ReportOptions = {}
): string {
  const lines: string[] = [];

  for (const file of files) {
    for (const message of file.parseErrors) lines.push(formatParseError(file.filePath, message, options));
    for (const diagnostic of file.diagnostics) lines.push(formatDiagnostic(diagnostic, file.source, options));
  }

  if (lines.length > 0) lines.push('');
  lines.push(formatSummary({ errorCount: countErrors(files), fileCount: files.length, elapsedMs }, options));
  return lines.join('\n');
}
