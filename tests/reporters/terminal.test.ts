import { describe, it, expect } from 'vitest';
import pc from 'picocolors';
import {
  countErrors,
  formatDiagnostic,
  formatSummary,
  formatTerminalReport,
  type FileReport,
} from '../../src/reporters/terminal.js';
import type { Diagnostic } from '../../src/types.js';

const colors = pc.createColors(false);

const SOURCE = 'x;\n  enum E {}\n';

const diagnostic: Diagnostic = {
  ruleId: 'no-enums',
  filePath: 'src/a.ts',
  message: 'Enums are not allowed in pure TypeScript subset',
  span: { start: 5, end: 14 },
  line: 2,
  column: 3,
};

describe('formatDiagnostic', () => {
  it('prints path, position, rule and message', () => {
    expect(formatDiagnostic(diagnostic, SOURCE, { colors })).toBe(
      'src/a.ts:2:3 [no-enums] Enums are not allowed in pure TypeScript subset'
    );
  });

  it('adds the source line and a caret when verbose', () => {
    expect(formatDiagnostic(diagnostic, SOURCE, { colors, verbose: true }).split('\n')).toEqual([
      'src/a.ts:2:3 [no-enums] Enums are not allowed in pure TypeScript subset',
      '    enum E {}',
      '    ^',
    ]);
  });
});

describe('formatSummary', () => {
  it('reports a clean run with the file count', () => {
    expect(formatSummary({ errorCount: 0, fileCount: 3, elapsedMs: 1234 }, { colors })).toBe(
      '✓ No errors found in 3 files (1.23s)'
    );
  });

  it('pluralizes the error count', () => {
    expect(formatSummary({ errorCount: 1, fileCount: 3, elapsedMs: 500 }, { colors })).toBe('✗ 1 error found in 0.50s');
    expect(formatSummary({ errorCount: 2, fileCount: 3, elapsedMs: 500 }, { colors })).toBe('✗ 2 errors found in 0.50s');
  });
});

describe('formatTerminalReport', () => {
  const files: FileReport[] = [
    { filePath: 'src/bad.ts', source: 'const = ;', diagnostics: [], parseErrors: ['Unexpected token'] },
    { filePath: 'src/a.ts', source: SOURCE, diagnostics: [diagnostic], parseErrors: [] },
  ];

  it('lists parse errors and diagnostics before the summary', () => {
    expect(formatTerminalReport(files, 1500, { colors }).split('\n')).toEqual([
      'src/bad.ts:1:1 Parse error: Unexpected token',
      'src/a.ts:2:3 [no-enums] Enums are not allowed in pure TypeScript subset',
      '',
      '✗ 2 errors found in 1.50s',
    ]);
    expect(countErrors(files)).toBe(2);
  });

  it('prints only the summary when there is nothing to report', () => {
    const clean: FileReport[] = [{ filePath: 'src/a.ts', source: '', diagnostics: [], parseErrors: [] }];
    expect(formatTerminalReport(clean, 0, { colors })).toBe('✓ No errors found in 1 files (0.00s)');
  });
});
