import { isRuleDisabled, type SuppressionIndex } from './directives/disable.js';
import {
  getUntriggeredErrors,
  isErrorExpected,
  markAsTriggered,
  type ExpectErrorIndex,
} from './directives/expectError.js';
import type { Diagnostic, RuleId, Span } from './types.js';

export interface SourcePosition {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export interface DiagnosticSink {
  readonly diagnostics: readonly Diagnostic[];
  addError: (ruleId: RuleId, message: string, span: Span) => void;
  getPosition: (offset: number) => SourcePosition;
  /** Emits `unused-expect-error` for every expectation nothing matched. */
  reportUntriggeredExpectations: () => void;
}

interface SinkOptions {
  filePath: string;
  source: string;
  suppressions: SuppressionIndex;
  expectations: ExpectErrorIndex;
}

export function computeLineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

/** Index of the line containing `offset`, by binary search over line starts. */
function lineIndexAt(lineStarts: readonly number[], offset: number): number {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) low = mid;
    else high = mid - 1;
  }
  return low;
}

export function createDiagnosticSink(options: SinkOptions): DiagnosticSink {
  const { filePath, source, suppressions, expectations } = options;
  const lineStarts = computeLineStarts(source);
  const diagnostics: Diagnostic[] = [];

  const getPosition = (offset: number): SourcePosition => {
    const clamped = Math.min(Math.max(offset, 0), source.length);
    const index = lineIndexAt(lineStarts, clamped);
    return { line: index + 1, column: clamped - (lineStarts[index] ?? 0) + 1 };
  };

  const addError = (ruleId: RuleId, message: string, span: Span): void => {
    const { line, column } = getPosition(span.start);
    if (isRuleDisabled(suppressions, line - 1, ruleId)) return;
    if (isErrorExpected(expectations, line - 1, ruleId)) {
      markAsTriggered(expectations, line - 1, ruleId);
      return;
    }
    diagnostics.push({ ruleId, filePath, message, span: { start: span.start, end: span.end }, line, column });
  };

  const reportUntriggeredExpectations = (): void => {
    for (const { line, rules } of getUntriggeredErrors(expectations)) {
      const start = lineStarts[line] ?? source.length;
      const next = lineStarts[line + 1];
      const end = next === undefined ? source.length : next - 1;
      for (const rule of rules) {
        diagnostics.push({
          ruleId: 'unused-expect-error',
          filePath,
          message: `Expected error '${rule}' on line ${line + 1} was not triggered`,
          span: { start, end },
          line: line + 1,
          column: 1,
        });
      }
    }
  };

  return { diagnostics, addError, getPosition, reportUntriggeredExpectations };
}
