const FILE_MARKERS = ['// purets-disable-file', '/* purets-disable-file'];
const NEXT_LINE_MARKER = '// purets-disable-next-line';
const SAME_LINE_MARKER = '// purets-disable-line';

/** Lines are 0-indexed. */
export interface SuppressionIndex {
  readonly disabledLines: ReadonlySet<number>;
  readonly fileDisabled: boolean;
  readonly lineRuleOverrides: ReadonlyMap<number, ReadonlySet<string>>;
}

/** Rule names after a directive marker, split on commas and whitespace. */
export function parseRuleNames(text: string): string[] {
  return text
    .split(/[\s,]+/)
    .map((name) => name.trim())
    .filter((name) => name !== '' && !name.startsWith('*/'));
}

/**
 * Scans raw source lines for disable directives. The scan is textual so a
 * directive is honoured even where the parser would not attach the comment.
 */
export function parseDisableDirectives(source: string): SuppressionIndex {
  const disabledLines = new Set<number>();
  const lineRuleOverrides = new Map<number, Set<string>>();
  let fileDisabled = false;

  const disable = (line: number, text: string, marker: string): void => {
    disabledLines.add(line);
    const rules = parseRuleNames(text.slice(text.indexOf(marker) + marker.length));
    if (rules.length === 0) return;
    const existing = lineRuleOverrides.get(line) ?? new Set<string>();
    for (const rule of rules) existing.add(rule);
    lineRuleOverrides.set(line, existing);
  };

  source.split('\n').forEach((rawLine, index) => {
    const line = rawLine.trim();

    if (FILE_MARKERS.some((marker) => line.includes(marker))) {
      fileDisabled = true;
      return;
    }
    if (line.includes(NEXT_LINE_MARKER)) disable(index + 1, line, NEXT_LINE_MARKER);
    if (line.includes(SAME_LINE_MARKER)) disable(index, line, SAME_LINE_MARKER);
  });

  return { disabledLines, fileDisabled, lineRuleOverrides };
}

export function isLineDisabled(index: SuppressionIndex, line: number): boolean {
  return index.fileDisabled || index.disabledLines.has(line);
}

export function isRuleDisabled(index: SuppressionIndex, line: number, ruleId: string): boolean {
  if (index.fileDisabled) return true;
  const overrides = index.lineRuleOverrides.get(line);
  if (index.disabledLines.has(line)) {
    // A directive without rule names blankets the whole line.
    return overrides === undefined || overrides.size === 0 || overrides.has(ruleId);
  }
  return overrides?.has(ruleId) ?? false;
}
