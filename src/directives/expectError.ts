import { parseRuleNames } from './disable.js';

const EXPECT_MARKER = '// purets-expect-error';

/**
 * Declared expectations keyed by the 0-indexed line they apply to, plus the
 * record of which ones fired while the file was checked.
 */
export interface ExpectErrorIndex {
  readonly expected: ReadonlyMap<number, readonly string[]>;
  readonly triggered: Map<number, string[]>;
}

export interface UntriggeredExpectation {
  line: number;
  rules: string[];
}

export function parseExpectErrors(source: string): ExpectErrorIndex {
  const expected = new Map<number, string[]>();

  source.split('\n').forEach((rawLine, index) => {
    const line = rawLine.trim();
    const markerAt = line.indexOf(EXPECT_MARKER);
    if (markerAt === -1) return;

    const rules = parseRuleNames(line.slice(markerAt + EXPECT_MARKER.length));
    if (rules.length > 0) expected.set(index + 1, rules);
  });

  return { expected, triggered: new Map() };
}

export function isErrorExpected(index: ExpectErrorIndex, line: number, ruleId: string): boolean {
  return index.expected.get(line)?.includes(ruleId) ?? false;
}

export function markAsTriggered(index: ExpectErrorIndex, line: number, ruleId: string): void {
  const fired = index.triggered.get(line) ?? [];
  fired.push(ruleId);
  index.triggered.set(line, fired);
}

/** Expectations that never fired, in ascending line order. */
export function getUntriggeredErrors(index: ExpectErrorIndex): UntriggeredExpectation[] {
  const untriggered: UntriggeredExpectation[] = [];
  const lines = [...index.expected.keys()].sort((a, b) => a - b);

  for (const line of lines) {
    const fired = index.triggered.get(line) ?? [];
    const rules = (index.expected.get(line) ?? []).filter((rule) => !fired.includes(rule));
    if (rules.length > 0) untriggered.push({ line, rules });
  }

  return untriggered;
}
