import { describe, it, expect } from 'vitest';
import { noMutableRecord } from '../../src/rules/no-mutable-record.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('no-mutable-record', () => {
  it('flags an empty Record literal', () => {
    const diagnostics = lintSnippet('const counts: Record<string, number> = {};\n', [noMutableRecord]);
    expect(messagesOf(diagnostics)).toEqual([
      'Mutable Record<K, V> = {} is not allowed. Use Map instead for mutable key-value collections',
    ]);
  });

  it('passes populated records and maps', () => {
    const source = [
      'const limits: Record<string, number> = { max: 3 };',
      'const counts = new Map<string, number>();',
      'const empty: Partial<{ a: number }> = {};',
      '',
    ].join('\n');
    expect(lintSnippet(source, [noMutableRecord])).toHaveLength(0);
  });
});
