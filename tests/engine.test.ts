import { describe, it, expect, vi, afterEach } from 'vitest';
import { classifyFile } from '../src/classifier.js';
import { analyzeFile } from '../src/engine.js';
import { noEnums } from '../src/rules/no-enums.js';
import type { Rule } from '../src/types.js';

const throwingRule: Rule = {
  id: 'no-classes',
  description: 'Throws on every class',
  visitors: {
    ClassDeclaration: () => {
      throw new Error('boom');
    },
  },
};

function analyze(source: string, rules: readonly Rule[]) {
  const filePath = 'src/snippet.ts';
  return analyzeFile({ filePath, source, traits: classifyFile(filePath), rules, policies: [] });
}

describe('analyzeFile', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs rules and collects diagnostics', () => {
    const result = analyze('enum Color { Red }\n', [noEnums]);
    expect(result.parseErrors).toEqual([]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.ruleId).toBe('no-enums');
    expect(result.diagnostics[0]?.filePath).toBe('src/snippet.ts');
  });

  it('returns parse errors without analyzing', () => {
    const result = analyze('const = ;\n', [noEnums]);
    expect(result.parseErrors.length).toBeGreaterThan(0);
    expect(result.diagnostics).toEqual([]);
  });

  it('isolates a rule that throws and keeps the others running', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = analyze('class A {}\nclass B {}\nenum E { X }\n', [throwingRule, noEnums]);

    expect(result.diagnostics.map((d) => d.ruleId)).toEqual(['no-enums']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Warning: Rule "no-classes" threw while analyzing src/snippet.ts: boom');
  });

  it('honours disable directives', () => {
    const result = analyze('// purets-disable-next-line no-enums\nenum Color { Red }\n', [noEnums]);
    expect(result.diagnostics).toEqual([]);
  });

  it('suppresses every rule under a file-level line directive', () => {
    const result = analyze('// purets-disable-file\nenum Color { Red }\nenum Size { Small }\n', [noEnums]);
    expect(result.diagnostics).toEqual([]);
  });

  it('consumes matched expectations and reports unmatched ones', () => {
    expect(analyze('// purets-expect-error no-enums\nenum Color { Red }\n', [noEnums]).diagnostics).toEqual([]);

    const result = analyze('// purets-expect-error no-classes\nenum Color { Red }\n', [noEnums]);
    expect(result.diagnostics.map((d) => [d.ruleId, d.line])).toEqual([
      ['no-enums', 2],
      ['unused-expect-error', 2],
    ]);
  });
});
