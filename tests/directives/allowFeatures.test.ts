import { describe, it, expect } from 'vitest';
import { createFeatureGate, parseAllowedFeatures, unusedFeatures } from '../../src/directives/allowFeatures.js';

describe('parseAllowedFeatures', () => {
  it('reads @allow lines from the first doc block', () => {
    const source = ['/**', ' * @allow timers', ' * @allow console for debugging', ' * @allow bogus', ' */', ''].join('\n');
    expect(parseAllowedFeatures(source)).toEqual({
      timers: true,
      console: true,
      net: false,
      dom: false,
      throws: false,
    });
  });

  it('ignores later doc blocks', () => {
    const flags = parseAllowedFeatures('/** Module docs. */\n/** @allow net */\nconst a = 1;\n');
    expect(flags.net).toBe(false);
  });

  it('grants nothing without a doc block', () => {
    expect(Object.values(parseAllowedFeatures('// @allow dom\n')).every((value) => !value)).toBe(true);
  });
});

describe('unusedFeatures', () => {
  it('lists granted features that were never used', () => {
    const gate = createFeatureGate('/**\n * @allow dom\n * @allow throws\n */\n');
    gate.used.throws = true;
    expect(unusedFeatures(gate)).toEqual(['dom']);
  });
});
