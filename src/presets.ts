import { RULE_IDS, type RuleId } from './types.js';

export const PRESET_NAMES = ['strict', 'relaxed', 'functional', 'library', 'test'] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

export interface RulePreset {
  name: PresetName;
  description: string;
  enabledRules: ReadonlySet<RuleId>;
  disabledRules: ReadonlySet<RuleId>;
}

export const presets: Readonly<Record<PresetName, RulePreset>> = {
  strict: {
    name: 'strict',
    description: 'All rules enabled for maximum strictness',
    enabledRules: new Set(RULE_IDS),
    disabledRules: new Set<RuleId>(),
  },
  relaxed: {
    name: 'relaxed',
    description: 'Relaxed rules for gradual migration',
    enabledRules: new Set<RuleId>([
      'no-eval-function',
      'no-delete',
      'no-unused-variables',
      'catch-error-handling',
      'no-http-imports',
      'forbidden-libraries',
    ]),
    disabledRules: new Set<RuleId>([
      'no-classes',
      'no-throw',
      'strict-named-export',
      'export-requires-jsdoc',
      'no-top-level-side-effects',
    ]),
  },
  functional: {
    name: 'functional',
    description: 'Functional programming style enforcement',
    enabledRules: new Set<RuleId>([
      'no-classes',
      'no-this-in-functions',
      'no-foreach',
      'no-do-while',
      'no-delete',
      'no-member-assignments',
      'no-object-assign',
      'prefer-readonly-array',
      'no-mutable-record',
      'no-side-effect-functions',
      'path-based-restrictions',
      'let-requires-type',
      'empty-array-requires-type',
    ]),
    disabledRules: new Set<RuleId>(['strict-named-export']),
  },
  library: {
    name: 'library',
    description: 'Rules optimized for library development',
    enabledRules: new Set<RuleId>([
      'export-requires-jsdoc',
      'jsdoc-param-match',
      'no-unused-variables',
      'no-as-cast',
      'let-requires-type',
      'prefer-readonly-array',
      'no-reexports',
      'no-top-level-side-effects',
      'no-side-effect-functions',
    ]),
    disabledRules: new Set<RuleId>(['no-classes', 'strict-named-export', 'max-function-params']),
  },
  test: {
    name: 'test',
    description: 'Rules for test files',
    enabledRules: new Set<RuleId>(['no-unused-variables', 'catch-error-handling', 'import-extensions']),
    disabledRules: new Set<RuleId>([
      'no-top-level-side-effects',
      'export-requires-jsdoc',
      'no-throw',
      'max-function-params',
    ]),
  },
};

export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some((name) => name === value);
}

/** `undefined` when the preset does not mention the rule. */
export function isRuleEnabled(preset: RulePreset, ruleId: RuleId): boolean | undefined {
  if (preset.disabledRules.has(ruleId)) return false;
  if (preset.enabledRules.has(ruleId)) return true;
  return undefined;
}

export interface RuleSelection {
  preset?: PresetName;
  rules?: Partial<Record<RuleId, boolean>>;
}

/**
 * An explicit per-rule override wins, then the preset (strict by default).
 * Rules a preset does not mention stay off. Expect-error reporting is not
 * selectable.
 */
export function resolveRuleEnabled(ruleId: RuleId, selection: RuleSelection): boolean {
  if (ruleId === 'unused-expect-error') return true;
  const override = selection.rules?.[ruleId];
  if (override !== undefined) return override;
  return isRuleEnabled(presets[selection.preset ?? 'strict'], ruleId) ?? false;
}

export function selectEnabled<T extends { id: RuleId }>(items: readonly T[], selection: RuleSelection): T[] {
  return items.filter((item) => resolveRuleEnabled(item.id, selection));
}
