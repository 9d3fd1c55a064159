import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { PRESET_NAMES } from './presets.js';
import { TEST_RUNNER_NAMES } from './testRunner.js';
import { isRuleId, type RuleId } from './types.js';

export const CONFIG_FILE_NAME = 'purets.config.json';
export const PACKAGE_JSON_KEY = 'purets';

const ruleOverridesSchema = z
  .record(z.string(), z.boolean())
  .superRefine((rules, ctx) => {
    for (const id of Object.keys(rules)) {
      if (!isRuleId(id)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown rule '${id}'`, path: [id] });
    }
  })
  .transform((rules) => {
    const overrides: Partial<Record<RuleId, boolean>> = {};
    for (const [id, enabled] of Object.entries(rules)) {
      if (isRuleId(id)) overrides[id] = enabled;
    }
    return overrides;
  });

export const configSchema = z.object({
  preset: z.enum(PRESET_NAMES).optional(),
  rules: ruleOverridesSchema.optional(),
  ignore: z.object({ files: z.array(z.string()).optional() }).optional(),
  entry: z.array(z.string()).optional(),
  main: z.array(z.string()).optional(),
  testRunner: z.enum(TEST_RUNNER_NAMES).optional(),
  verbose: z.boolean().optional(),
});

export type PuretsConfig = z.infer<typeof configSchema>;

function describeError(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

function parseConfig(value: unknown, source: string): PuretsConfig {
  const result = configSchema.safeParse(value);
  if (result.success) return result.data;
  console.warn(`Warning: Invalid configuration in ${source}: ${describeError(result.error)}`);
  return {};
}

const packageJsonSchema = z.object({ [PACKAGE_JSON_KEY]: z.unknown().optional() });

export function loadConfig(projectRoot: string): PuretsConfig {
  const configPath = path.join(projectRoot, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf-8');
    try {
      return parseConfig(JSON.parse(raw), CONFIG_FILE_NAME);
    } catch (err) {
      console.warn(`Warning: Failed to parse ${CONFIG_FILE_NAME}: ${describeError(err)}`);
      return {};
    }
  }

  const pkgPath = path.join(projectRoot, 'package.json');
  if (fs.existsSync(pkgPath)) {
    const raw = fs.readFileSync(pkgPath, 'utf-8');
    try {
      const pkg = packageJsonSchema.safeParse(JSON.parse(raw));
      const section = pkg.success ? pkg.data[PACKAGE_JSON_KEY] : undefined;
      if (section !== undefined) return parseConfig(section, 'package.json');
    } catch (err) {
      console.warn(`Warning: Failed to parse package.json: ${describeError(err)}`);
      return {};
    }
  }

  return {};
}
