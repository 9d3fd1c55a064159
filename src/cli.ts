#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as path from 'node:path';
import { Option, program } from 'commander';
import ora from 'ora';
import pc from 'picocolors';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { allPolicies, allRules, lintProject } from './index.js';
import { PRESET_NAMES, presets } from './presets.js';
import { formatTerminalReport } from './reporters/terminal.js';
import { TEST_RUNNER_NAMES } from './testRunner.js';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

const fileList = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item !== ''));

const cliOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  preset: z.enum(PRESET_NAMES).optional(),
  test: z.enum(TEST_RUNNER_NAMES).optional(),
  entry: fileList.optional(),
  main: fileList.optional(),
});

program
  .name('purets')
  .description('Enforce a pure, functional subset of TypeScript')
  .version(pkg.version)
  .argument('[directory]', 'Directory to check', '.')
  .option('--verbose', 'Show the offending source line under each error')
  .addOption(new Option('--preset <name>', 'Rule preset').choices(PRESET_NAMES))
  .addOption(new Option('--test <runner>', 'Test runner used by test files').choices(TEST_RUNNER_NAMES))
  .option('--entry <files>', 'Comma-separated files treated as entry points')
  .option('--main <files>', 'Comma-separated files treated as main entries')
  .action(async (directory: string, rawOptions: unknown) => {
    const spinner = ora('Checking...').start();

    try {
      const options = cliOptionsSchema.parse(rawOptions);
      const root = path.resolve(directory);
      const config = loadConfig(root);
      const startedAt = performance.now();

      const result = await lintProject(root, {
        config,
        preset: options.preset,
        testRunner: options.test,
        entry: options.entry,
        main: options.main,
      });

      spinner.stop();
      console.log(
        formatTerminalReport(result.files, performance.now() - startedAt, {
          verbose: options.verbose ?? config.verbose ?? false,
        })
      );

      process.exit(result.errorCount > 0 ? 1 : 0);
    } catch (error) {
      spinner.fail(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('rules')
  .description('List every rule')
  .action(() => {
    for (const { id, description } of [...allRules, ...allPolicies]) {
      console.log(`  ${pc.bold(id.padEnd(28))} ${description}`);
    }
  });

program
  .command('presets')
  .description('List rule presets')
  .action(() => {
    for (const preset of Object.values(presets)) {
      console.log(`  ${pc.bold(preset.name.padEnd(12))} ${preset.description}`);
    }
  });

await program.parseAsync(process.argv);
