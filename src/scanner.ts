import fg from 'fast-glob';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { PuretsConfig } from './config.js';

export const SOURCE_PATTERNS = ['**/*.ts', '**/*.tsx', '**/*.mts', '**/*.cts'];

function loadGitignorePatterns(projectRoot: string): string[] {
  const gitignorePath = path.join(projectRoot, '.gitignore');
  if (!fs.existsSync(gitignorePath)) return [];

  const content = fs.readFileSync(gitignorePath, 'utf-8');
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#') && !line.startsWith('!'))
    .map((pattern) => pattern.replace(/^\//, ''))
    .map((pattern) => (pattern.startsWith('**/') ? pattern : `**/${pattern}`));
}

export async function scanFiles(projectRoot: string, config: PuretsConfig): Promise<string[]> {
  const ignorePatterns = config.ignore?.files ?? [];
  const gitignorePatterns = loadGitignorePatterns(projectRoot);

  const files = await fg(SOURCE_PATTERNS, {
    cwd: projectRoot,
    absolute: true,
    ignore: [
      '**/node_modules/**',
      '**/dist/**',
      '**/build/**',
      '**/*.d.ts',
      '**/*.d.mts',
      '**/*.d.cts',
      ...ignorePatterns,
      ...gitignorePatterns,
    ],
  });

  return files.sort();
}
