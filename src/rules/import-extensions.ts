import { child, stringLiteralValue } from '../analysis/ast.js';
import type { NodeCheck, Rule } from '../types.js';

const EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs', '.json'];

export function isRelativeSource(source: string): boolean {
  return source === '.' || source === '..' || source.startsWith('./') || source.startsWith('../');
}

const checkSource: NodeCheck = (node, context) => {
  const source = stringLiteralValue(child(node, 'source'));
  if (source === undefined || !isRelativeSource(source)) return;
  if (EXTENSIONS.some((extension) => source.endsWith(extension))) return;
  context.report({ node, message: `Relative imports must include a file extension: '${source}'` });
};

export const importExtensions: Rule = {
  id: 'import-extensions',
  description: 'Requires a file extension on relative import and re-export sources.',
  visitors: {
    ImportDeclaration: checkSource,
    ExportNamedDeclaration: checkSource,
    ExportAllDeclaration: checkSource,
  },
};
