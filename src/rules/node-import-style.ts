import { builtinModules } from 'node:module';
import { child, children, stringLiteralValue } from '../analysis/ast.js';
import type { Rule } from '../types.js';

const NODE_BUILTINS: ReadonlySet<string> = new Set(builtinModules);

/** Modules that ship a `/promises` entry point. */
const PROMISE_VARIANTS = ['fs', 'dns', 'stream', 'timers', 'readline'];

export const nodeImportStyle: Rule = {
  id: 'node-import-style',
  description: "Requires the 'node:' prefix, promise-based modules and named imports for Node.js built-ins.",
  visitors: {
    ImportDeclaration: (node, context) => {
      const source = stringLiteralValue(child(node, 'source'));
      if (source === undefined) return;

      if (!source.startsWith('node:') && NODE_BUILTINS.has(source)) {
        context.report({
          node,
          message: `Node.js built-in '${source}' must be imported with 'node:' prefix. Use 'node:${source}' instead`,
        });
      }

      const bare = source.replace(/^node:/, '');
      if (PROMISE_VARIANTS.includes(bare)) {
        context.report({
          node,
          message: `Prefer promise-based API. Use 'node:${bare}/promises' instead of '${source}'`,
        });
      }

      if (
        source.startsWith('node:') &&
        children(node, 'specifiers').some((specifier) => specifier.type === 'ImportNamespaceSpecifier')
      ) {
        context.report({
          node,
          message: `Use named imports instead of namespace import from '${source}'. Example: import { readFile } from '${source}'`,
        });
      }
    },
  },
};
