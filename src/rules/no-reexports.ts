import { child, stringLiteralValue } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noReexports: Rule = {
  id: 'no-reexports',
  description: 'Flags re-exports outside entry points, and `export *` inside them.',
  visitors: {
    Program: (_node, context) => {
      const { traits, state } = context;
      const isEntry = traits.isEntryPoint || traits.isMainEntry;

      for (const declaration of state.reexports) {
        const source = stringLiteralValue(child(declaration, 'source')) ?? '';
        if (!isEntry) {
          context.report({ node: declaration, message: `Re-exports from '${source}' are not allowed` });
        } else if (declaration.type === 'ExportAllDeclaration') {
          context.report({
            node: declaration,
            message: `Namespace re-exports are not allowed in entry points. Use named exports: export { name } from '${source}'`,
          });
        }
      }
    },
  },
};
