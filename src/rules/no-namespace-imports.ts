import { child, children, stringLiteralValue } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noNamespaceImports: Rule = {
  id: 'no-namespace-imports',
  description: 'Flags `import * as x` from packages and local modules.',
  visitors: {
    ImportDeclaration: (node, context) => {
      const source = stringLiteralValue(child(node, 'source'));
      if (source === undefined || source.startsWith('node:')) return;
      if (!children(node, 'specifiers').some((specifier) => specifier.type === 'ImportNamespaceSpecifier')) return;
      context.report({
        node,
        message: `Namespace imports from '${source}' are not allowed. Use named imports instead`,
      });
    },
  },
};
