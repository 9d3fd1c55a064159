import { child, stringLiteralValue } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noHttpImports: Rule = {
  id: 'no-http-imports',
  description: 'Flags imports from http:// and https:// URLs.',
  visitors: {
    ImportDeclaration: (node, context) => {
      const source = stringLiteralValue(child(node, 'source'));
      if (source === undefined || !/^https?:\/\//.test(source)) return;
      context.report({
        node,
        message: `HTTP(S) imports are not allowed. Import from '${source}' is forbidden`,
      });
    },
  },
};
