import { identifierName } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noFilenameDirname: Rule = {
  id: 'no-filename-dirname',
  description: 'Flags __filename and __dirname. Use import.meta.url instead.',
  visitors: {
    IdentifierReference: (node, context) => {
      const name = identifierName(node);
      if (name !== '__filename' && name !== '__dirname') return;
      context.report({
        node,
        message: `${name} is not allowed in pure TypeScript subset. Use import.meta.url instead`,
      });
    },
  },
};
