import { calleeMember } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noForeach: Rule = {
  id: 'no-foreach',
  description: 'Flags .forEach() calls. Use for-of instead.',
  visitors: {
    CallExpression: (node, context) => {
      if (calleeMember(node)?.propertyName !== 'forEach') return;
      context.report({
        node,
        message: 'forEach is not allowed in pure TypeScript subset. Use for-of loop instead',
      });
    },
  },
};
