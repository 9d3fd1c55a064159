import { stringField } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noDelete: Rule = {
  id: 'no-delete',
  description: 'Flags the delete operator.',
  visitors: {
    UnaryExpression: (node, context) => {
      if (stringField(node, 'operator') !== 'delete') return;
      context.report({ node, message: 'Delete operator is not allowed in pure TypeScript subset' });
    },
  },
};
