import { calleeMember, child } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noUnusedMap: Rule = {
  id: 'no-unused-map',
  description: 'Flags .map() calls whose result is discarded.',
  visitors: {
    ExpressionStatement: (node, context) => {
      const expression = child(node, 'expression');
      if (expression?.type !== 'CallExpression' || calleeMember(expression)?.propertyName !== 'map') return;
      context.report({
        node,
        message: 'map() return value must be used. Assign the result or use a for-of loop for side effects',
      });
    },
  },
};
