import { calleeName } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noRequire: Rule = {
  id: 'no-require',
  description: 'Flags require() calls.',
  visitors: {
    CallExpression: (node, context) => {
      if (calleeName(node) !== 'require') return;
      context.report({ node, message: 'require() is not allowed. Use ES6 import statements instead' });
    },
  },
};
