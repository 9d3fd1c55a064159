import { calleeName } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noEvalFunction: Rule = {
  id: 'no-eval-function',
  description: 'Flags eval() and the Function constructor.',
  visitors: {
    CallExpression: (node, context) => {
      const name = calleeName(node);
      if (name === 'eval') {
        context.report({
          node,
          message: 'eval() is not allowed in pure TypeScript subset due to security risks',
        });
      } else if (name === 'Function') {
        context.report({
          node,
          message: 'Function() is not allowed in pure TypeScript subset due to security risks',
        });
      }
    },
    NewExpression: (node, context) => {
      if (calleeName(node) !== 'Function') return;
      context.report({
        node,
        message: 'new Function() is not allowed in pure TypeScript subset due to security risks',
      });
    },
  },
};
