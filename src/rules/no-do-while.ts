import type { Rule } from '../types.js';

export const noDoWhile: Rule = {
  id: 'no-do-while',
  description: 'Flags do-while loops.',
  visitors: {
    DoWhileStatement: (node, context) => {
      context.report({ node, message: 'do-while statements are not allowed. Use while instead' });
    },
  },
};
