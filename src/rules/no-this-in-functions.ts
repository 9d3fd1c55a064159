import type { Rule } from '../types.js';

export const noThisInFunctions: Rule = {
  id: 'no-this-in-functions',
  description: "Flags 'this' inside functions.",
  visitors: {
    ThisExpression: (node, context) => {
      const { state } = context;
      if (!state.scope.inFunction || state.isErrorFile) return;
      context.report({ node, message: "Using 'this' in functions is not allowed in pure TypeScript subset" });
    },
  },
};
