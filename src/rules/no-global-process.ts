import { identifierName } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noGlobalProcess: Rule = {
  id: 'no-global-process',
  description: "Flags the global 'process'. Import it from 'node:process' instead.",
  visitors: {
    IdentifierReference: (node, context) => {
      if (identifierName(node) !== 'process' || context.state.importedProcessNames.has('process')) return;
      context.report({
        node,
        message: "Global 'process' is not allowed. Import it from 'node:process' instead",
      });
    },
  },
};
