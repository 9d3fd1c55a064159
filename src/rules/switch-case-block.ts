import { children } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const switchCaseBlock: Rule = {
  id: 'switch-case-block',
  description: 'Requires each non-empty switch case to be a single block statement.',
  visitors: {
    SwitchCase: (node, context) => {
      const consequent = children(node, 'consequent');
      const [only] = consequent;
      if (!only) return;
      if (consequent.length === 1 && (only.type === 'BlockStatement' || only.type === 'BreakStatement')) return;
      context.report({ node, message: "Switch case must use block statement: case 'value': { ... }" });
    },
  },
};
