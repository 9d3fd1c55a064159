import { calleeMember } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noObjectAssign: Rule = {
  id: 'no-object-assign',
  description: 'Flags Object.assign(). Use object spread instead.',
  visitors: {
    CallExpression: (node, context) => {
      const member = calleeMember(node);
      if (member?.objectName !== 'Object' || member.propertyName !== 'assign') return;
      context.report({ node, message: 'Object.assign is not allowed. Use spread operator (...) instead' });
    },
  },
};
