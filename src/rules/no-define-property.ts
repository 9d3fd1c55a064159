import { calleeMember } from '../analysis/ast.js';
import type { Rule } from '../types.js';

const DEFINE_METHODS = new Set(['defineProperty', 'defineProperties']);

export const noDefineProperty: Rule = {
  id: 'no-define-property',
  description: 'Flags Object.defineProperty and Object.defineProperties.',
  visitors: {
    CallExpression: (node, context) => {
      const member = calleeMember(node);
      if (member?.objectName !== 'Object' || !DEFINE_METHODS.has(member.propertyName)) return;
      context.report({
        node,
        message:
          'Object.defineProperty is not allowed. Use direct property assignment or object literals instead',
      });
    },
  },
};
