import { child, flag, unwrapParens } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noMemberAssignments: Rule = {
  id: 'no-member-assignments',
  description: 'Flags assignments to object members. Build a new object instead.',
  visitors: {
    AssignmentExpression: (node, context) => {
      if (context.state.isErrorFile) return;
      const left = child(node, 'left');
      if (!left) return;
      const target = unwrapParens(left);
      if (target.type !== 'MemberExpression') return;
      const example = flag(target, 'computed') ? 'foo[bar] = value' : 'foo.bar = value';
      context.report({
        node,
        message: `Member assignments like '${example}' are not allowed in pure TypeScript subset`,
      });
    },
  },
};
