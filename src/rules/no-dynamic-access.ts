import { child, flag, isNumericLiteral, stringLiteralValue, type AstNode } from '../analysis/ast.js';
import type { Rule } from '../types.js';

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/** `arr[0]` and `arr["2"]` index by position rather than by a runtime key. */
function isIndexKey(property: AstNode | undefined): boolean {
  if (isNumericLiteral(property)) return true;
  const text = stringLiteralValue(property);
  if (text === undefined || !/^[+-]?\d+$/.test(text)) return false;
  const value = Number(text);
  return value >= INT32_MIN && value <= INT32_MAX;
}

export const noDynamicAccess: Rule = {
  id: 'no-dynamic-access',
  description: 'Flags computed member access with a non-index key.',
  visitors: {
    MemberExpression: (node, context, parent) => {
      if (!flag(node, 'computed') || isIndexKey(child(node, 'property'))) return;

      const isAssignmentTarget = parent?.type === 'AssignmentExpression' && child(parent, 'left') === node;
      context.report({
        node,
        message: isAssignmentTarget
          ? 'Dynamic property assignment is not allowed. Use dot notation instead'
          : 'Dynamic property access is not allowed. Use dot notation or destructuring instead',
      });
    },
  },
};
