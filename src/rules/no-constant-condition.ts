import { booleanLiteralValue, child } from '../analysis/ast.js';
import type { NodeCheck, Rule } from '../types.js';

function constantConditionCheck(keyword: 'if' | 'while'): NodeCheck {
  return (node, context) => {
    const value = booleanLiteralValue(child(node, 'test'));
    if (value === undefined) return;
    context.report({
      node,
      message: `${keyword} (${String(value)}) is not allowed. Constant conditions are banned`,
    });
  };
}

export const noConstantCondition: Rule = {
  id: 'no-constant-condition',
  description: 'Flags if and while statements whose test is a boolean literal.',
  visitors: {
    IfStatement: constantConditionCheck('if'),
    WhileStatement: constantConditionCheck('while'),
  },
};
