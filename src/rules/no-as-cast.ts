import { child, typeReferenceName, type AstNode } from '../analysis/ast.js';
import type { Rule } from '../types.js';

function isConstAssertion(node: AstNode): boolean {
  return typeReferenceName(child(node, 'typeAnnotation')) === 'const';
}

export const noAsCast: Rule = {
  id: 'no-as-cast',
  description: "Flags type assertions other than 'as const'.",
  visitors: {
    TSAsExpression: (node, context) => {
      if (isConstAssertion(node)) return;
      context.report({
        node,
        message:
          "Type assertion with 'as' is discouraged. Consider using 'satisfies' for type checking or narrowing the type properly",
      });
    },
    TSTypeAssertion: (node, context) => {
      if (isConstAssertion(node)) return;
      context.report({
        node,
        message:
          "Type assertion <Type>value is not allowed. Use 'satisfies' operator or proper type narrowing instead",
      });
    },
  },
};
