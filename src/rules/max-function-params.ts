import { child, children, identifierName, type AstNode } from '../analysis/ast.js';
import type { NodeCheck, Rule } from '../types.js';

const MAX_PARAMS = 2;
const ADVICE = 'Use an options object as the second parameter instead';

function functionName(node: AstNode, parent: AstNode | null): string {
  const own = identifierName(child(node, 'id'));
  if (own !== undefined) return own;
  // Methods carry their name on the enclosing definition
  const key = parent ? identifierName(child(parent, 'key')) : undefined;
  return key ?? '<anonymous>';
}

const checkFunction: NodeCheck = (node, context, parent) => {
  const count = children(node, 'params').length;
  if (count <= MAX_PARAMS) return;
  context.report({
    node,
    message: `Function '${functionName(node, parent)}' has ${count} parameters (max: ${MAX_PARAMS}). ${ADVICE}`,
  });
};

export const maxFunctionParams: Rule = {
  id: 'max-function-params',
  description: 'Flags functions with more than two parameters.',
  visitors: {
    FunctionDeclaration: checkFunction,
    FunctionExpression: checkFunction,
    ArrowFunctionExpression: (node, context) => {
      const count = children(node, 'params').length;
      if (count <= MAX_PARAMS) return;
      context.report({
        node,
        message: `Arrow function has ${count} parameters (max: ${MAX_PARAMS}). ${ADVICE}`,
      });
    },
  },
};
