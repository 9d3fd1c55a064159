import { calleeName, child, type AstNode } from '../analysis/ast.js';
import type { Rule } from '../types.js';

function isThrowable(argument: AstNode | undefined): boolean {
  if (!argument) return false;
  if (argument.type === 'Identifier') return true;
  return argument.type === 'NewExpression' && (calleeName(argument)?.endsWith('Error') ?? false);
}

export const noThrow: Rule = {
  id: 'no-throw',
  description: "Flags throw statements unless the file declares '@allow throws'.",
  visitors: {
    ThrowStatement: (node, context) => {
      const { features } = context;
      if (!features.allowed.throws) {
        context.report({
          node,
          message: "Throw statements require '@allow throws' directive. Return a Result value instead",
        });
        return;
      }

      features.used.throws = true;
      if (isThrowable(child(node, 'argument'))) return;
      context.report({
        node,
        message: "Only Error instances can be thrown. Use 'throw new <Name>Error(...)' or rethrow a caught error",
      });
    },
  },
};
