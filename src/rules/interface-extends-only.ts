import { child, children, identifierName } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const interfaceExtendsOnly: Rule = {
  id: 'interface-extends-only',
  description: 'Flags interfaces that extend nothing. Use a type alias instead.',
  visitors: {
    TSInterfaceDeclaration: (node, context) => {
      if (children(node, 'extends').length > 0) return;
      const name = identifierName(child(node, 'id')) ?? '';
      context.report({
        node,
        message: `Interface '${name}' without extends is not allowed. Use 'type' instead`,
      });
    },
  },
};
