import { annotatedType, child, children, identifierName, unwrapParens } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const emptyArrayRequiresType: Rule = {
  id: 'empty-array-requires-type',
  description: 'Requires a type annotation on variables initialized with [].',
  visitors: {
    VariableDeclarator: (node, context) => {
      const id = child(node, 'id');
      const init = child(node, 'init');
      const name = identifierName(id);
      if (!id || !init || name === undefined || annotatedType(id)) return;
      const value = unwrapParens(init);
      if (value.type !== 'ArrayExpression' || children(value, 'elements').length > 0) return;
      context.report({
        node,
        message: `Empty array '${name}' requires type annotation (e.g., const ${name}: Array<number> = [])`,
      });
    },
  },
};
