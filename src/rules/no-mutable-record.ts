import { annotatedType, child, children, typeReferenceName, unwrapParens } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const noMutableRecord: Rule = {
  id: 'no-mutable-record',
  description: 'Flags Record<K, V> variables initialized with {}. Use a Map instead.',
  visitors: {
    VariableDeclarator: (node, context) => {
      const id = child(node, 'id');
      const init = child(node, 'init');
      if (!id || !init || typeReferenceName(annotatedType(id)) !== 'Record') return;
      const value = unwrapParens(init);
      if (value.type !== 'ObjectExpression' || children(value, 'properties').length > 0) return;
      context.report({
        node,
        message: 'Mutable Record<K, V> = {} is not allowed. Use Map instead for mutable key-value collections',
      });
    },
  },
};
