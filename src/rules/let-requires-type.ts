import { annotatedType, child, children, identifierName, stringField } from '../analysis/ast.js';
import type { Rule } from '../types.js';

export const letRequiresType: Rule = {
  id: 'let-requires-type',
  description: "Requires a type annotation on 'let' declarations without an initializer.",
  visitors: {
    VariableDeclaration: (node, context, parent) => {
      if (stringField(node, 'kind') !== 'let') return;
      // `for (let x of xs)` binds from the iterable
      if (parent?.type === 'ForOfStatement' || parent?.type === 'ForInStatement') return;

      for (const declarator of children(node, 'declarations')) {
        const id = child(declarator, 'id');
        const name = identifierName(id);
        if (!id || name === undefined || annotatedType(id) || child(declarator, 'init')) continue;
        context.report({ node: declarator, message: `'let' declaration for '${name}' must have an explicit type` });
      }
    },
  },
};
