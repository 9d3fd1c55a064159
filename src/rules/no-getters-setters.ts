import { stringField } from '../analysis/ast.js';
import type { NodeCheck, Rule } from '../types.js';

const checkAccessorKind: NodeCheck = (node, context) => {
  const kind = stringField(node, 'kind');
  if (kind === 'get') {
    context.report({ node, message: 'Getters are not allowed in pure TypeScript subset' });
  } else if (kind === 'set') {
    context.report({ node, message: 'Setters are not allowed in pure TypeScript subset' });
  }
};

const checkAccessorField: NodeCheck = (node, context) => {
  context.report({
    node,
    message: 'Accessor properties (get/set) are not allowed in pure TypeScript subset',
  });
};

export const noGettersSetters: Rule = {
  id: 'no-getters-setters',
  description: 'Flags get/set accessors on classes and object literals, and accessor fields.',
  visitors: {
    Property: checkAccessorKind,
    MethodDefinition: checkAccessorKind,
    TSAbstractMethodDefinition: checkAccessorKind,
    AccessorProperty: checkAccessorField,
    TSAbstractAccessorProperty: checkAccessorField,
  },
};
