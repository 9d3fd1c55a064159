import { child, identifierName } from '../analysis/ast.js';
import type { NodeCheck, Rule } from '../types.js';

const checkClass: NodeCheck = (node, context) => {
  if (context.state.isErrorFile) return;
  if (identifierName(child(node, 'superClass')) === 'Error') return;
  context.report({ node, message: 'Classes are not allowed except when extending Error' });
};

export const noClasses: Rule = {
  id: 'no-classes',
  description: 'Flags class declarations and expressions. Only Error subclasses are allowed.',
  visitors: {
    ClassDeclaration: checkClass,
    ClassExpression: checkClass,
  },
};
