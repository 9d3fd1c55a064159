import type { Rule } from '../types.js';

export const noEnums: Rule = {
  id: 'no-enums',
  description: 'Flags enum declarations. Use a union of literal types instead.',
  visitors: {
    TSEnumDeclaration: (node, context) => {
      context.report({ node, message: 'Enums are not allowed in pure TypeScript subset' });
    },
  },
};
