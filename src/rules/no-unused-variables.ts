import type { Rule } from '../types.js';

export const noUnusedVariables: Rule = {
  id: 'no-unused-variables',
  description: 'Flags variables and function parameters that are never read.',
  finish: (context) => {
    const { declaredVars, usedNames, exportedNames } = context.state;
    for (const [name, span] of declaredVars) {
      if (name.startsWith('_') || usedNames.has(name) || exportedNames.has(name)) continue;
      context.report({ node: span, message: `Variable '${name}' is declared but never used` });
    }
  },
};
