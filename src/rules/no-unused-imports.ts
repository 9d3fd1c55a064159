import type { Rule } from '../types.js';

export const noUnusedImports: Rule = {
  id: 'no-unused-imports',
  description: 'Flags imported bindings that are never referenced.',
  finish: (context) => {
    const { importedVars, usedNames } = context.state;
    for (const [name, span] of importedVars) {
      if (name.startsWith('_') || usedNames.has(name)) continue;
      context.report({ node: span, message: `Import '${name}' is declared but never used` });
    }
  },
};
