import type { Rule } from '../types.js';

export const onePublicFunction: Rule = {
  id: 'one-public-function',
  description: 'Allows at most one exported function per file and nothing else.',
  finish: (context) => {
    const { exportedFunctions, exportedOther } = context.state;

    for (const { name, span } of exportedOther) {
      context.report({ node: span, message: `Only functions can be exported. Found non-function export: ${name}` });
    }
    for (const { name, span } of exportedFunctions.slice(1)) {
      context.report({
        node: span,
        message: `Only one function can be exported per file. Found additional export: ${name}`,
      });
    }
  },
};
