import type { Rule } from '../types.js';

export const preferReadonlyArray: Rule = {
  id: 'prefer-readonly-array',
  description: 'Flags arrays that are never mutated. Type them as ReadonlyArray instead.',
  finish: (context) => {
    const { arrayVariables, mutatedArrays, readonlyArrays } = context.state;
    for (const [name, span] of arrayVariables) {
      if (mutatedArrays.has(name) || readonlyArrays.has(name)) continue;
      context.report({
        node: span,
        message: `Array '${name}' is never mutated. Consider using 'ReadonlyArray' or 'readonly' modifier`,
      });
    }
  },
};
