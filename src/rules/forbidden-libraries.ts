import { calleeName, child, children, stringLiteralValue, type AstNode } from '../analysis/ast.js';
import type { Rule, RuleContext } from '../types.js';

const FORBIDDEN = new Set(['jquery', 'lodash', 'lodash/fp', 'underscore', 'rxjs']);

const REPLACEMENTS: Readonly<Record<string, string>> = {
  minimist: 'node:util parseArgs',
  yargs: 'node:util parseArgs',
};

function checkLibrary(source: string, node: AstNode, context: RuleContext): void {
  if (FORBIDDEN.has(source) || source.startsWith('lodash/')) {
    context.report({ node, message: `Library '${source}' is forbidden. Consider using modern alternatives` });
    return;
  }
  const replacement = REPLACEMENTS[source];
  if (replacement !== undefined) {
    context.report({
      node,
      message: `Library '${source}' has a better alternative. Use '${replacement}' instead`,
    });
  }
}

export const forbiddenLibraries: Rule = {
  id: 'forbidden-libraries',
  description: 'Flags imports of legacy utility libraries that have built-in or modern replacements.',
  visitors: {
    ImportDeclaration: (node, context) => {
      const source = stringLiteralValue(child(node, 'source'));
      if (source !== undefined) checkLibrary(source, node, context);
    },
    CallExpression: (node, context) => {
      if (calleeName(node) !== 'require') return;
      const [argument] = children(node, 'arguments');
      const source = stringLiteralValue(argument);
      if (source !== undefined) checkLibrary(source, node, context);
    },
  },
};
