import { annotatedType, child, children, identifierName, isFunctionLike, stringField, type AstNode } from '../analysis/ast.js';
import type { Rule } from '../types.js';

function bindingLabel(id: AstNode): string {
  if (id.type === 'ObjectPattern') return 'destructured object';
  if (id.type === 'ArrayPattern') return 'destructured array';
  return identifierName(id) ?? 'assignment pattern';
}

export const exportConstTypeRequired: Rule = {
  id: 'export-const-type-required',
  description: "Requires explicit types on exported constants and forbids 'export let'.",
  visitors: {
    ExportNamedDeclaration: (node, context) => {
      const declaration = child(node, 'declaration');
      if (declaration?.type !== 'VariableDeclaration') return;

      const kind = stringField(declaration, 'kind');
      if (kind === 'let') {
        context.report({
          node: declaration,
          message: "Export let is not allowed. Use 'export const' with explicit type",
        });
        return;
      }
      if (kind !== 'const') return;

      for (const declarator of children(declaration, 'declarations')) {
        const id = child(declarator, 'id');
        if (!id || annotatedType(id) || isFunctionLike(child(declarator, 'init'))) continue;
        context.report({
          node: declarator,
          message: `Export const '${bindingLabel(id)}' must have an explicit type`,
        });
      }
    },
  },
};
