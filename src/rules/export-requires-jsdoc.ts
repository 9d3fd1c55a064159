import { child, children, identifierName, isFunctionLike, unwrapParens } from '../analysis/ast.js';
import type { Rule, RuleContext } from '../types.js';

function hasDocComment(offset: number, context: RuleContext): boolean {
  return context.docCommentBefore(offset) !== undefined;
}

export const exportRequiresJsdoc: Rule = {
  id: 'export-requires-jsdoc',
  description: 'Requires a /** */ comment above exported functions, and above exported types and error classes.',
  visitors: {
    ExportNamedDeclaration: (node, context) => {
      const declaration = child(node, 'declaration');
      if (!declaration || hasDocComment(node.start, context)) return;
      const { traits } = context;
      const name = identifierName(child(declaration, 'id'));

      switch (declaration.type) {
        case 'FunctionDeclaration':
          context.report({ node, message: `Exported function '${name ?? 'anonymous'}' must have a JSDoc comment` });
          return;
        case 'VariableDeclaration': {
          const bound = children(declaration, 'declarations').find((declarator) =>
            isFunctionLike(child(declarator, 'init'))
          );
          if (!bound) return;
          const boundName = identifierName(child(bound, 'id')) ?? 'anonymous';
          context.report({ node, message: `Exported function '${boundName}' must have a JSDoc comment` });
          return;
        }
        case 'TSTypeAliasDeclaration':
          if (traits.directoryKind !== 'types') return;
          context.report({ node, message: `Exported type '${name ?? ''}' must have a JSDoc comment` });
          return;
        case 'TSInterfaceDeclaration':
          if (traits.directoryKind !== 'types') return;
          context.report({ node, message: `Exported interface '${name ?? ''}' must have a JSDoc comment` });
          return;
        case 'ClassDeclaration':
          if (!traits.isErrorFile || !traits.stem.endsWith('Error')) return;
          context.report({
            node,
            message: `Exported error class '${name ?? 'anonymous'}' must have a JSDoc comment`,
          });
          return;
      }
    },
    ExportDefaultDeclaration: (node, context) => {
      const declaration = child(node, 'declaration');
      if (!declaration || !isFunctionLike(declaration) || hasDocComment(node.start, context)) return;
      const name = identifierName(child(unwrapParens(declaration), 'id')) ?? 'anonymous';
      context.report({ node, message: `Exported function '${name}' must have a JSDoc comment` });
    },
  },
};
