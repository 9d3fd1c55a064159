import { child, children, identifierName, isFunctionLike, unwrapParens, type AstNode } from './ast.js';

/**
 * A function that has a name a reader can refer to: a named function, a
 * function bound to a variable, or a default export.
 */
export interface FunctionSite {
  name: string;
  fn: AstNode;
  /** Node a doc comment must sit directly above. */
  anchor: AstNode;
}

/** Node types that may introduce a function site. */
export const FUNCTION_SITE_TYPES = [
  'FunctionDeclaration',
  'FunctionExpression',
  'VariableDeclaration',
  'ExportDefaultDeclaration',
] as const;

function anchorFor(node: AstNode, parent: AstNode | null): AstNode {
  if (parent?.type === 'ExportNamedDeclaration' || parent?.type === 'ExportDefaultDeclaration') return parent;
  return node;
}

export function functionSites(node: AstNode, parent: AstNode | null): FunctionSite[] {
  switch (node.type) {
    case 'FunctionDeclaration': {
      const name =
        identifierName(child(node, 'id')) ?? (parent?.type === 'ExportDefaultDeclaration' ? 'default' : undefined);
      return name === undefined ? [] : [{ name, fn: node, anchor: anchorFor(node, parent) }];
    }
    case 'FunctionExpression': {
      // Bound expressions are reported through their declaration
      if (parent?.type === 'VariableDeclarator' || parent?.type === 'ExportDefaultDeclaration') return [];
      const name = identifierName(child(node, 'id'));
      return name === undefined ? [] : [{ name, fn: node, anchor: node }];
    }
    case 'VariableDeclaration':
      return children(node, 'declarations').flatMap((declarator) => {
        const name = identifierName(child(declarator, 'id'));
        const init = child(declarator, 'init');
        if (name === undefined || !init || !isFunctionLike(init)) return [];
        return [{ name, fn: unwrapParens(init), anchor: anchorFor(node, parent) }];
      });
    case 'ExportDefaultDeclaration': {
      const declaration = child(node, 'declaration');
      if (!declaration) return [];
      const fn = unwrapParens(declaration);
      if (fn.type !== 'ArrowFunctionExpression' && fn.type !== 'FunctionExpression') return [];
      return [{ name: identifierName(child(fn, 'id')) ?? 'default', fn, anchor: node }];
    }
    default:
      return [];
  }
}
