import { child, children, flag, identifierName, type AstNode } from '../analysis/ast.js';
import type { DirectoryKind } from '../classifier.js';
import type { FilePolicy, RuleContext } from '../types.js';

const MISSING_EXPORT: Readonly<Record<DirectoryKind, (name: string, stem: string) => string>> = {
  types: (name) => `types/**/*.ts must export a type named '${name}' matching the filename`,
  errors: (name) => `errors/**/*.ts must export a class named '${name}' matching the filename`,
  pure: (name) => `pure/**/*.ts must export a function named '${name}' matching the filename`,
  io: (name) => `io/**/*.ts must export a function named '${name}' matching the filename`,
  regular: (name, stem) => `File '${stem}' must export a function with the same name '${name}'`,
};

interface ExportCheck {
  context: RuleContext;
  statement: AstNode;
  expected: string;
  kind: DirectoryKind;
}

/** Returns whether the declaration exports the expected name. */
function checkDeclaration(declaration: AstNode, check: ExportCheck): boolean {
  const { context, statement, expected, kind } = check;
  const matchesByName = kind !== 'types' && kind !== 'errors';

  switch (declaration.type) {
    case 'FunctionDeclaration': {
      const name = identifierName(child(declaration, 'id'));
      if (name === undefined) return false;
      const isAsync = flag(declaration, 'async');
      if (kind === 'io' && !isAsync && !name.endsWith('Sync')) {
        context.report({ node: statement, message: `IO function '${name}' must be async or end with 'Sync'` });
      }
      if (kind === 'pure' && isAsync) {
        context.report({ node: statement, message: `Pure function '${name}' cannot be async` });
      }
      if (name === expected) return true;
      if (matchesByName) {
        context.report({
          node: statement,
          message: `Exported function '${name}' must match filename '${expected}'`,
        });
      }
      return false;
    }
    case 'VariableDeclaration': {
      let matched = false;
      for (const declarator of children(declaration, 'declarations')) {
        const name = identifierName(child(declarator, 'id'));
        if (name === undefined) continue;
        if (name === expected) matched = true;
        else if (matchesByName) {
          context.report({
            node: statement,
            message: `Exported variable '${name}' must match filename '${expected}'`,
          });
        }
      }
      return matched;
    }
    case 'TSTypeAliasDeclaration':
    case 'TSInterfaceDeclaration': {
      const name = identifierName(child(declaration, 'id')) ?? '';
      const isAlias = declaration.type === 'TSTypeAliasDeclaration';
      if (kind === 'types') {
        if (name === expected) return true;
        context.report({
          node: statement,
          message: `${isAlias ? 'Type' : 'Interface'} export must be named '${expected}' to match the filename`,
        });
      } else if (name !== expected) {
        context.report({
          node: statement,
          message: `Exported ${isAlias ? 'type' : 'interface'} '${name}' must match filename '${expected}'`,
        });
      }
      return false;
    }
    case 'ClassDeclaration': {
      if (kind !== 'errors') return false;
      const name = identifierName(child(declaration, 'id'));
      if (name === undefined) return false;
      if (name === expected) return true;
      context.report({ node: statement, message: `Error class must be named '${expected}' to match filename` });
      return false;
    }
    default:
      return false;
  }
}

export const strictNamedExport: FilePolicy = {
  id: 'strict-named-export',
  description: 'Requires a single named export matching the file name, shaped by the directory it lives in.',
  check: (program, context) => {
    const { traits } = context;
    if (traits.stem === 'index' || traits.isTestFile || traits.isMainEntry || traits.isEntryPoint) return;

    const expected = traits.stem.replace(/^_/, '');
    const kind = traits.directoryKind;
    let exportCount = 0;
    let foundMatchingExport = false;

    for (const statement of children(program, 'body')) {
      if (statement.type === 'ExportDefaultDeclaration') {
        context.report({
          node: statement,
          message: 'Export default is not allowed. Use named export matching the filename',
        });
        continue;
      }
      if (statement.type !== 'ExportNamedDeclaration') continue;

      exportCount += 1;
      const declaration = child(statement, 'declaration');
      if (declaration && checkDeclaration(declaration, { context, statement, expected, kind })) {
        foundMatchingExport = true;
      }

      if (!declaration && !child(statement, 'source') && children(statement, 'specifiers').length > 0) {
        context.report({
          node: statement,
          message:
            "Export specifier syntax 'export { }' is not allowed. Use direct export declarations like 'export function' or 'export type'",
        });
      }
    }

    if (exportCount > 0 && !foundMatchingExport) {
      context.report({ node: { start: 0, end: 0 }, message: MISSING_EXPORT[kind](expected, traits.stem) });
    }
  },
};
