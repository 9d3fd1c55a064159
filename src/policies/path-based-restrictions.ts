import {
  calleeName,
  child,
  children,
  flag,
  identifierName,
  stringLiteralValue,
  type AstNode,
} from '../analysis/ast.js';
import { testedName } from '../classifier.js';
import { matchesImport, testRunners } from '../testRunner.js';
import type { FilePolicy, RuleContext, Span } from '../types.js';

const FILE_START: Span = { start: 0, end: 0 };
const TEST_CALLS = new Set(['describe', 'it', 'test', 'expect']);

function importSource(statement: AstNode): string {
  return stringLiteralValue(child(statement, 'source')) ?? '';
}

function exportedDeclaration(statement: AstNode): AstNode | undefined {
  return statement.type === 'ExportNamedDeclaration' ? child(statement, 'declaration') : undefined;
}

function checkTestRunnerImports(body: readonly AstNode[], context: RuleContext): void {
  const runner = context.testRunner ?? testRunners.vitest;
  const sources = body.filter((statement) => statement.type === 'ImportDeclaration').map(importSource);

  const otherRunner = Object.values(testRunners).find(
    (other) => other.name !== runner.name && sources.some((source) => matchesImport(other, source))
  );
  if (otherRunner) {
    context.report({
      node: FILE_START,
      message: `Test file should use '${runner.name}' but found imports for '${otherRunner.name}'`,
    });
    return;
  }

  if (sources.some((source) => matchesImport(runner, source))) return;
  const hasTestCode = body.some((statement) => {
    const expression = statement.type === 'ExpressionStatement' ? child(statement, 'expression') : undefined;
    const name = expression?.type === 'CallExpression' ? calleeName(expression) : undefined;
    return name !== undefined && TEST_CALLS.has(name);
  });
  if (hasTestCode) {
    context.report({ node: FILE_START, message: `Test file should import from '${runner.name}' test runner` });
  }
}

function importsTestedFunction(statement: AstNode, tested: string): boolean {
  return children(statement, 'specifiers').some((specifier) => {
    if (specifier.type === 'ImportSpecifier') return identifierName(child(specifier, 'imported')) === tested;
    if (specifier.type === 'ImportDefaultSpecifier') return importSource(statement).includes(tested);
    return false;
  });
}

function checkTestFile(body: readonly AstNode[], context: RuleContext): void {
  checkTestRunnerImports(body, context);

  const { basename } = context.traits;
  const tested = testedName(context.traits);
  if (tested === '') return;

  const imports = body.filter((statement) => statement.type === 'ImportDeclaration');
  if (imports.length === 0) {
    context.report({ node: FILE_START, message: `Test file '${basename}' must have at least one import statement` });
  } else if (!imports.some((statement) => importsTestedFunction(statement, tested))) {
    context.report({
      node: FILE_START,
      message: `Test file '${basename}' must import function '${tested}' from the module being tested`,
    });
  }
}

function checkIndexFile(body: readonly AstNode[], context: RuleContext): void {
  for (const statement of body) {
    switch (statement.type) {
      case 'ExportNamedDeclaration':
        if (!child(statement, 'source') && child(statement, 'declaration')) {
          context.report({
            node: statement,
            message: 'index.ts files can only contain re-exports, not direct exports',
          });
        }
        break;
      case 'ExportDefaultDeclaration':
        context.report({ node: statement, message: 'index.ts files can only contain re-exports, not default exports' });
        break;
      case 'FunctionDeclaration':
      case 'ClassDeclaration':
      case 'VariableDeclaration':
        context.report({ node: statement, message: 'index.ts files can only contain re-exports, not declarations' });
        break;
    }
  }
}

function checkErrorFile(body: readonly AstNode[], context: RuleContext): void {
  const { stem, basename } = context.traits;
  let foundMatchingClass = false;

  for (const statement of body) {
    const declaration = exportedDeclaration(statement);
    if (declaration?.type !== 'ClassDeclaration') continue;
    const name = identifierName(child(declaration, 'id'));
    if (name === undefined) continue;

    if (name === stem) {
      foundMatchingClass = true;
      if (identifierName(child(declaration, 'superClass')) !== 'Error') {
        context.report({ node: declaration, message: `Error class '${name}' must extend Error` });
      }
    } else if (name.endsWith('Error')) {
      context.report({ node: declaration, message: `Error class must be named '${stem}' to match filename` });
    }
  }

  if (!foundMatchingClass) {
    context.report({
      node: FILE_START,
      message: `Error file '${basename}' must export error class '${stem}' extending Error`,
    });
  }
}

function checkPureFile(body: readonly AstNode[], context: RuleContext): void {
  const { stem } = context.traits;

  for (const statement of body) {
    if (statement.type === 'ImportDeclaration' && importSource(statement).includes('/io/')) {
      context.report({
        node: statement,
        message: 'pure/**/*.ts files cannot import from io/**/*.ts (pure functions cannot depend on I/O)',
      });
    }
  }

  let exportCount = 0;
  let foundMatchingExport = false;
  for (const statement of body) {
    const declaration = exportedDeclaration(statement);
    const fn = declaration?.type === 'FunctionDeclaration' ? declaration : undefined;
    if (fn) {
      exportCount += 1;
      if (identifierName(child(fn, 'id')) === stem) foundMatchingExport = true;
    }
    const candidate = fn ?? (statement.type === 'FunctionDeclaration' ? statement : undefined);
    if (candidate && flag(candidate, 'async')) {
      context.report({ node: candidate, message: 'Functions in pure/**/*.ts cannot be async' });
    }
  }

  if (exportCount > 0 && !foundMatchingExport) {
    context.report({
      node: FILE_START,
      message: `pure/**/*.ts must export a function named '${stem}' matching the filename`,
    });
  }
}

const NON_TYPE_EXPORTS: Readonly<Record<string, string>> = {
  TSEnumDeclaration: 'enums',
  FunctionDeclaration: 'functions',
  ClassDeclaration: 'classes',
  VariableDeclaration: 'variables',
};

function checkTypesFile(body: readonly AstNode[], context: RuleContext): void {
  const { stem } = context.traits;
  const typeExports: Array<{ name: string; node: AstNode }> = [];

  for (const statement of body) {
    const declaration = exportedDeclaration(statement);
    if (!declaration) continue;

    if (declaration.type === 'TSTypeAliasDeclaration' || declaration.type === 'TSInterfaceDeclaration') {
      const name = identifierName(child(declaration, 'id'));
      if (name !== undefined) typeExports.push({ name, node: declaration });
      continue;
    }

    const kind = NON_TYPE_EXPORTS[declaration.type];
    if (kind !== undefined) {
      context.report({
        node: declaration,
        message: `types/**/*.ts should only export type definitions, not ${kind}`,
      });
    }
  }

  const [only] = typeExports;
  if (typeExports.length > 1) {
    for (const { name, node } of typeExports) {
      if (name === stem) continue;
      context.report({
        node,
        message: `types/**/*.ts should only export one type named '${stem}' matching the filename`,
      });
    }
  } else if (only && only.name !== stem) {
    context.report({ node: only.node, message: `Type export must be named '${stem}' to match the filename` });
  }
}

export const pathBasedRestrictions: FilePolicy = {
  id: 'path-based-restrictions',
  description: 'Applies directory conventions: test, index, errors, pure and types files.',
  check: (program, context) => {
    const { traits } = context;
    const body = children(program, 'body');

    // Test files follow their own conventions only
    if (traits.isTestFile) {
      checkTestFile(body, context);
      return;
    }

    const path = traits.normalizedPath;
    if (traits.stem === 'index') checkIndexFile(body, context);
    if (traits.isErrorFile) checkErrorFile(body, context);
    if (path.includes('/pure/')) checkPureFile(body, context);
    if (path.includes('/types/')) checkTypesFile(body, context);
  },
};
