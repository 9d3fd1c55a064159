import {
  annotatedType,
  calleeMember,
  calleeName,
  child,
  children,
  flag,
  identifierName,
  isFunctionLike,
  parameterName,
  patternIdentifiers,
  stringLiteralValue,
  stringField,
  typeReferenceName,
  unwrapParens,
  type AstNode,
} from './ast.js';
import type { FileTraits } from '../classifier.js';
import type { Span } from '../types.js';

export interface ScopeFlags {
  inFunction: boolean;
  inCatchBlock: boolean;
  currentCatchParam: string | undefined;
  inDefaultParameter: boolean;
  /** Inside a destructured parameter, where nested defaults also count. */
  inParameterPattern: boolean;
}

export interface ExportEntry {
  name: string;
  span: Span;
}

/**
 * Everything the combined visitor learns about one file while walking it.
 * Created fresh per file and dropped once the post-pass has run.
 */
export interface VisitorState {
  scope: ScopeFlags;
  readonly isErrorFile: boolean;
  readonly exportedFunctions: ExportEntry[];
  readonly exportedOther: ExportEntry[];
  readonly exportedNames: Set<string>;
  readonly reexports: AstNode[];
  readonly declaredVars: Map<string, Span>;
  readonly importedVars: Map<string, Span>;
  /** Names read anywhere in the file, as a value or in a type position. */
  readonly usedNames: Set<string>;
  readonly arrayVariables: Map<string, Span>;
  readonly mutatedArrays: Set<string>;
  readonly readonlyArrays: Set<string>;
  readonly importedProcessNames: Set<string>;
  /** Identifier nodes that introduce a name rather than read one. */
  readonly bindings: WeakSet<AstNode>;
  readonly scopeStack: Array<{ owner: AstNode; saved: ScopeFlags }>;
}

export type ReferenceKind = 'value' | 'type';

export const MUTATING_ARRAY_METHODS: ReadonlySet<string> = new Set([
  'push',
  'pop',
  'shift',
  'unshift',
  'splice',
  'sort',
  'reverse',
  'fill',
  'copyWithin',
]);

const PROCESS_MODULES = new Set(['process', 'node:process']);

export function createVisitorState(traits: FileTraits): VisitorState {
  return {
    scope: {
      inFunction: false,
      inCatchBlock: false,
      currentCatchParam: undefined,
      inDefaultParameter: false,
      inParameterPattern: false,
    },
    isErrorFile: traits.isErrorFile,
    exportedFunctions: [],
    exportedOther: [],
    exportedNames: new Set(),
    reexports: [],
    declaredVars: new Map(),
    importedVars: new Map(),
    usedNames: new Set(),
    arrayVariables: new Map(),
    mutatedArrays: new Set(),
    readonlyArrays: new Set(),
    importedProcessNames: new Set(),
    bindings: new WeakSet(),
    scopeStack: [],
  };
}

function spanOf(node: AstNode): Span {
  return { start: node.start, end: node.end };
}

function classifyExportedDeclaration(state: VisitorState, statement: AstNode, declaration: AstNode): void {
  if (declaration.type === 'FunctionDeclaration') {
    const name = identifierName(child(declaration, 'id'));
    if (name === undefined) return;
    state.exportedFunctions.push({ name, span: spanOf(statement) });
    state.exportedNames.add(name);
    return;
  }

  if (declaration.type === 'VariableDeclaration') {
    for (const declarator of children(declaration, 'declarations')) {
      const name = identifierName(child(declarator, 'id'));
      if (name === undefined) continue;
      state.exportedNames.add(name);
      const target = isFunctionLike(child(declarator, 'init')) ? state.exportedFunctions : state.exportedOther;
      target.push({ name, span: spanOf(statement) });
    }
    return;
  }

  const name = identifierName(child(declaration, 'id'));
  if (name !== undefined) state.exportedNames.add(name);
}

/** Top-level pass: export shape, re-exports and `process` imports. */
export function collectTopLevel(state: VisitorState, program: AstNode): void {
  for (const statement of children(program, 'body')) {
    switch (statement.type) {
      case 'ImportDeclaration': {
        const source = stringLiteralValue(child(statement, 'source'));
        if (source === undefined || !PROCESS_MODULES.has(source)) break;
        for (const specifier of children(statement, 'specifiers')) {
          if (specifier.type === 'ImportNamespaceSpecifier') continue;
          const local = identifierName(child(specifier, 'local'));
          if (local !== undefined) state.importedProcessNames.add(local);
        }
        break;
      }
      case 'ExportNamedDeclaration': {
        if (child(statement, 'source')) state.reexports.push(statement);
        const declaration = child(statement, 'declaration');
        if (declaration) classifyExportedDeclaration(state, statement, declaration);
        break;
      }
      case 'ExportAllDeclaration':
        state.reexports.push(statement);
        break;
      case 'ExportDefaultDeclaration': {
        const declaration = child(statement, 'declaration');
        const target = isFunctionLike(declaration) ? state.exportedFunctions : state.exportedOther;
        target.push({ name: 'default', span: spanOf(statement) });
        break;
      }
    }
  }
}

function pushScope(state: VisitorState, owner: AstNode, next: Partial<ScopeFlags>): void {
  state.scopeStack.push({ owner, saved: state.scope });
  state.scope = { ...state.scope, ...next };
}

function isArrayType(type: AstNode | undefined): boolean {
  return type?.type === 'TSArrayType' || typeReferenceName(type) === 'Array';
}

function isReadonlyArrayType(type: AstNode | undefined): boolean {
  if (!type) return false;
  if (typeReferenceName(type) === 'ReadonlyArray') return true;
  return type.type === 'TSTypeOperator' && stringField(type, 'operator') === 'readonly';
}

function isArrayInitializer(init: AstNode): boolean {
  if (init.type === 'NewExpression' || init.type === 'CallExpression') {
    return calleeName(init) === 'Array' || calleeMember(init)?.objectName === 'Array';
  }
  return false;
}

function trackDeclarator(state: VisitorState, declarator: AstNode): void {
  const id = child(declarator, 'id');
  for (const binding of patternIdentifiers(id)) state.bindings.add(binding);

  const name = identifierName(id);
  if (!id || name === undefined) return;
  if (!state.declaredVars.has(name)) state.declaredVars.set(name, spanOf(declarator));

  const type = annotatedType(id);
  if (isArrayType(type)) state.arrayVariables.set(name, spanOf(declarator));
  else if (isReadonlyArrayType(type)) state.readonlyArrays.add(name);

  const rawInit = child(declarator, 'init');
  if (!rawInit) return;
  const init = unwrapParens(rawInit);
  if ((init.type === 'ArrayExpression' && !type) || isArrayInitializer(init)) {
    state.arrayVariables.set(name, spanOf(declarator));
  }
}

function trackParameters(state: VisitorState, fn: AstNode): void {
  // Arrow parameters are bindings but not unused-variable candidates
  const declares = fn.type !== 'ArrowFunctionExpression';
  for (const param of children(fn, 'params')) {
    for (const binding of patternIdentifiers(param)) state.bindings.add(binding);
    const name = declares ? parameterName(param) : undefined;
    if (name !== undefined && !state.declaredVars.has(name)) state.declaredVars.set(name, spanOf(param));
  }
}

function trackImport(state: VisitorState, declaration: AstNode): void {
  for (const specifier of children(declaration, 'specifiers')) {
    const local = identifierName(child(specifier, 'local'));
    if (local !== undefined) state.importedVars.set(local, spanOf(declaration));
  }
}

function trackMutation(state: VisitorState, node: AstNode): void {
  if (node.type === 'CallExpression') {
    const member = calleeMember(node);
    if (member?.objectName !== undefined && MUTATING_ARRAY_METHODS.has(member.propertyName)) {
      state.mutatedArrays.add(member.objectName);
    }
    return;
  }

  const left = child(node, 'left');
  if (left?.type === 'MemberExpression' && flag(left, 'computed')) {
    const object = child(left, 'object');
    const name = object ? identifierName(unwrapParens(object)) : undefined;
    if (name !== undefined) state.mutatedArrays.add(name);
  }
}

function isParameter(node: AstNode, parent: AstNode | null, key: string | null): boolean {
  if (!parent) return false;
  if (parent.type === 'TSParameterProperty') return child(parent, 'parameter') === node;
  return key === 'params' && isFunctionLike(parent);
}

/** Updates scope flags and per-file tables before any rule sees `node`. */
export function enterNode(state: VisitorState, node: AstNode, parent: AstNode | null, key: string | null): void {
  switch (node.type) {
    case 'FunctionDeclaration':
    case 'FunctionExpression':
    case 'ArrowFunctionExpression':
      trackParameters(state, node);
      pushScope(state, node, { inFunction: true, inDefaultParameter: false, inParameterPattern: false });
      return;
    case 'AssignmentPattern':
      if (isParameter(node, parent, key) || state.scope.inParameterPattern) {
        pushScope(state, node, { inDefaultParameter: true, inParameterPattern: true });
      }
      return;
    case 'ObjectPattern':
    case 'ArrayPattern':
    case 'RestElement':
      if (isParameter(node, parent, key)) pushScope(state, node, { inParameterPattern: true });
      return;
    case 'CatchClause': {
      const param = child(node, 'param');
      for (const binding of patternIdentifiers(param)) state.bindings.add(binding);
      pushScope(state, node, { inCatchBlock: true, currentCatchParam: identifierName(param) });
      return;
    }
    case 'VariableDeclarator':
      trackDeclarator(state, node);
      return;
    case 'ImportDeclaration':
      trackImport(state, node);
      return;
    case 'ExportNamedDeclaration':
      // `export { a } from './a.js'` names nothing local
      if (child(node, 'source')) {
        for (const specifier of children(node, 'specifiers')) {
          const local = child(specifier, 'local');
          if (local) state.bindings.add(local);
        }
      }
      return;
    case 'CallExpression':
    case 'AssignmentExpression':
      trackMutation(state, node);
      return;
    case 'Identifier': {
      const kind = referenceKind(state, node, parent, key);
      const name = identifierName(node);
      if (kind !== undefined && name !== undefined) state.usedNames.add(name);
      return;
    }
  }
}

export function leaveNode(state: VisitorState, node: AstNode): void {
  const top = state.scopeStack[state.scopeStack.length - 1];
  if (top && top.owner === node) {
    state.scopeStack.pop();
    state.scope = top.saved;
  }
}

/** Field positions that hold a name, never a reference. */
const NAME_POSITIONS: Readonly<Record<string, readonly string[]>> = {
  FunctionDeclaration: ['id'],
  FunctionExpression: ['id'],
  ClassDeclaration: ['id'],
  ClassExpression: ['id'],
  TSDeclareFunction: ['id', 'params'],
  TSTypeAliasDeclaration: ['id'],
  TSInterfaceDeclaration: ['id'],
  TSEnumDeclaration: ['id'],
  TSEnumMember: ['id'],
  TSModuleDeclaration: ['id'],
  TSTypeParameter: ['name'],
  TSIndexSignature: ['parameters'],
  TSFunctionType: ['params'],
  TSConstructorType: ['params'],
  TSCallSignatureDeclaration: ['params'],
  TSConstructSignatureDeclaration: ['params'],
  TSMethodSignature: ['params'],
  TSQualifiedName: ['right'],
  LabeledStatement: ['label'],
  BreakStatement: ['label'],
  ContinueStatement: ['label'],
  ImportSpecifier: ['imported', 'local'],
  ImportDefaultSpecifier: ['local'],
  ImportNamespaceSpecifier: ['local'],
  ImportAttribute: ['key'],
  ExportSpecifier: ['exported'],
  ExportAllDeclaration: ['exported'],
  MetaProperty: ['meta', 'property'],
};

/** Positions that are a name unless the node is `computed`. */
const KEY_POSITIONS: Readonly<Record<string, string>> = {
  MemberExpression: 'property',
  Property: 'key',
  MethodDefinition: 'key',
  PropertyDefinition: 'key',
  AccessorProperty: 'key',
  TSAbstractMethodDefinition: 'key',
  TSAbstractPropertyDefinition: 'key',
  TSAbstractAccessorProperty: 'key',
  TSPropertySignature: 'key',
  TSMethodSignature: 'key',
};

const TYPE_POSITIONS: Readonly<Record<string, string>> = {
  TSTypeReference: 'typeName',
  TSQualifiedName: 'left',
  TSTypeQuery: 'exprName',
  TSInterfaceHeritage: 'expression',
  TSClassImplements: 'expression',
  TSTypePredicate: 'parameterName',
};

/** How an `Identifier` node reads its name, or `undefined` when it only declares one. */
export function referenceKind(
  state: VisitorState,
  node: AstNode,
  parent: AstNode | null,
  key: string | null
): ReferenceKind | undefined {
  if (state.bindings.has(node)) return undefined;
  if (!parent || key === null) return 'value';
  if (NAME_POSITIONS[parent.type]?.includes(key)) return undefined;
  if (KEY_POSITIONS[parent.type] === key && !flag(parent, 'computed')) return undefined;
  if (TYPE_POSITIONS[parent.type] === key) return 'type';
  return 'value';
}
