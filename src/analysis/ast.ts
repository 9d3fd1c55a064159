/**
 * Typed access to the ESTree-shaped tree produced by oxc-parser.
 *
 * Nodes are read through guards rather than the parser's declared node
 * union, so rules can match on `type` and pull fields without casts.
 */
import type { Node as EstreeNode } from 'estree';
import { walk } from 'estree-walker';

export interface AstNode {
  readonly type: string;
  readonly start: number;
  readonly end: number;
  readonly [field: string]: unknown;
}

export function isNode(value: unknown): value is AstNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'start' in value &&
    typeof value.start === 'number' &&
    'end' in value &&
    typeof value.end === 'number'
  );
}

export function child(node: AstNode, key: string): AstNode | undefined {
  const value = node[key];
  return isNode(value) ? value : undefined;
}

export function children(node: AstNode, key: string): AstNode[] {
  const value = node[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isNode);
}

export function stringField(node: AstNode, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' ? value : undefined;
}

export function flag(node: AstNode, key: string): boolean {
  return node[key] === true;
}

export function identifierName(node: AstNode | undefined): string | undefined {
  if (!node || node.type !== 'Identifier') return undefined;
  return stringField(node, 'name');
}

/** Strips any number of `( ... )` wrappers. */
export function unwrapParens(node: AstNode): AstNode {
  let current = node;
  while (current.type === 'ParenthesizedExpression') {
    const inner = child(current, 'expression');
    if (!inner) break;
    current = inner;
  }
  return current;
}

const FUNCTION_TYPES = new Set(['FunctionDeclaration', 'FunctionExpression', 'ArrowFunctionExpression']);

export function isFunctionLike(node: AstNode | undefined): boolean {
  return node !== undefined && FUNCTION_TYPES.has(unwrapParens(node).type);
}

export function isStringLiteral(node: AstNode | undefined): node is AstNode & { value: string } {
  return node !== undefined && node.type === 'Literal' && typeof node.value === 'string';
}

export function stringLiteralValue(node: AstNode | undefined): string | undefined {
  return isStringLiteral(node) ? node.value : undefined;
}

export function isNumericLiteral(node: AstNode | undefined): boolean {
  return node !== undefined && node.type === 'Literal' && typeof node.value === 'number';
}

export function booleanLiteralValue(node: AstNode | undefined): boolean | undefined {
  if (!node) return undefined;
  const inner = unwrapParens(node);
  if (inner.type !== 'Literal') return undefined;
  return typeof inner.value === 'boolean' ? inner.value : undefined;
}

export interface StaticMember {
  object: AstNode;
  objectName: string | undefined;
  propertyName: string;
}

/** `a.b` (never `a[b]`), seen through a single optional-chain wrapper. */
export function staticMember(node: AstNode | undefined): StaticMember | undefined {
  if (!node) return undefined;
  const target = node.type === 'ChainExpression' ? child(node, 'expression') : node;
  if (!target || target.type !== 'MemberExpression' || flag(target, 'computed')) return undefined;
  const object = child(target, 'object');
  const propertyName = identifierName(child(target, 'property'));
  if (!object || propertyName === undefined) return undefined;
  return { object, objectName: identifierName(unwrapParens(object)), propertyName };
}

/** Name of the callee when it is a plain identifier: `foo(...)`. */
export function calleeName(call: AstNode): string | undefined {
  const callee = child(call, 'callee');
  return callee ? identifierName(unwrapParens(callee)) : undefined;
}

export function calleeMember(call: AstNode): StaticMember | undefined {
  return staticMember(child(call, 'callee'));
}

/** Binding name of a parameter, looking through defaults, rest and parameter properties. */
export function parameterName(param: AstNode): string | undefined {
  switch (param.type) {
    case 'Identifier':
      return identifierName(param);
    case 'AssignmentPattern':
      return identifierName(child(param, 'left'));
    case 'RestElement':
      return identifierName(child(param, 'argument'));
    case 'TSParameterProperty': {
      const inner = child(param, 'parameter');
      return inner ? parameterName(inner) : undefined;
    }
    default:
      return undefined;
  }
}

export function parameterHasType(param: AstNode): boolean {
  if (child(param, 'typeAnnotation')) return true;
  const inner = child(param, 'left') ?? child(param, 'argument') ?? child(param, 'parameter');
  return inner ? parameterHasType(inner) : false;
}

/** The type node inside a `: T` annotation, if any. */
export function annotatedType(node: AstNode): AstNode | undefined {
  const annotation = child(node, 'typeAnnotation');
  if (!annotation) return undefined;
  return annotation.type === 'TSTypeAnnotation' ? child(annotation, 'typeAnnotation') : annotation;
}

export function typeReferenceName(type: AstNode | undefined): string | undefined {
  if (!type || type.type !== 'TSTypeReference') return undefined;
  return identifierName(child(type, 'typeName'));
}

/** Every identifier bound by a declaration pattern. */
export function patternIdentifiers(pattern: AstNode | undefined): AstNode[] {
  if (!pattern) return [];
  switch (pattern.type) {
    case 'Identifier':
      return [pattern];
    case 'ObjectPattern':
      return children(pattern, 'properties').flatMap((property) =>
        property.type === 'RestElement'
          ? patternIdentifiers(child(property, 'argument'))
          : patternIdentifiers(child(property, 'value'))
      );
    case 'ArrayPattern':
      return children(pattern, 'elements').flatMap((element) => patternIdentifiers(element));
    case 'AssignmentPattern':
      return patternIdentifiers(child(pattern, 'left'));
    case 'RestElement':
      return patternIdentifiers(child(pattern, 'argument'));
    case 'TSParameterProperty':
      return patternIdentifiers(child(pattern, 'parameter'));
    default:
      return [];
  }
}

export interface AstVisitor {
  enter?: (node: AstNode, parent: AstNode | null, key: string | null) => void;
  leave?: (node: AstNode, parent: AstNode | null, key: string | null) => void;
}

function isEstreeNode(node: AstNode): node is AstNode & EstreeNode {
  return typeof node.type === 'string';
}

/** Depth-first `estree-walker` pass that hands rules only well-formed nodes. */
export function walkAst(root: AstNode, visitor: AstVisitor): void {
  if (!isEstreeNode(root)) return;
  const toAst = (value: EstreeNode | null): AstNode | null => (isNode(value) ? value : null);
  const toKey = (key: PropertyKey | null | undefined): string | null => (typeof key === 'string' ? key : null);

  walk(root, {
    enter(node, parent, key) {
      if (isNode(node)) visitor.enter?.(node, toAst(parent), toKey(key));
    },
    leave(node, parent, key) {
      if (isNode(node)) visitor.leave?.(node, toAst(parent), toKey(key));
    },
  });
}
