import type { AstNode } from './analysis/ast.js';
import type { VisitorState } from './analysis/visitorState.js';
import type { FileTraits } from './classifier.js';
import type { FeatureGate } from './directives/allowFeatures.js';
import type { TestRunner } from './testRunner.js';

export const RULE_IDS = [
  'no-classes',
  'no-enums',
  'no-delete',
  'no-do-while',
  'no-getters-setters',
  'no-foreach',
  'no-eval-function',
  'no-require',
  'no-define-property',
  'no-object-assign',
  'no-member-assignments',
  'no-as-cast',
  'interface-extends-only',
  'no-mutable-record',
  'no-throw',
  'catch-error-handling',
  'no-namespace-imports',
  'node-import-style',
  'import-extensions',
  'no-http-imports',
  'forbidden-libraries',
  'no-reexports',
  'no-side-effect-functions',
  'no-this-in-functions',
  'no-global-process',
  'no-filename-dirname',
  'no-constant-condition',
  'switch-case-block',
  'no-unused-map',
  'let-requires-type',
  'empty-array-requires-type',
  'export-const-type-required',
  'no-dynamic-access',
  'prefer-readonly-array',
  'max-function-params',
  'no-top-level-side-effects',
  'export-requires-jsdoc',
  'jsdoc-param-match',
  'param-missing-type',
  'no-unused-variables',
  'no-unused-imports',
  'one-public-function',
  'allow-directives',
  'path-based-restrictions',
  'strict-named-export',
  'unused-expect-error',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export function isRuleId(value: string): value is RuleId {
  return RULE_IDS.some((id) => id === value);
}

/** Half-open offsets into the source text. */
export interface Span {
  start: number;
  end: number;
}

export interface Diagnostic {
  ruleId: RuleId;
  filePath: string;
  message: string;
  span: Span;
  line: number;
  column: number;
}

export interface RuleContext {
  filePath: string;
  source: string;
  traits: FileTraits;
  testRunner: TestRunner | undefined;
  state: VisitorState;
  features: FeatureGate;
  /** Text of the `/** *\/` block that ends right before `offset`, if any. */
  docCommentBefore: (offset: number) => string | undefined;
  report: (info: { node: Span; message: string }) => void;
}

export type NodeCheck = (node: AstNode, context: RuleContext, parent: AstNode | null) => void;

/**
 * A rule registers checks per node type. `IdentifierReference` is dispatched
 * for identifiers read as values, on top of their `Identifier` dispatch.
 * `finish` runs once the whole tree has been walked.
 */
export interface Rule {
  id: RuleId;
  description: string;
  visitors?: Readonly<Record<string, NodeCheck>>;
  finish?: (context: RuleContext) => void;
}

/** A check over a file's path and top-level statements, run once per file. */
export interface FilePolicy {
  id: RuleId;
  description: string;
  check: (program: AstNode, context: RuleContext) => void;
}
