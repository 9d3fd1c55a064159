import { walkAst, type AstNode } from './ast.js';
import {
  collectTopLevel,
  createVisitorState,
  enterNode,
  leaveNode,
  referenceKind,
  type VisitorState,
} from './visitorState.js';
import type { FileTraits } from '../classifier.js';
import { createDiagnosticSink } from '../diagnostics.js';
import { createFeatureGate } from '../directives/allowFeatures.js';
import { parseDisableDirectives } from '../directives/disable.js';
import { parseExpectErrors } from '../directives/expectError.js';
import type { SourceComment } from '../parsers/typescript.js';
import type { TestRunner } from '../testRunner.js';
import type { Diagnostic, FilePolicy, NodeCheck, Rule, RuleContext, RuleId } from '../types.js';

export interface CheckProgramOptions {
  filePath: string;
  source: string;
  program: AstNode;
  comments: readonly SourceComment[];
  traits: FileTraits;
  testRunner: TestRunner | undefined;
  rules: readonly Rule[];
  policies: readonly FilePolicy[];
}

interface RegisteredCheck {
  ruleId: RuleId;
  check: NodeCheck;
  context: RuleContext;
}

/** Synthetic node type dispatched for identifiers read as values. */
export const IDENTIFIER_REFERENCE = 'IdentifierReference';

function findDocComment(source: string, comments: readonly SourceComment[], offset: number): string | undefined {
  let found: SourceComment | undefined;
  for (const comment of comments) {
    if (comment.end > offset) break;
    found = comment;
  }
  if (!found || found.type !== 'Block' || !found.value.startsWith('*')) return undefined;
  if (source.slice(found.end, offset).trim() !== '') return undefined;
  return found.value;
}

/**
 * Runs every rule and policy over one parsed file in a single walk and
 * returns the diagnostics that survive suppression, in emission order.
 */
export function checkProgram(options: CheckProgramOptions): Diagnostic[] {
  const { filePath, source, program, comments, traits, testRunner, rules, policies } = options;

  const sink = createDiagnosticSink({
    filePath,
    source,
    suppressions: parseDisableDirectives(source),
    expectations: parseExpectErrors(source),
  });
  const state: VisitorState = createVisitorState(traits);
  collectTopLevel(state, program);

  const features = createFeatureGate(source);
  const failed = new Set<RuleId>();

  const contextFor = (ruleId: RuleId): RuleContext => ({
    filePath,
    source,
    traits,
    testRunner,
    state,
    features,
    docCommentBefore: (offset) => findDocComment(source, comments, offset),
    report: ({ node, message }) => sink.addError(ruleId, message, node),
  });

  const safeRun = (ruleId: RuleId, run: () => void): void => {
    if (failed.has(ruleId)) return;
    try {
      run();
    } catch (err) {
      failed.add(ruleId);
      console.warn(
        `Warning: Rule "${ruleId}" threw while analyzing ${filePath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  };

  const dispatch = new Map<string, RegisteredCheck[]>();
  const contexts = new Map<RuleId, RuleContext>();
  for (const rule of rules) {
    const context = contextFor(rule.id);
    contexts.set(rule.id, context);
    for (const [nodeType, check] of Object.entries(rule.visitors ?? {})) {
      const registered = dispatch.get(nodeType) ?? [];
      registered.push({ ruleId: rule.id, check, context });
      dispatch.set(nodeType, registered);
    }
  }

  const run = (nodeType: string, node: AstNode, parent: AstNode | null): void => {
    for (const { ruleId, check, context } of dispatch.get(nodeType) ?? []) {
      safeRun(ruleId, () => check(node, context, parent));
    }
  };

  walkAst(program, {
    enter(node, parent, key) {
      enterNode(state, node, parent, key);
      run(node.type, node, parent);
      if (node.type === 'Identifier' && referenceKind(state, node, parent, key) === 'value') {
        run(IDENTIFIER_REFERENCE, node, parent);
      }
    },
    leave(node) {
      leaveNode(state, node);
    },
  });

  for (const policy of policies) {
    const context = contextFor(policy.id);
    safeRun(policy.id, () => policy.check(program, context));
  }

  for (const rule of rules) {
    const { finish } = rule;
    const context = contexts.get(rule.id);
    if (finish && context) safeRun(rule.id, () => finish(context));
  }

  sink.reportUntriggeredExpectations();
  return [...sink.diagnostics];
}
