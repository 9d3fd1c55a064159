import { booleanLiteralValue, calleeName, child, children, isFunctionLike, type AstNode } from '../analysis/ast.js';
import { isRegistrationCall } from '../testRunner.js';
import type { Rule, RuleContext } from '../types.js';

const LOOP_TYPES = new Set([
  'ForStatement',
  'ForInStatement',
  'ForOfStatement',
  'WhileStatement',
  'DoWhileStatement',
]);

function isIife(call: AstNode): boolean {
  return isFunctionLike(child(call, 'callee'));
}

function isAllowedCall(call: AstNode, context: RuleContext): boolean {
  if (isIife(call)) return true;
  if (context.traits.isMainEntry && calleeName(call) === 'main') return true;
  return context.testRunner !== undefined && isRegistrationCall(context.testRunner, call);
}

function expressionMessage(expression: AstNode, context: RuleContext): string | undefined {
  switch (expression.type) {
    case 'CallExpression':
      return isAllowedCall(expression, context) ? undefined : 'Top-level function calls are not allowed (side effects)';
    case 'AssignmentExpression':
      return 'Top-level assignments are not allowed (side effects)';
    case 'UpdateExpression':
      return 'Top-level update expressions are not allowed (side effects)';
    case 'NewExpression':
      return 'Top-level new expressions are not allowed (side effects)';
    default:
      return undefined;
  }
}

export const noTopLevelSideEffects: Rule = {
  id: 'no-top-level-side-effects',
  description: 'Flags calls, assignments, loops and conditionals at module scope.',
  visitors: {
    Program: (node, context) => {
      if (context.traits.isTestFile) return;

      for (const statement of children(node, 'body')) {
        if (statement.type === 'ExpressionStatement') {
          const expression = child(statement, 'expression');
          const message = expression ? expressionMessage(expression, context) : undefined;
          if (message !== undefined) context.report({ node: statement, message });
        } else if (LOOP_TYPES.has(statement.type)) {
          context.report({ node: statement, message: 'Top-level loops are not allowed (side effects)' });
        } else if (statement.type === 'IfStatement') {
          // `if (true)` is reported as a constant condition instead
          if (booleanLiteralValue(child(statement, 'test')) !== undefined) continue;
          context.report({ node: statement, message: 'Top-level if statements are not allowed (side effects)' });
        }
      }
    },
  },
};
