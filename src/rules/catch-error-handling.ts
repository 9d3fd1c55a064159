import { calleeMember, child, children, identifierName, stringField, type AstNode } from '../analysis/ast.js';
import type { Rule } from '../types.js';

/** `e instanceof Error` or `Error.isError(e)` */
function isErrorCheck(test: AstNode | undefined, param: string): boolean {
  if (!test) return false;

  if (test.type === 'BinaryExpression' && stringField(test, 'operator') === 'instanceof') {
    return identifierName(child(test, 'left')) === param && identifierName(child(test, 'right')) === 'Error';
  }

  if (test.type === 'CallExpression') {
    const member = calleeMember(test);
    const [argument] = children(test, 'arguments');
    return member?.objectName === 'Error' && member.propertyName === 'isError' && identifierName(argument) === param;
  }

  return false;
}

export const catchErrorHandling: Rule = {
  id: 'catch-error-handling',
  description: 'Requires catch clauses to bind the error and check its type first.',
  visitors: {
    CatchClause: (node, context) => {
      const param = child(node, 'param');
      if (!param) {
        context.report({ node, message: 'Catch clause must have an error parameter to handle errors properly' });
        return;
      }

      const body = child(node, 'body');
      const [first] = body ? children(body, 'body') : [];
      if (!first) {
        context.report({ node, message: 'Empty catch block is not allowed. Check the error type and handle it' });
        return;
      }

      const name = identifierName(param) ?? 'e';
      if (first.type === 'IfStatement' && isErrorCheck(child(first, 'test'), name)) return;
      context.report({
        node,
        message: `Catch block must check error type with 'if (${name} instanceof Error)' or 'if (Error.isError(${name}))' as its first statement`,
      });
    },
  },
};
