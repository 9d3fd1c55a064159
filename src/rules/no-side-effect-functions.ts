import { calleeMember, calleeName } from '../analysis/ast.js';
import type { Rule, RuleContext } from '../types.js';

const SIDE_EFFECT_MEMBERS: ReadonlyArray<readonly [string, string]> = [
  ['Math', 'random'],
  ['Date', 'now'],
];

export const TIMER_FUNCTIONS: ReadonlySet<string> = new Set([
  'setTimeout',
  'setInterval',
  'setImmediate',
  'requestAnimationFrame',
  'requestIdleCallback',
]);

function inFunctionBody(context: RuleContext): boolean {
  const { scope } = context.state;
  return scope.inFunction && !scope.inDefaultParameter;
}

function sideEffectMessage(usage: string): string {
  return `Direct use of '${usage}' is not allowed in functions. Pass it as a parameter or use a default parameter instead`;
}

export const noSideEffectFunctions: Rule = {
  id: 'no-side-effect-functions',
  description: 'Flags Math.random(), Date.now(), new Date() and timers inside function bodies.',
  visitors: {
    CallExpression: (node, context) => {
      if (!inFunctionBody(context)) return;

      const member = calleeMember(node);
      if (member) {
        const match = SIDE_EFFECT_MEMBERS.find(
          ([object, method]) => member.objectName === object && member.propertyName === method
        );
        if (match) context.report({ node, message: sideEffectMessage(`${match[0]}.${match[1]}()`) });
        return;
      }

      const name = calleeName(node);
      if (name !== undefined && TIMER_FUNCTIONS.has(name) && !context.features.allowed.timers) {
        context.report({ node, message: sideEffectMessage(`${name}()`) });
      }
    },
    NewExpression: (node, context) => {
      if (!inFunctionBody(context) || calleeName(node) !== 'Date') return;
      context.report({ node, message: sideEffectMessage('new Date()') });
    },
  },
};
