import { calleeMember, calleeName, identifierName, typeReferenceName } from '../analysis/ast.js';
import { unusedFeatures, type Feature } from '../directives/allowFeatures.js';
import type { Rule, RuleContext, Span } from '../types.js';

const TIMER_CALLS = new Set([
  'setTimeout',
  'setInterval',
  'setImmediate',
  'requestAnimationFrame',
  'requestIdleCallback',
  'clearTimeout',
  'clearInterval',
  'clearImmediate',
  'cancelAnimationFrame',
  'cancelIdleCallback',
]);

const DOM_GLOBALS = new Set([
  'document',
  'window',
  'navigator',
  'location',
  'localStorage',
  'sessionStorage',
  'history',
  'screen',
  'alert',
  'confirm',
  'prompt',
]);

const DOM_TYPES = new Set([
  'HTMLElement',
  'HTMLDivElement',
  'HTMLInputElement',
  'Document',
  'Window',
  'Navigator',
  'Location',
  'Element',
  'Node',
  'Event',
  'MouseEvent',
  'KeyboardEvent',
  'DOMParser',
  'XMLSerializer',
  'Storage',
]);

const NET_NAMES = new Set([
  'fetch',
  'XMLHttpRequest',
  'WebSocket',
  'EventSource',
  'ServiceWorker',
  'Response',
  'Request',
  'Headers',
  'RequestInit',
  'ServiceWorkerRegistration',
]);

/** Marks `feature` used when granted, reports `message` otherwise. */
function gate(context: RuleContext, feature: Feature, node: Span, message: string): void {
  const { features } = context;
  if (features.allowed[feature]) {
    features.used[feature] = true;
    return;
  }
  context.report({ node, message });
}

export const allowDirectives: Rule = {
  id: 'allow-directives',
  description: "Gates console, timers, DOM and network APIs behind '@allow' directives in the file header.",
  visitors: {
    CallExpression: (node, context) => {
      if (calleeMember(node)?.objectName === 'console') {
        gate(context, 'console', node, "Use of 'console' requires '@allow console' directive");
        return;
      }
      const name = calleeName(node);
      if (name !== undefined && TIMER_CALLS.has(name)) {
        gate(context, 'timers', node, `Use of '${name}' requires '@allow timers' directive`);
      }
    },
    IdentifierReference: (node, context) => {
      const name = identifierName(node);
      if (name === undefined) return;
      if (DOM_GLOBALS.has(name)) {
        gate(context, 'dom', node, `Access to '${name}' requires '@allow dom' directive`);
      } else if (NET_NAMES.has(name)) {
        gate(context, 'net', node, `Access to '${name}' requires '@allow net' directive`);
      }
    },
    TSTypeReference: (node, context) => {
      const name = typeReferenceName(node);
      if (name === undefined) return;
      if (DOM_TYPES.has(name)) {
        gate(context, 'dom', node, `Type '${name}' requires '@allow dom' directive`);
      } else if (NET_NAMES.has(name)) {
        gate(context, 'net', node, `Type '${name}' requires '@allow net' directive`);
      }
    },
    ThrowStatement: (_node, context) => {
      // Reporting belongs to no-throw; a granted throw still counts as a use
      if (context.features.allowed.throws) context.features.used.throws = true;
    },
  },
  finish: (context) => {
    for (const feature of unusedFeatures(context.features)) {
      context.report({ node: { start: 0, end: 0 }, message: `Unused '@allow ${feature}' directive` });
    }
  },
};
