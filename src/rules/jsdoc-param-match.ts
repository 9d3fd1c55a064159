import { children, parameterName } from '../analysis/ast.js';
import { FUNCTION_SITE_TYPES, functionSites, type FunctionSite } from '../analysis/functionSites.js';
import type { NodeCheck, Rule, RuleContext } from '../types.js';

/**
 * Names from `@param` tags, accepting `@param name`, `@param {T} name`,
 * `@param [name]` and `@param [name=default]`. Nested `a.b` tags describe
 * a field of a parameter and are skipped.
 */
export function parseParamTags(doc: string): string[] {
  const names: string[] = [];
  for (const rawLine of doc.split('\n')) {
    const line = rawLine.trim().replace(/^\*+/, '').trim();
    if (!line.startsWith('@param')) continue;

    let rest = line.slice('@param'.length).trim();
    if (rest.startsWith('{')) {
      const close = rest.indexOf('}');
      rest = close === -1 ? '' : rest.slice(close + 1).trim();
    }
    const [token = ''] = rest.split(/\s+/);
    const name = token.replace(/^\[/, '').replace(/\]$/, '').replace(/=.*$/, '');
    if (name !== '' && !name.includes('.')) names.push(name);
  }
  return names;
}

function checkSite(site: FunctionSite, context: RuleContext): void {
  const params = children(site.fn, 'params');
  if (params.length === 0) return;
  const doc = context.docCommentBefore(site.anchor.start);
  if (doc === undefined) return;
  const tags = parseParamTags(doc);
  if (tags.length === 0) return;

  const names: string[] = [];
  for (const param of params) {
    const name = parameterName(param);
    if (name === undefined) continue;
    names.push(name);
    if (!tags.includes(name)) {
      context.report({
        node: param,
        message: `JSDoc @param tag missing for parameter '${name}' in function '${site.name}'`,
      });
    }
  }

  for (const tag of tags) {
    if (names.includes(tag)) continue;
    context.report({
      node: site.fn,
      message: `JSDoc @param '${tag}' does not match any parameter in function '${site.name}'`,
    });
  }

  if (tags.length !== params.length) {
    context.report({
      node: site.fn,
      message: `JSDoc has ${tags.length} @param tags but function '${site.name}' has ${params.length} parameters`,
    });
  }
}

const checkSites: NodeCheck = (node, context, parent) => {
  for (const site of functionSites(node, parent)) checkSite(site, context);
};

export const jsdocParamMatch: Rule = {
  id: 'jsdoc-param-match',
  description: 'Requires @param tags to match the documented function parameters.',
  visitors: Object.fromEntries(FUNCTION_SITE_TYPES.map((type) => [type, checkSites])),
};
