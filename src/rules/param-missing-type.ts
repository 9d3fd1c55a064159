import { children, parameterHasType, parameterName } from '../analysis/ast.js';
import { FUNCTION_SITE_TYPES, functionSites } from '../analysis/functionSites.js';
import type { NodeCheck, Rule } from '../types.js';

const checkParams: NodeCheck = (node, context, parent) => {
  for (const site of functionSites(node, parent)) {
    for (const param of children(site.fn, 'params')) {
      // Defaults infer their type; destructured parameters are typed as a whole
      if (param.type !== 'Identifier' && param.type !== 'RestElement') continue;
      const name = parameterName(param);
      if (name === undefined || parameterHasType(param)) continue;
      context.report({ node: param, message: `Parameter '${name}' in function '${site.name}' must have a type` });
    }
  }
};

export const paramMissingType: Rule = {
  id: 'param-missing-type',
  description: 'Requires type annotations on the parameters of named functions.',
  visitors: Object.fromEntries(FUNCTION_SITE_TYPES.map((type) => [type, checkParams])),
};
