import { pathBasedRestrictions } from './path-based-restrictions.js';
import { strictNamedExport } from './strict-named-export.js';
import type { FilePolicy } from '../types.js';

export const allPolicies: readonly FilePolicy[] = [pathBasedRestrictions, strictNamedExport];

export { pathBasedRestrictions, strictNamedExport };
