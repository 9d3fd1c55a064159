import { allowDirectives } from './allow-directives.js';
import { catchErrorHandling } from './catch-error-handling.js';
import { emptyArrayRequiresType } from './empty-array-requires-type.js';
import { exportConstTypeRequired } from './export-const-type-required.js';
import { exportRequiresJsdoc } from './export-requires-jsdoc.js';
import { forbiddenLibraries } from './forbidden-libraries.js';
import { importExtensions } from './import-extensions.js';
import { interfaceExtendsOnly } from './interface-extends-only.js';
import { jsdocParamMatch } from './jsdoc-param-match.js';
import { letRequiresType } from './let-requires-type.js';
import { maxFunctionParams } from './max-function-params.js';
import { noAsCast } from './no-as-cast.js';
import { noClasses } from './no-classes.js';
import { noConstantCondition } from './no-constant-condition.js';
import { noDefineProperty } from './no-define-property.js';
import { noDelete } from './no-delete.js';
import { noDoWhile } from './no-do-while.js';
import { noDynamicAccess } from './no-dynamic-access.js';
import { noEnums } from './no-enums.js';
import { noEvalFunction } from './no-eval-function.js';
import { noFilenameDirname } from './no-filename-dirname.js';
import { noForeach } from './no-foreach.js';
import { noGettersSetters } from './no-getters-setters.js';
import { noGlobalProcess } from './no-global-process.js';
import { noHttpImports } from './no-http-imports.js';
import { noMemberAssignments } from './no-member-assignments.js';
import { noMutableRecord } from './no-mutable-record.js';
import { noNamespaceImports } from './no-namespace-imports.js';
import { noObjectAssign } from './no-object-assign.js';
import { noReexports } from './no-reexports.js';
import { noRequire } from './no-require.js';
import { noSideEffectFunctions } from './no-side-effect-functions.js';
import { noThisInFunctions } from './no-this-in-functions.js';
import { noThrow } from './no-throw.js';
import { noTopLevelSideEffects } from './no-top-level-side-effects.js';
import { noUnusedImports } from './no-unused-imports.js';
import { noUnusedMap } from './no-unused-map.js';
import { noUnusedVariables } from './no-unused-variables.js';
import { nodeImportStyle } from './node-import-style.js';
import { onePublicFunction } from './one-public-function.js';
import { paramMissingType } from './param-missing-type.js';
import { preferReadonlyArray } from './prefer-readonly-array.js';
import { switchCaseBlock } from './switch-case-block.js';
import type { Rule } from '../types.js';

/** Registry order is the order `finish` steps run in. */
export const allRules: readonly Rule[] = [
  // Banned constructs
  noClasses,
  noEnums,
  noDelete,
  noDoWhile,
  noGettersSetters,
  noForeach,
  noEvalFunction,
  noRequire,
  noDefineProperty,
  noObjectAssign,
  noMemberAssignments,
  noAsCast,
  interfaceExtendsOnly,
  noMutableRecord,
  // Throw / try
  noThrow,
  catchErrorHandling,
  // Imports
  noNamespaceImports,
  nodeImportStyle,
  importExtensions,
  noHttpImports,
  forbiddenLibraries,
  noReexports,
  // Side effects and scope
  noSideEffectFunctions,
  noThisInFunctions,
  noGlobalProcess,
  noFilenameDirname,
  // Literal and loop hygiene
  noConstantCondition,
  switchCaseBlock,
  noUnusedMap,
  // Declaration typing
  letRequiresType,
  emptyArrayRequiresType,
  exportConstTypeRequired,
  noDynamicAccess,
  preferReadonlyArray,
  // Function shape
  maxFunctionParams,
  noTopLevelSideEffects,
  exportRequiresJsdoc,
  jsdocParamMatch,
  paramMissingType,
  // Usage
  noUnusedVariables,
  noUnusedImports,
  onePublicFunction,
  allowDirectives,
];

export {
  allowDirectives,
  catchErrorHandling,
  emptyArrayRequiresType,
  exportConstTypeRequired,
  exportRequiresJsdoc,
  forbiddenLibraries,
  importExtensions,
  interfaceExtendsOnly,
  jsdocParamMatch,
  letRequiresType,
  maxFunctionParams,
  noAsCast,
  noClasses,
  noConstantCondition,
  noDefineProperty,
  noDelete,
  noDoWhile,
  noDynamicAccess,
  noEnums,
  noEvalFunction,
  noFilenameDirname,
  noForeach,
  noGettersSetters,
  noGlobalProcess,
  noHttpImports,
  noMemberAssignments,
  noMutableRecord,
  noNamespaceImports,
  noObjectAssign,
  noReexports,
  noRequire,
  noSideEffectFunctions,
  noThisInFunctions,
  noThrow,
  noTopLevelSideEffects,
  noUnusedImports,
  noUnusedMap,
  noUnusedVariables,
  nodeImportStyle,
  onePublicFunction,
  paramMissingType,
  preferReadonlyArray,
  switchCaseBlock,
};
