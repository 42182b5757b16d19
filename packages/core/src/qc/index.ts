export {
  flattenQc,
  flattenQcText,
  formatDiagnostic,
  splitArguments,
  stripTrailingComment,
  IncludeStack,
} from './qc-flattener.js';
export type {
  FlattenOptions,
  FlattenResult,
  FlattenState,
  MacroDefinition,
  MacroTable,
  QcDiagnostic,
  QcDirectiveKeyword,
} from './qc-flattener.js';
export { VariableEnvironment, isValidVariableName } from './variable-environment.js';
export type { DefineOutcome, SubstitutionResult } from './variable-environment.js';
export { evaluateCondition, isTruthy, parseNumber } from './condition.js';
export type { ComparisonOperator, ConditionResult } from './condition.js';
export { evaluateValueExpression, formatNumber } from './value-expression.js';
export { readQcIncludes, readQcMaterials, scanQcMaterials } from './qc-scanner.js';
export type { QcMaterialScan, QcScanOptions } from './qc-scanner.js';
export { QcError, QcFileNotFoundError, QcIncludeNotFoundError } from './errors.js';
