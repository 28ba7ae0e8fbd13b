/**
 * @arch shiftmap.core.barrel
 */
export { ImpactAnalyzer } from './analyzer.js';
export type { ImpactAnalyzerOptions } from './analyzer.js';
export { calculateComplexity, COMPLEXITY_LABELS } from './complexity.js';
export {
  moveOperation,
  renameNamespaceOperation,
  deleteOperation,
  moveTypeOperation,
  describeOperation,
} from './operations.js';
export {
  ImpactReportCollector,
  summarizeImpactReport,
  renderImpactReportMarkdown,
} from './report.js';
export type {
  MoveOperation,
  RenameNamespaceOperation,
  DeleteOperation,
  MoveTypeOperation,
  MigrationOperation,
  MigrationOperationKind,
  MigrationComplexity,
  RequiredChangeType,
  RequiredChange,
  AffectedFileReason,
  AffectedFile,
  AffectedTypeReason,
  AffectedType,
  RequiredProjectReference,
  RequiredPackageReference,
  ImpactErrorCode,
  ImpactWarningCode,
  ImpactError,
  ImpactWarning,
  ImpactReport,
  ImpactSummary,
  ComplexityInput,
} from './types.js';
