/**
 * @arch shiftmap.core.types
 *
 * Types for migration impact analysis.
 */

// --- Operations ---

export interface MoveOperation {
  kind: 'move';
  /** File or folder being moved */
  sourcePath: string;
  /** New file path, or new folder path for folder moves */
  targetPath: string;
  /** Namespace the moved code should declare */
  newNamespace?: string;
  isFolder: boolean;
}

export interface RenameNamespaceOperation {
  kind: 'rename_namespace';
  oldNamespace: string;
  newNamespace: string;
}

export interface DeleteOperation {
  kind: 'delete';
  path: string;
  /** Report references that would break as warnings instead of errors */
  force: boolean;
  isFolder: boolean;
}

export interface MoveTypeOperation {
  kind: 'move_type';
  typeFullName: string;
  newNamespace: string;
  /** Also relocate the declaring file */
  newFilePath?: string;
}

export type MigrationOperation =
  | MoveOperation
  | RenameNamespaceOperation
  | DeleteOperation
  | MoveTypeOperation;

export type MigrationOperationKind = MigrationOperation['kind'];

// --- Report entries ---

/**
 * Coarse risk classification of an operation.
 */
export type MigrationComplexity = 'simple' | 'medium' | 'complex' | 'very_complex';

export type RequiredChangeType =
  | 'update_using_directive'
  | 'add_using_directive'
  | 'remove_using_directive'
  | 'update_fully_qualified_name'
  | 'update_namespace'
  | 'update_project_reference'
  | 'move_file'
  | 'delete_file';

/**
 * One concrete edit an operation implies.
 */
export interface RequiredChange {
  type: RequiredChangeType;
  /** 1-based line, when known */
  lineNumber?: number;
  currentValue?: string;
  newValue?: string;
  description: string;
}

export type AffectedFileReason =
  | 'directly_moved'
  | 'directly_deleted'
  | 'contains_using_directive'
  | 'contains_namespace_declaration'
  | 'contains_fully_qualified_reference'
  | 'contains_inheritance'
  | 'contains_type_usage'
  | 'project_file_update';

export interface AffectedFile {
  filePath: string;
  /** Owning project, null when the file belongs to none */
  projectPath: string | null;
  reason: AffectedFileReason;
  requiredChanges: RequiredChange[];
}

export type AffectedTypeReason =
  | 'directly_moved'
  | 'directly_deleted'
  | 'namespace_changed'
  | 'references_moved_type'
  | 'inherits_from_moved_type'
  | 'implements_moved_interface';

export interface AffectedType {
  typeFullName: string;
  /** File the entry concerns, null when unknown */
  filePath: string | null;
  reason: AffectedTypeReason;
}

/**
 * A project reference that has to be added.
 */
export interface RequiredProjectReference {
  projectPath: string;
  referencePath: string;
  reason: string;
}

/**
 * A package reference that has to be added.
 */
export interface RequiredPackageReference {
  projectPath: string;
  packageId: string;
  version?: string;
  reason: string;
}

export type ImpactErrorCode = 'FILE_NOT_FOUND' | 'TARGET_EXISTS' | 'TYPE_NOT_FOUND' | 'TYPE_IN_USE';

export type ImpactWarningCode = 'PARTIAL_CLASS' | 'LARGE_FOLDER_MOVE' | 'BROKEN_REFERENCE' | 'NAMESPACE_EMPTY';

interface ImpactIssue<C extends string> {
  code: C;
  message: string;
  filePath?: string;
  lineNumber?: number;
}

/** Blocks the operation. */
export type ImpactError = ImpactIssue<ImpactErrorCode>;

/** Advisory only. */
export type ImpactWarning = ImpactIssue<ImpactWarningCode>;

// --- Report ---

export interface ImpactReport {
  /** The analyzed operation */
  operation: MigrationOperation;
  complexity: MigrationComplexity;
  /** True when there are no errors */
  canProceed: boolean;
  affectedFiles: AffectedFile[];
  affectedTypes: AffectedType[];
  requiredProjectReferences: RequiredProjectReference[];
  requiredPackageReferences: RequiredPackageReference[];
  warnings: ImpactWarning[];
  errors: ImpactError[];
}

/**
 * Counts shown in the report summary.
 */
export interface ImpactSummary {
  affectedFiles: number;
  affectedTypes: number;
  /** Distinct owning projects of the affected files */
  affectedProjects: number;
  /** Required changes across all affected files */
  requiredChanges: number;
}

/**
 * Dimensions the complexity classification is computed from.
 */
export interface ComplexityInput {
  affectedFileCount: number;
  affectedTypeCount: number;
  requiredProjectReferenceCount: number;
  affectedProjectCount: number;
  hasErrors: boolean;
}
