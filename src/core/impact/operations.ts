/**
 * @arch shiftmap.core.domain
 *
 * Operation constructors and descriptions.
 */
import { getFileName } from '../../utils/paths.js';
import type {
  DeleteOperation,
  MigrationOperation,
  MoveOperation,
  MoveTypeOperation,
  RenameNamespaceOperation,
} from './types.js';

export function moveOperation(
  sourcePath: string,
  targetPath: string,
  options: { newNamespace?: string; isFolder?: boolean } = {}
): MoveOperation {
  return {
    kind: 'move',
    sourcePath,
    targetPath,
    ...(options.newNamespace !== undefined ? { newNamespace: options.newNamespace } : {}),
    isFolder: options.isFolder ?? false,
  };
}

export function renameNamespaceOperation(oldNamespace: string, newNamespace: string): RenameNamespaceOperation {
  return { kind: 'rename_namespace', oldNamespace, newNamespace };
}

export function deleteOperation(
  path: string,
  options: { force?: boolean; isFolder?: boolean } = {}
): DeleteOperation {
  return {
    kind: 'delete',
    path,
    force: options.force ?? false,
    isFolder: options.isFolder ?? false,
  };
}

export function moveTypeOperation(
  typeFullName: string,
  newNamespace: string,
  newFilePath?: string
): MoveTypeOperation {
  return {
    kind: 'move_type',
    typeFullName,
    newNamespace,
    ...(newFilePath !== undefined ? { newFilePath } : {}),
  };
}

/**
 * One-line description, e.g. "Move Invoice.cs to src/Billing/Invoice.cs".
 */
export function describeOperation(operation: MigrationOperation): string {
  switch (operation.kind) {
    case 'move':
      return `Move ${getFileName(operation.sourcePath)} to ${operation.targetPath}`;
    case 'rename_namespace':
      return `Rename namespace ${operation.oldNamespace} to ${operation.newNamespace}`;
    case 'delete':
      return `Delete ${getFileName(operation.path)}`;
    case 'move_type':
      return `Move type ${operation.typeFullName} to ${operation.newNamespace}`;
  }
}
