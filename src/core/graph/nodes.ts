/**
 * @arch shiftmap.core.domain
 *
 * Node id scheme and node helpers.
 */
import { getDirectoryName, getFileName, normalizePath } from '../../utils/paths.js';
import type { GraphNode, ProjectNode } from './types.js';

const TYPE_ID_PREFIX = 'type:';

export function solutionNodeId(solutionPath: string): string {
  return `sln:${normalizePath(solutionPath)}`;
}

export function projectNodeId(projectPath: string): string {
  return `proj:${normalizePath(projectPath)}`;
}

export function fileNodeId(filePath: string): string {
  return `file:${normalizePath(filePath)}`;
}

/**
 * Id every reference to a type points at (inherits, implements, usage).
 * Non-partial declarations use it as their own id.
 */
export function typeReferenceId(fullName: string): string {
  return `${TYPE_ID_PREFIX}${fullName}`;
}

/**
 * Full type name encoded in a type id, declaration or reference.
 */
export function fullNameFromTypeId(id: string): string | undefined {
  if (!id.startsWith(TYPE_ID_PREFIX)) return undefined;
  const rest = id.slice(TYPE_ID_PREFIX.length);
  const partSeparator = rest.indexOf('#');
  return partSeparator >= 0 ? rest.slice(0, partSeparator) : rest;
}

/**
 * Id of a type declaration. Each part of a partial type gets its own id
 * so sibling parts survive idempotent insertion.
 */
export function typeNodeId(fullName: string, partialFilePath?: string): string {
  return partialFilePath === undefined
    ? typeReferenceId(fullName)
    : `${typeReferenceId(fullName)}#${normalizePath(partialFilePath)}`;
}

export function packageNodeId(packageId: string): string {
  return `pkg:${packageId}`;
}

export function namespaceNodeId(namespace: string): string {
  return `ns:${namespace}`;
}

/**
 * Display name for UI/logging.
 */
export function getDisplayName(node: GraphNode): string {
  switch (node.kind) {
    case 'solution':
    case 'project':
      return node.name;
    case 'file':
      return getFileName(node.path);
    case 'type':
      return node.name;
    case 'package':
      return node.version !== undefined ? `${node.packageId} (${node.version})` : node.packageId;
    case 'namespace':
      return node.namespace;
  }
}

/**
 * Directory containing the project file.
 */
export function getProjectDirectory(project: ProjectNode): string {
  return getDirectoryName(project.path);
}
