/**
 * @arch shiftmap.core.domain
 *
 * Edge constructors and helpers.
 */
import type {
  EdgeKind,
  EdgeOfKind,
  FileUsesNamespaceEdge,
  GraphEdge,
  TypeUsageEdge,
  TypeUsageKind,
} from './types.js';

export function solutionContainsProject(solutionId: string, projectId: string): EdgeOfKind<'solution_contains_project'> {
  return { kind: 'solution_contains_project', sourceId: solutionId, targetId: projectId };
}

export function projectContainsFile(projectId: string, fileId: string): EdgeOfKind<'project_contains_file'> {
  return { kind: 'project_contains_file', sourceId: projectId, targetId: fileId };
}

export function projectReference(projectId: string, referencedProjectId: string): EdgeOfKind<'project_reference'> {
  return { kind: 'project_reference', sourceId: projectId, targetId: referencedProjectId };
}

export function packageReference(projectId: string, packageNodeId: string): EdgeOfKind<'package_reference'> {
  return { kind: 'package_reference', sourceId: projectId, targetId: packageNodeId };
}

export function fileContainsType(fileId: string, typeId: string): EdgeOfKind<'file_contains_type'> {
  return { kind: 'file_contains_type', sourceId: fileId, targetId: typeId };
}

export function fileUsesNamespace(fileId: string, namespaceId: string, lineNumber: number): FileUsesNamespaceEdge {
  return { kind: 'file_uses_namespace', sourceId: fileId, targetId: namespaceId, lineNumber };
}

export function typeInNamespace(typeId: string, namespaceId: string): EdgeOfKind<'type_in_namespace'> {
  return { kind: 'type_in_namespace', sourceId: typeId, targetId: namespaceId };
}

export function typeInherits(typeId: string, baseTypeRefId: string): EdgeOfKind<'type_inherits'> {
  return { kind: 'type_inherits', sourceId: typeId, targetId: baseTypeRefId };
}

export function typeImplements(typeId: string, interfaceRefId: string): EdgeOfKind<'type_implements'> {
  return { kind: 'type_implements', sourceId: typeId, targetId: interfaceRefId };
}

export function typeUsage(
  typeId: string,
  usedTypeRefId: string,
  usageKind: TypeUsageKind,
  details: { memberName?: string; lineNumber?: number } = {}
): TypeUsageEdge {
  return {
    kind: 'type_usage',
    sourceId: typeId,
    targetId: usedTypeRefId,
    usageKind,
    ...(details.memberName !== undefined ? { memberName: details.memberName } : {}),
    ...(details.lineNumber !== undefined ? { lineNumber: details.lineNumber } : {}),
  };
}

/**
 * Type guard factory for filtering edges by kind.
 */
export function isEdgeOfKind<K extends EdgeKind>(kind: K) {
  return (edge: GraphEdge): edge is EdgeOfKind<K> => edge.kind === kind;
}

const USAGE_DESCRIPTIONS: Record<TypeUsageKind, string> = {
  field: 'has field of type',
  property: 'has property of type',
  method_parameter: 'has method parameter of type',
  method_return: 'returns',
  local_variable: 'uses locally',
  generic_argument: 'uses as generic argument',
  attribute: 'has attribute',
  base_type: 'inherits from',
  interface: 'implements',
  other: 'uses',
};

/**
 * Human-readable description of the relationship an edge records.
 */
export function describeEdge(edge: GraphEdge): string {
  switch (edge.kind) {
    case 'solution_contains_project':
    case 'project_contains_file':
      return 'contains';
    case 'project_reference':
      return 'references project';
    case 'package_reference':
      return 'references package';
    case 'file_contains_type':
      return 'defines';
    case 'file_uses_namespace':
      return 'uses namespace';
    case 'type_in_namespace':
      return 'is in namespace';
    case 'type_inherits':
      return 'inherits';
    case 'type_implements':
      return 'implements';
    case 'type_usage':
      return USAGE_DESCRIPTIONS[edge.usageKind];
  }
}

/**
 * Structural equality of two edges, payload included.
 */
export function edgesEqual(a: GraphEdge, b: GraphEdge): boolean {
  if (a.kind !== b.kind || a.sourceId !== b.sourceId || a.targetId !== b.targetId) {
    return false;
  }
  if (a.kind === 'file_uses_namespace' && b.kind === 'file_uses_namespace') {
    return a.lineNumber === b.lineNumber;
  }
  if (a.kind === 'type_usage' && b.kind === 'type_usage') {
    return a.usageKind === b.usageKind
      && a.memberName === b.memberName
      && a.lineNumber === b.lineNumber;
  }
  return true;
}
