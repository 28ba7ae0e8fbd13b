/**
 * @arch shiftmap.core.types
 *
 * Node and edge model of the solution dependency graph.
 */

/**
 * Node kinds, in the order getNode() searches them.
 */
export const NODE_KINDS = ['solution', 'project', 'file', 'type', 'package', 'namespace'] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

/**
 * Project classification.
 */
export type ProjectType = 'library' | 'executable' | 'gui' | 'web_api' | 'test' | 'other';

/**
 * File content classification.
 */
export type FileType = 'source' | 'markup' | 'data' | 'other';

/**
 * Kind of a declared type.
 */
export type TypeKind = 'class' | 'interface' | 'record' | 'struct' | 'enum' | 'delegate';

/**
 * Root of one codebase tree. Single-project inputs get a virtual one.
 */
export interface SolutionNode {
  readonly kind: 'solution';
  readonly id: string;
  readonly path: string;
  readonly name: string;
}

export interface ProjectNode {
  readonly kind: 'project';
  readonly id: string;
  readonly path: string;
  readonly name: string;
  readonly rootNamespace?: string;
  readonly targetFramework?: string;
  readonly projectType: ProjectType;
}

export interface FileNode {
  readonly kind: 'file';
  readonly id: string;
  readonly path: string;
  /** Namespace declared in the file, if any */
  readonly namespace?: string;
  readonly fileType: FileType;
}

export interface TypeNode {
  readonly kind: 'type';
  readonly id: string;
  /** Fully-qualified name, e.g. "Acme.Billing.Invoice" */
  readonly fullName: string;
  readonly namespace: string;
  /** Simple name, e.g. "Invoice" */
  readonly name: string;
  readonly typeKind: TypeKind;
  /** Id of the declaring file */
  readonly fileId: string;
  readonly isPublic: boolean;
  readonly isPartial: boolean;
  readonly isStatic: boolean;
  readonly isAbstract: boolean;
}

/**
 * External package dependency.
 */
export interface PackageNode {
  readonly kind: 'package';
  readonly id: string;
  readonly packageId: string;
  readonly version?: string;
}

/**
 * Virtual grouping node, created the first time an edge needs it.
 */
export interface NamespaceNode {
  readonly kind: 'namespace';
  readonly id: string;
  readonly namespace: string;
}

export type GraphNode =
  | SolutionNode
  | ProjectNode
  | FileNode
  | TypeNode
  | PackageNode
  | NamespaceNode;

export interface NodeByKind {
  solution: SolutionNode;
  project: ProjectNode;
  file: FileNode;
  type: TypeNode;
  package: PackageNode;
  namespace: NamespaceNode;
}

// --- Edges ---

export const EDGE_KINDS = [
  'solution_contains_project',
  'project_contains_file',
  'project_reference',
  'package_reference',
  'file_contains_type',
  'file_uses_namespace',
  'type_in_namespace',
  'type_inherits',
  'type_implements',
  'type_usage',
] as const;

export type EdgeKind = (typeof EDGE_KINDS)[number];

/**
 * How one type uses another.
 */
export type TypeUsageKind =
  | 'field'
  | 'property'
  | 'method_parameter'
  | 'method_return'
  | 'local_variable'
  | 'generic_argument'
  | 'attribute'
  | 'base_type'
  | 'interface'
  | 'other';

interface EdgeBase<K extends EdgeKind> {
  readonly kind: K;
  /** Source node ID */
  readonly sourceId: string;
  /** Target node ID */
  readonly targetId: string;
}

export type SolutionContainsProjectEdge = EdgeBase<'solution_contains_project'>;
export type ProjectContainsFileEdge = EdgeBase<'project_contains_file'>;
export type ProjectReferenceEdge = EdgeBase<'project_reference'>;
export type PackageReferenceEdge = EdgeBase<'package_reference'>;
export type FileContainsTypeEdge = EdgeBase<'file_contains_type'>;
export type TypeInNamespaceEdge = EdgeBase<'type_in_namespace'>;
export type TypeInheritsEdge = EdgeBase<'type_inherits'>;
export type TypeImplementsEdge = EdgeBase<'type_implements'>;

export interface FileUsesNamespaceEdge extends EdgeBase<'file_uses_namespace'> {
  /** 1-based line of the using directive */
  readonly lineNumber: number;
}

export interface TypeUsageEdge extends EdgeBase<'type_usage'> {
  readonly usageKind: TypeUsageKind;
  readonly memberName?: string;
  readonly lineNumber?: number;
}

export type GraphEdge =
  | SolutionContainsProjectEdge
  | ProjectContainsFileEdge
  | ProjectReferenceEdge
  | PackageReferenceEdge
  | FileContainsTypeEdge
  | FileUsesNamespaceEdge
  | TypeInNamespaceEdge
  | TypeInheritsEdge
  | TypeImplementsEdge
  | TypeUsageEdge;

export type EdgeOfKind<K extends EdgeKind> = Extract<GraphEdge, { kind: K }>;

/**
 * Edge kinds that count as one type referencing another.
 */
export const TYPE_REFERENCE_EDGE_KINDS: ReadonlySet<EdgeKind> = new Set<EdgeKind>([
  'type_usage',
  'type_inherits',
  'type_implements',
]);

/**
 * Node and edge counts of a graph.
 */
export interface GraphStatistics {
  nodes: Record<NodeKind, number>;
  edges: Record<EdgeKind, number>;
  totalNodes: number;
  totalEdges: number;
}
