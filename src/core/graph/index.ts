/**
 * @arch shiftmap.core.barrel
 */
export { SolutionGraph, formatGraphStatistics } from './solution-graph.js';
export {
  solutionNodeId,
  projectNodeId,
  fileNodeId,
  typeNodeId,
  typeReferenceId,
  fullNameFromTypeId,
  packageNodeId,
  namespaceNodeId,
  getDisplayName,
  getProjectDirectory,
} from './nodes.js';
export {
  solutionContainsProject,
  projectContainsFile,
  projectReference,
  packageReference,
  fileContainsType,
  fileUsesNamespace,
  typeInNamespace,
  typeInherits,
  typeImplements,
  typeUsage,
  isEdgeOfKind,
  describeEdge,
  edgesEqual,
} from './edges.js';
export { NODE_KINDS, EDGE_KINDS, TYPE_REFERENCE_EDGE_KINDS } from './types.js';
export type {
  NodeKind,
  ProjectType,
  FileType,
  TypeKind,
  SolutionNode,
  ProjectNode,
  FileNode,
  TypeNode,
  PackageNode,
  NamespaceNode,
  GraphNode,
  NodeByKind,
  EdgeKind,
  TypeUsageKind,
  SolutionContainsProjectEdge,
  ProjectContainsFileEdge,
  ProjectReferenceEdge,
  PackageReferenceEdge,
  FileContainsTypeEdge,
  FileUsesNamespaceEdge,
  TypeInNamespaceEdge,
  TypeInheritsEdge,
  TypeImplementsEdge,
  TypeUsageEdge,
  GraphEdge,
  EdgeOfKind,
  GraphStatistics,
} from './types.js';
