/**
 * @arch shiftmap.core.engine
 *
 * In-memory dependency graph: one node arena per kind, an append-only edge
 * store indexed by source and target, and the derived queries used by impact
 * analysis. Populated once by the builder, then only read.
 */
import { isWithinFolder, pathKey } from '../../utils/paths.js';
import { edgesEqual, isEdgeOfKind } from './edges.js';
import {
  fullNameFromTypeId,
  getProjectDirectory,
  namespaceNodeId,
  packageNodeId,
  typeReferenceId,
} from './nodes.js';
import {
  EDGE_KINDS,
  NODE_KINDS,
  TYPE_REFERENCE_EDGE_KINDS,
} from './types.js';
import type {
  EdgeKind,
  EdgeOfKind,
  FileNode,
  FileUsesNamespaceEdge,
  GraphEdge,
  GraphNode,
  GraphStatistics,
  NamespaceNode,
  NodeByKind,
  NodeKind,
  PackageNode,
  ProjectNode,
  SolutionNode,
  TypeNode,
} from './types.js';

type NodeArenas = { [K in NodeKind]: Map<string, NodeByKind[K]> };

export class SolutionGraph {
  private readonly arenas: NodeArenas = {
    solution: new Map(),
    project: new Map(),
    file: new Map(),
    type: new Map(),
    package: new Map(),
    namespace: new Map(),
  };
  private readonly edgeList: GraphEdge[] = [];
  private readonly outgoing = new Map<string, GraphEdge[]>();
  private readonly incoming = new Map<string, GraphEdge[]>();

  // Secondary indexes, maintained on insert
  private readonly typesByFullName = new Map<string, TypeNode[]>();
  private readonly typesByNamespace = new Map<string, TypeNode[]>();
  private readonly filesByPath = new Map<string, FileNode>();
  private readonly projectsByPath = new Map<string, ProjectNode>();

  // --- Mutation ---

  /**
   * Insert a node into its kind's arena.
   * Returns false, leaving the graph unchanged, when the id already exists.
   */
  addNode(node: GraphNode): boolean {
    switch (node.kind) {
      case 'solution':
        return insert(this.arenas.solution, node);
      case 'project':
        if (!insert(this.arenas.project, node)) return false;
        if (!this.projectsByPath.has(pathKey(node.path))) {
          this.projectsByPath.set(pathKey(node.path), node);
        }
        return true;
      case 'file':
        if (!insert(this.arenas.file, node)) return false;
        if (!this.filesByPath.has(pathKey(node.path))) {
          this.filesByPath.set(pathKey(node.path), node);
        }
        return true;
      case 'type':
        if (!insert(this.arenas.type, node)) return false;
        appendTo(this.typesByFullName, node.fullName, node);
        appendTo(this.typesByNamespace, node.namespace, node);
        return true;
      case 'package':
        return insert(this.arenas.package, node);
      case 'namespace':
        return insert(this.arenas.namespace, node);
    }
  }

  /**
   * Append an edge. Duplicates are kept; see hasEdge().
   */
  addEdge(edge: GraphEdge): void {
    this.edgeList.push(edge);
    appendTo(this.outgoing, edge.sourceId, edge);
    appendTo(this.incoming, edge.targetId, edge);
  }

  /**
   * True when a structurally equal edge is already stored.
   */
  hasEdge(edge: GraphEdge): boolean {
    const candidates = this.outgoing.get(edge.sourceId);
    return candidates !== undefined && candidates.some((e) => edgesEqual(e, edge));
  }

  /**
   * Get the namespace node, creating it on first use.
   */
  ensureNamespace(namespace: string): NamespaceNode {
    const id = namespaceNodeId(namespace);
    const existing = this.arenas.namespace.get(id);
    if (existing) return existing;

    const node: NamespaceNode = { kind: 'namespace', id, namespace };
    this.arenas.namespace.set(id, node);
    return node;
  }

  /**
   * Get the package node, creating it on first use.
   * The version of the first reference wins.
   */
  ensurePackage(packageId: string, version?: string): PackageNode {
    const id = packageNodeId(packageId);
    const existing = this.arenas.package.get(id);
    if (existing) return existing;

    const node: PackageNode = version !== undefined
      ? { kind: 'package', id, packageId, version }
      : { kind: 'package', id, packageId };
    this.arenas.package.set(id, node);
    return node;
  }

  // --- Arenas ---

  get solutions(): ReadonlyMap<string, SolutionNode> {
    return this.arenas.solution;
  }

  get projects(): ReadonlyMap<string, ProjectNode> {
    return this.arenas.project;
  }

  get files(): ReadonlyMap<string, FileNode> {
    return this.arenas.file;
  }

  get types(): ReadonlyMap<string, TypeNode> {
    return this.arenas.type;
  }

  get packages(): ReadonlyMap<string, PackageNode> {
    return this.arenas.package;
  }

  get namespaces(): ReadonlyMap<string, NamespaceNode> {
    return this.arenas.namespace;
  }

  get edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  get nodeCount(): number {
    return NODE_KINDS.reduce((sum, kind) => sum + this.arenas[kind].size, 0);
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  /**
   * Look a node up by id, trying arenas in NODE_KINDS order.
   */
  getNode(id: string): GraphNode | undefined {
    return this.arenas.solution.get(id)
      ?? this.arenas.project.get(id)
      ?? this.arenas.file.get(id)
      ?? this.arenas.type.get(id)
      ?? this.arenas.package.get(id)
      ?? this.arenas.namespace.get(id);
  }

  getNodes<K extends NodeKind>(kind: K): NodeByKind[K][] {
    const arena: Map<string, NodeByKind[K]> = this.arenas[kind];
    return Array.from(arena.values());
  }

  // --- Edge traversal ---

  getOutgoingEdges(id: string): GraphEdge[] {
    return [...(this.outgoing.get(id) ?? [])];
  }

  getIncomingEdges(id: string): GraphEdge[] {
    return [...(this.incoming.get(id) ?? [])];
  }

  /**
   * Distinct nodes this node points at, over any edge kind.
   * Targets that resolve to no node are left out.
   */
  getDependencies(id: string): GraphNode[] {
    return this.resolveDistinct((this.outgoing.get(id) ?? []).map((e) => e.targetId));
  }

  /**
   * Distinct nodes pointing at this node, over any edge kind.
   */
  getDependents(id: string): GraphNode[] {
    return this.resolveDistinct((this.incoming.get(id) ?? []).map((e) => e.sourceId));
  }

  // --- Type queries ---

  getTypesInNamespace(namespace: string): TypeNode[] {
    return [...(this.typesByNamespace.get(namespace) ?? [])];
  }

  /**
   * All declarations (partial parts included) of a fully-qualified type name.
   */
  getTypesByFullName(fullName: string): TypeNode[] {
    return [...(this.typesByFullName.get(fullName) ?? [])];
  }

  /**
   * Find a type by full name, preferring a non-partial declaration.
   */
  findType(fullName: string): TypeNode | undefined {
    const declarations = this.typesByFullName.get(fullName);
    if (!declarations || declarations.length === 0) return undefined;
    return declarations.find((t) => !t.isPartial) ?? declarations[0];
  }

  /**
   * Types that use, inherit from or implement the given type.
   */
  getTypesReferencing(typeId: string): TypeNode[] {
    const target = this.arenas.type.get(typeId);
    if (!target) return [];

    const targetIds = new Set([typeId, typeReferenceId(target.fullName)]);
    const result = new Map<string, TypeNode>();
    for (const targetId of targetIds) {
      for (const edge of this.incoming.get(targetId) ?? []) {
        if (!TYPE_REFERENCE_EDGE_KINDS.has(edge.kind)) continue;
        const source = this.arenas.type.get(edge.sourceId);
        if (source && !result.has(source.id)) {
          result.set(source.id, source);
        }
      }
    }
    return Array.from(result.values());
  }

  /**
   * Types the given type uses, inherits from or implements.
   * A reference to a partial type yields every declaration part.
   */
  getTypesReferencedBy(typeId: string): TypeNode[] {
    const result = new Map<string, TypeNode>();
    for (const edge of this.outgoing.get(typeId) ?? []) {
      if (!TYPE_REFERENCE_EDGE_KINDS.has(edge.kind)) continue;
      for (const type of this.resolveTypeReference(edge.targetId)) {
        if (!result.has(type.id)) {
          result.set(type.id, type);
        }
      }
    }
    return Array.from(result.values());
  }

  /**
   * Distinct files owning a type returned by getTypesReferencing().
   */
  getFilesReferencingType(typeId: string): FileNode[] {
    const result = new Map<string, FileNode>();
    for (const type of this.getTypesReferencing(typeId)) {
      const file = this.getOwningFile(type);
      if (file && !result.has(file.id)) {
        result.set(file.id, file);
      }
    }
    return Array.from(result.values());
  }

  getFileContainingType(typeId: string): FileNode | undefined {
    const edge = (this.incoming.get(typeId) ?? []).find(isEdgeOfKind('file_contains_type'));
    return edge ? this.arenas.file.get(edge.sourceId) : undefined;
  }

  getTypesInFile(fileId: string): TypeNode[] {
    return this.outgoingOfKind(fileId, 'file_contains_type')
      .map((e) => this.arenas.type.get(e.targetId))
      .filter((t): t is TypeNode => t !== undefined);
  }

  // --- File and namespace queries ---

  /**
   * Distinct files with a using directive for the namespace.
   */
  getFilesUsingNamespace(namespace: string): FileNode[] {
    const result = new Map<string, FileNode>();
    for (const edge of this.incoming.get(namespaceNodeId(namespace)) ?? []) {
      if (edge.kind !== 'file_uses_namespace') continue;
      const file = this.arenas.file.get(edge.sourceId);
      if (file && !result.has(file.id)) {
        result.set(file.id, file);
      }
    }
    return Array.from(result.values());
  }

  /**
   * The first using directive of a file for the namespace, if any.
   */
  getUsingDirective(fileId: string, namespace: string): FileUsesNamespaceEdge | undefined {
    const namespaceId = namespaceNodeId(namespace);
    return this.outgoingOfKind(fileId, 'file_uses_namespace')
      .find((e) => e.targetId === namespaceId);
  }

  getFileByPath(filePath: string): FileNode | undefined {
    return this.filesByPath.get(pathKey(filePath));
  }

  /**
   * Files strictly inside the folder, in insertion order.
   */
  getFilesInFolder(folderPath: string): FileNode[] {
    return Array.from(this.arenas.file.values())
      .filter((file) => isWithinFolder(file.path, folderPath));
  }

  // --- Project queries ---

  getProjectContainingFile(fileId: string): ProjectNode | undefined {
    const edge = (this.incoming.get(fileId) ?? []).find(isEdgeOfKind('project_contains_file'));
    return edge ? this.arenas.project.get(edge.sourceId) : undefined;
  }

  getProjectByPath(projectPath: string): ProjectNode | undefined {
    return this.projectsByPath.get(pathKey(projectPath));
  }

  /**
   * Project whose directory is the closest ancestor of the path.
   */
  findProjectForPath(filePath: string): ProjectNode | undefined {
    let best: ProjectNode | undefined;
    let bestLength = -1;
    for (const project of this.arenas.project.values()) {
      const directory = getProjectDirectory(project);
      if (directory.length > bestLength && isWithinFolder(filePath, directory)) {
        best = project;
        bestLength = directory.length;
      }
    }
    return best;
  }

  getProjectDependencies(projectId: string): ProjectNode[] {
    return this.outgoingOfKind(projectId, 'project_reference')
      .map((e) => this.arenas.project.get(e.targetId))
      .filter((p): p is ProjectNode => p !== undefined);
  }

  getProjectsDependingOn(projectId: string): ProjectNode[] {
    return (this.incoming.get(projectId) ?? [])
      .filter(isEdgeOfKind('project_reference'))
      .map((e) => this.arenas.project.get(e.sourceId))
      .filter((p): p is ProjectNode => p !== undefined);
  }

  hasProjectReference(fromProjectId: string, toProjectId: string): boolean {
    return this.outgoingOfKind(fromProjectId, 'project_reference')
      .some((e) => e.targetId === toProjectId);
  }

  /**
   * True when a project_reference cycle is reachable from the project.
   * A self-reference counts as a cycle.
   */
  hasCyclicDependency(projectId: string): boolean {
    const visited = new Set<string>();
    const recursionStack = new Set<string>();

    const dfs = (id: string): boolean => {
      visited.add(id);
      recursionStack.add(id);

      for (const edge of this.outgoingOfKind(id, 'project_reference')) {
        if (recursionStack.has(edge.targetId)) {
          return true;
        }
        if (!visited.has(edge.targetId) && dfs(edge.targetId)) {
          return true;
        }
      }

      recursionStack.delete(id);
      return false;
    };

    return dfs(projectId);
  }

  // --- Statistics ---

  getStatistics(): GraphStatistics {
    const nodes: Record<NodeKind, number> = {
      solution: this.arenas.solution.size,
      project: this.arenas.project.size,
      file: this.arenas.file.size,
      type: this.arenas.type.size,
      package: this.arenas.package.size,
      namespace: this.arenas.namespace.size,
    };

    const edges: Record<EdgeKind, number> = {
      solution_contains_project: 0,
      project_contains_file: 0,
      project_reference: 0,
      package_reference: 0,
      file_contains_type: 0,
      file_uses_namespace: 0,
      type_in_namespace: 0,
      type_inherits: 0,
      type_implements: 0,
      type_usage: 0,
    };
    for (const edge of this.edgeList) {
      edges[edge.kind]++;
    }

    return {
      nodes,
      edges,
      totalNodes: this.nodeCount,
      totalEdges: this.edgeList.length,
    };
  }

  // --- Internals ---

  private outgoingOfKind<K extends EdgeKind>(id: string, kind: K): EdgeOfKind<K>[] {
    return (this.outgoing.get(id) ?? []).filter(isEdgeOfKind(kind));
  }

  private resolveTypeReference(targetId: string): TypeNode[] {
    const fullName = fullNameFromTypeId(targetId);
    return fullName !== undefined ? this.typesByFullName.get(fullName) ?? [] : [];
  }

  private getOwningFile(type: TypeNode): FileNode | undefined {
    return this.getFileContainingType(type.id) ?? this.arenas.file.get(type.fileId);
  }

  private resolveDistinct(ids: string[]): GraphNode[] {
    const result = new Map<string, GraphNode>();
    for (const id of ids) {
      if (result.has(id)) continue;
      const node = this.getNode(id);
      if (node) result.set(id, node);
    }
    return Array.from(result.values());
  }
}

function insert<N extends GraphNode>(arena: Map<string, N>, node: N): boolean {
  if (arena.has(node.id)) return false;
  arena.set(node.id, node);
  return true;
}

function appendTo<V>(index: Map<string, V[]>, key: string, value: V): void {
  const list = index.get(key);
  if (list) {
    list.push(value);
  } else {
    index.set(key, [value]);
  }
}

/**
 * Render statistics as the build-completion summary.
 */
export function formatGraphStatistics(stats: GraphStatistics): string {
  const nodeParts = NODE_KINDS.map((kind) => `${kind} ${stats.nodes[kind]}`);
  const edgeParts = EDGE_KINDS
    .filter((kind) => stats.edges[kind] > 0)
    .map((kind) => `${kind} ${stats.edges[kind]}`);

  const lines = [`Nodes: ${stats.totalNodes} (${nodeParts.join(', ')})`];
  lines.push(edgeParts.length > 0
    ? `Edges: ${stats.totalEdges} (${edgeParts.join(', ')})`
    : `Edges: ${stats.totalEdges}`);
  return lines.join('\n');
}
