/**
 * @arch shiftmap.core.types
 *
 * Collaborator ports, options, progress and result types of the graph builder.
 */
import type {
  FileType,
  GraphStatistics,
  ProjectType,
  TypeKind,
  TypeUsageKind,
} from '../graph/types.js';
import type { SolutionGraph } from '../graph/solution-graph.js';

// --- Workspace loading ---

export interface PackageReferenceDescriptor {
  packageId: string;
  version?: string;
}

/**
 * A project as described by its manifest.
 */
export interface ProjectDescriptor {
  path: string;
  name: string;
  rootNamespace?: string;
  targetFramework?: string;
  /** Classified from the name when absent */
  projectType?: ProjectType;
  /** Paths of referenced projects */
  projectReferences: string[];
  packageReferences: PackageReferenceDescriptor[];
  /** Paths of the files the project compiles or ships */
  files: string[];
}

/**
 * One loaded root input: a solution grouping projects, or a single project.
 */
export interface LoadedInput {
  kind: 'solution' | 'project';
  path: string;
  name: string;
  projects: ProjectDescriptor[];
}

export interface WorkspaceLoader {
  /**
   * Open a root input. Rejects when the input cannot be enumerated.
   */
  load(inputPath: string, signal?: AbortSignal): Promise<LoadedInput>;
}

// --- Fact extraction ---

export type Accessibility =
  | 'public'
  | 'internal'
  | 'protected'
  | 'protected_internal'
  | 'private_protected'
  | 'private';

export interface UsingDirectiveFact {
  namespace: string;
  /** 1-based source line */
  lineNumber: number;
}

/**
 * A top-level type declaration reported by the extractor.
 */
export interface TypeDeclarationFact {
  kind: TypeKind;
  fullName: string;
  name: string;
  namespace: string;
  accessibility: Accessibility;
  isPartial: boolean;
  isStatic: boolean;
  isAbstract: boolean;
  /** Full name of the base type, omitted for the root object type */
  baseType?: string;
  /** Full names of implemented interfaces */
  interfaces: string[];
}

export interface FileFacts {
  namespace?: string;
  /** Classified from the extension when absent */
  fileType?: FileType;
  usings: UsingDirectiveFact[];
  types: TypeDeclarationFact[];
}

/**
 * One use of a type by another type.
 */
export interface TypeUsageFact {
  userTypeFullName: string;
  usageKind: TypeUsageKind;
  memberName?: string;
  lineNumber?: number;
}

export interface TypeUsageQuery {
  maxDepth: number;
  signal?: AbortSignal;
}

export interface FactExtractor {
  extractFile(project: ProjectDescriptor, filePath: string, signal?: AbortSignal): Promise<FileFacts>;

  /**
   * Usages of a type by other types. Extractors without global
   * reference resolution leave this out.
   */
  findTypeUsages?(
    project: ProjectDescriptor,
    type: TypeDeclarationFact,
    query: TypeUsageQuery
  ): Promise<TypeUsageFact[]>;
}

// --- Options ---

export interface GraphBuildOptions {
  /** Discover type_usage edges (the expensive phase) */
  analyzeTypeUsages: boolean;
  /** Record file_uses_namespace edges */
  analyzeUsingDirectives: boolean;
  includePrivateTypes: boolean;
  /** Keep files named like generated code (*.g.cs, *.Designer.cs, ...) */
  includeGeneratedFiles: boolean;
  /** Globs of paths never added to the graph */
  excludePatterns: string[];
  maxTypeUsageDepth: number;
  /** Process projects concurrently */
  parallel: boolean;
  /** Projects processed at once when parallel */
  concurrency: number;
}

// --- Progress ---

export type GraphBuildPhase =
  | 'loading_solution'
  | 'analyzing_projects'
  | 'analyzing_usages'
  | 'completed';

export interface GraphBuildProgress {
  phase: GraphBuildPhase;
  /** Label of the item being worked on */
  currentItem: string;
  /** 0-100 */
  percentComplete: number;
  processedItems: number;
  totalItems: number;
}

export type ProgressCallback = (progress: GraphBuildProgress) => void;

export interface GraphBuildHooks {
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

// --- Result ---

export type SkipReason =
  | 'unresolved_project_reference'
  | 'excluded'
  | 'generated'
  | 'extraction_failed'
  | 'duplicate_type'
  | 'project_failed';

/**
 * Something the builder left out of the graph, and why.
 */
export interface SkippedItem {
  reason: SkipReason;
  /** Path or type name */
  item: string;
  /** Project being processed */
  project: string;
  message?: string;
}

export interface FailedInput {
  path: string;
  error: string;
}

export interface GraphBuildResult {
  graph: SolutionGraph;
  statistics: GraphStatistics;
  /** True when the signal aborted the build; the graph is then partial */
  cancelled: boolean;
  skipped: SkippedItem[];
  failedInputs: FailedInput[];
  buildTimeMs: number;
}
