/**
 * @arch shiftmap.core.engine
 *
 * Populates a SolutionGraph from loaded workspaces and extracted file facts.
 *
 * Phases:
 * 1. load: open each root input and register its solution node
 * 2. process: projects, references, files and type declarations
 * 3. usages: type_usage edges, when enabled and the extractor supports it
 */
import { GraphBuildError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { normalizePath, pathKey } from '../../utils/paths.js';
import {
  fileContainsType,
  fileUsesNamespace,
  packageReference,
  projectContainsFile,
  projectReference,
  solutionContainsProject,
  typeImplements,
  typeInNamespace,
  typeInherits,
  typeUsage,
} from '../graph/edges.js';
import {
  fileNodeId,
  projectNodeId,
  solutionNodeId,
  typeNodeId,
  typeReferenceId,
} from '../graph/nodes.js';
import { SolutionGraph, formatGraphStatistics } from '../graph/solution-graph.js';
import type { FileNode, ProjectNode, SolutionNode, TypeNode } from '../graph/types.js';
import { classifyFileByExtension, classifyProjectByName } from './classify.js';
import { createFileFilter, type FileFilter } from './file-filter.js';
import { resolveBuildOptions } from './options.js';
import type {
  FactExtractor,
  FailedInput,
  FileFacts,
  GraphBuildHooks,
  GraphBuildOptions,
  GraphBuildProgress,
  GraphBuildResult,
  LoadedInput,
  ProjectDescriptor,
  SkippedItem,
  TypeDeclarationFact,
  TypeUsageFact,
  WorkspaceLoader,
} from './types.js';

/** Usage-phase progress is reported once per this many types. */
const USAGE_PROGRESS_INTERVAL = 100;

interface QueuedProject {
  solution: SolutionNode;
  descriptor: ProjectDescriptor;
}

interface DeclaredType {
  project: ProjectDescriptor;
  fact: TypeDeclarationFact;
}

/**
 * Per-build state. The builder itself keeps none between builds.
 */
interface BuildContext {
  graph: SolutionGraph;
  options: GraphBuildOptions;
  hooks: GraphBuildHooks;
  filter: FileFilter;
  skipped: SkippedItem[];
  failedInputs: FailedInput[];
  /** Project path by path key, for resolving references */
  loadedProjects: Map<string, string>;
  /** First declaration seen per full type name, for the usage phase */
  declaredTypes: Map<string, DeclaredType>;
}

export interface SolutionGraphBuilderOptions {
  logger?: Logger;
}

export class SolutionGraphBuilder {
  private readonly log: Logger;

  constructor(
    private readonly loader: WorkspaceLoader,
    private readonly extractor: FactExtractor,
    options: SolutionGraphBuilderOptions = {}
  ) {
    this.log = options.logger ?? rootLogger.child('builder');
  }

  /**
   * Build a graph over one or more root inputs.
   * Throws GraphBuildError only when no input could be loaded.
   */
  async build(
    inputPaths: string[],
    options: Partial<GraphBuildOptions> = {},
    hooks: GraphBuildHooks = {}
  ): Promise<GraphBuildResult> {
    const startTime = performance.now();
    const resolved = resolveBuildOptions(options);
    const ctx: BuildContext = {
      graph: new SolutionGraph(),
      options: resolved,
      hooks,
      filter: createFileFilter(resolved),
      skipped: [],
      failedInputs: [],
      loadedProjects: new Map(),
      declaredTypes: new Map(),
    };

    this.log.info(`Building graph for ${inputPaths.length} input(s)`);

    const finish = (cancelled: boolean): GraphBuildResult => {
      const statistics = ctx.graph.getStatistics();
      const buildTimeMs = performance.now() - startTime;
      if (cancelled) {
        this.log.warn(`Build cancelled after ${Math.round(buildTimeMs)}ms`);
      }
      return {
        graph: ctx.graph,
        statistics,
        cancelled,
        skipped: ctx.skipped,
        failedInputs: ctx.failedInputs,
        buildTimeMs,
      };
    };

    // Phase 1: load
    const queue = await this.loadInputs(inputPaths, ctx);
    if (this.isCancelled(ctx)) return finish(true);

    if (inputPaths.length > 0 && ctx.failedInputs.length === inputPaths.length) {
      throw new GraphBuildError(
        ErrorCodes.INPUT_LOAD_FAILED,
        `None of the ${inputPaths.length} input(s) could be loaded`,
        { failedInputs: ctx.failedInputs }
      );
    }

    // Phase 2: process
    await this.processProjects(queue, ctx);
    if (this.isCancelled(ctx)) return finish(true);

    // Phase 3: usages
    if (resolved.analyzeTypeUsages) {
      await this.buildTypeUsageEdges(ctx);
      if (this.isCancelled(ctx)) return finish(true);
    }

    this.report(ctx, {
      phase: 'completed',
      currentItem: 'Done',
      percentComplete: 100,
      processedItems: queue.length,
      totalItems: queue.length,
    });

    const result = finish(false);
    this.log.info(`Graph built in ${Math.round(result.buildTimeMs)}ms`);
    this.log.info(formatGraphStatistics(result.statistics));
    return result;
  }

  // --- Phase 1 ---

  private async loadInputs(inputPaths: string[], ctx: BuildContext): Promise<QueuedProject[]> {
    const queue: QueuedProject[] = [];

    for (const [index, inputPath] of inputPaths.entries()) {
      if (this.isCancelled(ctx)) break;

      this.report(ctx, {
        phase: 'loading_solution',
        currentItem: inputPath,
        percentComplete: 0,
        processedItems: index,
        totalItems: inputPaths.length,
      });

      let loaded: LoadedInput;
      try {
        loaded = await this.loader.load(inputPath, ctx.hooks.signal);
      } catch (error) {
        if (this.isCancelled(ctx)) break;
        const message = getErrorMessage(error);
        this.log.error(`Failed to load ${inputPath}: ${message}`);
        ctx.failedInputs.push({ path: inputPath, error: message });
        continue;
      }

      // Single-project inputs get a virtual solution of the same shape
      const solution: SolutionNode = {
        kind: 'solution',
        id: solutionNodeId(loaded.path),
        path: normalizePath(loaded.path),
        name: loaded.name,
      };
      ctx.graph.addNode(solution);

      for (const descriptor of loaded.projects) {
        if (!ctx.loadedProjects.has(pathKey(descriptor.path))) {
          ctx.loadedProjects.set(pathKey(descriptor.path), descriptor.path);
        }
        queue.push({ solution, descriptor });
      }
      this.log.debug(`Loaded ${loaded.kind} ${loaded.name} with ${loaded.projects.length} project(s)`);
    }

    return queue;
  }

  // --- Phase 2 ---

  private async processProjects(queue: QueuedProject[], ctx: BuildContext): Promise<void> {
    const total = queue.length;
    let processed = 0;
    const concurrency = ctx.options.parallel ? ctx.options.concurrency : 1;

    await this.processInBatches(queue, concurrency, async (item) => {
      if (this.isCancelled(ctx)) return;

      try {
        await this.processProject(item, ctx);
      } catch (error) {
        const message = getErrorMessage(error);
        this.log.warn(`Skipping project ${item.descriptor.name}: ${message}`);
        ctx.skipped.push({
          reason: 'project_failed',
          item: item.descriptor.path,
          project: item.descriptor.name,
          message,
        });
      }

      processed++;
      this.report(ctx, {
        phase: 'analyzing_projects',
        currentItem: item.descriptor.name,
        percentComplete: percentOf(processed, total),
        processedItems: processed,
        totalItems: total,
      });
    });
  }

  private async processProject({ solution, descriptor }: QueuedProject, ctx: BuildContext): Promise<void> {
    const { graph } = ctx;
    const project: ProjectNode = {
      kind: 'project',
      id: projectNodeId(descriptor.path),
      path: normalizePath(descriptor.path),
      name: descriptor.name,
      ...(descriptor.rootNamespace !== undefined ? { rootNamespace: descriptor.rootNamespace } : {}),
      ...(descriptor.targetFramework !== undefined ? { targetFramework: descriptor.targetFramework } : {}),
      projectType: descriptor.projectType ?? classifyProjectByName(descriptor.name),
    };

    const isNew = graph.addNode(project);
    graph.addEdge(solutionContainsProject(solution.id, project.id));
    if (!isNew) {
      // Shared by several inputs; contents already recorded
      this.log.debug(`Project ${descriptor.name} already processed`);
      return;
    }

    for (const referencePath of descriptor.projectReferences) {
      const resolvedPath = ctx.loadedProjects.get(pathKey(referencePath));
      if (resolvedPath === undefined) {
        this.log.warn(`Unresolved project reference from ${descriptor.name}: ${referencePath}`);
        ctx.skipped.push({
          reason: 'unresolved_project_reference',
          item: referencePath,
          project: descriptor.name,
        });
        continue;
      }
      graph.addEdge(projectReference(project.id, projectNodeId(resolvedPath)));
    }

    for (const pkg of descriptor.packageReferences) {
      const packageNode = graph.ensurePackage(pkg.packageId, pkg.version);
      graph.addEdge(packageReference(project.id, packageNode.id));
    }

    for (const filePath of descriptor.files) {
      if (this.isCancelled(ctx)) return;
      await this.processFile(project, descriptor, filePath, ctx);
    }
  }

  private async processFile(
    project: ProjectNode,
    descriptor: ProjectDescriptor,
    filePath: string,
    ctx: BuildContext
  ): Promise<void> {
    const { graph, options } = ctx;

    const decision = ctx.filter.check(filePath);
    if (decision !== 'include') {
      ctx.skipped.push({ reason: decision, item: filePath, project: descriptor.name });
      return;
    }

    const fileId = fileNodeId(filePath);
    // A file belongs to the first project that claims it
    if (graph.files.has(fileId)) return;

    let facts: FileFacts;
    try {
      facts = await this.extractor.extractFile(descriptor, filePath, ctx.hooks.signal);
    } catch (error) {
      if (this.isCancelled(ctx)) return;
      const message = getErrorMessage(error);
      this.log.warn(`Skipping ${filePath}: ${message}`);
      ctx.skipped.push({ reason: 'extraction_failed', item: filePath, project: descriptor.name, message });
      return;
    }

    const file: FileNode = {
      kind: 'file',
      id: fileId,
      path: normalizePath(filePath),
      ...(facts.namespace !== undefined ? { namespace: facts.namespace } : {}),
      fileType: facts.fileType ?? classifyFileByExtension(filePath),
    };
    if (!graph.addNode(file)) return;
    graph.addEdge(projectContainsFile(project.id, file.id));

    if (options.analyzeUsingDirectives) {
      for (const using of facts.usings) {
        const namespace = graph.ensureNamespace(using.namespace);
        graph.addEdge(fileUsesNamespace(file.id, namespace.id, using.lineNumber));
      }
    }

    for (const fact of facts.types) {
      if (this.isCancelled(ctx)) return;
      if (fact.accessibility === 'private' && !options.includePrivateTypes) continue;
      this.addType(file, descriptor, fact, ctx);
    }
  }

  private addType(
    file: FileNode,
    descriptor: ProjectDescriptor,
    fact: TypeDeclarationFact,
    ctx: BuildContext
  ): void {
    const { graph } = ctx;
    const type: TypeNode = {
      kind: 'type',
      id: fact.isPartial ? typeNodeId(fact.fullName, file.path) : typeNodeId(fact.fullName),
      fullName: fact.fullName,
      namespace: fact.namespace,
      name: fact.name,
      typeKind: fact.kind,
      fileId: file.id,
      isPublic: fact.accessibility === 'public',
      isPartial: fact.isPartial,
      isStatic: fact.isStatic,
      isAbstract: fact.isAbstract,
    };

    if (!graph.addNode(type)) {
      this.log.warn(`Duplicate declaration of ${fact.fullName} in ${file.path}`);
      ctx.skipped.push({ reason: 'duplicate_type', item: fact.fullName, project: descriptor.name });
      return;
    }

    graph.addEdge(fileContainsType(file.id, type.id));

    if (fact.namespace !== '') {
      const namespace = graph.ensureNamespace(fact.namespace);
      graph.addEdge(typeInNamespace(type.id, namespace.id));
    }

    if (fact.baseType !== undefined) {
      graph.addEdge(typeInherits(type.id, typeReferenceId(fact.baseType)));
    }

    for (const iface of fact.interfaces) {
      graph.addEdge(typeImplements(type.id, typeReferenceId(iface)));
    }

    if (!ctx.declaredTypes.has(fact.fullName)) {
      ctx.declaredTypes.set(fact.fullName, { project: descriptor, fact });
    }
  }

  // --- Phase 3 ---

  private async buildTypeUsageEdges(ctx: BuildContext): Promise<void> {
    const { extractor } = this;
    if (!extractor.findTypeUsages) {
      this.log.debug('Extractor does not report type usages; relying on inheritance edges');
      return;
    }

    const declared = Array.from(ctx.declaredTypes.values());
    const total = declared.length;
    let added = 0;

    for (const [index, { project, fact }] of declared.entries()) {
      if (this.isCancelled(ctx)) return;

      if (index % USAGE_PROGRESS_INTERVAL === 0) {
        this.report(ctx, {
          phase: 'analyzing_usages',
          currentItem: fact.fullName,
          percentComplete: percentOf(index, total),
          processedItems: index,
          totalItems: total,
        });
      }

      let usages: TypeUsageFact[];
      try {
        usages = await extractor.findTypeUsages(project, fact, {
          maxDepth: ctx.options.maxTypeUsageDepth,
          signal: ctx.hooks.signal,
        });
      } catch (error) {
        if (this.isCancelled(ctx)) return;
        this.log.warn(`Usage lookup failed for ${fact.fullName}: ${getErrorMessage(error)}`);
        continue;
      }

      const usedTypeId = typeReferenceId(fact.fullName);
      for (const usage of usages) {
        if (usage.userTypeFullName === fact.fullName) continue;
        const user = ctx.graph.findType(usage.userTypeFullName);
        if (!user) continue;

        const edge = typeUsage(user.id, usedTypeId, usage.usageKind, {
          memberName: usage.memberName,
          lineNumber: usage.lineNumber,
        });
        if (!ctx.graph.hasEdge(edge)) {
          ctx.graph.addEdge(edge);
          added++;
        }
      }
    }

    this.log.debug(`Added ${added} type usage edge(s)`);
  }

  // --- Helpers ---

  /**
   * Process items in batches with concurrency limit.
   */
  private async processInBatches<T>(
    items: T[],
    concurrency: number,
    processor: (item: T) => Promise<void>
  ): Promise<void> {
    for (let i = 0; i < items.length; i += concurrency) {
      const batch = items.slice(i, i + concurrency);
      await Promise.all(batch.map(processor));
    }
  }

  private isCancelled(ctx: BuildContext): boolean {
    return ctx.hooks.signal?.aborted ?? false;
  }

  /**
   * Deliver progress. A throwing callback is logged and the build goes on.
   */
  private report(ctx: BuildContext, progress: GraphBuildProgress): void {
    const { onProgress } = ctx.hooks;
    if (!onProgress) return;
    try {
      onProgress(progress);
    } catch (error) {
      this.log.warn(`Progress callback failed: ${getErrorMessage(error)}`);
    }
  }
}

function percentOf(processed: number, total: number): number {
  return total === 0 ? 0 : Math.floor((processed / total) * 100);
}

/**
 * One-line progress message, e.g. "[analyzing_projects] Billing (2/5, 40%)".
 */
export function formatProgress(progress: GraphBuildProgress): string {
  return `[${progress.phase}] ${progress.currentItem} (${progress.processedItems}/${progress.totalItems}, ${progress.percentComplete}%)`;
}
