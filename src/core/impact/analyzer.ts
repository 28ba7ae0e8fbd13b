/**
 * @arch shiftmap.core.engine
 * @intent:stateless
 *
 * Impact analysis of migration operations against a built graph.
 * Never mutates the graph and never throws for expected conditions:
 * missing sources, occupied targets and live references become report
 * errors or warnings.
 */
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { joinPath, relativeToFolder } from '../../utils/paths.js';
import { typeReferenceId } from '../graph/nodes.js';
import type { SolutionGraph } from '../graph/solution-graph.js';
import type { FileNode, ProjectNode, TypeNode } from '../graph/types.js';
import { ImpactReportCollector } from './report.js';
import type {
  AffectedTypeReason,
  DeleteOperation,
  ImpactReport,
  MigrationOperation,
  MoveOperation,
  MoveTypeOperation,
  RenameNamespaceOperation,
  RequiredChange,
} from './types.js';

/** Folder moves above this many files get a LARGE_FOLDER_MOVE warning. */
const LARGE_FOLDER_MOVE_THRESHOLD = 10;

interface ReferencingFiles {
  /** Every other file referencing the type */
  referencing: FileNode[];
  /** The subset recorded with a using-directive change */
  updated: FileNode[];
}

export interface ImpactAnalyzerOptions {
  logger?: Logger;
}

export class ImpactAnalyzer {
  private readonly log: Logger;

  constructor(options: ImpactAnalyzerOptions = {}) {
    this.log = options.logger ?? rootLogger.child('impact');
  }

  analyze(graph: SolutionGraph, operation: MigrationOperation): ImpactReport {
    switch (operation.kind) {
      case 'move':
        return this.analyzeMove(graph, operation);
      case 'rename_namespace':
        return this.analyzeRenameNamespace(graph, operation);
      case 'delete':
        return this.analyzeDelete(graph, operation);
      case 'move_type':
        return this.analyzeMoveType(graph, operation);
    }
  }

  // --- Move ---

  analyzeMove(graph: SolutionGraph, operation: MoveOperation): ImpactReport {
    this.log.debug(`Analyzing move: ${operation.sourcePath} -> ${operation.targetPath}`);
    const report = new ImpactReportCollector();

    if (operation.isFolder) {
      this.collectFolderMove(graph, operation, report);
      return report.build(operation);
    }

    const sourceFile = graph.getFileByPath(operation.sourcePath);
    if (!sourceFile) {
      report.error({
        code: 'FILE_NOT_FOUND',
        message: `Source file not found in graph: ${operation.sourcePath}`,
        filePath: operation.sourcePath,
      });
      return report.build(operation);
    }

    if (graph.getFileByPath(operation.targetPath)) {
      report.error({
        code: 'TARGET_EXISTS',
        message: `Target file already exists: ${operation.targetPath}`,
        filePath: operation.targetPath,
      });
    }

    const oldNamespace = sourceFile.namespace;
    const newNamespace = operation.newNamespace;
    const sourceProject = graph.getProjectContainingFile(sourceFile.id);

    const changes: RequiredChange[] = [{
      type: 'move_file',
      currentValue: sourceFile.path,
      newValue: operation.targetPath,
      description: `Move file to ${operation.targetPath}`,
    }];
    if (oldNamespace !== undefined && newNamespace !== undefined && oldNamespace !== newNamespace) {
      changes.push({
        type: 'update_namespace',
        currentValue: oldNamespace,
        newValue: newNamespace,
        description: `Update namespace from ${oldNamespace} to ${newNamespace}`,
      });
    }
    report.addFile({
      filePath: sourceFile.path,
      projectPath: sourceProject?.path ?? null,
      reason: 'directly_moved',
      requiredChanges: changes,
    });

    const referencingFiles = new Map<string, FileNode>();
    for (const type of graph.getTypesInFile(sourceFile.id)) {
      report.addType({ typeFullName: type.fullName, filePath: sourceFile.path, reason: 'directly_moved' });

      const { referencing, updated } = this.collectReferencingFiles(
        graph, type, sourceFile, oldNamespace, newNamespace, report
      );
      for (const file of referencing) {
        referencingFiles.set(file.id, file);
      }
      for (const file of updated) {
        report.addType({ typeFullName: type.fullName, filePath: file.path, reason: 'references_moved_type' });
      }

      this.collectDerivedTypes(graph, type, sourceFile, report);
      this.checkPartialParts(graph, type, operation.sourcePath, report);
    }

    this.collectProjectReferences(graph, sourceProject, operation.targetPath, referencingFiles.values(), report);

    return report.build(operation);
  }

  private collectFolderMove(graph: SolutionGraph, operation: MoveOperation, report: ImpactReportCollector): void {
    const files = graph.getFilesInFolder(operation.sourcePath);
    const movedIds = new Set(files.map((f) => f.id));

    for (const file of files) {
      const newPath = joinPath(operation.targetPath, relativeToFolder(file.path, operation.sourcePath));

      const occupant = graph.getFileByPath(newPath);
      if (occupant && !movedIds.has(occupant.id)) {
        report.error({
          code: 'TARGET_EXISTS',
          message: `Target file already exists: ${newPath}`,
          filePath: newPath,
        });
      }

      report.addFile({
        filePath: file.path,
        projectPath: graph.getProjectContainingFile(file.id)?.path ?? null,
        reason: 'directly_moved',
        requiredChanges: [{
          type: 'move_file',
          currentValue: file.path,
          newValue: newPath,
          description: `Move file to ${newPath}`,
        }],
      });
    }

    if (files.length > LARGE_FOLDER_MOVE_THRESHOLD) {
      report.warn({
        code: 'LARGE_FOLDER_MOVE',
        message: `Moving ${files.length} files. Consider reviewing the impact carefully.`,
        filePath: operation.sourcePath,
      });
    }
  }

  // --- RenameNamespace ---

  analyzeRenameNamespace(graph: SolutionGraph, operation: RenameNamespaceOperation): ImpactReport {
    const { oldNamespace, newNamespace } = operation;
    this.log.debug(`Analyzing namespace rename: ${oldNamespace} -> ${newNamespace}`);
    const report = new ImpactReportCollector();

    const types = graph.getTypesInNamespace(oldNamespace);
    if (types.length === 0) {
      report.warn({
        code: 'NAMESPACE_EMPTY',
        message: `No types found in namespace ${oldNamespace}`,
      });
    }

    const declaringFiles = new Map<string, FileNode>();
    for (const type of types) {
      const file = graph.getFileContainingType(type.id);
      if (file) declaringFiles.set(file.id, file);
    }

    for (const file of declaringFiles.values()) {
      report.addFile({
        filePath: file.path,
        projectPath: graph.getProjectContainingFile(file.id)?.path ?? null,
        reason: 'contains_namespace_declaration',
        requiredChanges: [{
          type: 'update_namespace',
          currentValue: oldNamespace,
          newValue: newNamespace,
          description: 'Update namespace declaration',
        }],
      });
    }

    for (const file of graph.getFilesUsingNamespace(oldNamespace)) {
      if (declaringFiles.has(file.id)) continue;

      const directive = graph.getUsingDirective(file.id, oldNamespace);
      report.addFile({
        filePath: file.path,
        projectPath: graph.getProjectContainingFile(file.id)?.path ?? null,
        reason: 'contains_using_directive',
        requiredChanges: [{
          type: 'update_using_directive',
          ...(directive ? { lineNumber: directive.lineNumber } : {}),
          currentValue: `using ${oldNamespace};`,
          newValue: `using ${newNamespace};`,
          description: 'Update using directive',
        }],
      });
    }

    for (const type of types) {
      report.addType({
        typeFullName: type.fullName,
        filePath: graph.getFileContainingType(type.id)?.path ?? null,
        reason: 'namespace_changed',
      });
    }

    return report.build(operation);
  }

  // --- Delete ---

  analyzeDelete(graph: SolutionGraph, operation: DeleteOperation): ImpactReport {
    this.log.debug(`Analyzing delete: ${operation.path}`);
    const report = new ImpactReportCollector();

    const exact = graph.getFileByPath(operation.path);
    if (!exact && !operation.isFolder) {
      report.error({
        code: 'FILE_NOT_FOUND',
        message: `File not found in graph: ${operation.path}`,
        filePath: operation.path,
      });
      return report.build(operation);
    }

    const deleted: FileNode[] = exact ? [exact] : [];
    if (operation.isFolder) {
      deleted.push(...graph.getFilesInFolder(operation.path).filter((f) => f.id !== exact?.id));
    }
    const deletedIds = new Set(deleted.map((f) => f.id));

    for (const file of deleted) {
      report.addFile({
        filePath: file.path,
        projectPath: graph.getProjectContainingFile(file.id)?.path ?? null,
        reason: 'directly_deleted',
        requiredChanges: [{ type: 'delete_file', currentValue: file.path, description: 'Delete file' }],
      });

      for (const type of graph.getTypesInFile(file.id)) {
        report.addType({ typeFullName: type.fullName, filePath: file.path, reason: 'directly_deleted' });

        // Another part of a partial type still declares it
        const survives = graph.getTypesByFullName(type.fullName)
          .some((part) => part.id !== type.id && !deletedIds.has(part.fileId));
        if (survives) continue;

        for (const referencing of graph.getFilesReferencingType(type.id)) {
          if (deletedIds.has(referencing.id)) continue;

          if (operation.force) {
            report.warn({
              code: 'BROKEN_REFERENCE',
              message: `Deleting ${type.name} will break references in ${referencing.path}`,
              filePath: referencing.path,
            });
          } else {
            report.error({
              code: 'TYPE_IN_USE',
              message: `Type ${type.name} is referenced in ${referencing.path}. Delete with force to proceed anyway.`,
              filePath: referencing.path,
            });
          }
        }
      }
    }

    return report.build(operation);
  }

  // --- MoveType ---

  analyzeMoveType(graph: SolutionGraph, operation: MoveTypeOperation): ImpactReport {
    this.log.debug(`Analyzing move type: ${operation.typeFullName} -> ${operation.newNamespace}`);
    const report = new ImpactReportCollector();

    const type = graph.findType(operation.typeFullName);
    if (!type) {
      report.error({ code: 'TYPE_NOT_FOUND', message: `Type not found: ${operation.typeFullName}` });
      return report.build(operation);
    }

    const sourceFile = graph.getFileContainingType(type.id);
    if (!sourceFile) {
      this.log.warn(`Type ${type.fullName} has no owning file`);
      report.error({ code: 'FILE_NOT_FOUND', message: `Source file not found for type: ${operation.typeFullName}` });
      return report.build(operation);
    }

    const { newFilePath } = operation;
    const sourceProject = graph.getProjectContainingFile(sourceFile.id);

    const changes: RequiredChange[] = [{
      type: 'update_namespace',
      currentValue: type.namespace,
      newValue: operation.newNamespace,
      description: `Update namespace for ${type.name}`,
    }];
    if (newFilePath !== undefined) {
      changes.push({
        type: 'move_file',
        currentValue: sourceFile.path,
        newValue: newFilePath,
        description: `Move file to ${newFilePath}`,
      });

      const occupant = graph.getFileByPath(newFilePath);
      if (occupant && occupant.id !== sourceFile.id) {
        report.error({
          code: 'TARGET_EXISTS',
          message: `Target file already exists: ${newFilePath}`,
          filePath: newFilePath,
        });
      }
    }

    report.addFile({
      filePath: sourceFile.path,
      projectPath: sourceProject?.path ?? null,
      reason: 'directly_moved',
      requiredChanges: changes,
    });
    report.addType({ typeFullName: type.fullName, filePath: sourceFile.path, reason: 'directly_moved' });

    const { referencing } = this.collectReferencingFiles(
      graph, type, sourceFile, type.namespace, operation.newNamespace, report
    );
    this.checkPartialParts(graph, type, sourceFile.path, report);

    if (newFilePath !== undefined) {
      this.collectProjectReferences(graph, sourceProject, newFilePath, referencing, report);
    }

    return report.build(operation);
  }

  // --- Shared steps ---

  /**
   * Find every other file referencing the type. Only files needing a
   * using-directive edit are recorded in the report; all of them are
   * returned for project reference checks.
   */
  private collectReferencingFiles(
    graph: SolutionGraph,
    type: TypeNode,
    sourceFile: FileNode,
    oldNamespace: string | undefined,
    newNamespace: string | undefined,
    report: ImpactReportCollector
  ): ReferencingFiles {
    const referencing = graph.getFilesReferencingType(type.id).filter((f) => f.id !== sourceFile.id);
    if (oldNamespace === undefined || newNamespace === undefined || oldNamespace === newNamespace) {
      return { referencing, updated: [] };
    }

    for (const file of referencing) {
      const directive = graph.getUsingDirective(file.id, oldNamespace);
      const change: RequiredChange = directive
        ? {
          type: 'update_using_directive',
          lineNumber: directive.lineNumber,
          currentValue: `using ${oldNamespace};`,
          newValue: `using ${newNamespace};`,
          description: `Update using directive for ${type.name}`,
        }
        : {
          type: 'add_using_directive',
          newValue: `using ${newNamespace};`,
          description: `Add using directive for ${type.name}`,
        };

      report.addFile({
        filePath: file.path,
        projectPath: graph.getProjectContainingFile(file.id)?.path ?? null,
        reason: 'contains_using_directive',
        requiredChanges: [change],
      });
    }

    return { referencing, updated: referencing };
  }

  /**
   * Types in other files deriving from or implementing the moved type.
   * Informational: no edit is required.
   */
  private collectDerivedTypes(
    graph: SolutionGraph,
    type: TypeNode,
    sourceFile: FileNode,
    report: ImpactReportCollector
  ): void {
    const targetIds = new Set([type.id, typeReferenceId(type.fullName)]);

    for (const targetId of targetIds) {
      for (const edge of graph.getIncomingEdges(targetId)) {
        let reason: AffectedTypeReason;
        if (edge.kind === 'type_inherits') {
          reason = 'inherits_from_moved_type';
        } else if (edge.kind === 'type_implements') {
          reason = 'implements_moved_interface';
        } else {
          continue;
        }

        const derived = graph.types.get(edge.sourceId);
        if (!derived) continue;
        const file = graph.getFileContainingType(derived.id);
        if (file && file.id !== sourceFile.id) {
          report.addType({ typeFullName: derived.fullName, filePath: file.path, reason });
        }
      }
    }
  }

  private checkPartialParts(
    graph: SolutionGraph,
    type: TypeNode,
    filePath: string,
    report: ImpactReportCollector
  ): void {
    const otherParts = graph.getTypesByFullName(type.fullName).filter((t) => t.id !== type.id);
    if (otherParts.length === 0) return;

    report.warn({
      code: 'PARTIAL_CLASS',
      message: `Type ${type.name} is a partial class with ${otherParts.length} other part(s). Consider moving all parts together.`,
      filePath,
    });
  }

  /**
   * When code moves into another project, every project referencing it
   * needs a reference to that project.
   */
  private collectProjectReferences(
    graph: SolutionGraph,
    sourceProject: ProjectNode | undefined,
    targetPath: string,
    referencingFiles: Iterable<FileNode>,
    report: ImpactReportCollector
  ): void {
    const targetProject = graph.findProjectForPath(targetPath);
    if (!sourceProject || !targetProject || targetProject.id === sourceProject.id) return;

    const projects = new Map<string, ProjectNode>();
    for (const file of referencingFiles) {
      const project = graph.getProjectContainingFile(file.id);
      if (project) projects.set(project.id, project);
    }

    for (const project of projects.values()) {
      if (project.id === targetProject.id) continue;
      if (graph.hasProjectReference(project.id, targetProject.id)) continue;

      report.addProjectReference({
        projectPath: project.path,
        referencePath: targetProject.path,
        reason: 'Required for access to moved type(s)',
      });
    }
  }
}
