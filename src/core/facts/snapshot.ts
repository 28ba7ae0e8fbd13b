/**
 * @arch shiftmap.core.engine
 *
 * Serves a fact snapshot through the builder's collaborator ports, so a
 * graph can be built from extractor output captured earlier.
 */
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { getFileNameWithoutExtension, pathKey } from '../../utils/paths.js';
import { loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import type {
  FactExtractor,
  FileFacts,
  LoadedInput,
  ProjectDescriptor,
  TypeDeclarationFact,
  TypeUsageFact,
  TypeUsageQuery,
  WorkspaceLoader,
} from '../builder/types.js';
import {
  SnapshotSchema,
  type FileSnapshot,
  type ProjectSnapshot,
  type Snapshot,
  type TypeDeclarationSnapshot,
  type TypeUsageSnapshot,
} from './schema.js';

/**
 * Parse snapshot text (YAML or JSON).
 */
export function parseSnapshot(content: string): Snapshot {
  return parseYamlWithSchema(content, SnapshotSchema, ErrorCodes.INVALID_SNAPSHOT);
}

/**
 * Read and validate a snapshot file.
 */
export async function loadSnapshot(filePath: string): Promise<Snapshot> {
  return loadYamlWithSchema(filePath, SnapshotSchema, ErrorCodes.INVALID_SNAPSHOT);
}

function toDescriptor(project: ProjectSnapshot): ProjectDescriptor {
  return {
    path: project.path,
    name: project.name ?? getFileNameWithoutExtension(project.path),
    ...(project.rootNamespace !== undefined ? { rootNamespace: project.rootNamespace } : {}),
    ...(project.targetFramework !== undefined ? { targetFramework: project.targetFramework } : {}),
    ...(project.projectType !== undefined ? { projectType: project.projectType } : {}),
    projectReferences: [...project.projectReferences],
    packageReferences: project.packageReferences.map((p) => ({ ...p })),
    files: project.files.map((f) => f.path),
  };
}

function toTypeFact(type: TypeDeclarationSnapshot): TypeDeclarationFact {
  const lastDot = type.fullName.lastIndexOf('.');
  return {
    kind: type.kind,
    fullName: type.fullName,
    name: type.name ?? type.fullName.slice(lastDot + 1),
    namespace: type.namespace ?? (lastDot >= 0 ? type.fullName.slice(0, lastDot) : ''),
    accessibility: type.accessibility,
    isPartial: type.isPartial,
    isStatic: type.isStatic,
    isAbstract: type.isAbstract,
    ...(type.baseType !== undefined ? { baseType: type.baseType } : {}),
    interfaces: [...type.interfaces],
  };
}

function toFileFacts(file: FileSnapshot): FileFacts {
  return {
    ...(file.namespace !== undefined ? { namespace: file.namespace } : {}),
    ...(file.fileType !== undefined ? { fileType: file.fileType } : {}),
    usings: file.usings.map((u) => ({ ...u })),
    types: file.types.map(toTypeFact),
  };
}

function toUsageFact(usage: TypeUsageSnapshot): TypeUsageFact {
  return {
    userTypeFullName: usage.userTypeFullName,
    usageKind: usage.usageKind,
    ...(usage.memberName !== undefined ? { memberName: usage.memberName } : {}),
    ...(usage.lineNumber !== undefined ? { lineNumber: usage.lineNumber } : {}),
  };
}

export class SnapshotWorkspace implements WorkspaceLoader, FactExtractor {
  private readonly files = new Map<string, FileSnapshot>();
  private readonly usagesByType = new Map<string, TypeUsageSnapshot[]>();

  constructor(private readonly snapshot: Snapshot) {
    for (const input of snapshot.inputs) {
      for (const project of input.projects) {
        for (const file of project.files) {
          // First occurrence wins, as in the graph
          if (!this.files.has(pathKey(file.path))) {
            this.files.set(pathKey(file.path), file);
          }
        }
      }
    }

    for (const usage of snapshot.typeUsages) {
      const list = this.usagesByType.get(usage.typeFullName);
      if (list) {
        list.push(usage);
      } else {
        this.usagesByType.set(usage.typeFullName, [usage]);
      }
    }
  }

  static async fromFile(filePath: string): Promise<SnapshotWorkspace> {
    return new SnapshotWorkspace(await loadSnapshot(filePath));
  }

  /**
   * Paths of every input in the snapshot.
   */
  inputPaths(): string[] {
    return this.snapshot.inputs.map((i) => i.path);
  }

  async load(inputPath: string, signal?: AbortSignal): Promise<LoadedInput> {
    signal?.throwIfAborted();

    const input = this.snapshot.inputs.find((i) => pathKey(i.path) === pathKey(inputPath));
    if (!input) {
      throw new SystemError(
        ErrorCodes.INPUT_NOT_FOUND,
        `Input not found in snapshot: ${inputPath}`,
        { inputPath }
      );
    }

    return {
      kind: input.kind,
      path: input.path,
      name: input.name ?? getFileNameWithoutExtension(input.path),
      projects: input.projects.map(toDescriptor),
    };
  }

  async extractFile(project: ProjectDescriptor, filePath: string, signal?: AbortSignal): Promise<FileFacts> {
    signal?.throwIfAborted();

    const file = this.files.get(pathKey(filePath));
    if (!file) {
      throw new SystemError(
        ErrorCodes.FACTS_NOT_FOUND,
        `No facts recorded for ${filePath}`,
        { filePath, project: project.name }
      );
    }
    return toFileFacts(file);
  }

  /**
   * Recorded usages of the type no deeper than query.maxDepth.
   */
  async findTypeUsages(
    _project: ProjectDescriptor,
    type: TypeDeclarationFact,
    query: TypeUsageQuery
  ): Promise<TypeUsageFact[]> {
    query.signal?.throwIfAborted();

    return (this.usagesByType.get(type.fullName) ?? [])
      .filter((u) => u.depth <= query.maxDepth)
      .map(toUsageFact);
  }
}
