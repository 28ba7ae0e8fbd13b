/**
 * @arch shiftmap.core.barrel
 */
export { SolutionGraphBuilder, formatProgress } from './builder.js';
export type { SolutionGraphBuilderOptions } from './builder.js';
export {
  DEFAULT_CONCURRENCY,
  DEFAULT_EXCLUDE_PATTERNS,
  GENERATED_FILE_PATTERNS,
  defaultBuildOptions,
  fastBuildOptions,
  fullBuildOptions,
  resolveBuildOptions,
} from './options.js';
export { createFileFilter } from './file-filter.js';
export type { FileFilter, FileFilterDecision } from './file-filter.js';
export { classifyFileByExtension, classifyProjectByName } from './classify.js';
export type {
  Accessibility,
  FactExtractor,
  FailedInput,
  FileFacts,
  GraphBuildHooks,
  GraphBuildOptions,
  GraphBuildPhase,
  GraphBuildProgress,
  GraphBuildResult,
  LoadedInput,
  PackageReferenceDescriptor,
  ProgressCallback,
  ProjectDescriptor,
  SkipReason,
  SkippedItem,
  TypeDeclarationFact,
  TypeUsageFact,
  TypeUsageQuery,
  UsingDirectiveFact,
  WorkspaceLoader,
} from './types.js';
