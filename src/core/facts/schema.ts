/**
 * @arch shiftmap.core.domain.schema
 *
 * Serialized extractor output. YAML or JSON.
 */
import { z } from 'zod';

export const TypeKindSchema = z.enum(['class', 'interface', 'record', 'struct', 'enum', 'delegate']);

export const AccessibilitySchema = z.enum([
  'public',
  'internal',
  'protected',
  'protected_internal',
  'private_protected',
  'private',
]);

export const TypeUsageKindSchema = z.enum([
  'field',
  'property',
  'method_parameter',
  'method_return',
  'local_variable',
  'generic_argument',
  'attribute',
  'base_type',
  'interface',
  'other',
]);

export const TypeDeclarationSchema = z.object({
  kind: TypeKindSchema.default('class'),
  fullName: z.string().min(1),
  /** Defaults to the last segment of fullName */
  name: z.string().optional(),
  /** Defaults to fullName without its last segment */
  namespace: z.string().optional(),
  accessibility: AccessibilitySchema.default('public'),
  isPartial: z.boolean().default(false),
  isStatic: z.boolean().default(false),
  isAbstract: z.boolean().default(false),
  baseType: z.string().optional(),
  interfaces: z.array(z.string()).default([]),
});

export const UsingDirectiveSchema = z.object({
  namespace: z.string().min(1),
  lineNumber: z.number().int().min(1),
});

export const FileSnapshotSchema = z.object({
  path: z.string().min(1),
  namespace: z.string().optional(),
  fileType: z.enum(['source', 'markup', 'data', 'other']).optional(),
  usings: z.array(UsingDirectiveSchema).default([]),
  types: z.array(TypeDeclarationSchema).default([]),
});

export const ProjectSnapshotSchema = z.object({
  path: z.string().min(1),
  /** Defaults to the project file name without extension */
  name: z.string().optional(),
  rootNamespace: z.string().optional(),
  targetFramework: z.string().optional(),
  projectType: z.enum(['library', 'executable', 'gui', 'web_api', 'test', 'other']).optional(),
  projectReferences: z.array(z.string()).default([]),
  packageReferences: z.array(z.object({
    packageId: z.string().min(1),
    version: z.string().optional(),
  })).default([]),
  files: z.array(FileSnapshotSchema).default([]),
});

export const InputSnapshotSchema = z.object({
  path: z.string().min(1),
  kind: z.enum(['solution', 'project']).default('solution'),
  name: z.string().optional(),
  projects: z.array(ProjectSnapshotSchema).default([]),
});

export const TypeUsageSnapshotSchema = z.object({
  /** The used type */
  typeFullName: z.string().min(1),
  /** The type whose code uses it */
  userTypeFullName: z.string().min(1),
  usageKind: TypeUsageKindSchema.default('other'),
  memberName: z.string().optional(),
  lineNumber: z.number().int().min(1).optional(),
  /** Reference distance from the used type; 1 is a direct use */
  depth: z.number().int().min(1).default(1),
});

export const SnapshotSchema = z.object({
  version: z.string().default('1.0'),
  inputs: z.array(InputSnapshotSchema).default([]),
  typeUsages: z.array(TypeUsageSnapshotSchema).default([]),
});

export type TypeDeclarationSnapshot = z.infer<typeof TypeDeclarationSchema>;
export type FileSnapshot = z.infer<typeof FileSnapshotSchema>;
export type ProjectSnapshot = z.infer<typeof ProjectSnapshotSchema>;
export type InputSnapshot = z.infer<typeof InputSnapshotSchema>;
export type TypeUsageSnapshot = z.infer<typeof TypeUsageSnapshotSchema>;
export type Snapshot = z.infer<typeof SnapshotSchema>;
