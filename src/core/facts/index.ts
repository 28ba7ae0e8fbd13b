/**
 * @arch shiftmap.core.barrel
 */
export { SnapshotWorkspace, loadSnapshot, parseSnapshot } from './snapshot.js';
export {
  SnapshotSchema,
  InputSnapshotSchema,
  ProjectSnapshotSchema,
  FileSnapshotSchema,
  TypeDeclarationSchema,
  TypeUsageSnapshotSchema,
} from './schema.js';
export type {
  Snapshot,
  InputSnapshot,
  ProjectSnapshot,
  FileSnapshot,
  TypeDeclarationSnapshot,
  TypeUsageSnapshot,
} from './schema.js';
