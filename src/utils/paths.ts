/**
 * @arch shiftmap.util
 *
 * Path helpers for graph lookups.
 * Paths coming from extractors may use either separator and any casing;
 * comparisons go through pathKey().
 */
import * as path from 'node:path';

/**
 * Normalize separators to '/', collapse repeated and '.' segments,
 * and drop a trailing slash.
 */
export function normalizePath(filePath: string): string {
  const forward = filePath.replace(/\\/g, '/');
  if (forward === '') return '';
  const normalized = path.posix.normalize(forward);
  return normalized.length > 1 && normalized.endsWith('/')
    ? normalized.slice(0, -1)
    : normalized;
}

/**
 * Comparison key for a path: normalized and lower-cased.
 */
export function pathKey(filePath: string): string {
  return normalizePath(filePath).toLowerCase();
}

export function pathsEqual(a: string, b: string): boolean {
  return pathKey(a) === pathKey(b);
}

/**
 * True when filePath lies strictly inside folderPath.
 * Matching is segment-aware: "src/Foo" does not contain "src/FooBar/x.cs".
 */
export function isWithinFolder(filePath: string, folderPath: string): boolean {
  const folder = pathKey(folderPath);
  const file = pathKey(filePath);
  if (folder === '' || folder === '.') return file !== '';
  const prefix = folder.endsWith('/') ? folder : `${folder}/`;
  return file.startsWith(prefix);
}

/**
 * Path of filePath relative to folderPath, using '/' separators.
 * Assumes isWithinFolder(filePath, folderPath).
 */
export function relativeToFolder(filePath: string, folderPath: string): string {
  const folder = normalizePath(folderPath);
  const file = normalizePath(filePath);
  return file.slice(folder.length).replace(/^\/+/, '');
}

/**
 * Join segments with '/' separators.
 */
export function joinPath(...segments: string[]): string {
  return normalizePath(path.posix.join(...segments.map((s) => s.replace(/\\/g, '/'))));
}

export function getDirectoryName(filePath: string): string {
  const normalized = normalizePath(filePath);
  const dir = path.posix.dirname(normalized);
  return dir === '.' ? '' : dir;
}

export function getFileName(filePath: string): string {
  return path.posix.basename(normalizePath(filePath));
}

export function getFileNameWithoutExtension(filePath: string): string {
  const name = getFileName(filePath);
  const ext = path.posix.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

export function getExtension(filePath: string): string {
  return path.posix.extname(getFileName(filePath)).toLowerCase();
}
