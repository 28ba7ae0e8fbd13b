/**
 * @arch shiftmap.core.domain
 *
 * Fallback classification when a descriptor or extractor leaves it out.
 */
import { getExtension } from '../../utils/paths.js';
import type { FileType, ProjectType } from '../graph/types.js';

const PROJECT_NAME_RULES: ReadonlyArray<{ keywords: string[]; type: ProjectType }> = [
  { keywords: ['test', 'spec'], type: 'test' },
  { keywords: ['wpf', 'desktop', 'maui'], type: 'gui' },
  { keywords: ['web', 'api', 'blazor'], type: 'web_api' },
  { keywords: ['console'], type: 'executable' },
];

/**
 * Guess the project type from keywords in its name; first rule wins.
 */
export function classifyProjectByName(name: string): ProjectType {
  const lower = name.toLowerCase();
  const rule = PROJECT_NAME_RULES.find((r) => r.keywords.some((k) => lower.includes(k)));
  return rule ? rule.type : 'library';
}

const FILE_TYPES_BY_EXTENSION: Readonly<Record<string, FileType>> = {
  '.cs': 'source',
  '.xaml': 'markup',
  '.razor': 'markup',
  '.json': 'data',
  '.xml': 'data',
  '.csproj': 'data',
  '.props': 'data',
  '.targets': 'data',
};

export function classifyFileByExtension(filePath: string): FileType {
  return FILE_TYPES_BY_EXTENSION[getExtension(filePath)] ?? 'other';
}
