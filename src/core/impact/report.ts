/**
 * @arch shiftmap.core.domain
 *
 * Impact report assembly and markdown rendering.
 */
import { getFileName, pathKey } from '../../utils/paths.js';
import { COMPLEXITY_LABELS, calculateComplexity } from './complexity.js';
import { describeOperation } from './operations.js';
import type {
  AffectedFile,
  AffectedFileReason,
  AffectedType,
  ImpactError,
  ImpactReport,
  ImpactSummary,
  ImpactWarning,
  MigrationOperation,
  RequiredChange,
  RequiredPackageReference,
  RequiredProjectReference,
} from './types.js';

function changeKey(change: RequiredChange): string {
  return [change.type, change.currentValue ?? '', change.newValue ?? '', change.lineNumber ?? ''].join('|');
}

/**
 * Accumulates report entries for one analysis.
 *
 * Affected files are merged by path: the first entry keeps its project and
 * reason, and later required changes are appended unless an equal change
 * (type, values, line) is already listed. Affected types are unique per
 * (type, file) and project references per (project, reference).
 */
export class ImpactReportCollector {
  private readonly files = new Map<string, AffectedFile>();
  private readonly types = new Map<string, AffectedType>();
  private readonly projectReferences = new Map<string, RequiredProjectReference>();
  private readonly packageReferences = new Map<string, RequiredPackageReference>();
  private readonly warnings: ImpactWarning[] = [];
  private readonly errors: ImpactError[] = [];

  addFile(file: AffectedFile): void {
    const key = pathKey(file.filePath);
    const existing = this.files.get(key);
    if (!existing) {
      this.files.set(key, { ...file, requiredChanges: dedupeChanges(file.requiredChanges) });
      return;
    }
    existing.requiredChanges = dedupeChanges([...existing.requiredChanges, ...file.requiredChanges]);
  }

  addType(type: AffectedType): void {
    const key = `${type.typeFullName}|${type.filePath === null ? '' : pathKey(type.filePath)}`;
    if (!this.types.has(key)) {
      this.types.set(key, type);
    }
  }

  addProjectReference(reference: RequiredProjectReference): void {
    const key = `${pathKey(reference.projectPath)}|${pathKey(reference.referencePath)}`;
    if (!this.projectReferences.has(key)) {
      this.projectReferences.set(key, reference);
    }
  }

  addPackageReference(reference: RequiredPackageReference): void {
    const key = `${pathKey(reference.projectPath)}|${reference.packageId}`;
    if (!this.packageReferences.has(key)) {
      this.packageReferences.set(key, reference);
    }
  }

  warn(warning: ImpactWarning): void {
    this.warnings.push(warning);
  }

  error(error: ImpactError): void {
    this.errors.push(error);
  }

  build(operation: MigrationOperation): ImpactReport {
    const affectedFiles = Array.from(this.files.values());
    const affectedTypes = Array.from(this.types.values());
    const requiredProjectReferences = Array.from(this.projectReferences.values());

    const complexity = calculateComplexity({
      affectedFileCount: affectedFiles.length,
      affectedTypeCount: affectedTypes.length,
      requiredProjectReferenceCount: requiredProjectReferences.length,
      affectedProjectCount: countDistinctProjects(affectedFiles),
      hasErrors: this.errors.length > 0,
    });

    return {
      operation,
      complexity,
      canProceed: this.errors.length === 0,
      affectedFiles,
      affectedTypes,
      requiredProjectReferences,
      requiredPackageReferences: Array.from(this.packageReferences.values()),
      warnings: [...this.warnings],
      errors: [...this.errors],
    };
  }
}

function dedupeChanges(changes: RequiredChange[]): RequiredChange[] {
  const seen = new Set<string>();
  const result: RequiredChange[] = [];
  for (const change of changes) {
    const key = changeKey(change);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(change);
  }
  return result;
}

/**
 * Files without a project count as one group.
 */
function countDistinctProjects(files: AffectedFile[]): number {
  return new Set(files.map((f) => (f.projectPath === null ? null : pathKey(f.projectPath)))).size;
}

export function summarizeImpactReport(report: ImpactReport): ImpactSummary {
  return {
    affectedFiles: report.affectedFiles.length,
    affectedTypes: report.affectedTypes.length,
    affectedProjects: countDistinctProjects(report.affectedFiles),
    requiredChanges: report.affectedFiles.reduce((sum, f) => sum + f.requiredChanges.length, 0),
  };
}

// --- Markdown ---

function renderIssues(lines: string[], title: string, issues: Array<ImpactError | ImpactWarning>): void {
  if (issues.length === 0) return;
  lines.push(title, '');
  for (const issue of issues) {
    lines.push(`- **${issue.code}**: ${issue.message}`);
    if (issue.filePath !== undefined) {
      lines.push(`  - File: \`${issue.filePath}\``);
    }
  }
  lines.push('');
}

function renderAffectedFiles(lines: string[], files: AffectedFile[]): void {
  if (files.length === 0) return;
  lines.push('## Affected Files', '');

  // Groups in order of first appearance
  const groups = new Map<AffectedFileReason, AffectedFile[]>();
  for (const file of files) {
    const group = groups.get(file.reason);
    if (group) {
      group.push(file);
    } else {
      groups.set(file.reason, [file]);
    }
  }

  for (const [reason, group] of groups) {
    lines.push(`### ${reason}`, '', '| File | Changes |', '|------|---------|');
    for (const file of group) {
      const changes = file.requiredChanges.map((c) => c.type).join(', ');
      lines.push(`| \`${getFileName(file.filePath)}\` | ${changes} |`);
    }
    lines.push('');
  }
}

function renderProjectReferences(lines: string[], references: RequiredProjectReference[]): void {
  if (references.length === 0) return;
  lines.push('## Required Project References', '', '| Project | Needs Reference To |', '|---------|-------------------|');
  for (const reference of references) {
    lines.push(`| \`${getFileName(reference.projectPath)}\` | \`${getFileName(reference.referencePath)}\` |`);
  }
  lines.push('');
}

/**
 * Render a report as markdown. Sections without entries are left out.
 * Every line, the last included, ends with a newline.
 */
export function renderImpactReportMarkdown(report: ImpactReport): string {
  const summary = summarizeImpactReport(report);
  const lines: string[] = [
    '# Migration Impact Report',
    '',
    '## Summary',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| Operation | ${describeOperation(report.operation)} |`,
    `| Complexity | ${COMPLEXITY_LABELS[report.complexity]} |`,
    `| Can Proceed | ${report.canProceed ? '✅ Yes' : '❌ No'} |`,
    `| Affected Files | ${summary.affectedFiles} |`,
    `| Affected Types | ${summary.affectedTypes} |`,
    `| Affected Projects | ${summary.affectedProjects} |`,
    `| Required Changes | ${summary.requiredChanges} |`,
    '',
  ];

  renderIssues(lines, '## ❌ Errors (Must Fix)', report.errors);
  renderIssues(lines, '## ⚠️ Warnings', report.warnings);
  renderAffectedFiles(lines, report.affectedFiles);
  renderProjectReferences(lines, report.requiredProjectReferences);

  return lines.map((line) => `${line}\n`).join('');
}
