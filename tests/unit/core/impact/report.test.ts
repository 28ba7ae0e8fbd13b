/**
 * @arch shiftmap.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  ImpactReportCollector,
  renderImpactReportMarkdown,
  summarizeImpactReport,
} from '../../../../src/core/impact/report.js';
import { deleteOperation, moveOperation } from '../../../../src/core/impact/operations.js';

const MOVE = moveOperation('/repo/src/Core/Order.cs', '/repo/src/Sales/Order.cs');

function lines(...content: string[]): string {
  return content.map((line) => `${line}\n`).join('');
}

describe('ImpactReportCollector', () => {
  it('should merge files by path and drop repeated changes', () => {
    const collector = new ImpactReportCollector();
    collector.addFile({
      filePath: '/repo/src/App/Program.cs',
      projectPath: '/repo/src/App/App.csproj',
      reason: 'contains_using_directive',
      requiredChanges: [{ type: 'update_using_directive', lineNumber: 3, currentValue: 'using A;', newValue: 'using B;', description: 'x' }],
    });
    collector.addFile({
      filePath: '\\repo\\src\\app\\program.cs',
      projectPath: null,
      reason: 'directly_moved',
      requiredChanges: [
        { type: 'update_using_directive', lineNumber: 3, currentValue: 'using A;', newValue: 'using B;', description: 'y' },
        { type: 'add_using_directive', newValue: 'using C;', description: 'z' },
      ],
    });

    const report = collector.build(MOVE);

    expect(report.affectedFiles).toHaveLength(1);
    expect(report.affectedFiles[0]?.reason).toBe('contains_using_directive');
    expect(report.affectedFiles[0]?.projectPath).toBe('/repo/src/App/App.csproj');
    expect(report.affectedFiles[0]?.requiredChanges.map((c) => c.type)).toEqual([
      'update_using_directive',
      'add_using_directive',
    ]);
  });

  it('should keep one entry per type and file', () => {
    const collector = new ImpactReportCollector();
    collector.addType({ typeFullName: 'Acme.Order', filePath: '/repo/A.cs', reason: 'directly_moved' });
    collector.addType({ typeFullName: 'Acme.Order', filePath: '/REPO/a.cs', reason: 'references_moved_type' });
    collector.addType({ typeFullName: 'Acme.Order', filePath: '/repo/B.cs', reason: 'references_moved_type' });
    collector.addType({ typeFullName: 'Acme.Order', filePath: null, reason: 'namespace_changed' });

    expect(collector.build(MOVE).affectedTypes.map((t) => t.reason)).toEqual([
      'directly_moved',
      'references_moved_type',
      'namespace_changed',
    ]);
  });

  it('should keep one entry per project and package reference', () => {
    const collector = new ImpactReportCollector();
    const reference = { projectPath: '/repo/App/App.csproj', referencePath: '/repo/Sales/Sales.csproj', reason: 'r' };
    collector.addProjectReference(reference);
    collector.addProjectReference({ ...reference, reason: 'again' });
    collector.addPackageReference({ projectPath: '/repo/App/App.csproj', packageId: 'Serilog', reason: 'r' });
    collector.addPackageReference({ projectPath: '/repo/App/App.csproj', packageId: 'Serilog', version: '3.1.0', reason: 'r' });

    const report = collector.build(MOVE);

    expect(report.requiredProjectReferences).toEqual([reference]);
    expect(report.requiredPackageReferences).toHaveLength(1);
  });

  it('should block and rate very complex when an error is recorded', () => {
    const collector = new ImpactReportCollector();
    collector.error({ code: 'TARGET_EXISTS', message: 'Target file already exists: /repo/x.cs' });

    const report = collector.build(MOVE);

    expect(report.canProceed).toBe(false);
    expect(report.complexity).toBe('very_complex');
  });

  it('should count files without a project as one project group', () => {
    const collector = new ImpactReportCollector();
    collector.addFile({ filePath: '/repo/a.cs', projectPath: null, reason: 'directly_deleted', requiredChanges: [] });
    collector.addFile({ filePath: '/repo/b.cs', projectPath: null, reason: 'directly_deleted', requiredChanges: [] });
    collector.addFile({
      filePath: '/repo/src/c.cs',
      projectPath: '/repo/src/Core.csproj',
      reason: 'directly_deleted',
      requiredChanges: [{ type: 'delete_file', description: 'Delete file' }],
    });

    expect(summarizeImpactReport(collector.build(deleteOperation('/repo/src')))).toEqual({
      affectedFiles: 3,
      affectedTypes: 0,
      affectedProjects: 2,
      requiredChanges: 1,
    });
  });
});

describe('renderImpactReportMarkdown', () => {
  it('should render every populated section', () => {
    const collector = new ImpactReportCollector();
    collector.addFile({
      filePath: '/repo/src/Core/Order.cs',
      projectPath: '/repo/src/Core/Core.csproj',
      reason: 'directly_moved',
      requiredChanges: [{
        type: 'move_file',
        currentValue: '/repo/src/Core/Order.cs',
        newValue: '/repo/src/Sales/Order.cs',
        description: 'Move file to /repo/src/Sales/Order.cs',
      }],
    });
    collector.addFile({
      filePath: '/repo/src/App/Program.cs',
      projectPath: '/repo/src/App/App.csproj',
      reason: 'contains_using_directive',
      requiredChanges: [{
        type: 'update_using_directive',
        lineNumber: 3,
        currentValue: 'using Acme.Core;',
        newValue: 'using Acme.Sales;',
        description: 'Update using directive for Order',
      }],
    });
    collector.addType({ typeFullName: 'Acme.Core.Order', filePath: '/repo/src/Core/Order.cs', reason: 'directly_moved' });
    collector.warn({
      code: 'PARTIAL_CLASS',
      message: 'Type Order is a partial class with 1 other part(s). Consider moving all parts together.',
      filePath: '/repo/src/Core/Order.cs',
    });
    collector.addProjectReference({
      projectPath: '/repo/src/App/App.csproj',
      referencePath: '/repo/src/Sales/Sales.csproj',
      reason: 'Required for access to moved type(s)',
    });

    expect(renderImpactReportMarkdown(collector.build(MOVE))).toBe(lines(
      '# Migration Impact Report',
      '',
      '## Summary',
      '',
      '| Metric | Value |',
      '|--------|-------|',
      '| Operation | Move Order.cs to /repo/src/Sales/Order.cs |',
      '| Complexity | Medium |',
      '| Can Proceed | ✅ Yes |',
      '| Affected Files | 2 |',
      '| Affected Types | 1 |',
      '| Affected Projects | 2 |',
      '| Required Changes | 2 |',
      '',
      '## ⚠️ Warnings',
      '',
      '- **PARTIAL_CLASS**: Type Order is a partial class with 1 other part(s). Consider moving all parts together.',
      '  - File: `/repo/src/Core/Order.cs`',
      '',
      '## Affected Files',
      '',
      '### directly_moved',
      '',
      '| File | Changes |',
      '|------|---------|',
      '| `Order.cs` | move_file |',
      '',
      '### contains_using_directive',
      '',
      '| File | Changes |',
      '|------|---------|',
      '| `Program.cs` | update_using_directive |',
      '',
      '## Required Project References',
      '',
      '| Project | Needs Reference To |',
      '|---------|-------------------|',
      '| `App.csproj` | `Sales.csproj` |',
      '',
    ));
  });

  it('should render errors and leave out empty sections', () => {
    const collector = new ImpactReportCollector();
    collector.error({ code: 'FILE_NOT_FOUND', message: 'File not found in graph: /repo/Gone.cs' });

    expect(renderImpactReportMarkdown(collector.build(deleteOperation('/repo/Gone.cs')))).toBe(lines(
      '# Migration Impact Report',
      '',
      '## Summary',
      '',
      '| Metric | Value |',
      '|--------|-------|',
      '| Operation | Delete Gone.cs |',
      '| Complexity | Very Complex |',
      '| Can Proceed | ❌ No |',
      '| Affected Files | 0 |',
      '| Affected Types | 0 |',
      '| Affected Projects | 0 |',
      '| Required Changes | 0 |',
      '',
      '## ❌ Errors (Must Fix)',
      '',
      '- **FILE_NOT_FOUND**: File not found in graph: /repo/Gone.cs',
      '',
    ));
  });
});
