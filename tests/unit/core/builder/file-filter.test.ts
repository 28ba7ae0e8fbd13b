/**
 * @arch shiftmap.test.unit
 */
import { describe, it, expect } from 'vitest';
import { createFileFilter } from '../../../../src/core/builder/file-filter.js';
import { DEFAULT_EXCLUDE_PATTERNS } from '../../../../src/core/builder/options.js';

describe('createFileFilter', () => {
  const filter = createFileFilter({ excludePatterns: DEFAULT_EXCLUDE_PATTERNS, includeGeneratedFiles: false });

  it('should include ordinary source files', () => {
    expect(filter.check('/repo/src/Core/Order.cs')).toBe('include');
  });

  it('should exclude build output', () => {
    expect(filter.check('/repo/src/Core/obj/Debug/AssemblyInfo.cs')).toBe('excluded');
    expect(filter.check('C:\\repo\\Core\\bin\\Release\\X.cs')).toBe('excluded');
  });

  it('should exclude by a pattern rooted at the filesystem root', () => {
    const rooted = createFileFilter({ excludePatterns: ['/repo/src/Legacy/**'], includeGeneratedFiles: false });

    expect(rooted.check('/repo/src/Legacy/Old.cs')).toBe('excluded');
    expect(rooted.check('/repo/src/Core/Old.cs')).toBe('include');
  });

  it('should exclude by a pattern with a drive letter', () => {
    const drive = createFileFilter({ excludePatterns: ['C:/repo/Legacy/**'], includeGeneratedFiles: false });

    expect(drive.check('C:\\repo\\Legacy\\Old.cs')).toBe('excluded');
    expect(drive.check('C:\\repo\\Core\\Old.cs')).toBe('include');
  });

  it('should check exclusion before generated names', () => {
    expect(filter.check('/repo/src/Core/obj/View.g.cs')).toBe('excluded');
  });

  it.each([
    '/repo/src/App/MainWindow.g.cs',
    '/repo/src/App/Client.generated.cs',
    '/repo/src/App/Form1.Designer.cs',
    '/repo/src/App/Resources.designer.resx',
  ])('should flag %s as generated', (filePath) => {
    expect(filter.check(filePath)).toBe('generated');
  });

  it('should keep generated files when asked', () => {
    const permissive = createFileFilter({ excludePatterns: [], includeGeneratedFiles: true });

    expect(permissive.check('/repo/src/App/MainWindow.g.cs')).toBe('include');
    expect(permissive.check('/repo/src/Core/bin/X.cs')).toBe('include');
  });
});
