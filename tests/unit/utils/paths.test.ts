/**
 * @arch shiftmap.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  normalizePath,
  pathKey,
  pathsEqual,
  isWithinFolder,
  relativeToFolder,
  joinPath,
  getDirectoryName,
  getFileName,
  getFileNameWithoutExtension,
  getExtension,
} from '../../../src/utils/paths.js';

describe('normalizePath', () => {
  it('should convert backslashes and drop trailing slashes', () => {
    expect(normalizePath('C:\\repo\\src\\')).toBe('C:/repo/src');
  });

  it('should collapse dot and repeated segments', () => {
    expect(normalizePath('/repo//src/./Core/../App.cs')).toBe('/repo/src/App.cs');
  });

  it('should keep the root and empty paths', () => {
    expect(normalizePath('/')).toBe('/');
    expect(normalizePath('')).toBe('');
  });
});

describe('pathKey / pathsEqual', () => {
  it('should compare paths ignoring case and separators', () => {
    expect(pathKey('C:\\Repo\\App.cs')).toBe('c:/repo/app.cs');
    expect(pathsEqual('/Repo/src/App.cs', '\\repo\\SRC\\app.cs')).toBe(true);
    expect(pathsEqual('/repo/a.cs', '/repo/b.cs')).toBe(false);
  });
});

describe('isWithinFolder', () => {
  it('should match files below the folder', () => {
    expect(isWithinFolder('/repo/src/Core/A.cs', '/repo/src')).toBe(true);
    expect(isWithinFolder('/repo/SRC/Core/A.cs', '/repo/src/')).toBe(true);
  });

  it('should respect segment boundaries', () => {
    expect(isWithinFolder('/repo/src/CoreExtras/A.cs', '/repo/src/Core')).toBe(false);
  });

  it('should not treat the folder itself as inside', () => {
    expect(isWithinFolder('/repo/src', '/repo/src')).toBe(false);
  });

  it('should treat an empty folder as containing any path', () => {
    expect(isWithinFolder('A.cs', '')).toBe(true);
    expect(isWithinFolder('', '')).toBe(false);
  });
});

describe('relativeToFolder / joinPath', () => {
  it('should strip the folder prefix', () => {
    expect(relativeToFolder('/repo/src/Core/Models/A.cs', '/repo/src/Core')).toBe('Models/A.cs');
  });

  it('should join segments with forward slashes', () => {
    expect(joinPath('/repo/dest', 'Models/A.cs')).toBe('/repo/dest/Models/A.cs');
    expect(joinPath('C:\\repo', 'a.cs')).toBe('C:/repo/a.cs');
  });
});

describe('file name helpers', () => {
  it('should split directory and file name', () => {
    expect(getDirectoryName('/repo/src/A.cs')).toBe('/repo/src');
    expect(getDirectoryName('A.cs')).toBe('');
    expect(getFileName('C:\\repo\\A.cs')).toBe('A.cs');
  });

  it('should handle extensions', () => {
    expect(getFileNameWithoutExtension('/repo/Core.csproj')).toBe('Core');
    expect(getFileNameWithoutExtension('/repo/README')).toBe('README');
    expect(getExtension('/repo/View.XAML')).toBe('.xaml');
    expect(getExtension('/repo/README')).toBe('');
  });
});
