/**
 * @arch shiftmap.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  fileNodeId,
  fullNameFromTypeId,
  getDisplayName,
  getProjectDirectory,
  projectNodeId,
  solutionNodeId,
  typeNodeId,
  typeReferenceId,
} from '../../../../src/core/graph/nodes.js';

describe('node ids', () => {
  it('should normalize paths in path-based ids', () => {
    expect(solutionNodeId('C:\\repo\\App.sln')).toBe('sln:C:/repo/App.sln');
    expect(projectNodeId('/repo/src/./Core/Core.csproj')).toBe('proj:/repo/src/Core/Core.csproj');
    expect(fileNodeId('\\repo\\A.cs')).toBe('file:/repo/A.cs');
  });

  it('should give partial parts their own id', () => {
    expect(typeNodeId('Acme.Order')).toBe('type:Acme.Order');
    expect(typeNodeId('Acme.Order', '\\repo\\Order.cs')).toBe('type:Acme.Order#/repo/Order.cs');
    expect(typeReferenceId('Acme.Order')).toBe('type:Acme.Order');
  });

  it('should recover the full name from any type id', () => {
    expect(fullNameFromTypeId('type:Acme.Order')).toBe('Acme.Order');
    expect(fullNameFromTypeId('type:Acme.Order#/repo/Order.cs')).toBe('Acme.Order');
    expect(fullNameFromTypeId('file:/repo/Order.cs')).toBeUndefined();
  });
});

describe('getDisplayName', () => {
  it('should name nodes by kind', () => {
    expect(getDisplayName({ kind: 'file', id: 'file:/repo/A.cs', path: '/repo/A.cs', fileType: 'source' })).toBe('A.cs');
    expect(getDisplayName({ kind: 'package', id: 'pkg:Serilog', packageId: 'Serilog', version: '3.1.0' })).toBe('Serilog (3.1.0)');
    expect(getDisplayName({ kind: 'package', id: 'pkg:Serilog', packageId: 'Serilog' })).toBe('Serilog');
    expect(getDisplayName({ kind: 'namespace', id: 'ns:Acme', namespace: 'Acme' })).toBe('Acme');
  });
});

describe('getProjectDirectory', () => {
  it('should return the folder holding the project file', () => {
    expect(getProjectDirectory({
      kind: 'project',
      id: 'proj:/repo/src/Core/Core.csproj',
      path: '/repo/src/Core/Core.csproj',
      name: 'Core',
      projectType: 'library',
    })).toBe('/repo/src/Core');
  });
});
