import { describe, it, expect } from 'vitest';
import { classifyPath } from '../../../src/lib/classifier/index.js';

describe('classifyPath', () => {
  it('should classify node paths', () => {
    expect(classifyPath('telemetry.node.system')).toEqual(['node']);
  });

  it('should classify interface status and statistics paths separately', () => {
    expect(classifyPath('telemetry.interface.status')).toEqual(['interface-status']);
    expect(classifyPath('telemetry.interface.statistics.counters')).toEqual([
      'interface-statistics',
    ]);
  });

  it('should classify both address families', () => {
    expect(classifyPath('a.interface.subinterface.ipv4.address')).toEqual(['address']);
    expect(classifyPath('a.interface.subinterface.ipv6.address.list')).toEqual(['address']);
  });

  it('should return every matching family for a path carrying several markers', () => {
    expect(classifyPath('x.node.y.interface.status')).toEqual(['node', 'interface-status']);
  });

  it('should return an empty list for unknown paths', () => {
    expect(classifyPath('telemetry.bgp.neighbors')).toEqual([]);
    expect(classifyPath('')).toEqual([]);
  });

  it('should require the leading dot of each marker', () => {
    expect(classifyPath('node.system')).toEqual([]);
    expect(classifyPath('interface.status')).toEqual([]);
  });
});
