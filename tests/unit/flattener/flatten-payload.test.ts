import { describe, it, expect } from 'vitest';
import {
  flattenPayload,
  toPayloadNode,
  walkPayload,
  type TelemetryItemNode,
} from '../../../src/lib/flattener/index.js';
import type { BatchContext } from '../../../src/types/telemetry.js';

const batch: BatchContext = { batchId: 'batch-1', timestamp: '2025-03-04T05:06:07.000Z' };

const nodeItem = (name: string) => ({
  path: 'telemetry.node.system',
  entries: [{ keys: { node_name: name }, fields: { vendor: 'nokia' } }],
});

const statusItem = {
  path: 'telemetry.interface.status',
  entries: [{ keys: { node_name: 'r1', interface_name: 'eth0' }, fields: { admin_status: 'up' } }],
};

const addressItem = {
  path: 'telemetry.interface.subinterface.ipv4.address',
  entries: [
    { keys: { node_name: 'r1', interface_name: 'eth0', 'address_ip-prefix': '192.0.2.1/24' } },
  ],
};

describe('Payload flattener', () => {
  describe('toPayloadNode', () => {
    it('should classify each variant', () => {
      expect(toPayloadNode([1, 2])).toEqual({ kind: 'sequence', elements: [1, 2] });
      expect(toPayloadNode(5)).toEqual({ kind: 'other', reason: 'not-a-mapping' });
      expect(toPayloadNode(null)).toEqual({ kind: 'other', reason: 'not-a-mapping' });
      expect(toPayloadNode({ path: 'a.node.b' })).toEqual({
        kind: 'other',
        reason: 'missing-entries',
      });
      expect(toPayloadNode({ path: 'a.node.b', entries: {} })).toEqual({
        kind: 'other',
        reason: 'entries-not-a-list',
      });
      expect(toPayloadNode({ path: 'a.node.b', entries: [] })).toEqual({
        kind: 'item',
        path: 'a.node.b',
        entries: [],
      });
    });

    it('should treat a missing or non-text path as empty', () => {
      expect(toPayloadNode({ entries: [] })).toEqual({ kind: 'item', path: '', entries: [] });
      expect(toPayloadNode({ path: 3, entries: [] })).toEqual({ kind: 'item', path: '', entries: [] });
    });
  });

  describe('walkPayload', () => {
    it('should visit items depth first in document order and count ignored leaves', () => {
      const visited: string[] = [];
      const ignored = walkPayload(
        [nodeItem('a'), [[nodeItem('b'), 'noise'], 42], { path: 'x' }, [nodeItem('c')]],
        (item: TelemetryItemNode) => {
          visited.push(item.path + ':' + JSON.stringify(item.entries[0]));
        },
      );

      expect(visited).toHaveLength(3);
      expect(visited[0]).toContain('"node_name":"a"');
      expect(visited[1]).toContain('"node_name":"b"');
      expect(visited[2]).toContain('"node_name":"c"');
      expect(ignored).toBe(3);
    });
  });

  describe('flattenPayload', () => {
    it('should route every family to its output list', () => {
      const result = flattenPayload([nodeItem('r1'), statusItem, addressItem], batch);

      expect(result.nodes).toEqual([
        {
          vendor: 'nokia',
          node_name: 'r1',
          batch_id: 'batch-1',
          timestamp: '2025-03-04T05:06:07.000Z',
        },
      ]);
      expect(result.interfaces).toHaveLength(1);
      expect(result.addresses).toHaveLength(1);
      expect(result.stats).toEqual({ items: 3, ignored: 0, skippedEntries: 0 });
    });

    it('should accept a single item as the whole payload', () => {
      const result = flattenPayload(nodeItem('r1'), batch);
      expect(result.nodes).toHaveLength(1);
      expect(result.stats.items).toBe(1);
    });

    it('should flatten nested sequences like the equivalent flat sequence', () => {
      const nested = flattenPayload([[nodeItem('r1'), [statusItem]], [[[addressItem]]]], batch);
      const flat = flattenPayload([nodeItem('r1'), statusItem, addressItem], batch);

      expect(nested.nodes).toEqual(flat.nodes);
      expect(nested.interfaces).toEqual(flat.interfaces);
      expect(nested.addresses).toEqual(flat.addresses);
    });

    it('should ignore unclassified items and tolerate garbage', () => {
      const result = flattenPayload(
        [{ path: 'telemetry.bgp.peer', entries: [{ keys: { node_name: 'r1' } }] }, 'text', null, true],
        batch,
      );

      expect(result.nodes).toEqual([]);
      expect(result.interfaces).toEqual([]);
      expect(result.addresses).toEqual([]);
      expect(result.stats).toEqual({ items: 1, ignored: 3, skippedEntries: 0 });
    });

    it('should count skipped entries', () => {
      const result = flattenPayload(
        {
          path: 'telemetry.interface.subinterface.ipv6.address',
          entries: [{ keys: { node_name: 'r1', interface_name: 'eth0' } }],
        },
        batch,
      );

      expect(result.addresses).toEqual([]);
      expect(result.stats.skippedEntries).toBe(1);
    });

    it('should keep status and statistics records separate in the interface list', () => {
      const result = flattenPayload(
        [
          statusItem,
          {
            path: 'telemetry.interface.statistics',
            entries: [{ keys: { node_name: 'r1', interface_name: 'eth0' }, fields: { in_octets: 5 } }],
          },
        ],
        batch,
      );

      expect(result.interfaces).toHaveLength(2);
      expect(result.interfaces[0]).toHaveProperty('admin_status', 'up');
      expect(result.interfaces[1]).toHaveProperty('in_octets', 5);
      expect(result.interfaces[1]).not.toHaveProperty('admin_status');
    });
  });
});
