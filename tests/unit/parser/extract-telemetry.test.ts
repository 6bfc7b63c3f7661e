import { describe, it, expect } from 'vitest';
import { extractTelemetry } from '../../../src/lib/parser/index.js';
import { createBatchContext } from '../../../src/lib/correlator/index.js';
import { ExtractionError } from '../../../src/utils/errors.js';

const fixedClock = () => new Date('2025-03-04T05:06:07.000Z');

function sequentialIds(): () => string {
  let next = 0;
  return () => `batch-${++next}`;
}

const payload = [
  {
    path: 'telemetry.node.system',
    entries: [{ keys: { node_name: 'r1' }, fields: { vendor: 'nokia' } }],
  },
  [
    {
      path: 'telemetry.interface.statistics',
      entries: [{ keys: { node_name: 'r1', interface_name: 'eth0' }, fields: { in_octets: 100 } }],
    },
    {
      path: 'telemetry.interface.subinterface.ipv4.address',
      entries: [
        {
          keys: { node_name: 'r1', interface_name: 'eth0', 'address_ip-prefix': '192.0.2.1/24' },
          fields: { origin: 'static' },
        },
      ],
    },
  ],
];

describe('createBatchContext', () => {
  it('should use the injected clock and id source', () => {
    const context = createBatchContext({ now: fixedClock, generateId: () => 'fixed-id' });
    expect(context).toEqual({ batchId: 'fixed-id', timestamp: '2025-03-04T05:06:07.000Z' });
    expect(Object.isFrozen(context)).toBe(true);
  });

  it('should generate a fresh UUID per call by default', () => {
    const first = createBatchContext();
    const second = createBatchContext();
    expect(first.batchId).toMatch(/^[0-9a-f-]{36}$/);
    expect(first.batchId).not.toBe(second.batchId);
  });
});

describe('extractTelemetry', () => {
  it('should stamp every record with one batch id and timestamp', () => {
    const result = extractTelemetry(payload, { now: fixedClock, generateId: () => 'b-1' });

    expect(result.ok).toBe(true);
    const records = [...result.nodes, ...result.interfaces, ...result.addresses];
    expect(records).toHaveLength(3);
    for (const record of records) {
      expect(record.batch_id).toBe('b-1');
      expect(record.timestamp).toBe('2025-03-04T05:06:07.000Z');
    }
    expect(result.batchId).toBe('b-1');
  });

  it('should apply the statistics defaults', () => {
    const result = extractTelemetry(
      {
        path: 'devices.interface.statistics.counters',
        entries: [{ keys: { node_name: 'r1', interface_name: 'eth0' }, fields: { in_octets: 100 } }],
      },
      { now: fixedClock, generateId: () => 'B' },
    );

    expect(result.interfaces).toEqual([
      {
        node_name: 'r1',
        interface_name: 'eth0',
        in_octets: 100,
        out_octets: 0,
        in_packets: 0,
        out_packets: 0,
        in_errors: 0,
        out_errors: 0,
        batch_id: 'B',
        timestamp: '2025-03-04T05:06:07.000Z',
      },
    ]);
  });

  it('should produce no address record without an address prefix', () => {
    const result = extractTelemetry({
      path: 'devices.interface.subinterface.ipv4.address',
      entries: [{ keys: { node_name: 'r1', interface_name: 'eth0' } }],
    });

    expect(result.ok).toBe(true);
    expect(result.addresses).toEqual([]);
  });

  it('should return empty lists for an empty payload', () => {
    const result = extractTelemetry([]);
    expect(result.ok).toBe(true);
    expect(result.nodes).toEqual([]);
    expect(result.interfaces).toEqual([]);
    expect(result.addresses).toEqual([]);
  });

  it('should differ only in correlation on a second run of the same payload', () => {
    const ids = sequentialIds();
    let tick = 0;
    const clock = () => new Date(Date.UTC(2025, 0, 1, 0, 0, tick++));

    const first = extractTelemetry(payload, { now: clock, generateId: ids });
    const second = extractTelemetry(payload, { now: clock, generateId: ids });

    expect(first.batchId).toBe('batch-1');
    expect(second.batchId).toBe('batch-2');
    expect(first.timestamp).not.toBe(second.timestamp);

    const strip = ({ batch_id: _b, timestamp: _t, ...rest }: { batch_id: string; timestamp: string }) =>
      rest;
    expect(first.nodes.map(strip)).toEqual(second.nodes.map(strip));
    expect(first.interfaces.map(strip)).toEqual(second.interfaces.map(strip));
    expect(first.addresses.map(strip)).toEqual(second.addresses.map(strip));
  });

  it('should discard partial results when the walk fails', () => {
    const hostile = [
      {
        path: 'telemetry.node.system',
        entries: [{ keys: { node_name: 'r1' } }],
      },
      {
        path: 'telemetry.node.system',
        get entries(): unknown[] {
          throw new Error('boom');
        },
      },
    ];

    const result = extractTelemetry(hostile, { now: fixedClock, generateId: () => 'b-err' });

    expect(result.ok).toBe(false);
    expect(result.nodes).toEqual([]);
    expect(result.interfaces).toEqual([]);
    expect(result.addresses).toEqual([]);
    expect(result.batchId).toBe('b-err');
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ExtractionError);
      expect(result.error.message).toContain('boom');
    }
  });
});
