import { describe, it, expect } from 'vitest';
import {
  SIMULATED_PATHS,
  generateTelemetryPayload,
  simulateTelemetry,
} from '../../../src/lib/simulator/index.js';
import { extractTelemetry } from '../../../src/lib/parser/index.js';
import { TelemetrySchemaValidator } from '../../../src/lib/validator/schema-validator.js';
import { hashStringToSeed, resolveSeed } from '../../../src/utils/seed-manager.js';

describe('Telemetry simulator', () => {
  it('should repeat the same payloads for the same seed', () => {
    const first = [...simulateTelemetry(2, { nodes: 2, interfacesPerNode: 2 }, 'lab-seed')];
    const second = [...simulateTelemetry(2, { nodes: 2, interfacesPerNode: 2 }, 'lab-seed')];

    expect(first).toEqual(second);
    expect(first).toHaveLength(2);
  });

  it('should produce payloads that conform to the raw telemetry schema', () => {
    const [payload] = [...simulateTelemetry(1, undefined, 7)];
    expect(new TelemetrySchemaValidator().validate(payload)).toBe(true);
  });

  it('should cover every record family', () => {
    const [payload] = [...simulateTelemetry(1, { nodes: 3, interfacesPerNode: 4 }, 1)];
    const result = extractTelemetry(payload);

    expect(result.ok).toBe(true);
    expect(result.nodes).toHaveLength(3);
    // status and statistics per interface
    expect(result.interfaces).toHaveLength(24);
    // one IPv4 and one IPv6 address per interface
    expect(result.addresses).toHaveLength(24);
  });

  it('should nest items the way devices batch them', () => {
    const payload = generateTelemetryPayload({ nodes: 1, interfacesPerNode: 1 });

    expect(payload.map((group) => group.map((item) => item.path))).toEqual([
      [SIMULATED_PATHS.node],
      [SIMULATED_PATHS.interfaceStatus, SIMULATED_PATHS.interfaceStatistics],
      [SIMULATED_PATHS.ipv4Address, SIMULATED_PATHS.ipv6Address],
    ]);
    expect(payload[1]?.[0]?.entries?.[0]?.keys.interface_name).toBe('ethernet-1/1');
  });
});

describe('Seed manager', () => {
  it('should hash string seeds deterministically', () => {
    expect(hashStringToSeed('lab')).toBe(hashStringToSeed('lab'));
    expect(hashStringToSeed('lab')).not.toBe(hashStringToSeed('prod'));
    expect(resolveSeed('lab')).toBe(hashStringToSeed('lab'));
  });

  it('should pass numeric seeds through', () => {
    expect(resolveSeed(42)).toBe(42);
  });
});
