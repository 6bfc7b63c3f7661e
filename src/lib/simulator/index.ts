/**
 * Telemetry simulator - synthetic device payloads for exercising the pipeline
 */

import { faker } from "@faker-js/faker";
import type { JsonObject, RawEntry, RawTelemetryItem } from "../../types/telemetry.js";
import { resolveSeed } from "../../utils/seed-manager.js";
import { logger } from "../../utils/logger.js";

export const SIMULATED_PATHS = {
  node: "telemetry.node.system",
  interfaceStatus: "telemetry.interface.status",
  interfaceStatistics: "telemetry.interface.statistics",
  ipv4Address: "telemetry.interface.subinterface.ipv4.address",
  ipv6Address: "telemetry.interface.subinterface.ipv6.address",
} as const;

export interface SimulatorOptions {
  /** Nodes per payload */
  nodes: number;
  interfacesPerNode: number;
}

export const DEFAULT_SIMULATOR_OPTIONS: SimulatorOptions = {
  nodes: 3,
  interfacesPerNode: 4,
};

const ROLES = ["core", "edge", "spine", "leaf"] as const;
const VENDORS = ["nokia", "arista", "juniper", "cisco"] as const;

interface SimulatedInterface {
  nodeName: string;
  interfaceName: string;
}

function nodeEntry(nodeName: string): RawEntry {
  const fields: JsonObject = {
    system_ip: faker.internet.ipv4(),
    mgmt_ip: faker.internet.ipv4(),
    vendor: faker.helpers.arrayElement(VENDORS),
    software_version: faker.system.semver(),
    uptime_seconds: faker.number.int({ min: 60, max: 90 * 24 * 3600 }),
  };
  return { keys: { node_name: nodeName }, fields };
}

function statusEntry({ nodeName, interfaceName }: SimulatedInterface): RawEntry {
  const adminUp = faker.datatype.boolean({ probability: 0.9 });
  return {
    keys: { node_name: nodeName, interface_name: interfaceName },
    fields: {
      admin_status: adminUp ? "up" : "down",
      oper_status: adminUp && faker.datatype.boolean({ probability: 0.95 }) ? "up" : "down",
    },
  };
}

function statisticsEntry({ nodeName, interfaceName }: SimulatedInterface): RawEntry {
  const counter = (max: number): number => faker.number.int({ min: 0, max });
  return {
    keys: { node_name: nodeName, interface_name: interfaceName },
    fields: {
      in_octets: counter(1_000_000_000),
      out_octets: counter(1_000_000_000),
      in_packets: counter(10_000_000),
      out_packets: counter(10_000_000),
      in_errors: counter(50),
      out_errors: counter(50),
    },
  };
}

function addressEntry(
  { nodeName, interfaceName }: SimulatedInterface,
  prefix: string,
): RawEntry {
  return {
    keys: {
      node_name: nodeName,
      interface_name: interfaceName,
      subinterface_index: "0",
      "address_ip-prefix": prefix,
    },
    fields: {
      origin: faker.helpers.arrayElement(["static", "dhcp"]),
      status: "preferred",
    },
  };
}

/**
 * Build one payload: nested lists of node, interface and address items,
 * the way devices batch them
 */
export function generateTelemetryPayload(
  options: SimulatorOptions = DEFAULT_SIMULATOR_OPTIONS,
): RawTelemetryItem[][] {
  const nodeNames = Array.from(
    { length: options.nodes },
    (_, index) => `${faker.helpers.arrayElement(ROLES)}-${index + 1}`,
  );
  const interfaces: SimulatedInterface[] = nodeNames.flatMap((nodeName) =>
    Array.from({ length: options.interfacesPerNode }, (_, index) => ({
      nodeName,
      interfaceName: `ethernet-1/${index + 1}`,
    })),
  );

  return [
    [{ path: SIMULATED_PATHS.node, entries: nodeNames.map(nodeEntry) }],
    [
      { path: SIMULATED_PATHS.interfaceStatus, entries: interfaces.map(statusEntry) },
      { path: SIMULATED_PATHS.interfaceStatistics, entries: interfaces.map(statisticsEntry) },
    ],
    [
      {
        path: SIMULATED_PATHS.ipv4Address,
        entries: interfaces.map((iface) =>
          addressEntry(iface, `${faker.internet.ipv4()}/${faker.helpers.arrayElement([24, 30, 31])}`),
        ),
      },
      {
        path: SIMULATED_PATHS.ipv6Address,
        entries: interfaces.map((iface) => addressEntry(iface, `${faker.internet.ipv6()}/64`)),
      },
    ],
  ];
}

/**
 * Yield `count` payloads. A seed makes the sequence repeatable.
 */
export function* simulateTelemetry(
  count: number,
  options: SimulatorOptions = DEFAULT_SIMULATOR_OPTIONS,
  seed?: string | number,
): Generator<RawTelemetryItem[][]> {
  const numericSeed = resolveSeed(seed);
  faker.seed(numericSeed);
  logger.debug("Simulator seeded", { seed, numericSeed });

  for (let i = 0; i < count; i++) {
    yield generateTelemetryPayload(options);
  }
}
