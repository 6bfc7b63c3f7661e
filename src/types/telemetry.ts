/**
 * Telemetry data model: raw device payloads and the normalized record families
 */

/**
 * Any value a decoded JSON payload can hold
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A leaf telemetry item as emitted by a device. Both members are optional on
 * the wire; only items carrying `entries` take part in extraction.
 */
export interface RawTelemetryItem {
  path?: string;
  entries?: RawEntry[];
}

/**
 * One key/field record inside a telemetry item
 */
export interface RawEntry {
  keys: Record<string, string>;
  fields?: JsonObject;
}

/**
 * Structural family a telemetry item is classified into
 */
export type RecordFamily =
  | "node"
  | "interface-status"
  | "interface-statistics"
  | "address";

/**
 * Correlation stamp shared by every record of one extraction invocation
 */
export interface BatchContext {
  readonly batchId: string;
  readonly timestamp: string;
}

interface CorrelatedRecord {
  readonly batch_id: string;
  readonly timestamp: string;
}

/**
 * Node record: the node name plus every field of the source entry.
 */
export type NodeRecord = Readonly<JsonObject> & CorrelatedRecord & {
  readonly node_name: string;
};

export interface InterfaceStatusRecord extends CorrelatedRecord {
  readonly node_name: string;
  readonly interface_name: string;
  readonly admin_status: string;
  readonly oper_status: string;
}

/**
 * A counter is a number unless the device sent text that does not convert
 * exactly, such as a uint64 beyond the safe integer range.
 */
export type CounterValue = number | string;

export interface InterfaceStatisticsRecord extends CorrelatedRecord {
  readonly node_name: string;
  readonly interface_name: string;
  readonly in_octets: CounterValue;
  readonly out_octets: CounterValue;
  readonly in_packets: CounterValue;
  readonly out_packets: CounterValue;
  readonly in_errors: CounterValue;
  readonly out_errors: CounterValue;
}

/**
 * Status and statistics shapes share the interface output list but are never merged
 */
export type InterfaceRecord = InterfaceStatusRecord | InterfaceStatisticsRecord;

export interface AddressRecord extends CorrelatedRecord {
  readonly node_name: string;
  readonly interface_name: string;
  readonly subinterface_index: string;
  readonly address_ip_prefix: string;
  readonly origin: string;
  readonly status: string;
}

export interface FamilyRecordMap {
  node: NodeRecord;
  "interface-status": InterfaceStatusRecord;
  "interface-statistics": InterfaceStatisticsRecord;
  address: AddressRecord;
}

/**
 * The three output lists of one invocation
 */
export interface NormalizedBatch {
  readonly batchId: string;
  readonly timestamp: string;
  readonly nodes: readonly NodeRecord[];
  readonly interfaces: readonly InterfaceRecord[];
  readonly addresses: readonly AddressRecord[];
}
