/**
 * Pipeline driver collaborator contracts
 */

import type { NormalizedBatch } from "../../types/telemetry.js";
import type { FlattenStats } from "../flattener/index.js";

/**
 * One decoded message from the message source
 */
export interface InboundMessage {
  /** Position in the source (line number, partition offset, ...) */
  offset: number;
  payload: unknown;
}

export type MessageSource = AsyncIterable<InboundMessage>;

/**
 * Accepts the three lists of one successful invocation; must accept empty lists
 */
export interface RecordSink {
  write(batch: NormalizedBatch): Promise<void>;
  close(): Promise<void>;
}

export interface BatchArchive {
  batch: NormalizedBatch;
  payload: unknown;
}

/**
 * Durable side copy of a batch. Resolves with where the archive landed.
 */
export interface ArchiveExporter {
  export(archive: BatchArchive): Promise<string>;
}

export interface ProcessingAlert {
  component: string;
  error: Error;
  batchId: string;
}

export interface AlertNotifier {
  notify(alert: ProcessingAlert): Promise<void>;
}

export interface BatchCounts {
  nodes: number;
  interfaces: number;
  addresses: number;
}

export type MessageOutcome =
  | {
      status: "published";
      offset: number;
      batchId: string;
      counts: BatchCounts;
      stats: FlattenStats;
      archivedTo?: string;
    }
  | { status: "extraction-failed"; offset: number; batchId: string; error: Error }
  | { status: "sink-failed"; offset: number; batchId: string; error: Error };

export interface RunSummary {
  messages: number;
  published: number;
  extractionFailures: number;
  sinkFailures: number;
  records: BatchCounts;
  aborted: boolean;
  durationMs: number;
}
