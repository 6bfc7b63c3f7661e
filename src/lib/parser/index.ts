/**
 * Telemetry parser - one extraction invocation per raw payload
 */

import type { BatchContext, NormalizedBatch } from "../../types/telemetry.js";
import { createBatchContext, type CorrelatorOptions } from "../correlator/index.js";
import { flattenPayload, type FlattenStats } from "../flattener/index.js";
import { ExtractionError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export interface ExtractionSuccess extends NormalizedBatch {
  ok: true;
  stats: FlattenStats;
}

/**
 * A failed invocation carries the batch it would have produced and no records
 */
export interface ExtractionFailure extends NormalizedBatch {
  ok: false;
  nodes: readonly [];
  interfaces: readonly [];
  addresses: readonly [];
  error: ExtractionError;
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

/**
 * Extract node, interface and address records from a raw payload.
 * Never throws: a failure anywhere in the walk discards every partial record.
 */
export function extractTelemetry(
  payload: unknown,
  options: CorrelatorOptions = {},
): ExtractionResult {
  const batch: BatchContext = createBatchContext(options);

  try {
    const { nodes, interfaces, addresses, stats } = flattenPayload(payload, batch);

    logger.debug("Extracted telemetry batch", {
      batchId: batch.batchId,
      nodes: nodes.length,
      interfaces: interfaces.length,
      addresses: addresses.length,
      ...stats,
    });

    return { ok: true, ...batch, nodes, interfaces, addresses, stats };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Error parsing telemetry data", { batchId: batch.batchId, error: message });

    return {
      ok: false,
      ...batch,
      nodes: [],
      interfaces: [],
      addresses: [],
      error: new ExtractionError(
        `Failed to extract telemetry: ${message}`,
        { batchId: batch.batchId },
        { cause: error },
      ),
    };
  }
}

