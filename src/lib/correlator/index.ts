/**
 * Batch correlator - one batch id and timestamp per extraction invocation
 */

import crypto from "crypto";
import type { BatchContext } from "../../types/telemetry.js";

export interface CorrelatorOptions {
  /** Clock used for the batch timestamp */
  now?: () => Date;
  /** Unique id source; must stay collision resistant under parallel use */
  generateId?: () => string;
}

export function createBatchContext(options: CorrelatorOptions = {}): BatchContext {
  const now = options.now ?? (() => new Date());
  const generateId = options.generateId ?? (() => crypto.randomUUID());

  return Object.freeze({
    batchId: generateId(),
    timestamp: now().toISOString(),
  });
}
