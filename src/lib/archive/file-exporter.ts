/**
 * File archive exporter - one JSON document per batch, partitioned by hour
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { ArchiveMode } from "../../types/config.js";
import type { ArchiveExporter, BatchArchive } from "../pipeline/types.js";
import { ExportError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Relative key of a batch archive: processed/YYYY/MM/DD/HH/<batchId>.json,
 * taken in UTC from the batch timestamp
 */
export function buildArchiveKey(batchId: string, timestamp: string): string {
  const at = new Date(timestamp);
  if (Number.isNaN(at.getTime())) {
    throw new ExportError(`Invalid batch timestamp: ${timestamp}`, { batchId });
  }
  return [
    "processed",
    String(at.getUTCFullYear()),
    pad(at.getUTCMonth() + 1),
    pad(at.getUTCDate()),
    pad(at.getUTCHours()),
    `${batchId}.json`,
  ].join("/");
}

/**
 * Document written for one batch
 */
export function buildArchiveDocument(archive: BatchArchive, mode: ArchiveMode): object {
  const { batch } = archive;
  const header = { batch_id: batch.batchId, timestamp: batch.timestamp, mode };
  if (mode === "raw") {
    return { ...header, payload: archive.payload };
  }
  return {
    ...header,
    nodes: batch.nodes,
    interfaces: batch.interfaces,
    addresses: batch.addresses,
  };
}

export class FileArchiveExporter implements ArchiveExporter {
  constructor(
    private readonly rootDir: string,
    private readonly mode: ArchiveMode = "raw",
  ) {}

  async export(archive: BatchArchive): Promise<string> {
    const key = buildArchiveKey(archive.batch.batchId, archive.batch.timestamp);
    const target = join(this.rootDir, ...key.split("/"));

    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(
        target,
        JSON.stringify(buildArchiveDocument(archive, this.mode), null, 2),
        "utf8",
      );
    } catch (error) {
      throw new ExportError(
        `Failed to archive batch ${archive.batch.batchId} to ${target}`,
        { batchId: archive.batch.batchId },
        { cause: error },
      );
    }

    logger.debug("Archived batch", { batchId: archive.batch.batchId, target });
    return target;
  }
}
