/**
 * NDJSON record sinks: one file per output list, or tagged lines on a stream
 */

import { createWriteStream } from "fs";
import { mkdir } from "fs/promises";
import { join } from "path";
import { once } from "events";
import type { Writable } from "stream";
import { finished, pipeline } from "stream/promises";
import type { NormalizedBatch } from "../../types/telemetry.js";
import type { FamilyTargets } from "../../types/config.js";
import type { RecordSink } from "../pipeline/types.js";
import { FileIOError, SinkError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { createNDJSONWriter, type NDJSONWriter } from "./ndjson-writer.js";
import { OUTPUT_LISTS, recordsFor, type OutputList, type TopicEnvelope } from "./types.js";

async function writeLines(writer: NDJSONWriter, records: readonly object[]): Promise<void> {
  for (const record of records) {
    if (!writer.write(record)) {
      await once(writer, "drain");
    }
  }
}

interface FileChannel {
  writer: NDJSONWriter;
  path: string;
  /** Settles once the file stream has finished or failed */
  done: Promise<void>;
  failure?: unknown;
}

function assertHealthy(list: OutputList, channel: FileChannel, batchId?: string): void {
  if (channel.failure !== undefined || channel.writer.destroyed) {
    throw new SinkError(
      `Failed to write ${list} records to ${channel.path}`,
      { path: channel.path, batchId },
      { cause: channel.failure },
    );
  }
}

async function writeRecords(
  list: OutputList,
  channel: FileChannel,
  records: readonly object[],
  batchId: string,
): Promise<void> {
  for (const record of records) {
    assertHealthy(list, channel, batchId);
    if (!channel.writer.write(record)) {
      // a failed pipeline never drains
      await Promise.race([once(channel.writer, "drain"), channel.done]);
    }
  }
  assertHealthy(list, channel, batchId);
}

/**
 * Appends each output list to `<dir>/<target>.ndjson`
 */
export class NDJSONFileSink implements RecordSink {
  private closed = false;

  private constructor(private readonly channels: Record<OutputList, FileChannel>) {}

  static async open(dir: string, targets: FamilyTargets): Promise<NDJSONFileSink> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new FileIOError(`Failed to create output directory: ${dir}`, { dir }, { cause: error });
    }

    const openChannel = (list: OutputList): FileChannel => {
      const path = join(dir, `${targets[list]}.ndjson`);
      const writer = createNDJSONWriter();
      const channel: FileChannel = { writer, path, done: Promise.resolve() };
      channel.done = pipeline(
        writer,
        createWriteStream(path, { flags: "a", encoding: "utf8" }),
      ).catch((error: unknown) => {
        channel.failure = error;
        logger.error("NDJSON output file failed", {
          path,
          error: error instanceof Error ? error.message : String(error),
        });
      });
      return channel;
    };

    logger.info("Writing records to NDJSON files", { dir, targets });
    return new NDJSONFileSink({
      node: openChannel("node"),
      interface: openChannel("interface"),
      address: openChannel("address"),
    });
  }

  async write(batch: NormalizedBatch): Promise<void> {
    if (this.closed) {
      throw new SinkError("NDJSON sink is closed", { batchId: batch.batchId });
    }
    for (const list of OUTPUT_LISTS) {
      await writeRecords(list, this.channels[list], recordsFor(batch, list), batch.batchId);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const list of OUTPUT_LISTS) {
      const channel = this.channels[list];
      if (!channel.writer.destroyed) {
        channel.writer.end();
      }
    }
    await Promise.all(OUTPUT_LISTS.map((list) => this.channels[list].done));
    for (const list of OUTPUT_LISTS) {
      assertHealthy(list, this.channels[list]);
    }
  }

  /**
   * File each output list is written to
   */
  pathFor(list: OutputList): string {
    return this.channels[list].path;
  }
}

/**
 * Writes every record as `{"topic": <target>, "record": {...}}` on one stream.
 * The stream is left open on close so process.stdout can be used.
 */
export class NDJSONStreamSink implements RecordSink {
  private readonly writer: NDJSONWriter;
  private closed = false;

  constructor(
    private readonly targets: FamilyTargets,
    output: Writable = process.stdout,
  ) {
    this.writer = createNDJSONWriter();
    this.writer.pipe(output, { end: false });
  }

  async write(batch: NormalizedBatch): Promise<void> {
    if (this.closed) {
      throw new SinkError("NDJSON stream sink is closed", { batchId: batch.batchId });
    }
    for (const list of OUTPUT_LISTS) {
      const topic = this.targets[list];
      const envelopes: TopicEnvelope[] = recordsFor(batch, list).map((record) => ({
        topic,
        record,
      }));
      await writeLines(this.writer, envelopes);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.writer.end();
    await finished(this.writer);
  }
}
