/**
 * Pipeline driver - runs one extraction per inbound message and hands the
 * results to the sink, archive and alerting collaborators
 */

import type { DriverConfig } from "../../types/config.js";
import type { NormalizedBatch } from "../../types/telemetry.js";
import { extractTelemetry } from "../parser/index.js";
import type { CorrelatorOptions } from "../correlator/index.js";
import { logger as rootLogger, type Logger } from "../../utils/logger.js";
import { ConfigError, SinkError } from "../../utils/errors.js";
import type {
  AlertNotifier,
  ArchiveExporter,
  InboundMessage,
  MessageOutcome,
  MessageSource,
  RecordSink,
  RunSummary,
} from "./types.js";

export const PARSER_COMPONENT = "telemetry-parser";
export const SINK_COMPONENT = "record-sink";

const ABORTED = Symbol("aborted");

interface AbortWatch {
  /** Resolves once the signal aborts; never settles without a signal */
  aborted: Promise<typeof ABORTED>;
  dispose: () => void;
}

function watchAbort(signal?: AbortSignal): AbortWatch {
  let settle: (marker: typeof ABORTED) => void = () => undefined;
  const aborted = new Promise<typeof ABORTED>((resolve) => {
    settle = resolve;
  });
  const onAbort = (): void => settle(ABORTED);

  if (signal?.aborted) onAbort();
  else signal?.addEventListener("abort", onAbort, { once: true });

  return {
    aborted,
    dispose: () => signal?.removeEventListener("abort", onAbort),
  };
}

export interface PipelineCollaborators {
  sink: RecordSink;
  notifier: AlertNotifier;
  exporter?: ArchiveExporter;
}

export interface PipelineDriverOptions {
  logger?: Logger;
  correlator?: CorrelatorOptions;
}

export class PipelineDriver {
  private readonly sink: RecordSink;
  private readonly notifier: AlertNotifier;
  private readonly exporter?: ArchiveExporter;
  private readonly logger: Logger;
  private readonly correlator: CorrelatorOptions;

  constructor(
    private readonly config: DriverConfig,
    collaborators: PipelineCollaborators,
    options: PipelineDriverOptions = {},
  ) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new ConfigError(
        `Driver concurrency must be a positive integer, got ${config.concurrency}`,
      );
    }
    this.sink = collaborators.sink;
    this.notifier = collaborators.notifier;
    this.exporter = collaborators.exporter;
    this.logger = options.logger ?? rootLogger.child("driver");
    this.correlator = options.correlator ?? {};
  }

  /**
   * Process one message. Resolves with the outcome; never rejects.
   */
  async processMessage(message: InboundMessage): Promise<MessageOutcome> {
    const { offset, payload } = message;
    const result = extractTelemetry(payload, this.correlator);

    if (!result.ok) {
      await this.alert(PARSER_COMPONENT, result.error, result.batchId);
      return {
        status: "extraction-failed",
        offset,
        batchId: result.batchId,
        error: result.error,
      };
    }

    const batch: NormalizedBatch = {
      batchId: result.batchId,
      timestamp: result.timestamp,
      nodes: result.nodes,
      interfaces: result.interfaces,
      addresses: result.addresses,
    };

    try {
      await this.sink.write(batch);
    } catch (error) {
      const sinkError =
        error instanceof SinkError
          ? error
          : new SinkError(
              `Record sink rejected batch: ${error instanceof Error ? error.message : String(error)}`,
              { batchId: batch.batchId },
              { cause: error },
            );
      this.logger.error("Failed to publish batch", {
        offset,
        batchId: batch.batchId,
        error: sinkError.message,
      });
      await this.alert(SINK_COMPONENT, sinkError, batch.batchId);
      return { status: "sink-failed", offset, batchId: batch.batchId, error: sinkError };
    }

    const archivedTo = await this.archive(batch, payload);

    this.logger.info(`Processed message at offset: ${offset}`, {
      batchId: batch.batchId,
      nodes: batch.nodes.length,
      interfaces: batch.interfaces.length,
      addresses: batch.addresses.length,
    });

    return {
      status: "published",
      offset,
      batchId: batch.batchId,
      counts: {
        nodes: batch.nodes.length,
        interfaces: batch.interfaces.length,
        addresses: batch.addresses.length,
      },
      stats: result.stats,
      ...(archivedTo !== undefined ? { archivedTo } : {}),
    };
  }

  /**
   * Drain a message source. At most `concurrency` messages are in flight.
   * Once the signal aborts no new message is taken; in-flight ones still
   * finish and flush before this resolves.
   */
  async run(source: MessageSource, signal?: AbortSignal): Promise<RunSummary> {
    const startTime = Date.now();
    const summary: RunSummary = {
      messages: 0,
      published: 0,
      extractionFailures: 0,
      sinkFailures: 0,
      records: { nodes: 0, interfaces: 0, addresses: 0 },
      aborted: false,
      durationMs: 0,
    };

    const tally = (outcome: MessageOutcome): void => {
      summary.messages++;
      switch (outcome.status) {
        case "published":
          summary.published++;
          summary.records.nodes += outcome.counts.nodes;
          summary.records.interfaces += outcome.counts.interfaces;
          summary.records.addresses += outcome.counts.addresses;
          break;
        case "extraction-failed":
          summary.extractionFailures++;
          break;
        case "sink-failed":
          summary.sinkFailures++;
          break;
      }
    };

    const inFlight = new Set<Promise<void>>();
    const iterator = source[Symbol.asyncIterator]();

    // An idle source must not hold up shutdown
    const abort = watchAbort(signal);

    try {
      for (;;) {
        const next = signal?.aborted
          ? ABORTED
          : await Promise.race([iterator.next(), abort.aborted]);
        if (next === ABORTED || signal?.aborted) {
          summary.aborted = true;
          this.releaseSource(iterator);
          break;
        }
        if (next.done) break;

        const task: Promise<void> = this.processMessage(next.value)
          .then(tally)
          .finally(() => {
            inFlight.delete(task);
          });
        inFlight.add(task);

        if (inFlight.size >= this.config.concurrency) {
          await Promise.race(inFlight);
        }
      }
    } finally {
      abort.dispose();
    }

    await Promise.all(inFlight);

    summary.durationMs = Date.now() - startTime;
    this.logger.info("Pipeline run finished", summary);
    return summary;
  }

  /**
   * Ask the source to stop. A generator parked on a read only settles this
   * once the read does, so it is not awaited.
   */
  private releaseSource(iterator: AsyncIterator<InboundMessage>): void {
    iterator.return?.().catch((error: unknown) => {
      this.logger.warn("Message source failed to close", {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  private async archive(batch: NormalizedBatch, payload: unknown): Promise<string | undefined> {
    if (!this.exporter) return undefined;
    try {
      return await this.exporter.export({ batch, payload });
    } catch (error) {
      // Archive loss does not invalidate a published batch
      this.logger.warn("Archive export failed", {
        batchId: batch.batchId,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private async alert(component: string, error: Error, batchId: string): Promise<void> {
    try {
      await this.notifier.notify({ component, error, batchId });
    } catch (notifyError) {
      this.logger.error("Failed to send alert", {
        component,
        batchId,
        error: notifyError instanceof Error ? notifyError.message : String(notifyError),
      });
    }
  }
}
