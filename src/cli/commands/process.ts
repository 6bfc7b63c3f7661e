/**
 * Process CLI command - run the telemetry pipeline over NDJSON messages
 */

import { Command } from "commander";
import { access } from "fs/promises";
import type { PipelineConfig } from "../../types/config.js";
import { PipelineDriver } from "../../lib/pipeline/driver.js";
import type { AlertNotifier, RecordSink, RunSummary } from "../../lib/pipeline/types.js";
import { NDJSONFileSink, NDJSONStreamSink } from "../../lib/emitter/ndjson-sink.js";
import { createMongoRecordSink } from "../../lib/emitter/mongo-sink.js";
import { FileArchiveExporter } from "../../lib/archive/file-exporter.js";
import {
  FanOutAlertNotifier,
  FileAlertNotifier,
  LogAlertNotifier,
} from "../../lib/alerts/index.js";
import { isStdinPath, openNDJSONSource } from "../../lib/source/ndjson-source.js";
import { cliToSection, loadPipelineConfig } from "../../utils/config-loader.js";
import { parseConfigFile } from "../config/parser.js";
import type { ProcessCommandOptions } from "../config/types.js";
import { exitCodeFor, FileIOError, toPipelineError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const SOURCE_COMPONENT = "message-source";

const parseIntOption = (value: string): number => parseInt(value, 10);

async function openSink(config: PipelineConfig): Promise<RecordSink> {
  const { sink } = config;
  switch (sink.type) {
    case "ndjson":
      return NDJSONFileSink.open(sink.dir, sink.targets);
    case "stdout":
      return new NDJSONStreamSink(sink.targets, process.stdout);
    case "mongo":
      return createMongoRecordSink({
        uri: sink.uri,
        database: sink.database,
        targets: sink.targets,
        batchSize: sink.batchSize,
        writeConcern: sink.writeConcern,
        orderedInserts: sink.orderedInserts,
      });
  }
}

function buildNotifier(config: PipelineConfig): AlertNotifier {
  const log = new LogAlertNotifier();
  if (!config.alerts.file) return log;
  return new FanOutAlertNotifier([log, new FileAlertNotifier(config.alerts.file)]);
}

/**
 * The run summary goes to stdout unless the records are written there
 */
export function summaryStreamFor(config: PipelineConfig): "stdout" | "stderr" {
  return config.sink.type === "stdout" ? "stderr" : "stdout";
}

/**
 * Run the pipeline once for a resolved configuration
 */
export async function runProcess(
  config: PipelineConfig,
  signal?: AbortSignal,
): Promise<RunSummary> {
  if (!isStdinPath(config.inputPath)) {
    try {
      await access(config.inputPath);
    } catch (error) {
      throw new FileIOError(`Input not found at: ${config.inputPath}`, {
        inputPath: config.inputPath,
      }, { cause: error });
    }
  }

  const notifier = buildNotifier(config);
  const sink = await openSink(config);
  const exporter = config.archive.enabled
    ? new FileArchiveExporter(config.archive.dir, config.archive.mode)
    : undefined;

  const driver = new PipelineDriver(config.driver, { sink, notifier, exporter });

  const pendingAlerts: Promise<void>[] = [];
  const source = openNDJSONSource(config.inputPath, {
    onDecodeError: (error) => {
      logger.warn("Skipping undecodable message", { error: error.message });
      pendingAlerts.push(
        notifier
          .notify({ component: SOURCE_COMPONENT, error, batchId: "" })
          .catch((notifyError: unknown) => {
            logger.error("Failed to send alert", {
              error: notifyError instanceof Error ? notifyError.message : String(notifyError),
            });
          }),
      );
    },
  });

  try {
    return await driver.run(source, signal);
  } finally {
    if (signal?.aborted && isStdinPath(config.inputPath)) {
      // an idle stdin read would keep the process alive
      process.stdin.destroy();
    }
    await Promise.all(pendingAlerts);
    await sink.close();
  }
}

export function createProcessCommand(): Command {
  return new Command("process")
    .description("Classify and normalize NDJSON telemetry messages into node, interface and address records")
    .option("--input-path <path>", 'NDJSON file of raw telemetry messages (or "stdin")')
    .option("--concurrency <number>", "Messages processed in parallel", parseIntOption)
    .option("--sink <type>", "Record sink: ndjson, stdout, mongo")
    .option("--output-dir <dir>", "Directory for NDJSON record files")
    .option("--mongo-uri <uri>", "MongoDB URI for the mongo sink")
    .option("--mongo-db <database>", "MongoDB database for the mongo sink")
    .option("--node-target <name>", "File stem or collection for node records")
    .option("--interface-target <name>", "File stem or collection for interface records")
    .option("--address-target <name>", "File stem or collection for address records")
    .option("--batch-size <number>", "Batch size for MongoDB inserts", parseIntOption)
    .option("--write-concern <concern>", "Write concern for MongoDB inserts")
    .option("--ordered-inserts", "Use ordered MongoDB inserts")
    .option("--archive-dir <dir>", "Archive every batch under this directory")
    .option("--archive-mode <mode>", "Archive content: raw or normalized")
    .option("--alerts-file <path>", "Append alerts to this NDJSON file")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (options: ProcessCommandOptions) => {
      const controller = new AbortController();
      const stop = (signal: NodeJS.Signals): void => {
        logger.warn(`Received ${signal}, finishing in-flight messages`);
        controller.abort();
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);

      try {
        const fileConfig = options.config ? parseConfigFile(options.config).process : undefined;
        const config = loadPipelineConfig({
          cli: cliToSection(options),
          file: fileConfig,
          env: process.env,
        });

        const summary = await runProcess(config, controller.signal);
        const output = JSON.stringify({ status: "success", phase: "processing", summary }, null, 2);
        if (summaryStreamFor(config) === "stdout") {
          console.log(output);
        } else {
          console.error(output);
        }
        process.exitCode = summary.extractionFailures + summary.sinkFailures > 0 ? 3 : 0;
      } catch (error) {
        const pipelineError = toPipelineError(error);
        console.error(JSON.stringify(pipelineError.toResponse("processing"), null, 2));
        process.exitCode = exitCodeFor(pipelineError.code);
      } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
      }
    });
}
