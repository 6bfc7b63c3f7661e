/**
 * Alert notifiers for invocation-level failures
 */

import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { AlertNotifier, ProcessingAlert } from "../pipeline/types.js";
import { logger as rootLogger, type Logger } from "../../utils/logger.js";

export type AlertAttributes = Record<string, string>;

export interface FormattedAlert {
  subject: string;
  message: string;
  attributes: AlertAttributes;
}

export function formatProcessingAlert(alert: ProcessingAlert): FormattedAlert {
  const { component, error, batchId } = alert;
  return {
    subject: `Stream Processing Error in ${component}`,
    message: [
      "A processing error occurred in the network telemetry pipeline.",
      "",
      `Component: ${component}`,
      `Error: ${error.message}`,
      `Batch ID: ${batchId}`,
      "",
      "Please check the logs for more details.",
    ].join("\n"),
    attributes: {
      component,
      error_type: error.name,
      batch_id: batchId,
    },
  };
}

/**
 * Reports alerts through the logger
 */
export class LogAlertNotifier implements AlertNotifier {
  constructor(private readonly logger: Logger = rootLogger.child("alerts")) {}

  async notify(alert: ProcessingAlert): Promise<void> {
    const { subject, attributes } = formatProcessingAlert(alert);
    this.logger.error(subject, { ...attributes, error: alert.error.message });
  }
}

/**
 * Appends one NDJSON line per alert, for a collector to pick up
 */
export class FileAlertNotifier implements AlertNotifier {
  private ready: Promise<unknown> | undefined;

  constructor(private readonly filePath: string) {}

  async notify(alert: ProcessingAlert): Promise<void> {
    this.ready ??= mkdir(dirname(this.filePath), { recursive: true });
    await this.ready;
    const line = JSON.stringify({
      sent_at: new Date().toISOString(),
      ...formatProcessingAlert(alert),
    });
    await appendFile(this.filePath, line + "\n", "utf8");
  }
}

/**
 * Sends each alert to every notifier; one failing notifier does not stop the others
 */
export class FanOutAlertNotifier implements AlertNotifier {
  constructor(
    private readonly notifiers: readonly AlertNotifier[],
    private readonly logger: Logger = rootLogger.child("alerts"),
  ) {}

  async notify(alert: ProcessingAlert): Promise<void> {
    const results = await Promise.allSettled(this.notifiers.map((n) => n.notify(alert)));
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.error("Alert not sent", {
          component: alert.component,
          batchId: alert.batchId,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    }
  }
}
