/**
 * Standard error classes for the telemetry pipeline
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  EXTRACTION_ERROR = "EXTRACTION_ERROR",
  SINK_ERROR = "SINK_ERROR",
  EXPORT_ERROR = "EXPORT_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetails;
    cause?: string;
  };
}

export class TelemetryPipelineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TelemetryPipelineError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends TelemetryPipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends TelemetryPipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class InputReadError extends TelemetryPipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INPUT_READ_ERROR, message, details, options);
    this.name = "InputReadError";
  }
}

export class ExtractionError extends TelemetryPipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.EXTRACTION_ERROR, message, details, options);
    this.name = "ExtractionError";
  }
}

export class SinkError extends TelemetryPipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SINK_ERROR, message, details, options);
    this.name = "SinkError";
  }
}

export class ExportError extends TelemetryPipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.EXPORT_ERROR, message, details, options);
    this.name = "ExportError";
  }
}

export class ValidationError extends TelemetryPipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

/**
 * Wrap anything thrown into a pipeline error, keeping pipeline errors as they are
 */
export function toPipelineError(
  error: unknown,
  code: ErrorCode = ErrorCode.GENERAL_ERROR,
): TelemetryPipelineError {
  if (error instanceof TelemetryPipelineError) {
    return error;
  }
  return new TelemetryPipelineError(
    code,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

/**
 * CLI exit code for an error code
 */
export function exitCodeFor(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.CONFIG_ERROR:
      return 2;
    case ErrorCode.FILE_IO_ERROR:
    case ErrorCode.INPUT_READ_ERROR:
      return 4;
    default:
      return 1;
  }
}
