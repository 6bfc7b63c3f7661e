/**
 * NDJSON message source - one raw telemetry payload per line
 */

import { createReadStream } from "fs";
import * as readline from "readline";
import type { Readable } from "stream";
import type { InboundMessage } from "../pipeline/types.js";
import { FileIOError, InputReadError } from "../../utils/errors.js";

export interface NDJSONSourceOptions {
  /**
   * Called for a line that is not valid JSON; the line is skipped.
   * Without it the error is thrown and ends the stream.
   */
  onDecodeError?: (error: InputReadError) => void;
}

export function isStdinPath(inputPath: string): boolean {
  return inputPath === "stdin" || inputPath === "-";
}

/**
 * Decode NDJSON lines from a readable stream. Blank lines are skipped and
 * offsets are 1-based line numbers.
 */
export async function* readNDJSONMessages(
  input: Readable,
  options: NDJSONSourceOptions = {},
): AsyncGenerator<InboundMessage> {
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity, // Handle all line endings
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    const trimmed = line.trim();
    if (trimmed === "") continue;

    let payload: unknown;
    try {
      payload = JSON.parse(trimmed);
    } catch (err) {
      const error = new InputReadError(
        `Failed to parse NDJSON line ${lineNumber}: ${trimmed.substring(0, 100)}`,
        { line: lineNumber },
        { cause: err },
      );
      if (!options.onDecodeError) throw error;
      options.onDecodeError(error);
      continue;
    }
    yield { offset: lineNumber, payload };
  }
}

/**
 * Messages from a file path, or from stdin for "stdin" / "-"
 */
export function openNDJSONSource(
  inputPath: string,
  options: NDJSONSourceOptions = {},
): AsyncGenerator<InboundMessage> {
  if (isStdinPath(inputPath)) {
    return readNDJSONMessages(process.stdin, options);
  }
  const stream = createReadStream(inputPath, { encoding: "utf8" });
  return readWithFileErrors(stream, inputPath, options);
}

async function* readWithFileErrors(
  stream: Readable,
  inputPath: string,
  options: NDJSONSourceOptions,
): AsyncGenerator<InboundMessage> {
  try {
    yield* readNDJSONMessages(stream, options);
  } catch (error) {
    if (error instanceof InputReadError) throw error;
    throw new FileIOError(`Failed to read input: ${inputPath}`, { inputPath }, { cause: error });
  }
}
