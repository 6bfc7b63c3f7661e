/**
 * NDJSON Writer - Transform stream that turns objects into NDJSON lines
 */

import { Transform, type TransformCallback } from "stream";

export interface NDJSONWriterOptions {
  /** Reshape each chunk before it is serialized */
  map?: (chunk: unknown) => unknown;
}

/**
 * Object-mode in, one JSON document per line out
 */
export class NDJSONWriter extends Transform {
  private readonly mapChunk: (chunk: unknown) => unknown;
  private lines = 0;

  constructor(options: NDJSONWriterOptions = {}) {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
    this.mapChunk = options.map ?? ((chunk) => chunk);
  }

  _transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback): void {
    let line: string;
    try {
      line = JSON.stringify(this.mapChunk(chunk)) + "\n";
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    this.lines++;
    callback(null, line);
  }

  /**
   * Lines emitted so far
   */
  get lineCount(): number {
    return this.lines;
  }
}

export function createNDJSONWriter(options?: NDJSONWriterOptions): NDJSONWriter {
  return new NDJSONWriter(options);
}
