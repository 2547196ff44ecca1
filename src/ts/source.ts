/**
 * LineSource - Lazy line reader over a text file
 */

import { createReadStream, constants } from "fs";
import { access, stat } from "fs/promises";
import { TextDecoder } from "util";
import { LineFreqError, toLineFreqError } from "./errors";
import type { LineSink } from "./types";

/** Read size per chunk */
const CHUNK_SIZE = 64 * 1024;

/**
 * Reads a file as a sequence of lines. Every scan reopens the file, so
 * `countLines()` and `produce()` each do one full linear pass.
 *
 * @example
 * ```ts
 * const source = await LineSource.open("access.log");
 * const total = await source.countLines();
 * for await (const line of source.lines()) {
 *   console.log(line);
 * }
 * ```
 */
export class LineSource {
  readonly path: string;

  private constructor(path: string) {
    this.path = path;
  }

  /**
   * Check the file can be read and return a source for it.
   */
  static async open(path: string): Promise<LineSource> {
    try {
      const info = await stat(path);
      if (!info.isFile()) {
        throw new LineFreqError("ReadError", "open", `Not a regular file: ${path}`, { path });
      }
      await access(path, constants.R_OK);
    } catch (error) {
      throw toLineFreqError(error, "open", path);
    }
    return new LineSource(path);
  }

  /**
   * Count the lines a full scan yields.
   */
  async countLines(onLine?: (counted: number) => void): Promise<number> {
    let total = 0;
    for await (const _line of this.scan("count")) {
      total++;
      onLine?.(total);
    }
    return total;
  }

  /**
   * Send every line, in file order, into the sink.
   * Returns the number of lines sent.
   */
  async produce(sink: LineSink, onLine?: (sent: number) => void): Promise<number> {
    let sent = 0;
    for await (const line of this.scan("produce")) {
      sink.send(line);
      sent++;
      onLine?.(sent);
    }
    return sent;
  }

  /**
   * Iterate the lines of the file.
   */
  lines(): AsyncGenerator<string> {
    return this.scan("produce");
  }

  /**
   * Split on \n, drop the \r of a CRLF terminator, and emit a final
   * unterminated line if there is one. Decoding is strict UTF-8 and keeps a
   * leading byte order mark as part of the first line.
   */
  private async *scan(operation: "count" | "produce"): AsyncGenerator<string> {
    const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
    const stream = createReadStream(this.path, { highWaterMark: CHUNK_SIZE });
    let pending = "";

    try {
      for await (const chunk of stream) {
        // Text carried over from earlier chunks holds no \n
        const searchFrom = pending.length;
        pending += decoder.decode(chunk, { stream: true });

        let start = 0;
        let newline = pending.indexOf("\n", searchFrom);
        while (newline !== -1) {
          yield stripCarriageReturn(pending.slice(start, newline));
          start = newline + 1;
          newline = pending.indexOf("\n", start);
        }
        pending = pending.slice(start);
      }
      pending += decoder.decode();
    } catch (error) {
      throw toLineFreqError(error, operation, this.path);
    } finally {
      stream.destroy();
    }

    if (pending.length > 0) {
      yield pending;
    }
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
