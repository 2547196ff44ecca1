/**
 * CSVWriter - Buffered CSV file output
 */

import { writeFileSync, appendFileSync } from "fs";

/** Field value accepted by the writer */
export type CSVValue = string | number | null | undefined;

/** Writer options */
export interface CSVWriterOptions {
  /** Field delimiter (default: ,) */
  delimiter?: string;
  /** Line ending (default: \n) */
  lineEnding?: "\n" | "\r\n";
  /**
   * Quote style (default: minimal). `none` writes fields verbatim, so a
   * field containing the delimiter shifts the columns of its row.
   */
  quoteStyle?: "minimal" | "all" | "none";
  /** Rows to buffer before auto-flush */
  flushEvery?: number;
  /** Append to existing file instead of truncating it */
  append?: boolean;
  /** Called after each flush that wrote rows, with the rows now on disk */
  onFlush?: (rowsWritten: number) => void;
}

/**
 * Buffered CSV writer. Unless appending, the first flush truncates the file,
 * so a closed writer always leaves exactly the rows it was given.
 *
 * @example
 * ```ts
 * const writer = new CSVWriter("result.csv", { quoteStyle: "none" });
 * writer.writeHeader(["Line", "Count"]);
 * writer.writeRow(["GET /index.html", 42]);
 * writer.close();
 * ```
 */
export class CSVWriter {
  private path: string;
  private options: Required<Omit<CSVWriterOptions, "onFlush">>;
  private onFlush?: (rowsWritten: number) => void;
  private buffer: string[] = [];
  private rowsWritten: number = 0;
  private truncated: boolean = false;
  private closed: boolean = false;

  constructor(path: string, options: CSVWriterOptions = {}) {
    this.path = path;
    this.options = {
      delimiter: options.delimiter ?? ",",
      lineEnding: options.lineEnding ?? "\n",
      quoteStyle: options.quoteStyle ?? "minimal",
      flushEvery: options.flushEvery ?? 1000,
      append: options.append ?? false,
    };
    this.onFlush = options.onFlush;
  }

  /**
   * Write a single row.
   */
  writeRow(values: CSVValue[]): void {
    if (this.closed) {
      throw new Error("Writer is closed");
    }

    const fields = values.map((v) => this.formatField(v));
    this.buffer.push(fields.join(this.options.delimiter) + this.options.lineEnding);

    if (this.buffer.length >= this.options.flushEvery) {
      this.flush();
    }
  }

  /**
   * Write header row with column names.
   */
  writeHeader(columns: string[]): void {
    this.writeRow(columns);
  }

  /**
   * Flush buffer to file.
   */
  flush(): void {
    if (this.buffer.length === 0 && this.truncated) return;

    const content = this.buffer.join("");

    if (!this.truncated && !this.options.append) {
      writeFileSync(this.path, content);
    } else {
      appendFileSync(this.path, content);
    }

    const flushed = this.buffer.length;
    this.truncated = true;
    this.rowsWritten += flushed;
    this.buffer = [];

    if (flushed > 0) {
      this.onFlush?.(this.rowsWritten);
    }
  }

  /**
   * Get total rows written (including buffered).
   */
  getRowCount(): number {
    return this.rowsWritten + this.buffer.length;
  }

  /**
   * Close writer and flush remaining buffer.
   */
  close(): void {
    if (this.closed) return;

    this.flush();
    this.closed = true;
  }

  private formatField(value: CSVValue): string {
    if (value === null || value === undefined) {
      return "";
    }

    const str = String(value);

    switch (this.options.quoteStyle) {
      case "none":
        return str;
      case "all":
        return this.quote(str);
      case "minimal":
      default:
        return this.fieldNeedsQuoting(str) ? this.quote(str) : str;
    }
  }

  private quote(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
  }

  /**
   * Check if field needs quoting (contains delimiter, quote, or newline).
   */
  private fieldNeedsQuoting(value: string): boolean {
    return (
      value.includes(this.options.delimiter) ||
      value.includes('"') ||
      value.includes("\n") ||
      value.includes("\r")
    );
  }
}
