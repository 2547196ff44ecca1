/**
 * Report building and CSV output
 */

import { CSVWriter } from "./writer";
import { toLineFreqError } from "./errors";
import type { ReportRow } from "./types";

/** Report header columns */
export const REPORT_HEADER = ["Line", "Count"] as const;

export interface WriteReportOptions {
  /**
   * Called once per data row, with the running total, after the batch
   * holding that row has reached the file
   */
  onRow?: (written: number) => void;
  /** Rows buffered between writes (default: 1000) */
  flushEvery?: number;
}

/**
 * Order table entries by count, highest first. Equal counts are ordered by
 * line in ascending code unit order, so the result does not depend on which
 * worker counted what.
 */
export function buildReport(table: ReadonlyMap<string, number>): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const [line, count] of table) {
    rows.push({ line, count });
  }

  return rows.sort((a, b) => {
    if (a.count !== b.count) return b.count - a.count;
    if (a.line === b.line) return 0;
    return a.line < b.line ? -1 : 1;
  });
}

/**
 * Write the report as `Line,Count` CSV, truncating any existing file.
 *
 * Lines are written verbatim: a line that itself contains a comma yields a
 * row with more than two fields. On failure the file may be left partial.
 * Returns the number of data rows written.
 */
export function writeReport(
  path: string,
  rows: Iterable<ReportRow>,
  options: WriteReportOptions = {}
): number {
  let written = 0;

  try {
    const writer = new CSVWriter(path, {
      quoteStyle: "none",
      flushEvery: options.flushEvery,
      onFlush: (rowsWritten) => {
        // The header is the first row on disk
        while (written < rowsWritten - 1) {
          written++;
          options.onRow?.(written);
        }
      },
    });

    writer.writeHeader([...REPORT_HEADER]);
    for (const row of rows) {
      writer.writeRow([row.line, row.count]);
    }
    writer.close();
  } catch (error) {
    throw toLineFreqError(error, "write", path);
  }

  return written;
}
