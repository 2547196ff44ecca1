/**
 * countLineFrequencies - One complete counting run
 */

import { LineSource } from "./source";
import { WorkChannel } from "./channel";
import { FrequencyTable, runWorker } from "./accumulator";
import { buildReport, writeReport } from "./report";
import { LineFreqError } from "./errors";
import type { CountOptions, RunPhase, RunSummary } from "./types";

/** Worker count when none is given */
export const DEFAULT_CONCURRENCY = 5;

/**
 * Check a worker count is a positive integer.
 */
export function validateConcurrency(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new LineFreqError(
      "InvalidOption",
      "configure",
      `Concurrency must be a positive integer, got ${value}`
    );
  }
  return value;
}

/**
 * Count every distinct line of `inputPath` and write the CSV report to
 * `outputPath`.
 *
 * The input is scanned twice: once to size progress, once to feed a single
 * producer into `concurrency` workers sharing one FrequencyTable. All workers
 * are joined before the table is read. Any failure aborts the run; a failure
 * before the reporting phase leaves `outputPath` untouched.
 */
export async function countLineFrequencies(options: CountOptions): Promise<RunSummary> {
  const startTime = performance.now();
  const concurrency = validateConcurrency(options.concurrency ?? DEFAULT_CONCURRENCY);

  const enter = (phase: RunPhase): void => {
    options.onPhase?.(phase);
  };

  try {
    const source = await LineSource.open(options.inputPath);

    enter("Counting");
    const totalLines = await source.countLines((counted) => {
      options.onProgress?.({ phase: "Counting", position: counted });
    });

    enter("Dispatching");
    const channel = new WorkChannel<string>();
    const table = new FrequencyTable();
    const workers = Array.from({ length: concurrency }, () => runWorker(channel, table));

    const producing = source
      .produce(channel, (sent) => {
        options.onProgress?.({ phase: "Dispatching", position: sent, length: totalLines });
      })
      .finally(() => {
        channel.close();
        enter("Draining");
      });

    // Join barrier: nothing reads the table until every task has settled
    const settled = await Promise.allSettled([producing, ...workers]);
    const failure = settled.find(
      (result): result is PromiseRejectedResult => result.status === "rejected"
    );
    if (failure) {
      throw failure.reason;
    }

    const linesPerWorker = settled
      .slice(1)
      .map((result) => (result.status === "fulfilled" ? result.value : 0));

    enter("Reporting");
    const snapshot = table.snapshot();
    const rows = buildReport(snapshot);
    const rowsWritten = writeReport(options.outputPath, rows, {
      onRow: (written) => {
        options.onProgress?.({ phase: "Reporting", position: written, length: rows.length });
      },
    });

    enter("Done");
    return {
      totalLines,
      distinctLines: snapshot.size,
      rowsWritten,
      linesPerWorker,
      elapsedMs: performance.now() - startTime,
    };
  } catch (error) {
    enter("Failed");
    throw error;
  }
}
