/**
 * FrequencyTable - Shared line counts behind a single lock
 */

import { Mutex } from "./mutex";
import type { WorkChannel } from "./channel";

/**
 * Mapping from line to occurrence count. All mutation goes through
 * `increment`, which holds the table-wide lock across lookup and update.
 */
export class FrequencyTable {
  private counts: Map<string, number> = new Map();
  private lock: Mutex = new Mutex();
  private _total: number = 0;

  /**
   * Add one occurrence of `line`.
   */
  increment(line: string): Promise<void> {
    return this.lock.runExclusive(() => {
      const current = this.counts.get(line) ?? 0;
      this.counts.set(line, current + 1);
      this._total++;
    });
  }

  /**
   * Current count for a line (0 if never seen).
   */
  get(line: string): number {
    return this.counts.get(line) ?? 0;
  }

  /** Number of distinct lines */
  get size(): number {
    return this.counts.size;
  }

  /** Sum of all counts */
  get total(): number {
    return this._total;
  }

  /**
   * Copy of the counts. Take it only after every worker has finished.
   */
  snapshot(): ReadonlyMap<string, number> {
    return new Map(this.counts);
  }
}

/**
 * Drain the channel into the table until it is closed and empty.
 * Resolves with the number of lines this worker counted.
 */
export async function runWorker(
  channel: WorkChannel<string>,
  table: FrequencyTable
): Promise<number> {
  let processed = 0;
  for await (const line of channel) {
    await table.increment(line);
    processed++;
  }
  return processed;
}
