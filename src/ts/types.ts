/**
 * Type definitions for linefreq
 */

/** One row of the frequency report */
export interface ReportRow {
  line: string;
  count: number;
}

/** Phases of a counting run */
export type RunPhase =
  | "Idle"
  | "Counting"
  | "Dispatching"
  | "Draining"
  | "Reporting"
  | "Done"
  | "Failed";

/** Progress within the current phase */
export interface ProgressEvent {
  phase: RunPhase;
  position: number;
  /** Known once the counting pass has finished */
  length?: number;
}

/** Anything lines can be sent into */
export interface LineSink {
  send(line: string): void;
}

/** Run configuration */
export interface CountOptions {
  inputPath: string;
  outputPath: string;
  /** Number of counting workers (default: 5) */
  concurrency?: number;
  onPhase?: (phase: RunPhase) => void;
  onProgress?: (event: ProgressEvent) => void;
}

/** Result of a completed run */
export interface RunSummary {
  totalLines: number;
  distinctLines: number;
  rowsWritten: number;
  /** Lines processed by each worker, in worker order */
  linesPerWorker: number[];
  elapsedMs: number;
}
