/**
 * linefreq - Concurrent line frequency counting
 *
 * @module linefreq
 */

export { countLineFrequencies, validateConcurrency, DEFAULT_CONCURRENCY } from "./pipeline";
export { LineSource } from "./source";
export { WorkChannel } from "./channel";
export { Mutex, type Release } from "./mutex";
export { FrequencyTable, runWorker } from "./accumulator";
export { buildReport, writeReport, REPORT_HEADER, type WriteReportOptions } from "./report";
export { CSVWriter, type CSVWriterOptions, type CSVValue } from "./writer";
export {
  LineFreqError,
  toLineFreqError,
  type LineFreqErrorCode,
  type LineFreqErrorInfo,
  type LineFreqOperation,
} from "./errors";
export type {
  CountOptions,
  LineSink,
  ProgressEvent,
  ReportRow,
  RunPhase,
  RunSummary,
} from "./types";
