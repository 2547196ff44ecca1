/**
 * Progress bar on stderr
 */

/** Where the bar is drawn */
export interface ProgressOutput {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

export interface ProgressState {
  position: number;
  length?: number;
  message: string;
  elapsedMs: number;
}

export interface ProgressBarOptions {
  /** Draw at all (default: output is a TTY) */
  enabled?: boolean;
  /** Bar width in characters (default: 40) */
  width?: number;
  /** Minimum time between redraws (default: 100ms) */
  redrawIntervalMs?: number;
  /** Clock, for tests */
  now?: () => number;
}

const BAR_CHARS = { filled: "#", head: ">", empty: "-" };

/** Format milliseconds as HH:MM:SS */
export function formatElapsed(ms: number): string {
  const total = Math.floor(ms / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return [hours, minutes, seconds].map((n) => String(n).padStart(2, "0")).join(":");
}

/** Remaining seconds at the current rate */
export function estimateRemaining(state: ProgressState): number {
  const { position, length, elapsedMs } = state;
  if (length === undefined || position <= 0 || position >= length) return 0;
  return Math.round((elapsedMs / 1000) * ((length - position) / position));
}

/** Draw the bar itself, e.g. `####>-----` */
export function renderBar(position: number, length: number, width: number): string {
  const ratio = length <= 0 ? 1 : Math.min(1, position / length);
  const filled = Math.floor(ratio * width);
  if (filled >= width) return BAR_CHARS.filled.repeat(width);
  return BAR_CHARS.filled.repeat(filled) + BAR_CHARS.head + BAR_CHARS.empty.repeat(width - filled - 1);
}

/**
 * One line of progress output:
 * `[00:00:03] [####>-----] 40/100 (eta 5s) counting`
 */
export function renderProgress(state: ProgressState, width: number = 40): string {
  const elapsed = `[${formatElapsed(state.elapsedMs)}]`;

  if (state.length === undefined) {
    return `${elapsed} ${state.position} ${state.message}`.trimEnd();
  }

  const bar = renderBar(state.position, state.length, width);
  const eta = `(eta ${estimateRemaining(state)}s)`;
  return `${elapsed} [${bar}] ${state.position}/${state.length} ${eta} ${state.message}`.trimEnd();
}

/**
 * Progress bar redrawn in place. Silent when the output is not a TTY.
 */
export class ProgressBar {
  private output: ProgressOutput;
  private enabled: boolean;
  private width: number;
  private redrawIntervalMs: number;
  private now: () => number;
  private startedAt: number;
  private lastDrawAt: number = -Infinity;
  private position: number = 0;
  private length: number | undefined;
  private message: string = "";
  private ended: boolean = false;

  constructor(output: ProgressOutput, options: ProgressBarOptions = {}) {
    this.output = output;
    this.enabled = options.enabled ?? output.isTTY === true;
    this.width = options.width ?? 40;
    this.redrawIntervalMs = options.redrawIntervalMs ?? 100;
    this.now = options.now ?? (() => performance.now());
    this.startedAt = this.now();
  }

  /** Start a new stage with a fresh position */
  reset(length?: number, message?: string): void {
    this.position = 0;
    this.length = length;
    if (message !== undefined) this.message = message;
    this.draw(true);
  }

  setMessage(message: string): void {
    this.message = message;
    this.draw(true);
  }

  setPosition(position: number): void {
    this.position = position;
    this.draw(false);
  }

  /** Move to `position`, adopting `length` once it is known */
  update(position: number, length?: number): void {
    if (length !== undefined) this.length = length;
    this.setPosition(position);
  }

  /** Draw the completed bar and end the line */
  finish(message?: string): void {
    if (this.ended) return;
    if (this.length !== undefined) this.position = this.length;
    this.end(message);
  }

  /** End the line, leaving the bar where it stopped */
  abandon(message?: string): void {
    this.end(message);
  }

  getState(): ProgressState {
    return {
      position: this.position,
      length: this.length,
      message: this.message,
      elapsedMs: this.now() - this.startedAt,
    };
  }

  private end(message?: string): void {
    if (this.ended) return;
    if (message !== undefined) this.message = message;
    this.draw(true);
    if (this.enabled) this.output.write("\n");
    this.ended = true;
  }

  private draw(force: boolean): void {
    if (!this.enabled || this.ended) return;

    const now = this.now();
    if (!force && now - this.lastDrawAt < this.redrawIntervalMs) return;
    this.lastDrawAt = now;

    this.output.write(`\r\x1b[2K${renderProgress(this.getState(), this.width)}`);
  }
}
