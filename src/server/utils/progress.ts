/**
 * Progress and ETA reporting for long-running batch jobs
 */

/**
 * Format remaining seconds as `1h02m03s` or `02m03s`; negative values mean unknown
 */
export function formatEta(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    return '--:--';
  }
  const total = Math.floor(seconds);
  const s = total % 60;
  const m = Math.floor(total / 60) % 60;
  const h = Math.floor(total / 3600);
  const pad = (n: number) => String(n).padStart(2, '0');
  if (h > 0) {
    return `${h}h${pad(m)}m${pad(s)}s`;
  }
  return `${pad(m)}m${pad(s)}s`;
}

export interface ProgressSnapshot {
  done: number;
  total: number;
  /** Fraction done, 0..1; 1 when the total is unknown or zero */
  ratio: number;
  elapsedSeconds: number;
  /** -1 when nothing is done yet */
  etaSeconds: number;
  /** Items per second */
  rate: number;
}

/**
 * Elapsed time, rate and ETA for `total` items; pass 0 when the total is not known
 */
export class ProgressTracker {
  private readonly startedAt: number;

  constructor(
    readonly total: number,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
  }

  elapsedSeconds(): number {
    return (this.now() - this.startedAt) / 1000;
  }

  snapshot(done: number): ProgressSnapshot {
    const elapsedSeconds = this.elapsedSeconds();
    const ratio = this.total > 0 ? done / this.total : 1;
    return {
      done,
      total: this.total,
      ratio,
      elapsedSeconds,
      etaSeconds: ratio > 0 ? elapsedSeconds / ratio - elapsedSeconds : -1,
      rate: elapsedSeconds > 0 ? done / elapsedSeconds : 0,
    };
  }

  /**
   * `[12/40  30.0% ETA:00m05s]`
   */
  format(done: number): string {
    const { ratio, etaSeconds } = this.snapshot(done);
    const percent = (ratio * 100).toFixed(1).padStart(5, ' ');
    return `[${done}/${this.total} ${percent}% ETA:${formatEta(etaSeconds)}]`;
  }
}
