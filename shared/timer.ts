/**
 * Countdown timer driven by per-tick deltas (seconds).
 * Used for spawn throttles and blast lifetimes.
 */

export type TimerMode = 'once' | 'repeating';

export class Timer {
  readonly duration: number;
  readonly mode: TimerMode;

  private elapsedSeconds = 0;
  private isPaused = false;
  private isFinished = false;
  private finishedThisTick = 0;

  constructor(durationSeconds: number, mode: TimerMode) {
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      throw new Error(`Timer duration must be a positive number of seconds, got ${durationSeconds}`);
    }
    this.duration = durationSeconds;
    this.mode = mode;
  }

  get elapsed(): number {
    return this.elapsedSeconds;
  }

  get paused(): boolean {
    return this.isPaused;
  }

  /**
   * True once the countdown has reached its duration.
   * A repeating timer is only finished during the tick it wrapped.
   */
  get finished(): boolean {
    return this.isFinished;
  }

  /**
   * True only during the tick the countdown crossed its duration.
   */
  get justFinished(): boolean {
    return this.finishedThisTick > 0;
  }

  tick(deltaSeconds: number): void {
    if (this.isPaused) {
      this.finishedThisTick = 0;
      return;
    }

    // A once-timer that already fired stays finished but never re-reports
    if (this.mode === 'once' && this.isFinished) {
      this.finishedThisTick = 0;
      return;
    }

    this.elapsedSeconds += Math.max(0, deltaSeconds);

    if (this.elapsedSeconds < this.duration) {
      this.isFinished = false;
      this.finishedThisTick = 0;
      return;
    }

    if (this.mode === 'repeating') {
      this.finishedThisTick = Math.floor(this.elapsedSeconds / this.duration);
      this.elapsedSeconds %= this.duration;
    } else {
      this.finishedThisTick = 1;
      this.elapsedSeconds = this.duration;
    }
    this.isFinished = true;
  }

  reset(): void {
    this.elapsedSeconds = 0;
    this.isFinished = false;
    this.finishedThisTick = 0;
  }

  pause(): void {
    this.isPaused = true;
  }

  unpause(): void {
    this.isPaused = false;
  }
}
