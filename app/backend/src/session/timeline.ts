/**
 * Progress in [0, 1] driven by wall-clock time. Never rewinds: a timeline is
 * replaced, not reset, when a phase needs a fresh one.
 */
export class Timeline {
  private value = 0;
  private fired = false;

  constructor(
    readonly duration: number,
    readonly startedAt: number
  ) {}

  get progress() {
    return this.value;
  }

  isCompleted() {
    return this.value >= 1;
  }

  update(now: number): number {
    const next = this.duration <= 0 ? 1 : (now - this.startedAt) / this.duration;
    this.value = Math.min(1, Math.max(this.value, next));
    return this.value;
  }

  /**
   * Returns true on the first update that reaches completion and false on
   * every later call, so a finished timeline fires its transition once.
   */
  advance(now: number): boolean {
    this.update(now);
    if (this.value >= 1 && !this.fired) {
      this.fired = true;
      return true;
    }
    return false;
  }
}

const PROGRESS_CAP = 0.95;
const PROGRESS_TIME_CONSTANT = 4000;

/**
 * Upload progress. Creeps towards PROGRESS_CAP while the real work is pending,
 * then runs to 1 once `finish` is called.
 */
export class ProgressTimeline {
  private value = 0;
  private finishing?: { from: number; startedAt: number; duration: number };
  private fired = false;

  constructor(readonly startedAt: number) {}

  get progress() {
    return this.value;
  }

  get finished() {
    return this.finishing !== undefined;
  }

  update(now: number): number {
    if (this.finishing) {
      const { from, startedAt, duration } = this.finishing;
      const t = duration <= 0 ? 1 : Math.min(1, Math.max(0, (now - startedAt) / duration));
      this.value = t >= 1 ? 1 : Math.max(this.value, from + (1 - from) * t);
    } else {
      const elapsed = Math.max(0, now - this.startedAt);
      const next = PROGRESS_CAP * (1 - Math.exp(-elapsed / PROGRESS_TIME_CONSTANT));
      this.value = Math.max(this.value, next);
    }
    return this.value;
  }

  finish(now: number, duration: number) {
    if (this.finishing) return;
    this.update(now);
    this.finishing = { from: this.value, startedAt: now, duration };
  }

  advance(now: number): boolean {
    this.update(now);
    if (this.finishing && this.value >= 1 && !this.fired) {
      this.fired = true;
      return true;
    }
    return false;
  }
}
