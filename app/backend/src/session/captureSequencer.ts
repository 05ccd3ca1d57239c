import { DeviceError } from '../errors';
import type { Photograph, Result } from '../types';
import { AnimationDurations, COUNTDOWN_FROM } from './animations';
import { Timeline } from './timeline';

export type CaptureStep =
  | { kind: 'countdown'; remaining: number; timeline: Timeline }
  | { kind: 'flash'; timeline: Timeline; awaitingCapture: boolean }
  | { kind: 'preview'; timeline: Timeline; photo: Photograph };

export type SequencerSignal = 'requestCapture' | 'shotComplete' | 'sequenceComplete';

export type CaptureOutcome =
  | { type: 'captured'; shot: number; photo: Photograph }
  | { type: 'failed'; shot: number; error: DeviceError };

/**
 * Runs the shot ritual: countdown, flash (one still capture), preview, repeated
 * `shotCount` times. The countdown is local to a shot; the shot counter spans
 * the whole sequence.
 */
export class CaptureSequencer {
  private total = 0;
  private shot = 0;
  private captured = 0;
  private step: CaptureStep | null = null;
  private failed = false;

  constructor(private readonly durations: AnimationDurations) {}

  begin(shotCount: number, now: number) {
    if (!Number.isInteger(shotCount) || shotCount < 1) {
      throw new Error(`Capture sequence needs at least one shot, got ${shotCount}`);
    }
    this.total = shotCount;
    this.shot = 0;
    this.captured = 0;
    this.failed = false;
    this.step = this.countdown(now);
  }

  get totalShots() {
    return this.total;
  }

  get currentShot() {
    return this.shot;
  }

  get capturedCount() {
    return this.captured;
  }

  get currentStep(): CaptureStep | null {
    return this.step;
  }

  get hasFailed() {
    return this.failed;
  }

  isAwaitingCapture() {
    return this.step?.kind === 'flash' && this.step.awaitingCapture;
  }

  onTick(now: number): SequencerSignal | null {
    const step = this.step;
    if (!step) return null;

    switch (step.kind) {
      case 'countdown': {
        if (!step.timeline.advance(now)) return null;
        const remaining = step.remaining - 1;
        if (remaining > 0) {
          this.step = {
            kind: 'countdown',
            remaining,
            timeline: new Timeline(this.durations.countdownStep, now),
          };
          return null;
        }
        this.step = {
          kind: 'flash',
          timeline: new Timeline(this.durations.flash, now),
          awaitingCapture: true,
        };
        return 'requestCapture';
      }
      case 'flash':
        step.timeline.update(now);
        return null;
      case 'preview': {
        if (!step.timeline.advance(now)) return null;
        if (this.shot + 1 < this.total) {
          this.shot += 1;
          this.step = this.countdown(now);
          return 'shotComplete';
        }
        this.step = null;
        return 'sequenceComplete';
      }
    }
  }

  /**
   * Returns null when no capture is awaited for `shot`; the caller treats that
   * as a protocol violation.
   */
  onCaptureResult(
    shot: number,
    result: Result<Photograph, DeviceError>,
    now: number
  ): CaptureOutcome | null {
    const step = this.step;
    if (!step || step.kind !== 'flash' || !step.awaitingCapture || shot !== this.shot) {
      return null;
    }
    if (!result.ok) {
      this.step = null;
      this.failed = true;
      return { type: 'failed', shot, error: result.error };
    }
    this.captured += 1;
    this.step = {
      kind: 'preview',
      timeline: new Timeline(this.durations.preview, now),
      photo: result.value,
    };
    return { type: 'captured', shot, photo: result.value };
  }

  private countdown(now: number): CaptureStep {
    return {
      kind: 'countdown',
      remaining: COUNTDOWN_FROM,
      timeline: new Timeline(this.durations.countdownStep, now),
    };
  }
}
