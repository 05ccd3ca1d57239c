import { describe, expect, test } from 'vitest';

import { DeviceError } from '../src/errors';
import { animationDurations } from '../src/session/animations';
import { CaptureSequencer } from '../src/session/captureSequencer';
import { err, ok } from '../src/types';
import { solidPhoto } from './helpers';

const durations = animationDurations();

/** Countdown starts at `start`; returns the time the shot's preview ends. */
function runShot(sequencer: CaptureSequencer, start: number) {
  expect(sequencer.onTick(start + 1000)).toBeNull();
  expect(sequencer.onTick(start + 2000)).toBeNull();
  expect(sequencer.onTick(start + 3000)).toBe('requestCapture');
  const outcome = sequencer.onCaptureResult(sequencer.currentShot, ok(solidPhoto(4, 4)), start + 3000);
  expect(outcome?.type).toBe('captured');
  return start + 7000;
}

describe('CaptureSequencer', () => {
  test('counts down 3, 2, 1 before requesting a capture', () => {
    const sequencer = new CaptureSequencer(durations);
    sequencer.begin(4, 0);

    const countdowns: number[] = [];
    const record = () => {
      const step = sequencer.currentStep;
      if (step?.kind === 'countdown') countdowns.push(step.remaining);
    };

    record();
    expect(sequencer.onTick(999)).toBeNull();
    expect(sequencer.onTick(1000)).toBeNull();
    record();
    expect(sequencer.onTick(2000)).toBeNull();
    record();
    expect(sequencer.onTick(3000)).toBe('requestCapture');

    expect(countdowns).toEqual([3, 2, 1]);
    expect(sequencer.currentStep?.kind).toBe('flash');
    expect(sequencer.isAwaitingCapture()).toBe(true);
  });

  test('waits in flash until the capture reports back', () => {
    const sequencer = new CaptureSequencer(durations);
    sequencer.begin(4, 0);
    sequencer.onTick(1000);
    sequencer.onTick(2000);
    sequencer.onTick(3000);

    expect(sequencer.onTick(60_000)).toBeNull();
    expect(sequencer.currentStep?.kind).toBe('flash');
  });

  test('requests one capture per shot and completes after the last preview', () => {
    const sequencer = new CaptureSequencer(durations);
    sequencer.begin(4, 0);
    const signals: string[] = [];

    let start = 0;
    for (let shot = 0; shot < 4; shot += 1) {
      expect(sequencer.currentShot).toBe(shot);
      const end = runShot(sequencer, start);
      expect(sequencer.onTick(end - 1)).toBeNull();
      const signal = sequencer.onTick(end);
      if (signal) signals.push(signal);
      start = end;
    }

    expect(signals).toEqual(['shotComplete', 'shotComplete', 'shotComplete', 'sequenceComplete']);
    expect(sequencer.capturedCount).toBe(4);
    expect(sequencer.currentStep).toBeNull();
    expect(sequencer.onTick(start + 10_000)).toBeNull();
  });

  test('the countdown restarts at 3 for every shot', () => {
    const sequencer = new CaptureSequencer(durations);
    sequencer.begin(2, 0);
    const end = runShot(sequencer, 0);
    expect(sequencer.onTick(end)).toBe('shotComplete');

    const step = sequencer.currentStep;
    expect(step?.kind).toBe('countdown');
    expect(step?.kind === 'countdown' ? step.remaining : null).toBe(3);
    expect(sequencer.currentShot).toBe(1);
  });

  test('ignores a duplicate capture result for a shot already past flash', () => {
    const sequencer = new CaptureSequencer(durations);
    sequencer.begin(4, 0);
    runShot(sequencer, 0);

    expect(sequencer.onCaptureResult(0, ok(solidPhoto(4, 4)), 3500)).toBeNull();
    expect(sequencer.capturedCount).toBe(1);
    expect(sequencer.currentStep?.kind).toBe('preview');
  });

  test('ignores a capture result for another shot', () => {
    const sequencer = new CaptureSequencer(durations);
    sequencer.begin(4, 0);
    sequencer.onTick(1000);
    sequencer.onTick(2000);
    sequencer.onTick(3000);

    expect(sequencer.onCaptureResult(2, ok(solidPhoto(4, 4)), 3100)).toBeNull();
    expect(sequencer.isAwaitingCapture()).toBe(true);
  });

  test('ignores a capture result during the countdown', () => {
    const sequencer = new CaptureSequencer(durations);
    sequencer.begin(4, 0);
    expect(sequencer.onCaptureResult(0, ok(solidPhoto(4, 4)), 100)).toBeNull();
  });

  test('a failed capture ends the sequence', () => {
    const sequencer = new CaptureSequencer(durations);
    sequencer.begin(4, 0);
    sequencer.onTick(1000);
    sequencer.onTick(2000);
    sequencer.onTick(3000);

    const outcome = sequencer.onCaptureResult(0, err(new DeviceError('lens cap on')), 3100);
    expect(outcome).toEqual({ type: 'failed', shot: 0, error: new DeviceError('lens cap on') });
    expect(sequencer.hasFailed).toBe(true);
    expect(sequencer.currentStep).toBeNull();
    expect(sequencer.onTick(10_000)).toBeNull();
  });

  test('rejects an empty sequence', () => {
    expect(() => new CaptureSequencer(durations).begin(0, 0)).toThrow(
      'Capture sequence needs at least one shot, got 0'
    );
  });
});
