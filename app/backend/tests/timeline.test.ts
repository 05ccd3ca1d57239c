import { describe, expect, test } from 'vitest';

import { animationDurations } from '../src/session/animations';
import { ProgressTimeline, Timeline } from '../src/session/timeline';

describe('Timeline', () => {
  test('progress follows elapsed time', () => {
    const timeline = new Timeline(1000, 2000);
    expect(timeline.update(2000)).toBe(0);
    expect(timeline.update(2500)).toBe(0.5);
    expect(timeline.isCompleted()).toBe(false);
  });

  test('completion fires exactly once', () => {
    const timeline = new Timeline(1000, 0);
    expect(timeline.advance(999)).toBe(false);
    expect(timeline.advance(1000)).toBe(true);
    expect(timeline.advance(1500)).toBe(false);
    expect(timeline.advance(5000)).toBe(false);
    expect(timeline.isCompleted()).toBe(true);
  });

  test('never rewinds when time goes backwards', () => {
    const timeline = new Timeline(1000, 0);
    timeline.update(800);
    expect(timeline.update(200)).toBe(0.8);
  });

  test('zero duration completes immediately', () => {
    expect(new Timeline(0, 10).advance(10)).toBe(true);
  });
});

describe('ProgressTimeline', () => {
  test('stays below 1 until finished', () => {
    const progress = new ProgressTimeline(0);
    expect(progress.update(4000)).toBeCloseTo(0.95 * (1 - Math.exp(-1)), 10);
    expect(progress.update(10_000_000)).toBeLessThan(1);
    expect(progress.advance(20_000_000)).toBe(false);
    expect(progress.finished).toBe(false);
  });

  test('runs to completion after finish and fires once', () => {
    const progress = new ProgressTimeline(0);
    progress.finish(1000, 300);
    const from = 0.95 * (1 - Math.exp(-0.25));
    expect(progress.finished).toBe(true);
    expect(progress.update(1150)).toBeCloseTo(from + (1 - from) * 0.5, 10);
    expect(progress.advance(1299)).toBe(false);
    expect(progress.advance(1300)).toBe(true);
    expect(progress.progress).toBe(1);
    expect(progress.advance(1400)).toBe(false);
  });
});

describe('animationDurations', () => {
  test('fast mode divides every duration by ten', () => {
    expect(animationDurations(true)).toEqual({
      ready: 300,
      countdownStep: 100,
      flash: 40,
      preview: 400,
      uploadFinish: 30,
    });
  });
});
