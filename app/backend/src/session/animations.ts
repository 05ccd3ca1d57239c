export interface AnimationDurations {
  ready: number;
  countdownStep: number;
  flash: number;
  preview: number;
  uploadFinish: number;
}

const DEFAULT_DURATIONS: AnimationDurations = {
  ready: 3000,
  countdownStep: 1000,
  flash: 400,
  preview: 4000,
  uploadFinish: 300,
};

const FAST_DIVISOR = 10;

export const COUNTDOWN_FROM = 3;

export function animationDurations(fast = false): AnimationDurations {
  if (!fast) return { ...DEFAULT_DURATIONS };
  return {
    ready: DEFAULT_DURATIONS.ready / FAST_DIVISOR,
    countdownStep: DEFAULT_DURATIONS.countdownStep / FAST_DIVISOR,
    flash: DEFAULT_DURATIONS.flash / FAST_DIVISOR,
    preview: DEFAULT_DURATIONS.preview / FAST_DIVISOR,
    uploadFinish: DEFAULT_DURATIONS.uploadFinish / FAST_DIVISOR,
  };
}
