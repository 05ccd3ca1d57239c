import { Sharp } from 'sharp';

import { pipelineFor } from '../../imaging';
import { Phase, isCapturePhase } from '../../session/phases';
import type { Photograph } from '../../types';

export interface CameraFeedOptions {
  /** Downscale divisor; 1 keeps full resolution. */
  blur: number;
  aspectRatio: number | null;
  mirror: boolean;
}

const BACKGROUND_BLUR = 20;

/**
 * Feed presentation is derived from the phase on every tick rather than
 * stored next to it.
 */
export function feedOptionsFor(phase: Phase, aspectRatio: number): CameraFeedOptions {
  if (isCapturePhase(phase)) {
    return { blur: 1, aspectRatio, mirror: true };
  }
  return { blur: BACKGROUND_BLUR, aspectRatio: null, mirror: true };
}

export interface CropRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** Largest centered region of the frame with the requested aspect ratio. */
export function cropToAspect(width: number, height: number, aspectRatio: number): CropRegion {
  const frameAspect = width / height;
  if (aspectRatio < frameAspect) {
    const newWidth = Math.max(1, Math.floor(height * aspectRatio));
    return { left: Math.floor((width - newWidth) / 2), top: 0, width: newWidth, height };
  }
  if (aspectRatio > frameAspect) {
    const newHeight = Math.max(1, Math.floor(width / aspectRatio));
    return { left: 0, top: Math.floor((height - newHeight) / 2), width, height: newHeight };
  }
  return { left: 0, top: 0, width, height };
}

export function applyFeedOptions(photo: Photograph, options: CameraFeedOptions): Sharp {
  const pipeline = pipelineFor(photo);
  let { width, height } = photo;
  if (options.aspectRatio) {
    const region = cropToAspect(width, height, options.aspectRatio);
    if (region.width !== width || region.height !== height) {
      pipeline.extract(region);
      ({ width, height } = region);
    }
  }
  if (options.mirror) {
    pipeline.flop();
  }
  if (options.blur > 1) {
    pipeline.resize(
      Math.max(1, Math.floor(width / options.blur)),
      Math.max(1, Math.floor(height / options.blur)),
      { fit: 'fill' }
    );
  }
  return pipeline;
}
