/** Raw RGBA pixels, 4 bytes per pixel, row major. */
export interface Photograph {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;
}

/** Only produced by `StripCompositor.compose`. */
export interface CompositeStrip extends Photograph {
  readonly kind: 'strip';
}

export interface UploadHandle {
  readonly takeId: string;
}

export interface Team {
  id: string;
  name: string;
  checkedIn: boolean;
}

export interface RemoteConfig {
  id: string;
  name: string;
  teams: Team[];
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export const createPhotograph = (width: number, height: number, data: Buffer): Photograph => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid photograph size ${width}x${height}`);
  }
  if (data.length !== width * height * 4) {
    throw new Error(
      `Photograph buffer holds ${data.length} bytes, expected ${width * height * 4} for ${width}x${height} RGBA`
    );
  }
  return Object.freeze({ width, height, data });
};
