/**
 * Base class for every error the booth raises on purpose.
 */
export class BoothError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BoothError';
  }
}

/**
 * Camera unavailable or a capture failed. Always fatal to the current session.
 */
export class DeviceError extends BoothError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DeviceError';
  }
}

export type BackendErrorKind = 'network' | 'auth' | 'encode' | 'protocol';

/**
 * Upload, notification or remote config failure. The kind is only used for logs;
 * visitors always see the same "could not upload" outcome.
 */
export class BackendError extends BoothError {
  constructor(readonly kind: BackendErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'BackendError';
  }
}

export class InvalidPhotoCountError extends BoothError {
  constructor(readonly expected: number, readonly received: number) {
    super(`Strip needs exactly ${expected} photographs, received ${received}`);
    this.name = 'InvalidPhotoCountError';
  }
}

export class UploadInProgressError extends BoothError {
  constructor(cycle: number) {
    super(`Upload already in flight (cycle ${cycle})`);
    this.name = 'UploadInProgressError';
  }
}

export class UploadAlreadyStartedError extends BoothError {
  constructor(cycle: number) {
    super(`Upload already started for cycle ${cycle}`);
    this.name = 'UploadAlreadyStartedError';
  }
}

/**
 * A phase change the machine never makes. This is a bug, not an edge case.
 */
export class InvalidTransitionError extends BoothError {
  constructor(from: string, to: string) {
    super(`Invalid phase transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
