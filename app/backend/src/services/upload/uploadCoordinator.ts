import {
  BackendError,
  UploadAlreadyStartedError,
  UploadInProgressError,
  describeError,
} from '../../errors';
import { logger } from '../../logger';
import { CompositeStrip, Photograph, Result, UploadHandle, err, ok } from '../../types';
import { BoothBackend } from '../backend/boothBackend';

export interface UploadRequest {
  cycle: number;
  strip: CompositeStrip;
  photos: readonly Photograph[];
}

export type UploadResult = Result<UploadHandle, BackendError>;

export interface UploadToken {
  cycle: number;
  startedAt: number;
  /** Settles after the completion listener ran. Never rejects. */
  settled: Promise<UploadResult>;
}

type UploadListener = (cycle: number, result: UploadResult) => void;

export const toBackendError = (error: unknown): BackendError =>
  error instanceof BackendError
    ? error
    : new BackendError('network', describeError(error), error);

/**
 * One upload per session cycle, never retried. A second start while one is in
 * flight, or for a cycle that already uploaded, is a programming error.
 */
export class UploadCoordinator {
  private inFlight?: UploadToken;
  private lastCycle?: number;

  constructor(
    private readonly backend: BoothBackend,
    private readonly onComplete: UploadListener,
    private readonly clock: () => number = Date.now
  ) {}

  isInFlight() {
    return this.inFlight !== undefined;
  }

  start(request: UploadRequest): UploadToken {
    if (this.inFlight) {
      throw new UploadInProgressError(this.inFlight.cycle);
    }
    if (this.lastCycle === request.cycle) {
      throw new UploadAlreadyStartedError(request.cycle);
    }
    const { cycle, strip, photos } = request;
    const startedAt = this.clock();
    this.lastCycle = cycle;
    logger.info(`[Upload] Starting upload for cycle ${cycle} (${photos.length} frames + strip)`);

    const settled = this.backend
      .upload(strip, photos)
      .then(
        (handle): UploadResult => ok(handle),
        (error: unknown): UploadResult => err(toBackendError(error))
      )
      .then((result) => {
        this.inFlight = undefined;
        const elapsed = this.clock() - startedAt;
        if (result.ok) {
          logger.info(`[Upload] Cycle ${cycle} uploaded as ${result.value.takeId} in ${elapsed}ms`);
        } else {
          logger.error(
            `[Upload] Cycle ${cycle} failed (${result.error.kind}) after ${elapsed}ms: ${result.error.message}`
          );
        }
        try {
          this.onComplete(cycle, result);
        } catch (error) {
          logger.error(
            `[Upload] Completion listener failed for cycle ${cycle}: ${describeError(error)}`
          );
        }
        return result;
      });

    const token: UploadToken = { cycle, startedAt, settled };
    this.inFlight = token;
    return token;
  }
}
