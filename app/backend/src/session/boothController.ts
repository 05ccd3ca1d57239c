import { BackendError, DeviceError, describeError } from '../errors';
import { logger } from '../logger';
import { CameraFeedOptions, feedOptionsFor } from '../services/camera/feedOptions';
import { BoothBackend } from '../services/backend/boothBackend';
import { UploadCoordinator, toBackendError } from '../services/upload/uploadCoordinator';
import { CompositeStrip, Photograph, Result, err, ok } from '../types';
import { AnimationDurations } from './animations';
import { Session, createSession } from './phases';
import { BoothEvent, Command, MachineContext, handleEvent } from './sessionMachine';
import { SessionSnapshot, describeSession } from './snapshot';

export interface StillCamera {
  captureStill(): Promise<Photograph>;
  setFeedOptions(options: CameraFeedOptions): void;
}

export interface Compositor {
  readonly photoCount: number;
  compose(photos: readonly Photograph[]): Promise<CompositeStrip>;
  archive?(strip: CompositeStrip, name: string): Promise<string | undefined>;
}

export interface BoothControllerOptions {
  camera: StillCamera;
  compositor: Compositor;
  backend: BoothBackend;
  durations: AnimationDurations;
  aspectRatio: number;
  clock?: () => number;
}

type SnapshotListener = (snapshot: SessionSnapshot) => void;

const toDeviceError = (error: unknown) =>
  error instanceof DeviceError ? error : new DeviceError(describeError(error), error);

/**
 * Owns the live Session and runs the work the session machine asks for.
 * Every async result comes back through `dispatch` as a single event.
 */
export class BoothController {
  private readonly session: Session = createSession();
  private readonly context: MachineContext;
  private readonly uploads: UploadCoordinator;
  private readonly pending = new Set<Promise<void>>();
  private readonly listeners = new Set<SnapshotListener>();
  private tickTimer?: NodeJS.Timeout;

  constructor(private readonly options: BoothControllerOptions) {
    const clock = options.clock ?? Date.now;
    this.context = {
      now: clock,
      durations: options.durations,
      shotCount: options.compositor.photoCount,
      linkFor: (handle) => options.backend.linkFor(handle),
    };
    this.uploads = new UploadCoordinator(
      options.backend,
      (cycle, result) => this.dispatch({ type: 'uploadCompleted', cycle, result }),
      clock
    );
  }

  dispatch(event: BoothEvent) {
    const commands = handleEvent(this.session, event, this.context);
    if (event.type === 'tick') {
      this.options.camera.setFeedOptions(
        feedOptionsFor(this.session.phase, this.options.aspectRatio)
      );
    }
    for (const command of commands) {
      this.run(command);
    }
    if (event.type === 'tick' && this.listeners.size > 0) {
      const snapshot = this.snapshot();
      for (const listener of this.listeners) {
        listener(snapshot);
      }
    }
  }

  snapshot(): SessionSnapshot {
    return describeSession(this.session);
  }

  /** Called with a fresh snapshot after every tick. */
  subscribe(listener: SnapshotListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(tickRate: number) {
    if (this.tickTimer) return;
    const interval = Math.max(1, Math.round(1000 / tickRate));
    this.tickTimer = setInterval(() => {
      try {
        this.dispatch({ type: 'tick' });
      } catch (error) {
        logger.error(`[Session] Tick failed: ${describeError(error)}`);
      }
    }, interval);
    logger.info(`[Session] Ticking at ${tickRate} Hz`);
  }

  stop() {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = undefined;
    }
  }

  async refreshRemoteState(): Promise<void> {
    try {
      const config = await this.options.backend.fetchRemoteState();
      this.dispatch({ type: 'remoteConfigUpdated', config });
      logger.info(`[Session] Remote config refreshed: ${config.teams.length} team(s)`);
    } catch (error) {
      const failure = toBackendError(error);
      logger.error(`[Session] Remote config refresh failed (${failure.kind}): ${failure.message}`);
    }
  }

  /** Resolves once every outstanding capture, composition and network call has reported back. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private run(command: Command) {
    switch (command.type) {
      case 'captureStill': {
        const { cycle, shot } = command;
        this.track(
          settle(this.options.camera.captureStill(), toDeviceError).then((result) =>
            this.dispatch({ type: 'captureCompleted', cycle, shot, result })
          )
        );
        return;
      }
      case 'compose': {
        const { cycle, photos } = command;
        this.track(
          settle(this.options.compositor.compose(photos), toError).then((result) => {
            this.dispatch({ type: 'compositionCompleted', cycle, result });
            if (result.ok) this.archive(result.value, cycle);
          })
        );
        return;
      }
      case 'upload': {
        const token = this.uploads.start(command);
        this.track(token.settled.then(() => undefined));
        return;
      }
      case 'notify': {
        const { cycle, handle, recipients } = command;
        this.track(
          settle(
            this.options.backend.sendNotification(handle, recipients),
            toBackendError
          ).then((result: Result<boolean, BackendError>) =>
            this.dispatch({ type: 'notificationCompleted', cycle, result })
          )
        );
        return;
      }
    }
  }

  private archive(strip: CompositeStrip, cycle: number) {
    const archived = this.options.compositor.archive?.(strip, `strip-${Date.now()}-cycle${cycle}`);
    if (!archived) return;
    this.track(
      archived.then(
        () => undefined,
        (error: unknown) => {
          logger.warn(`[Strip] Archive failed: ${describeError(error)}`);
        }
      )
    );
  }

  private track(work: Promise<void>) {
    const tracked = work
      .catch((error: unknown) => {
        logger.error(`[Session] Completion handling failed: ${describeError(error)}`);
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

function settle<T, E>(work: Promise<T>, mapError: (error: unknown) => E): Promise<Result<T, E>> {
  return work.then(
    (value): Result<T, E> => ok(value),
    (error: unknown): Result<T, E> => err(mapError(error))
  );
}
