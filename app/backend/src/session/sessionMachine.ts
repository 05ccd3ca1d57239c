import { z } from 'zod';

import { BackendError, DeviceError, describeError } from '../errors';
import { logger } from '../logger';
import type { CompositeStrip, Photograph, RemoteConfig, Result, UploadHandle } from '../types';
import { AnimationDurations } from './animations';
import { CaptureSequencer } from './captureSequencer';
import {
  Phase,
  Session,
  SessionError,
  assertForwardTransition,
} from './phases';
import { ProgressTimeline, Timeline } from './timeline';

export type KeyName = 'confirm' | 'up' | 'down' | 'cancel';

export type BoothEvent =
  | { type: 'tick' }
  | { type: 'keyReleased'; key: KeyName }
  | {
      type: 'captureCompleted';
      cycle: number;
      shot: number;
      result: Result<Photograph, DeviceError>;
    }
  | { type: 'compositionCompleted'; cycle: number; result: Result<CompositeStrip, Error> }
  | { type: 'uploadCompleted'; cycle: number; result: Result<UploadHandle, BackendError> }
  | { type: 'notificationCompleted'; cycle: number; result: Result<boolean, BackendError> }
  | { type: 'recipientAdded'; email: string }
  | { type: 'recipientRemoved'; index: number }
  | { type: 'recipientsSubmitted' }
  | { type: 'remoteConfigUpdated'; config: RemoteConfig };

export type Command =
  | { type: 'captureStill'; cycle: number; shot: number }
  | { type: 'compose'; cycle: number; photos: Photograph[] }
  | { type: 'upload'; cycle: number; strip: CompositeStrip; photos: Photograph[] }
  | { type: 'notify'; cycle: number; handle: UploadHandle; recipients: string[] };

export interface MachineContext {
  now: () => number;
  durations: AnimationDurations;
  shotCount: number;
  linkFor: (handle: UploadHandle) => string;
}

const emailSchema = z.string().trim().email();

const NONE: Command[] = [];

/**
 * Applies one event to the session and returns the asynchronous work the
 * caller must start. All phase mutation happens here, synchronously.
 */
export function handleEvent(session: Session, event: BoothEvent, ctx: MachineContext): Command[] {
  switch (event.type) {
    case 'tick':
      return onTick(session, ctx);
    case 'keyReleased':
      return onKey(session, event.key, ctx);
    case 'captureCompleted':
      return onCaptureCompleted(session, event, ctx);
    case 'compositionCompleted':
      return onCompositionCompleted(session, event, ctx);
    case 'uploadCompleted':
      return onUploadCompleted(session, event, ctx);
    case 'notificationCompleted':
      return onNotificationCompleted(session, event);
    case 'recipientAdded':
      return onRecipientAdded(session, event.email);
    case 'recipientRemoved':
      return onRecipientRemoved(session, event.index);
    case 'recipientsSubmitted':
      return onRecipientsSubmitted(session);
    case 'remoteConfigUpdated':
      session.remote = event.config;
      session.selectedTeam = clampSelection(session.selectedTeam, event.config.teams.length);
      return NONE;
  }
}

/**
 * Back to the gate. Drops everything the visitor produced; a stray completion
 * for the abandoned cycle is discarded by the cycle check.
 */
export function resetSession(session: Session, error: SessionError | null) {
  session.cycle += 1;
  session.phase = { kind: 'gated' };
  session.photos = [];
  session.strip = undefined;
  session.uploadHandle = undefined;
  session.recipients = [];
  session.team = undefined;
  session.error = error;
  if (error) {
    logger.warn(`[Session] Back to gate (${error.kind}): ${error.message}`);
  } else {
    logger.info('[Session] Back to gate');
  }
}

function moveTo(session: Session, next: Phase) {
  assertForwardTransition(session.phase.kind, next.kind);
  logger.debug(`[Session] ${session.phase.kind} -> ${next.kind}`);
  session.phase = next;
}

function protocolViolation(session: Session, what: string) {
  logger.warn(`[Session] Ignored ${what} in phase ${session.phase.kind} (cycle ${session.cycle})`);
  return NONE;
}

function clampSelection(index: number, length: number) {
  if (length === 0) return 0;
  return Math.min(Math.max(index, 0), length - 1);
}

function onTick(session: Session, ctx: MachineContext): Command[] {
  const phase = session.phase;
  const now = ctx.now();

  switch (phase.kind) {
    case 'prepareCapture': {
      if (!phase.timeline.advance(now)) return NONE;
      const sequencer = new CaptureSequencer(ctx.durations);
      sequencer.begin(ctx.shotCount, now);
      moveTo(session, { kind: 'capturing', sequencer });
      return NONE;
    }
    case 'capturing': {
      const signal = phase.sequencer.onTick(now);
      if (signal === 'requestCapture') {
        const shot = phase.sequencer.currentShot;
        logger.info(`[Session] Capturing shot ${shot + 1}/${phase.sequencer.totalShots}`);
        return [{ type: 'captureStill', cycle: session.cycle, shot }];
      }
      if (signal === 'sequenceComplete') {
        if (session.photos.length !== ctx.shotCount) {
          throw new Error(
            `Sequence completed with ${session.photos.length} photographs, expected ${ctx.shotCount}`
          );
        }
        moveTo(session, { kind: 'composing' });
        return [{ type: 'compose', cycle: session.cycle, photos: [...session.photos] }];
      }
      return NONE;
    }
    case 'uploading': {
      if (!phase.progress.advance(now)) return NONE;
      const handle = session.uploadHandle;
      if (!handle) {
        throw new Error('Upload progress finished without an upload handle');
      }
      moveTo(session, { kind: 'distribution', link: ctx.linkFor(handle) });
      return NONE;
    }
    default:
      return NONE;
  }
}

function onKey(session: Session, key: KeyName, ctx: MachineContext): Command[] {
  const phase = session.phase;

  switch (phase.kind) {
    case 'gated': {
      const teams = session.remote?.teams ?? [];
      if (key === 'up' || key === 'down') {
        const delta = key === 'up' ? -1 : 1;
        session.selectedTeam = clampSelection(session.selectedTeam + delta, teams.length);
        return NONE;
      }
      if (key !== 'confirm') return NONE;
      const team = teams[session.selectedTeam];
      if (!team) {
        session.error = { kind: 'eligibility', message: 'No team selected' };
        logger.warn('[Session] Gate check failed: no team available');
        return NONE;
      }
      if (!team.checkedIn) {
        session.error = { kind: 'eligibility', message: `${team.name} is not checked in` };
        logger.warn(`[Session] Gate check failed for team ${team.id}`);
        return NONE;
      }
      session.error = null;
      session.team = team;
      logger.info(`[Session] Cycle ${session.cycle} opened for team ${team.name}`);
      moveTo(session, { kind: 'preview' });
      return NONE;
    }
    case 'preview':
      if (key === 'confirm') {
        moveTo(session, {
          kind: 'prepareCapture',
          timeline: new Timeline(ctx.durations.ready, ctx.now()),
        });
      } else if (key === 'cancel') {
        resetSession(session, null);
      }
      return NONE;
    case 'distribution':
      if (key === 'confirm') return onRecipientsSubmitted(session);
      if (key === 'cancel') resetSession(session, null);
      return NONE;
    default:
      return NONE;
  }
}

function onCaptureCompleted(
  session: Session,
  event: Extract<BoothEvent, { type: 'captureCompleted' }>,
  ctx: MachineContext
): Command[] {
  const phase = session.phase;
  if (event.cycle !== session.cycle || phase.kind !== 'capturing') {
    return protocolViolation(session, `capture result for cycle ${event.cycle} shot ${event.shot}`);
  }
  const outcome = phase.sequencer.onCaptureResult(event.shot, event.result, ctx.now());
  if (!outcome) {
    return protocolViolation(session, `capture result for shot ${event.shot}`);
  }
  if (outcome.type === 'failed') {
    resetSession(session, { kind: 'device', message: outcome.error.message });
    return NONE;
  }
  session.photos.push(outcome.photo);
  logger.info(`[Session] Shot ${outcome.shot + 1} captured`);
  return NONE;
}

function onCompositionCompleted(
  session: Session,
  event: Extract<BoothEvent, { type: 'compositionCompleted' }>,
  ctx: MachineContext
): Command[] {
  if (event.cycle !== session.cycle || session.phase.kind !== 'composing') {
    return protocolViolation(session, `composition result for cycle ${event.cycle}`);
  }
  if (!event.result.ok) {
    resetSession(session, { kind: 'composition', message: describeError(event.result.error) });
    return NONE;
  }
  const strip = event.result.value;
  session.strip = strip;
  moveTo(session, { kind: 'uploading', progress: new ProgressTimeline(ctx.now()) });
  return [{ type: 'upload', cycle: session.cycle, strip, photos: [...session.photos] }];
}

function onUploadCompleted(
  session: Session,
  event: Extract<BoothEvent, { type: 'uploadCompleted' }>,
  ctx: MachineContext
): Command[] {
  const phase = session.phase;
  if (event.cycle !== session.cycle || phase.kind !== 'uploading' || phase.progress.finished) {
    return protocolViolation(session, `upload result for cycle ${event.cycle}`);
  }
  if (!event.result.ok) {
    const error = event.result.error;
    logger.error(`[Session] Upload failed (${error.kind}): ${error.message}`);
    resetSession(session, { kind: 'backend', message: 'Could not upload your photos' });
    return NONE;
  }
  session.uploadHandle = event.result.value;
  phase.progress.finish(ctx.now(), ctx.durations.uploadFinish);
  logger.info(`[Session] Upload finished, take ${event.result.value.takeId}`);
  return NONE;
}

function onNotificationCompleted(
  session: Session,
  event: Extract<BoothEvent, { type: 'notificationCompleted' }>
): Command[] {
  if (event.cycle !== session.cycle || session.phase.kind !== 'notifying') {
    return protocolViolation(session, `notification result for cycle ${event.cycle}`);
  }
  if (!event.result.ok) {
    const error = event.result.error;
    logger.error(`[Session] Notification failed (${error.kind}): ${error.message}`);
    resetSession(session, { kind: 'notification', message: 'Could not send your photos' });
    return NONE;
  }
  if (!event.result.value) {
    resetSession(session, { kind: 'notification', message: 'Could not send your photos' });
    return NONE;
  }
  resetSession(session, null);
  return NONE;
}

function onRecipientAdded(session: Session, email: string): Command[] {
  if (session.phase.kind !== 'distribution') {
    return protocolViolation(session, 'recipient');
  }
  const parsed = emailSchema.safeParse(email);
  if (!parsed.success) {
    logger.warn(`[Session] Rejected recipient "${email}"`);
    return NONE;
  }
  const address = parsed.data;
  if (!session.recipients.some((existing) => existing.toLowerCase() === address.toLowerCase())) {
    session.recipients.push(address);
  }
  return NONE;
}

function onRecipientRemoved(session: Session, index: number): Command[] {
  if (session.phase.kind !== 'distribution') {
    return protocolViolation(session, 'recipient removal');
  }
  if (Number.isInteger(index) && index >= 0 && index < session.recipients.length) {
    session.recipients.splice(index, 1);
  }
  return NONE;
}

/**
 * Notification consumes the upload handle. Without one the request is refused
 * and logged, never silently skipped.
 */
function onRecipientsSubmitted(session: Session): Command[] {
  const handle = session.uploadHandle;
  if (session.phase.kind !== 'distribution') {
    if (!handle) {
      logger.error(`[Session] Notification refused: no upload handle (cycle ${session.cycle})`);
      return NONE;
    }
    return protocolViolation(session, 'recipient submission');
  }
  if (session.recipients.length === 0) {
    resetSession(session, null);
    return NONE;
  }
  if (!handle) {
    logger.error(`[Session] Notification refused: no upload handle (cycle ${session.cycle})`);
    resetSession(session, { kind: 'notification', message: 'Could not send your photos' });
    return NONE;
  }
  const recipients = [...session.recipients];
  moveTo(session, { kind: 'notifying' });
  logger.info(`[Session] Sending take ${handle.takeId} to ${recipients.length} recipient(s)`);
  return [{ type: 'notify', cycle: session.cycle, handle, recipients }];
}
