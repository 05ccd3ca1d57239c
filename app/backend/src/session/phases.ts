import { InvalidTransitionError } from '../errors';
import type { CompositeStrip, Photograph, RemoteConfig, Team, UploadHandle } from '../types';
import { CaptureSequencer } from './captureSequencer';
import { ProgressTimeline, Timeline } from './timeline';

export type Phase =
  | { kind: 'gated' }
  | { kind: 'preview' }
  | { kind: 'prepareCapture'; timeline: Timeline }
  | { kind: 'capturing'; sequencer: CaptureSequencer }
  | { kind: 'composing' }
  | { kind: 'uploading'; progress: ProgressTimeline }
  | { kind: 'distribution'; link: string }
  | { kind: 'notifying' };

export type PhaseKind = Phase['kind'];

export const PHASE_ORDER: readonly PhaseKind[] = [
  'gated',
  'preview',
  'prepareCapture',
  'capturing',
  'composing',
  'uploading',
  'distribution',
  'notifying',
];

export type SessionErrorKind = 'eligibility' | 'device' | 'composition' | 'backend' | 'notification';

export interface SessionError {
  kind: SessionErrorKind;
  message: string;
}

/**
 * The one live visitor cycle. Owned by whoever calls `handleEvent`; nothing
 * else mutates it.
 */
export interface Session {
  /** Bumped on every reset; completions from older cycles are dropped. */
  cycle: number;
  phase: Phase;
  photos: Photograph[];
  strip?: CompositeStrip;
  uploadHandle?: UploadHandle;
  recipients: string[];
  error: SessionError | null;
  remote: RemoteConfig | null;
  selectedTeam: number;
  team?: Team;
}

export function createSession(remote: RemoteConfig | null = null): Session {
  return {
    cycle: 0,
    phase: { kind: 'gated' },
    photos: [],
    recipients: [],
    error: null,
    remote,
    selectedTeam: 0,
  };
}

export const isCapturePhase = (phase: Phase) =>
  phase.kind === 'preview' || phase.kind === 'prepareCapture' || phase.kind === 'capturing';

/**
 * Within a cycle phases only move forward; the single way back is to gated.
 */
export function assertForwardTransition(from: PhaseKind, to: PhaseKind) {
  if (to === 'gated') return;
  if (PHASE_ORDER.indexOf(to) <= PHASE_ORDER.indexOf(from)) {
    throw new InvalidTransitionError(from, to);
  }
}
