import type { Team } from '../types';
import { PhaseKind, Session, SessionError } from './phases';

export interface SessionSnapshot {
  cycle: number;
  phase: PhaseKind;
  team: Team | null;
  teams: Team[];
  selectedTeam: number;
  capture: {
    shot: number;
    totalShots: number;
    step: 'countdown' | 'flash' | 'preview' | null;
    countdown: number | null;
    stepProgress: number;
  } | null;
  readyProgress: number | null;
  uploadProgress: number | null;
  photosTaken: number;
  link: string | null;
  recipients: string[];
  error: SessionError | null;
}

/** Plain JSON view of the session for the display and the status API. */
export function describeSession(session: Session): SessionSnapshot {
  const phase = session.phase;
  let capture: SessionSnapshot['capture'] = null;
  if (phase.kind === 'capturing') {
    const step = phase.sequencer.currentStep;
    capture = {
      shot: phase.sequencer.currentShot,
      totalShots: phase.sequencer.totalShots,
      step: step?.kind ?? null,
      countdown: step?.kind === 'countdown' ? step.remaining : null,
      stepProgress: step?.timeline.progress ?? 0,
    };
  }

  return {
    cycle: session.cycle,
    phase: phase.kind,
    team: session.team ?? null,
    teams: session.remote?.teams ?? [],
    selectedTeam: session.selectedTeam,
    capture,
    readyProgress: phase.kind === 'prepareCapture' ? phase.timeline.progress : null,
    uploadProgress: phase.kind === 'uploading' ? phase.progress.progress : null,
    photosTaken: session.photos.length,
    link: phase.kind === 'distribution' ? phase.link : null,
    recipients: [...session.recipients],
    error: session.error,
  };
}
