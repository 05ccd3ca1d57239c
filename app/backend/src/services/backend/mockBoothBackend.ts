import { setTimeout as delay } from 'timers/promises';

import { logger } from '../../logger';
import type { CompositeStrip, Photograph, RemoteConfig, Team, UploadHandle } from '../../types';
import { BoothBackend } from './boothBackend';

const DEFAULT_TEAMS: Team[] = [
  { id: 'team-1', name: 'Team One', checkedIn: true },
  { id: 'team-2', name: 'Team Two', checkedIn: true },
  { id: 'team-3', name: 'Team Three', checkedIn: false },
];

interface MockBoothBackendOptions {
  instanceId: string;
  publicUrl: string;
  latencyMs: number;
  teams?: Team[];
}

/** Offline stand-in used when no backend endpoint is configured. */
export class MockBoothBackend implements BoothBackend {
  readonly name = 'mock' as const;
  private takes = 0;

  constructor(private readonly options: MockBoothBackendOptions) {}

  async fetchRemoteState(): Promise<RemoteConfig> {
    return {
      id: this.options.instanceId,
      name: 'Mock booth (offline mode)',
      teams: (this.options.teams ?? DEFAULT_TEAMS).map((team) => ({ ...team })),
    };
  }

  async upload(strip: CompositeStrip, photos: readonly Photograph[]): Promise<UploadHandle> {
    await delay(this.options.latencyMs);
    this.takes += 1;
    const takeId = `mock-take-${this.takes}`;
    logger.info(
      `[Backend] Mock upload ${takeId}: strip ${strip.width}x${strip.height} + ${photos.length} frames`
    );
    return { takeId };
  }

  async sendNotification(handle: UploadHandle, recipients: readonly string[]): Promise<boolean> {
    await delay(this.options.latencyMs);
    logger.info(`[Backend] Mock notification for ${handle.takeId} to ${recipients.join(', ')}`);
    return true;
  }

  linkFor(handle: UploadHandle): string {
    return `${this.options.publicUrl.replace(/\/+$/, '')}/takes/${encodeURIComponent(handle.takeId)}`;
  }
}
