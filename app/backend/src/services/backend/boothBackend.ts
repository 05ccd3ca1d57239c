import type { CompositeStrip, Photograph, RemoteConfig, UploadHandle } from '../../types';

/**
 * Remote storage and ordering service. Implementations are stateless per
 * request, so one instance may serve concurrent sub-uploads.
 */
export interface BoothBackend {
  readonly name: 'http' | 'mock';
  fetchRemoteState(): Promise<RemoteConfig>;
  upload(strip: CompositeStrip, photos: readonly Photograph[]): Promise<UploadHandle>;
  /** Resolves to the backend's overall success flag. */
  sendNotification(handle: UploadHandle, recipients: readonly string[]): Promise<boolean>;
  linkFor(handle: UploadHandle): string;
}
