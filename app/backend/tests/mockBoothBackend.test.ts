import { describe, expect, test } from 'vitest';

import { MockBoothBackend } from '../src/services/backend/mockBoothBackend';
import { fakeStrip, solidPhoto } from './helpers';

const backend = () =>
  new MockBoothBackend({ instanceId: 'booth-1', publicUrl: 'http://localhost:4000/', latencyMs: 0 });

describe('MockBoothBackend', () => {
  test('serves a config with checked-in teams', async () => {
    const config = await backend().fetchRemoteState();
    expect(config.id).toBe('booth-1');
    expect(config.teams.filter((team) => team.checkedIn)).toHaveLength(2);
  });

  test('numbers takes and links to them', async () => {
    const client = backend();
    const first = await client.upload(fakeStrip(), [solidPhoto(2, 2)]);
    const second = await client.upload(fakeStrip(), [solidPhoto(2, 2)]);

    expect(first).toEqual({ takeId: 'mock-take-1' });
    expect(second).toEqual({ takeId: 'mock-take-2' });
    expect(client.linkFor(second)).toBe('http://localhost:4000/takes/mock-take-2');
    await expect(client.sendNotification(first, ['visitor@example.com'])).resolves.toBe(true);
  });
});
