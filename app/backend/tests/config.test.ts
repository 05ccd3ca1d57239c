import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, test, vi } from 'vitest';

import { SettingsService, parseSettings } from '../src/config';

describe('parseSettings', () => {
  test('fills every section with defaults', () => {
    const settings = parseSettings({});
    expect(settings.booth).toEqual({
      tickRate: 30,
      aspectRatio: 1.5,
      fastAnimations: false,
      remoteRefreshSeconds: 60,
    });
    expect(settings.camera.driver).toBe('mock');
    expect(settings.backend.provider).toBe('mock');
    expect(settings.strip.outputDir).toBe('strips');
    expect(settings.server.port).toBe(4000);
  });

  test('accepts the bundled settings file', async () => {
    const file = await readFile(path.resolve(__dirname, '../../../config/settings.json'), 'utf-8');
    const settings = parseSettings(JSON.parse(file));
    expect(settings.backend.instanceId).toBe('local-booth');
    expect(settings.camera.resolution).toBe('1280x720');
  });

  test('an http backend needs an endpoint', () => {
    expect(() => parseSettings({ backend: { provider: 'http' } })).toThrow(
      'backend.endpoint is required when backend.provider is "http"'
    );
    expect(
      parseSettings({ backend: { provider: 'http', endpoint: 'https://api.test' } }).backend.endpoint
    ).toBe('https://api.test');
  });

  test('rejects values of the wrong shape', () => {
    expect(() => parseSettings({ booth: { tickRate: -1 } })).toThrow();
    expect(() => parseSettings({ camera: { driver: 'webcam' } })).toThrow();
  });
});

describe('SettingsService', () => {
  let dir: string | undefined;

  afterEach(async () => {
    vi.unstubAllEnvs();
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  test('loads the file named by BOOTH_SETTINGS once and reads the key from the environment', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'booth-settings-'));
    const file = path.join(dir, 'settings.json');
    await writeFile(file, JSON.stringify({ booth: { tickRate: 60 }, server: { port: 5050 } }));
    vi.stubEnv('BOOTH_SETTINGS', file);
    vi.stubEnv('BOOTH_API_KEY', 'test-key');

    const service = SettingsService.getInstance();
    const settings = await service.load();

    expect(settings.booth.tickRate).toBe(60);
    expect(settings.server.port).toBe(5050);
    expect(service.apiKey()).toBe('test-key');
    expect(SettingsService.getInstance()).toBe(service);
    await expect(service.load()).resolves.toBe(settings);
  });
});
