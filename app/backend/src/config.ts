import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

const settingsSchema = z.object({
  booth: z
    .object({
      tickRate: z.number().positive().default(30),
      aspectRatio: z.number().positive().default(3 / 2),
      fastAnimations: z.boolean().default(false),
      remoteRefreshSeconds: z.number().int().min(0).default(60),
    })
    .default({}),
  camera: z
    .object({
      driver: z.enum(['gphoto2', 'mock']).default('mock'),
      deviceId: z.string().optional(),
      resolution: z.string().default('1280x720'),
      liveViewFrameRate: z.number().positive().default(15),
      captureDir: z.string().default('captures'),
    })
    .default({}),
  backend: z
    .object({
      provider: z.enum(['http', 'mock']).default('mock'),
      endpoint: z.string().url().optional(),
      instanceId: z.string().default('local-booth'),
      bucket: z.string().default('takes'),
      publicUrl: z.string().url().default('http://localhost:4000'),
      mockLatencyMs: z.number().int().min(0).default(1500),
    })
    .default({}),
  strip: z
    .object({
      templatePath: z.string().optional(),
      outputDir: z.string().default('strips'),
    })
    .default({}),
  server: z
    .object({
      port: z.number().int().positive().default(4000),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;

export const parseSettings = (raw: unknown): Settings => {
  const settings = settingsSchema.parse(raw);
  if (settings.backend.provider === 'http' && !settings.backend.endpoint) {
    throw new Error('backend.endpoint is required when backend.provider is "http"');
  }
  return settings;
};

export class SettingsService {
  private static instance: SettingsService;
  private config?: Settings;

  private constructor() {}

  static getInstance() {
    if (!SettingsService.instance) {
      SettingsService.instance = new SettingsService();
    }
    return SettingsService.instance;
  }

  async load(): Promise<Settings> {
    if (this.config) {
      return this.config;
    }
    const settingsPath =
      process.env.BOOTH_SETTINGS ?? path.resolve(process.cwd(), 'config/settings.json');
    const file = await readFile(settingsPath, 'utf-8');
    this.config = parseSettings(JSON.parse(file));
    return this.config;
  }

  /** Secrets stay out of settings.json. */
  apiKey(): string | undefined {
    return process.env.BOOTH_API_KEY;
  }
}
