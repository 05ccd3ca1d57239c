import { z } from 'zod';

import { BackendError, describeError } from '../../errors';
import { MIME_TYPES, encodePhotograph } from '../../imaging';
import { logger } from '../../logger';
import type { CompositeStrip, Photograph, RemoteConfig, UploadHandle } from '../../types';
import { BoothBackend } from './boothBackend';

const INSTANCE_DATA_ENDPOINT = 'instance-data';
const INSERT_TAKE_ENDPOINT = 'insert-take';
const SEND_EMAIL_ENDPOINT = 'send-email';

const remoteConfigSchema = z.object({
  id: z.string(),
  name: z.string().default(''),
  teams: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        checkedIn: z.boolean(),
      })
    )
    .default([]),
});

const takeSchema = z.object({ id: z.string().min(1) });

const emailStatusSchema = z.object({ status: z.string() });

export interface HttpBoothBackendOptions {
  endpoint: string;
  instanceId: string;
  bucket: string;
  publicUrl: string;
  apiKey?: string;
  clock?: () => Date;
}

export class HttpBoothBackend implements BoothBackend {
  readonly name = 'http' as const;
  private readonly endpoint: string;

  constructor(private readonly options: HttpBoothBackendOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
  }

  async fetchRemoteState(): Promise<RemoteConfig> {
    const query = new URLSearchParams({ id: this.options.instanceId });
    return this.request(
      `${this.functionUrl(INSTANCE_DATA_ENDPOINT)}?${query.toString()}`,
      { method: 'GET' },
      remoteConfigSchema
    );
  }

  /**
   * Uploads the strip and every frame in parallel, then registers the take.
   * The first failed file fails the whole upload.
   */
  async upload(strip: CompositeStrip, photos: readonly Photograph[]): Promise<UploadHandle> {
    const stamp = (this.options.clock ?? (() => new Date()))().toISOString().replace(/[:.]/g, '-');
    const folder = `${this.options.instanceId}/${stamp}`;
    const files = [
      { name: 'strip.webp', image: strip },
      ...photos.map((image, i) => ({ name: `frame${i + 1}.webp`, image })),
    ];

    const [stripUrl, ...rawUrls] = await Promise.all(
      files.map((file) => this.uploadFile(folder, file.name, file.image))
    );
    logger.debug(`[Backend] Uploaded ${files.length} files to ${folder}`);

    const take = await this.request(
      this.functionUrl(INSERT_TAKE_ENDPOINT),
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ instanceId: this.options.instanceId, stripUrl, rawUrls }),
      },
      takeSchema
    );
    return { takeId: take.id };
  }

  async sendNotification(handle: UploadHandle, recipients: readonly string[]): Promise<boolean> {
    const response = await this.request(
      this.functionUrl(SEND_EMAIL_ENDPOINT),
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ takeId: handle.takeId, recipients }),
      },
      emailStatusSchema
    );
    return response.status === 'success';
  }

  linkFor(handle: UploadHandle): string {
    return `${this.options.publicUrl.replace(/\/+$/, '')}/takes/${encodeURIComponent(handle.takeId)}`;
  }

  private functionUrl(name: string) {
    return `${this.endpoint}/functions/v1/${name}`;
  }

  private async uploadFile(folder: string, name: string, image: Photograph): Promise<string> {
    let encoded: Buffer;
    try {
      encoded = await encodePhotograph(image, 'webp');
    } catch (error) {
      throw new BackendError('encode', `Could not encode ${name}: ${describeError(error)}`, error);
    }
    const objectPath = `${this.options.bucket}/${folder}/${name}`;
    const form = new FormData();
    form.append('file', new Blob([encoded], { type: MIME_TYPES.webp }), name);
    await this.request(
      `${this.endpoint}/storage/v1/object/${objectPath}`,
      { method: 'POST', body: form },
      z.unknown()
    );
    return `${this.endpoint}/storage/v1/object/public/${objectPath}`;
  }

  private async request<T>(
    url: string,
    init: RequestInit,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const method = init.method ?? 'GET';
    const headers = new Headers(init.headers);
    if (this.options.apiKey) {
      headers.set('Authorization', `Bearer ${this.options.apiKey}`);
    }

    let res: Response;
    try {
      res = await fetch(url, { ...init, headers });
    } catch (error) {
      throw new BackendError('network', `${method} ${url} failed: ${describeError(error)}`, error);
    }
    if (res.status === 401 || res.status === 403) {
      throw new BackendError('auth', `${method} ${url} was refused (${res.status})`);
    }
    if (!res.ok) {
      throw new BackendError('network', `${method} ${url} responded ${res.status}: ${await res.text()}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new BackendError('protocol', `${method} ${url} returned invalid JSON`, error);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new BackendError(
        'protocol',
        `${method} ${url} returned an unexpected body: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }
}
