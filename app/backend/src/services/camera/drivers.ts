import { spawn } from 'child_process';
import { mkdir, readFile } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';

import { DeviceError, describeError } from '../../errors';
import { decodePhotograph, toPhotograph } from '../../imaging';
import type { Photograph } from '../../types';

export interface CameraDevice {
  id: string;
  label: string;
}

/** An opened camera. Owned by one CameraService; never shared. */
export interface CameraHandle {
  readonly device: CameraDevice;
  captureStill(): Promise<Photograph>;
  capturePreviewFrame(): Promise<Photograph>;
  close(): Promise<void>;
}

export interface CameraDriver {
  readonly name: 'gphoto2' | 'mock';
  enumerate(): Promise<CameraDevice[]>;
  open(id: string): Promise<CameraHandle>;
}

export interface Resolution {
  width: number;
  height: number;
}

const FALLBACK_RESOLUTION: Resolution = { width: 1280, height: 720 };

export const parseResolution = (value: string): Resolution => {
  const [width, height] = value.split('x').map((part) => Number.parseInt(part, 10));
  if (Number.isFinite(width) && Number.isFinite(height) && width > 0 && height > 0) {
    return { width, height };
  }
  return FALLBACK_RESOLUTION;
};

export class MockCameraDriver implements CameraDriver {
  readonly name = 'mock' as const;

  constructor(private readonly resolution: Resolution) {}

  async enumerate(): Promise<CameraDevice[]> {
    return [{ id: 'mock', label: 'Mock camera (offline mode)' }];
  }

  async open(id: string): Promise<CameraHandle> {
    if (id !== 'mock') {
      throw new DeviceError(`Unknown mock camera ${id}`);
    }
    return new MockCameraHandle({ id, label: 'Mock camera (offline mode)' }, this.resolution);
  }
}

class MockCameraHandle implements CameraHandle {
  private frame = 0;

  constructor(
    readonly device: CameraDevice,
    private readonly resolution: Resolution
  ) {}

  captureStill(): Promise<Photograph> {
    return this.generateFrame('STILL');
  }

  capturePreviewFrame(): Promise<Photograph> {
    return this.generateFrame('LIVE');
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private generateFrame(label: string) {
    this.frame += 1;
    const { width, height } = this.resolution;
    const hue = (this.frame * 37) % 360;

    const svg = `
      <svg width="${width}" height="${height}">
        <defs>
          <linearGradient id="grad" x1="0%" y1="0%" x2="100%" y2="100%">
            <stop offset="0%" stop-color="hsl(${hue},70%,40%)" />
            <stop offset="100%" stop-color="hsl(${(hue + 120) % 360},70%,25%)" />
          </linearGradient>
        </defs>
        <rect x="0" y="0" width="${width}" height="${height}" fill="url(#grad)"/>
        <text x="50%" y="45%" font-size="${Math.round(
          height * 0.08
        )}" fill="#ffffff" text-anchor="middle" font-family="sans-serif">BOOTH ${label}</text>
        <text x="50%" y="60%" font-size="${Math.round(
          height * 0.05
        )}" fill="#ffffff" text-anchor="middle" font-family="sans-serif" opacity="0.7">Frame #${this.frame}</text>
      </svg>
    `;
    return toPhotograph(sharp(Buffer.from(svg)));
  }
}

/**
 * Tethered DSLR through the gphoto2 command line tool. Every call blocks the
 * camera until the file is downloaded.
 */
export class GPhoto2Driver implements CameraDriver {
  readonly name = 'gphoto2' as const;

  constructor(
    private readonly captureDir: string,
    private readonly binary = 'gphoto2'
  ) {}

  async enumerate(): Promise<CameraDevice[]> {
    const output = await runCommand(this.binary, ['--auto-detect']);
    return parseAutoDetect(output);
  }

  async open(id: string): Promise<CameraHandle> {
    const devices = await this.enumerate();
    const device = devices.find((candidate) => candidate.id === id);
    if (!device) {
      throw new DeviceError(`Camera ${id} not connected`);
    }
    await mkdir(this.captureDir, { recursive: true });
    return new GPhoto2Handle(device, this.captureDir, this.binary);
  }
}

class GPhoto2Handle implements CameraHandle {
  constructor(
    readonly device: CameraDevice,
    private readonly captureDir: string,
    private readonly binary: string
  ) {}

  async captureStill(): Promise<Photograph> {
    const filePath = path.join(this.captureDir, `still-${Date.now()}.jpg`);
    await runCommand(this.binary, [
      '--port',
      this.device.id,
      '--capture-image-and-download',
      '--force-overwrite',
      '--filename',
      filePath,
    ]);
    return this.load(filePath);
  }

  async capturePreviewFrame(): Promise<Photograph> {
    const filePath = path.join(this.captureDir, 'preview.jpg');
    await runCommand(this.binary, [
      '--port',
      this.device.id,
      '--capture-preview',
      '--force-overwrite',
      '--filename',
      filePath,
    ]);
    return this.load(filePath);
  }

  async close(): Promise<void> {
    // gphoto2 releases the port after each command
  }

  private async load(filePath: string) {
    try {
      return await decodePhotograph(await readFile(filePath));
    } catch (error) {
      throw new DeviceError(`Could not read ${filePath}: ${describeError(error)}`, error);
    }
  }
}

/**
 * Parses the table printed by `gphoto2 --auto-detect`:
 *
 *   Model                          Port
 *   ----------------------------------------------------------
 *   Canon EOS 2000D                usb:001,004
 */
export function parseAutoDetect(output: string): CameraDevice[] {
  const lines = output.split(/\r?\n/);
  const separator = lines.findIndex((line) => /^-{5,}/.test(line.trim()));
  if (separator === -1) return [];
  return lines
    .slice(separator + 1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .flatMap((line) => {
      const match = /^(.*\S)\s{2,}(\S+)$/.exec(line);
      if (!match) return [];
      const [, model, port] = match;
      return [{ id: port, label: `${model} on ${port}` }];
    });
}

function runCommand(command: string, args: string[]) {
  return new Promise<string>((resolve, reject) => {
    const child = spawn(command, args, { windowsHide: true });
    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.once('exit', (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new DeviceError(`${command} exited with code ${code}: ${stderr.trim()}`));
      }
    });
    child.once('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(new DeviceError(`${command} is not installed`, error));
        return;
      }
      reject(new DeviceError(`${command} failed: ${error.message}`, error));
    });
  });
}
