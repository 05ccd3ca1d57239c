import { DeviceError, describeError } from '../../errors';
import { toPhotograph } from '../../imaging';
import { logger } from '../../logger';
import type { Photograph } from '../../types';
import {
  CameraDriver,
  CameraHandle,
  GPhoto2Driver,
  MockCameraDriver,
  parseResolution,
} from './drivers';
import { CameraFeedOptions, applyFeedOptions } from './feedOptions';

export interface CameraStatus {
  connected: boolean;
  device?: string;
  liveView: boolean;
  driver: CameraDriver['name'];
  capturing: boolean;
  lastCapture?: number;
}

export interface CameraServiceOptions {
  driver: 'gphoto2' | 'mock';
  deviceId?: string;
  captureDir: string;
  resolution: string;
  liveViewFrameRate: number;
  aspectRatio: number;
}

type FrameListener = (frame: Buffer) => void;

/**
 * Owns the opened camera for the lifetime of the booth. Still captures are
 * exclusive: live frames pause while one runs and a second one is refused.
 */
export class CameraService {
  private driver?: CameraDriver;
  private handle?: CameraHandle;
  private latestFrame?: Buffer;
  private readonly liveViewClients = new Set<FrameListener>();
  private liveInterval?: NodeJS.Timeout;
  private readonly frameInterval: number;
  private feedOptions: CameraFeedOptions;
  private capturing = false;
  private pendingFrame?: Promise<void>;
  private lastCapture?: number;

  constructor(
    private readonly options: CameraServiceOptions,
    private readonly drivers: Partial<Record<CameraDriver['name'], CameraDriver>> = {}
  ) {
    this.frameInterval = Math.max(1, Math.round(1000 / options.liveViewFrameRate));
    this.feedOptions = { blur: 1, aspectRatio: options.aspectRatio, mirror: true };
  }

  async initialize(): Promise<void> {
    const { driver, handle } = await this.selectCamera();
    this.driver = driver;
    this.handle = handle;
    logger.info(`[Camera] Driver ready: ${driver.name} (${handle.device.label})`);
  }

  async dispose(): Promise<void> {
    await this.stopLiveView();
    await this.pendingFrame;
    await this.handle?.close();
  }

  getStatus(): CameraStatus {
    return {
      connected: this.handle !== undefined,
      device: this.handle?.device.label,
      liveView: this.liveInterval !== undefined,
      driver: this.driver?.name ?? this.options.driver,
      capturing: this.capturing,
      lastCapture: this.lastCapture,
    };
  }

  setFeedOptions(options: CameraFeedOptions) {
    this.feedOptions = options;
  }

  getLatestFrame(): Buffer | undefined {
    return this.latestFrame;
  }

  async startLiveView(): Promise<void> {
    if (this.liveInterval) {
      return;
    }
    this.liveInterval = setInterval(() => {
      if (this.capturing || this.pendingFrame) return;
      this.pendingFrame = this.pushLiveFrame().finally(() => {
        this.pendingFrame = undefined;
      });
    }, this.frameInterval);
    logger.info('[Camera] LiveView started');
  }

  async stopLiveView(): Promise<void> {
    if (this.liveInterval) {
      clearInterval(this.liveInterval);
      this.liveInterval = undefined;
      logger.info('[Camera] LiveView stopped');
    }
  }

  private async pushLiveFrame(): Promise<void> {
    try {
      const frame = await this.requireHandle().capturePreviewFrame();
      const encoded = await applyFeedOptions(frame, this.feedOptions).jpeg({ quality: 70 }).toBuffer();
      this.latestFrame = encoded;
      for (const cb of this.liveViewClients) {
        cb(encoded);
      }
    } catch (error) {
      logger.error(`[Camera] LiveView error: ${describeError(error)}`);
    }
  }

  registerLiveViewClient(cb: FrameListener) {
    this.liveViewClients.add(cb);
  }

  unregisterLiveViewClient(cb: FrameListener) {
    this.liveViewClients.delete(cb);
  }

  get liveViewClientCount() {
    return this.liveViewClients.size;
  }

  /**
   * Cropped to the session aspect ratio and mirrored like the live feed.
   * Waits for a live frame already in flight; the handle is never shared.
   */
  async captureStill(): Promise<Photograph> {
    if (this.capturing) {
      throw new DeviceError('Camera busy: a still capture is already running');
    }
    this.capturing = true;
    try {
      await this.pendingFrame;
      const raw = await this.requireHandle().captureStill();
      const photo = await toPhotograph(
        applyFeedOptions(raw, { blur: 1, aspectRatio: this.options.aspectRatio, mirror: true })
      );
      this.lastCapture = Date.now();
      logger.info(`[Camera] Still captured ${photo.width}x${photo.height}`);
      return photo;
    } catch (error) {
      if (error instanceof DeviceError) throw error;
      throw new DeviceError(`Still capture failed: ${describeError(error)}`, error);
    } finally {
      this.capturing = false;
    }
  }

  private requireHandle(): CameraHandle {
    if (!this.handle) {
      throw new DeviceError('Camera not initialized');
    }
    return this.handle;
  }

  private driverFor(name: CameraDriver['name']): CameraDriver {
    const injected = this.drivers[name];
    if (injected) return injected;
    return name === 'gphoto2'
      ? new GPhoto2Driver(this.options.captureDir)
      : new MockCameraDriver(parseResolution(this.options.resolution));
  }

  private async open(driver: CameraDriver) {
    const devices = await driver.enumerate();
    const deviceId = this.options.deviceId ?? devices[0]?.id;
    if (!deviceId) {
      throw new DeviceError(`No camera found by ${driver.name}`);
    }
    return { driver, handle: await driver.open(deviceId) };
  }

  private async selectCamera(): Promise<{ driver: CameraDriver; handle: CameraHandle }> {
    if (this.options.driver === 'gphoto2' && !process.env.BOOTH_FORCE_MOCK_CAMERA) {
      try {
        return await this.open(this.driverFor('gphoto2'));
      } catch (error) {
        logger.warn(
          `[Camera] gphoto2 camera unavailable, fallback to mock. Reason: ${describeError(error)}`
        );
      }
    }
    const mock = this.driverFor('mock');
    const devices = await mock.enumerate();
    return { driver: mock, handle: await mock.open(devices[0]?.id ?? 'mock') };
  }
}
