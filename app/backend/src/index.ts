import cors from 'cors';
import express from 'express';
import { createServer } from 'http';
import QRCode from 'qrcode';
import { WebSocketServer } from 'ws';
import { z } from 'zod';

import { SettingsService } from './config';
import { describeError } from './errors';
import { logger } from './logger';
import { MockBoothBackend } from './services/backend/mockBoothBackend';
import { HttpBoothBackend } from './services/backend/httpBoothBackend';
import { BoothBackend } from './services/backend/boothBackend';
import { CameraService } from './services/camera/cameraService';
import { StripCompositor } from './services/strip/stripCompositor';
import { animationDurations } from './session/animations';
import { BoothController } from './session/boothController';

const inputSchema = z.object({
  key: z.enum(['confirm', 'up', 'down', 'cancel']),
});

const recipientSchema = z.object({
  email: z.string(),
});

const recipientIndexSchema = z.coerce.number().int().min(0);

async function bootstrap() {
  const settingsService = SettingsService.getInstance();
  const settings = await settingsService.load();

  const camera = new CameraService({
    driver: settings.camera.driver,
    deviceId: settings.camera.deviceId,
    captureDir: settings.camera.captureDir,
    resolution: settings.camera.resolution,
    liveViewFrameRate: settings.camera.liveViewFrameRate,
    aspectRatio: settings.booth.aspectRatio,
  });
  await camera.initialize();

  let backend: BoothBackend;
  if (settings.backend.provider === 'http' && settings.backend.endpoint) {
    backend = new HttpBoothBackend({
      endpoint: settings.backend.endpoint,
      instanceId: settings.backend.instanceId,
      bucket: settings.backend.bucket,
      publicUrl: settings.backend.publicUrl,
      apiKey: settingsService.apiKey(),
    });
  } else {
    backend = new MockBoothBackend({
      instanceId: settings.backend.instanceId,
      publicUrl: settings.backend.publicUrl,
      latencyMs: settings.backend.mockLatencyMs,
    });
  }
  logger.info(`[Backend] Using ${backend.name} backend`);

  const compositor = new StripCompositor({
    templatePath: settings.strip.templatePath,
    outputDir: settings.strip.outputDir,
  });

  const booth = new BoothController({
    camera,
    compositor,
    backend,
    durations: animationDurations(settings.booth.fastAnimations),
    aspectRatio: settings.booth.aspectRatio,
  });
  await booth.refreshRemoteState();

  const app = express();
  app.use(
    cors({
      origin: true,
      credentials: true,
    })
  );
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  const api = express.Router();

  api.get('/status', (_req, res) => {
    res.json({
      camera: camera.getStatus(),
      session: booth.snapshot(),
      backend: backend.name,
    });
  });

  api.post('/input', (req, res, next) => {
    try {
      const { key } = inputSchema.parse(req.body ?? {});
      booth.dispatch({ type: 'keyReleased', key });
      res.json(booth.snapshot());
    } catch (error) {
      next(error);
    }
  });

  api.post('/recipients', (req, res, next) => {
    try {
      const { email } = recipientSchema.parse(req.body ?? {});
      booth.dispatch({ type: 'recipientAdded', email });
      res.json(booth.snapshot());
    } catch (error) {
      next(error);
    }
  });

  api.delete('/recipients/:index', (req, res, next) => {
    try {
      const index = recipientIndexSchema.parse(req.params.index);
      booth.dispatch({ type: 'recipientRemoved', index });
      res.json(booth.snapshot());
    } catch (error) {
      next(error);
    }
  });

  api.post('/recipients/submit', (_req, res, next) => {
    try {
      booth.dispatch({ type: 'recipientsSubmitted' });
      res.json(booth.snapshot());
    } catch (error) {
      next(error);
    }
  });

  api.get('/distribution/qr', async (_req, res, next) => {
    try {
      const { link } = booth.snapshot();
      if (!link) {
        res.status(404).json({ message: 'No take to share' });
        return;
      }
      const qr = await QRCode.toBuffer(link, { margin: 1, scale: 8 });
      res.type('png').send(qr);
    } catch (error) {
      next(error);
    }
  });

  api.get('/live', (_req, res) => {
    const frame = camera.getLatestFrame();
    if (!frame) {
      res.status(503).json({ message: 'LiveView not ready' });
      return;
    }
    res.json({ frame: `data:image/jpeg;base64,${frame.toString('base64')}` });
  });

  app.use('/api', api);

  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      logger.error(`[API] ${err.message}`);
      res.status(400).json({ message: err.message });
    }
  );

  const server = createServer(app);
  const liveFeed = new WebSocketServer({ noServer: true });
  const sessionFeed = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const { pathname } = new URL(request.url ?? '/', 'http://localhost');
    const target = pathname === '/live' ? liveFeed : pathname === '/session' ? sessionFeed : undefined;
    if (!target) {
      socket.destroy();
      return;
    }
    target.handleUpgrade(request, socket, head, (ws) => target.emit('connection', ws, request));
  });

  liveFeed.on('connection', (socket) => {
    logger.info('LiveView client connected');
    const pushFrame = (frame: Buffer) => {
      if (socket.readyState === socket.OPEN) {
        socket.send(frame);
      }
    };
    camera.registerLiveViewClient(pushFrame);
    socket.once('close', () => {
      logger.info('LiveView client disconnected');
      camera.unregisterLiveViewClient(pushFrame);
    });
  });

  booth.subscribe((snapshot) => {
    if (sessionFeed.clients.size === 0) return;
    const payload = JSON.stringify(snapshot);
    for (const client of sessionFeed.clients) {
      if (client.readyState === client.OPEN) {
        client.send(payload);
      }
    }
  });

  await camera.startLiveView();
  booth.start(settings.booth.tickRate);

  const refreshTimer =
    settings.booth.remoteRefreshSeconds > 0
      ? setInterval(() => {
          booth.refreshRemoteState().catch((error: unknown) => {
            logger.error(`[Backend] ${describeError(error)}`);
          });
        }, settings.booth.remoteRefreshSeconds * 1000)
      : undefined;

  const port = Number(process.env.PORT ?? settings.server.port);
  server.listen(port, () => {
    logger.info(`Booth backend listening on http://localhost:${port}`);
  });

  const gracefulShutdown = async () => {
    logger.info('Shutting down booth...');
    booth.stop();
    if (refreshTimer) clearInterval(refreshTimer);
    await camera.dispose();
    server.close(() => process.exit(0));
  };

  const onSignal = () => {
    gracefulShutdown().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${describeError(error)}`);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

bootstrap().catch((error) => {
  logger.error(describeError(error));
  process.exit(1);
});
