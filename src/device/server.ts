import http from 'http';
import path from 'path';
import { Duplex } from 'stream';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { WebSocketServer } from 'ws';
import { DeviceConfig } from '../utils/config';
import { createLogger } from '../utils/logger';
import { createErrorHandler, notFoundHandler } from '../utils/errorHandler';
import { createAuthMiddleware, isAuthorized, AuthOptions } from './middleware/auth';
import { Clock, PathRateLimiter } from './middleware/rateLimit';
import { createApiRouter } from './routes/api';
import { CameraControl } from './modules/camera/types';
import { WebSocketHub } from './modules/websocket/WebSocketHub';
import { WebSocketClient } from './modules/websocket/WebSocketClient';
import { TelemetryBroadcaster } from './modules/websocket/TelemetryBroadcaster';
import { createCommandHandler } from './modules/websocket/commandHandler';

const logger = createLogger('device');

export const CONTROL_PAGE = path.resolve(__dirname, '../../public/control.html');
const WS_PATH = '/ws';

export interface DeviceServerOptions {
  /** Injected into the rate limiter; tests pin it. */
  clock?: Clock;
  /** Bind address for `start()`. */
  host?: string;
}

export interface DeviceServer {
  app: express.Express;
  httpServer: http.Server;
  hub: WebSocketHub;
  limiter: PathRateLimiter;
  telemetry: TelemetryBroadcaster;
  start(): Promise<number>;
  stop(): Promise<void>;
}

function rejectUpgrade(socket: Duplex, status: number, text: string): void {
  socket.write(`HTTP/1.1 ${status} ${text}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

export function createDeviceServer(
  config: DeviceConfig,
  camera: CameraControl,
  options: DeviceServerOptions = {}
): DeviceServer {
  const auth: AuthOptions = { enabled: config.authEnabled, token: config.authToken, publicPaths: ['/'] };
  const limiter = new PathRateLimiter({ intervalMs: config.rateLimitIntervalMs, clock: options.clock });
  const hub = new WebSocketHub();
  const telemetry = new TelemetryBroadcaster(camera, hub, config.telemetryIntervalMs);
  const handleCommand = createCommandHandler(camera, limiter);

  const app = express();
  app.disable('x-powered-by');

  // Order matters: security headers, CORS, auth, rate limit, body, routes
  app.use(helmet({
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    contentSecurityPolicy: false
  }));
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    maxAge: 86400,
    optionsSuccessStatus: 200
  }));
  app.use(createAuthMiddleware(auth));
  app.use(limiter.middleware());
  app.use(express.json({ type: () => true, limit: '1mb' }));

  app.get('/', (req, res, next) => {
    res.sendFile(CONTROL_PAGE, error => {
      if (error) next(error);
    });
  });
  app.use(createApiRouter(camera));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  const httpServer = http.createServer(app);
  const wss = new WebSocketServer({ noServer: true });

  httpServer.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (pathname !== WS_PATH) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }
    if (!isAuthorized(req.headers.authorization, auth)) {
      logger.warn('Rejected WebSocket upgrade: invalid or missing bearer token');
      rejectUpgrade(socket, 401, 'Unauthorized');
      return;
    }

    wss.handleUpgrade(req, socket, head, ws => {
      wss.emit('connection', ws, req);
    });
  });

  wss.on('connection', ws => {
    const client = new WebSocketClient(ws);
    hub.add(client);

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        logger.debug(`Ignoring binary frame from client ${client.id}`);
        return;
      }
      void handleCommand(client.id, data.toString());
    });
    ws.on('close', () => hub.remove(client.id));
    ws.on('error', error => {
      logger.warn(`WebSocket error on client ${client.id}:`, error);
      hub.remove(client.id);
    });
  });

  let started = false;

  return {
    app,
    httpServer,
    hub,
    limiter,
    telemetry,

    start(): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(config.port, options.host, () => {
          httpServer.off('error', reject);
          started = true;
          telemetry.start();

          const address = httpServer.address();
          const port = typeof address === 'object' && address ? address.port : config.port;
          resolve(port);
        });
      });
    },

    async stop(): Promise<void> {
      telemetry.stop();
      hub.closeAll();
      for (const ws of wss.clients) ws.terminate();
      await new Promise<void>(resolve => wss.close(() => resolve()));
      if (!started) return;

      started = false;
      await new Promise<void>((resolve, reject) => {
        httpServer.close(error => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      });
    }
  };
}
