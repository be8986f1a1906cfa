import http from 'http';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createFleetRouter, FleetServices } from './routes/fleet';
import { createErrorHandler, notFoundHandler } from '../utils/errorHandler';
import { createLogger } from '../utils/logger';

const logger = createLogger('console');

export interface ConsoleServer {
  app: express.Express;
  httpServer: http.Server;
  start(port: number, host?: string): Promise<number>;
  stop(): Promise<void>;
}

export function createConsoleApp(services: FleetServices): express.Express {
  const app = express();

  app.use(helmet({
    crossOriginResourcePolicy: { policy: 'cross-origin' }
  }));

  app.use(cors({
    origin: ['http://localhost:3000', 'http://localhost:5173', 'tauri://localhost'],
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept'],
    credentials: true
  }));

  // Generous limit for the local UI; device calls have their own pacing
  const apiLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 1000,
    message: { code: 'RATE_LIMITED', message: 'Too many requests from this IP' },
    standardHeaders: true,
    legacyHeaders: false
  });
  app.use('/api', apiLimiter);

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (req, res) => {
    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      devices: services.registry.list().length,
      version: process.env.npm_package_version || '1.0.0'
    });
  });

  app.use('/api', createFleetRouter(services));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}

export function createConsoleServer(services: FleetServices): ConsoleServer {
  const app = createConsoleApp(services);
  const httpServer = http.createServer(app);
  let listening = false;

  return {
    app,
    httpServer,

    start(port: number, host?: string): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(port, host, () => {
          httpServer.off('error', reject);
          listening = true;
          const address = httpServer.address();
          resolve(typeof address === 'object' && address ? address.port : port);
        });
      });
    },

    async stop(): Promise<void> {
      if (!listening) return;
      listening = false;
      await new Promise<void>((resolve, reject) => {
        httpServer.close(error => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      });
    }
  };
}
