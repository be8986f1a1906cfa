#!/usr/bin/env node
import { loadDeviceConfig, loadEnvFile } from '../utils/config';
import { ensureDirectory } from '../utils/files';
import { logger } from '../utils/logger';
import { createDeviceServer } from './server';
import { CameraService } from './modules/camera/CameraService';
import { SimulatedTransmitter } from './modules/camera/SimulatedTransmitter';
import { ServiceAdvertiser } from './advertiser';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadDeviceConfig();
  if (process.env.LOG_TO_FILE === 'true') {
    await ensureDirectory('logs');
  }

  const camera = new CameraService(config.alias, new SimulatedTransmitter());
  const server = createDeviceServer(config, camera);

  const port = await server.start();
  const advertiser = config.advertise ? new ServiceAdvertiser(config.alias, port) : undefined;
  if (advertiser) {
    advertiser.start();
    camera.on('alias:changed', (alias: string) => {
      advertiser.updateAlias(alias).catch(error => {
        logger.error('Failed to re-advertise under the new alias:', error);
      });
    });
  }

  logger.info(`🚀 Device ${config.alias} listening on port ${port}`);
  logger.info(`🎛️  Control page: http://localhost:${port}/`);
  logger.info(`🔐 Auth ${config.authEnabled ? 'enabled' : 'disabled'}`);
  if (config.authEnabled && !process.env.AUTH_TOKEN) {
    logger.info(`🔑 Generated bearer token: ${config.authToken}`);
  }

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    Promise.all([advertiser?.stop(), camera.stopStream(), server.stop()])
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  logger.error('Failed to start device server:', error);
  process.exit(1);
});
