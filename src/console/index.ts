#!/usr/bin/env node
import { loadConsoleConfig, loadEnvFile } from '../utils/config';
import { ensureDirectory } from '../utils/files';
import { logger } from '../utils/logger';
import { createConsoleServer } from './server';
import { createDeviceClient } from './modules/fleet/DeviceClient';
import { DeviceRegistry } from './modules/fleet/DeviceRegistry';
import { DiscoveryService } from './modules/fleet/DiscoveryService';
import { BonjourBrowser } from './modules/fleet/ServiceBrowser';
import { CommandOrchestrator } from './modules/fleet/CommandOrchestrator';
import { ProfileStore } from './modules/fleet/ProfileStore';
import { TelemetrySubscriber } from './modules/fleet/TelemetrySubscriber';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConsoleConfig();
  await ensureDirectory(config.dataDir);
  if (process.env.LOG_TO_FILE === 'true') {
    await ensureDirectory('logs');
  }

  const registry = new DeviceRegistry({
    clientFactory: createDeviceClient(config.commandTimeoutMs),
    dataDir: config.dataDir,
    offlineThreshold: config.offlineThreshold,
    refreshIntervalMs: config.refreshIntervalMs
  });
  await registry.load();

  const orchestrator = new CommandOrchestrator(registry, {
    timeoutMs: config.commandTimeoutMs,
    debounceMs: config.debounceMs
  });
  const profiles = new ProfileStore(orchestrator, config.dataDir);
  await profiles.load();

  const discovery = new DiscoveryService(new BonjourBrowser(), registry, {
    intervalMs: config.discoveryIntervalMs,
    browseWindowMs: config.browseWindowMs
  });
  const telemetry = new TelemetrySubscriber(registry, { temperatureAlertC: config.temperatureAlertC });

  const server = createConsoleServer({ registry, discovery, orchestrator, profiles });
  const port = await server.start(config.port);

  registry.startAutoRefresh();
  discovery.start();
  telemetry.attach();

  logger.info(`🚀 Fleet console listening on port ${port}`);
  logger.info(`📹 Fleet API: http://localhost:${port}/api`);
  logger.info(`🔍 Health check: http://localhost:${port}/health`);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    registry.stopAutoRefresh();
    discovery.stop();
    telemetry.closeAll();

    orchestrator.flush()
      .then(() => server.stop())
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
  logger.error('Failed to start fleet console:', error);
  process.exit(1);
});
