import crypto from 'crypto';
import dotenv from 'dotenv';
import { logger } from './logger';

export type Env = Record<string, string | undefined>;

export interface DeviceConfig {
  port: number;
  alias: string;
  authEnabled: boolean;
  authToken: string;
  rateLimitIntervalMs: number;
  telemetryIntervalMs: number;
  advertise: boolean;
}

export interface ConsoleConfig {
  port: number;
  dataDir: string;
  refreshIntervalMs: number;
  discoveryIntervalMs: number;
  browseWindowMs: number;
  commandTimeoutMs: number;
  debounceMs: number;
  offlineThreshold: number;
  temperatureAlertC: number;
}

/** Loads `.env` into process.env; values already set win. */
export function loadEnvFile(): void {
  dotenv.config();
}

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    logger.warn(`Ignoring invalid ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;

  logger.warn(`Ignoring invalid ${key}=${raw}, using ${fallback}`);
  return fallback;
}

function randomHex(bytes: number): string {
  return crypto.randomBytes(bytes).toString('hex');
}

export function loadDeviceConfig(env: Env = process.env): DeviceConfig {
  return {
    port: readInt(env, 'DEVICE_PORT', 8888),
    alias: env.DEVICE_ALIAS?.trim() || `CAM-${randomHex(2).toUpperCase()}`,
    authEnabled: readBool(env, 'AUTH_ENABLED', false),
    authToken: env.AUTH_TOKEN?.trim() || randomHex(16),
    rateLimitIntervalMs: readInt(env, 'RATE_LIMIT_INTERVAL_MS', 50),
    telemetryIntervalMs: readInt(env, 'TELEMETRY_INTERVAL_MS', 1000, 1),
    advertise: readBool(env, 'ADVERTISE', true)
  };
}

export function loadConsoleConfig(env: Env = process.env): ConsoleConfig {
  return {
    port: readInt(env, 'CONSOLE_PORT', 3001),
    dataDir: env.DATA_DIR?.trim() || './data',
    refreshIntervalMs: readInt(env, 'REFRESH_INTERVAL_MS', 2000, 1),
    discoveryIntervalMs: readInt(env, 'DISCOVERY_INTERVAL_MS', 10000, 1),
    browseWindowMs: readInt(env, 'BROWSE_WINDOW_MS', 3000, 1),
    commandTimeoutMs: readInt(env, 'COMMAND_TIMEOUT_MS', 5000, 1),
    debounceMs: readInt(env, 'DEBOUNCE_MS', 300),
    offlineThreshold: readInt(env, 'OFFLINE_THRESHOLD', 3, 1),
    temperatureAlertC: readInt(env, 'TEMPERATURE_ALERT_C', 40)
  };
}
