import { EventEmitter } from 'events';
import path from 'path';
import { Device, Liveness, PersistedDevice, RememberedSettings } from './types';
import { DeviceApi, DeviceApiFactory } from './DeviceClient';
import { ConflictError, NotFoundError, ValidationError, errorMessage } from '../../../protocol/errors';
import { TelemetryFrame } from '../../../protocol/types';
import { isRecord, parseCameraSettings, parseStreamStart } from '../../../protocol/validation';
import { JsonFileStore } from '../../../utils/files';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('registry');

export type PersistedDevices = Record<string, PersistedDevice>;

export interface DeviceRegistryOptions {
  clientFactory: DeviceApiFactory;
  /** Directory holding devices.json; omit to keep the registry in memory. */
  dataDir?: string;
  offlineThreshold?: number;
  refreshIntervalMs?: number;
}

export function deviceId(host: string, port: number): string {
  return `${host}:${port}`;
}

function decodeSettings(raw: unknown): RememberedSettings {
  if (!isRecord(raw)) return {};
  const settings: RememberedSettings = {};
  try {
    if (raw.stream !== undefined) settings.stream = parseStreamStart(raw.stream);
    if (raw.camera !== undefined) settings.camera = parseCameraSettings(raw.camera);
  } catch (error) {
    logger.warn(`Dropping unreadable remembered settings: ${errorMessage(error)}`);
  }
  return settings;
}

export function decodePersistedDevices(raw: unknown): PersistedDevices {
  const result: PersistedDevices = {};
  if (!isRecord(raw)) return result;

  for (const [id, entry] of Object.entries(raw)) {
    if (!isRecord(entry) || typeof entry.host !== 'string' || typeof entry.port !== 'number') {
      logger.warn(`Skipping malformed device entry ${id}`);
      continue;
    }
    result[id] = {
      id,
      alias: typeof entry.alias === 'string' ? entry.alias : id,
      aliasOverride: typeof entry.aliasOverride === 'string' ? entry.aliasOverride : undefined,
      host: entry.host,
      port: entry.port,
      token: typeof entry.token === 'string' ? entry.token : '',
      settings: decodeSettings(entry.settings)
    };
  }
  return result;
}

/**
 * Owns the claimed devices, their liveness and their remembered settings.
 *
 * Emits `device:claimed`, `device:removed` (id) and `device:liveness`
 * (id, liveness) when a device changes state.
 */
export class DeviceRegistry extends EventEmitter {
  private devices: Map<string, Device> = new Map();
  private clients: Map<string, DeviceApi> = new Map();
  private readonly store?: JsonFileStore<PersistedDevices>;
  private readonly clientFactory: DeviceApiFactory;
  private readonly offlineThreshold: number;
  private readonly refreshIntervalMs: number;
  private refreshInFlight?: Promise<Device[]>;
  private refreshTimer?: NodeJS.Timeout;

  constructor(options: DeviceRegistryOptions) {
    super();
    this.clientFactory = options.clientFactory;
    this.offlineThreshold = options.offlineThreshold ?? 3;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 2000;
    if (options.dataDir !== undefined) {
      this.store = new JsonFileStore(
        path.join(options.dataDir, 'devices.json'),
        decodePersistedDevices,
        () => ({})
      );
    }
  }

  /** Loads devices.json; loaded devices stay `offline` until a refresh reaches them. */
  async load(): Promise<void> {
    if (!this.store) return;

    const persisted = await this.store.load();
    for (const entry of Object.values(persisted)) {
      this.devices.set(entry.id, {
        ...entry,
        liveness: 'offline',
        consecutiveFailures: this.offlineThreshold
      });
      this.clients.set(entry.id, this.clientFactory(entry));
    }
    logger.info(`Loaded ${this.devices.size} device(s) from disk`);
  }

  list(): Device[] {
    return Array.from(this.devices.values(), copyDevice);
  }

  get(id: string): Device | undefined {
    const device = this.devices.get(id);
    return device ? copyDevice(device) : undefined;
  }

  has(id: string): boolean {
    return this.devices.has(id);
  }

  /** The API handle for a claimed device, or undefined when `id` is not claimed. */
  resolve(id: string): DeviceApi | undefined {
    return this.clients.get(id);
  }

  aliases(): Set<string> {
    return new Set(Array.from(this.devices.values(), device => device.alias));
  }

  async claim(host: string, port: number, token: string): Promise<Device> {
    const trimmedHost = host.trim();
    if (trimmedHost === '') throw new ValidationError("Field 'host' must not be empty");
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ValidationError("Field 'port' must be between 1 and 65535");
    }

    const id = deviceId(trimmedHost, port);
    if (this.devices.has(id)) {
      throw new ConflictError(`Device already claimed: ${id}`);
    }

    const client = this.clientFactory({ host: trimmedHost, port, token });
    const status = await client.getStatus();

    // A concurrent claim of the same device may have finished first
    if (this.devices.has(id)) {
      throw new ConflictError(`Device already claimed: ${id}`);
    }

    const device: Device = {
      id,
      alias: status.alias,
      host: trimmedHost,
      port,
      token,
      liveness: 'online',
      consecutiveFailures: 0,
      lastSeen: new Date().toISOString(),
      status,
      settings: {}
    };
    this.devices.set(id, device);
    this.clients.set(id, client);

    logger.info(`✅ Claimed ${device.alias} (${id})`);
    this.emit('device:claimed', copyDevice(device));
    await this.persist();
    return copyDevice(device);
  }

  async unclaim(id: string): Promise<void> {
    if (!this.devices.delete(id)) {
      throw new NotFoundError(`device ${id}`);
    }
    this.clients.delete(id);

    logger.info(`Removed device ${id}`);
    this.emit('device:removed', id);
    await this.persist();
  }

  async rename(id: string, alias: string): Promise<Device> {
    const device = this.devices.get(id);
    if (!device) throw new NotFoundError(`device ${id}`);

    const trimmed = alias.trim();
    if (trimmed === '' || trimmed.length > 64) {
      throw new ValidationError('Alias must be 1-64 characters');
    }

    device.alias = trimmed;
    device.aliasOverride = trimmed;
    logger.info(`Renamed ${id} to ${trimmed}`);
    await this.persist();
    return copyDevice(device);
  }

  async rememberSettings(id: string, settings: RememberedSettings): Promise<void> {
    const device = this.devices.get(id);
    if (!device) return;

    device.settings = {
      stream: settings.stream ?? device.settings.stream,
      camera: settings.camera ? { ...device.settings.camera, ...definedFields(settings.camera) } : device.settings.camera
    };
    await this.persist();
  }

  updateTelemetry(id: string, frame: TelemetryFrame): void {
    const device = this.devices.get(id);
    if (device) device.telemetry = frame;
  }

  /**
   * Re-queries every claimed device concurrently. Calls that arrive while a
   * round is running share that round.
   */
  refresh(): Promise<Device[]> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.refreshAll().finally(() => {
        this.refreshInFlight = undefined;
      });
    }
    return this.refreshInFlight;
  }

  private async refreshAll(): Promise<Device[]> {
    const targets = Array.from(this.clients.entries());

    await Promise.allSettled(targets.map(async ([id, client]) => {
      try {
        const status = await client.getStatus();
        this.markSuccess(id, status);
      } catch (error) {
        this.markFailure(id, errorMessage(error));
      }
    }));

    return this.list();
  }

  private markSuccess(id: string, status: Device['status']): void {
    const device = this.devices.get(id);
    if (!device || !status) return;

    device.status = status;
    device.alias = device.aliasOverride ?? status.alias;
    device.consecutiveFailures = 0;
    device.lastSeen = new Date().toISOString();
    device.lastError = undefined;
    this.setLiveness(device, 'online');
  }

  private markFailure(id: string, message: string): void {
    const device = this.devices.get(id);
    if (!device) return;

    device.consecutiveFailures++;
    device.lastError = message;
    this.setLiveness(device, device.consecutiveFailures >= this.offlineThreshold ? 'offline' : 'stale');
  }

  private setLiveness(device: Device, liveness: Liveness): void {
    if (device.liveness === liveness) return;
    logger.info(`${device.alias} (${device.id}) is now ${liveness}`);
    device.liveness = liveness;
    this.emit('device:liveness', device.id, liveness);
  }

  startAutoRefresh(): void {
    if (this.refreshTimer) return;
    this.refreshTimer = setInterval(() => {
      this.refresh().catch(error => logger.error('Periodic refresh failed:', error));
    }, this.refreshIntervalMs);
  }

  stopAutoRefresh(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = undefined;
    }
  }

  private async persist(): Promise<void> {
    if (!this.store) return;

    const snapshot: PersistedDevices = {};
    for (const device of this.devices.values()) {
      snapshot[device.id] = {
        id: device.id,
        alias: device.alias,
        aliasOverride: device.aliasOverride,
        host: device.host,
        port: device.port,
        token: device.token,
        settings: device.settings
      };
    }

    try {
      await this.store.save(snapshot);
    } catch (error) {
      logger.warn('Failed to save devices to disk:', error);
    }
  }
}

function copyDevice(device: Device): Device {
  return { ...device, settings: { ...device.settings } };
}

function definedFields<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isOwnKey(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isOwnKey<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(value, key);
}
