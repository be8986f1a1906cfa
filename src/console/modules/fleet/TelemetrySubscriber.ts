import WebSocket from 'ws';
import { Device } from './types';
import { DeviceRegistry } from './DeviceRegistry';
import { ChargingState, NdiState, TelemetryFrame } from '../../../protocol/types';
import { isRecord } from '../../../protocol/validation';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('telemetry');

const BASE_DELAY_MS = 2000;
const MAX_DELAY_MS = 30000;

export function reconnectDelay(attempt: number): number {
  return Math.min(BASE_DELAY_MS * Math.pow(2, attempt), MAX_DELAY_MS);
}

const NDI_STATES: readonly NdiState[] = ['streaming', 'idle'];
const CHARGING_STATES: readonly ChargingState[] = ['charging', 'full', 'unplugged'];

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function parseTelemetryFrame(text: string): TelemetryFrame | undefined {
  const raw = decodeJson(text);
  if (!isRecord(raw)) return undefined;

  const num = (key: string): number | undefined => {
    const value = raw[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
  };
  const fps = num('fps');
  const bitrate = num('bitrate');
  const battery = num('battery');
  const tempC = num('temp_c');
  const rssi = num('wifi_rssi');
  const ndiState = NDI_STATES.find(state => state === raw.ndi_state);
  if (fps === undefined || bitrate === undefined || battery === undefined || tempC === undefined ||
      rssi === undefined || ndiState === undefined) {
    return undefined;
  }

  return {
    fps,
    bitrate,
    queue_ms: num('queue_ms') ?? 0,
    battery,
    temp_c: tempC,
    wifi_rssi: rssi,
    ndi_state: ndiState,
    dropped_frames: num('dropped_frames') ?? 0,
    charging_state: CHARGING_STATES.find(state => state === raw.charging_state) ?? 'unplugged'
  };
}

interface Subscription {
  device: Device;
  socket?: WebSocket;
  attempts: number;
  reconnectTimer?: NodeJS.Timeout;
  closed: boolean;
}

export interface TelemetrySubscriberOptions {
  temperatureAlertC?: number;
}

/**
 * Keeps a WebSocket open to every claimed device and copies incoming
 * telemetry frames into the registry. Lost connections are retried with
 * exponential backoff until the device is unclaimed.
 */
export class TelemetrySubscriber {
  private subscriptions: Map<string, Subscription> = new Map();
  private readonly temperatureAlertC: number;

  constructor(
    private readonly registry: DeviceRegistry,
    options: TelemetrySubscriberOptions = {}
  ) {
    this.temperatureAlertC = options.temperatureAlertC ?? 40;
  }

  /** Subscribes to every device now claimed, and follows claims and removals from here on. */
  attach(): void {
    for (const device of this.registry.list()) this.watch(device);
    this.registry.on('device:claimed', (device: Device) => this.watch(device));
    this.registry.on('device:removed', (id: string) => this.unwatch(id));
  }

  get watchedCount(): number {
    return this.subscriptions.size;
  }

  watch(device: Device): void {
    if (this.subscriptions.has(device.id)) return;
    const subscription: Subscription = { device, attempts: 0, closed: false };
    this.subscriptions.set(device.id, subscription);
    this.connect(subscription);
  }

  unwatch(id: string): void {
    const subscription = this.subscriptions.get(id);
    if (!subscription) return;

    subscription.closed = true;
    if (subscription.reconnectTimer) clearTimeout(subscription.reconnectTimer);
    subscription.socket?.terminate();
    this.subscriptions.delete(id);
  }

  closeAll(): void {
    for (const id of Array.from(this.subscriptions.keys())) this.unwatch(id);
  }

  private connect(subscription: Subscription): void {
    const { device } = subscription;
    const headers: Record<string, string> = {};
    if (device.token !== '') headers.Authorization = `Bearer ${device.token}`;

    const socket = new WebSocket(`ws://${device.host}:${device.port}/ws`, { headers });
    subscription.socket = socket;

    socket.on('open', () => {
      subscription.attempts = 0;
      logger.info(`Telemetry connected: ${device.id}`);
    });

    socket.on('message', data => {
      const frame = parseTelemetryFrame(data.toString());
      if (!frame) {
        logger.debug(`Ignoring malformed telemetry from ${device.id}`);
        return;
      }
      this.registry.updateTelemetry(device.id, frame);
      if (frame.temp_c > this.temperatureAlertC) {
        logger.warn(`🌡️  ${device.alias} (${device.id}) is at ${frame.temp_c}°C`);
      }
    });

    socket.on('error', error => {
      logger.debug(`Telemetry socket error for ${device.id}: ${error.message}`);
    });

    socket.on('close', () => {
      if (subscription.closed) return;
      this.scheduleReconnect(subscription);
    });
  }

  private scheduleReconnect(subscription: Subscription): void {
    if (subscription.reconnectTimer) clearTimeout(subscription.reconnectTimer);

    const delay = reconnectDelay(subscription.attempts);
    subscription.attempts++;
    logger.debug(`Reconnecting telemetry for ${subscription.device.id} in ${delay}ms`);

    subscription.reconnectTimer = setTimeout(() => {
      subscription.reconnectTimer = undefined;
      if (!subscription.closed) this.connect(subscription);
    }, delay);
  }
}
