import WebSocket from 'ws';
import { CameraService } from '../../device/modules/camera/CameraService';
import { createDeviceServer, DeviceServer } from '../../device/server';
import { DeviceConfig } from '../../utils/config';
import { RecordingTransmitter, TEST_TOKEN } from './mockDevices';

export interface DeviceHarness {
  server: DeviceServer;
  camera: CameraService;
  transmitter: RecordingTransmitter;
  baseUrl: string;
  wsUrl: string;
  port: number;
  /** Current value of the rate limiter's clock; tests move it by hand. */
  clock: { now: number };
  stop(): Promise<void>;
}

export const testDeviceConfig = (overrides: Partial<DeviceConfig> = {}): DeviceConfig => ({
  port: 0,
  alias: 'CAM-TEST',
  authEnabled: true,
  authToken: TEST_TOKEN,
  rateLimitIntervalMs: 50,
  telemetryIntervalMs: 1000,
  advertise: false,
  ...overrides
});

/** Starts a real device server on an ephemeral localhost port. */
export async function startDevice(overrides: Partial<DeviceConfig> = {}): Promise<DeviceHarness> {
  const config = testDeviceConfig(overrides);
  const transmitter = new RecordingTransmitter();
  const camera = new CameraService(config.alias, transmitter);
  const clock = { now: 1_000 };
  const server = createDeviceServer(config, camera, { clock: () => clock.now, host: '127.0.0.1' });
  const port = await server.start();

  return {
    server,
    camera,
    transmitter,
    baseUrl: `http://127.0.0.1:${port}`,
    wsUrl: `ws://127.0.0.1:${port}/ws`,
    port,
    clock,
    stop: () => server.stop()
  };
}

export const bearer = (token = TEST_TOKEN) => ({ Authorization: `Bearer ${token}` });

/** Opens a WebSocket and resolves once it is open, or rejects with the upgrade status. */
export function openSocket(url: string, headers: Record<string, string> = bearer()): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url, { headers });
    socket.once('open', () => resolve(socket));
    socket.once('unexpected-response', (_req, res) => {
      socket.terminate();
      reject(new Error(`HTTP ${res.statusCode}`));
    });
    socket.on('error', reject);
  });
}

export function nextMessage(socket: WebSocket): Promise<string> {
  return new Promise(resolve => {
    socket.once('message', data => resolve(data.toString()));
  });
}

export function closeSocket(socket: WebSocket): Promise<void> {
  return new Promise(resolve => {
    if (socket.readyState === WebSocket.CLOSED) {
      resolve();
      return;
    }
    socket.once('close', () => resolve());
    socket.close();
  });
}

/** Polls `condition` until it holds or `timeoutMs` passes. */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('Timed out waiting for condition');
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}
