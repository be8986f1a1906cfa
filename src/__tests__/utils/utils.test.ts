import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { loadConsoleConfig, loadDeviceConfig } from '../../utils/config';
import { JsonFileStore } from '../../utils/files';
import { withTimeout } from '../../utils/timeout';

describe('Configuration', () => {
  test('should use defaults for an empty environment', () => {
    const config = loadDeviceConfig({});

    expect(config.port).toBe(8888);
    expect(config.authEnabled).toBe(false);
    expect(config.rateLimitIntervalMs).toBe(50);
    expect(config.telemetryIntervalMs).toBe(1000);
    expect(config.advertise).toBe(true);
    expect(config.alias).toMatch(/^CAM-[0-9A-F]{4}$/);
    expect(config.authToken).toMatch(/^[0-9a-f]{32}$/);
  });

  test('should read device settings from the environment', () => {
    const config = loadDeviceConfig({
      DEVICE_PORT: '9000',
      DEVICE_ALIAS: ' CAM-STAGE ',
      AUTH_ENABLED: 'yes',
      AUTH_TOKEN: 'test-secret',
      ADVERTISE: 'off'
    });

    expect(config).toEqual({
      port: 9000,
      alias: 'CAM-STAGE',
      authEnabled: true,
      authToken: 'test-secret',
      rateLimitIntervalMs: 50,
      telemetryIntervalMs: 1000,
      advertise: false
    });
  });

  test('should fall back on invalid numbers and flags', () => {
    const config = loadDeviceConfig({ DEVICE_PORT: 'eighty', AUTH_ENABLED: 'maybe', TELEMETRY_INTERVAL_MS: '0' });

    expect(config.port).toBe(8888);
    expect(config.authEnabled).toBe(false);
    expect(config.telemetryIntervalMs).toBe(1000);
  });

  test('should read console settings', () => {
    const config = loadConsoleConfig({ DATA_DIR: '/var/lib/fleet', DEBOUNCE_MS: '0', OFFLINE_THRESHOLD: '5' });

    expect(config).toEqual({
      port: 3001,
      dataDir: '/var/lib/fleet',
      refreshIntervalMs: 2000,
      discoveryIntervalMs: 10000,
      browseWindowMs: 3000,
      commandTimeoutMs: 5000,
      debounceMs: 0,
      offlineThreshold: 5,
      temperatureAlertC: 40
    });
  });
});

describe('withTimeout', () => {
  test('should resolve with the task value', async () => {
    await expect(withTimeout(Promise.resolve(7), 100, 'answer')).resolves.toBe(7);
  });

  test('should reject with TIMEOUT when the task hangs', async () => {
    const hang = new Promise<number>(() => undefined);

    await expect(withTimeout(hang, 20, 'status on CAM-1')).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'status on CAM-1 timed out after 20ms'
    });
  });

  test('should pass the task error through', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 100, 'start')).rejects.toThrow('refused');
  });
});

describe('JsonFileStore', () => {
  let dir: string;

  const store = (file = 'state.json') =>
    new JsonFileStore<string[]>(
      path.join(dir, file),
      raw => (Array.isArray(raw) ? raw.filter((item): item is string => typeof item === 'string') : []),
      () => []
    );

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fleet-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('should start empty when the file does not exist', async () => {
    await expect(store().load()).resolves.toEqual([]);
  });

  test('should rethrow read errors other than a missing file', async () => {
    await fs.mkdir(path.join(dir, 'state.json'));

    await expect(store().load()).rejects.toMatchObject({ code: 'EISDIR' });
  });

  test('should read back what it saved, creating the directory', async () => {
    const nested = store('nested/state.json');

    await nested.save(['a', 'b']);

    await expect(nested.load()).resolves.toEqual(['a', 'b']);
  });

  test('should keep the last of several overlapping saves', async () => {
    const target = store();

    await Promise.all([target.save(['first']), target.save(['second']), target.save(['third'])]);

    await expect(target.load()).resolves.toEqual(['third']);
  });

  test('should start empty when the file is corrupt', async () => {
    await fs.writeFile(path.join(dir, 'state.json'), '{not json', 'utf8');

    await expect(store().load()).resolves.toEqual([]);
  });
});
