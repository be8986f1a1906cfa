/**
 * Console API Tests
 * REST surface of the fleet console over fake devices
 */

import axios from 'axios';
import { createConsoleServer, ConsoleServer } from '../../console/server';
import { CommandOrchestrator } from '../../console/modules/fleet/CommandOrchestrator';
import { DeviceRegistry } from '../../console/modules/fleet/DeviceRegistry';
import { DiscoveryService } from '../../console/modules/fleet/DiscoveryService';
import { ProfileStore } from '../../console/modules/fleet/ProfileStore';
import { parseCommandAction, parseTargets } from '../../console/routes/fleet';
import { delay } from '../../utils/timeout';
import { candidate, FakeFleet, fakeDeviceFleet, FakeServiceBrowser, sampleStream, TEST_TOKEN } from '../test-data/mockDevices';

const http = axios.create({ validateStatus: () => true });

describe('Console API', () => {
  let fleet: FakeFleet;
  let browser: FakeServiceBrowser;
  let registry: DeviceRegistry;
  let discovery: DiscoveryService;
  let server: ConsoleServer;
  let baseUrl: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    fleet = fakeDeviceFleet();
    browser = new FakeServiceBrowser();
    registry = new DeviceRegistry({ clientFactory: fleet.factory });
    discovery = new DiscoveryService(browser, registry);
    const orchestrator = new CommandOrchestrator(registry, { timeoutMs: 50, debounceMs: 200 });
    const profiles = new ProfileStore(orchestrator);

    server = createConsoleServer({ registry, discovery, orchestrator, profiles });
    const port = await server.start(0, '127.0.0.1');
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    discovery.stop();
    await server.stop();
  });

  test('should answer the health check', async () => {
    const res = await http.get(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(res.data.status).toBe('OK');
    expect(res.data.devices).toBe(0);
  });

  describe('Devices', () => {
    test('should claim a device and hide its token', async () => {
      const res = await http.post(`${baseUrl}/api/devices`, { host: '10.0.0.1', port: 8001, token: TEST_TOKEN });

      expect(res.status).toBe(201);
      expect(res.data.device).toMatchObject({ id: '10.0.0.1:8001', alias: 'CAM-8001', has_token: true });
      expect(res.data.device.token).toBeUndefined();
    });

    test('should answer 409 for a second claim', async () => {
      await http.post(`${baseUrl}/api/devices`, { host: '10.0.0.1', port: 8001 });
      const res = await http.post(`${baseUrl}/api/devices`, { host: '10.0.0.1', port: 8001 });

      expect(res.status).toBe(409);
      expect(res.data).toEqual({ code: 'CONFLICT', message: 'Device already claimed: 10.0.0.1:8001' });
    });

    test('should require a numeric port', async () => {
      const res = await http.post(`${baseUrl}/api/devices`, { host: '10.0.0.1', port: '8001' });

      expect(res.status).toBe(400);
      expect(res.data.message).toBe("Missing required numeric field 'port'");
    });

    test('should list devices with fresh liveness', async () => {
      await registry.claim('10.0.0.1', 8001, TEST_TOKEN);
      fleet.at('10.0.0.1', 8001).behavior = 'unreachable';

      const res = await http.get(`${baseUrl}/api/devices`);

      expect(res.data.devices).toHaveLength(1);
      expect(res.data.devices[0]).toMatchObject({ id: '10.0.0.1:8001', liveness: 'stale', consecutiveFailures: 1 });
    });

    test('should rename and remove a device', async () => {
      await registry.claim('10.0.0.1', 8001, TEST_TOKEN);

      const renamed = await http.put(`${baseUrl}/api/devices/10.0.0.1:8001/alias`, { alias: 'Booth' });
      const removed = await http.delete(`${baseUrl}/api/devices/10.0.0.1:8001`);
      const missing = await http.delete(`${baseUrl}/api/devices/10.0.0.1:8001`);

      expect(renamed.data.device.alias).toBe('Booth');
      expect(removed.data).toEqual({ success: true, message: 'Device 10.0.0.1:8001 removed' });
      expect(missing.status).toBe(404);
    });
  });

  describe('Discovery', () => {
    test('should list unclaimed candidates and claim one by alias', async () => {
      browser.results.push([candidate('CAM-8005', 8005, '10.0.0.5')]);
      await discovery.runCycle();

      const listed = await http.get(`${baseUrl}/api/discovery`);
      const claimed = await http.post(`${baseUrl}/api/discovery/claim`, { alias: 'CAM-8005', token: TEST_TOKEN });
      const after = await http.get(`${baseUrl}/api/discovery`);

      expect(listed.data.candidates).toEqual([candidate('CAM-8005', 8005, '10.0.0.5')]);
      expect(claimed.status).toBe(201);
      expect(claimed.data.device.id).toBe('10.0.0.5:8005');
      expect(after.data.candidates).toEqual([]);
    });
  });

  describe('Commands', () => {
    beforeEach(async () => {
      await registry.claim('10.0.0.1', 8001, TEST_TOKEN);
      await registry.claim('10.0.0.2', 8002, TEST_TOKEN);
    });

    test('should run a group command and report each device', async () => {
      fleet.at('10.0.0.2', 8002).behavior = 'unreachable';

      const res = await http.post(`${baseUrl}/api/commands`, {
        op: 'start-stream',
        targets: ['10.0.0.1:8001', '10.0.0.2:8002'],
        payload: sampleStream
      });

      expect(res.status).toBe(200);
      expect(res.data).toEqual({
        success: false,
        results: [
          { device_id: '10.0.0.1:8001', success: true },
          { device_id: '10.0.0.2:8002', success: false, error: 'Cannot reach CAM-8002: ECONNREFUSED' }
        ]
      });
    });

    test('should reject an unknown op', async () => {
      const res = await http.post(`${baseUrl}/api/commands`, { op: 'reboot', targets: '10.0.0.1:8001' });

      expect(res.status).toBe(400);
      expect(res.data.message).toBe("Unknown op 'reboot'");
    });

    test('should coalesce debounced edits', async () => {
      const first = http.post(`${baseUrl}/api/commands/debounced`, {
        op: 'update-camera-settings',
        targets: '10.0.0.1:8001',
        payload: { zoom_factor: 2 }
      });
      await delay(50);
      const second = http.post(`${baseUrl}/api/commands/debounced`, {
        op: 'update-camera-settings',
        targets: '10.0.0.1:8001',
        payload: { zoom_factor: 4 }
      });

      const [a, b] = await Promise.all([first, second]);

      expect(a.data.results).toEqual([{ device_id: '10.0.0.1:8001', success: true }]);
      expect(b.data.results).toEqual([{ device_id: '10.0.0.1:8001', success: true }]);
      expect(fleet.at('10.0.0.1', 8001).updateCameraSettings).toHaveBeenCalledTimes(1);
      expect(fleet.at('10.0.0.1', 8001).updateCameraSettings).toHaveBeenCalledWith(
        expect.objectContaining({ zoom_factor: 4 })
      );
    });

    test('should refuse to debounce a stream start', async () => {
      const res = await http.post(`${baseUrl}/api/commands/debounced`, {
        op: 'start-stream',
        targets: '10.0.0.1:8001',
        payload: sampleStream
      });

      expect(res.status).toBe(400);
      expect(res.data.message).toBe("Op 'start-stream' cannot be debounced");
    });

    test('should start and stop the whole fleet', async () => {
      const started = await http.post(`${baseUrl}/api/fleet/start-all`);
      const stopped = await http.post(`${baseUrl}/api/fleet/stop-all`);

      expect(started.data.success).toBe(true);
      expect(started.data.results).toHaveLength(2);
      expect(stopped.data.success).toBe(true);
    });
  });

  describe('Profiles', () => {
    test('should save, list, apply and delete a profile', async () => {
      await registry.claim('10.0.0.1', 8001, TEST_TOKEN);

      const saved = await http.put(`${baseUrl}/api/profiles/Stage`, { camera: { iso: 400 } });
      const listed = await http.get(`${baseUrl}/api/profiles`);
      const applied = await http.post(`${baseUrl}/api/profiles/Stage/apply`, { device_ids: ['10.0.0.1:8001'] });
      const deleted = await http.delete(`${baseUrl}/api/profiles/Stage`);

      expect(saved.data.profile.name).toBe('Stage');
      expect(listed.data.profiles).toHaveLength(1);
      expect(applied.data).toEqual({ success: true, results: [{ device_id: '10.0.0.1:8001', success: true }] });
      expect(deleted.data.success).toBe(true);
    });

    test('should answer 404 when applying an unknown profile', async () => {
      const res = await http.post(`${baseUrl}/api/profiles/Missing/apply`, { device_ids: '10.0.0.1:8001' });

      expect(res.status).toBe(404);
      expect(res.data).toEqual({ code: 'NOT_FOUND', message: 'Resource not found: profile Missing' });
    });
  });

  test('should answer NOT_FOUND for an unknown path', async () => {
    const res = await http.get(`${baseUrl}/api/nothing`);

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ code: 'NOT_FOUND', message: 'Resource not found: GET /api/nothing' });
  });
});

describe('Command parsing', () => {
  test('should accept a single id or a list', () => {
    expect(parseTargets('a')).toBe('a');
    expect(parseTargets(['a', 'b'])).toEqual(['a', 'b']);
  });

  test('should reject empty targets', () => {
    expect(() => parseTargets([])).toThrow("Field 'targets' must be a device id or a non-empty list of ids");
    expect(() => parseTargets(['a', 1])).toThrow("Field 'targets' must contain device ids");
  });

  test('should decode a stream start with its payload', () => {
    expect(parseCommandAction({ op: 'start-stream', payload: { ...sampleStream } })).toEqual({
      op: 'start-stream',
      payload: sampleStream
    });
  });
});
