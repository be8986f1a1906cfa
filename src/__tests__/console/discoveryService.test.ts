import { DiscoveryService } from '../../console/modules/fleet/DiscoveryService';
import { DeviceRegistry } from '../../console/modules/fleet/DeviceRegistry';
import { ResolvedService, toCandidate } from '../../console/modules/fleet/ServiceBrowser';
import { candidate, FakeFleet, fakeDeviceFleet, FakeServiceBrowser, TEST_TOKEN } from '../test-data/mockDevices';

describe('DiscoveryService', () => {
  let fleet: FakeFleet;
  let registry: DeviceRegistry;
  let browser: FakeServiceBrowser;
  let discovery: DiscoveryService;

  beforeEach(() => {
    jest.clearAllMocks();
    fleet = fakeDeviceFleet();
    registry = new DeviceRegistry({ clientFactory: fleet.factory });
    browser = new FakeServiceBrowser();
    discovery = new DiscoveryService(browser, registry, { intervalMs: 60_000, browseWindowMs: 10 });
  });

  afterEach(() => {
    discovery.stop();
  });

  test('should list what a cycle found', async () => {
    browser.results.push([candidate('CAM-8001', 8001), candidate('CAM-8002', 8002, '10.0.0.2')]);

    const found = await discovery.runCycle();

    expect(found.map(entry => entry.alias)).toEqual(['CAM-8001', 'CAM-8002']);
    expect(discovery.newCandidates()).toEqual(found);
  });

  test('should leave out candidates whose alias is already claimed', async () => {
    await registry.claim('10.0.0.1', 8001, TEST_TOKEN);
    browser.results.push([candidate('CAM-8001', 8001), candidate('CAM-8002', 8002, '10.0.0.2')]);

    await discovery.runCycle();

    expect(discovery.allCandidates()).toHaveLength(2);
    expect(discovery.newCandidates().map(entry => entry.alias)).toEqual(['CAM-8002']);
  });

  test('should replace the list on every cycle', async () => {
    browser.results.push([candidate('CAM-8001', 8001)], [candidate('CAM-8002', 8002)]);

    await discovery.runCycle();
    await discovery.runCycle();

    expect(discovery.allCandidates().map(entry => entry.alias)).toEqual(['CAM-8002']);
  });

  test('should clear the list when a browse fails', async () => {
    browser.results.push([candidate('CAM-8001', 8001)], new Error('mDNS socket closed'));

    await discovery.runCycle();
    await discovery.runCycle();

    expect(discovery.allCandidates()).toEqual([]);
  });

  test('should announce new candidates after each cycle', async () => {
    const listener = jest.fn();
    discovery.on('candidates', listener);
    browser.results.push([candidate('CAM-8003', 8003)]);

    await discovery.runCycle();

    expect(listener).toHaveBeenCalledWith([candidate('CAM-8003', 8003)]);
  });

  test('should claim a candidate by alias', async () => {
    browser.results.push([candidate('CAM-8004', 8004, '10.0.0.4')]);
    await discovery.runCycle();

    const device = await discovery.claimCandidate('CAM-8004', TEST_TOKEN);

    expect(device.id).toBe('10.0.0.4:8004');
    expect(discovery.newCandidates()).toEqual([]);
  });

  test('should refuse to claim an alias that was not discovered', async () => {
    await expect(discovery.claimCandidate('CAM-GONE', TEST_TOKEN)).rejects.toThrow(
      'Resource not found: discovered device CAM-GONE'
    );
  });

  test('should close the browser on stop', () => {
    discovery.stop();

    expect(browser.closed).toBe(true);
  });
});

describe('toCandidate', () => {
  const service = (overrides: Partial<ResolvedService>): ResolvedService => ({
    name: 'CAM-1A2B',
    host: 'cam-1a2b.local',
    port: 8888,
    txt: { alias: 'Stage Left' },
    ...overrides
  });

  test('should prefer an IPv4 address and take the alias from TXT', () => {
    expect(toCandidate(service({ addresses: ['fe80::1', '192.168.1.20'] }))).toEqual({
      alias: 'Stage Left',
      host: '192.168.1.20',
      port: 8888,
      txt: { alias: 'Stage Left' }
    });
  });

  test('should fall back to the host name and the service name', () => {
    expect(toCandidate(service({ txt: {} }))).toEqual({
      alias: 'CAM-1A2B',
      host: 'cam-1a2b.local',
      port: 8888,
      txt: {}
    });
  });

  test('should drop a record without a port', () => {
    expect(toCandidate(service({ port: 0 }))).toBeUndefined();
  });
});
