import { ServiceOptions } from '@homebridge/ciao';
import { AdvertisedService, buildTxtRecord, ServiceAdvertiser, ServicePublisher } from '../../device/advertiser';
import { toCandidate } from '../../console/modules/fleet/ServiceBrowser';

class RecordingPublisher implements ServicePublisher {
  published: ServiceOptions[] = [];
  services: Array<{ advertise: jest.Mock; end: jest.Mock; destroy: jest.Mock }> = [];
  shutdown = jest.fn(async () => undefined);

  createService(options: ServiceOptions): AdvertisedService {
    const service = {
      advertise: jest.fn(async () => undefined),
      end: jest.fn(async () => undefined),
      destroy: jest.fn(async () => undefined)
    };
    this.published.push(options);
    this.services.push(service);
    return service;
  }
}

describe('mDNS advertisement', () => {
  test('should carry alias, version and protocol in TXT', () => {
    expect(buildTxtRecord('CAM-7F3A')).toEqual({ alias: 'CAM-7F3A', version: '1.0', protocol: 'avocam-v1' });
  });

  test('should be read back by the console browser', () => {
    const txt = { ...buildTxtRecord('CAM-7F3A') };

    expect(toCandidate({ name: 'CAM-7F3A', host: 'cam.local', port: 8888, addresses: ['10.1.2.3'], txt })).toEqual({
      alias: 'CAM-7F3A',
      host: '10.1.2.3',
      port: 8888,
      txt: { alias: 'CAM-7F3A', version: '1.0', protocol: 'avocam-v1' }
    });
  });

  describe('ServiceAdvertiser', () => {
    let publisher: RecordingPublisher;
    let advertiser: ServiceAdvertiser;

    beforeEach(() => {
      jest.clearAllMocks();
      publisher = new RecordingPublisher();
      advertiser = new ServiceAdvertiser('CAM-7F3A', 8888, () => publisher);
    });

    test('should publish the alias as service name and TXT record', () => {
      advertiser.start();

      expect(publisher.published).toEqual([
        {
          name: 'CAM-7F3A',
          type: 'avolocam',
          port: 8888,
          txt: { alias: 'CAM-7F3A', version: '1.0', protocol: 'avocam-v1' }
        }
      ]);
      expect(publisher.services[0].advertise).toHaveBeenCalledTimes(1);
    });

    test('should withdraw the old record and re-advertise under a new alias', async () => {
      advertiser.start();

      await advertiser.updateAlias('Booth');

      expect(publisher.services[0].end).toHaveBeenCalledTimes(1);
      expect(publisher.services[0].destroy).toHaveBeenCalledTimes(1);
      expect(publisher.published.map(options => options.name)).toEqual(['CAM-7F3A', 'Booth']);
      expect(publisher.published[1].txt).toEqual({ alias: 'Booth', version: '1.0', protocol: 'avocam-v1' });
      expect(advertiser.advertisedAlias).toBe('Booth');
    });

    test('should ignore an unchanged alias', async () => {
      advertiser.start();

      await advertiser.updateAlias('CAM-7F3A');

      expect(publisher.published).toHaveLength(1);
      expect(publisher.services[0].end).not.toHaveBeenCalled();
    });

    test('should withdraw the record and shut the responder down on stop', async () => {
      advertiser.start();

      await advertiser.stop();

      expect(publisher.services[0].end).toHaveBeenCalledTimes(1);
      expect(publisher.shutdown).toHaveBeenCalledTimes(1);
    });
  });
});
