import { CiaoService, Responder, ServiceOptions } from '@homebridge/ciao';
import { DiscoveryTxtRecord, PROTOCOL_NAME, PROTOCOL_VERSION, SERVICE_TYPE } from '../protocol/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('mdns');

export function buildTxtRecord(alias: string): DiscoveryTxtRecord {
  return { alias, version: PROTOCOL_VERSION, protocol: PROTOCOL_NAME };
}

export type AdvertisedService = Pick<CiaoService, 'advertise' | 'end' | 'destroy'>;

/** The slice of ciao's Responder the advertiser drives. */
export interface ServicePublisher {
  createService(options: ServiceOptions): AdvertisedService;
  shutdown(): Promise<void>;
}

/** Publishes the device as `_avolocam._tcp` on the local network. */
export class ServiceAdvertiser {
  private publisher: ServicePublisher | null = null;
  private service: AdvertisedService | null = null;

  constructor(
    private alias: string,
    private readonly port: number,
    private readonly getPublisher: () => ServicePublisher = () => Responder.getResponder()
  ) {}

  get advertisedAlias(): string {
    return this.alias;
  }

  // Advertising problems are logged; the control server keeps running without it
  start(): void {
    try {
      this.publisher = this.publisher ?? this.getPublisher();
      const alias = this.alias;

      const service = this.publisher.createService({
        name: alias,
        type: SERVICE_TYPE,
        port: this.port,
        txt: { ...buildTxtRecord(alias) }
      });
      this.service = service;

      service.advertise().then(() => {
        logger.info(`📣 Advertised ${alias} as _${SERVICE_TYPE}._tcp on port ${this.port}`);
      }).catch(error => {
        logger.error('Failed to advertise mDNS service:', error);
      });
    } catch (error) {
      logger.error('Error setting up mDNS:', error);
    }
  }

  /** Withdraws the current record and publishes one under the new alias. */
  async updateAlias(alias: string): Promise<void> {
    if (alias === this.alias) return;
    await this.withdraw();
    this.alias = alias;
    this.start();
  }

  async stop(): Promise<void> {
    await this.withdraw();
    try {
      if (this.publisher) {
        await this.publisher.shutdown();
        this.publisher = null;
      }
    } catch (error) {
      logger.warn('Error stopping mDNS advertisement:', error);
    }
  }

  private async withdraw(): Promise<void> {
    const service = this.service;
    if (!service) return;
    this.service = null;
    try {
      await service.end();
      await service.destroy();
    } catch (error) {
      logger.warn(`Error withdrawing mDNS record for ${this.alias}:`, error);
    }
  }
}
