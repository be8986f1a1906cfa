import { Bonjour, Service } from 'bonjour-service';
import { DiscoveredCandidate } from './types';
import { SERVICE_TYPE } from '../../../protocol/types';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('browser');

/** One bounded browse for devices on the local network. */
export interface ServiceBrowser {
  browse(windowMs: number): Promise<DiscoveredCandidate[]>;
  close(): void;
}

const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;

/** The parts of a resolved mDNS record a candidate is built from. */
export type ResolvedService = Pick<Service, 'name' | 'host' | 'port' | 'addresses' | 'txt'>;

export function toCandidate(service: ResolvedService): DiscoveredCandidate | undefined {
  const addresses = service.addresses ?? [];
  const host = addresses.find(address => IPV4.test(address)) ?? addresses[0] ?? service.host;
  if (!host || !service.port) return undefined;

  const txt: Record<string, string> = {};
  for (const [key, value] of Object.entries(service.txt ?? {})) {
    txt[key] = Buffer.isBuffer(value) ? value.toString('utf8') : String(value);
  }

  return { alias: txt.alias || service.name, host, port: service.port, txt };
}

/** mDNS browser over bonjour-service for the `_avolocam._tcp` type. */
export class BonjourBrowser implements ServiceBrowser {
  private bonjour: Bonjour | null = null;

  private instance(): Bonjour {
    if (!this.bonjour) {
      this.bonjour = new Bonjour(undefined, (error: Error) => {
        logger.error('mDNS socket error:', error);
      });
    }
    return this.bonjour;
  }

  browse(windowMs: number): Promise<DiscoveredCandidate[]> {
    return new Promise(resolve => {
      const found = new Map<string, DiscoveredCandidate>();
      const browser = this.instance().find({ type: SERVICE_TYPE, protocol: 'tcp' }, service => {
        const candidate = toCandidate(service);
        if (!candidate) return;
        logger.debug(`Resolved ${candidate.alias} at ${candidate.host}:${candidate.port}`);
        found.set(`${candidate.host}:${candidate.port}`, candidate);
      });

      setTimeout(() => {
        browser.stop();
        resolve(Array.from(found.values()));
      }, windowMs);
    });
  }

  close(): void {
    if (this.bonjour) {
      this.bonjour.destroy();
      this.bonjour = null;
    }
  }
}
