import { EventEmitter } from 'events';
import { DiscoveredCandidate, Device } from './types';
import { ServiceBrowser } from './ServiceBrowser';
import { DeviceRegistry } from './DeviceRegistry';
import { NotFoundError } from '../../../protocol/errors';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('discovery');

export interface DiscoveryOptions {
  intervalMs?: number;
  browseWindowMs?: number;
}

/**
 * Periodic browse cycles. Each cycle replaces the candidate list; nothing
 * survives a cycle unless the device announced itself again.
 * Emits `candidates` with the fresh list.
 */
export class DiscoveryService extends EventEmitter {
  private candidates: DiscoveredCandidate[] = [];
  private timer?: NodeJS.Timeout;
  private cycleInFlight?: Promise<DiscoveredCandidate[]>;
  private readonly intervalMs: number;
  private readonly browseWindowMs: number;

  constructor(
    private readonly browser: ServiceBrowser,
    private readonly registry: DeviceRegistry,
    options: DiscoveryOptions = {}
  ) {
    super();
    this.intervalMs = options.intervalMs ?? 10000;
    this.browseWindowMs = options.browseWindowMs ?? 3000;
  }

  start(): void {
    if (this.timer) return;
    this.runCycle().catch(error => logger.error('Discovery cycle failed:', error));
    this.timer = setInterval(() => {
      this.runCycle().catch(error => logger.error('Discovery cycle failed:', error));
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.browser.close();
  }

  runCycle(): Promise<DiscoveredCandidate[]> {
    if (!this.cycleInFlight) {
      this.cycleInFlight = this.browseOnce().finally(() => {
        this.cycleInFlight = undefined;
      });
    }
    return this.cycleInFlight;
  }

  private async browseOnce(): Promise<DiscoveredCandidate[]> {
    try {
      this.candidates = await this.browser.browse(this.browseWindowMs);
      logger.debug(`🔍 Browse found ${this.candidates.length} device(s)`);
    } catch (error) {
      logger.error('Browse failed, clearing candidates:', error);
      this.candidates = [];
    }
    this.emit('candidates', this.newCandidates());
    return this.candidates.map(candidate => ({ ...candidate }));
  }

  allCandidates(): DiscoveredCandidate[] {
    return this.candidates.map(candidate => ({ ...candidate }));
  }

  /** Candidates whose alias no claimed device carries. */
  newCandidates(): DiscoveredCandidate[] {
    const claimed = this.registry.aliases();
    return this.candidates
      .filter(candidate => !claimed.has(candidate.alias))
      .map(candidate => ({ ...candidate }));
  }

  /** Claims the candidate with `alias` from the latest cycle. */
  async claimCandidate(alias: string, token: string): Promise<Device> {
    const candidate = this.candidates.find(entry => entry.alias === alias);
    if (!candidate) {
      throw new NotFoundError(`discovered device ${alias}`);
    }
    return this.registry.claim(candidate.host, candidate.port, token);
  }
}
