import { CameraControl } from '../camera/types';
import { WebSocketHub } from './WebSocketHub';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('telemetry');

/** Pushes one TelemetryFrame to every WebSocket client per period. */
export class TelemetryBroadcaster {
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly camera: CameraControl,
    private readonly hub: WebSocketHub,
    private readonly intervalMs = 1000
  ) {}

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    logger.debug(`Telemetry every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  tick(): void {
    if (this.hub.clientCount === 0) return;
    try {
      this.hub.broadcast(this.camera.currentTelemetryFrame());
    } catch (error) {
      logger.error('Failed to broadcast telemetry:', error);
    }
  }
}
