import { CameraSettingsRequest, StreamStartRequest, Telemetry, WhiteBalanceMeasurement } from '../../../protocol/types';
import { StreamTransmitter } from './types';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('transmitter');

const IDLE_TEMP_C = 31;
const STREAMING_TEMP_C = 38;

/**
 * Stand-in transmitter for running the device program without capture
 * hardware. Telemetry follows the configured stream with a little jitter.
 */
export class SimulatedTransmitter implements StreamTransmitter {
  private config?: StreamStartRequest;
  private startedAt = 0;
  private battery = 1;
  private droppedFrames = 0;
  private keyframes = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async start(config: StreamStartRequest): Promise<void> {
    this.config = { ...config };
    this.startedAt = this.now();
    this.droppedFrames = 0;
    logger.info(`📡 Simulated stream up: ${config.resolution}@${config.framerate} ${config.codec}`);
  }

  async stop(): Promise<void> {
    this.config = undefined;
    logger.info('📴 Simulated stream down');
  }

  async forceKeyframe(): Promise<void> {
    this.keyframes++;
    logger.debug(`Keyframe #${this.keyframes} requested`);
  }

  async updateSettings(settings: CameraSettingsRequest): Promise<void> {
    logger.debug('Applying camera settings:', settings);
  }

  async setTorchLevel(level: number): Promise<void> {
    logger.debug(`Torch level ${level}`);
  }

  async measureWhiteBalance(): Promise<WhiteBalanceMeasurement> {
    return {
      scene_cct_k: Math.round(5200 + Math.random() * 600),
      tint: Number(((Math.random() - 0.5) * 4).toFixed(1))
    };
  }

  currentTelemetry(): Telemetry {
    const config = this.config;
    if (!config) {
      return {
        fps: 0,
        bitrate: 0,
        battery: this.battery,
        temp_c: IDLE_TEMP_C,
        wifi_rssi: -55,
        queue_ms: 0,
        dropped_frames: 0,
        charging_state: 'unplugged'
      };
    }

    const minutes = (this.now() - this.startedAt) / 60000;
    this.battery = Math.max(0, this.battery - 0.0005);
    if (Math.random() < 0.02) this.droppedFrames++;

    return {
      fps: config.framerate - (Math.random() < 0.1 ? 1 : 0),
      bitrate: Math.round(config.bitrate * (0.95 + Math.random() * 0.05)),
      battery: Number(this.battery.toFixed(3)),
      temp_c: Number(Math.min(STREAMING_TEMP_C + minutes * 0.1, 45).toFixed(1)),
      wifi_rssi: -50 - Math.round(Math.random() * 10),
      queue_ms: Math.round(4 + Math.random() * 4),
      dropped_frames: this.droppedFrames,
      charging_state: 'unplugged'
    };
  }
}
