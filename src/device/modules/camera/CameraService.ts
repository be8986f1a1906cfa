import { EventEmitter } from 'events';
import {
  CameraSettingsRequest,
  Capability,
  CurrentSettings,
  StatusResponse,
  StreamStartRequest,
  TelemetryFrame,
  TorchLevel,
  VideoSettingsResponse,
  VideoSettingsUpdateRequest,
  WhiteBalanceMeasurement
} from '../../../protocol/types';
import { DEFAULT_PRESET_ID, DEFAULT_STREAM_SETTINGS, VIDEO_PRESETS } from '../../../protocol/presets';
import { CameraControl, StreamTransmitter } from './types';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('camera');

const CAPABILITIES: Capability[] = [
  { resolution: '1280x720', fps: [30, 60], codec: ['h264', 'hevc'], lens: 'wide', max_zoom: 10 },
  { resolution: '1920x1080', fps: [30, 60], codec: ['h264', 'hevc'], lens: 'wide', max_zoom: 10 },
  { resolution: '2560x1440', fps: [30, 60], codec: ['hevc'], lens: 'wide', max_zoom: 6 },
  { resolution: '3840x2160', fps: [30, 60], codec: ['h264', 'hevc'], lens: 'wide', max_zoom: 6 },
  { resolution: '1920x1080', fps: [30], codec: ['h264', 'hevc'], lens: 'ultra_wide', max_zoom: 2 },
  { resolution: '1920x1080', fps: [30], codec: ['h264', 'hevc'], lens: 'telephoto', max_zoom: 15 }
];

type StreamState = 'idle' | 'starting' | 'streaming' | 'stopping';

/**
 * The device's view of its own camera: current settings, stored video
 * settings and the stream lifecycle. Emits `alias:changed` with the new
 * alias so the advertisement can follow it.
 */
export class CameraService extends EventEmitter implements CameraControl {
  private alias: string;
  private readonly transmitter: StreamTransmitter;
  private current: CurrentSettings;
  private videoSettings: VideoSettingsUpdateRequest = { selected_preset_id: DEFAULT_PRESET_ID };
  private state: StreamState = 'idle';
  private stopping?: Promise<void>;
  private screenDimmed = false;
  private torchLevel = 0;

  constructor(alias: string, transmitter: StreamTransmitter) {
    super();
    this.alias = alias;
    this.transmitter = transmitter;
    this.current = {
      resolution: DEFAULT_STREAM_SETTINGS.resolution,
      fps: DEFAULT_STREAM_SETTINGS.framerate,
      bitrate: DEFAULT_STREAM_SETTINGS.bitrate,
      codec: DEFAULT_STREAM_SETTINGS.codec,
      wb_mode: 'auto',
      iso_mode: 'auto',
      iso: 100,
      shutter_mode: 'auto',
      shutter_s: 1 / 60,
      focus_mode: 'auto',
      zoom_factor: 1,
      lens: 'wide',
      camera_position: 'back'
    };
  }

  get isStreaming(): boolean {
    return this.state === 'streaming';
  }

  get isScreenDimmed(): boolean {
    return this.screenDimmed;
  }

  getStatus(): StatusResponse {
    return {
      alias: this.alias,
      ndi_state: this.isStreaming ? 'streaming' : 'idle',
      current: { ...this.current },
      telemetry: this.transmitter.currentTelemetry(),
      capabilities: this.getCapabilities()
    };
  }

  getCapabilities(): Capability[] {
    return CAPABILITIES.map(capability => ({ ...capability, fps: [...capability.fps], codec: [...capability.codec] }));
  }

  getVideoSettings(): VideoSettingsResponse {
    return { ...this.videoSettings, available_presets: [...VIDEO_PRESETS] };
  }

  // Stored for the next stream start; a running stream keeps its settings.
  async updateVideoSettings(update: VideoSettingsUpdateRequest): Promise<void> {
    this.videoSettings = { ...update };
    logger.info('Video settings updated');
  }

  async startStream(config: StreamStartRequest): Promise<void> {
    if (this.state === 'stopping') {
      throw new Error('Stream is stopping');
    }
    if (this.state !== 'idle') {
      throw new Error('Stream is already active');
    }

    // Claimed before the transmitter yields so an overlapping start sees it
    this.state = 'starting';
    try {
      await this.transmitter.start(config);
    } catch (error) {
      this.state = 'idle';
      throw error;
    }

    this.state = 'streaming';
    this.current = {
      ...this.current,
      resolution: config.resolution,
      fps: config.framerate,
      bitrate: config.bitrate,
      codec: config.codec
    };

    logger.info(`Stream started: ${config.resolution}@${config.framerate}fps ${config.codec}`);
  }

  /** Idempotent; an overlapping stop joins the one in flight. */
  stopStream(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.state === 'idle') {
      logger.debug('Stop requested while idle');
      return Promise.resolve();
    }
    if (this.state === 'starting') {
      return Promise.reject(new Error('Stream is still starting'));
    }

    this.state = 'stopping';
    const stopping = this.transmitter.stop().then(
      () => {
        this.state = 'idle';
        logger.info('Stream stopped');
      },
      (error: unknown) => {
        this.state = 'streaming';
        throw error;
      }
    );
    this.stopping = stopping.finally(() => {
      this.stopping = undefined;
    });
    return this.stopping;
  }

  async updateCameraSettings(settings: CameraSettingsRequest): Promise<void> {
    await this.transmitter.updateSettings(settings);

    const c = this.current;
    this.current = {
      ...c,
      wb_mode: settings.wb_mode ?? c.wb_mode,
      wb_kelvin: settings.wb_kelvin ?? c.wb_kelvin,
      wb_tint: settings.wb_tint ?? c.wb_tint,
      iso_mode: settings.iso_mode ?? c.iso_mode,
      iso: settings.iso ?? c.iso,
      shutter_mode: settings.shutter_mode ?? c.shutter_mode,
      shutter_s: settings.shutter_s ?? c.shutter_s,
      focus_mode: settings.focus_mode ?? c.focus_mode,
      zoom_factor: settings.zoom_factor ?? c.zoom_factor,
      lens: settings.lens ?? c.lens,
      camera_position: settings.camera_position ?? c.camera_position
    };
  }

  async forceKeyframe(): Promise<void> {
    if (!this.isStreaming) {
      throw new Error('Stream is not active');
    }
    await this.transmitter.forceKeyframe();
  }

  async setScreenBrightness(dimmed: boolean): Promise<void> {
    this.screenDimmed = dimmed;
    logger.info(`Screen ${dimmed ? 'dimmed' : 'restored'}`);
  }

  async updateAlias(alias: string): Promise<void> {
    if (alias === this.alias) return;
    const previous = this.alias;
    this.alias = alias;
    logger.info(`Alias changed: ${previous} -> ${alias}`);
    this.emit('alias:changed', alias);
  }

  getTorchLevel(): TorchLevel {
    return { level: this.torchLevel };
  }

  async setTorchLevel(level: number): Promise<void> {
    await this.transmitter.setTorchLevel(level);
    this.torchLevel = level;
  }

  measureWhiteBalance(): Promise<WhiteBalanceMeasurement> {
    return this.transmitter.measureWhiteBalance();
  }

  currentTelemetryFrame(): TelemetryFrame {
    const telemetry = this.transmitter.currentTelemetry();
    return {
      fps: telemetry.fps,
      bitrate: telemetry.bitrate,
      queue_ms: telemetry.queue_ms ?? 0,
      battery: telemetry.battery,
      temp_c: telemetry.temp_c,
      wifi_rssi: telemetry.wifi_rssi,
      ndi_state: this.isStreaming ? 'streaming' : 'idle',
      dropped_frames: telemetry.dropped_frames ?? 0,
      charging_state: telemetry.charging_state ?? 'unplugged'
    };
  }
}
