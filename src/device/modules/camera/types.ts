// Device-side collaborator interfaces
import {
  CameraSettingsRequest,
  Capability,
  StatusResponse,
  StreamStartRequest,
  Telemetry,
  TelemetryFrame,
  TorchLevel,
  VideoSettingsResponse,
  VideoSettingsUpdateRequest,
  WhiteBalanceMeasurement
} from '../../../protocol/types';

/** The capture/encode/transmit pipeline the server drives. */
export interface StreamTransmitter {
  start(config: StreamStartRequest): Promise<void>;
  stop(): Promise<void>;
  forceKeyframe(): Promise<void>;
  updateSettings(settings: CameraSettingsRequest): Promise<void>;
  setTorchLevel(level: number): Promise<void>;
  measureWhiteBalance(): Promise<WhiteBalanceMeasurement>;
  currentTelemetry(): Telemetry;
}

/** Everything the HTTP and WebSocket handlers need from the device. */
export interface CameraControl {
  getStatus(): StatusResponse;
  getCapabilities(): Capability[];
  getVideoSettings(): VideoSettingsResponse;
  updateVideoSettings(update: VideoSettingsUpdateRequest): Promise<void>;
  startStream(config: StreamStartRequest): Promise<void>;
  stopStream(): Promise<void>;
  updateCameraSettings(settings: CameraSettingsRequest): Promise<void>;
  forceKeyframe(): Promise<void>;
  setScreenBrightness(dimmed: boolean): Promise<void>;
  updateAlias(alias: string): Promise<void>;
  getTorchLevel(): TorchLevel;
  setTorchLevel(level: number): Promise<void>;
  measureWhiteBalance(): Promise<WhiteBalanceMeasurement>;
  currentTelemetryFrame(): TelemetryFrame;
}
