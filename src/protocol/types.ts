// Wire types shared by the device control server and the fleet console.
// Field names are snake_case on the wire and in these interfaces.

export type NdiState = 'streaming' | 'idle';
export type WhiteBalanceMode = 'auto' | 'manual';
export type FocusMode = 'auto' | 'manual';
export type ExposureMode = 'auto' | 'manual';
export type ChargingState = 'charging' | 'full' | 'unplugged';
export type LensType = 'ultra_wide' | 'wide' | 'telephoto';
export type CameraPosition = 'front' | 'back';
export type VideoCodec = 'h264' | 'hevc';

export interface CurrentSettings {
  resolution: string;
  fps: number;
  bitrate: number;
  codec: VideoCodec;
  wb_mode: WhiteBalanceMode;
  wb_kelvin?: number;
  wb_tint?: number;
  iso_mode: ExposureMode;
  iso: number;
  shutter_mode: ExposureMode;
  shutter_s: number;
  focus_mode: FocusMode;
  zoom_factor: number;
  lens: LensType;
  camera_position: CameraPosition;
}

export interface Telemetry {
  fps: number;
  bitrate: number;
  battery: number; // 0.0 - 1.0
  temp_c: number;
  wifi_rssi: number;
  queue_ms?: number;
  dropped_frames?: number;
  charging_state?: ChargingState;
}

export interface Capability {
  resolution: string;
  fps: number[];
  codec: VideoCodec[];
  lens?: LensType;
  max_zoom?: number;
}

export interface StatusResponse {
  alias: string;
  ndi_state: NdiState;
  current: CurrentSettings;
  telemetry: Telemetry;
  capabilities: Capability[];
}

export interface StreamStartRequest {
  resolution: string;
  framerate: number;
  bitrate: number;
  codec: VideoCodec;
}

export interface CameraSettingsRequest {
  wb_mode?: WhiteBalanceMode;
  wb_kelvin?: number;
  wb_tint?: number;
  iso_mode?: ExposureMode;
  iso?: number;
  shutter_mode?: ExposureMode;
  shutter_s?: number;
  focus_mode?: FocusMode;
  zoom_factor?: number;
  lens?: LensType;
  camera_position?: CameraPosition;
  orientation_lock?: string;
}

export interface ScreenBrightnessRequest {
  dimmed: boolean;
}

export interface AliasUpdateRequest {
  alias: string;
}

/** Torch brightness, 0 (off) to 1. */
export interface TorchLevel {
  level: number;
}

export interface WhiteBalanceMeasurement {
  scene_cct_k: number;
  tint: number;
}

export interface VideoPreset {
  id: string;
  name: string;
  resolution: string;
  fps: number;
  codec: VideoCodec;
  bitrate: number;
}

export interface VideoSettingsUpdateRequest {
  selected_preset_id?: string;
  custom_resolution?: string;
  custom_fps?: number;
  custom_codec?: VideoCodec;
  custom_bitrate?: number;
}

export interface VideoSettingsResponse extends VideoSettingsUpdateRequest {
  available_presets: VideoPreset[];
}

/** Pushed to every WebSocket client once per telemetry tick. */
export interface TelemetryFrame {
  fps: number;
  bitrate: number;
  queue_ms: number;
  battery: number;
  temp_c: number;
  wifi_rssi: number;
  ndi_state: NdiState;
  dropped_frames: number;
  charging_state: ChargingState;
}

/** Client -> server WebSocket envelope. Only `set` is understood. */
export interface WebSocketCommand {
  op: string;
  camera?: CameraSettingsRequest;
}

export interface ErrorBody {
  code: string;
  message: string;
}

export interface SuccessBody {
  success: true;
  message: string;
}

export interface GroupOperationResult {
  device_id: string;
  success: boolean;
  error?: string;
}

// Service advertisement
export const SERVICE_TYPE = 'avolocam';
export const PROTOCOL_VERSION = '1.0';
export const PROTOCOL_NAME = 'avocam-v1';

export interface DiscoveryTxtRecord {
  alias: string;
  version: string;
  protocol: string;
}
