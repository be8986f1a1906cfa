// Fleet module types
import {
  CameraSettingsRequest,
  StatusResponse,
  StreamStartRequest,
  TelemetryFrame,
  VideoSettingsUpdateRequest
} from '../../../protocol/types';

export type Liveness = 'online' | 'stale' | 'offline';

export interface RememberedSettings {
  stream?: StreamStartRequest;
  camera?: CameraSettingsRequest;
}

/** A claimed device as the console knows it. `id` is `host:port`. */
export interface Device {
  id: string;
  alias: string;
  /** Set by a console-side rename; wins over the alias the device reports. */
  aliasOverride?: string;
  host: string;
  port: number;
  token: string;
  liveness: Liveness;
  consecutiveFailures: number;
  lastSeen?: string;
  lastError?: string;
  status?: StatusResponse;
  telemetry?: TelemetryFrame;
  settings: RememberedSettings;
}

/** Serializable subset kept in devices.json. */
export interface PersistedDevice {
  id: string;
  alias: string;
  aliasOverride?: string;
  host: string;
  port: number;
  token: string;
  settings: RememberedSettings;
}

export interface DiscoveredCandidate {
  alias: string;
  host: string;
  port: number;
  txt: Record<string, string>;
}

/** Settings bundle saved under a profile name. */
export interface ProfileSettings {
  stream?: StreamStartRequest;
  camera?: CameraSettingsRequest;
}

export interface Profile {
  name: string;
  settings: ProfileSettings;
}

export type CommandTargets = string | string[];

/** One operation, independent of which devices it goes to. */
export type CommandAction =
  | { op: 'start-stream'; payload: StreamStartRequest }
  | { op: 'stop-stream' }
  | { op: 'update-camera-settings'; payload: CameraSettingsRequest }
  | { op: 'update-video-settings'; payload: VideoSettingsUpdateRequest }
  | { op: 'force-keyframe' }
  | { op: 'apply-profile'; payload: ProfileSettings };

export type Command = CommandAction & { targets: CommandTargets };

export type CommandOp = CommandAction['op'];

export type DebouncedAction = Extract<CommandAction, { op: 'update-camera-settings' | 'update-video-settings' }>;
