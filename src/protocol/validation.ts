import { ValidationError } from './errors';
import {
  AliasUpdateRequest,
  CameraPosition,
  CameraSettingsRequest,
  ExposureMode,
  FocusMode,
  LensType,
  ScreenBrightnessRequest,
  StreamStartRequest,
  TorchLevel,
  VideoCodec,
  VideoSettingsUpdateRequest,
  WebSocketCommand,
  WhiteBalanceMode
} from './types';

type JsonObject = Record<string, unknown>;

const AUTO_MANUAL = ['auto', 'manual'] as const;
const CODECS: readonly VideoCodec[] = ['h264', 'hevc'];
const LENSES: readonly LensType[] = ['ultra_wide', 'wide', 'telephoto'];
const POSITIONS: readonly CameraPosition[] = ['front', 'back'];
const RESOLUTION_PATTERN = /^\d{2,5}x\d{2,5}$/;
const MAX_ALIAS_LENGTH = 64;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A body that was never sent is MISSING_BODY; anything but an object is INVALID_REQUEST. */
export function requireObject(body: unknown): JsonObject {
  if (body === undefined || body === null) {
    throw ValidationError.missingBody();
  }
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

interface NumberRule {
  integer?: boolean;
  positive?: boolean;
}

function readNumber(body: JsonObject, field: string, rule: NumberRule): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Field '${field}' must be a number`);
  }
  if (rule.integer && !Number.isInteger(value)) {
    throw new ValidationError(`Field '${field}' must be an integer`);
  }
  if (rule.positive && value <= 0) {
    throw new ValidationError(`Field '${field}' must be positive`);
  }
  return value;
}

function requireNumber(body: JsonObject, field: string, rule: NumberRule): number {
  const value = readNumber(body, field, rule);
  if (value === undefined) {
    throw new ValidationError(`Missing required field '${field}'`);
  }
  return value;
}

function readString(body: JsonObject, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`Field '${field}' must be a string`);
  }
  return value;
}

function readEnum<T extends string>(body: JsonObject, field: string, allowed: readonly T[]): T | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new ValidationError(`Field '${field}' must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

function readResolution(body: JsonObject, field: string): string | undefined {
  const value = readString(body, field);
  if (value !== undefined && !RESOLUTION_PATTERN.test(value)) {
    throw new ValidationError(`Field '${field}' must look like 1920x1080`);
  }
  return value;
}

export function parseStreamStart(body: unknown): StreamStartRequest {
  const json = requireObject(body);
  const resolution = readResolution(json, 'resolution');
  const codec = readEnum(json, 'codec', CODECS);
  if (resolution === undefined) throw new ValidationError("Missing required field 'resolution'");
  const framerate = requireNumber(json, 'framerate', { integer: true, positive: true });
  const bitrate = requireNumber(json, 'bitrate', { integer: true, positive: true });
  if (codec === undefined) throw new ValidationError("Missing required field 'codec'");
  return { resolution, framerate, bitrate, codec };
}

export function parseCameraSettings(body: unknown): CameraSettingsRequest {
  const json = requireObject(body);
  const wbMode: WhiteBalanceMode | undefined = readEnum(json, 'wb_mode', AUTO_MANUAL);
  const isoMode: ExposureMode | undefined = readEnum(json, 'iso_mode', AUTO_MANUAL);
  const shutterMode: ExposureMode | undefined = readEnum(json, 'shutter_mode', AUTO_MANUAL);
  const focusMode: FocusMode | undefined = readEnum(json, 'focus_mode', AUTO_MANUAL);

  return {
    wb_mode: wbMode,
    wb_kelvin: readNumber(json, 'wb_kelvin', { integer: true, positive: true }),
    wb_tint: readNumber(json, 'wb_tint', {}),
    iso_mode: isoMode,
    iso: readNumber(json, 'iso', { integer: true, positive: true }),
    shutter_mode: shutterMode,
    shutter_s: readNumber(json, 'shutter_s', { positive: true }),
    focus_mode: focusMode,
    zoom_factor: readNumber(json, 'zoom_factor', { positive: true }),
    lens: readEnum(json, 'lens', LENSES),
    camera_position: readEnum(json, 'camera_position', POSITIONS),
    orientation_lock: readString(json, 'orientation_lock')
  };
}

export function parseVideoSettingsUpdate(body: unknown): VideoSettingsUpdateRequest {
  const json = requireObject(body);
  return {
    selected_preset_id: readString(json, 'selected_preset_id'),
    custom_resolution: readResolution(json, 'custom_resolution'),
    custom_fps: readNumber(json, 'custom_fps', { integer: true, positive: true }),
    custom_codec: readEnum(json, 'custom_codec', CODECS),
    custom_bitrate: readNumber(json, 'custom_bitrate', { integer: true, positive: true })
  };
}

export function parseScreenBrightness(body: unknown): ScreenBrightnessRequest {
  const json = requireObject(body);
  if (typeof json.dimmed !== 'boolean') {
    throw new ValidationError("Missing required boolean field 'dimmed'");
  }
  return { dimmed: json.dimmed };
}

export function parseAliasUpdate(body: unknown): AliasUpdateRequest {
  const json = requireObject(body);
  const alias = readString(json, 'alias');
  if (alias === undefined) throw new ValidationError("Missing required field 'alias'");

  const trimmed = alias.trim();
  if (trimmed === '' || trimmed.length > MAX_ALIAS_LENGTH) {
    throw new ValidationError(`Alias must be 1-${MAX_ALIAS_LENGTH} characters`);
  }
  return { alias: trimmed };
}

export function parseTorchLevel(body: unknown): TorchLevel {
  const json = requireObject(body);
  const level = requireNumber(json, 'level', {});
  if (level < 0 || level > 1) {
    throw new ValidationError("Field 'level' must be between 0 and 1");
  }
  return { level };
}

/** Decodes a WebSocket text frame into a command envelope. */
export function parseWebSocketCommand(text: string): WebSocketCommand {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new ValidationError('WebSocket message is not valid JSON');
  }
  const json = requireObject(decoded);
  const op = readString(json, 'op');
  if (op === undefined) {
    throw new ValidationError("Missing required field 'op'");
  }
  return json.camera === undefined ? { op } : { op, camera: parseCameraSettings(json.camera) };
}
