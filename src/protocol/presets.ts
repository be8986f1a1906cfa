import { StreamStartRequest, VideoPreset, VideoSettingsUpdateRequest } from './types';

export const VIDEO_PRESETS: readonly VideoPreset[] = [
  { id: 'low_power_1080p', name: 'Low Power 1080p', resolution: '1920x1080', fps: 30, codec: 'h264', bitrate: 5_000_000 },
  { id: 'smooth_1080p60', name: 'Smooth 1080p60', resolution: '1920x1080', fps: 60, codec: 'h264', bitrate: 10_000_000 },
  { id: 'high_quality_1080p', name: 'High Quality 1080p', resolution: '1920x1080', fps: 30, codec: 'hevc', bitrate: 3_500_000 },
  { id: '2k_cinematic', name: '2K Cinematic', resolution: '2560x1440', fps: 30, codec: 'hevc', bitrate: 7_000_000 },
  { id: '2k_performance', name: '2K Performance', resolution: '2560x1440', fps: 60, codec: 'hevc', bitrate: 12_000_000 },
  { id: '4k_standard', name: '4K Standard', resolution: '3840x2160', fps: 30, codec: 'h264', bitrate: 26_000_000 },
  { id: '4k_efficient', name: '4K Efficient', resolution: '3840x2160', fps: 30, codec: 'hevc', bitrate: 16_000_000 },
  { id: '4k_high_fps', name: '4K High FPS', resolution: '3840x2160', fps: 60, codec: 'hevc', bitrate: 30_000_000 }
];

export const DEFAULT_PRESET_ID = 'smooth_1080p60';

export const DEFAULT_STREAM_SETTINGS: StreamStartRequest = {
  resolution: '1920x1080',
  framerate: 30,
  bitrate: 10_000_000,
  codec: 'h264'
};

export function findPreset(id: string | undefined): VideoPreset | undefined {
  return id === undefined ? undefined : VIDEO_PRESETS.find(preset => preset.id === id);
}

/**
 * Full custom settings win; otherwise the selected preset; otherwise the
 * default preset.
 */
export function effectiveStreamSettings(settings: VideoSettingsUpdateRequest): StreamStartRequest {
  const { custom_resolution, custom_fps, custom_codec, custom_bitrate } = settings;
  if (custom_resolution !== undefined && custom_fps !== undefined && custom_codec !== undefined && custom_bitrate !== undefined) {
    return { resolution: custom_resolution, framerate: custom_fps, codec: custom_codec, bitrate: custom_bitrate };
  }

  const preset = findPreset(settings.selected_preset_id) ?? findPreset(DEFAULT_PRESET_ID) ?? VIDEO_PRESETS[0];
  return { resolution: preset.resolution, framerate: preset.fps, codec: preset.codec, bitrate: preset.bitrate };
}

/** Expresses stream settings as a custom video settings update. */
export function toVideoSettingsUpdate(stream: StreamStartRequest): VideoSettingsUpdateRequest {
  return {
    custom_resolution: stream.resolution,
    custom_fps: stream.framerate,
    custom_codec: stream.codec,
    custom_bitrate: stream.bitrate
  };
}
