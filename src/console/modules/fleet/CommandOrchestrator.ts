import { Command, CommandAction, CommandTargets, DebouncedAction, RememberedSettings } from './types';
import { DeviceApi } from './DeviceClient';
import { DeviceRegistry } from './DeviceRegistry';
import { SettingsDebouncer } from './SettingsDebouncer';
import { DeviceNotFoundError, errorMessage } from '../../../protocol/errors';
import { GroupOperationResult } from '../../../protocol/types';
import { DEFAULT_STREAM_SETTINGS, effectiveStreamSettings, toVideoSettingsUpdate } from '../../../protocol/presets';
import { withTimeout } from '../../../utils/timeout';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('orchestrator');

export interface CommandOrchestratorOptions {
  /** Deadline for each device call. */
  timeoutMs?: number;
  debounceMs?: number;
}

/** Request order, duplicates dropped. */
export function uniqueTargets(targets: CommandTargets): string[] {
  const ids = typeof targets === 'string' ? [targets] : targets;
  return Array.from(new Set(ids));
}

async function runAction(api: DeviceApi, action: CommandAction): Promise<void> {
  switch (action.op) {
    case 'start-stream':
      return api.startStream(action.payload);
    case 'stop-stream':
      return api.stopStream();
    case 'update-camera-settings':
      return api.updateCameraSettings(action.payload);
    case 'update-video-settings':
      return api.updateVideoSettings(action.payload);
    case 'force-keyframe':
      return api.forceKeyframe();
    case 'apply-profile': {
      const { camera, stream } = action.payload;
      if (camera) await api.updateCameraSettings(camera);
      if (stream) await api.updateVideoSettings(toVideoSettingsUpdate(stream));
      return;
    }
  }
}

function settingsToRemember(action: CommandAction): RememberedSettings | undefined {
  switch (action.op) {
    case 'start-stream':
      return { stream: action.payload };
    case 'update-camera-settings':
      return { camera: action.payload };
    case 'update-video-settings':
      return { stream: effectiveStreamSettings(action.payload) };
    case 'apply-profile':
      return { stream: action.payload.stream, camera: action.payload.camera };
    default:
      return undefined;
  }
}

/**
 * Fans commands out to claimed devices. Every device call runs
 * concurrently under its own deadline and yields one result entry, so a
 * slow or failing device never affects its siblings.
 */
export class CommandOrchestrator {
  private readonly timeoutMs: number;
  private readonly debouncer: SettingsDebouncer<GroupOperationResult>;

  constructor(
    private readonly registry: DeviceRegistry,
    options: CommandOrchestratorOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.debouncer = new SettingsDebouncer(options.debounceMs ?? 300);
  }

  /** One entry per unique target id, in request order. */
  async execute(command: Command): Promise<GroupOperationResult[]> {
    const ids = uniqueTargets(command.targets);
    logger.info(`▶️  ${command.op} on ${ids.length} device(s)`);

    const settled = await Promise.allSettled(ids.map(id => this.executeSingle(id, command)));

    return ids.map((id, index): GroupOperationResult => {
      const outcome = settled[index];
      if (outcome.status === 'fulfilled') {
        return { device_id: id, success: true };
      }
      logger.warn(`${command.op} failed on ${id}: ${errorMessage(outcome.reason)}`);
      return { device_id: id, success: false, error: errorMessage(outcome.reason) };
    });
  }

  /** Runs one action on one device; throws the typed failure. */
  async executeSingle(id: string, action: CommandAction): Promise<void> {
    const api = this.registry.resolve(id);
    if (!api) {
      throw new DeviceNotFoundError(id);
    }

    await withTimeout(runAction(api, action), this.timeoutMs, `${action.op} on ${id}`);

    const remembered = settingsToRemember(action);
    if (remembered) {
      await this.registry.rememberSettings(id, remembered);
    }
  }

  /**
   * Debounced settings edit: per (device, op) only the last payload inside
   * the window is sent. Resolves once that send finishes.
   */
  queueSettings(targets: CommandTargets, action: DebouncedAction): Promise<GroupOperationResult[]> {
    const ids = uniqueTargets(targets);
    return Promise.all(ids.map(id =>
      this.debouncer.schedule(`${id}|${action.op}`, () => this.resultFor(id, action))
    ));
  }

  private async resultFor(id: string, action: CommandAction): Promise<GroupOperationResult> {
    try {
      await this.executeSingle(id, action);
      return { device_id: id, success: true };
    } catch (error) {
      logger.warn(`${action.op} failed on ${id}: ${errorMessage(error)}`);
      return { device_id: id, success: false, error: errorMessage(error) };
    }
  }

  /** Sends pending debounced edits immediately. */
  flush(): Promise<void> {
    return this.debouncer.flush();
  }

  /** Starts every claimed device with its remembered stream settings, else the defaults. */
  async startAll(): Promise<GroupOperationResult[]> {
    const devices = this.registry.list();
    logger.info(`▶️  start-all on ${devices.length} device(s)`);

    return Promise.all(devices.map(device =>
      this.resultFor(device.id, {
        op: 'start-stream',
        payload: device.settings.stream ?? { ...DEFAULT_STREAM_SETTINGS }
      })
    ));
  }

  stopAll(): Promise<GroupOperationResult[]> {
    const ids = this.registry.list().map(device => device.id);
    return this.execute({ op: 'stop-stream', targets: ids });
  }
}
