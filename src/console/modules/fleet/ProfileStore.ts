import path from 'path';
import { Profile, ProfileSettings } from './types';
import { CommandOrchestrator } from './CommandOrchestrator';
import { NotFoundError, ValidationError, errorMessage } from '../../../protocol/errors';
import { GroupOperationResult } from '../../../protocol/types';
import { isRecord, parseCameraSettings, parseStreamStart } from '../../../protocol/validation';
import { JsonFileStore } from '../../../utils/files';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('profiles');

interface ProfilesFile {
  profiles: Profile[];
}

const MAX_NAME_LENGTH = 64;

/** Validates a `{stream?, camera?}` bundle; at least one half must be present. */
export function parseProfileSettings(raw: unknown): ProfileSettings {
  if (!isRecord(raw)) {
    throw new ValidationError('Profile settings must be a JSON object');
  }

  const settings: ProfileSettings = {};
  if (raw.stream !== undefined && raw.stream !== null) settings.stream = parseStreamStart(raw.stream);
  if (raw.camera !== undefined && raw.camera !== null) settings.camera = parseCameraSettings(raw.camera);

  if (!settings.stream && !settings.camera) {
    throw new ValidationError('Profile must carry stream or camera settings');
  }
  return settings;
}

function decodeProfiles(raw: unknown): ProfilesFile {
  const profiles: Profile[] = [];
  if (!isRecord(raw) || !Array.isArray(raw.profiles)) return { profiles };

  for (const entry of raw.profiles) {
    if (!isRecord(entry) || typeof entry.name !== 'string') continue;
    try {
      profiles.push({ name: entry.name, settings: parseProfileSettings(entry.settings) });
    } catch (error) {
      logger.warn(`Skipping unreadable profile ${entry.name}: ${errorMessage(error)}`);
    }
  }
  return { profiles };
}

/** Named settings bundles, kept in profiles.json and applied through the orchestrator. */
export class ProfileStore {
  private profiles: Map<string, Profile> = new Map();
  private readonly file?: JsonFileStore<ProfilesFile>;

  constructor(
    private readonly orchestrator: CommandOrchestrator,
    dataDir?: string
  ) {
    if (dataDir !== undefined) {
      this.file = new JsonFileStore(path.join(dataDir, 'profiles.json'), decodeProfiles, () => ({ profiles: [] }));
    }
  }

  async load(): Promise<void> {
    if (!this.file) return;
    const { profiles } = await this.file.load();
    this.profiles = new Map(profiles.map(profile => [profile.name, profile]));
    logger.info(`Loaded ${this.profiles.size} profile(s)`);
  }

  list(): Profile[] {
    return Array.from(this.profiles.values(), copyProfile);
  }

  get(name: string): Profile | undefined {
    const profile = this.profiles.get(name);
    return profile ? copyProfile(profile) : undefined;
  }

  /** Creates or replaces the profile called `name`. */
  async save(name: string, settings: ProfileSettings): Promise<Profile> {
    const trimmed = name.trim();
    if (trimmed === '' || trimmed.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`Profile name must be 1-${MAX_NAME_LENGTH} characters`);
    }
    if (!settings.stream && !settings.camera) {
      throw new ValidationError('Profile must carry stream or camera settings');
    }

    const existed = this.profiles.has(trimmed);
    const profile: Profile = { name: trimmed, settings: copySettings(settings) };
    this.profiles.set(trimmed, profile);
    logger.info(`${existed ? 'Updated' : 'Created'} profile: ${trimmed}`);

    await this.persist();
    return copyProfile(profile);
  }

  /** Removing a name that does not exist is a no-op. */
  async delete(name: string): Promise<void> {
    if (!this.profiles.delete(name)) return;
    logger.info(`Deleted profile: ${name}`);
    await this.persist();
  }

  async apply(name: string, deviceIds: string[]): Promise<GroupOperationResult[]> {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new NotFoundError(`profile ${name}`);
    }

    logger.info(`Applying profile ${name} to ${deviceIds.length} device(s)`);
    return this.orchestrator.execute({
      op: 'apply-profile',
      targets: deviceIds,
      payload: copySettings(profile.settings)
    });
  }

  private async persist(): Promise<void> {
    if (!this.file) return;
    await this.file.save({ profiles: this.list() });
  }
}

function copySettings(settings: ProfileSettings): ProfileSettings {
  const copy: ProfileSettings = {};
  if (settings.stream) copy.stream = { ...settings.stream };
  if (settings.camera) copy.camera = { ...settings.camera };
  return copy;
}

function copyProfile(profile: Profile): Profile {
  return { name: profile.name, settings: copySettings(profile.settings) };
}
