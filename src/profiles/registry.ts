import type { SyncProfile } from '../engine/types';
import faunaProfile from './fauna';
import floraProfile from './flora';

/**
 * Register all sync profiles here.
 * To add one, create a profile under src/profiles/<name>/ and add it to this map.
 */
const profiles: Record<string, SyncProfile> = {
  fauna: faunaProfile,
  flora: floraProfile,
};

export const getProfile = (name: string): SyncProfile => {
  const profile = profiles[name];
  if (!profile) {
    const available = Object.keys(profiles).join(', ');
    throw new Error(`Unknown profile "${name}". Available profiles: ${available}`);
  }
  return profile;
};

export const listProfiles = (): string[] => Object.keys(profiles);
