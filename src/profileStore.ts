import { carProfileSchema, defaultCarProfile } from './schemas/carProfile.js';
import type { CarProfile, ProfileUpdates } from './types.js';
import type { RedisKeyValueClient } from './redisClient.js';

export interface ProfileStore {
  /** Stored profile, created with defaults when the user has none. */
  getProfile(userId: string): Promise<CarProfile>;
  updateProfile(userId: string, updates: ProfileUpdates): Promise<CarProfile>;
}

const key = (userId: string) => `profile:${userId}`;

function normalize(userId: string, data: string): CarProfile {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (err) {
    console.warn(`[ProfileStore] Corrupt JSON for ${key(userId)}, resetting.`, err);
    return defaultCarProfile();
  }
  const parsed = carProfileSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[ProfileStore] Invalid profile for ${key(userId)}, resetting.`);
    return defaultCarProfile();
  }
  return parsed.data;
}

export function applyProfileUpdates(profile: CarProfile, updates: ProfileUpdates): CarProfile {
  const next: CarProfile = { ...profile };
  if (updates.make != null) next.make = String(updates.make);
  if (updates.model != null) next.model = String(updates.model);
  if (updates.year != null && Number.isFinite(updates.year)) next.year = Math.trunc(updates.year);
  if (updates.resale_pref != null) next.resale_pref = String(updates.resale_pref);
  return next;
}

export function createProfileStore(opts: { redis: RedisKeyValueClient | null }): ProfileStore {
  const mem = new Map<string, CarProfile>();

  async function save(userId: string, profile: CarProfile): Promise<void> {
    if (!opts.redis) { mem.set(userId, profile); return; }
    await opts.redis.set(key(userId), JSON.stringify(profile));
  }

  const store: ProfileStore = {
    async getProfile(userId) {
      if (!opts.redis) {
        const p = mem.get(userId) ?? defaultCarProfile();
        mem.set(userId, p);
        return structuredClone(p);
      }
      const data = await opts.redis.get(key(userId));
      if (!data) {
        const fresh = defaultCarProfile();
        await save(userId, fresh);
        console.log(`[ProfileStore] NEW profile ${userId}`);
        return fresh;
      }
      const profile = normalize(userId, data);
      await save(userId, profile);
      return profile;
    },

    async updateProfile(userId, updates) {
      const current = await store.getProfile(userId);
      const next = applyProfileUpdates(current, updates);
      await save(userId, next);
      console.log(`[ProfileStore] SAVE ${userId}: ${[next.year, next.make, next.model].filter(Boolean).join(' ')}`);
      return structuredClone(next);
    },
  };
  return store;
}
