/**
 * Redis-backed stores
 *
 * Preferences are kept as one JSON document per requester. Ephemeral
 * values (URLs behind format keyboards) expire through Redis TTLs.
 */

import type { Redis } from 'ioredis';
import { z } from 'zod';
import {
  defaultPreferences,
  type EphemeralStore,
  type PreferenceStore,
  type UserPreferences,
} from '@reelport/core';
import { createLogger, type Logger } from '@reelport/utils';

const storedPreferencesSchema = z
  .object({
    uploadAsVideo: z.boolean(),
    splitLargeFiles: z.boolean(),
    generateScreenshots: z.boolean(),
    generateSample: z.boolean(),
    caption: z.string().nullable(),
    thumbnailPath: z.string().nullable(),
    banned: z.boolean(),
  })
  .partial();

/**
 * Merge a stored document over the defaults. Fields that are missing or
 * malformed fall back to their default.
 */
export function parseStoredPreferences(raw: string | null): UserPreferences {
  const prefs = defaultPreferences();
  if (!raw) return prefs;

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return prefs;
  }

  const result = storedPreferencesSchema.safeParse(data);
  if (!result.success) return prefs;

  const stored = result.data;
  return {
    uploadAsVideo: stored.uploadAsVideo ?? prefs.uploadAsVideo,
    splitLargeFiles: stored.splitLargeFiles ?? prefs.splitLargeFiles,
    generateScreenshots: stored.generateScreenshots ?? prefs.generateScreenshots,
    generateSample: stored.generateSample ?? prefs.generateSample,
    caption: stored.caption === undefined ? prefs.caption : stored.caption,
    thumbnailPath: stored.thumbnailPath === undefined ? prefs.thumbnailPath : stored.thumbnailPath,
    banned: stored.banned ?? prefs.banned,
  };
}

export class RedisPreferenceStore implements PreferenceStore {
  private redis: Redis;
  private keyPrefix = 'reelport:prefs:';
  private log: Logger;

  constructor(redis: Redis, log?: Logger) {
    this.redis = redis;
    this.log = log ?? createLogger('preferences');
  }

  async get(requester: string): Promise<UserPreferences> {
    const data = await this.redis.get(this.keyPrefix + requester);
    return parseStoredPreferences(data);
  }

  async update(requester: string, changes: Partial<UserPreferences>): Promise<UserPreferences> {
    const next = { ...(await this.get(requester)), ...changes };
    await this.redis.set(this.keyPrefix + requester, JSON.stringify(next));
    this.log.debug({ requester, changes: Object.keys(changes) }, 'Preferences updated');
    return next;
  }

  async setBanned(requester: string, banned: boolean): Promise<void> {
    await this.update(requester, { banned });
  }
}

export class RedisEphemeralStore implements EphemeralStore {
  private redis: Redis;
  private keyPrefix = 'reelport:ephemeral:';

  constructor(redis: Redis) {
    this.redis = redis;
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.keyPrefix + key, value, 'EX', ttlSeconds);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(this.keyPrefix + key);
  }
}
