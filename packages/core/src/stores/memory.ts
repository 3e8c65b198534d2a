/**
 * In-memory stores
 *
 * Used when no Redis is configured, and by tests.
 */

import type { EphemeralStore, PreferenceStore } from '../types/collaborators.js';
import { defaultPreferences, type UserPreferences } from '../types/preferences.js';

export class MemoryPreferenceStore implements PreferenceStore {
  private readonly entries = new Map<string, UserPreferences>();

  async get(requester: string): Promise<UserPreferences> {
    return { ...(this.entries.get(requester) ?? defaultPreferences()) };
  }

  async update(requester: string, changes: Partial<UserPreferences>): Promise<UserPreferences> {
    const next = { ...(await this.get(requester)), ...changes };
    this.entries.set(requester, next);
    return { ...next };
  }

  async setBanned(requester: string, banned: boolean): Promise<void> {
    await this.update(requester, { banned });
  }
}

export class MemoryEphemeralStore implements EphemeralStore {
  private readonly entries = new Map<string, { value: string; expiresAt: number }>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }
}
