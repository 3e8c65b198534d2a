import { describe, expect, it } from 'vitest';
import { defaultPreferences } from '@reelport/core';
import { parseStoredPreferences } from './redis.js';

describe('parseStoredPreferences', () => {
  it('returns defaults when nothing is stored', () => {
    expect(parseStoredPreferences(null)).toEqual(defaultPreferences());
  });

  it('merges stored fields over the defaults', () => {
    const stored = JSON.stringify({ uploadAsVideo: false, caption: 'Hello', banned: true });

    expect(parseStoredPreferences(stored)).toEqual({
      ...defaultPreferences(),
      uploadAsVideo: false,
      caption: 'Hello',
      banned: true,
    });
  });

  it('falls back to defaults for unreadable documents', () => {
    expect(parseStoredPreferences('{not json')).toEqual(defaultPreferences());
    expect(parseStoredPreferences(JSON.stringify({ uploadAsVideo: 'yes' }))).toEqual(defaultPreferences());
  });
});
