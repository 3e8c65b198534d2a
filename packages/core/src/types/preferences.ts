/**
 * Per-requester preferences
 */

export interface UserPreferences {
  uploadAsVideo: boolean;
  splitLargeFiles: boolean;
  generateScreenshots: boolean;
  generateSample: boolean;
  caption: string | null;
  /** Persisted custom thumbnail; never removed by job cleanup */
  thumbnailPath: string | null;
  banned: boolean;
}

export const DEFAULT_PREFERENCES: Readonly<UserPreferences> = {
  uploadAsVideo: true,
  splitLargeFiles: true,
  generateScreenshots: false,
  generateSample: false,
  caption: null,
  thumbnailPath: null,
  banned: false,
};

export function defaultPreferences(): UserPreferences {
  return { ...DEFAULT_PREFERENCES };
}
