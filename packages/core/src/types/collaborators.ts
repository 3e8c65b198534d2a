/**
 * Collaborator Interfaces
 *
 * Everything the job runner talks to. The concrete tools
 * (YtDlpClient, MediaSplitter, AssetGenerator, FFProbe) satisfy these
 * structurally; the chat front-end supplies delivery, status and stores.
 */

import type { FetchRequest, FetchResult, InfoResult } from '@reelport/acquisition';
import type { VideoResolution } from '@reelport/media';
import type { AssetOutcome } from '@reelport/processing';
import type { UserPreferences } from './preferences.js';

export interface FetchTool {
  getInfo(url: string, signal?: AbortSignal): Promise<InfoResult>;
  fetch(request: FetchRequest): Promise<FetchResult>;
}

export interface Segmenter {
  split(filePath: string, ceilingBytes: number, signal?: AbortSignal): Promise<string[]>;
}

export interface AssetProducer {
  thumbnail(videoPath: string, signal?: AbortSignal): Promise<AssetOutcome<string>>;
  screenshots(videoPath: string, count: number, signal?: AbortSignal): Promise<AssetOutcome<string[]>>;
  sample(videoPath: string, seconds?: number, signal?: AbortSignal): Promise<AssetOutcome<string>>;
}

export interface MediaProbe {
  getDuration(filePath: string): Promise<number | null>;
  getResolution(filePath: string): Promise<VideoResolution>;
}

export type DeliveryKind = 'document' | 'video' | 'photo';

export interface DeliveryItem {
  requester: string;
  path: string;
  kind: DeliveryKind;
  caption: string | null;
  thumbnail: string | null;
  /** Video only */
  duration?: number;
  width?: number;
  height?: number;
  onProgress?: (transferredBytes: number, totalBytes: number) => void;
}

/**
 * Hands artifacts to the requester. A rate limit must surface as
 * DeliveryRateLimitedError.
 */
export interface DeliveryChannel {
  send(item: DeliveryItem, signal?: AbortSignal): Promise<void>;
}

/**
 * Edits the job's status message
 */
export interface StatusReporter {
  update(text: string): Promise<void>;
}

export interface PreferenceStore {
  get(requester: string): Promise<UserPreferences>;
  update(requester: string, changes: Partial<UserPreferences>): Promise<UserPreferences>;
  setBanned(requester: string, banned: boolean): Promise<void>;
}

/**
 * Short-lived key/value storage, e.g. URLs behind callback buttons
 */
export interface EphemeralStore {
  put(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
}
