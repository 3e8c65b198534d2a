/**
 * @reelport/acquisition
 *
 * Remote media acquisition layer.
 *
 * Responsibilities:
 * - List the encodings a source offers (yt-dlp --dump-json)
 * - Fetch the chosen encoding into the job directory
 * - Turn the fetch tool's output lines into typed progress events
 */

// Progress parsing
export {
  parseProgressLine,
  unitMultiplier,
  UNIT_MULTIPLIERS,
  type FetchEvent,
  type DestinationEvent,
  type DestinationSource,
  type ProgressEvent,
} from './progressParser.js';

// Progress tracking
export { ProgressTracker, emptySnapshot, type ProgressSnapshot } from './progress.js';

// Encoding options
export {
  BEST_ENCODING,
  MAX_ENCODING_OPTIONS,
  parseCapabilityDocument,
  extractEncodingOptions,
  type CapabilityDocument,
  type EncodingOption,
  type RawFormat,
} from './formats.js';

// yt-dlp
export {
  YtDlpClient,
  type YtDlpConfig,
  type InfoResult,
  type FetchRequest,
  type FetchResult,
} from './clients/ytdlp.js';
