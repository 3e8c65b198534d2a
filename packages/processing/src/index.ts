/**
 * @reelport/processing
 *
 * Media processing layer.
 *
 * RULES:
 * - Segments are stream-copied, never re-encoded
 * - Only the preview sample is re-encoded
 * - Log every FFmpeg command executed
 */

// FFmpeg wrapper
export { FFmpeg, formatSeconds, type FFmpegResult, type FrameSize } from './ffmpeg.js';

// Segmentation
export {
  MediaSplitter,
  planSegments,
  partPath,
  isVideoContainer,
  VIDEO_EXTENSIONS,
  type MediaSplitterOptions,
  type SegmentPlan,
  type SegmentRange,
  type SegmentStrategy,
} from './splitter.js';

// Derived assets
export {
  AssetGenerator,
  thumbnailPath,
  screenshotsDir,
  samplePath,
  THUMBNAIL_SIZE,
  SCREENSHOT_SIZE,
  DEFAULT_SAMPLE_SECONDS,
  type AssetGeneratorOptions,
  type AssetOutcome,
} from './assets.js';
