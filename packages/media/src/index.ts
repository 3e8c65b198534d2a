/**
 * @reelport/media
 *
 * Media probing layer.
 *
 * Responsibilities:
 * - Probe container duration for segmentation and derived assets
 * - Probe video resolution for video uploads
 */

export { FFProbe, type VideoResolution } from './probes/ffprobe.js';
