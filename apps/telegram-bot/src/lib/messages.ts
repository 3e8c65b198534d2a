/**
 * Reply texts
 */

import type { UserPreferences } from '@reelport/core';
import { formatClock } from '@reelport/utils';

const CAPTION_PREVIEW_LENGTH = 15;

export const START_TEXT =
  "Hello! I'm a URL Uploader Bot.\n\n" +
  'Send me any supported URL and I will download it and upload it here.\n\n' +
  'Use /settings to configure your preferences.\n' +
  'Use /help to see all commands.';

export const HELP_TEXT = [
  'Available commands:',
  '',
  '/start - Start the bot',
  '/help - Show this message',
  '/settings - Configure upload preferences',
  '/thumbnail - Reply to an image to set a custom thumbnail',
  '/delthumbnail - Delete your custom thumbnail',
  '/cancel - Cancel caption input',
  '',
  'Admin commands:',
  '/ban [user_id] - Ban a user',
  '/unban [user_id] - Unban a user',
  '',
  'Send any supported URL to start a download.',
].join('\n');

export const CAPTION_PROMPT =
  'Please send the caption text you want to use for your uploads.\n\n' +
  'Send /cancel to cancel this operation.';

export function captionPreview(caption: string | null): string {
  if (!caption) return 'None';
  return caption.length > CAPTION_PREVIEW_LENGTH
    ? `${caption.slice(0, CAPTION_PREVIEW_LENGTH)}...`
    : caption;
}

export function settingsText(prefs: UserPreferences): string {
  return [
    'Your settings:',
    '',
    `Custom Caption: ${captionPreview(prefs.caption)}`,
    `Custom Thumbnail: ${prefs.thumbnailPath ? 'Set' : 'None'}`,
  ].join('\n');
}

export function formatMenuText(title: string, durationSeconds: number | null): string {
  return `Select a format to download:\n\nTitle: ${title}\nDuration: ${formatClock(durationSeconds)}`;
}
