/**
 * Inline keyboards and their callback data
 *
 * Telegram limits callback data to 64 bytes, so download buttons carry
 * a short id for the URL instead of the URL itself.
 */

import { InlineKeyboard } from 'grammy';
import { BEST_ENCODING, type EncodingOption } from '@reelport/acquisition';
import type { UserPreferences } from '@reelport/core';

export const CALLBACK_DATA_LIMIT = 64;

export const CALLBACK = {
  progress: 'progress',
  cancel: 'cancel',
  toggleUploadMode: 'set:upload_mode',
  toggleSplit: 'set:split',
  toggleScreenshots: 'set:screenshots',
  toggleSample: 'set:sample',
  setCaption: 'set:caption',
  deleteCaption: 'set:delcaption',
} as const;

export const DOWNLOAD_DATA_PATTERN = /^dl:([0-9a-f]+):(.+)$/;

export interface DownloadSelection {
  urlId: string;
  formatId: string;
}

export function downloadData(urlId: string, formatId: string): string {
  return `dl:${urlId}:${formatId}`;
}

export function parseDownloadData(data: string): DownloadSelection | null {
  const match = data.match(DOWNLOAD_DATA_PATTERN);
  if (!match?.[1] || !match[2]) return null;
  return { urlId: match[1], formatId: match[2] };
}

/**
 * Two encodings per row, then "Best Quality" on its own row.
 * Encodings whose id would overflow the callback data are left out.
 */
export function formatKeyboard(urlId: string, options: EncodingOption[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  const choices = options.filter(
    option =>
      option.id !== BEST_ENCODING &&
      Buffer.byteLength(downloadData(urlId, option.id)) <= CALLBACK_DATA_LIMIT
  );

  choices.forEach((option, index) => {
    keyboard.text(`${option.label} (${option.ext})`, downloadData(urlId, option.id));
    if (index % 2 === 1) keyboard.row();
  });
  if (choices.length % 2 === 1) keyboard.row();

  return keyboard.text('Best Quality', downloadData(urlId, BEST_ENCODING));
}

export function statusKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('Progress', CALLBACK.progress)
    .text('Cancel', CALLBACK.cancel);
}

function onOff(value: boolean): string {
  return value ? 'Enabled' : 'Disabled';
}

export function settingsKeyboard(prefs: UserPreferences): InlineKeyboard {
  return new InlineKeyboard()
    .text(`Upload Mode: ${prefs.uploadAsVideo ? 'Video' : 'File'}`, CALLBACK.toggleUploadMode).row()
    .text(`Split Files: ${onOff(prefs.splitLargeFiles)}`, CALLBACK.toggleSplit).row()
    .text(`Screenshots: ${onOff(prefs.generateScreenshots)}`, CALLBACK.toggleScreenshots).row()
    .text(`Sample Video: ${onOff(prefs.generateSample)}`, CALLBACK.toggleSample).row()
    .text('Set Caption', CALLBACK.setCaption)
    .text('Delete Caption', CALLBACK.deleteCaption);
}
