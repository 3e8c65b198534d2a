/**
 * Custom thumbnail files
 */

import { join } from 'node:path';
import type { Api } from 'grammy';
import { safeWriteFile } from '@reelport/utils';

export function thumbnailFile(thumbnailDir: string, requester: string): string {
  return join(thumbnailDir, `${requester}.jpg`);
}

export function fileDownloadUrl(apiRoot: string, botToken: string, filePath: string): string {
  return `${apiRoot.replace(/\/+$/, '')}/file/bot${botToken}/${filePath}`;
}

/**
 * Download a Telegram file to dest
 */
export async function downloadTelegramFile(
  api: Api,
  fileId: string,
  dest: string,
  telegram: { apiRoot: string; botToken: string }
): Promise<void> {
  const file = await api.getFile(fileId);
  if (!file.file_path) {
    throw new Error('Telegram returned no file path');
  }

  const response = await fetch(fileDownloadUrl(telegram.apiRoot, telegram.botToken, file.file_path));
  if (!response.ok) {
    throw new Error(`File download failed with HTTP ${response.status}`);
  }
  await safeWriteFile(dest, new Uint8Array(await response.arrayBuffer()));
}
