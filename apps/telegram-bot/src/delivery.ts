/**
 * Telegram delivery channel
 *
 * Uploads artifacts through the Bot API. Files are streamed from disk so
 * upload progress can be reported as bytes leave the process.
 */

import { createReadStream } from 'node:fs';
import { basename } from 'node:path';
import { GrammyError, InputFile, type Api } from 'grammy';
import {
  DeliveryRateLimitedError,
  type DeliveryChannel,
  type DeliveryItem,
} from '@reelport/core';
import { createLogger, getFileSizeBytes, type Logger } from '@reelport/utils';

/** Bot API caption limit, in characters */
export const CAPTION_LIMIT = 1024;
const DEFAULT_RETRY_AFTER_SECONDS = 5;

/**
 * Read a file as chunks, reporting the running byte count after each one
 */
export async function* countingStream(
  filePath: string,
  totalBytes: number,
  onProgress?: (transferredBytes: number, totalBytes: number) => void
): AsyncGenerator<Uint8Array> {
  let transferred = 0;
  for await (const chunk of createReadStream(filePath)) {
    if (!(chunk instanceof Uint8Array)) continue;
    transferred += chunk.length;
    onProgress?.(transferred, totalBytes);
    yield chunk;
  }
}

/**
 * Map a Bot API failure onto the delivery error taxonomy.
 * Anything but a 429 is passed through unchanged.
 */
export function toDeliveryError(error: unknown): unknown {
  if (error instanceof GrammyError && error.error_code === 429) {
    return new DeliveryRateLimitedError(
      error.parameters.retry_after ?? DEFAULT_RETRY_AFTER_SECONDS
    );
  }
  return error;
}

function truncateCaption(caption: string | null): string | undefined {
  if (!caption) return undefined;
  return caption.length > CAPTION_LIMIT ? caption.slice(0, CAPTION_LIMIT) : caption;
}

export class TelegramDelivery implements DeliveryChannel {
  private api: Api;
  private log: Logger;

  constructor(api: Api, log?: Logger) {
    this.api = api;
    this.log = log ?? createLogger('delivery');
  }

  async send(item: DeliveryItem, signal?: AbortSignal): Promise<void> {
    const totalBytes = await getFileSizeBytes(item.path);
    const file = new InputFile(
      countingStream(item.path, totalBytes, item.onProgress),
      basename(item.path)
    );
    const caption = truncateCaption(item.caption);
    const thumbnail = item.thumbnail ? new InputFile(item.thumbnail) : undefined;

    this.log.debug({ path: item.path, kind: item.kind, totalBytes }, 'Uploading');

    try {
      switch (item.kind) {
        case 'video':
          await this.api.sendVideo(
            item.requester,
            file,
            {
              caption,
              thumbnail,
              duration: item.duration,
              width: item.width,
              height: item.height,
              supports_streaming: true,
            },
            signal
          );
          break;
        case 'photo':
          await this.api.sendPhoto(item.requester, file, { caption }, signal);
          break;
        case 'document':
          await this.api.sendDocument(item.requester, file, { caption, thumbnail }, signal);
          break;
      }
    } catch (error) {
      throw toDeliveryError(error);
    }
  }
}
