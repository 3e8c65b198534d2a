/**
 * URL detection and short ids for callback data
 */

import { randomBytes } from 'node:crypto';

export const URL_PATTERN =
  /^https?:\/\/(?:www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b(?:[-a-zA-Z0-9()@:%_+.~#?&/=]*)$/;

/** Seconds a URL stays resolvable behind its format keyboard */
export const URL_TTL_SECONDS = 3600;

export function isSupportedUrl(text: string): boolean {
  return URL_PATTERN.test(text.trim());
}

export function urlKey(urlId: string): string {
  return `url:${urlId}`;
}

export function newUrlId(): string {
  return randomBytes(4).toString('hex');
}

export function parseUserId(text: string | undefined): string | null {
  const value = text?.trim() ?? '';
  return /^\d+$/.test(value) ? value : null;
}
