import { describe, expect, it } from 'vitest';
import type { InlineKeyboardButton } from 'grammy/types';
import { defaultPreferences } from '@reelport/core';
import {
  downloadData,
  formatKeyboard,
  parseDownloadData,
  settingsKeyboard,
  statusKeyboard,
} from './keyboards.js';

function labels(rows: InlineKeyboardButton[][]): string[][] {
  return rows.map(row => row.map(button => button.text));
}

function data(rows: InlineKeyboardButton[][]): string[] {
  return rows.flat().map(button => ('callback_data' in button ? button.callback_data : ''));
}

describe('download callback data', () => {
  it('round-trips the url id and format id', () => {
    expect(downloadData('a1b2c3d4', '137')).toBe('dl:a1b2c3d4:137');
    expect(parseDownloadData('dl:a1b2c3d4:137')).toEqual({ urlId: 'a1b2c3d4', formatId: '137' });
  });

  it('keeps colons inside the format id', () => {
    expect(parseDownloadData('dl:ff00:hls-720:a')).toEqual({ urlId: 'ff00', formatId: 'hls-720:a' });
  });

  it('rejects other data', () => {
    expect(parseDownloadData('progress')).toBeNull();
    expect(parseDownloadData('dl::137')).toBeNull();
  });
});

describe('formatKeyboard', () => {
  const options = [
    { id: '137', label: '1080p Full HD', ext: 'mp4', sizeBytes: 0 },
    { id: '136', label: '720p HD', ext: 'mp4', sizeBytes: 0 },
    { id: '135', label: '480p SD', ext: 'webm', sizeBytes: 0 },
    { id: 'best', label: 'Best Quality', ext: '', sizeBytes: 0 },
  ];

  it('puts two encodings per row and best quality last', () => {
    const keyboard = formatKeyboard('abcd1234', options);

    expect(labels(keyboard.inline_keyboard)).toEqual([
      ['1080p Full HD (mp4)', '720p HD (mp4)'],
      ['480p SD (webm)'],
      ['Best Quality'],
    ]);
    expect(data(keyboard.inline_keyboard)).toEqual([
      'dl:abcd1234:137',
      'dl:abcd1234:136',
      'dl:abcd1234:135',
      'dl:abcd1234:best',
    ]);
  });

  it('leaves out encodings whose callback data would exceed 64 bytes', () => {
    const keyboard = formatKeyboard('abcd1234', [
      { id: 'x'.repeat(60), label: 'Long', ext: 'mp4', sizeBytes: 0 },
      { id: 'best', label: 'Best Quality', ext: '', sizeBytes: 0 },
    ]);

    expect(labels(keyboard.inline_keyboard)).toEqual([['Best Quality']]);
  });
});

describe('settingsKeyboard', () => {
  it('shows the current value of every toggle', () => {
    const prefs = { ...defaultPreferences(), uploadAsVideo: false, generateSample: true };

    expect(labels(settingsKeyboard(prefs).inline_keyboard)).toEqual([
      ['Upload Mode: File'],
      ['Split Files: Enabled'],
      ['Screenshots: Disabled'],
      ['Sample Video: Enabled'],
      ['Set Caption', 'Delete Caption'],
    ]);
  });
});

describe('statusKeyboard', () => {
  it('offers progress and cancel', () => {
    expect(data(statusKeyboard().inline_keyboard)).toEqual(['progress', 'cancel']);
  });
});
