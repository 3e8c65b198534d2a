/**
 * Status reporter that edits one Telegram message
 */

import { GrammyError, type Api } from 'grammy';
import type { StatusReporter } from '@reelport/core';
import { statusKeyboard } from './lib/keyboards.js';

const TERMINAL_PREFIXES = ['[OK]', '[ERR]', '[X]'];

/** Final texts drop the Progress/Cancel buttons */
export function isFinalStatus(text: string): boolean {
  return TERMINAL_PREFIXES.some(prefix => text.startsWith(prefix));
}

export class MessageStatusReporter implements StatusReporter {
  private api: Api;
  private chatId: number;
  private messageId: number;

  constructor(api: Api, chatId: number, messageId: number) {
    this.api = api;
    this.chatId = chatId;
    this.messageId = messageId;
  }

  async update(text: string): Promise<void> {
    try {
      await this.api.editMessageText(
        this.chatId,
        this.messageId,
        text,
        isFinalStatus(text) ? undefined : { reply_markup: statusKeyboard() }
      );
    } catch (error) {
      // Same text twice is not a failure
      if (error instanceof GrammyError && error.description.includes('message is not modified')) {
        return;
      }
      throw error;
    }
  }
}
