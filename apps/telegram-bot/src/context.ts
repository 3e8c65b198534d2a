/**
 * Bot context and handler dependencies
 */

import type { Context, SessionFlavor } from 'grammy';
import type { EphemeralStore, FetchTool, JobScheduler, PreferenceStore } from '@reelport/core';
import type { Logger } from '@reelport/utils';

// Session data type
export interface SessionData {
  awaitingInput?: 'caption';
}

// Custom context type
export type BotContext = Context & SessionFlavor<SessionData>;

export interface BotDeps {
  scheduler: JobScheduler;
  preferences: PreferenceStore;
  ephemeral: EphemeralStore;
  fetcher: FetchTool;
  logger: Logger;
  adminIds: readonly string[];
  telegram: {
    botToken: string;
    apiRoot: string;
  };
  thumbnailDir: string;
}

/**
 * Requester identity for an update: the sender's Telegram user id
 */
export function requesterOf(ctx: Context): string | null {
  return ctx.from ? String(ctx.from.id) : null;
}
