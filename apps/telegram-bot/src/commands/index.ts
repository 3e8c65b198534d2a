/**
 * Telegram Bot Commands
 *
 * All command handlers for the bot. Order matters: commands and the
 * caption prompt are registered before the catch-all URL handler.
 */

import type { Bot } from 'grammy';
import { removePath } from '@reelport/utils';
import { requesterOf, type BotContext, type BotDeps } from '../context.js';
import { HELP_TEXT, START_TEXT } from '../lib/messages.js';
import { downloadTelegramFile, thumbnailFile } from '../lib/thumbnails.js';
import { parseUserId } from '../lib/urls.js';
import { registerDownloadHandlers } from './download.js';
import { registerSettingsCommands } from './settings.js';

export function isAdmin(adminIds: readonly string[], requester: string | null): boolean {
  return requester !== null && adminIds.includes(requester);
}

function registerGeneralCommands(bot: Bot<BotContext>): void {
  // /start - Welcome message
  bot.command('start', async (ctx) => {
    await ctx.reply(START_TEXT);
  });

  // /help - Command list
  bot.command('help', async (ctx) => {
    await ctx.reply(HELP_TEXT);
  });
}

function registerThumbnailCommands(bot: Bot<BotContext>, deps: BotDeps): void {
  const { preferences, logger } = deps;

  // /thumbnail - must be a reply to a photo
  bot.command('thumbnail', async (ctx) => {
    const requester = requesterOf(ctx);
    if (!requester) return;

    const photo = ctx.message?.reply_to_message?.photo?.at(-1);
    if (!photo) {
      await ctx.reply('Please reply to an image with /thumbnail to set it as your custom thumbnail.');
      return;
    }

    const dest = thumbnailFile(deps.thumbnailDir, requester);
    try {
      await downloadTelegramFile(ctx.api, photo.file_id, dest, deps.telegram);
    } catch (error) {
      logger.error({ err: error, requester }, 'Thumbnail download failed');
      await ctx.reply('[ERR] Failed to save the thumbnail. Please try again.');
      return;
    }

    await preferences.update(requester, { thumbnailPath: dest });
    await ctx.reply('Custom thumbnail set successfully!');
  });

  // /delthumbnail
  bot.command('delthumbnail', async (ctx) => {
    const requester = requesterOf(ctx);
    if (!requester) return;

    const prefs = await preferences.get(requester);
    if (!prefs.thumbnailPath) {
      await ctx.reply('You have no custom thumbnail set.');
      return;
    }

    await removePath(prefs.thumbnailPath);
    await preferences.update(requester, { thumbnailPath: null });
    await ctx.reply('Custom thumbnail deleted successfully!');
  });
}

function registerAdminCommands(bot: Bot<BotContext>, deps: BotDeps): void {
  const { preferences, logger, adminIds } = deps;

  const banCommand = (banned: boolean) => async (ctx: BotContext): Promise<void> => {
    const requester = requesterOf(ctx);
    if (!isAdmin(adminIds, requester)) {
      await ctx.reply('This command is only available to admins.');
      return;
    }

    const verb = banned ? 'ban' : 'unban';
    const argument = typeof ctx.match === 'string' ? ctx.match : '';
    if (!argument.trim()) {
      await ctx.reply(`Please provide a user ID to ${verb}. Usage: /${verb} [user_id]`);
      return;
    }

    const target = parseUserId(argument);
    if (!target) {
      await ctx.reply('Please provide a valid user ID.');
      return;
    }

    await preferences.setBanned(target, banned);
    logger.info({ admin: requester, target, banned }, 'Ban flag changed');
    await ctx.reply(`User ${target} has been ${verb}ned successfully.`);
  };

  bot.command('ban', banCommand(true));
  bot.command('unban', banCommand(false));
}

export function registerCommands(bot: Bot<BotContext>, deps: BotDeps): void {
  registerGeneralCommands(bot);
  registerSettingsCommands(bot, deps);
  registerThumbnailCommands(bot, deps);
  registerAdminCommands(bot, deps);
  registerDownloadHandlers(bot, deps);
}
