/**
 * /settings and caption input
 */

import type { Bot } from 'grammy';
import type { UserPreferences } from '@reelport/core';
import { requesterOf, type BotContext, type BotDeps } from '../context.js';
import { CALLBACK, settingsKeyboard } from '../lib/keyboards.js';
import { CAPTION_PROMPT, settingsText } from '../lib/messages.js';

type Toggle = keyof Pick<
  UserPreferences,
  'uploadAsVideo' | 'splitLargeFiles' | 'generateScreenshots' | 'generateSample'
>;

const TOGGLES: ReadonlyArray<{ data: string; field: Toggle; notice: (value: boolean) => string }> = [
  {
    data: CALLBACK.toggleUploadMode,
    field: 'uploadAsVideo',
    notice: value => `Upload mode changed to ${value ? 'Video' : 'File'}`,
  },
  {
    data: CALLBACK.toggleSplit,
    field: 'splitLargeFiles',
    notice: value => `Split large files: ${value ? 'Enabled' : 'Disabled'}`,
  },
  {
    data: CALLBACK.toggleScreenshots,
    field: 'generateScreenshots',
    notice: value => `Screenshots: ${value ? 'Enabled' : 'Disabled'}`,
  },
  {
    data: CALLBACK.toggleSample,
    field: 'generateSample',
    notice: value => `Sample video: ${value ? 'Enabled' : 'Disabled'}`,
  },
];

export function registerSettingsCommands(bot: Bot<BotContext>, deps: BotDeps): void {
  const { preferences } = deps;

  bot.command('settings', async (ctx) => {
    const requester = requesterOf(ctx);
    if (!requester) return;
    const prefs = await preferences.get(requester);
    await ctx.reply(settingsText(prefs), { reply_markup: settingsKeyboard(prefs) });
  });

  for (const toggle of TOGGLES) {
    bot.callbackQuery(toggle.data, async (ctx) => {
      const requester = requesterOf(ctx);
      if (!requester) return;
      const current = await preferences.get(requester);
      const changes: Partial<UserPreferences> = {};
      changes[toggle.field] = !current[toggle.field];
      const prefs = await preferences.update(requester, changes);
      await ctx.answerCallbackQuery({ text: toggle.notice(prefs[toggle.field]) });
      await ctx.editMessageText(settingsText(prefs), { reply_markup: settingsKeyboard(prefs) });
    });
  }

  bot.callbackQuery(CALLBACK.setCaption, async (ctx) => {
    ctx.session.awaitingInput = 'caption';
    await ctx.answerCallbackQuery();
    await ctx.reply(CAPTION_PROMPT);
  });

  bot.callbackQuery(CALLBACK.deleteCaption, async (ctx) => {
    const requester = requesterOf(ctx);
    if (!requester) return;
    const prefs = await preferences.update(requester, { caption: null });
    await ctx.answerCallbackQuery({ text: 'Caption deleted' });
    await ctx.editMessageText(settingsText(prefs), { reply_markup: settingsKeyboard(prefs) });
  });

  bot.command('cancel', async (ctx) => {
    if (ctx.session.awaitingInput !== 'caption') {
      await ctx.reply('Nothing to cancel.');
      return;
    }
    ctx.session.awaitingInput = undefined;
    await ctx.reply('Caption setting cancelled.');
  });

  // Caption text arrives as the next plain message
  bot.on('message:text', async (ctx, next) => {
    if (ctx.session.awaitingInput !== 'caption' || ctx.message.text.startsWith('/')) {
      await next();
      return;
    }
    const requester = requesterOf(ctx);
    if (!requester) return;
    ctx.session.awaitingInput = undefined;
    await preferences.update(requester, { caption: ctx.message.text });
    await ctx.reply('Caption set successfully!');
  });
}
