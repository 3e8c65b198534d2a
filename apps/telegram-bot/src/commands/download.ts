/**
 * URL handling, format selection and job controls
 */

import type { Bot } from 'grammy';
import { extractEncodingOptions } from '@reelport/acquisition';
import { formatProgressAlert } from '@reelport/core';
import { requesterOf, type BotContext, type BotDeps } from '../context.js';
import { MessageStatusReporter } from '../statusReporter.js';
import {
  CALLBACK,
  DOWNLOAD_DATA_PATTERN,
  formatKeyboard,
  parseDownloadData,
  statusKeyboard,
} from '../lib/keyboards.js';
import { formatMenuText } from '../lib/messages.js';
import { URL_TTL_SECONDS, isSupportedUrl, newUrlId, urlKey } from '../lib/urls.js';

const BANNED_TEXT = 'You are banned from using this bot.';
const QUEUED_TEXT = '[WAIT] Download queued...';

export function registerDownloadHandlers(bot: Bot<BotContext>, deps: BotDeps): void {
  const { scheduler, preferences, ephemeral, fetcher, logger } = deps;

  bot.on('message:text', async (ctx) => {
    const requester = requesterOf(ctx);
    if (!requester) return;

    const text = ctx.message.text.trim();
    if (text.startsWith('/')) return;

    const prefs = await preferences.get(requester);
    if (prefs.banned) {
      await ctx.reply(BANNED_TEXT);
      return;
    }

    if (!isSupportedUrl(text)) {
      await ctx.reply('Please send a valid URL.');
      return;
    }

    const status = await ctx.reply('[SCAN] Analyzing URL...');
    const result = await fetcher.getInfo(text);
    if (!result.success) {
      logger.warn({ requester, url: text, error: result.error }, 'Capability listing failed');
      await ctx.api.editMessageText(
        status.chat.id,
        status.message_id,
        '[ERR] Failed to fetch information for this URL.'
      );
      return;
    }

    const urlId = newUrlId();
    await ephemeral.put(urlKey(urlId), text, URL_TTL_SECONDS);

    const options = extractEncodingOptions(result.info);
    await ctx.api.editMessageText(
      status.chat.id,
      status.message_id,
      formatMenuText(result.info.title, result.info.durationSeconds),
      { reply_markup: formatKeyboard(urlId, options) }
    );
  });

  bot.callbackQuery(DOWNLOAD_DATA_PATTERN, async (ctx) => {
    const requester = requesterOf(ctx);
    const selection = parseDownloadData(ctx.callbackQuery.data);
    const message = ctx.callbackQuery.message;
    if (!requester || !selection || !message) {
      await ctx.answerCallbackQuery();
      return;
    }

    const prefs = await preferences.get(requester);
    if (prefs.banned) {
      await ctx.answerCallbackQuery({ text: BANNED_TEXT, show_alert: true });
      return;
    }

    const url = await ephemeral.get(urlKey(selection.urlId));
    if (!url) {
      await ctx.answerCallbackQuery({ text: 'This link has expired. Please send the URL again.', show_alert: true });
      return;
    }

    if (scheduler.get(requester)) {
      await ctx.answerCallbackQuery({ text: 'You already have an active download.', show_alert: true });
      return;
    }

    await ctx.answerCallbackQuery();
    await ctx.editMessageText(QUEUED_TEXT, { reply_markup: statusKeyboard() });

    const admission = scheduler.admit({
      requester,
      url,
      encoding: selection.formatId,
      reporter: new MessageStatusReporter(ctx.api, message.chat.id, message.message_id),
    });

    if (admission.status === 'rejected') {
      await ctx.editMessageText(`[ERR] ${admission.error.message}`);
      return;
    }
    logger.info(
      { requester, jobId: admission.job.id, format: selection.formatId, queued: scheduler.pending },
      'Download requested'
    );
  });

  bot.callbackQuery(CALLBACK.progress, async (ctx) => {
    const requester = requesterOf(ctx);
    const job = requester ? scheduler.get(requester) : undefined;
    if (!job) {
      await ctx.answerCallbackQuery({ text: 'No active download.', show_alert: true });
      return;
    }
    await ctx.answerCallbackQuery({
      text: formatProgressAlert(job.progress.snapshot()),
      show_alert: true,
    });
  });

  bot.callbackQuery(CALLBACK.cancel, async (ctx) => {
    const requester = requesterOf(ctx);
    if (!requester) return;

    const result = scheduler.cancel(requester);
    if (result.status === 'rejected') {
      await ctx.answerCallbackQuery({ text: 'No active download to cancel.', show_alert: true });
      return;
    }

    await ctx.answerCallbackQuery({ text: 'Download cancelled.' });
    // A running job reports its own cancellation once it has stopped
    if (!result.wasRunning) {
      await ctx.editMessageText('[X] Download cancelled.');
    }
  });
}
