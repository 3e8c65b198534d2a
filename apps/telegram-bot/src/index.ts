/**
 * Telegram Bot Entry Point
 *
 * Accepts media URLs, lets the requester pick an encoding and uploads
 * the result back into the chat. One job runs at a time.
 */

import { config } from './config.js';
import { Bot, GrammyError, HttpError, session } from 'grammy';
import { Redis } from 'ioredis';
import { YtDlpClient } from '@reelport/acquisition';
import {
  JobRunner,
  JobScheduler,
  MemoryEphemeralStore,
  MemoryPreferenceStore,
  jobStatus,
  type EphemeralStore,
  type Job,
  type PreferenceStore,
} from '@reelport/core';
import { FFProbe } from '@reelport/media';
import { AssetGenerator, FFmpeg, MediaSplitter } from '@reelport/processing';
import { createLogger, ensureDir } from '@reelport/utils';
import { registerCommands } from './commands/index.js';
import type { BotContext, SessionData } from './context.js';
import { TelegramDelivery } from './delivery.js';
import { RedisEphemeralStore, RedisPreferenceStore } from './stores/redis.js';

const logger = createLogger('telegram-bot');

async function main(): Promise<void> {
  logger.info('Starting Telegram bot...');

  await ensureDir(config.storage.downloads);
  await ensureDir(config.storage.thumbnails);

  // Create bot instance
  const bot = new Bot<BotContext>(config.botToken, {
    client: { apiRoot: config.apiRoot },
  });

  // Stores
  const redis = config.redis.url ? new Redis(config.redis.url) : null;
  const preferences: PreferenceStore = redis
    ? new RedisPreferenceStore(redis, createLogger('preferences'))
    : new MemoryPreferenceStore();
  const ephemeral: EphemeralStore = redis ? new RedisEphemeralStore(redis) : new MemoryEphemeralStore();
  if (!redis) {
    logger.warn('REDIS_URL not set, preferences are kept in memory');
  }

  // Tools
  const ytdlp = new YtDlpClient(
    { binaryPath: config.binaries.ytdlp, cookiesFile: config.binaries.ytdlpCookies },
    createLogger('yt-dlp')
  );
  const ffmpeg = new FFmpeg(config.binaries.ffmpeg, createLogger('ffmpeg'));
  const ffprobe = new FFProbe(config.binaries.ffprobe);

  const [hasYtDlp, hasFfmpeg, hasFfprobe] = await Promise.all([
    ytdlp.isAvailable(),
    ffmpeg.isAvailable(),
    ffprobe.isAvailable(),
  ]);
  if (!hasYtDlp) logger.warn({ path: config.binaries.ytdlp }, 'yt-dlp not found');
  if (!hasFfmpeg) logger.warn({ path: config.binaries.ffmpeg }, 'ffmpeg not found');
  if (!hasFfprobe) logger.warn({ path: config.binaries.ffprobe }, 'ffprobe not found');

  // Jobs
  const runner = new JobRunner(
    {
      workRoot: config.storage.downloads,
      maxFileSizeBytes: config.limits.maxFileSize,
      splitSizeBytes: config.limits.splitSize,
      screenshotCount: config.limits.screenshotCount,
      sampleSeconds: config.limits.sampleDuration,
    },
    {
      fetcher: ytdlp,
      segmenter: new MediaSplitter({ ffmpeg, ffprobe }),
      assets: new AssetGenerator({ ffmpeg, ffprobe }),
      probe: ffprobe,
      delivery: new TelegramDelivery(bot.api, createLogger('delivery')),
      preferences,
      log: createLogger('job-runner'),
    }
  );
  const scheduler = new JobScheduler(runner, createLogger('scheduler'));
  scheduler.on('job:finished', (job: Job) => {
    logger.info({ jobId: job.id, requester: job.requester, status: jobStatus(job) }, 'Job finished');
  });

  // Session middleware
  bot.use(session({
    initial: (): SessionData => ({}),
  }));

  // Access control middleware - an empty allow-list admits everyone
  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id?.toString();
    if (config.allowedUsers.length === 0 || (userId && config.allowedUsers.includes(userId))) {
      await next();
      return;
    }
    logger.warn({ userId }, 'User not in allowed list');
  });

  // Register all commands
  registerCommands(bot, {
    scheduler,
    preferences,
    ephemeral,
    fetcher: ytdlp,
    logger: createLogger('commands'),
    adminIds: config.adminIds,
    telegram: { botToken: config.botToken, apiRoot: config.apiRoot },
    thumbnailDir: config.storage.thumbnails,
  });

  // Error handling
  bot.catch((err) => {
    const ctx = err.ctx;
    const e = err.error;
    if (e instanceof GrammyError) {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Error in request');
    } else if (e instanceof HttpError) {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Could not contact Telegram');
    } else {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Unknown error');
    }
  });

  // Graceful shutdown
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, 'Shutting down bot...');
    await bot.stop();
    await scheduler.stop();
    await redis?.quit();
  };

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  // Start bot
  await bot.start({
    onStart: (botInfo) => {
      logger.info({
        username: botInfo.username,
        admins: config.adminIds.length,
        allowedUsers: config.allowedUsers.length > 0 ? config.allowedUsers.length : 'everyone',
      }, 'Bot started');
    },
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
