/**
 * Telegram Bot Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Load .env from monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../..');
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

function idList(value: string | undefined): string[] {
  return value?.split(',').map(id => id.trim()).filter(Boolean) ?? [];
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_API_ROOT: z.string().url().optional(), // Local Bot API server, needed above 50 MB
  TELEGRAM_ALLOWED_USERS: z.string().optional(), // Comma-separated user IDs; empty allows everyone
  TELEGRAM_ADMIN_IDS: z.string().optional(), // Comma-separated user IDs allowed to /ban and /unban

  // Redis (optional; preferences are kept in memory without it)
  REDIS_URL: z.string().optional(),

  // Storage paths (relative to monorepo root)
  DOWNLOAD_DIR: z.string().default('./storage/downloads'),
  THUMBNAIL_DIR: z.string().default('./storage/thumbnails'),

  // Limits
  MAX_FILE_SIZE: z.coerce.number().int().positive().default(2 * 1024 ** 3),
  SPLIT_SIZE: z.coerce.number().int().positive().default(2093796556),
  SCREENSHOT_COUNT: z.coerce.number().int().min(0).max(10).default(10),
  SAMPLE_DURATION: z.coerce.number().int().positive().default(20),

  // Binary paths
  YTDLP_PATH: z.string().default('yt-dlp'),
  YTDLP_COOKIES_FILE: z.string().optional(),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,

  botToken: env.TELEGRAM_BOT_TOKEN,
  apiRoot: env.TELEGRAM_API_ROOT ?? 'https://api.telegram.org',
  allowedUsers: idList(env.TELEGRAM_ALLOWED_USERS),
  adminIds: idList(env.TELEGRAM_ADMIN_IDS),

  redis: {
    url: env.REDIS_URL || null,
  },

  storage: {
    downloads: resolvePath(env.DOWNLOAD_DIR),
    thumbnails: resolvePath(env.THUMBNAIL_DIR),
  },

  limits: {
    maxFileSize: env.MAX_FILE_SIZE,
    splitSize: env.SPLIT_SIZE,
    screenshotCount: env.SCREENSHOT_COUNT,
    sampleDuration: env.SAMPLE_DURATION,
  },

  binaries: {
    ytdlp: env.YTDLP_PATH,
    ytdlpCookies: env.YTDLP_COOKIES_FILE ? resolvePath(env.YTDLP_COOKIES_FILE) : null,
    ffmpeg: env.FFMPEG_PATH,
    ffprobe: env.FFPROBE_PATH,
  },
} as const;

export type BotConfig = typeof config;
