/**
 * Logger
 *
 * Pino-based structured logger shared by every workspace. Each component
 * logs through a child tagged with its name; the bot token never reaches
 * the output.
 */

import { pino } from 'pino';

export type LogComponent =
  | 'yt-dlp'
  | 'fetch-parser'
  | 'ffmpeg'
  | 'splitter'
  | 'assets'
  | 'scheduler'
  | 'job-runner'
  | 'status'
  | 'telegram-bot'
  | 'commands'
  | 'delivery'
  | 'preferences';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

function resolveLevel(requested: string | undefined): LogLevel {
  if (NODE_ENV === 'test') {
    return 'silent';
  }
  return LOG_LEVELS.find((level) => level === requested) ?? 'info';
}

const root = pino({
  level: resolveLevel(process.env['LOG_LEVEL']),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'reelport',
    env: NODE_ENV,
  },
  redact: {
    paths: ['botToken', '*.botToken', 'telegram.botToken'],
    censor: '[redacted]',
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
    },
  } : undefined,
});

export type Logger = typeof root;

/**
 * Logger for one component, optionally bound to extra context (job id, requester)
 */
export function createLogger(component: LogComponent, context: Record<string, unknown> = {}): Logger {
  return root.child({ component, ...context });
}
