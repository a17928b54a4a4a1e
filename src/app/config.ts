/**
 * Configuration for the notifier
 *
 * Behaviour comes from a JSON config file; secrets come from the environment.
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_STATE_FILE } from '../entities/tracking-state';
import { DEFAULT_MAX_VIDEO_AGE_DAYS } from '../features/youtube-monitor';
import { DEFAULT_NOTIFICATION_TEMPLATE, isVideoUrlPlacementValid } from '../features/telegram-notifier';
import { ConfigurationError, describeError } from '../shared/lib';

/** Config file read when --config is not given */
export const DEFAULT_CONFIG_PATH = 'config.json';

/** Default per-request timeout for YouTube and Telegram calls */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const configSchema = z.object({
  general: z
    .object({
      dry_run: z.boolean().default(false),
      state_file: z.string().min(1).default(DEFAULT_STATE_FILE),
    })
    .default({}),
  youtube: z
    .object({
      max_video_age_days: z.number().int().positive().default(DEFAULT_MAX_VIDEO_AGE_DAYS),
      request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
    })
    .default({}),
  telegram: z
    .object({
      notification_template: z.string().min(1).default(DEFAULT_NOTIFICATION_TEMPLATE),
      parse_mode: z.enum(['HTML', 'Markdown', 'MarkdownV2']).default('HTML'),
      disable_web_page_preview: z.boolean().default(false),
      request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
    })
    .default({})
    .refine((telegram) => isVideoUrlPlacementValid(telegram.notification_template, telegram.parse_mode), {
      message: 'with MarkdownV2, {video_url} must be a link target, as in [{video_title}]({video_url})',
      path: ['notification_template'],
    }),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Secrets read from the environment
 */
export interface Env {
  // YouTube OAuth client and the monitored account's refresh token
  YOUTUBE_CLIENT_ID: string;
  YOUTUBE_CLIENT_SECRET: string;
  YOUTUBE_REFRESH_TOKEN: string;

  // Telegram bot credentials
  TELEGRAM_BOT_TOKEN: string;
  TELEGRAM_CHAT_ID: string;

  // Sentry (optional)
  SENTRY_DSN?: string;
}

const REQUIRED_ENV_VARS = [
  'YOUTUBE_CLIENT_ID',
  'YOUTUBE_CLIENT_SECRET',
  'YOUTUBE_REFRESH_TOKEN',
  'TELEGRAM_BOT_TOKEN',
  'TELEGRAM_CHAT_ID',
] as const;

/**
 * Validate an already-parsed config object
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseConfig(raw: unknown, source: string = 'config'): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration in ${source}: ${problems.join('; ')}`);
  }
  return result.data;
}

/**
 * Read and validate the JSON config file
 *
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${configPath} is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }

  return parseConfig(raw, configPath);
}

/**
 * Collect credentials from the environment
 *
 * @throws ConfigurationError naming every missing variable
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const missing = REQUIRED_ENV_VARS.filter((name) => !source[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const read = (name: (typeof REQUIRED_ENV_VARS)[number]): string => source[name]?.trim() ?? '';

  return {
    YOUTUBE_CLIENT_ID: read('YOUTUBE_CLIENT_ID'),
    YOUTUBE_CLIENT_SECRET: read('YOUTUBE_CLIENT_SECRET'),
    YOUTUBE_REFRESH_TOKEN: read('YOUTUBE_REFRESH_TOKEN'),
    TELEGRAM_BOT_TOKEN: read('TELEGRAM_BOT_TOKEN'),
    TELEGRAM_CHAT_ID: read('TELEGRAM_CHAT_ID'),
    SENTRY_DSN: source.SENTRY_DSN?.trim() || undefined,
  };
}
