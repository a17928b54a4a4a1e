#!/usr/bin/env node
/**
 * YouTube Subscription Notifier
 *
 * Checks every channel the configured YouTube account subscribes to and sends
 * a Telegram message for each new video. Meant to be run on a schedule
 * (cron, CI). Each invocation is one run.
 */

import * as Sentry from '@sentry/node';
import { Command } from 'commander';
import { createStateStore } from '../entities/tracking-state';
import { createYouTubeApi, createYouTubeClient } from '../features/youtube-monitor';
import { createTelegramClient, createTelegramNotifier } from '../features/telegram-notifier';
import { createLogger, describeError, setLogLevel, type ConnectionResult } from '../shared/lib';
import { DEFAULT_CONFIG_PATH, loadConfig, loadEnv, type AppConfig, type Env } from './config';
import { flushErrorReporting, initErrorReporting } from './error-reporting';
import { createSubscriptionMonitor, type ContentSource, type Notifier } from './monitor';

const logger = createLogger('main');

interface CliOptions {
  test: boolean;
  config: string;
  debug: boolean;
}

interface ConnectionCheck {
  testConnection(): Promise<ConnectionResult>;
}

/**
 * The YouTube and Telegram sides of a run
 */
export interface Services {
  youtube: ContentSource & ConnectionCheck;
  notifier: Notifier & ConnectionCheck;
}

export type ServicesFactory = (config: AppConfig, env: Env) => Services;

function createServices(config: AppConfig, env: Env): Services {
  const youtube = createYouTubeClient(
    createYouTubeApi(
      {
        clientId: env.YOUTUBE_CLIENT_ID,
        clientSecret: env.YOUTUBE_CLIENT_SECRET,
        refreshToken: env.YOUTUBE_REFRESH_TOKEN,
      },
      config.youtube.request_timeout_ms
    )
  );

  const telegram = createTelegramClient({
    botToken: env.TELEGRAM_BOT_TOKEN,
    timeoutMs: config.telegram.request_timeout_ms,
  });

  const notifier = createTelegramNotifier(telegram, {
    chatId: env.TELEGRAM_CHAT_ID,
    notificationTemplate: config.telegram.notification_template,
    parseMode: config.telegram.parse_mode,
    disableWebPagePreview: config.telegram.disable_web_page_preview,
  });

  return { youtube, notifier };
}

function logConnection(service: string, result: ConnectionResult): void {
  if (result.connected) {
    logger.info(`✓ ${service}: ${result.detail ?? 'connected'}`);
  } else {
    logger.error(`✗ ${service}: ${result.error ?? 'not connected'}`);
  }
}

/**
 * Test both connections without touching state
 *
 * @returns process exit code
 */
async function testConnections(services: Services): Promise<number> {
  logger.info('Testing YouTube API connection...');
  const youtube = await services.youtube.testConnection();
  logConnection('YouTube', youtube);

  logger.info('Testing Telegram bot connection...');
  const telegram = await services.notifier.testConnection();
  logConnection('Telegram', telegram);

  return youtube.connected && telegram.connected ? 0 : 1;
}

/**
 * Run one monitoring pass
 *
 * @returns process exit code
 */
async function runMonitor(config: AppConfig, services: Services): Promise<number> {
  const store = createStateStore(config.general.state_file);
  const monitor = createSubscriptionMonitor({
    store,
    source: services.youtube,
    notifier: services.notifier,
    dryRun: config.general.dry_run,
    maxVideoAgeDays: config.youtube.max_video_age_days,
  });

  const report = await monitor.run();
  logger.info(`Run finished (${report.outcome}): ${JSON.stringify(report.stats)}`);

  if (report.outcome === 'completed') {
    const stats = store.getStats(await store.load());
    logger.debug(
      `Tracking ${stats.totalChannelsTracked} channels, ${stats.totalNotificationsSent} notifications sent in total`
    );
  }

  return report.stats.errors === 0 ? 0 : 1;
}

/**
 * Parse arguments, run, and return the exit code
 *
 * Exit 1 on a configuration error, a failed save, a failed listing of
 * subscriptions, any channel error, or a failed connection test.
 */
export async function main(
  argv: string[] = process.argv,
  buildServices: ServicesFactory = createServices
): Promise<number> {
  const program = new Command()
    .name('subscription-notifier')
    .description('Send a Telegram message for every new video from your YouTube subscriptions')
    .option('--test', 'test YouTube and Telegram connections only', false)
    .option('--config <path>', 'path to config file', DEFAULT_CONFIG_PATH)
    .option('--debug', 'enable debug logging', false)
    .parse(argv);

  const options = program.opts<CliOptions>();
  if (options.debug) {
    setLogLevel('debug');
  }

  try {
    const config = await loadConfig(options.config);
    const env = loadEnv();
    initErrorReporting(env.SENTRY_DSN);

    const services = buildServices(config, env);
    return options.test ? await testConnections(services) : await runMonitor(config, services);
  } catch (error) {
    logger.error(`Fatal error: ${describeError(error)}`);
    Sentry.captureException(error);
    return 1;
  } finally {
    await flushErrorReporting();
  }
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      logger.error(`Fatal error: ${describeError(error)}`);
      process.exit(1);
    }
  );
}
