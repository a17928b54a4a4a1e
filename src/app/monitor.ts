/**
 * Subscription monitor - one monitoring run over every subscribed channel
 *
 * Per channel: fetch the latest video, drop it if too old (remembering it so it
 * is not re-evaluated), drop it if already announced, announce it, and only
 * then record it. Channels are processed one at a time; an error in one
 * channel is counted and never stops the others. The state is loaded once at
 * the start and saved once at the end.
 */

import * as Sentry from '@sentry/node';
import {
  toVideoNotification,
  type Subscription,
  type VideoItem,
  type VideoNotification,
} from '../entities/content-item';
import type { GlobalState, StateStore } from '../entities/tracking-state';
import { DEFAULT_MAX_VIDEO_AGE_DAYS, checkRecency, formatAgeDays, isNewVideo } from '../features/youtube-monitor';
import { createLogger, describeError } from '../shared/lib';

const logger = createLogger('monitor');

/**
 * Where channels and their latest videos come from
 */
export interface ContentSource {
  /** @throws when the channel list cannot be fetched; the run is aborted */
  listSubscriptions(): Promise<Subscription[]>;

  /** @throws when one channel cannot be read; only that channel is skipped */
  getLatestVideo(channelId: string): Promise<VideoItem | null>;
}

/**
 * Where announcements go
 */
export interface Notifier {
  /** @returns true only when the announcement was delivered */
  dispatch(notification: VideoNotification): Promise<boolean>;
}

export interface RunStats {
  channelsChecked: number;
  newVideosFound: number;
  notificationsSent: number;
  /** Notifications that would have been sent with dry_run off */
  dryRunNotifications: number;
  errors: number;
}

export type ChannelOutcome =
  | 'no-videos'
  | 'too-old'
  | 'already-notified'
  | 'notified'
  | 'dry-run'
  | 'dispatch-failed'
  | 'error';

export type RunOutcome = 'completed' | 'no-subscriptions' | 'enumeration-failed';

export interface RunReport {
  outcome: RunOutcome;
  stats: RunStats;
  /** Per-channel result in processing order */
  channels: Array<{ channelId: string; outcome: ChannelOutcome }>;
}

export interface MonitorOptions {
  store: StateStore;
  source: ContentSource;
  notifier: Notifier;

  /** Simulate successful dispatch without contacting the notifier */
  dryRun?: boolean;

  maxVideoAgeDays?: number;

  /** Clock used for the recency window */
  now?: () => Date;
}

function createRunStats(): RunStats {
  return {
    channelsChecked: 0,
    newVideosFound: 0,
    notificationsSent: 0,
    dryRunNotifications: 0,
    errors: 0,
  };
}

/**
 * Create a monitor bound to its collaborators
 */
export function createSubscriptionMonitor(options: MonitorOptions) {
  const { store, source, notifier, dryRun = false, maxVideoAgeDays = DEFAULT_MAX_VIDEO_AGE_DAYS } = options;
  const now = options.now ?? (() => new Date());

  async function sendNotification(notification: VideoNotification): Promise<boolean> {
    if (dryRun) {
      logger.info(`[DRY RUN] Would send notification for: ${notification.videoTitle}`);
      return true;
    }
    return notifier.dispatch(notification);
  }

  /**
   * Run the fetch → recency → dedup → dispatch → commit sequence for one channel
   */
  async function processChannel(
    state: GlobalState,
    subscription: Subscription,
    stats: RunStats
  ): Promise<ChannelOutcome> {
    const { channelId, channelTitle } = subscription;

    const video = await source.getLatestVideo(channelId);
    if (!video) {
      logger.debug(`No videos found for channel: ${channelTitle}`);
      return 'no-videos';
    }

    const recency = checkRecency(video.publishedAt, maxVideoAgeDays, now());
    if (recency.unparseable) {
      logger.warn(
        `Could not parse publish time "${video.publishedAt}" of ${video.videoId}, treating it as recent`
      );
    }

    if (!recency.recent) {
      logger.debug(
        `Video too old (${recency.ageMs === null ? '?' : formatAgeDays(recency.ageMs)}), skipping: ${video.title} by ${channelTitle}`
      );
      // Remember it so the same old video is not evaluated again
      store.upsert(state, {
        channelId,
        channelName: channelTitle,
        latestVideoId: video.videoId,
        latestVideoTimestamp: video.publishedAt,
      });
      return 'too-old';
    }

    if (!isNewVideo(store.get(state, channelId), video.videoId)) {
      logger.debug(`No new videos for channel: ${channelTitle}`);
      return 'already-notified';
    }

    logger.info(`New video found: ${video.title} by ${channelTitle}`);
    stats.newVideosFound++;

    const notification = toVideoNotification(subscription, video);
    if (!(await sendNotification(notification))) {
      logger.error(`✗ Failed to notify: ${video.title} by ${channelTitle}, will retry next run`);
      Sentry.captureMessage(`Failed to send notification: ${video.title}`, {
        level: 'warning',
        tags: { source: 'telegram', channelId },
        extra: { videoId: video.videoId },
      });
      return 'dispatch-failed';
    }

    store.upsert(state, {
      channelId,
      channelName: channelTitle,
      latestVideoId: video.videoId,
      latestVideoTimestamp: video.publishedAt,
    });

    if (dryRun) {
      stats.dryRunNotifications++;
      return 'dry-run';
    }

    store.incrementNotificationCount(state);
    stats.notificationsSent++;
    return 'notified';
  }

  /**
   * Check one channel, isolating any error to it
   */
  async function checkChannel(
    state: GlobalState,
    subscription: Subscription,
    stats: RunStats
  ): Promise<ChannelOutcome> {
    logger.debug(`Checking channel: ${subscription.channelTitle}`);
    stats.channelsChecked++;

    try {
      return await processChannel(state, subscription, stats);
    } catch (error) {
      logger.error(`Error checking channel ${subscription.channelTitle}: ${describeError(error)}`);
      stats.errors++;
      Sentry.captureException(error, {
        tags: { source: 'youtube', channelId: subscription.channelId },
      });
      return 'error';
    }
  }

  return {
    checkChannel,

    /**
     * Run one full monitoring pass
     *
     * @throws StateIOError when the final save fails
     */
    async run(): Promise<RunReport> {
      logger.info('Starting YouTube subscription monitor...');
      const stats = createRunStats();
      const state = await store.load();

      let subscriptions: Subscription[];
      try {
        subscriptions = await source.listSubscriptions();
      } catch (error) {
        logger.error(`Error listing subscriptions, ending run without saving: ${describeError(error)}`);
        stats.errors++;
        Sentry.captureException(error, { tags: { source: 'youtube' } });
        return { outcome: 'enumeration-failed', stats, channels: [] };
      }

      if (subscriptions.length === 0) {
        logger.warn('No subscriptions found');
        return { outcome: 'no-subscriptions', stats, channels: [] };
      }

      logger.info(`Found ${subscriptions.length} subscriptions`);

      const channels: RunReport['channels'] = [];
      for (const subscription of subscriptions) {
        const outcome = await checkChannel(state, subscription, stats);
        channels.push({ channelId: subscription.channelId, outcome });
      }

      logger.info(
        `Monitoring complete. Checked ${stats.channelsChecked} channels, ` +
          `${stats.newVideosFound} new videos, ${stats.notificationsSent} notifications sent` +
          `${dryRun ? ` (${stats.dryRunNotifications} dry-run)` : ''}, ${stats.errors} errors`
      );

      await store.save(state);
      return { outcome: 'completed', stats, channels };
    },
  };
}

/**
 * Type for the subscription monitor
 */
export type SubscriptionMonitor = ReturnType<typeof createSubscriptionMonitor>;
