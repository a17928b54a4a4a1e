import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Subscription, VideoItem, VideoNotification } from '../entities/content-item';
import { createDefaultState, createStateStore, type StateStore } from '../entities/tracking-state';
import { StateIOError } from '../shared/lib';
import { createYouTubeClient } from '../features/youtube-monitor';
import { createSubscriptionMonitor, type ContentSource, type MonitorOptions, type Notifier } from './monitor';

const NOW = new Date('2026-03-10T12:00:00.000Z');

const channelOne: Subscription = { channelId: 'C1', channelTitle: 'Channel One' };
const channelTwo: Subscription = { channelId: 'C2', channelTitle: 'Channel Two' };
const channelThree: Subscription = { channelId: 'C3', channelTitle: 'Channel Three' };

function video(videoId: string, publishedAt: string): VideoItem {
  return {
    videoId,
    title: `Video ${videoId}`,
    publishedAt,
    url: `https://www.youtube.com/watch?v=${videoId}`,
  };
}

const TWO_DAYS_AGO = '2026-03-08T12:00:00Z';

let dir: string;
let store: StateStore;

function createSource(subscriptions: Subscription[], latest: Record<string, VideoItem | null | Error>) {
  const listSubscriptions = vi.fn(async () => subscriptions);
  const getLatestVideo = vi.fn(async (channelId: string): Promise<VideoItem | null> => {
    const entry = latest[channelId];
    if (entry instanceof Error) {
      throw entry;
    }
    return entry ?? null;
  });
  return { listSubscriptions, getLatestVideo };
}

function createNotifier(result: boolean | Error = true) {
  const dispatch = vi.fn(async (_notification: VideoNotification) => {
    if (result instanceof Error) {
      throw result;
    }
    return result;
  });
  const notifier: Notifier = { dispatch };
  return { notifier, dispatch };
}

function createMonitor(overrides: Partial<MonitorOptions> & Pick<MonitorOptions, 'source' | 'notifier'>) {
  return createSubscriptionMonitor({ store, now: () => NOW, ...overrides });
}

async function stateFileExists(): Promise<boolean> {
  return fs
    .access(store.filePath)
    .then(() => true)
    .catch(() => false);
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'monitor-'));
  store = createStateStore(path.join(dir, 'data', 'state.json'), { now: () => NOW });
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe('createSubscriptionMonitor', () => {
  it('notifies a new video once and not again on the next run', async () => {
    const source = createSource([channelOne], { C1: video('V1', TWO_DAYS_AGO) });
    const { notifier, dispatch } = createNotifier(true);

    const first = await createMonitor({ source, notifier }).run();

    expect(first).toEqual({
      outcome: 'completed',
      stats: { channelsChecked: 1, newVideosFound: 1, notificationsSent: 1, dryRunNotifications: 0, errors: 0 },
      channels: [{ channelId: 'C1', outcome: 'notified' }],
    });
    expect(dispatch).toHaveBeenCalledWith({
      channelName: 'Channel One',
      videoTitle: 'Video V1',
      videoId: 'V1',
      videoUrl: 'https://www.youtube.com/watch?v=V1',
      publishedAt: TWO_DAYS_AGO,
      thumbnailUrl: undefined,
    });

    const afterFirst = await store.load();
    expect(afterFirst.channels.C1).toEqual({
      channel_id: 'C1',
      name: 'Channel One',
      latest_video_id: 'V1',
      latest_video_timestamp: TWO_DAYS_AGO,
      last_checked: '2026-03-10T12:00:00.000Z',
    });
    expect(afterFirst.metadata.total_notifications_sent).toBe(1);

    const second = await createMonitor({ source, notifier }).run();

    expect(second.stats).toEqual({
      channelsChecked: 1,
      newVideosFound: 0,
      notificationsSent: 0,
      dryRunNotifications: 0,
      errors: 0,
    });
    expect(second.channels).toEqual([{ channelId: 'C1', outcome: 'already-notified' }]);
    expect(dispatch).toHaveBeenCalledTimes(1);

    const afterSecond = await store.load();
    expect(afterSecond.channels).toEqual(afterFirst.channels);
    expect(afterSecond.metadata.total_notifications_sent).toBe(1);
  });

  it('changes nothing when dispatch reports failure', async () => {
    const source = createSource([channelOne], { C1: video('V1', TWO_DAYS_AGO) });
    const { notifier } = createNotifier(false);

    const report = await createMonitor({ source, notifier }).run();

    expect(report.channels).toEqual([{ channelId: 'C1', outcome: 'dispatch-failed' }]);
    expect(report.stats).toMatchObject({ newVideosFound: 1, notificationsSent: 0, errors: 0 });

    const state = await store.load();
    expect(state.channels).toEqual({});
    expect(state.metadata.total_notifications_sent).toBe(0);
  });

  it('retries a failed dispatch on the next run', async () => {
    const source = createSource([channelOne], { C1: video('V1', TWO_DAYS_AGO) });

    await createMonitor({ source, notifier: createNotifier(false).notifier }).run();
    const retry = await createMonitor({ source, notifier: createNotifier(true).notifier }).run();

    expect(retry.channels).toEqual([{ channelId: 'C1', outcome: 'notified' }]);
    expect((await store.load()).channels.C1.latest_video_id).toBe('V1');
  });

  it('notifies a video published exactly max age ago', async () => {
    const source = createSource([channelOne], { C1: video('V1', '2026-03-03T12:00:00Z') });
    const { notifier, dispatch } = createNotifier(true);

    const report = await createMonitor({ source, notifier, maxVideoAgeDays: 7 }).run();

    expect(report.channels).toEqual([{ channelId: 'C1', outcome: 'notified' }]);
    expect(dispatch).toHaveBeenCalledTimes(1);
  });

  it('records but does not notify a video one second past max age', async () => {
    const source = createSource([channelOne], { C1: video('OLD', '2026-03-03T11:59:59Z') });
    const { notifier, dispatch } = createNotifier(true);

    const report = await createMonitor({ source, notifier, maxVideoAgeDays: 7 }).run();

    expect(report.channels).toEqual([{ channelId: 'C1', outcome: 'too-old' }]);
    expect(report.stats).toMatchObject({ newVideosFound: 0, notificationsSent: 0 });
    expect(dispatch).not.toHaveBeenCalled();

    const state = await store.load();
    expect(state.channels.C1.latest_video_id).toBe('OLD');
    expect(state.metadata.total_notifications_sent).toBe(0);
  });

  it('never notifies a stale video once it has been recorded', async () => {
    const source = createSource([channelOne], { C1: video('OLD', '2026-02-01T00:00:00Z') });
    const { notifier, dispatch } = createNotifier(true);

    await createMonitor({ source, notifier, maxVideoAgeDays: 7 }).run();
    // A wider window makes the same video recent, but it is already recorded
    const later = await createMonitor({ source, notifier, maxVideoAgeDays: 90 }).run();

    expect(later.channels).toEqual([{ channelId: 'C1', outcome: 'already-notified' }]);
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('treats an unparseable publish time as recent', async () => {
    const source = createSource([channelOne], { C1: video('V1', 'yesterday-ish') });
    const { notifier, dispatch } = createNotifier(true);

    const report = await createMonitor({ source, notifier }).run();

    expect(report.channels).toEqual([{ channelId: 'C1', outcome: 'notified' }]);
    expect(dispatch).toHaveBeenCalledTimes(1);
  });

  it('starts from an empty state when the state file is corrupt', async () => {
    await fs.mkdir(path.dirname(store.filePath), { recursive: true });
    await fs.writeFile(store.filePath, 'this is not json', 'utf8');
    const source = createSource([channelOne], { C1: video('V1', TWO_DAYS_AGO) });
    const { notifier } = createNotifier(true);

    const report = await createMonitor({ source, notifier }).run();

    expect(report.outcome).toBe('completed');
    expect(report.stats.notificationsSent).toBe(1);
    const saved: unknown = JSON.parse(await fs.readFile(store.filePath, 'utf8'));
    expect(saved).toMatchObject({
      channels: { C1: { latest_video_id: 'V1' } },
      metadata: { last_run: '2026-03-10T12:00:00.000Z', total_notifications_sent: 1, version: '1.0.0' },
    });
  });

  it('keeps going after a channel fails and counts each failure once', async () => {
    const source = createSource([channelOne, channelTwo, channelThree], {
      C1: video('V1', TWO_DAYS_AGO),
      C2: new Error('quota exceeded'),
      C3: video('V3', TWO_DAYS_AGO),
    });
    const { notifier, dispatch } = createNotifier(true);

    const report = await createMonitor({ source, notifier }).run();

    expect(report.channels).toEqual([
      { channelId: 'C1', outcome: 'notified' },
      { channelId: 'C2', outcome: 'error' },
      { channelId: 'C3', outcome: 'notified' },
    ]);
    expect(report.stats).toEqual({
      channelsChecked: 3,
      newVideosFound: 2,
      notificationsSent: 2,
      dryRunNotifications: 0,
      errors: 1,
    });
    expect(dispatch).toHaveBeenCalledTimes(2);
    expect(Object.keys((await store.load()).channels).sort()).toEqual(['C1', 'C3']);
  });

  it('counts a throwing notifier as a channel error without recording the video', async () => {
    const source = createSource([channelOne], { C1: video('V1', TWO_DAYS_AGO) });
    const { notifier } = createNotifier(new Error('socket hang up'));

    const report = await createMonitor({ source, notifier }).run();

    expect(report.channels).toEqual([{ channelId: 'C1', outcome: 'error' }]);
    expect(report.stats.errors).toBe(1);
    expect((await store.load()).channels).toEqual({});
  });

  it('counts a channel whose uploads playlist does not exist as having no videos', async () => {
    const api = {
      subscriptions: { list: vi.fn(async () => ({ data: { items: [] } })) },
      channels: {
        list: vi.fn(async () => ({ data: { items: [{ contentDetails: { relatedPlaylists: { uploads: 'UU1' } } }] } })),
      },
      playlistItems: {
        list: vi.fn(async () => {
          throw Object.assign(new Error('playlistNotFound'), { code: 404 });
        }),
      },
    };
    const { notifier, dispatch } = createNotifier(true);
    const stats = { channelsChecked: 0, newVideosFound: 0, notificationsSent: 0, dryRunNotifications: 0, errors: 0 };

    const outcome = await createMonitor({ source: createYouTubeClient(api), notifier }).checkChannel(
      createDefaultState(),
      channelOne,
      stats
    );

    expect(outcome).toBe('no-videos');
    expect(stats.errors).toBe(0);
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('leaves a channel without videos untouched', async () => {
    const source = createSource([channelOne], { C1: null });
    const { notifier, dispatch } = createNotifier(true);

    const report = await createMonitor({ source, notifier }).run();

    expect(report.channels).toEqual([{ channelId: 'C1', outcome: 'no-videos' }]);
    expect(dispatch).not.toHaveBeenCalled();
    expect((await store.load()).channels).toEqual({});
  });

  it('records the video in dry-run mode without calling the notifier or counting it as sent', async () => {
    const source = createSource([channelOne], { C1: video('V1', TWO_DAYS_AGO) });
    const { notifier, dispatch } = createNotifier(true);

    const report = await createMonitor({ source, notifier, dryRun: true }).run();

    expect(report.channels).toEqual([{ channelId: 'C1', outcome: 'dry-run' }]);
    expect(report.stats).toMatchObject({ newVideosFound: 1, notificationsSent: 0, dryRunNotifications: 1 });
    expect(dispatch).not.toHaveBeenCalled();

    const state = await store.load();
    expect(state.channels.C1.latest_video_id).toBe('V1');
    expect(state.metadata.total_notifications_sent).toBe(0);
  });

  it('ends the run without saving when subscriptions cannot be listed', async () => {
    const source: ContentSource = {
      listSubscriptions: vi.fn(async () => {
        throw new Error('invalid_grant');
      }),
      getLatestVideo: vi.fn(async () => null),
    };
    const { notifier } = createNotifier(true);

    const report = await createMonitor({ source, notifier }).run();

    expect(report).toEqual({
      outcome: 'enumeration-failed',
      stats: { channelsChecked: 0, newVideosFound: 0, notificationsSent: 0, dryRunNotifications: 0, errors: 1 },
      channels: [],
    });
    expect(source.getLatestVideo).not.toHaveBeenCalled();
    expect(await stateFileExists()).toBe(false);
  });

  it('ends the run without saving when there are no subscriptions', async () => {
    const source = createSource([], {});
    const { notifier } = createNotifier(true);

    const report = await createMonitor({ source, notifier }).run();

    expect(report.outcome).toBe('no-subscriptions');
    expect(report.stats.errors).toBe(0);
    expect(await stateFileExists()).toBe(false);
  });

  it('fails the run when the state cannot be saved', async () => {
    await fs.writeFile(path.join(dir, 'blocker'), 'not a directory', 'utf8');
    store = createStateStore(path.join(dir, 'blocker', 'state.json'), { now: () => NOW });
    const source = createSource([channelOne], { C1: video('V1', TWO_DAYS_AGO) });
    const { notifier } = createNotifier(true);

    await expect(createMonitor({ source, notifier }).run()).rejects.toBeInstanceOf(StateIOError);
  });

  it('checks every channel exactly once and in order', async () => {
    const source = createSource([channelOne, channelTwo, channelThree], { C1: null, C2: null, C3: null });
    const { notifier } = createNotifier(true);

    await createMonitor({ source, notifier }).run();

    expect(source.getLatestVideo.mock.calls).toEqual([['C1'], ['C2'], ['C3']]);
  });

  describe('checkChannel', () => {
    it('updates the given state and stats without saving', async () => {
      const source = createSource([channelOne], { C1: video('V1', TWO_DAYS_AGO) });
      const { notifier } = createNotifier(true);
      const state = createDefaultState();
      const stats = { channelsChecked: 0, newVideosFound: 0, notificationsSent: 0, dryRunNotifications: 0, errors: 0 };

      const outcome = await createMonitor({ source, notifier }).checkChannel(state, channelOne, stats);

      expect(outcome).toBe('notified');
      expect(stats).toEqual({
        channelsChecked: 1,
        newVideosFound: 1,
        notificationsSent: 1,
        dryRunNotifications: 0,
        errors: 0,
      });
      expect(state.channels.C1?.latest_video_id).toBe('V1');
      expect(state.metadata.total_notifications_sent).toBe(1);
      expect(await stateFileExists()).toBe(false);
    });

    it('returns error and counts it when the lookup throws', async () => {
      const source = createSource([channelOne], { C1: new Error('quota exceeded') });
      const { notifier } = createNotifier(true);
      const state = createDefaultState();
      const stats = { channelsChecked: 0, newVideosFound: 0, notificationsSent: 0, dryRunNotifications: 0, errors: 0 };

      const outcome = await createMonitor({ source, notifier }).checkChannel(state, channelOne, stats);

      expect(outcome).toBe('error');
      expect(stats.errors).toBe(1);
      expect(state.channels).toEqual({});
    });
  });
});
