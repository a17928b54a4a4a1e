/**
 * State store for the JSON state file
 *
 * The state is read once at the start of a run, mutated in memory by the
 * monitor, and written once at the end. Writes go to an exclusively created
 * temp file that is renamed over the target, so readers and overlapping runs
 * only ever see a complete file.
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { createLogger, describeError, StateIOError } from '../../shared/lib';
import {
  createDefaultState,
  storedStateSchema,
  type ChannelTrackingRecord,
  type GlobalState,
  type StoredState,
} from './types';

/** Default location of the state file, relative to the working directory */
export const DEFAULT_STATE_FILE = 'data/state.json';

const logger = createLogger('state-store');

export interface StateStoreOptions {
  /** Clock used for `last_checked` and `last_run` */
  now?: () => Date;
}

/**
 * Values written into a channel record
 */
export interface ChannelUpdate {
  channelId: string;
  channelName: string;
  latestVideoId: string;
  latestVideoTimestamp: string;
}

export interface StateStats {
  totalChannelsTracked: number;
  totalNotificationsSent: number;
  lastRun: string | null;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Fill in `channel_id` from the map key for records written without it
 */
function normalizeState(stored: StoredState): GlobalState {
  const channels: Record<string, ChannelTrackingRecord> = {};
  for (const [channelId, record] of Object.entries(stored.channels)) {
    channels[channelId] = { ...record, channel_id: channelId };
  }
  return { channels, metadata: { ...stored.metadata } };
}

/**
 * Create a store bound to one state file
 */
export function createStateStore(filePath: string = DEFAULT_STATE_FILE, options: StateStoreOptions = {}) {
  const now = options.now ?? (() => new Date());

  return {
    filePath,

    /**
     * Read the state file. Falls back to a default state when the file is
     * missing, unreadable, not JSON, or not shaped like a state file.
     */
    async load(): Promise<GlobalState> {
      let raw: string;
      try {
        raw = await fs.readFile(filePath, 'utf8');
      } catch (error) {
        if (isMissingFile(error)) {
          logger.info(`State file ${filePath} not found, creating default state`);
        } else {
          logger.error(`Error reading state file ${filePath}: ${describeError(error)}`);
        }
        return createDefaultState();
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        logger.error(`Error parsing state file ${filePath}: ${describeError(error)}`);
        return createDefaultState();
      }

      const result = storedStateSchema.safeParse(parsed);
      if (!result.success) {
        const issue = result.error.issues[0];
        logger.error(
          `State file ${filePath} has an unexpected shape (${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}), using default state`
        );
        return createDefaultState();
      }

      const state = normalizeState(result.data);
      logger.debug(`Loaded state with ${Object.keys(state.channels).length} channels`);
      return state;
    },

    /**
     * Stamp `last_run` and write the state atomically
     *
     * @throws StateIOError when the directory, temp file or rename fails
     */
    async save(state: GlobalState): Promise<void> {
      state.metadata.last_run = now().toISOString();

      const dir = path.dirname(filePath);
      const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${randomUUID()}.tmp`);

      try {
        await fs.mkdir(dir, { recursive: true });
        const handle = await fs.open(tempPath, 'wx');
        try {
          await handle.writeFile(`${JSON.stringify(state, null, 2)}\n`, 'utf8');
          await handle.sync();
        } finally {
          await handle.close();
        }
        await fs.rename(tempPath, filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          logger.warn(`Could not remove temp file ${tempPath}: ${describeError(cleanupError)}`);
        });
        throw new StateIOError(filePath, `Failed to save state to ${filePath}: ${describeError(error)}`, {
          cause: error,
        });
      }

      logger.info('State saved successfully');
    },

    /**
     * Get the record for a channel, if it has been seen before
     */
    get(state: GlobalState, channelId: string): ChannelTrackingRecord | undefined {
      return state.channels[channelId];
    },

    /**
     * Replace or insert a channel record and stamp `last_checked`
     */
    upsert(state: GlobalState, update: ChannelUpdate): void {
      state.channels[update.channelId] = {
        channel_id: update.channelId,
        name: update.channelName,
        latest_video_id: update.latestVideoId,
        latest_video_timestamp: update.latestVideoTimestamp,
        last_checked: now().toISOString(),
      };
      logger.debug(`Updated state for channel ${update.channelName} (${update.channelId})`);
    },

    incrementNotificationCount(state: GlobalState): void {
      state.metadata.total_notifications_sent += 1;
    },

    getStats(state: GlobalState): StateStats {
      return {
        totalChannelsTracked: Object.keys(state.channels).length,
        totalNotificationsSent: state.metadata.total_notifications_sent,
        lastRun: state.metadata.last_run,
      };
    },
  };
}

/**
 * Type for the state store
 */
export type StateStore = ReturnType<typeof createStateStore>;
