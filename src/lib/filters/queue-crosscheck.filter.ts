/**
 * Component: Queue Cross-Check Filter
 * Documentation: documentation/cleanup.md
 *
 * Keeps back torrents a manager still tracks in its download queue.
 */

import { addSeconds, isBefore } from 'date-fns';
import { MANAGER_RESTART_GRACE } from '../constants/retry-thresholds';
import type { Torrent } from '../interfaces/torrent-client.interface';
import type { TorrentFilter } from '../interfaces/torrent-filter.interface';
import {
  MANAGER_DISPLAY_NAMES,
  type QueueManagerClient,
  type QueueManagerKind,
} from '../interfaces/queue-manager.interface';
import { AppLogger } from '../utils/logger';

export interface QueueCrossCheckOptions {
  now?: () => Date;
  logger?: AppLogger;
}

export class QueueCrossCheckFilter implements TorrentFilter {
  readonly name: string;

  private readonly now: () => Date;
  private readonly logger: AppLogger;

  constructor(
    kind: QueueManagerKind,
    private readonly manager: QueueManagerClient | null,
    options: QueueCrossCheckOptions = {}
  ) {
    const displayName = MANAGER_DISPLAY_NAMES[kind];
    this.name = `${displayName}Filter`;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? AppLogger.create(`Cleanup:${displayName}`);
  }

  async filter(torrents: readonly Torrent[]): Promise<Torrent[]> {
    const manager = this.manager;
    if (!manager) {
      return [...torrents];
    }

    const queue = await manager.getQueue();

    // A freshly restarted manager reports an empty queue until it has rescanned its download client
    if (queue.length === 0 && (await this.startedRecently(manager))) {
      this.logger.info(`${manager.displayName} started less than ${MANAGER_RESTART_GRACE}s ago with an empty queue, skipping cleanup`);
      return [];
    }

    const tracked = new Set<string>();
    for (const entry of queue) {
      if (entry.downloadId) {
        tracked.add(entry.downloadId.toLowerCase());
      }
    }

    return torrents.filter((torrent) => {
      if (!tracked.has(torrent.hash.toLowerCase())) {
        return true;
      }
      this.logger.debug(`Ignoring torrent '${torrent.name}': still in ${manager.displayName} queue`);
      return false;
    });
  }

  private async startedRecently(manager: QueueManagerClient): Promise<boolean> {
    const startTime = await manager.getStartTime();
    if (!startTime) {
      return false;
    }
    return isBefore(this.now(), addSeconds(startTime, MANAGER_RESTART_GRACE));
  }
}
