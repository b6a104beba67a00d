/**
 * Component: Cleanup Filter Pipeline
 * Documentation: documentation/cleanup.md
 */

import type { QueueManagerClient } from '../interfaces/queue-manager.interface';
import type { Torrent, TorrentClient } from '../interfaces/torrent-client.interface';
import type { TorrentFilter } from '../interfaces/torrent-filter.interface';
import type { CleanupConfig } from '../services/config.service';
import { AppLogger } from '../utils/logger';
import { parseRatioRule } from '../utils/ratio-rule';
import { CategoryFilter } from './category.filter';
import { QueueCrossCheckFilter } from './queue-crosscheck.filter';
import { RatioFilter } from './ratio.filter';
import { TrackerFilter } from './tracker.filter';

/**
 * Runs filters in a fixed order. Whatever survives every filter is eligible for deletion.
 */
export class FilterPipeline {
  constructor(
    private readonly filters: readonly TorrentFilter[],
    private readonly logger: AppLogger = AppLogger.create('Cleanup:Pipeline')
  ) {}

  get filterNames(): string[] {
    return this.filters.map((filter) => filter.name);
  }

  async run(torrents: readonly Torrent[]): Promise<Torrent[]> {
    let remaining = [...torrents];

    for (const filter of this.filters) {
      if (remaining.length === 0) {
        break;
      }
      const before = remaining.length;
      remaining = await filter.filter(remaining);
      this.logger.debug(`${filter.name} kept ${remaining.length}/${before} torrents`);
    }

    return remaining;
  }
}

export interface CleanupPipelineDependencies {
  torrentClient: Pick<TorrentClient, 'getLinkCount'>;
  sonarr: QueueManagerClient | null;
  radarr: QueueManagerClient | null;
  now?: () => Date;
}

/**
 * Build the standard chain: ratio, categories, trackers, Sonarr, Radarr.
 *
 * @throws ConfigurationError when the ratio expression is malformed
 */
export function createCleanupPipeline(config: CleanupConfig, deps: CleanupPipelineDependencies): FilterPipeline {
  const ratioRule = config.ratio !== undefined ? parseRatioRule(config.ratio) : null;

  return new FilterPipeline([
    new RatioFilter(ratioRule),
    new CategoryFilter(config.categories),
    new TrackerFilter(config.trackers, deps.torrentClient),
    new QueueCrossCheckFilter('sonarr', deps.sonarr, { now: deps.now }),
    new QueueCrossCheckFilter('radarr', deps.radarr, { now: deps.now }),
  ]);
}
