/**
 * Component: Category Filter
 * Documentation: documentation/cleanup.md
 */

import type { Torrent } from '../interfaces/torrent-client.interface';
import type { TorrentFilter } from '../interfaces/torrent-filter.interface';
import type { CategoryRule } from '../services/config.service';
import { AppLogger } from '../utils/logger';

export class CategoryFilter implements TorrentFilter {
  readonly name = 'CategoryFilter';
  private readonly ignored: ReadonlySet<string>;

  constructor(
    categories: readonly CategoryRule[] | undefined,
    private readonly logger: AppLogger = AppLogger.create('Cleanup:Category')
  ) {
    this.ignored = new Set((categories ?? []).filter((category) => category.ignore).map((category) => category.name));
  }

  async filter(torrents: readonly Torrent[]): Promise<Torrent[]> {
    if (this.ignored.size === 0) {
      return [...torrents];
    }

    return torrents.filter((torrent) => {
      if (!this.ignored.has(torrent.category)) {
        return true;
      }

      this.logger.debug(`Ignoring torrent '${torrent.name}' due to category '${torrent.category}'`);
      return false;
    });
  }
}
