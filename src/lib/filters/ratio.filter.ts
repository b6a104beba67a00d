/**
 * Component: Ratio Filter
 * Documentation: documentation/cleanup.md
 */

import type { Torrent } from '../interfaces/torrent-client.interface';
import type { TorrentFilter } from '../interfaces/torrent-filter.interface';
import { AppLogger } from '../utils/logger';
import { formatRatioRule, matchesRatioRule, type RatioRule } from '../utils/ratio-rule';

/**
 * Keeps back every torrent whose share ratio satisfies the global rule
 * (with `<1.0`, torrents that have not yet seeded back their size).
 * Torrents without a reported ratio pass through.
 */
export class RatioFilter implements TorrentFilter {
  readonly name = 'RatioFilter';

  constructor(
    private readonly rule: RatioRule | null,
    private readonly logger: AppLogger = AppLogger.create('Cleanup:Ratio')
  ) {}

  async filter(torrents: readonly Torrent[]): Promise<Torrent[]> {
    const rule = this.rule;
    if (!rule) {
      return [...torrents];
    }

    return torrents.filter((torrent) => {
      if (torrent.ratio === null || !matchesRatioRule(torrent.ratio, rule)) {
        return true;
      }

      this.logger.debug(
        `Ignoring torrent '${torrent.name}': ratio ${torrent.ratio.toFixed(2)} matches global rule ${formatRatioRule(rule)}`
      );
      return false;
    });
  }
}
