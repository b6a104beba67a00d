/**
 * Component: Tracker Filter
 * Documentation: documentation/cleanup.md
 *
 * Applies per-tracker rules. Rules are evaluated in configuration order and
 * the first one that holds a torrent back wins.
 */

import path from 'path';
import type { Torrent, TorrentClient } from '../interfaces/torrent-client.interface';
import type { TorrentFilter } from '../interfaces/torrent-filter.interface';
import type { TrackerRule } from '../services/config.service';
import { AppLogger } from '../utils/logger';
import { getTrackerHost } from '../utils/url';

type LinkCounter = Pick<TorrentClient, 'getLinkCount'>;

export class TrackerFilter implements TorrentFilter {
  readonly name = 'TrackerFilter';

  constructor(
    private readonly rules: readonly TrackerRule[] | undefined,
    private readonly linkCounter: LinkCounter,
    private readonly logger: AppLogger = AppLogger.create('Cleanup:Tracker')
  ) {}

  async filter(torrents: readonly Torrent[]): Promise<Torrent[]> {
    if (!this.rules || this.rules.length === 0) {
      return [...torrents];
    }

    const kept: Torrent[] = [];
    for (const torrent of torrents) {
      const reason = await this.findIgnoreReason(torrent, this.rules);
      if (reason) {
        this.logger.debug(`Ignoring torrent '${torrent.name}' due to ${reason}`);
      } else {
        kept.push(torrent);
      }
    }
    return kept;
  }

  private async findIgnoreReason(torrent: Torrent, rules: readonly TrackerRule[]): Promise<string | null> {
    const hosts = new Set<string>();
    for (const url of torrent.trackers) {
      const host = getTrackerHost(url);
      if (host) hosts.add(host);
    }

    // Computed at most once, and only when a matching hard-link rule needs it
    let hardLinkedPercentage: number | undefined;

    for (const rule of rules) {
      if (!rule.domains.some((domain) => hosts.has(domain))) {
        continue;
      }

      if (rule.ignore === 'always') {
        return `tracker '${rule.name}' with ignore enabled`;
      }

      const ratioReached = rule.ratio !== undefined && torrent.ratio !== null && torrent.ratio > rule.ratio;
      const seedingTimeReached = rule.seedingTime !== undefined && torrent.seedingTime > rule.seedingTime;

      if (rule.requireRatioAndSeedingTime && ratioReached && seedingTimeReached) {
        return `ratio ${formatRatio(torrent.ratio)} and seeding time ${torrent.seedingTime}s above ${rule.ratio} and ${rule.seedingTime}s for tracker '${rule.name}'`;
      }
      if (ratioReached) {
        return `ratio ${formatRatio(torrent.ratio)} above ${rule.ratio} for tracker '${rule.name}'`;
      }
      if (seedingTimeReached) {
        return `seeding time ${torrent.seedingTime}s above ${rule.seedingTime}s for tracker '${rule.name}'`;
      }

      if (rule.ignore === 'hardLinks' && torrent.progress === 1) {
        if (hardLinkedPercentage === undefined) {
          hardLinkedPercentage = await this.hardLinkedPercentage(torrent);
          this.logger.debug(`Torrent '${torrent.name}' has ${hardLinkedPercentage.toFixed(0)}% multiple hard linked files`);
        }
        if (hardLinkedPercentage >= rule.hardLinksPercentage) {
          return `tracker '${rule.name}' with ${hardLinkedPercentage.toFixed(0)}% multiple hard linked files`;
        }
      }
    }

    return null;
  }

  /**
   * Share of the torrent's bytes stored in files that have another hard link
   * (typically the manager's imported copy). Unreadable files count as not linked.
   */
  private async hardLinkedPercentage(torrent: Torrent): Promise<number> {
    if (torrent.totalSize <= 0) {
      return 0;
    }

    let linkedBytes = 0;
    for (const file of torrent.files) {
      const links = await this.linkCounter.getLinkCount(path.join(torrent.savePath, file.name));
      if (links !== null && links > 1) {
        linkedBytes += file.size;
      }
    }

    return (linkedBytes / torrent.totalSize) * 100;
  }
}

function formatRatio(ratio: number | null): string {
  return ratio === null ? 'unknown' : ratio.toFixed(2);
}
