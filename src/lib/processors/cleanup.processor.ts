/**
 * Component: Cleanup Processor
 * Documentation: documentation/cleanup.md
 *
 * Deletes finished torrents (with their data) once no rule or manager still needs them.
 */

import type { FilterPipeline } from '../filters/filter-pipeline';
import type { TorrentClient } from '../interfaces/torrent-client.interface';
import { buildTorrentSnapshot } from '../services/torrent-snapshot.service';
import { AppLogger } from '../utils/logger';

export interface CleanupResult {
  success: boolean;
  message: string;
  scanned: number;
  /** Hashes deleted, or that would have been deleted in dry-run mode */
  deleted: string[];
  dryRun: boolean;
}

export class CleanupController {
  constructor(
    private readonly torrentClient: TorrentClient,
    private readonly pipeline: FilterPipeline,
    private readonly dryRun: boolean,
    private readonly logger: AppLogger = AppLogger.create('Cleanup')
  ) {}

  /**
   * One cleanup cycle. Errors propagate to the caller and end the cycle.
   */
  async execute(): Promise<CleanupResult> {
    const torrents = await buildTorrentSnapshot(this.torrentClient, this.logger);
    this.logger.debug(`Checking ${torrents.length} torrents against ${this.pipeline.filterNames.join(', ')}`);

    const eligible = await this.pipeline.run(torrents);
    const hashes = eligible.map((torrent) => torrent.hash);

    if (eligible.length === 0) {
      this.logger.debug('No torrents to delete');
      return { success: true, message: 'Nothing to delete', scanned: torrents.length, deleted: [], dryRun: this.dryRun };
    }

    for (const torrent of eligible) {
      this.logger.info(`${this.dryRun ? '[DRY RUN] Would delete' : 'Deleting'} torrent '${torrent.name}' (${torrent.hash})`);
    }

    if (this.dryRun) {
      return {
        success: true,
        message: `Dry run: ${eligible.length} torrent(s) would be deleted`,
        scanned: torrents.length,
        deleted: hashes,
        dryRun: true,
      };
    }

    await this.torrentClient.deleteTorrents(hashes, true);

    return {
      success: true,
      message: `Deleted ${eligible.length} torrent(s)`,
      scanned: torrents.length,
      deleted: hashes,
      dryRun: false,
    };
  }
}
