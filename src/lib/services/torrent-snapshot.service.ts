/**
 * Component: Torrent Snapshot Builder
 * Documentation: documentation/cleanup.md
 *
 * Turns the torrent client's listing into the records the cleanup filters work on.
 */

import type { Torrent, TorrentClient, TorrentListEntry } from '../interfaces/torrent-client.interface';
import { AppLogger } from '../utils/logger';

const defaultLogger = AppLogger.create('Snapshot');

type RequiredListFields = 'hash' | 'name' | 'totalSize' | 'savePath';

type CompleteListEntry = TorrentListEntry & Required<Pick<TorrentListEntry, RequiredListFields>>;

function missingFields(entry: TorrentListEntry): RequiredListFields[] {
  const missing: RequiredListFields[] = [];
  if (!entry.hash) missing.push('hash');
  if (entry.name === undefined) missing.push('name');
  if (entry.totalSize === undefined) missing.push('totalSize');
  if (entry.savePath === undefined) missing.push('savePath');
  return missing;
}

function isComplete(entry: TorrentListEntry): entry is CompleteListEntry {
  return missingFields(entry).length === 0;
}

/**
 * Build the cycle's torrent set. A listing row missing a required field is
 * skipped; a failure to fetch trackers or files aborts the whole snapshot.
 */
export async function buildTorrentSnapshot(
  client: TorrentClient,
  logger: AppLogger = defaultLogger
): Promise<Torrent[]> {
  const entries = await client.listTorrents();
  const torrents: Torrent[] = [];

  for (const entry of entries) {
    if (!isComplete(entry)) {
      logger.warn(`Skipping torrent "${entry.name ?? entry.hash ?? 'unknown'}": missing ${missingFields(entry).join(', ')}`);
      continue;
    }

    const trackers = await client.getTrackers(entry.hash);
    const files = await client.getFiles(entry.hash);

    torrents.push({
      hash: entry.hash,
      name: entry.name,
      totalSize: entry.totalSize,
      savePath: entry.savePath,
      category: entry.category ?? '',
      ratio: entry.ratio ?? null,
      seedingTime: entry.seedingTime ?? 0,
      progress: entry.progress ?? 0,
      trackers,
      files,
    });
  }

  logger.debug(`Snapshot contains ${torrents.length}/${entries.length} torrents`);
  return torrents;
}
