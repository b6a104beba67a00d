/**
 * Component: Torrent Filter Interface
 * Documentation: documentation/cleanup.md
 */

import type { Torrent } from './torrent-client.interface';

/**
 * A cleanup filter narrows the candidate set. It never adds torrents and
 * never mutates the records it receives.
 */
export interface TorrentFilter {
  readonly name: string;
  filter(torrents: readonly Torrent[]): Promise<Torrent[]>;
}
