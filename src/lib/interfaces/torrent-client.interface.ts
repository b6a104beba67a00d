/**
 * Component: Torrent Client Interface
 * Documentation: documentation/integrations.md
 *
 * The narrow contract the cleanup task needs from the torrent client.
 */

// =========================================================================
// DATA INTERFACES
// =========================================================================

/**
 * One row of the client's torrent listing. Every field is optional because
 * the client may omit any of them; the snapshot builder decides what is required.
 */
export interface TorrentListEntry {
  hash?: string;
  name?: string;
  /** Total size of the selected files in bytes */
  totalSize?: number;
  savePath?: string;
  category?: string;
  ratio?: number;
  /** Seconds spent seeding */
  seedingTime?: number;
  /** Download progress from 0.0 to 1.0 */
  progress?: number;
}

/** A file inside a torrent, relative to its save path */
export interface TorrentContentFile {
  name: string;
  size: number;
}

/**
 * Internal torrent record used by the cleanup filters.
 * Built fresh every cycle and never mutated afterwards.
 */
export interface Torrent {
  hash: string;
  name: string;
  totalSize: number;
  savePath: string;
  category: string;
  /** Share ratio, null when the client did not report one */
  ratio: number | null;
  seedingTime: number;
  progress: number;
  /** Tracker announce URLs as reported by the client */
  trackers: string[];
  files: TorrentContentFile[];
}

// =========================================================================
// CLIENT INTERFACE
// =========================================================================

export interface TorrentClient {
  /** Full snapshot of every torrent */
  listTorrents(): Promise<TorrentListEntry[]>;

  /** Announce URLs of one torrent */
  getTrackers(hash: string): Promise<string[]>;

  /** Content files of one torrent */
  getFiles(hash: string): Promise<TorrentContentFile[]>;

  /** Hard link count of a file on disk, null when it cannot be read */
  getLinkCount(filePath: string): Promise<number | null>;

  /** Delete torrents in one call */
  deleteTorrents(hashes: string[], deleteFiles: boolean): Promise<void>;
}
