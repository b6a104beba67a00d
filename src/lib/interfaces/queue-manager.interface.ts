/**
 * Component: Queue Manager Interface
 * Documentation: documentation/integrations.md
 *
 * Sonarr and Radarr expose the same queue API; both are driven through this contract.
 */

export const QUEUE_MANAGER_KINDS = ['sonarr', 'radarr'] as const;

export type QueueManagerKind = (typeof QUEUE_MANAGER_KINDS)[number];

export const MANAGER_DISPLAY_NAMES: Record<QueueManagerKind, string> = {
  sonarr: 'Sonarr',
  radarr: 'Radarr',
};

/** Grouped status messages attached to a tracked download */
export interface QueueStatusMessage {
  title?: string;
  messages: string[];
}

/**
 * One entry of a manager's download queue. Produced by the manager on every
 * fetch; never owned by this service.
 */
export interface QueueEntry {
  /** Numeric queue id used for deletion */
  id?: number;
  /** Download client id; for torrents this is the info hash */
  downloadId?: string;
  title?: string;
  /** e.g. `downloading`, `warning`, `completed` */
  status?: string;
  /** e.g. `downloading`, `importPending`, `imported` */
  trackedDownloadState?: string;
  /** e.g. `ok`, `warning`, `error` */
  trackedDownloadStatus?: string;
  size?: number;
  sizeleft?: number;
  /** ISO-8601 timestamp the release was grabbed */
  added?: string;
  errorMessage?: string;
  statusMessages: QueueStatusMessage[];
}

export interface QueueDeleteOptions {
  removeFromClient: boolean;
  blocklist: boolean;
  skipRedownload: boolean;
  changeCategory: boolean;
}

export interface QueueManagerClient {
  readonly kind: QueueManagerKind;
  readonly displayName: string;

  /** Process start time reported by the manager, null when absent or unparseable */
  getStartTime(): Promise<Date | null>;

  /** Every queue entry, across all pages */
  getQueue(): Promise<QueueEntry[]>;

  /** Remove queue entries in one bulk call */
  deleteQueueItems(ids: number[], options: QueueDeleteOptions): Promise<void>;
}
