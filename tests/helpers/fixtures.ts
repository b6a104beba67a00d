/**
 * Component: Test Fixtures
 * Documentation: documentation/README.md
 *
 * Builders for torrents and queue entries plus in-memory stand-ins for the
 * torrent client and the queue managers.
 */

import { vi, type Mock } from 'vitest';
import type {
  QueueDeleteOptions,
  QueueEntry,
  QueueManagerClient,
  QueueManagerKind,
} from '@/lib/interfaces/queue-manager.interface';
import { MANAGER_DISPLAY_NAMES } from '@/lib/interfaces/queue-manager.interface';
import type {
  Torrent,
  TorrentClient,
  TorrentContentFile,
  TorrentListEntry,
} from '@/lib/interfaces/torrent-client.interface';

export function buildTorrent(overrides: Partial<Torrent> = {}): Torrent {
  return {
    hash: 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa',
    name: 'Some.Show.S01E01.1080p',
    totalSize: 1000,
    savePath: '/downloads/complete',
    category: 'tv-sonarr',
    ratio: 1.5,
    seedingTime: 3600,
    progress: 1,
    trackers: ['https://tracker.example.org/announce'],
    files: [{ name: 'Some.Show.S01E01.1080p.mkv', size: 1000 }],
    ...overrides,
  };
}

export function buildQueueEntry(overrides: Partial<QueueEntry> = {}): QueueEntry {
  return {
    id: 1,
    downloadId: 'AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA',
    title: 'Some.Show.S01E01.1080p',
    status: 'downloading',
    trackedDownloadState: 'downloading',
    trackedDownloadStatus: 'ok',
    size: 1000,
    sizeleft: 500,
    added: '2024-05-01T10:00:00Z',
    statusMessages: [],
    ...overrides,
  };
}

/** Queue entry the manager reports as stalled */
export function buildStalledEntry(overrides: Partial<QueueEntry> = {}): QueueEntry {
  return buildQueueEntry({
    status: 'warning',
    trackedDownloadState: 'downloading',
    trackedDownloadStatus: 'warning',
    errorMessage: 'The download is stalled with no connections',
    ...overrides,
  });
}

export interface FakeTorrentClientState {
  entries?: TorrentListEntry[];
  trackers?: Record<string, string[]>;
  files?: Record<string, TorrentContentFile[]>;
  linkCounts?: Record<string, number>;
}

export interface FakeTorrentClient extends TorrentClient {
  listTorrents: Mock<() => Promise<TorrentListEntry[]>>;
  getTrackers: Mock<(hash: string) => Promise<string[]>>;
  getFiles: Mock<(hash: string) => Promise<TorrentContentFile[]>>;
  getLinkCount: Mock<(filePath: string) => Promise<number | null>>;
  deleteTorrents: Mock<(hashes: string[], deleteFiles: boolean) => Promise<void>>;
}

/**
 * Torrent client backed by plain objects. Link counts are keyed by full file path;
 * paths without an entry report null.
 */
export function createFakeTorrentClient(state: FakeTorrentClientState = {}): FakeTorrentClient {
  return {
    listTorrents: vi.fn(async () => state.entries ?? []),
    getTrackers: vi.fn(async (hash: string) => state.trackers?.[hash] ?? []),
    getFiles: vi.fn(async (hash: string) => state.files?.[hash] ?? []),
    getLinkCount: vi.fn(async (filePath: string) => state.linkCounts?.[filePath] ?? null),
    deleteTorrents: vi.fn<(hashes: string[], deleteFiles: boolean) => Promise<void>>(async () => undefined),
  };
}

export interface FakeQueueManager extends QueueManagerClient {
  queue: QueueEntry[];
  startTime: Date | null;
  getStartTime: Mock<() => Promise<Date | null>>;
  getQueue: Mock<() => Promise<QueueEntry[]>>;
  deleteQueueItems: Mock<(ids: number[], options: QueueDeleteOptions) => Promise<void>>;
}

/**
 * Queue manager whose queue and start time can be changed between cycles
 */
export function createFakeQueueManager(
  kind: QueueManagerKind,
  queue: QueueEntry[] = [],
  startTime: Date | null = null
): FakeQueueManager {
  const manager: FakeQueueManager = {
    kind,
    displayName: MANAGER_DISPLAY_NAMES[kind],
    queue,
    startTime,
    getStartTime: vi.fn(async () => manager.startTime),
    getQueue: vi.fn(async () => manager.queue),
    deleteQueueItems: vi.fn<(ids: number[], options: QueueDeleteOptions) => Promise<void>>(async () => undefined),
  };
  return manager;
}
