/**
 * Component: Sonarr/Radarr Integration Service Tests
 * Documentation: documentation/integrations.md
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ArrService, toQueueEntry } from '@/lib/integrations/arr.service';
import { IntegrationError } from '@/lib/utils/errors';

const clientMock = vi.hoisted(() => ({
  get: vi.fn(),
  delete: vi.fn(),
}));

const axiosMock = vi.hoisted(() => ({
  create: vi.fn(),
  isAxiosError: (error: unknown) =>
    typeof error === 'object' && error !== null && 'isAxiosError' in error && error.isAxiosError === true,
}));

vi.mock('axios', () => ({
  default: axiosMock,
  ...axiosMock,
}));

function httpError(status: number) {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true,
    response: { status },
  });
}

interface QueueRoutes {
  health?: unknown[];
  totalRecords?: number;
  records?: unknown[];
}

function routeGets({ health = [], totalRecords, records = [] }: QueueRoutes) {
  clientMock.get.mockImplementation(async (url: string, options?: { params?: { pageSize?: number } }) => {
    if (url === '/health') {
      return { data: health };
    }
    if (url === '/queue' && options?.params?.pageSize === 0) {
      return { data: { page: 1, pageSize: 0, totalRecords } };
    }
    if (url === '/queue') {
      return { data: { page: 1, pageSize: options?.params?.pageSize, totalRecords, records } };
    }
    throw new Error(`unexpected GET ${url}`);
  });
}

describe('ArrService', () => {
  beforeEach(() => {
    axiosMock.create.mockReturnValue(clientMock);
  });

  it('creates its client against the v3 API with the key header', () => {
    const service = new ArrService('sonarr', { host: 'http://sonarr:8989/', apiKey: 'test-key' });

    expect(service.displayName).toBe('Sonarr');
    expect(axiosMock.create).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: 'http://sonarr:8989/api/v3',
        headers: { 'X-Api-Key': 'test-key' },
      })
    );
  });

  describe('getStartTime', () => {
    it('parses the reported start time', async () => {
      clientMock.get.mockResolvedValue({ data: { version: '4.0.0', startTime: '2024-05-01T11:59:00Z' } });

      const startTime = await new ArrService('radarr', { host: 'http://radarr:7878', apiKey: 'test-key' }).getStartTime();

      expect(startTime).toEqual(new Date('2024-05-01T11:59:00Z'));
      expect(clientMock.get).toHaveBeenCalledWith('/system/status');
    });

    it('returns null for a missing or unparseable start time', async () => {
      const service = new ArrService('radarr', { host: 'http://radarr:7878', apiKey: 'test-key' });

      clientMock.get.mockResolvedValueOnce({ data: {} });
      await expect(service.getStartTime()).resolves.toBeNull();

      clientMock.get.mockResolvedValueOnce({ data: { startTime: 'yesterday' } });
      await expect(service.getStartTime()).resolves.toBeNull();
    });
  });

  describe('getQueue', () => {
    it('reads the record count first and then the full page', async () => {
      routeGets({
        totalRecords: 2,
        records: [
          { id: 1, downloadId: 'ABC', title: 'Show.S01E01', status: 'downloading', size: 10, sizeleft: 5, statusMessages: [] },
          { id: 2, downloadId: null, title: null, errorMessage: null, statusMessages: null },
        ],
      });
      const service = new ArrService('sonarr', { host: 'http://sonarr:8989', apiKey: 'test-key' });

      const queue = await service.getQueue();

      expect(clientMock.get).toHaveBeenNthCalledWith(2, '/queue', { params: { pageSize: 0 } });
      expect(clientMock.get).toHaveBeenNthCalledWith(3, '/queue', { params: { pageSize: 2 } });
      expect(queue.map((entry) => entry.id)).toEqual([1, 2]);
      expect(queue[1]).toEqual({
        id: 2,
        downloadId: undefined,
        title: undefined,
        status: undefined,
        trackedDownloadState: undefined,
        trackedDownloadStatus: undefined,
        size: undefined,
        sizeleft: undefined,
        added: undefined,
        errorMessage: undefined,
        statusMessages: [],
      });
    });

    it('returns an empty queue without a second request', async () => {
      routeGets({ totalRecords: 0 });

      const queue = await new ArrService('sonarr', { host: 'http://sonarr:8989', apiKey: 'test-key' }).getQueue();

      expect(queue).toEqual([]);
      expect(clientMock.get).toHaveBeenCalledTimes(2);
    });

    it('rejects a response without a record count', async () => {
      routeGets({});

      await expect(
        new ArrService('sonarr', { host: 'http://sonarr:8989', apiKey: 'test-key' }).getQueue()
      ).rejects.toThrow('Sonarr: Queue response is missing totalRecords');
    });

    it('refuses the queue while the download client is unreachable', async () => {
      routeGets({
        health: [
          { source: 'IndexerStatusCheck', type: 'warning', message: 'Indexers unavailable' },
          { source: 'DownloadClientCheck', type: 'error', message: 'Unable to communicate with qBittorrent' },
        ],
        totalRecords: 0,
      });

      await expect(
        new ArrService('radarr', { host: 'http://radarr:7878', apiKey: 'test-key' }).getQueue()
      ).rejects.toThrow('Radarr: Health check failed for download client: Unable to communicate with qBittorrent');
      expect(clientMock.get).toHaveBeenCalledTimes(1);
    });

    it('ignores download client warnings', async () => {
      routeGets({
        health: [{ source: 'DownloadClientCheck', type: 'warning', message: 'Slow' }],
        totalRecords: 0,
      });

      await expect(
        new ArrService('radarr', { host: 'http://radarr:7878', apiKey: 'test-key' }).getQueue()
      ).resolves.toEqual([]);
    });

    it('wraps HTTP failures', async () => {
      clientMock.get.mockRejectedValue(httpError(401));

      const error = await new ArrService('sonarr', { host: 'http://sonarr:8989', apiKey: 'test-key' })
        .getQueue()
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(IntegrationError);
      expect(error).toMatchObject({ message: 'Sonarr: Failed to get health (HTTP 401)', status: 401, service: 'Sonarr' });
    });
  });

  describe('deleteQueueItems', () => {
    it('sends one bulk delete with the flags as query parameters', async () => {
      clientMock.delete.mockResolvedValue({ data: {} });
      const service = new ArrService('sonarr', { host: 'http://sonarr:8989', apiKey: 'test-key' });

      await service.deleteQueueItems([4, 5], {
        removeFromClient: true,
        blocklist: true,
        skipRedownload: false,
        changeCategory: false,
      });

      expect(clientMock.delete).toHaveBeenCalledWith('/queue/bulk', {
        params: { removeFromClient: true, blocklist: true, skipRedownload: false, changeCategory: false },
        data: { ids: [4, 5] },
      });
    });

    it('skips the call for an empty id list', async () => {
      await new ArrService('sonarr', { host: 'http://sonarr:8989', apiKey: 'test-key' }).deleteQueueItems([], {
        removeFromClient: true,
        blocklist: false,
        skipRedownload: false,
        changeCategory: false,
      });

      expect(clientMock.delete).not.toHaveBeenCalled();
    });
  });
});

describe('toQueueEntry', () => {
  it('keeps status message groups', () => {
    expect(
      toQueueEntry({ id: 3, statusMessages: [{ title: 'file.exe', messages: ['Found potentially dangerous file'] }] })
        .statusMessages
    ).toEqual([{ title: 'file.exe', messages: ['Found potentially dangerous file'] }]);
  });
});
