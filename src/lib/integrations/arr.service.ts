/**
 * Component: Sonarr/Radarr Integration Service
 * Documentation: documentation/integrations.md
 *
 * Both managers share the v3 queue, health and system endpoints, so one
 * service drives either of them.
 */

import axios, { AxiosInstance } from 'axios';
import { isValid, parseISO } from 'date-fns';
import { QUEUE_MANAGER_TIMEOUT } from '../constants/download-timeouts';
import {
  MANAGER_DISPLAY_NAMES,
  type QueueDeleteOptions,
  type QueueEntry,
  type QueueManagerClient,
  type QueueManagerKind,
} from '../interfaces/queue-manager.interface';
import { IntegrationError } from '../utils/errors';
import { AppLogger } from '../utils/logger';
import { normalizeBaseUrl } from '../utils/url';

interface ArrSystemStatus {
  version?: string;
  startTime?: string;
}

interface ArrHealthCheck {
  source?: string;
  type?: 'ok' | 'notice' | 'warning' | 'error';
  message?: string;
}

interface ArrStatusMessage {
  title?: string | null;
  messages?: string[] | null;
}

export interface ArrQueueRecord {
  id?: number;
  downloadId?: string | null;
  title?: string | null;
  status?: string;
  trackedDownloadState?: string;
  trackedDownloadStatus?: string;
  size?: number;
  sizeleft?: number;
  added?: string | null;
  errorMessage?: string | null;
  statusMessages?: ArrStatusMessage[] | null;
}

interface ArrQueuePage {
  page?: number;
  pageSize?: number;
  totalRecords?: number;
  records?: ArrQueueRecord[] | null;
}

export interface ArrConnection {
  host: string;
  apiKey: string;
}

// Health source reported when the manager cannot reach its download client
const DOWNLOAD_CLIENT_CHECK = 'DownloadClientCheck';

export class ArrService implements QueueManagerClient {
  readonly kind: QueueManagerKind;
  readonly displayName: string;

  private client: AxiosInstance;
  private logger: AppLogger;

  constructor(kind: QueueManagerKind, { host, apiKey }: ArrConnection) {
    this.kind = kind;
    this.displayName = MANAGER_DISPLAY_NAMES[kind];
    this.logger = AppLogger.create(this.displayName);

    this.client = axios.create({
      baseURL: `${normalizeBaseUrl(host)}/api/v3`,
      headers: {
        'X-Api-Key': apiKey,
      },
      timeout: QUEUE_MANAGER_TIMEOUT,
    });
  }

  async getStartTime(): Promise<Date | null> {
    const status = await this.request('get system status', async () => {
      const response = await this.client.get<ArrSystemStatus>('/system/status');
      return response.data;
    });

    if (!status.startTime) {
      return null;
    }

    const startTime = parseISO(status.startTime);
    return isValid(startTime) ? startTime : null;
  }

  /**
   * Fetch the whole queue: one call to learn the record count, one for the full page.
   * Refuses to return a queue while the manager reports its download client as unreachable.
   */
  async getQueue(): Promise<QueueEntry[]> {
    await this.assertDownloadClientHealthy();

    const firstPage = await this.request('get queue size', async () => {
      const response = await this.client.get<ArrQueuePage>('/queue', {
        params: { pageSize: 0 },
      });
      return response.data;
    });

    const totalRecords = firstPage.totalRecords;
    if (totalRecords === undefined) {
      throw new IntegrationError(this.displayName, 'Queue response is missing totalRecords');
    }
    if (totalRecords === 0) {
      return [];
    }

    const fullPage = await this.request('get queue', async () => {
      const response = await this.client.get<ArrQueuePage>('/queue', {
        params: { pageSize: totalRecords },
      });
      return response.data;
    });

    const records = fullPage.records ?? [];
    this.logger.debug(`Fetched ${records.length}/${totalRecords} queue records`);
    return records.map(toQueueEntry);
  }

  async deleteQueueItems(ids: number[], options: QueueDeleteOptions): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    await this.request(`delete ${ids.length} queue items`, async () => {
      await this.client.delete('/queue/bulk', {
        params: {
          removeFromClient: options.removeFromClient,
          blocklist: options.blocklist,
          skipRedownload: options.skipRedownload,
          changeCategory: options.changeCategory,
        },
        data: { ids },
      });
    });
  }

  private async assertDownloadClientHealthy(): Promise<void> {
    const checks = await this.request('get health', async () => {
      const response = await this.client.get<ArrHealthCheck[]>('/health');
      return response.data;
    });

    const failing = checks.find((check) => check.type === 'error' && check.source === DOWNLOAD_CLIENT_CHECK);
    if (failing) {
      throw new IntegrationError(
        this.displayName,
        `Health check failed for download client${failing.message ? `: ${failing.message}` : ''}`
      );
    }
  }

  private async request<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new IntegrationError(
        this.displayName,
        `Failed to ${operation}${status ? ` (HTTP ${status})` : ''}`,
        status,
        { cause: error }
      );
    }
  }
}

export function toQueueEntry(record: ArrQueueRecord): QueueEntry {
  return {
    id: record.id,
    downloadId: record.downloadId ?? undefined,
    title: record.title ?? undefined,
    status: record.status,
    trackedDownloadState: record.trackedDownloadState,
    trackedDownloadStatus: record.trackedDownloadStatus,
    size: record.size,
    sizeleft: record.sizeleft,
    added: record.added ?? undefined,
    errorMessage: record.errorMessage ?? undefined,
    statusMessages: (record.statusMessages ?? []).map((group) => ({
      title: group.title ?? undefined,
      messages: group.messages ?? [],
    })),
  };
}
