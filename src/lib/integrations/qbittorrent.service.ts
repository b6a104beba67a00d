/**
 * Component: qBittorrent Integration Service
 * Documentation: documentation/integrations.md
 */

import axios, { AxiosInstance } from 'axios';
import { stat } from 'fs/promises';
import { TORRENT_CLIENT_TIMEOUT } from '../constants/download-timeouts';
import type {
  TorrentClient,
  TorrentContentFile,
  TorrentListEntry,
} from '../interfaces/torrent-client.interface';
import { IntegrationError } from '../utils/errors';
import { AppLogger } from '../utils/logger';
import { normalizeBaseUrl } from '../utils/url';

const logger = AppLogger.create('qBittorrent');

/** Fields of `/torrents/info` this service reads */
export interface QBTorrentInfo {
  hash?: string;
  name?: string;
  total_size?: number;
  save_path?: string;
  category?: string;
  ratio?: number;
  seeding_time?: number;
  progress?: number;
}

export interface QBTracker {
  url: string;
  status?: number;
  tier?: number;
  msg?: string;
}

export interface QBTorrentFile {
  name: string;
  size: number;
  progress?: number;
  priority?: number;
  index?: number;
}

export interface QBittorrentCredentials {
  host: string;
  username: string;
  password: string;
}

export class QBittorrentService implements TorrentClient {
  private client: AxiosInstance;
  private baseUrl: string;
  private username: string;
  private password: string;
  private cookie?: string;

  constructor({ host, username, password }: QBittorrentCredentials) {
    this.baseUrl = normalizeBaseUrl(host);
    this.username = username;
    this.password = password;

    this.client = axios.create({
      baseURL: `${this.baseUrl}/api/v2`,
      timeout: TORRENT_CLIENT_TIMEOUT,
    });
  }

  /**
   * Authenticate and establish session
   */
  async login(): Promise<void> {
    let setCookie: string[] | undefined;
    let body: unknown;
    try {
      const response = await axios.post(
        `${this.baseUrl}/api/v2/auth/login`,
        new URLSearchParams({
          username: this.username,
          password: this.password,
        }),
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: TORRENT_CLIENT_TIMEOUT,
        }
      );
      setCookie = response.headers['set-cookie'];
      body = response.data;
    } catch (error) {
      throw new IntegrationError('qBittorrent', 'Login request failed', statusOf(error), { cause: error });
    }

    const cookie = setCookie?.[0]?.split(';')[0];
    if (!cookie || body === 'Fails.') {
      throw new IntegrationError('qBittorrent', 'Authentication rejected, check username and password');
    }

    this.cookie = cookie;
    logger.debug('Authenticated');
  }

  async listTorrents(): Promise<TorrentListEntry[]> {
    const torrents = await this.withSession('list torrents', async (cookie) => {
      const response = await this.client.get<QBTorrentInfo[]>('/torrents/info', {
        headers: { Cookie: cookie },
      });
      return response.data;
    });

    return torrents.map((torrent) => ({
      hash: torrent.hash,
      name: torrent.name,
      totalSize: torrent.total_size,
      savePath: torrent.save_path,
      category: torrent.category,
      ratio: torrent.ratio,
      seedingTime: torrent.seeding_time,
      progress: torrent.progress,
    }));
  }

  async getTrackers(hash: string): Promise<string[]> {
    const trackers = await this.withSession(`get trackers of ${hash}`, async (cookie) => {
      const response = await this.client.get<QBTracker[]>('/torrents/trackers', {
        headers: { Cookie: cookie },
        params: { hash },
      });
      return response.data;
    });

    return trackers.map((tracker) => tracker.url);
  }

  async getFiles(hash: string): Promise<TorrentContentFile[]> {
    const files = await this.withSession(`get files of ${hash}`, async (cookie) => {
      const response = await this.client.get<QBTorrentFile[]>('/torrents/files', {
        headers: { Cookie: cookie },
        params: { hash },
      });
      return response.data;
    });

    return files.map((file) => ({ name: file.name, size: file.size }));
  }

  /**
   * Hard link count of a downloaded file. The save path must be visible to
   * this process under the same path qBittorrent uses.
   */
  async getLinkCount(filePath: string): Promise<number | null> {
    try {
      const stats = await stat(filePath);
      return stats.nlink;
    } catch (error) {
      logger.debug(`Failed to read metadata for "${filePath}": ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  async deleteTorrents(hashes: string[], deleteFiles: boolean): Promise<void> {
    if (hashes.length === 0) {
      return;
    }

    await this.withSession(`delete ${hashes.length} torrents`, async (cookie) => {
      await this.client.post(
        '/torrents/delete',
        new URLSearchParams({
          hashes: hashes.join('|'),
          deleteFiles: deleteFiles.toString(),
        }),
        {
          headers: {
            Cookie: cookie,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
        }
      );
    });

    logger.info(`Deleted ${hashes.length} torrent(s)${deleteFiles ? ' with data' : ''}`);
  }

  /**
   * Run a call with a valid session cookie. An expired session answers 403;
   * in that case log in again and retry once.
   */
  private async withSession<T>(operation: string, call: (cookie: string) => Promise<T>): Promise<T> {
    const cookie = await this.ensureSession();

    try {
      return await call(cookie);
    } catch (error) {
      if (statusOf(error) !== 403) {
        throw new IntegrationError('qBittorrent', `Failed to ${operation}`, statusOf(error), { cause: error });
      }
    }

    logger.info('Session expired, re-authenticating...');
    this.cookie = undefined;
    const renewed = await this.ensureSession();

    try {
      return await call(renewed);
    } catch (error) {
      throw new IntegrationError('qBittorrent', `Failed to ${operation}`, statusOf(error), { cause: error });
    }
  }

  private async ensureSession(): Promise<string> {
    if (!this.cookie) {
      await this.login();
    }
    if (!this.cookie) {
      throw new IntegrationError('qBittorrent', 'No session after login');
    }
    return this.cookie;
  }
}

function statusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}
