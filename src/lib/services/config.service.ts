/**
 * Component: Configuration Service
 * Documentation: documentation/configuration.md
 */

import { watch, type FSWatcher } from 'fs';
import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
  REFRESH_INTERVAL_DEFAULT,
  REFRESH_INTERVAL_MAX,
  REFRESH_INTERVAL_MIN,
  STALE_DOWNLOAD_TIMEOUT,
  MAX_STRIKES,
} from '../constants/retry-thresholds';
import { ConfigurationError } from '../utils/errors';
import { AppLogger } from '../utils/logger';

const logger = AppLogger.create('Config');

export const DEFAULT_CONFIG_PATH = 'config.json';

// =========================================================================
// SCHEMAS
// =========================================================================

const ServiceUrlSchema = z.string().url();

const QBittorrentConfigSchema = z.object({
  host: ServiceUrlSchema,
  username: z.string(),
  password: z.string(),
});

const ManagerConfigSchema = z.object({
  host: ServiceUrlSchema,
  apiKey: z.string().min(1),
});

const CategoryRuleSchema = z.object({
  name: z.string(),
  ignore: z.boolean().default(false),
});

export const TRACKER_IGNORE_POLICIES = ['never', 'always', 'hardLinks'] as const;

const TrackerRuleSchema = z.object({
  name: z.string(),
  domains: z.array(z.string().min(1)).min(1),
  ratio: z.number().nonnegative().optional(),
  /** Seconds */
  seedingTime: z.number().int().nonnegative().optional(),
  requireRatioAndSeedingTime: z.boolean().default(false),
  ignore: z.enum(TRACKER_IGNORE_POLICIES).default('never'),
  hardLinksPercentage: z.number().min(0).max(100).default(100),
});

const CleanupConfigSchema = z.object({
  /** Ratio expression such as `<1.0`, parsed when the cleanup controller is built */
  ratio: z.string().optional(),
  categories: z.array(CategoryRuleSchema).optional(),
  trackers: z.array(TrackerRuleSchema).optional(),
  dryRun: z.boolean().optional(),
});

const RetryConfigSchema = z.object({
  /** Seconds after `added` before a download with no progress is dropped */
  staleTimeout: z.number().int().positive().default(STALE_DOWNLOAD_TIMEOUT),
  /** Seconds between strike samples; range-checked when the retry controller is built */
  stalledInterval: z.number().int().optional(),
  maxStrikes: z.number().int().positive().default(MAX_STRIKES),
  blocklistStale: z.boolean().default(true),
  dryRun: z.boolean().optional(),
});

const GroupConfigSchema = z.object({
  name: z.string().optional(),
  refreshInterval: z
    .number()
    .int()
    .min(REFRESH_INTERVAL_MIN, `Interval should be between ${REFRESH_INTERVAL_MIN} and ${REFRESH_INTERVAL_MAX} seconds`)
    .max(REFRESH_INTERVAL_MAX, `Interval should be between ${REFRESH_INTERVAL_MIN} and ${REFRESH_INTERVAL_MAX} seconds`)
    .default(REFRESH_INTERVAL_DEFAULT),
  dryRun: z.boolean().default(false),
  qbittorrent: QBittorrentConfigSchema,
  sonarr: ManagerConfigSchema.optional(),
  radarr: ManagerConfigSchema.optional(),
  cleanup: CleanupConfigSchema.optional(),
  retry: RetryConfigSchema.optional(),
});

const GroupListSchema = z.array(GroupConfigSchema).min(1, 'At least one configuration group is required');

export type CategoryRule = z.output<typeof CategoryRuleSchema>;
export type TrackerRule = z.output<typeof TrackerRuleSchema>;
export type CleanupConfig = z.output<typeof CleanupConfigSchema>;
export type RetryConfig = z.output<typeof RetryConfigSchema>;
export type ManagerConfig = z.output<typeof ManagerConfigSchema>;
export type QBittorrentConfig = z.output<typeof QBittorrentConfigSchema>;
export type GroupConfig = z.output<typeof GroupConfigSchema>;
export type GroupConfigInput = z.input<typeof GroupConfigSchema>;

export interface AppConfig {
  groups: GroupConfig[];
  /** Seconds between polling cycles; the shortest interval across groups */
  refreshInterval: number;
}

// =========================================================================
// PARSING
// =========================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a parsed config document. The root may be a single group or a list of groups.
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = GroupListSchema.safeParse(Array.isArray(raw) ? raw : [raw]);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  const groups = result.data;
  return {
    groups,
    refreshInterval: Math.min(...groups.map((group) => group.refreshInterval)),
  };
}

/**
 * Label used in logs for a configuration group
 */
export function describeGroup(group: GroupConfig, index: number): string {
  return group.name ?? `group ${index + 1}`;
}

// =========================================================================
// SERVICE
// =========================================================================

/**
 * Configuration service for reading settings from the config file
 */
export class ConfigurationService {
  readonly configPath: string;

  constructor(configPath: string) {
    this.configPath = path.resolve(configPath);
  }

  /**
   * Read and validate the config file
   */
  async load(): Promise<AppConfig> {
    let contents: string;
    try {
      contents = await readFile(this.configPath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read config file ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      throw new ConfigurationError(
        `Config file ${this.configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const config = parseConfig(raw);
    logger.info(`Loaded ${config.groups.length} configuration group(s) from ${this.configPath}`);
    return config;
  }

  /**
   * Watch the config file for changes. The parent directory is watched so
   * editors that replace the file on save are still noticed.
   *
   * @returns function that stops watching
   */
  watch(onChange: () => void): () => void {
    const directory = path.dirname(this.configPath);
    const fileName = path.basename(this.configPath);

    let watcher: FSWatcher;
    try {
      watcher = watch(directory, (_event, changed) => {
        if (changed === null || changed.toString() === fileName) {
          onChange();
        }
      });
    } catch (error) {
      logger.warn(`Config hot reload disabled: ${error instanceof Error ? error.message : String(error)}`);
      return () => undefined;
    }

    watcher.on('error', (error) => {
      logger.warn(`Config watcher failed, hot reload disabled: ${error.message}`);
      watcher.close();
    });

    return () => watcher.close();
  }
}

// Singleton instance
let configService: ConfigurationService | null = null;

export function getConfigService(): ConfigurationService {
  if (!configService) {
    configService = new ConfigurationService(process.env.ARR_JANITOR_CONFIG || DEFAULT_CONFIG_PATH);
  }
  return configService;
}
