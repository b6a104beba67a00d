/**
 * Component: Controller Factory
 * Documentation: documentation/configuration.md
 *
 * Turns one validated configuration group into its cleanup and retry
 * controllers. A controller whose rules are rejected is left out; the rest of
 * the group still runs.
 */

import { createCleanupPipeline } from '../filters/filter-pipeline';
import { ArrService } from '../integrations/arr.service';
import { QBittorrentService } from '../integrations/qbittorrent.service';
import {
  MANAGER_DISPLAY_NAMES,
  QUEUE_MANAGER_KINDS,
  type QueueManagerClient,
  type QueueManagerKind,
} from '../interfaces/queue-manager.interface';
import type { TorrentClient } from '../interfaces/torrent-client.interface';
import { CleanupController } from '../processors/cleanup.processor';
import { RetryController } from '../processors/retry.processor';
import { ConfigurationError } from '../utils/errors';
import { AppLogger } from '../utils/logger';
import { describeGroup, type GroupConfig, type ManagerConfig, type QBittorrentConfig } from './config.service';

const logger = AppLogger.create('Controllers');

/** A task run once per polling cycle */
export interface CycleController {
  execute(): Promise<{ success: boolean; message: string }>;
}

export interface GroupControllers {
  label: string;
  cleanup: CycleController | null;
  retry: CycleController | null;
}

export interface ControllerFactoryDependencies {
  createTorrentClient?: (config: QBittorrentConfig) => TorrentClient;
  createQueueManager?: (kind: QueueManagerKind, config: ManagerConfig) => QueueManagerClient;
  now?: () => Date;
}

/**
 * Build the controllers of one group. Manager clients are created once and
 * shared by the cleanup filters and the retry controller.
 *
 * A manager whose endpoint is rejected is left out: cleanup is then disabled
 * and retry only covers the remaining managers.
 *
 * @throws ConfigurationError when the qBittorrent endpoint cannot be used
 */
export function createGroupControllers(
  group: GroupConfig,
  index: number,
  deps: ControllerFactoryDependencies = {}
): GroupControllers {
  const label = describeGroup(group, index);
  const createTorrentClient = deps.createTorrentClient ?? ((config: QBittorrentConfig) => new QBittorrentService(config));
  const createQueueManager =
    deps.createQueueManager ?? ((kind: QueueManagerKind, config: ManagerConfig) => new ArrService(kind, config));

  const torrentClient = createTorrentClient(group.qbittorrent);

  const managers: Record<QueueManagerKind, QueueManagerClient | null> = { sonarr: null, radarr: null };
  const unavailable: QueueManagerKind[] = [];
  for (const kind of QUEUE_MANAGER_KINDS) {
    const managerConfig = group[kind];
    if (managerConfig) {
      managers[kind] = buildOptional(label, MANAGER_DISPLAY_NAMES[kind], () => createQueueManager(kind, managerConfig));
      if (!managers[kind]) {
        unavailable.push(kind);
      }
    }
  }

  const cleanupConfig = group.cleanup;
  const cleanup = cleanupConfig
    ? buildOptional(label, 'cleanup', () => {
        // Without a configured manager's queue, torrents it still tracks would be deleted
        if (unavailable.length > 0) {
          throw new ConfigurationError(
            `${unavailable.map((kind) => MANAGER_DISPLAY_NAMES[kind]).join(' and ')} is configured but unusable`
          );
        }
        const pipeline = createCleanupPipeline(cleanupConfig, {
          torrentClient,
          sonarr: managers.sonarr,
          radarr: managers.radarr,
          now: deps.now,
        });
        return new CleanupController(torrentClient, pipeline, cleanupConfig.dryRun ?? group.dryRun, AppLogger.create('Cleanup').child(label));
      })
    : null;

  const retryConfig = group.retry;
  const retry = retryConfig
    ? buildOptional(label, 'retry', () => {
        const configured = QUEUE_MANAGER_KINDS.map((kind) => managers[kind]).filter(
          (manager): manager is QueueManagerClient => manager !== null
        );
        return new RetryController(configured, retryConfig, {
          dryRun: retryConfig.dryRun ?? group.dryRun,
          now: deps.now,
          logger: AppLogger.create('Retry').child(label),
        });
      })
    : null;

  logger.info(`Group '${label}': cleanup ${cleanup ? 'enabled' : 'disabled'}, retry ${retry ? 'enabled' : 'disabled'}`);
  return { label, cleanup, retry };
}

function buildOptional<T>(label: string, feature: string, build: () => T): T | null {
  try {
    return build();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Group '${label}': ${feature} disabled: ${error.message}`);
      return null;
    }
    throw error;
  }
}
