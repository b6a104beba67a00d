/**
 * Component: Retry Processor
 * Documentation: documentation/retry.md
 *
 * Removes stalled, stale and unsafe downloads from each manager's queue so a
 * different release is grabbed.
 */

import {
  STALLED_SAMPLE_INTERVAL,
  STALLED_SAMPLE_INTERVAL_MAX,
  STALLED_SAMPLE_INTERVAL_MIN,
} from '../constants/retry-thresholds';
import type { QueueManagerClient, QueueManagerKind } from '../interfaces/queue-manager.interface';
import type { RetryConfig } from '../services/config.service';
import { evaluateQueue, type ActionableEntry, type EvaluationSettings } from '../services/stall-evaluator.service';
import { StrikeLedger } from '../services/strike-ledger.service';
import { ConfigurationError } from '../utils/errors';
import { AppLogger } from '../utils/logger';

export interface RetryManagerResult {
  manager: string;
  queued: number;
  removed: number;
  blocklisted: number;
}

export interface RetryResult {
  success: boolean;
  message: string;
  managers: RetryManagerResult[];
  dryRun: boolean;
}

export interface RetryControllerOptions {
  dryRun: boolean;
  now?: () => Date;
  logger?: AppLogger;
}

/**
 * Validate the retry section into evaluator settings
 *
 * @throws ConfigurationError when the sampling interval is out of range
 */
export function resolveEvaluationSettings(config: RetryConfig): EvaluationSettings {
  const stalledInterval = config.stalledInterval ?? STALLED_SAMPLE_INTERVAL;
  if (stalledInterval < STALLED_SAMPLE_INTERVAL_MIN || stalledInterval > STALLED_SAMPLE_INTERVAL_MAX) {
    throw new ConfigurationError(
      `Stalled interval should be between ${STALLED_SAMPLE_INTERVAL_MIN} and ${STALLED_SAMPLE_INTERVAL_MAX} seconds, got ${stalledInterval}`
    );
  }

  return {
    staleTimeout: config.staleTimeout,
    stalledInterval,
    maxStrikes: config.maxStrikes,
    blocklistStale: config.blocklistStale,
  };
}

export class RetryController {
  private readonly settings: EvaluationSettings;
  private readonly dryRun: boolean;
  private readonly now: () => Date;
  private readonly logger: AppLogger;
  // Queue ids are only unique within one manager
  private readonly ledgers = new Map<QueueManagerKind, StrikeLedger>();

  constructor(
    private readonly managers: readonly QueueManagerClient[],
    config: RetryConfig,
    options: RetryControllerOptions
  ) {
    if (managers.length === 0) {
      throw new ConfigurationError('Retry requires Sonarr or Radarr to be configured');
    }

    this.settings = resolveEvaluationSettings(config);
    this.dryRun = options.dryRun;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? AppLogger.create('Retry');

    for (const manager of managers) {
      this.ledgers.set(manager.kind, new StrikeLedger());
    }
  }

  /**
   * Strike ledger of a manager, exposed for diagnostics
   */
  getLedger(kind: QueueManagerKind): StrikeLedger | undefined {
    return this.ledgers.get(kind);
  }

  /**
   * One retry cycle over every configured manager. The first failure ends the cycle.
   */
  async execute(): Promise<RetryResult> {
    const results: RetryManagerResult[] = [];

    for (const manager of this.managers) {
      results.push(await this.processManager(manager));
    }

    const removed = results.reduce((sum, result) => sum + result.removed + result.blocklisted, 0);
    return {
      success: true,
      message: removed === 0 ? 'No downloads to retry' : `${this.dryRun ? 'Would remove' : 'Removed'} ${removed} download(s)`,
      managers: results,
      dryRun: this.dryRun,
    };
  }

  private async processManager(manager: QueueManagerClient): Promise<RetryManagerResult> {
    const logger = this.logger.child(manager.displayName);
    let ledger = this.ledgers.get(manager.kind);
    if (!ledger) {
      ledger = new StrikeLedger();
      this.ledgers.set(manager.kind, ledger);
    }

    const queue = await manager.getQueue();
    const decision = evaluateQueue(queue, ledger, this.settings, this.now(), logger);

    const result: RetryManagerResult = {
      manager: manager.displayName,
      queued: queue.length,
      removed: decision.remove.length,
      blocklisted: decision.removeAndBlocklist.length,
    };

    if (this.dryRun) {
      logRemovals(logger, '[DRY RUN] Would remove', decision.remove);
      logRemovals(logger, '[DRY RUN] Would remove and blocklist', decision.removeAndBlocklist);
      forget(ledger, [...decision.remove, ...decision.removeAndBlocklist]);
      return result;
    }

    // A failed delete leaves the records in place for the next cycle
    await this.deleteBatch(manager, decision.remove, false, logger);
    forget(ledger, decision.remove);
    await this.deleteBatch(manager, decision.removeAndBlocklist, true, logger);
    forget(ledger, decision.removeAndBlocklist);
    return result;
  }

  private async deleteBatch(
    manager: QueueManagerClient,
    entries: ActionableEntry[],
    blocklist: boolean,
    logger: AppLogger
  ): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    await manager.deleteQueueItems(
      entries.map((entry) => entry.id),
      {
        removeFromClient: true,
        blocklist,
        skipRedownload: false,
        changeCategory: false,
      }
    );
    logRemovals(logger, blocklist ? 'Removed and blocklisted' : 'Removed', entries);
  }
}

function forget(ledger: StrikeLedger, entries: readonly ActionableEntry[]): void {
  for (const entry of entries) {
    ledger.delete(entry.downloadId);
  }
}

function logRemovals(logger: AppLogger, action: string, entries: readonly ActionableEntry[]): void {
  for (const entry of entries) {
    logger.info(`${action} '${entry.title ?? entry.downloadId}' (queue id ${entry.id})`);
  }
}
