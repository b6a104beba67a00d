/**
 * Component: Stalled Download Evaluator
 * Documentation: documentation/retry.md
 *
 * Decides, per queue entry and per cycle, whether a tracked download is kept,
 * removed, or removed and blocklisted so the manager grabs another release.
 */

import { addSeconds, isBefore, isValid, parseISO, subSeconds } from 'date-fns';
import { DANGEROUS_FILE_MARKER, STALLED_MESSAGE_MARKER } from '../constants/retry-thresholds';
import type { QueueEntry } from '../interfaces/queue-manager.interface';
import { AppLogger } from '../utils/logger';
import type { StrikeLedger } from './strike-ledger.service';

const defaultLogger = AppLogger.create('Retry:Evaluator');

export interface EvaluationSettings {
  /** Seconds after `added` before a download without a single received byte is dropped */
  staleTimeout: number;
  /** Seconds between two strike samples */
  stalledInterval: number;
  maxStrikes: number;
  blocklistStale: boolean;
}

/** Queue entry the manager can act on */
export type ActionableEntry = QueueEntry & { id: number; downloadId: string };

export type EntryAction = 'keep' | 'remove' | 'removeAndBlocklist';

export interface RetryDecision {
  remove: ActionableEntry[];
  removeAndBlocklist: ActionableEntry[];
}

function sameText(value: string | undefined, expected: string): boolean {
  return value !== undefined && value.toLowerCase() === expected.toLowerCase();
}

function isActionable(entry: QueueEntry): entry is ActionableEntry {
  return entry.id !== undefined && Boolean(entry.downloadId);
}

export function isDangerousFile(entry: QueueEntry): boolean {
  return (
    sameText(entry.trackedDownloadStatus, 'warning') &&
    sameText(entry.trackedDownloadState, 'importPending') &&
    entry.statusMessages.some((group) => group.messages.some((message) => message.includes(DANGEROUS_FILE_MARKER)))
  );
}

export function isStalled(entry: QueueEntry): boolean {
  return (
    sameText(entry.status, 'warning') &&
    sameText(entry.trackedDownloadState, 'downloading') &&
    (entry.errorMessage?.includes(STALLED_MESSAGE_MARKER) ?? false)
  );
}

/**
 * Warning entry past its stale timeout that has not received any data
 */
export function isStale(entry: QueueEntry, staleTimeout: number, now: Date): boolean {
  if (!sameText(entry.status, 'warning') || !entry.added) {
    return false;
  }
  // Missing sizes count as zero
  if ((entry.size ?? 0) - (entry.sizeleft ?? 0) !== 0) {
    return false;
  }

  const added = parseISO(entry.added);
  return isValid(added) && isBefore(addSeconds(added, staleTimeout), now);
}

function sizeLeftOf(entry: QueueEntry): number {
  return entry.sizeleft ?? Number.MAX_SAFE_INTEGER;
}

export function evaluateEntry(
  entry: ActionableEntry,
  ledger: StrikeLedger,
  settings: EvaluationSettings,
  now: Date,
  logger: AppLogger = defaultLogger
): EntryAction {
  const label = entry.title ?? entry.downloadId;

  if (isDangerousFile(entry)) {
    logger.info(`Removing '${label}': potentially dangerous file`);
    return 'removeAndBlocklist';
  }

  let remove = false;
  let blocklist = false;

  if (isStalled(entry)) {
    // First observation counts as a sample
    const record = ledger.getOrCreate(entry.downloadId, () => ({
      strikes: 0,
      lastCheck: subSeconds(now, settings.stalledInterval),
      lastSizeLeft: sizeLeftOf(entry),
    }));

    if (!isBefore(now, addSeconds(record.lastCheck, settings.stalledInterval))) {
      const sizeLeft = sizeLeftOf(entry);
      if (sizeLeft >= record.lastSizeLeft) {
        record.strikes += 1;
        logger.info(`Download '${label}' stalled, strike ${record.strikes}/${settings.maxStrikes}`);
      } else {
        logger.debug(`Download '${label}' stalled but progressing (${record.lastSizeLeft} -> ${sizeLeft} bytes left)`);
      }
      record.lastCheck = now;
      record.lastSizeLeft = sizeLeft;
    }

    if (record.strikes >= settings.maxStrikes) {
      logger.info(`Removing '${label}': stalled for ${record.strikes} checks`);
      remove = true;
      blocklist = true;
    }
  } else {
    ledger.touch(entry.downloadId, now);
  }

  if (isStale(entry, settings.staleTimeout, now)) {
    logger.info(`Removing '${label}': no data received ${settings.staleTimeout}s after being added`);
    remove = true;
    blocklist = blocklist || settings.blocklistStale;
  }

  if (!remove) {
    return 'keep';
  }
  return blocklist ? 'removeAndBlocklist' : 'remove';
}

/**
 * Partition a manager's queue into the two deletion batches and drop ledger
 * records of entries that have left the queue. Records of entries marked for
 * removal are kept until the caller has deleted them from the manager.
 */
export function evaluateQueue(
  entries: readonly QueueEntry[],
  ledger: StrikeLedger,
  settings: EvaluationSettings,
  now: Date,
  logger: AppLogger = defaultLogger
): RetryDecision {
  const decision: RetryDecision = { remove: [], removeAndBlocklist: [] };
  const liveIds = new Set<string>();

  for (const entry of entries) {
    if (entry.downloadId) {
      liveIds.add(entry.downloadId);
    }
    if (!isActionable(entry)) {
      continue;
    }

    const action = evaluateEntry(entry, ledger, settings, now, logger);
    if (action === 'removeAndBlocklist') {
      decision.removeAndBlocklist.push(entry);
    } else if (action === 'remove') {
      decision.remove.push(entry);
    }
  }

  const pruned = ledger.prune(liveIds);
  if (pruned > 0) {
    logger.debug(`Forgot ${pruned} download(s) no longer in the queue`);
  }

  return decision;
}
