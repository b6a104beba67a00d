/**
 * Component: Strike Ledger
 * Documentation: documentation/retry.md
 *
 * In-memory record of stalled downloads, keyed by download id. Owned by a
 * single retry controller and discarded with it.
 */

export interface StrikeRecord {
  strikes: number;
  lastCheck: Date;
  lastSizeLeft: number;
}

export class StrikeLedger {
  private records = new Map<string, StrikeRecord>();

  get size(): number {
    return this.records.size;
  }

  get(downloadId: string): StrikeRecord | undefined {
    return this.records.get(downloadId);
  }

  getOrCreate(downloadId: string, create: () => StrikeRecord): StrikeRecord {
    let record = this.records.get(downloadId);
    if (!record) {
      record = create();
      this.records.set(downloadId, record);
    }
    return record;
  }

  delete(downloadId: string): boolean {
    return this.records.delete(downloadId);
  }

  /**
   * Mark an existing record as observed without counting a strike
   */
  touch(downloadId: string, now: Date): void {
    const record = this.records.get(downloadId);
    if (record) {
      record.lastCheck = now;
    }
  }

  /**
   * Forget every record whose id is no longer in the queue
   *
   * @returns number of records removed
   */
  prune(liveIds: ReadonlySet<string>): number {
    let removed = 0;
    for (const id of [...this.records.keys()]) {
      if (!liveIds.has(id)) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
