import { Injectable } from '@nestjs/common';
import { HistoricalRecord, snapshotHistoricalRecord } from './entities/historical-record.entity';

// Append-only audit ledger of lifecycle transitions.
// One instance per application container, injected into the lifecycle engine.
// Calls are synchronous, so the event loop serializes appends and reads.
// Entries are deep-copied in and out: nothing a caller holds can reach them.
@Injectable()
export class TradeHistoryService {
  private records: HistoricalRecord[] = [];

  /** Appends in call order - no reordering, no deduplication */
  append(record: HistoricalRecord): number {
    this.records.push(snapshotHistoricalRecord(record));
    return this.records.length - 1;
  }

  /** Total entries since the last clear */
  count(): number {
    return this.records.length;
  }

  /** Positional lookup - undefined past the end or for non-integer indices */
  get(index: number): HistoricalRecord | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.records.length) {
      return undefined;
    }
    return snapshotHistoricalRecord(this.records[index]);
  }

  /** Nukes the ledger - test harness only */
  clear(): void {
    this.records = [];
  }
}
