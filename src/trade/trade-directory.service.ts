import { Inject, Injectable } from '@nestjs/common';
import { AnyTradeRecord } from './entities/trade-record.entity';
import { DuplicateTradeIdentifierError, TradeNotFoundError } from './errors/trade.errors';
import { Result, err, ok } from '../common/utils/result.util';

export const TRADE_ID_GENERATOR = Symbol('TRADE_ID_GENERATOR');

export type TradeIdGenerator = () => string;

// In-memory map from trade uuid to the record in its current state.
// One slot per trade: the record carries its own lifecycle tag.
@Injectable()
export class TradeDirectoryService {
  private trades: Map<string, AnyTradeRecord> = new Map();

  constructor(
    @Inject(TRADE_ID_GENERATOR) private readonly generateId: TradeIdGenerator,
  ) {}

  /**
   * Stores a new trade under a freshly generated id.
   * A collision is reported, never overwritten; the check and the insert run
   * in one synchronous block.
   */
  create(record: AnyTradeRecord): Result<string, DuplicateTradeIdentifierError> {
    const id = this.generateId();
    if (this.trades.has(id)) {
      return err(new DuplicateTradeIdentifierError(id));
    }
    this.trades.set(id, record);
    return ok(id);
  }

  /** O(1) lookup by trade id */
  get(id: string): Result<AnyTradeRecord, TradeNotFoundError> {
    const record = this.trades.get(id);
    return record ? ok(record) : err(new TradeNotFoundError(id));
  }

  /** Swaps in the post-transition record of an existing trade */
  replace(id: string, record: AnyTradeRecord): Result<AnyTradeRecord, TradeNotFoundError> {
    if (!this.trades.has(id)) {
      return err(new TradeNotFoundError(id));
    }
    this.trades.set(id, record);
    return ok(record);
  }

  /** Total trades held - useful for testing/metrics */
  count(): number {
    return this.trades.size;
  }

  /** Nukes all storage - test harness only */
  clear(): void {
    this.trades.clear();
  }
}
